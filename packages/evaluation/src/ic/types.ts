/**
 * Information Coefficient (IC) Type Definitions
 *
 * Type definitions and Zod schemas for IC calculation results.
 */

import { z } from "zod";

// ============================================
// Constants
// ============================================

/**
 * Default configuration for IC calculation
 */
export const IC_DEFAULTS = {
  /** Minimum jointly valid instruments for a period's correlation */
  minObservations: 2,
  /** Minimum IC mean to be considered meaningful */
  minICMean: 0.02,
  /** Mean IC above which a signal can be strong */
  strongICMean: 0.05,
  /** Minimum ICIR for consistent signal quality */
  minICIR: 0.5,
  /** ICIR above which a signal is at least moderate */
  moderateICIR: 0.3,
  /** Default forward horizons for decay analysis */
  defaultHorizons: [1, 5, 10, 21],
} as const;

// ============================================
// Schemas
// ============================================

export const CorrelationMethodSchema = z.enum(["spearman", "pearson"]);
export type CorrelationMethod = z.infer<typeof CorrelationMethodSchema>;

/**
 * IC for one period. `value` is null for the first period and for periods
 * whose cross-section could not produce a correlation.
 */
export const ICPointSchema = z.object({
  period: z.string(),
  value: z.number().min(-1).max(1).nullable(),
  /** Jointly valid instruments behind the value */
  nObservations: z.number().int().min(0),
});

export type ICPoint = z.infer<typeof ICPointSchema>;

/**
 * Summary statistics for a lagged IC series
 */
export const ICSummarySchema = z.object({
  /** Mean of the non-missing values */
  mean: z.number().nullable(),
  /** Sample standard deviation of the non-missing values */
  std: z.number().nullable(),
  /** mean / std; null with fewer than two values or zero std */
  icir: z.number().nullable(),
  /** Share of non-missing periods with a positive IC */
  winRate: z.number().min(0).max(1).nullable(),
  /** Periods in the series, missing ones included */
  nPeriods: z.number().int().min(0),
  nValid: z.number().int().min(0),
});

export type ICSummary = z.infer<typeof ICSummarySchema>;

/**
 * Result of IC decay analysis
 */
export const ICDecayResultSchema = z.object({
  /** Mean rank IC at each horizon; null when no period produced one */
  icByHorizon: z.record(z.string(), z.number().nullable()),
  /** Horizons analyzed */
  horizons: z.array(z.number().int().positive()),
  /** Horizon with the highest mean IC */
  optimalHorizon: z.number().nullable(),
  /** IC at optimal horizon */
  optimalIC: z.number().nullable(),
  /** Half-life in periods (where IC drops to 50%) */
  halfLife: z.number().nullable(),
});

export type ICDecayResult = z.infer<typeof ICDecayResultSchema>;

export const ICInterpretationSchema = z.enum(["strong", "moderate", "weak"]);
export type ICInterpretation = z.infer<typeof ICInterpretationSchema>;

/**
 * Human-readable IC verdict
 */
export interface ICVerdict {
  interpretation: ICInterpretation;
  summary: string;
  recommendation: "accept" | "review" | "reject";
  details: string[];
}
