/**
 * Shared panels for evaluation tests
 */

import { addDays, format } from "date-fns";
import { createPanel } from "../src/panel/panel.js";
import type { AlignedPair, Cell, Panel } from "../src/panel/types.js";

/** `count` consecutive ISO dates */
export function isoDates(count: number, start = "2024-01-01"): string[] {
  const first = new Date(`${start}T00:00:00`);
  return Array.from({ length: count }, (_, i) => format(addDays(first, i), "yyyy-MM-dd"));
}

export function instrumentIds(count: number): string[] {
  return Array.from({ length: count }, (_, j) => `I${String(j + 1).padStart(3, "0")}`);
}

/** Deterministic uniform [0, 1) generator */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export const PERIODS_4 = ["2024-01-02", "2024-01-03", "2024-01-04", "2024-01-05"];

/** 4 periods × 3 instruments; the last period is an all-tie row */
export const SMALL_FACTOR: Panel = createPanel(PERIODS_4, ["A", "B", "C"], [
  [1, 2, 3],
  [3, 1, 2],
  [2, 3, 1],
  [1, 1, 1],
]);

export const SMALL_RETURNS: Panel = createPanel(PERIODS_4, ["A", "B", "C"], [
  [0.01, 0.02, 0.03],
  [0.03, 0.02, 0.01],
  [0.01, 0.02, 0.03],
  [0.02, 0.03, 0.01],
]);

export const SMALL_PAIR: AlignedPair = { factor: SMALL_FACTOR, returns: SMALL_RETURNS };

/**
 * A persistent factor (fixed per-instrument level plus small noise) and
 * returns driven by the previous period's factor. Both the lagged IC and
 * the same-period bucket spread come out strongly positive.
 */
export function syntheticPanels(
  periodCount = 60,
  instrumentCount = 30,
  seed = 7
): { factor: Panel; returns: Panel } {
  const random = seededRandom(seed);
  const periods = isoDates(periodCount);
  const instruments = instrumentIds(instrumentCount);
  const levels = instruments.map(() => random() * 2 - 1);

  const factorValues: Cell[][] = periods.map(() =>
    levels.map((level) => level + 0.05 * (random() - 0.5))
  );
  const returnValues: Cell[][] = periods.map((_, t) =>
    instruments.map((_, j) => {
      const previous = t > 0 ? (factorValues[t - 1]?.[j] ?? 0) : 0;
      return 0.01 * previous + 0.001 * (random() - 0.5);
    })
  );

  return {
    factor: createPanel(periods, instruments, factorValues),
    returns: createPanel(periods, instruments, returnValues),
  };
}

/**
 * Cross-section of `count` instruments whose factor is 1…count every
 * period. The top instrument earns `top`, the bottom one `bottom`, the
 * rest nothing.
 */
export function ladderPair(periodCount: number, top: number, bottom: number, count = 10): AlignedPair {
  const periods = isoDates(periodCount);
  const instruments = instrumentIds(count);
  const factorRow = instruments.map((_, j) => j + 1);
  const returnRow = instruments.map((_, j) => (j === count - 1 ? top : j === 0 ? bottom : 0));
  return {
    factor: createPanel(periods, instruments, periods.map(() => factorRow)),
    returns: createPanel(periods, instruments, periods.map(() => returnRow)),
  };
}
