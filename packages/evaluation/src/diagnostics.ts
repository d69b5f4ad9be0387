import { type EvaluationStage, isRecoverable } from "./errors.js";

export interface StageCounts {
  insufficientData: number;
  computation: number;
}

export interface DiagnosticsSnapshot {
  total: number;
  byStage: Partial<Record<EvaluationStage, StageCounts>>;
}

/**
 * Counts the per-period failures an evaluation absorbed, so a result with
 * missing values can say why they are missing.
 */
export class Diagnostics {
  private readonly counts = new Map<EvaluationStage, StageCounts>();

  record(stage: EvaluationStage, kind: keyof StageCounts): void {
    const counts = this.counts.get(stage) ?? { insufficientData: 0, computation: 0 };
    counts[kind] += 1;
    this.counts.set(stage, counts);
  }

  count(stage: EvaluationStage, kind?: keyof StageCounts): number {
    const counts = this.counts.get(stage);
    if (!counts) {
      return 0;
    }
    return kind ? counts[kind] : counts.insufficientData + counts.computation;
  }

  get total(): number {
    let total = 0;
    for (const counts of this.counts.values()) {
      total += counts.insufficientData + counts.computation;
    }
    return total;
  }

  snapshot(): DiagnosticsSnapshot {
    const byStage: Partial<Record<EvaluationStage, StageCounts>> = {};
    for (const [stage, counts] of this.counts) {
      byStage[stage] = { ...counts };
    }
    return { total: this.total, byStage };
  }
}

/**
 * Run one period's computation. Recoverable failures are counted against
 * `stage` and replaced by `fallback`; anything else propagates.
 */
export function recoverPeriod<T>(
  stage: EvaluationStage,
  compute: () => T,
  fallback: T,
  diagnostics?: Diagnostics
): T {
  try {
    return compute();
  } catch (error) {
    if (!isRecoverable(error)) {
      throw error;
    }
    diagnostics?.record(stage, error.code === "INSUFFICIENT_DATA" ? "insufficientData" : "computation");
    return fallback;
  }
}
