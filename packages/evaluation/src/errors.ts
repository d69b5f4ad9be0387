/**
 * Factor Evaluation Errors
 *
 * Fatal errors (alignment, panel shape) escape to the caller. Per-period
 * errors (insufficient data, degenerate statistics) are thrown by the
 * per-period helpers and absorbed by the period loops, which record the
 * period as missing and count it in {@link Diagnostics}.
 */

export type FactorEvaluationErrorCode =
  | "ALIGNMENT"
  | "INSUFFICIENT_DATA"
  | "COMPUTATION"
  | "PANEL_SHAPE";

export type EvaluationStage =
  | "smoothing"
  | "alignment"
  | "rank_ic"
  | "ic"
  | "decay"
  | "grouping"
  | "long_short"
  | "long_only";

export class FactorEvaluationError extends Error {
  constructor(
    message: string,
    public readonly code: FactorEvaluationErrorCode
  ) {
    super(message);
    this.name = "FactorEvaluationError";
  }
}

export class AlignmentError extends FactorEvaluationError {
  constructor(message: string) {
    super(message, "ALIGNMENT");
    this.name = "AlignmentError";
  }

  static noCommonPeriods(factorPeriods: number, returnPeriods: number): AlignmentError {
    return new AlignmentError(
      `Factor and return panels share no periods (${factorPeriods} vs ${returnPeriods} periods)`
    );
  }

  static noCommonInstruments(factorInstruments: number, returnInstruments: number): AlignmentError {
    return new AlignmentError(
      `Factor and return panels share no instruments (${factorInstruments} vs ${returnInstruments} instruments)`
    );
  }

  static ambiguousInstrument(panel: string, canonical: string, labels: readonly string[]): AlignmentError {
    return new AlignmentError(
      `Columns ${labels.join(", ")} of the ${panel} panel all map to instrument ${canonical}`
    );
  }
}

export class InsufficientDataError extends FactorEvaluationError {
  constructor(
    public readonly stage: EvaluationStage,
    public readonly required: number,
    public readonly available: number,
    public readonly period?: string
  ) {
    super(
      `[${stage}] ${available} valid instruments${period ? ` at ${period}` : ""}, ${required} required`,
      "INSUFFICIENT_DATA"
    );
    this.name = "InsufficientDataError";
  }
}

export class ComputationError extends FactorEvaluationError {
  constructor(
    message: string,
    public readonly stage?: EvaluationStage,
    public readonly period?: string
  ) {
    super(stage ? `[${stage}] ${message}` : message, "COMPUTATION");
    this.name = "ComputationError";
  }
}

export class PanelShapeError extends FactorEvaluationError {
  constructor(message: string) {
    super(message, "PANEL_SHAPE");
    this.name = "PanelShapeError";
  }
}

/**
 * Errors a period loop absorbs instead of aborting the evaluation
 */
export function isRecoverable(error: unknown): error is InsufficientDataError | ComputationError {
  return error instanceof InsufficientDataError || error instanceof ComputationError;
}
