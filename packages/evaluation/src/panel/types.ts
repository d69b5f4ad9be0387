/**
 * Panel Type Definitions
 */

/** One panel cell; null marks a missing observation */
export type Cell = number | null;

/**
 * Period × instrument table.
 *
 * Periods are ISO dates in strictly ascending order, so lexical order is
 * chronological. `values[t][j]` is the value of `instruments[j]` at
 * `periods[t]`. Every row spans every instrument: sparse data is a null
 * cell, never a missing column.
 */
export interface Panel {
  readonly periods: readonly string[];
  readonly instruments: readonly string[];
  readonly values: readonly (readonly Cell[])[];
}

/**
 * Factor and return panels restricted to the same periods and instruments,
 * in the same order.
 */
export interface AlignedPair {
  readonly factor: Panel;
  readonly returns: Panel;
}

export interface TimeSeriesPoint<T = number | null> {
  readonly period: string;
  readonly value: T;
}

export type TimeSeries<T = number | null> = readonly TimeSeriesPoint<T>[];

/** Record-per-row form of a panel cell */
export interface LongRecord {
  period: string;
  instrument: string;
  value: Cell;
}
