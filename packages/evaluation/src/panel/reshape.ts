import { PanelShapeError } from "../errors.js";
import { createPanel, isPresent } from "./panel.js";
import type { Cell, LongRecord, Panel } from "./types.js";

export interface ToLongOptions {
  /** Leave out missing cells (default true) */
  dropMissing?: boolean;
}

/**
 * Flatten a panel into one record per cell, period-major.
 */
export function toLongRecords(panel: Panel, options: ToLongOptions = {}): LongRecord[] {
  const dropMissing = options.dropMissing ?? true;
  const records: LongRecord[] = [];

  panel.periods.forEach((period, t) => {
    panel.instruments.forEach((instrument, j) => {
      const raw = panel.values[t]?.[j];
      const value = isPresent(raw) ? raw : null;
      if (value === null && dropMissing) {
        return;
      }
      records.push({ period, instrument, value });
    });
  });

  return records;
}

/**
 * Pivot long records into a panel with sorted periods and instruments.
 * Cells no record mentions are missing.
 *
 * @throws PanelShapeError if a (period, instrument) pair appears twice
 */
export function fromLongRecords(records: readonly LongRecord[]): Panel {
  const periods = [...new Set(records.map((r) => r.period))].sort();
  const instruments = [...new Set(records.map((r) => r.instrument))].sort();
  const periodIndex = new Map(periods.map((period, t) => [period, t]));
  const instrumentIndex = new Map(instruments.map((instrument, j) => [instrument, j]));

  const values: Cell[][] = periods.map(() => instruments.map((): Cell => null));
  const filled = new Set<string>();

  for (const record of records) {
    const key = `${record.period}\u0000${record.instrument}`;
    if (filled.has(key)) {
      throw new PanelShapeError(
        `Duplicate record for ${record.instrument} at ${record.period}`
      );
    }
    filled.add(key);

    const row = values[periodIndex.get(record.period) ?? -1];
    const j = instrumentIndex.get(record.instrument);
    if (row && j !== undefined) {
      row[j] = record.value;
    }
  }

  return createPanel(periods, instruments, values);
}
