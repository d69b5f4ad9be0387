/**
 * Panel construction and cell-wise helpers.
 *
 * Every helper returns a fresh panel; inputs are never written to.
 */

import { PanelShapeError } from "../errors.js";
import type { Cell, Panel } from "./types.js";

export function isPresent(value: Cell | undefined): value is number {
  return value !== null && value !== undefined && !Number.isNaN(value);
}

function normalizeCell(value: Cell | undefined): Cell {
  return isPresent(value) ? value : null;
}

function findDuplicate(labels: readonly string[]): string | undefined {
  const seen = new Set<string>();
  for (const label of labels) {
    if (seen.has(label)) {
      return label;
    }
    seen.add(label);
  }
  return undefined;
}

/**
 * Check the structural invariants of a panel.
 *
 * @throws PanelShapeError on duplicate or unordered periods, duplicate
 * instruments, or a row whose length differs from the instrument count
 */
export function assertPanel(panel: Panel, name = "panel"): void {
  const { periods, instruments, values } = panel;

  for (let t = 1; t < periods.length; t++) {
    const previous = periods[t - 1] ?? "";
    const current = periods[t] ?? "";
    if (current === previous) {
      throw new PanelShapeError(`${name}: duplicate period ${current}`);
    }
    if (current < previous) {
      throw new PanelShapeError(`${name}: period ${current} follows ${previous}`);
    }
  }

  const duplicate = findDuplicate(instruments);
  if (duplicate !== undefined) {
    throw new PanelShapeError(`${name}: duplicate instrument ${duplicate}`);
  }

  if (values.length !== periods.length) {
    throw new PanelShapeError(`${name}: ${values.length} rows for ${periods.length} periods`);
  }

  values.forEach((row, t) => {
    if (row.length !== instruments.length) {
      throw new PanelShapeError(
        `${name}: row ${periods[t]} has ${row.length} cells for ${instruments.length} instruments`
      );
    }
  });
}

/**
 * Build a validated panel, copying the inputs and turning NaN into null.
 */
export function createPanel(
  periods: readonly string[],
  instruments: readonly string[],
  values: readonly (readonly Cell[])[],
  name?: string
): Panel {
  const panel: Panel = {
    periods: [...periods],
    instruments: [...instruments],
    values: values.map((row) => row.map(normalizeCell)),
  };
  assertPanel(panel, name);
  return panel;
}

export function cellAt(panel: Panel, t: number, j: number): Cell {
  return normalizeCell(panel.values[t]?.[j]);
}

export function columnAt(panel: Panel, j: number): Cell[] {
  return panel.values.map((row) => normalizeCell(row[j]));
}

/**
 * Rebuild a panel column by column. `transform` receives one instrument's
 * values in period order and returns a column of the same length.
 */
export function mapColumns(
  panel: Panel,
  transform: (column: readonly Cell[], instrument: string) => readonly Cell[]
): Panel {
  const columns = panel.instruments.map((instrument, j) => {
    const column = transform(columnAt(panel, j), instrument);
    if (column.length !== panel.periods.length) {
      throw new PanelShapeError(
        `Transform returned ${column.length} values for ${panel.periods.length} periods of ${instrument}`
      );
    }
    return column;
  });

  return {
    periods: [...panel.periods],
    instruments: [...panel.instruments],
    values: panel.periods.map((_, t) => columns.map((column) => normalizeCell(column[t]))),
  };
}

/**
 * Apply `fn` to every present cell; missing cells stay missing.
 */
export function mapCells(panel: Panel, fn: (value: number) => number): Panel {
  return {
    periods: [...panel.periods],
    instruments: [...panel.instruments],
    values: panel.values.map((row) =>
      row.map((value) => (isPresent(value) ? normalizeCell(fn(value)) : null))
    ),
  };
}

/** Flip the sign of every present cell (zero stays +0) */
export function negatePanel(panel: Panel): Panel {
  return mapCells(panel, (value) => (value === 0 ? 0 : -value));
}

export function panelsEqual(a: Panel, b: Panel): boolean {
  if (
    a.periods.length !== b.periods.length ||
    a.instruments.length !== b.instruments.length ||
    a.periods.some((period, t) => period !== b.periods[t]) ||
    a.instruments.some((instrument, j) => instrument !== b.instruments[j])
  ) {
    return false;
  }
  return a.periods.every((_, t) =>
    a.instruments.every((_, j) => cellAt(a, t, j) === cellAt(b, t, j))
  );
}
