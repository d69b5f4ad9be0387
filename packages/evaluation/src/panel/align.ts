/**
 * Panel Aligner
 *
 * Projects a factor panel and a return panel onto their common periods and
 * common instruments. Instruments are matched on their canonical identifier,
 * the part before a dotted exchange suffix (`000001.SZ` matches `000001`).
 */

import type { Logger } from "@factorlab/logger";
import { AlignmentError } from "../errors.js";
import { log } from "../logger.js";
import { cellAt } from "./panel.js";
import type { AlignedPair, Panel } from "./types.js";

export function canonicalInstrument(id: string): string {
  const trimmed = id.trim();
  const dot = trimmed.indexOf(".");
  return dot > 0 ? trimmed.slice(0, dot) : trimmed;
}

/**
 * Canonical identifier → column index.
 *
 * @throws AlignmentError if two columns share a canonical identifier
 */
function canonicalColumns(panel: Panel, name: string): Map<string, number> {
  const columns = new Map<string, number>();
  panel.instruments.forEach((instrument, j) => {
    const canonical = canonicalInstrument(instrument);
    const existing = columns.get(canonical);
    if (existing !== undefined) {
      throw AlignmentError.ambiguousInstrument(name, canonical, [
        panel.instruments[existing] ?? canonical,
        instrument,
      ]);
    }
    columns.set(canonical, j);
  });
  return columns;
}

function project(
  panel: Panel,
  periods: readonly string[],
  instruments: readonly string[],
  columns: Map<string, number>
): Panel {
  const rowIndex = new Map(panel.periods.map((period, t) => [period, t]));
  return {
    periods: [...periods],
    instruments: [...instruments],
    values: periods.map((period) => {
      const t = rowIndex.get(period) ?? -1;
      return instruments.map((instrument) => cellAt(panel, t, columns.get(instrument) ?? -1));
    }),
  };
}

/**
 * Align a factor panel with a return panel.
 *
 * Both outputs carry the sorted intersection of periods and of canonical
 * instruments. Aligning an already aligned pair returns an equal pair.
 *
 * @throws AlignmentError if either intersection is empty
 */
export function alignPanels(factor: Panel, returns: Panel, logger: Logger = log): AlignedPair {
  const factorColumns = canonicalColumns(factor, "factor");
  const returnColumns = canonicalColumns(returns, "returns");

  const returnPeriods = new Set(returns.periods);
  const periods = factor.periods.filter((period) => returnPeriods.has(period)).sort();
  if (periods.length === 0) {
    throw AlignmentError.noCommonPeriods(factor.periods.length, returns.periods.length);
  }

  const instruments = [...factorColumns.keys()].filter((id) => returnColumns.has(id)).sort();
  if (instruments.length === 0) {
    throw AlignmentError.noCommonInstruments(factorColumns.size, returnColumns.size);
  }

  logger.debug(
    {
      periods: periods.length,
      instruments: instruments.length,
      droppedPeriods: factor.periods.length - periods.length,
      droppedInstruments: factorColumns.size - instruments.length,
    },
    "Aligned factor and return panels"
  );

  return {
    factor: project(factor, periods, instruments, factorColumns),
    returns: project(returns, periods, instruments, returnColumns),
  };
}
