/**
 * Delimited-text panel reader.
 *
 * Wide layout: one row per period, one column per instrument, plus a date
 * column. Files written with a positional index carry an unnamed leading
 * column, which is dropped.
 */

import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";
import { gunzipSync } from "node:zlib";
import Papa from "papaparse";
import { PanelShapeError } from "../errors.js";
import { log } from "../logger.js";
import { createPanel } from "../panel/panel.js";
import type { Cell, Panel } from "../panel/types.js";
import { normalizePeriod } from "./dates.js";
import { extractFirstCsv, isZip } from "./zip.js";

export const DEFAULT_DATE_COLUMN = "day_date";

const INDEX_COLUMN_NAMES = new Set(["", "Unnamed: 0"]);
const UNSUPPORTED_COMPRESSION = new Set([".xz", ".bz2"]);

export interface PanelCsvOptions {
  /** Column holding the period; the first column when not found */
  dateColumn?: string;
  /** Auto-detected when omitted */
  delimiter?: string;
  /** Label used in error messages */
  name?: string;
}

export function parseCell(raw: string | undefined): Cell {
  const text = raw?.trim() ?? "";
  if (text === "") {
    return null;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse delimited text into a panel, rows sorted by period.
 *
 * @throws PanelShapeError on a missing header, a ragged row, an
 * unparseable date or a repeated period or instrument
 */
export function parsePanelCsv(text: string, options: PanelCsvOptions = {}): Panel {
  const name = options.name ?? "panel";
  const dateColumn = options.dateColumn ?? DEFAULT_DATE_COLUMN;

  const parsed = Papa.parse<string[]>(text.replace(/^\uFEFF/, ""), {
    header: false,
    skipEmptyLines: "greedy",
    delimiter: options.delimiter ?? "",
  });

  const [header, ...rows] = parsed.data;
  if (!header || header.length < 2) {
    throw new PanelShapeError(`${name}: expected a header with a date column and instruments`);
  }

  const columnNames = header.map((column) => column.trim());
  const namedDate = columnNames.indexOf(dateColumn);
  const dateIndex = namedDate >= 0 ? namedDate : 0;

  const instrumentColumns: number[] = [];
  columnNames.forEach((column, index) => {
    if (index !== dateIndex && !INDEX_COLUMN_NAMES.has(column)) {
      instrumentColumns.push(index);
    }
  });

  const entries = rows.map((row, i) => {
    const line = i + 2;
    if (row.length !== header.length) {
      throw new PanelShapeError(
        `${name}: line ${line} has ${row.length} fields, header has ${header.length}`
      );
    }
    const rawPeriod = row[dateIndex] ?? "";
    const period = normalizePeriod(rawPeriod);
    if (period === null) {
      throw new PanelShapeError(`${name}: cannot parse period "${rawPeriod}" on line ${line}`);
    }
    return { period, cells: instrumentColumns.map((index) => parseCell(row[index])) };
  });

  entries.sort((a, b) => (a.period < b.period ? -1 : a.period > b.period ? 1 : 0));

  return createPanel(
    entries.map((entry) => entry.period),
    instrumentColumns.map((index) => columnNames[index] ?? ""),
    entries.map((entry) => entry.cells),
    name
  );
}

function isGzip(path: string, content: Buffer): boolean {
  return extname(path).toLowerCase() === ".gz" || (content[0] === 0x1f && content[1] === 0x8b);
}

function decompress(path: string, raw: Buffer): Buffer {
  if (extname(path).toLowerCase() === ".zip" || isZip(raw)) {
    const entry = extractFirstCsv(raw, basename(path));
    log.info({ path, entry: entry.name }, "Reading zip archive entry");
    return entry.content;
  }
  return isGzip(path, raw) ? gunzipSync(raw) : raw;
}

/**
 * Read a panel from a plain, gzip-compressed or zipped delimited file. A
 * zip archive contributes its first `.csv` entry.
 */
export async function readPanelFile(path: string, options: PanelCsvOptions = {}): Promise<Panel> {
  const extension = extname(path).toLowerCase();
  if (UNSUPPORTED_COMPRESSION.has(extension)) {
    throw new PanelShapeError(`${path}: ${extension} compression is not supported, use gzip`);
  }

  const raw = await readFile(path);
  const content = decompress(path, raw);
  const panel = parsePanelCsv(content.toString("utf8"), { name: basename(path), ...options });

  log.info(
    { path, periods: panel.periods.length, instruments: panel.instruments.length },
    "Loaded panel"
  );
  return panel;
}
