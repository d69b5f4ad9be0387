export { alignPanels, canonicalInstrument } from "./align.js";
export {
  assertPanel,
  cellAt,
  columnAt,
  createPanel,
  isPresent,
  mapCells,
  mapColumns,
  negatePanel,
  panelsEqual,
} from "./panel.js";
export { fromLongRecords, type ToLongOptions, toLongRecords } from "./reshape.js";
export type { AlignedPair, Cell, LongRecord, Panel, TimeSeries, TimeSeriesPoint } from "./types.js";
