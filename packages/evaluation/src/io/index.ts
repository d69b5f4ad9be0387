export {
  DEFAULT_DATE_COLUMN,
  type PanelCsvOptions,
  parseCell,
  parsePanelCsv,
  readPanelFile,
} from "./csv.js";
export { normalizePeriod, PERIOD_FORMATS } from "./dates.js";
