import { format, isValid, parse } from "date-fns";

/** Accepted period spellings, tried in order */
export const PERIOD_FORMATS = [
  "yyyy-MM-dd",
  "yyyy.MM.dd",
  "yyyyMMdd",
  "yyyy/MM/dd",
  "yyyy-MM-dd HH:mm:ss",
] as const;

/**
 * Normalize a date label to `yyyy-MM-dd`, or null when no accepted format
 * matches.
 */
export function normalizePeriod(raw: string): string | null {
  const text = raw.trim();
  if (text === "") {
    return null;
  }
  const reference = new Date(2000, 0, 1);
  for (const pattern of PERIOD_FORMATS) {
    const date = parse(text, pattern, reference);
    if (isValid(date)) {
      return format(date, "yyyy-MM-dd");
    }
  }
  return null;
}
