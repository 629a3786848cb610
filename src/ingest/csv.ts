import { parse } from "csv-parse/sync";

export interface ImportResult {
  total_parsed: number;
  inserted: number;
  skipped: number;
  errors: string[];
}

/** Header keys are compared lowercased with all whitespace removed. */
export function normalizeHeader(h: string): string {
  return h.toLowerCase().replace(/\s+/g, "");
}

/**
 * Parse a CSV with a header row into records keyed by our column names.
 * Columns not in `columnMap` are dropped. Throws on malformed CSV.
 */
export function parseMappedCsv(content: string, columnMap: Readonly<Record<string, string>>): Array<Record<string, string>> {
  const records: Array<Record<string, string>> = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
    bom: true,
  });
  if (records.length === 0) return [];

  // Build header mapping from the first record's keys
  const headerMap = new Map<string, string>();
  for (const col of Object.keys(records[0])) {
    const key = normalizeHeader(col);
    if (Object.hasOwn(columnMap, key)) headerMap.set(col, columnMap[key]);
  }

  return records.map((raw) => {
    const mapped: Record<string, string> = {};
    for (const [col, value] of Object.entries(raw)) {
      const target = headerMap.get(col);
      if (target && !(target in mapped)) mapped[target] = value;
    }
    return mapped;
  });
}
