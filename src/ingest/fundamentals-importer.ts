/**
 * Fundamentals CSV Importer
 *
 * One row per security per as-of date: valuation multiples, trailing and
 * forward per-share figures and the three qualitative performance-surprise
 * labels. Column names are matched in English or Korean.
 */

import fs from "fs";
import type { FundamentalUpsert, MarketRepository } from "../db/repository.js";
import { logIngest } from "../logging.js";
import { errorMessage } from "../shared/errors.js";
import { type ImportResult, parseMappedCsv } from "./csv.js";
import { formatIssues, fundamentalRowSchema, type ValidFundamentalRow } from "./validation.js";

export interface FundamentalsImportOptions {
  /** As-of date used when the CSV has no date column */
  date: string;
  /** Keep only rows with PER > 0 and EPS >= 0 */
  requirePositiveEarnings?: boolean;
}

const COLUMN_MAP: Record<string, string> = {
  code: "code",
  symbol: "code",
  종목코드: "code",
  date: "date",
  일자: "date",
  기준일자: "date",
  market_cap: "market_cap",
  marcap: "market_cap",
  시가총액: "market_cap",
  shares_outstanding: "shares_outstanding",
  stocks: "shares_outstanding",
  발행주식수: "shares_outstanding",
  pbr: "pbr",
  per: "per",
  industry_per: "industry_per",
  indust_per: "industry_per",
  업종per: "industry_per",
  eps: "eps",
  roe: "roe",
  dividend_yield: "dividend_yield",
  div_yield: "dividend_yield",
  "배당수익률(%)": "dividend_yield",
  배당수익률: "dividend_yield",
  bps: "bps",
  주당순자산가치: "bps",
  per_pred: "per_pred",
  "per(예상)": "per_pred",
  pbr_pred: "pbr_pred",
  "pbr(예상)": "pbr_pred",
  eps_pred: "eps_pred",
  "eps(예상)": "eps_pred",
  roe_pred: "roe_pred",
  "roe(예상)": "roe_pred",
  bps_pred: "bps_pred",
  "bps(예상)": "bps_pred",
  perf_yoy: "perf_yoy",
  "실적이슈(전년동기대비)": "perf_yoy",
  전년동기대비: "perf_yoy",
  perf_vs_3m_ago: "perf_vs_3m_ago",
  "실적이슈(3개월전대비)": "perf_vs_3m_ago",
  "3개월전대비": "perf_vs_3m_ago",
  perf_vs_consensus: "perf_vs_consensus",
  "실적이슈(예상실적대비)": "perf_vs_consensus",
  예상실적대비: "perf_vs_consensus",
};

/** Admission filter: profitable on a trailing basis. */
export function hasPositiveEarnings(row: Pick<ValidFundamentalRow, "per" | "eps">): boolean {
  return row.per !== null && row.per > 0 && row.eps !== null && row.eps >= 0;
}

export function importFundamentals(
  repo: MarketRepository,
  csvContent: string,
  opts: FundamentalsImportOptions,
): ImportResult {
  const errors: string[] = [];

  let records: Array<Record<string, string>>;
  try {
    records = parseMappedCsv(csvContent, COLUMN_MAP);
  } catch (e) {
    return { total_parsed: 0, inserted: 0, skipped: 0, errors: [`CSV parse error: ${errorMessage(e)}`] };
  }

  const rows: FundamentalUpsert[] = [];
  let skipped = 0;

  records.forEach((record, i) => {
    const parsed = fundamentalRowSchema.safeParse({ ...record, date: record.date || opts.date });
    if (!parsed.success) {
      errors.push(`Row ${i + 1}: ${formatIssues(parsed.error)}`);
      return;
    }
    const row = parsed.data;
    if (!repo.getSecurity(row.code)) {
      skipped++;
      return;
    }
    if (opts.requirePositiveEarnings && !hasPositiveEarnings(row)) {
      skipped++;
      return;
    }
    rows.push(row);
  });

  const inserted = rows.length > 0 ? repo.upsertFundamentals(rows) : 0;

  logIngest.info(
    { total: records.length, inserted, skipped, errors: errors.length },
    `Fundamentals import: ${inserted} of ${records.length} rows stored`,
  );
  return { total_parsed: records.length, inserted, skipped, errors };
}

export function importFundamentalsFromFile(
  repo: MarketRepository,
  filePath: string,
  opts: FundamentalsImportOptions,
): ImportResult {
  return importFundamentals(repo, fs.readFileSync(filePath, "utf-8"), opts);
}
