/**
 * Listing CSV Importer
 *
 * Loads a KRX listing export (KOSPI/KOSDAQ) and synchronizes the securities
 * registry with it. Header names are auto-detected in English or Korean.
 */

import fs from "fs";
import type { MarketRepository, SecurityRow } from "../db/repository.js";
import { logIngest } from "../logging.js";
import { errorMessage } from "../shared/errors.js";
import { type ImportResult, parseMappedCsv } from "./csv.js";
import { formatIssues, listingRowSchema, securityCodeSchema } from "./validation.js";

export interface ListingImportResult extends ImportResult {
  deleted: number;
}

const COLUMN_MAP: Record<string, string> = {
  code: "code",
  symbol: "code",
  ticker: "code",
  종목코드: "code",
  단축코드: "code",
  name: "name",
  종목명: "name",
  회사명: "name",
  한글종목약명: "name",
  market: "market",
  시장: "market",
  시장구분: "market",
};

export interface ParsedListing {
  rows: SecurityRow[];
  /** Every valid code the listing names, including rows rejected for other fields */
  listedCodes: Set<string>;
  total: number;
  errors: string[];
}

/** Parse and validate listing rows; invalid rows become errors. */
export function parseListing(csvContent: string): ParsedListing {
  const records = parseMappedCsv(csvContent, COLUMN_MAP);
  const rows: SecurityRow[] = [];
  const listedCodes = new Set<string>();
  const errors: string[] = [];
  const seen = new Set<string>();

  records.forEach((record, i) => {
    const code = securityCodeSchema.safeParse(record.code);
    if (code.success) listedCodes.add(code.data);

    const parsed = listingRowSchema.safeParse(record);
    if (!parsed.success) {
      errors.push(`Row ${i + 1}: ${formatIssues(parsed.error)}`);
      return;
    }
    if (seen.has(parsed.data.code)) {
      errors.push(`Row ${i + 1}: duplicate code ${parsed.data.code}`);
      return;
    }
    seen.add(parsed.data.code);
    rows.push(parsed.data);
  });

  return { rows, listedCodes, total: records.length, errors };
}

/**
 * Synchronize the registry from listing CSV text. Securities missing from a
 * non-empty listing are deleted along with their history; a code whose row was
 * rejected still counts as listed.
 */
export function importListings(repo: MarketRepository, csvContent: string): ListingImportResult {
  let parsed: ParsedListing;
  try {
    parsed = parseListing(csvContent);
  } catch (e) {
    return { total_parsed: 0, inserted: 0, skipped: 0, deleted: 0, errors: [`CSV parse error: ${errorMessage(e)}`] };
  }

  const { upserted, deleted } = repo.syncListings(parsed.rows, parsed.listedCodes);
  const skipped = parsed.total - parsed.rows.length;

  logIngest.info(
    { total: parsed.total, upserted, deleted, skipped },
    `Listing sync: ${upserted} upserted, ${deleted} delisted, ${skipped} rejected`,
  );
  return { total_parsed: parsed.total, inserted: upserted, skipped, deleted, errors: parsed.errors };
}

export function importListingsFromFile(repo: MarketRepository, filePath: string): ListingImportResult {
  return importListings(repo, fs.readFileSync(filePath, "utf-8"));
}
