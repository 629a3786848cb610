import ExcelJS from "exceljs";
import fs from "fs";
import path from "path";
import type { StoredValuation } from "../db/repository.js";
import { logPipeline } from "../logging.js";
import type { CoincidenceHit, SustainedTrendHit } from "../screening/screener.js";
import type { ValuationClass } from "../valuation/types.js";

export interface ReportColumn<T> {
  header: string;
  key: keyof T & string;
  width?: number;
  /** Excel number format, e.g. "#,##0" */
  numFmt?: string;
}

const HEADER_BG = "1A1F36";
const HEADER_FONT = "FFFFFF";

const RESULT_STYLE: Record<ValuationClass, { bg: string; font: string }> = {
  UNDERVALUED: { bg: "C6EFCE", font: "006100" },
  FAIR: { bg: "FFEB9C", font: "9C6500" },
  OVERVALUED: { bg: "FFC7CE", font: "9C0006" },
};

export const VALUATION_COLUMNS: ReadonlyArray<ReportColumn<StoredValuation>> = [
  { header: "Code", key: "code", width: 10 },
  { header: "Name", key: "name", width: 20 },
  { header: "Date", key: "date", width: 12 },
  { header: "Current Price", key: "current_price", width: 14, numFmt: "#,##0" },
  { header: "Fair Value", key: "fair_value", width: 14, numFmt: "#,##0.00" },
  { header: "Discrepancy %", key: "discrepancy_ratio", width: 14, numFmt: "0.00" },
  { header: "Result", key: "result", width: 14 },
  { header: "PEG", key: "peg_ratio", width: 8, numFmt: "0.00" },
  { header: "EPS Growth %", key: "eps_growth_rate", width: 13, numFmt: "0.00" },
  { header: "BPS Growth %", key: "bps_growth_rate", width: 13, numFmt: "0.00" },
  { header: "ROE Growth %", key: "roe_growth_rate", width: 13, numFmt: "0.00" },
  { header: "RIM", key: "rim_value", width: 12, numFmt: "#,##0.00" },
  { header: "Industry PER", key: "per_value", width: 13, numFmt: "#,##0.00" },
  { header: "PEGR", key: "pegr_value", width: 12, numFmt: "#,##0.00" },
  { header: "Base Fair Value", key: "base_fair_value", width: 15, numFmt: "#,##0.00" },
  { header: "Perf. Factor", key: "perf_adj_factor", width: 11, numFmt: "0.00" },
];

export const COINCIDENCE_COLUMNS: ReadonlyArray<ReportColumn<CoincidenceHit>> = [
  { header: "Code", key: "code", width: 10 },
  { header: "Name", key: "name", width: 20 },
  { header: "Market", key: "market", width: 10 },
  { header: "Signal Date", key: "date", width: 12 },
  { header: "Close", key: "close", width: 12, numFmt: "#,##0" },
  { header: "MACD", key: "macd", width: 10, numFmt: "0.00" },
  { header: "MACD Hist", key: "macd_hist", width: 10, numFmt: "0.00" },
  { header: "RSI", key: "rsi", width: 8, numFmt: "0.00" },
];

export const SUSTAINED_TREND_COLUMNS: ReadonlyArray<ReportColumn<SustainedTrendHit>> = [
  { header: "Code", key: "code", width: 10 },
  { header: "Name", key: "name", width: 20 },
  { header: "Market", key: "market", width: 10 },
  { header: "Cross Date", key: "date", width: 12 },
  { header: "Cross Close", key: "cross_close", width: 12, numFmt: "#,##0" },
  { header: "Latest Close", key: "latest_close", width: 12, numFmt: "#,##0" },
  { header: "MA5", key: "ma5", width: 10, numFmt: "#,##0.00" },
  { header: "MA20", key: "ma20", width: 10, numFmt: "#,##0.00" },
];

function styleHeaderRow(row: ExcelJS.Row) {
  row.height = 20;
  row.eachCell((cell) => {
    cell.fill = { type: "pattern", pattern: "solid", fgColor: { argb: HEADER_BG } };
    cell.font = { bold: true, color: { argb: HEADER_FONT }, size: 11 };
    cell.alignment = { horizontal: "center", vertical: "middle" };
  });
}

function isValuationClass(v: unknown): v is ValuationClass {
  return v === "UNDERVALUED" || v === "FAIR" || v === "OVERVALUED";
}

/** One sheet, one row per record, header frozen and filterable. */
export function buildWorkbook<T extends object>(
  sheetName: string,
  rows: readonly T[],
  columns: ReadonlyArray<ReportColumn<T>>,
): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();
  const sheet = workbook.addWorksheet(sheetName);

  sheet.columns = columns.map((c) => ({ header: c.header, key: c.key, width: c.width ?? 12 }));
  styleHeaderRow(sheet.getRow(1));

  for (const record of rows) {
    const row = sheet.addRow(columns.map((c) => record[c.key] ?? null));
    columns.forEach((c, i) => {
      const cell = row.getCell(i + 1);
      if (c.numFmt) cell.numFmt = c.numFmt;
      if (isValuationClass(cell.value)) {
        const style = RESULT_STYLE[cell.value];
        cell.fill = { type: "pattern", pattern: "solid", fgColor: { argb: style.bg } };
        cell.font = { color: { argb: style.font } };
      }
    });
  }

  sheet.views = [{ state: "frozen", ySplit: 1 }];
  if (columns.length > 0) {
    sheet.autoFilter = { from: { row: 1, column: 1 }, to: { row: 1, column: columns.length } };
  }
  return workbook;
}

/**
 * Write `<dir>/<name>_<date>.xlsx`. Returns the path, or null when there is
 * nothing to write.
 */
export async function exportReport<T extends object>(
  name: string,
  date: string,
  rows: readonly T[],
  columns: ReadonlyArray<ReportColumn<T>>,
  dir: string,
): Promise<string | null> {
  if (rows.length === 0) {
    logPipeline.info({ report: name, date }, "No rows to export");
    return null;
  }
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });

  const filePath = path.join(dir, `${name}_${date}.xlsx`);
  await buildWorkbook(name, rows, columns).xlsx.writeFile(filePath);
  logPipeline.info({ file: filePath, rows: rows.length }, `Report written: ${filePath}`);
  return filePath;
}

export function exportValuationReport(rows: readonly StoredValuation[], date: string, dir: string): Promise<string | null> {
  return exportReport("valuation", date, rows, VALUATION_COLUMNS, dir);
}
