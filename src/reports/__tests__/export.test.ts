import { describe, it, expect, beforeEach, afterEach } from "vitest";
import ExcelJS from "exceljs";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { StoredValuation } from "../../db/repository.js";
import type { SustainedTrendHit } from "../../screening/screener.js";
import {
  buildWorkbook,
  exportReport,
  exportValuationReport,
  SUSTAINED_TREND_COLUMNS,
  VALUATION_COLUMNS,
} from "../export.js";

function stored(overrides: Partial<StoredValuation> = {}): StoredValuation {
  return {
    code: "005930",
    name: "Alpha",
    date: "2024-06-28",
    fair_value: 1000,
    current_price: 800,
    discrepancy_ratio: -20,
    eps_growth_rate: 10,
    bps_growth_rate: 5,
    roe_growth_rate: 0,
    peg_ratio: null,
    result: "UNDERVALUED",
    base_fair_value: 1000,
    rim_value: 1250,
    per_value: null,
    pegr_value: null,
    perf_adj_factor: 1,
    ...overrides,
  };
}

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "krx-report-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("buildWorkbook", () => {
  it("writes a styled header and one row per record", () => {
    const wb = buildWorkbook("valuation", [stored(), stored({ code: "000660", result: "OVERVALUED" })], VALUATION_COLUMNS);
    const sheet = wb.getWorksheet("valuation");
    expect(sheet?.rowCount).toBe(3);
    expect(sheet?.getRow(1).getCell(1).value).toBe("Code");
    expect(sheet?.getRow(1).getCell(1).font?.bold).toBe(true);
    expect(sheet?.getRow(2).getCell(5).value).toBe(1000);
    expect(sheet?.getRow(2).getCell(5).numFmt).toBe("#,##0.00");
    expect(sheet?.getRow(3).getCell(7).value).toBe("OVERVALUED");
    expect(sheet?.getRow(3).getCell(7).font?.color?.argb).toBe("9C0006");
  });

  it("leaves missing figures blank", () => {
    const wb = buildWorkbook("valuation", [stored()], VALUATION_COLUMNS);
    expect(wb.getWorksheet("valuation")?.getRow(2).getCell(8).value).toBeNull();
  });
});

describe("exportValuationReport", () => {
  it("writes <dir>/valuation_<date>.xlsx", async () => {
    const file = await exportValuationReport([stored()], "2024-06-28", join(dir, "out"));
    expect(file).toBe(join(dir, "out", "valuation_2024-06-28.xlsx"));

    const wb = new ExcelJS.Workbook();
    await wb.xlsx.readFile(join(dir, "out", "valuation_2024-06-28.xlsx"));
    const sheet = wb.getWorksheet("valuation");
    expect(sheet?.getRow(2).getCell(1).value).toBe("005930");
    expect(sheet?.getRow(2).getCell(6).value).toBe(-20);
  });

  it("writes nothing for an empty result set", async () => {
    expect(await exportValuationReport([], "2024-06-28", dir)).toBeNull();
  });
});

describe("exportReport with screen columns", () => {
  it("writes <dir>/golden_cross_<date>.xlsx with one row per hit", async () => {
    const hit: SustainedTrendHit = {
      code: "005930",
      name: "Alpha",
      market: "KOSPI",
      date: "2024-06-25",
      cross_close: 1500,
      latest_close: 1600,
      ma5: 1550,
      ma20: 1480,
    };
    const file = await exportReport("golden_cross", "2024-06-28", [hit], SUSTAINED_TREND_COLUMNS, dir);
    expect(file).toBe(join(dir, "golden_cross_2024-06-28.xlsx"));

    const wb = new ExcelJS.Workbook();
    await wb.xlsx.readFile(join(dir, "golden_cross_2024-06-28.xlsx"));
    const sheet = wb.getWorksheet("golden_cross");
    expect(sheet?.getRow(1).getCell(4).value).toBe("Cross Date");
    expect(sheet?.getRow(2).getCell(4).value).toBe("2024-06-25");
    expect(sheet?.getRow(2).getCell(6).value).toBe(1600);
  });
});
