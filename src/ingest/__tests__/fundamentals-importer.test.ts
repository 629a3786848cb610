import { describe, it, expect, beforeEach } from "vitest";
import type { MarketRepository } from "../../db/repository.js";
import { hasPositiveEarnings, importFundamentals } from "../fundamentals-importer.js";
import { memoryRepo } from "../../__tests__/helpers/market.js";

const DATE = "2024-06-28";

const CSV = [
  "종목코드,PER,EPS,업종PER,ROE(예상),BPS(예상),EPS(예상),실적이슈(전년동기대비),시가총액",
  '005930,12.5,"4,500",15,12.3,"52,000","5,100",상회,"400,000,000"',
  "000660,-3.2,-800,15,5,30000,-,하회,-",
  "999999,10,100,10,10,1000,120,-,1",
  "035720,abc,1,1,1,1,1,-,1",
].join("\n");

let repo: MarketRepository;

beforeEach(() => {
  repo = memoryRepo();
  repo.upsertSecurities([
    { code: "005930", name: "Alpha", market: "KOSPI" },
    { code: "000660", name: "Beta", market: "KOSPI" },
    { code: "035720", name: "Gamma", market: "KOSDAQ" },
  ]);
});

describe("hasPositiveEarnings", () => {
  it("needs a positive PER and non-negative EPS", () => {
    expect(hasPositiveEarnings({ per: 10, eps: 0 })).toBe(true);
    expect(hasPositiveEarnings({ per: 0, eps: 100 })).toBe(false);
    expect(hasPositiveEarnings({ per: 10, eps: -1 })).toBe(false);
    expect(hasPositiveEarnings({ per: null, eps: 100 })).toBe(false);
  });
});

describe("importFundamentals", () => {
  it("stores parsed rows under the as-of date", () => {
    const result = importFundamentals(repo, CSV, { date: DATE, requirePositiveEarnings: true });

    expect(result.total_parsed).toBe(4);
    expect(result.inserted).toBe(1);
    expect(result.skipped).toBe(2);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatch(/^Row 4: per: /);

    const row = repo.getFundamental("005930", DATE);
    expect(row).toMatchObject({
      per: 12.5,
      eps: 4500,
      industry_per: 15,
      roe_pred: 12.3,
      bps_pred: 52000,
      eps_pred: 5100,
      perf_yoy: "상회",
      market_cap: 400000000,
      bps: null,
    });
  });

  it("keeps loss-making rows when the earnings filter is off", () => {
    const result = importFundamentals(repo, CSV, { date: DATE });
    expect(result.inserted).toBe(2);
    expect(result.skipped).toBe(1);

    const row = repo.getFundamental("000660", DATE);
    expect(row?.eps).toBe(-800);
    expect(row?.eps_pred).toBeNull();
    expect(row?.market_cap).toBeNull();
    expect(row?.perf_yoy).toBe("하회");
  });

  it("prefers a date column over the default", () => {
    importFundamentals(repo, "code,date,per,eps\n005930,2024-03-29,10,100", { date: DATE });
    expect(repo.getFundamental("005930", "2024-03-29")?.per).toBe(10);
    expect(repo.getFundamental("005930", DATE)).toBeUndefined();
  });
});
