import { describe, it, expect, beforeEach } from "vitest";
import type { MarketRepository } from "../repository.js";
import { makeBars, makeResult, makeState, memoryRepo } from "../../__tests__/helpers/market.js";

let repo: MarketRepository;

beforeEach(() => {
  repo = memoryRepo();
  repo.upsertSecurities([
    { code: "005930", name: "Alpha Electronics", market: "KOSPI" },
    { code: "000660", name: "Beta Semicon", market: "KOSPI" },
    { code: "035720", name: "Gamma Platform", market: "KOSDAQ" },
  ]);
});

describe("securities", () => {
  it("lists by code with market filter and limit", () => {
    expect(repo.listSecurities().map((s) => s.code)).toEqual(["000660", "005930", "035720"]);
    expect(repo.listSecurities({ market: "KOSDAQ" }).map((s) => s.code)).toEqual(["035720"]);
    expect(repo.listSecurities({ limit: 2 }).map((s) => s.code)).toEqual(["000660", "005930"]);
  });

  it("updates name and market on re-upsert", () => {
    repo.upsertSecurity({ code: "035720", name: "Gamma Holdings", market: "KOSPI" });
    expect(repo.getSecurity("035720")).toEqual({ code: "035720", name: "Gamma Holdings", market: "KOSPI" });
  });

  it("syncs to a listing, deleting unlisted securities with their data", () => {
    repo.upsertPriceBars(makeBars("000660", [100, 101]));

    const result = repo.syncListings([
      { code: "005930", name: "Alpha Electronics", market: "KOSPI" },
      { code: "035720", name: "Gamma Platform", market: "KOSDAQ" },
      { code: "251270", name: "Delta Games", market: "KOSPI" },
    ]);

    expect(result).toEqual({ upserted: 3, deleted: 1 });
    expect(repo.getSecurity("000660")).toBeUndefined();
    expect(repo.getPriceSeries("000660")).toEqual([]);
    expect(repo.listSecurities().map((s) => s.code)).toEqual(["005930", "035720", "251270"]);
  });

  it("keeps codes listed without a usable row untouched", () => {
    repo.upsertPriceBars(makeBars("000660", [100, 101]));

    const result = repo.syncListings([{ code: "005930", name: "Alpha Electronics", market: "KOSPI" }], ["000660"]);

    expect(result).toEqual({ upserted: 1, deleted: 1 });
    expect(repo.getSecurity("000660")).toEqual({ code: "000660", name: "Beta Semicon", market: "KOSPI" });
    expect(repo.getPriceSeries("000660")).toHaveLength(2);
    expect(repo.getSecurity("035720")).toBeUndefined();
  });

  it("ignores an empty listing", () => {
    expect(repo.syncListings([])).toEqual({ upserted: 0, deleted: 0 });
    expect(repo.listSecurities()).toHaveLength(3);
  });

  it("reports whether a delete removed anything", () => {
    expect(repo.deleteSecurity("005930")).toBe(true);
    expect(repo.deleteSecurity("005930")).toBe(false);
  });
});

describe("price bars", () => {
  it("upserts idempotently and returns the series ascending", () => {
    repo.upsertPriceBars(makeBars("005930", [100, 101, 102]));
    repo.upsertPriceBars(makeBars("005930", [100, 105], "2024-01-02"));

    const series = repo.getPriceSeries("005930");
    expect(series.map((b) => [b.date, b.close])).toEqual([
      ["2024-01-01", 100],
      ["2024-01-02", 100],
      ["2024-01-03", 105],
    ]);
    expect(repo.getPriceSeries("005930", "2024-01-02")).toHaveLength(2);
  });

  it("tracks the latest date per security and across the market", () => {
    repo.upsertPriceBars(makeBars("005930", [100, 101, 102]));
    repo.upsertPriceBars(makeBars("000660", [50], "2024-02-01"));
    expect(repo.getLatestTradeDate("005930")).toBe("2024-01-03");
    expect(repo.getLatestTradeDate("035720")).toBeNull();
    expect(repo.getLatestMarketDate()).toBe("2024-02-01");
  });

  it("refuses bars for an unknown security", () => {
    expect(() => repo.upsertPriceBars(makeBars("999999", [10]))).toThrow();
  });
});

describe("fundamentals", () => {
  it("stores non-finite figures as null", () => {
    repo.upsertFundamental({ code: "005930", date: "2024-01-03", per: Number.NaN, eps: 120, perf_yoy: "상회" });
    const row = repo.getFundamental("005930", "2024-01-03");
    expect(row?.per).toBeNull();
    expect(row?.eps).toBe(120);
    expect(row?.perf_yoy).toBe("상회");
    expect(row?.roe_pred).toBeNull();
  });

  it("keeps risk fields when the snapshot is re-imported", () => {
    repo.upsertFundamental({ code: "005930", date: "2024-01-03", eps: 120 });
    expect(
      repo.updateRiskFields("005930", "2024-01-03", { max_drawdown: -12.5, avg_drawdown: -4, max_daily_fall_rate: -3 }),
    ).toBe(true);
    repo.upsertFundamental({ code: "005930", date: "2024-01-03", eps: 130 });

    const row = repo.getFundamental("005930", "2024-01-03");
    expect(row?.eps).toBe(130);
    expect(row?.max_drawdown).toBe(-12.5);
    expect(row?.max_daily_fall_rate).toBe(-3);
  });

  it("reports a risk update without a snapshot", () => {
    expect(repo.updateRiskFields("005930", "2024-01-03", { max_drawdown: -1, avg_drawdown: -1, max_daily_fall_rate: 0 })).toBe(
      false,
    );
  });

  it("lists codes on a date and finds the latest date", () => {
    repo.upsertFundamentals([
      { code: "005930", date: "2024-01-03" },
      { code: "000660", date: "2024-01-03" },
      { code: "005930", date: "2024-01-10" },
    ]);
    expect(repo.listFundamentalCodes("2024-01-03")).toEqual(["000660", "005930"]);
    expect(repo.getLatestFundamentalDate()).toBe("2024-01-10");
  });

  it("joins each snapshot with the latest close on or before its date", () => {
    repo.upsertPriceBars(makeBars("005930", [100, 101, 102, 103, 104]));
    repo.upsertFundamentals([
      { code: "005930", date: "2024-01-03", eps: 100, eps_pred: 120, roe_pred: 10, bps_pred: 10000, industry_per: 15 },
      { code: "000660", date: "2024-01-03", eps: 50 },
      { code: "035720", date: "2024-01-04", eps: 10 },
    ]);

    const inputs = repo.getValuationInputs("2024-01-03");
    expect(inputs.map((i) => i.code)).toEqual(["000660", "005930"]);
    expect(inputs[0].currentPrice).toBeNull();
    expect(inputs[1]).toEqual({
      code: "005930",
      name: "Alpha Electronics",
      currentPrice: 102,
      eps: 100,
      epsPred: 120,
      bps: null,
      bpsPred: 10000,
      roe: null,
      roePred: 10,
      per: null,
      industryPer: 15,
      perfYoy: null,
      perfVs3mAgo: null,
      perfVsConsensus: null,
    });
  });
});

describe("indicator states", () => {
  it("replaces a security's history and returns the latest rows oldest first", () => {
    repo.replaceIndicatorStates("005930", [
      makeState("005930", "2024-01-01", { rsi: 40 }),
      makeState("005930", "2024-01-02", { rsi: 45 }),
    ]);
    repo.replaceIndicatorStates("005930", [
      makeState("005930", "2024-01-02", { rsi: 50 }),
      makeState("005930", "2024-01-03", { rsi: 55, macd_cross: "GOLDEN" }),
      makeState("005930", "2024-01-04", { rsi: 60, macd: Number.NaN }),
    ]);

    const states = repo.getIndicatorStates("005930", 2);
    expect(states.map((s) => [s.date, s.rsi])).toEqual([
      ["2024-01-03", 55],
      ["2024-01-04", 60],
    ]);
    expect(states[0].macd_cross).toBe("GOLDEN");
    expect(states[1].macd).toBeNull();
    expect(repo.getIndicatorStates("005930")).toHaveLength(3);
  });
});

describe("valuations", () => {
  it("returns nothing before any valuation is stored", () => {
    expect(repo.getLatestValuationDate()).toBeNull();
    expect(repo.getValuations()).toEqual([]);
  });

  it("defaults to the latest date, orders by discrepancy and filters by result", () => {
    repo.upsertValuations([
      makeResult({ code: "005930", date: "2024-01-03", discrepancy_ratio: 15, result: "OVERVALUED" }),
      makeResult({ code: "000660", date: "2024-01-03", discrepancy_ratio: -25, result: "UNDERVALUED" }),
      makeResult({ code: "035720", date: "2024-01-03", discrepancy_ratio: 2, result: "FAIR" }),
      makeResult({ code: "005930", date: "2023-12-29", discrepancy_ratio: -40 }),
    ]);

    const latest = repo.getValuations();
    expect(latest.map((v) => v.code)).toEqual(["000660", "035720", "005930"]);
    expect(latest[0].name).toBe("Beta Semicon");
    expect(repo.getValuations({ result: "OVERVALUED" }).map((v) => v.code)).toEqual(["005930"]);
    expect(repo.getValuations({ date: "2023-12-29" }).map((v) => v.discrepancy_ratio)).toEqual([-40]);
  });

  it("overwrites a same-day valuation", () => {
    repo.upsertValuations([makeResult({ fair_value: 1000 })]);
    repo.upsertValuations([makeResult({ fair_value: 1200 })]);
    const rows = repo.getValuations();
    expect(rows).toHaveLength(1);
    expect(rows[0].fair_value).toBe(1200);
  });
});
