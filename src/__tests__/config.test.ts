import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

const clearEnv = () => {
  const keys = [
    "REST_PORT",
    "REST_API_KEY",
    "STOCK_COUNT",
    "PRICE_FETCH_START_DATE",
    "REQUIRE_POSITIVE_EARNINGS",
    "VALUATION_WEIGHT_RIM",
    "VALUATION_HAIRCUT",
    "VALUATION_LOW_THRESHOLD",
    "SCHEDULER_ENABLED",
    "SCHEDULE_TIME",
  ];
  for (const key of keys) {
    delete process.env[key];
  }
};

const loadConfig = async () => {
  const module = await import("../config.js");
  return module.config;
};

describe("config", () => {
  beforeEach(() => {
    vi.resetModules();
    vi.unstubAllEnvs();
    clearEnv();
  });

  afterEach(() => {
    vi.resetModules();
    vi.unstubAllEnvs();
    clearEnv();
  });

  it("uses the documented valuation defaults", async () => {
    const cfg = await loadConfig();
    expect(cfg.valuation.requiredRoe).toBe(8);
    expect(cfg.valuation.weights).toEqual({ rim: 0.6, industryPer: 0.2, pegr: 0.2 });
    expect(cfg.valuation.haircut).toBe(0.8);
    expect(cfg.valuation.lowThreshold).toBe(-10);
    expect(cfg.valuation.highThreshold).toBe(10);
    expect(cfg.rest.port).toBe(3000);
  });

  it("leaves the security cap and start date unset by default", async () => {
    const cfg = await loadConfig();
    expect(cfg.ingest.limit).toBeNull();
    expect(cfg.ingest.priceStartDate).toBeNull();
    expect(cfg.ingest.requirePositiveEarnings).toBe(true);
  });

  it("reads STOCK_COUNT and PRICE_FETCH_START_DATE", async () => {
    vi.stubEnv("STOCK_COUNT", "25");
    vi.stubEnv("PRICE_FETCH_START_DATE", "2023-01-02");
    const cfg = await loadConfig();
    expect(cfg.ingest.limit).toBe(25);
    expect(cfg.ingest.priceStartDate).toBe("2023-01-02");
  });

  it("overrides valuation settings from the environment", async () => {
    vi.stubEnv("VALUATION_WEIGHT_RIM", "0.5");
    vi.stubEnv("VALUATION_HAIRCUT", "0.9");
    vi.stubEnv("VALUATION_LOW_THRESHOLD", "-15");
    const cfg = await loadConfig();
    expect(cfg.valuation.weights.rim).toBe(0.5);
    expect(cfg.valuation.haircut).toBe(0.9);
    expect(cfg.valuation.lowThreshold).toBe(-15);
  });

  it("treats blank values as unset", async () => {
    vi.stubEnv("REST_PORT", "  ");
    const cfg = await loadConfig();
    expect(cfg.rest.port).toBe(3000);
  });

  it("only disables the earnings filter on an explicit false", async () => {
    vi.stubEnv("REQUIRE_POSITIVE_EARNINGS", "false");
    const cfg = await loadConfig();
    expect(cfg.ingest.requirePositiveEarnings).toBe(false);
  });

  it("arms the scheduler only when enabled", async () => {
    let cfg = await loadConfig();
    expect(cfg.scheduler.enabled).toBe(false);
    expect(cfg.scheduler.runAt).toBe("18:00");

    vi.resetModules();
    vi.stubEnv("SCHEDULER_ENABLED", "true");
    vi.stubEnv("SCHEDULE_TIME", "16:30");
    cfg = await loadConfig();
    expect(cfg.scheduler.enabled).toBe(true);
    expect(cfg.scheduler.runAt).toBe("16:30");
  });
});
