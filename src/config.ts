import dotenv from "dotenv";

dotenv.config();

function num(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  return parseFloat(raw);
}

function int(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  return parseInt(raw, 10);
}

function optionalInt(name: string): number | null {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return null;
  return parseInt(raw, 10);
}

// Everything the pipeline reads from the environment lives here. The core engines
// take plain config structs (see valuation/types.ts) and never touch process.env.
export const config = {
  db: {
    path: process.env.DB_PATH ?? "data/krx.db",
  },
  rest: {
    port: int("REST_PORT", 3000),
    apiKey: process.env.REST_API_KEY ?? "",
  },
  ingest: {
    /** STOCK_COUNT caps how many securities one run touches */
    limit: optionalInt("STOCK_COUNT"),
    /** First date fetched for a security with no stored bars; null = one year back */
    priceStartDate: process.env.PRICE_FETCH_START_DATE || null,
    listingCsvPath: process.env.LISTING_CSV_PATH ?? "",
    fundamentalsCsvPath: process.env.FUNDAMENTALS_CSV_PATH ?? "",
    requirePositiveEarnings: (process.env.REQUIRE_POSITIVE_EARNINGS ?? "true") !== "false",
  },
  indicators: {
    minHistory: int("INDICATOR_MIN_HISTORY", 120),
  },
  risk: {
    windowDays: int("RISK_WINDOW_DAYS", 365),
  },
  valuation: {
    requiredRoe: num("VALUATION_REQUIRED_ROE", 8.0),
    weights: {
      rim: num("VALUATION_WEIGHT_RIM", 0.6),
      industryPer: num("VALUATION_WEIGHT_PER", 0.2),
      pegr: num("VALUATION_WEIGHT_PEGR", 0.2),
    },
    haircut: num("VALUATION_HAIRCUT", 0.8),
    pegrMinGrowth: num("VALUATION_PEGR_MIN_GROWTH", 5),
    pegrMaxGrowth: num("VALUATION_PEGR_MAX_GROWTH", 50),
    lowThreshold: num("VALUATION_LOW_THRESHOLD", -10),
    highThreshold: num("VALUATION_HIGH_THRESHOLD", 10),
  },
  screening: {
    lookbackDays: int("SCREEN_LOOKBACK_DAYS", 5),
  },
  reports: {
    dir: process.env.REPORT_DIR ?? "reports",
  },
  scheduler: {
    enabled: (process.env.SCHEDULER_ENABLED ?? "false") === "true",
    /** Asia/Seoul wall-clock time, HH:MM */
    runAt: process.env.SCHEDULE_TIME ?? "18:00",
  },
};

export type AppConfig = typeof config;
