/**
 * Screening Queries
 *
 * Compound signal searches over the persisted indicator, price and valuation
 * rows. A window of N days is the N most recent distinct trade dates present in
 * the indicator table, so weekends and holidays never shrink it.
 *
 * Signal hits are ordered by signal date descending, then name, then code.
 */
import type { Statement } from "better-sqlite3";
import type { MarketRepository, StoredValuation } from "../db/repository.js";
import { logScreening } from "../logging.js";
import { computeRiskMetrics, type RiskMetrics } from "../risk/drawdown.js";
import { addDays } from "../shared/dates.js";
import { CoreError } from "../shared/errors.js";
import type { ValuationClass } from "../valuation/types.js";

export const SUSTAINED_CROSSES = ["macd", "ma_5_20"] as const;
export type SustainedCross = (typeof SUSTAINED_CROSSES)[number];

export const TREND_INDICATORS = ["close", "ma5", "ma20", "ma60", "ma120", "macd", "macd_hist", "rsi"] as const;
export type TrendIndicator = (typeof TREND_INDICATORS)[number];

export interface CoincidenceHit {
  code: string;
  name: string;
  market: string;
  date: string;
  close: number | null;
  macd: number | null;
  macd_hist: number | null;
  rsi: number | null;
}

export interface SustainedTrendHit {
  code: string;
  name: string;
  market: string;
  /** Date of the most recent golden cross in the window */
  date: string;
  cross_close: number;
  latest_close: number;
  ma5: number;
  ma20: number;
}

export interface TrendContinuationHit {
  code: string;
  name: string;
  market: string;
  date: string;
  latest_value: number;
  previous_date: string;
  previous_value: number;
}

const CROSS_COLUMN: Record<SustainedCross, string> = {
  macd: "macd_cross",
  ma_5_20: "cross_5_20",
};

const WINDOW_DATES_CTE = `
  window_dates AS (SELECT DISTINCT date FROM indicator_states ORDER BY date DESC LIMIT ?)
`;

function sustainedTrendSql(crossColumn: string): string {
  return `
    WITH ${WINDOW_DATES_CTE},
    crosses AS (
      SELECT code, date AS cross_date,
             ROW_NUMBER() OVER (PARTITION BY code ORDER BY date DESC) AS rn
      FROM indicator_states
      WHERE ${crossColumn} = 'GOLDEN' AND date IN (SELECT date FROM window_dates)
    ),
    latest_state AS (
      SELECT code, ma5, ma20, ROW_NUMBER() OVER (PARTITION BY code ORDER BY date DESC) AS rn
      FROM indicator_states
    ),
    latest_price AS (
      SELECT code, close, ROW_NUMBER() OVER (PARTITION BY code ORDER BY date DESC) AS rn
      FROM price_bars
    )
    SELECT c.code, s.name, s.market, c.cross_date AS date,
           cp.close AS cross_close, lp.close AS latest_close, ls.ma5, ls.ma20
    FROM crosses c
    JOIN securities s ON s.code = c.code
    JOIN price_bars cp ON cp.code = c.code AND cp.date = c.cross_date
    JOIN latest_price lp ON lp.code = c.code AND lp.rn = 1
    JOIN latest_state ls ON ls.code = c.code AND ls.rn = 1
    WHERE c.rn = 1
      AND lp.close > cp.close
      AND ls.ma5 > ls.ma20
      AND NOT EXISTS (
        SELECT 1 FROM indicator_states x
        WHERE x.code = c.code AND x.date >= c.cross_date AND x.macd_hist < 0
      )
    ORDER BY c.cross_date DESC, s.name ASC, c.code ASC
  `;
}

function trendContinuationSql(indicator: TrendIndicator): string {
  const table = indicator === "close" ? "price_bars" : "indicator_states";
  return `
    WITH ranked AS (
      SELECT code, date, ${indicator} AS value,
             ROW_NUMBER() OVER (PARTITION BY code ORDER BY date DESC) AS rn
      FROM ${table}
    )
    SELECT cur.code, s.name, s.market, cur.date, cur.value AS latest_value,
           prev.date AS previous_date, prev.value AS previous_value
    FROM ranked cur
    JOIN ranked prev ON prev.code = cur.code AND prev.rn = ?
    JOIN securities s ON s.code = cur.code
    WHERE cur.rn = 1
      AND cur.value IS NOT NULL AND prev.value IS NOT NULL
      AND cur.value > prev.value
    ORDER BY cur.date DESC, s.name ASC, cur.code ASC
  `;
}

export class Screener {
  private readonly repo: MarketRepository;
  private readonly coincidence: Statement<[number], CoincidenceHit>;
  private readonly sustained: Record<SustainedCross, Statement<[number], SustainedTrendHit>>;
  private readonly continuation: Record<TrendIndicator, Statement<[number], TrendContinuationHit>>;

  constructor(repo: MarketRepository) {
    this.repo = repo;
    const db = repo.db;

    this.coincidence = db.prepare<[number], CoincidenceHit>(`
      WITH ${WINDOW_DATES_CTE}
      SELECT i.code, s.name, s.market, i.date, p.close, i.macd, i.macd_hist, i.rsi
      FROM indicator_states i
      JOIN securities s ON s.code = i.code
      LEFT JOIN price_bars p ON p.code = i.code AND p.date = i.date
      WHERE i.date IN (SELECT date FROM window_dates)
        AND i.macd_cross = 'GOLDEN'
        AND i.rsi_signal = 'BUY'
      ORDER BY i.date DESC, s.name ASC, i.code ASC
    `);

    this.sustained = {
      macd: db.prepare<[number], SustainedTrendHit>(sustainedTrendSql(CROSS_COLUMN.macd)),
      ma_5_20: db.prepare<[number], SustainedTrendHit>(sustainedTrendSql(CROSS_COLUMN.ma_5_20)),
    };

    const prep = (indicator: TrendIndicator) =>
      db.prepare<[number], TrendContinuationHit>(trendContinuationSql(indicator));
    this.continuation = {
      close: prep("close"),
      ma5: prep("ma5"),
      ma20: prep("ma20"),
      ma60: prep("ma60"),
      ma120: prep("ma120"),
      macd: prep("macd"),
      macd_hist: prep("macd_hist"),
      rsi: prep("rsi"),
    };
  }

  /** MACD golden cross and RSI BUY signal on the same date inside the window. */
  findMacdRsiCoincidence(days: number): CoincidenceHit[] {
    const hits = this.coincidence.all(days);
    logScreening.debug({ days, hits: hits.length }, "MACD/RSI coincidence screen");
    return hits;
  }

  /**
   * Most recent golden cross in the window, kept only while the move holds: the
   * latest close is above the cross-day close, the MACD histogram has not turned
   * negative since the cross, and ma5 is still above ma20.
   */
  findSustainedTrend(opts: { days: number; cross?: SustainedCross }): SustainedTrendHit[] {
    const cross = opts.cross ?? "macd";
    const hits = this.sustained[cross].all(opts.days);
    logScreening.debug({ days: opts.days, cross, hits: hits.length }, "Sustained trend screen");
    return hits;
  }

  /** Latest value of `indicator` above its value `periods` rows earlier. */
  findTrendContinuation(opts: { indicator: TrendIndicator; periods: number }): TrendContinuationHit[] {
    const hits = this.continuation[opts.indicator].all(opts.periods + 1);
    logScreening.debug({ ...opts, hits: hits.length }, "Trend continuation screen");
    return hits;
  }

  /** One valuation class on `date` (default: latest valuation date), cheapest first. */
  findByValuation(opts: { result: ValuationClass; date?: string }): StoredValuation[] {
    return this.repo.getValuations({ date: opts.date, result: opts.result });
  }

  /**
   * Drawdown and downside profile over the last `months` (30-day months) up to
   * `asOf`. Null when the window holds fewer than two bars.
   */
  riskProfile(code: string, opts: { asOf: string; months?: number }): RiskMetrics | null {
    const since = addDays(opts.asOf, -(opts.months ?? 3) * 30);
    const bars = this.repo.getPriceSeries(code, since).filter((b) => b.date <= opts.asOf);
    try {
      return computeRiskMetrics(bars);
    } catch (e) {
      if (e instanceof CoreError) return null;
      throw e;
    }
  }
}
