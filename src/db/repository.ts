import type { Database as DatabaseType } from "better-sqlite3";
import type { IndicatorState } from "../indicators/schema.js";
import { finiteOrNull } from "../indicators/series.js";
import type { ValuationClass, ValuationInput, ValuationResult } from "../valuation/types.js";

// ── Row Types ────────────────────────────────────────────────────────────

export interface SecurityRow {
  code: string;
  name: string;
  market: string;
}

export interface PriceBarRow {
  code: string;
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface FundamentalFields {
  market_cap: number | null;
  shares_outstanding: number | null;
  pbr: number | null;
  per: number | null;
  industry_per: number | null;
  eps: number | null;
  eps_pred: number | null;
  roe: number | null;
  roe_pred: number | null;
  dividend_yield: number | null;
  bps: number | null;
  bps_pred: number | null;
  per_pred: number | null;
  pbr_pred: number | null;
  perf_yoy: string | null;
  perf_vs_3m_ago: string | null;
  perf_vs_consensus: string | null;
}

export interface RiskFields {
  max_drawdown: number | null;
  avg_drawdown: number | null;
  max_daily_fall_rate: number | null;
}

export interface FundamentalRow extends FundamentalFields, RiskFields {
  code: string;
  date: string;
}

/** Upsert payload: risk fields are owned by the risk step and left untouched. */
export type FundamentalUpsert = { code: string; date: string } & Partial<FundamentalFields>;

export interface StoredValuation {
  code: string;
  name: string | null;
  date: string;
  fair_value: number;
  current_price: number;
  discrepancy_ratio: number;
  eps_growth_rate: number | null;
  bps_growth_rate: number | null;
  roe_growth_rate: number | null;
  peg_ratio: number | null;
  result: ValuationClass;
  base_fair_value: number | null;
  rim_value: number | null;
  per_value: number | null;
  pegr_value: number | null;
  perf_adj_factor: number | null;
}

export interface SyncResult {
  upserted: number;
  deleted: number;
}

interface ValuationInputRow {
  code: string;
  name: string;
  current_price: number | null;
  eps: number | null;
  eps_pred: number | null;
  bps: number | null;
  bps_pred: number | null;
  roe: number | null;
  roe_pred: number | null;
  per: number | null;
  industry_per: number | null;
  perf_yoy: string | null;
  perf_vs_3m_ago: string | null;
  perf_vs_consensus: string | null;
}

const FUNDAMENTAL_NUMERIC_FIELDS = [
  "market_cap",
  "shares_outstanding",
  "pbr",
  "per",
  "industry_per",
  "eps",
  "eps_pred",
  "roe",
  "roe_pred",
  "dividend_yield",
  "bps",
  "bps_pred",
  "per_pred",
  "pbr_pred",
] as const;

const FUNDAMENTAL_COLUMNS = [...FUNDAMENTAL_NUMERIC_FIELDS, "perf_yoy", "perf_vs_3m_ago", "perf_vs_consensus"] as const;

function toFundamentalParams(row: FundamentalUpsert): FundamentalRow {
  const out: FundamentalRow = {
    code: row.code,
    date: row.date,
    market_cap: null,
    shares_outstanding: null,
    pbr: null,
    per: null,
    industry_per: null,
    eps: null,
    eps_pred: null,
    roe: null,
    roe_pred: null,
    dividend_yield: null,
    bps: null,
    bps_pred: null,
    per_pred: null,
    pbr_pred: null,
    perf_yoy: row.perf_yoy ?? null,
    perf_vs_3m_ago: row.perf_vs_3m_ago ?? null,
    perf_vs_consensus: row.perf_vs_consensus ?? null,
    max_drawdown: null,
    avg_drawdown: null,
    max_daily_fall_rate: null,
  };
  for (const key of FUNDAMENTAL_NUMERIC_FIELDS) out[key] = finiteOrNull(row[key]);
  return out;
}

function toStoredValuation(r: ValuationResult): Omit<StoredValuation, "name"> {
  return {
    code: r.code,
    date: r.date,
    fair_value: r.fair_value,
    current_price: r.current_price,
    discrepancy_ratio: r.discrepancy_ratio,
    eps_growth_rate: finiteOrNull(r.eps_growth_rate),
    bps_growth_rate: finiteOrNull(r.bps_growth_rate),
    roe_growth_rate: finiteOrNull(r.roe_growth_rate),
    peg_ratio: finiteOrNull(r.peg_ratio),
    result: r.result,
    base_fair_value: finiteOrNull(r.base_fair_value),
    rim_value: finiteOrNull(r.rim_value),
    per_value: finiteOrNull(r.per_value),
    pegr_value: finiteOrNull(r.pegr_value),
    perf_adj_factor: finiteOrNull(r.perf_adj_factor),
  };
}

const INDICATOR_NUMERIC_FIELDS = ["macd", "macd_signal", "macd_hist", "rsi", "ma5", "ma20", "ma60", "ma120"] as const;

function toIndicatorParams(s: IndicatorState): IndicatorState {
  const out: IndicatorState = { ...s };
  for (const key of INDICATOR_NUMERIC_FIELDS) out[key] = finiteOrNull(s[key]);
  return out;
}

function prepareStatements(db: DatabaseType) {
  const fundamentalCols = FUNDAMENTAL_COLUMNS.join(", ");
  const fundamentalParams = FUNDAMENTAL_COLUMNS.map((c) => `@${c}`).join(", ");
  const fundamentalUpdates = FUNDAMENTAL_COLUMNS.map((c) => `${c} = excluded.${c}`).join(", ");

  return {
    upsertSecurity: db.prepare<SecurityRow>(`
      INSERT INTO securities (code, name, market) VALUES (@code, @name, @market)
      ON CONFLICT(code) DO UPDATE SET name = excluded.name, market = excluded.market, updated_at = datetime('now')
    `),
    getSecurity: db.prepare<[string], SecurityRow>(`SELECT code, name, market FROM securities WHERE code = ?`),
    listSecurities: db.prepare<[], SecurityRow>(`SELECT code, name, market FROM securities ORDER BY code`),
    listSecuritiesByMarket: db.prepare<[string], SecurityRow>(`SELECT code, name, market FROM securities WHERE market = ? ORDER BY code`),
    deleteSecurity: db.prepare<[string]>(`DELETE FROM securities WHERE code = ?`),

    upsertPriceBar: db.prepare<PriceBarRow>(`
      INSERT INTO price_bars (code, date, open, high, low, close, volume)
      VALUES (@code, @date, @open, @high, @low, @close, @volume)
      ON CONFLICT(code, date) DO UPDATE SET
        open = excluded.open, high = excluded.high, low = excluded.low,
        close = excluded.close, volume = excluded.volume
    `),
    priceSeries: db.prepare<[string], PriceBarRow>(`
      SELECT code, date, open, high, low, close, volume FROM price_bars WHERE code = ? ORDER BY date
    `),
    priceSeriesSince: db.prepare<[string, string], PriceBarRow>(`
      SELECT code, date, open, high, low, close, volume FROM price_bars
      WHERE code = ? AND date >= ? ORDER BY date
    `),
    latestTradeDate: db.prepare<[string], { date: string | null }>(`SELECT MAX(date) AS date FROM price_bars WHERE code = ?`),
    latestMarketDate: db.prepare<[], { date: string | null }>(`SELECT MAX(date) AS date FROM price_bars`),

    upsertFundamental: db.prepare<FundamentalRow>(`
      INSERT INTO fundamentals (code, date, ${fundamentalCols})
      VALUES (@code, @date, ${fundamentalParams})
      ON CONFLICT(code, date) DO UPDATE SET ${fundamentalUpdates}
    `),
    getFundamental: db.prepare<[string, string], FundamentalRow>(`SELECT * FROM fundamentals WHERE code = ? AND date = ?`),
    fundamentalCodes: db.prepare<[string], { code: string }>(`SELECT code FROM fundamentals WHERE date = ? ORDER BY code`),
    latestFundamentalDate: db.prepare<[], { date: string | null }>(`SELECT MAX(date) AS date FROM fundamentals`),
    updateRisk: db.prepare<RiskFields & { code: string; date: string }>(`
      UPDATE fundamentals
      SET max_drawdown = @max_drawdown, avg_drawdown = @avg_drawdown, max_daily_fall_rate = @max_daily_fall_rate
      WHERE code = @code AND date = @date
    `),

    // Snapshot of the date joined with each security's latest close on or before it
    valuationInputs: db.prepare<[string, string], ValuationInputRow>(`
      WITH latest AS (
        SELECT code, close,
               ROW_NUMBER() OVER (PARTITION BY code ORDER BY date DESC) AS rn
        FROM price_bars
        WHERE date <= ?
      )
      SELECT f.code, s.name, l.close AS current_price,
             f.eps, f.eps_pred, f.bps, f.bps_pred, f.roe, f.roe_pred, f.per, f.industry_per,
             f.perf_yoy, f.perf_vs_3m_ago, f.perf_vs_consensus
      FROM fundamentals f
      JOIN securities s ON s.code = f.code
      LEFT JOIN latest l ON l.code = f.code AND l.rn = 1
      WHERE f.date = ?
      ORDER BY f.code
    `),

    deleteIndicators: db.prepare<[string]>(`DELETE FROM indicator_states WHERE code = ?`),
    insertIndicator: db.prepare<IndicatorState>(`
      INSERT INTO indicator_states (code, date, macd, macd_signal, macd_hist, macd_cross, rsi, rsi_signal,
                                    ma5, ma20, ma60, ma120, cross_5_20, cross_20_60, cross_60_120)
      VALUES (@code, @date, @macd, @macd_signal, @macd_hist, @macd_cross, @rsi, @rsi_signal,
              @ma5, @ma20, @ma60, @ma120, @cross_5_20, @cross_20_60, @cross_60_120)
    `),
    // Most recent N rows, returned oldest first
    indicatorStates: db.prepare<[string, number], IndicatorState>(`
      SELECT * FROM (
        SELECT code, date, macd, macd_signal, macd_hist, macd_cross, rsi, rsi_signal,
               ma5, ma20, ma60, ma120, cross_5_20, cross_20_60, cross_60_120
        FROM indicator_states WHERE code = ? ORDER BY date DESC LIMIT ?
      ) ORDER BY date
    `),

    upsertValuation: db.prepare<Omit<StoredValuation, "name">>(`
      INSERT INTO valuations (code, date, fair_value, current_price, discrepancy_ratio, eps_growth_rate,
                              bps_growth_rate, roe_growth_rate, peg_ratio, result, base_fair_value,
                              rim_value, per_value, pegr_value, perf_adj_factor)
      VALUES (@code, @date, @fair_value, @current_price, @discrepancy_ratio, @eps_growth_rate,
              @bps_growth_rate, @roe_growth_rate, @peg_ratio, @result, @base_fair_value,
              @rim_value, @per_value, @pegr_value, @perf_adj_factor)
      ON CONFLICT(code, date) DO UPDATE SET
        fair_value = excluded.fair_value, current_price = excluded.current_price,
        discrepancy_ratio = excluded.discrepancy_ratio, eps_growth_rate = excluded.eps_growth_rate,
        bps_growth_rate = excluded.bps_growth_rate, roe_growth_rate = excluded.roe_growth_rate,
        peg_ratio = excluded.peg_ratio, result = excluded.result, base_fair_value = excluded.base_fair_value,
        rim_value = excluded.rim_value, per_value = excluded.per_value, pegr_value = excluded.pegr_value,
        perf_adj_factor = excluded.perf_adj_factor
    `),
    valuationsOn: db.prepare<[string], StoredValuation>(`
      SELECT v.*, s.name FROM valuations v JOIN securities s ON s.code = v.code
      WHERE v.date = ? ORDER BY v.discrepancy_ratio, v.code
    `),
    valuationsOnByResult: db.prepare<[string, string], StoredValuation>(`
      SELECT v.*, s.name FROM valuations v JOIN securities s ON s.code = v.code
      WHERE v.date = ? AND v.result = ? ORDER BY v.discrepancy_ratio, v.code
    `),
    latestValuationDate: db.prepare<[], { date: string | null }>(`SELECT MAX(date) AS date FROM valuations`),
  };
}

// ── Repository ───────────────────────────────────────────────────────────

/**
 * Every read and write the pipeline, screener and REST layer make against the
 * market store. Upserts are idempotent: last write wins.
 */
export class MarketRepository {
  readonly db: DatabaseType;

  private readonly stmts: ReturnType<typeof prepareStatements>;

  constructor(db: DatabaseType) {
    this.db = db;
    this.stmts = prepareStatements(db);
  }

  // ── Securities ─────────────────────────────────────────────────────────

  upsertSecurity(row: SecurityRow): void {
    this.stmts.upsertSecurity.run(row);
  }

  upsertSecurities(rows: readonly SecurityRow[]): number {
    const tx = this.db.transaction((items: readonly SecurityRow[]) => {
      for (const r of items) this.stmts.upsertSecurity.run(r);
      return items.length;
    });
    return tx(rows);
  }

  getSecurity(code: string): SecurityRow | undefined {
    return this.stmts.getSecurity.get(code);
  }

  listSecurities(opts: { market?: string; limit?: number | null } = {}): SecurityRow[] {
    const all = opts.market ? this.stmts.listSecuritiesByMarket.all(opts.market) : this.stmts.listSecurities.all();
    return opts.limit != null && opts.limit > 0 ? all.slice(0, opts.limit) : all;
  }

  /** Removes the security and, through the cascade, everything derived from it. */
  deleteSecurity(code: string): boolean {
    return this.stmts.deleteSecurity.run(code).changes > 0;
  }

  /**
   * Make the registry match a listing: upsert every listed security and delete
   * the ones no longer listed. `alsoListed` names codes the listing carries
   * without a usable row; they are kept as they are. An empty listing changes
   * nothing.
   */
  syncListings(rows: readonly SecurityRow[], alsoListed: Iterable<string> = []): SyncResult {
    if (rows.length === 0) return { upserted: 0, deleted: 0 };
    const listed = new Set([...rows.map((r) => r.code), ...alsoListed]);
    const tx = this.db.transaction((items: readonly SecurityRow[]): SyncResult => {
      for (const r of items) this.stmts.upsertSecurity.run(r);
      let deleted = 0;
      for (const existing of this.stmts.listSecurities.all()) {
        if (!listed.has(existing.code)) deleted += this.stmts.deleteSecurity.run(existing.code).changes;
      }
      return { upserted: items.length, deleted };
    });
    return tx(rows);
  }

  // ── Price Bars ─────────────────────────────────────────────────────────

  upsertPriceBars(bars: readonly PriceBarRow[]): number {
    const tx = this.db.transaction((items: readonly PriceBarRow[]) => {
      for (const b of items) this.stmts.upsertPriceBar.run(b);
      return items.length;
    });
    return tx(bars);
  }

  /** Date-ascending bars, optionally from `since` (inclusive). */
  getPriceSeries(code: string, since?: string): PriceBarRow[] {
    return since ? this.stmts.priceSeriesSince.all(code, since) : this.stmts.priceSeries.all(code);
  }

  getLatestTradeDate(code: string): string | null {
    return this.stmts.latestTradeDate.get(code)?.date ?? null;
  }

  /** Most recent bar date across all securities. */
  getLatestMarketDate(): string | null {
    return this.stmts.latestMarketDate.get()?.date ?? null;
  }

  // ── Fundamentals ───────────────────────────────────────────────────────

  upsertFundamental(row: FundamentalUpsert): void {
    this.stmts.upsertFundamental.run(toFundamentalParams(row));
  }

  upsertFundamentals(rows: readonly FundamentalUpsert[]): number {
    const tx = this.db.transaction((items: readonly FundamentalUpsert[]) => {
      for (const r of items) this.stmts.upsertFundamental.run(toFundamentalParams(r));
      return items.length;
    });
    return tx(rows);
  }

  getFundamental(code: string, date: string): FundamentalRow | undefined {
    return this.stmts.getFundamental.get(code, date);
  }

  /** Codes with a fundamental snapshot on `date`. */
  listFundamentalCodes(date: string): string[] {
    return this.stmts.fundamentalCodes.all(date).map((r) => r.code);
  }

  getLatestFundamentalDate(): string | null {
    return this.stmts.latestFundamentalDate.get()?.date ?? null;
  }

  /** Returns false when no snapshot exists for (code, date). */
  updateRiskFields(code: string, date: string, risk: RiskFields): boolean {
    const res = this.stmts.updateRisk.run({
      code,
      date,
      max_drawdown: finiteOrNull(risk.max_drawdown),
      avg_drawdown: finiteOrNull(risk.avg_drawdown),
      max_daily_fall_rate: finiteOrNull(risk.max_daily_fall_rate),
    });
    return res.changes > 0;
  }

  getValuationInputs(date: string): ValuationInput[] {
    return this.stmts.valuationInputs.all(date, date).map((r) => ({
      code: r.code,
      name: r.name,
      currentPrice: r.current_price,
      eps: r.eps,
      epsPred: r.eps_pred,
      bps: r.bps,
      bpsPred: r.bps_pred,
      roe: r.roe,
      roePred: r.roe_pred,
      per: r.per,
      industryPer: r.industry_per,
      perfYoy: r.perf_yoy,
      perfVs3mAgo: r.perf_vs_3m_ago,
      perfVsConsensus: r.perf_vs_consensus,
    }));
  }

  // ── Indicator States ───────────────────────────────────────────────────

  /** Drop and rebuild one security's indicator history atomically. */
  replaceIndicatorStates(code: string, states: readonly IndicatorState[]): number {
    const tx = this.db.transaction((items: readonly IndicatorState[]) => {
      this.stmts.deleteIndicators.run(code);
      for (const s of items) this.stmts.insertIndicator.run(toIndicatorParams(s));
      return items.length;
    });
    return tx(states);
  }

  /** The most recent `limit` rows, oldest first. */
  getIndicatorStates(code: string, limit: number = 250): IndicatorState[] {
    return this.stmts.indicatorStates.all(code, limit);
  }

  // ── Valuations ─────────────────────────────────────────────────────────

  upsertValuations(results: readonly ValuationResult[]): number {
    const tx = this.db.transaction((items: readonly ValuationResult[]) => {
      for (const r of items) this.stmts.upsertValuation.run(toStoredValuation(r));
      return items.length;
    });
    return tx(results);
  }

  getLatestValuationDate(): string | null {
    return this.stmts.latestValuationDate.get()?.date ?? null;
  }

  /** Valuations on `date` (default: latest), ordered by discrepancy ascending. */
  getValuations(opts: { date?: string; result?: ValuationClass } = {}): StoredValuation[] {
    const date = opts.date ?? this.getLatestValuationDate();
    if (date === null) return [];
    return opts.result ? this.stmts.valuationsOnByResult.all(date, opts.result) : this.stmts.valuationsOn.all(date);
  }
}
