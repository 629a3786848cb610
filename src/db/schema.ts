export const MARKET_SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS securities (
    code TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    market TEXT NOT NULL,
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS price_bars (
    code TEXT NOT NULL REFERENCES securities(code) ON DELETE CASCADE,
    date TEXT NOT NULL,            -- YYYY-MM-DD
    open REAL NOT NULL,
    high REAL NOT NULL,
    low REAL NOT NULL,
    close REAL NOT NULL,
    volume REAL NOT NULL,
    PRIMARY KEY (code, date)
  );

  CREATE TABLE IF NOT EXISTS fundamentals (
    code TEXT NOT NULL REFERENCES securities(code) ON DELETE CASCADE,
    date TEXT NOT NULL,
    market_cap REAL,
    shares_outstanding REAL,
    pbr REAL,
    per REAL,
    industry_per REAL,
    eps REAL,
    eps_pred REAL,
    roe REAL,
    roe_pred REAL,
    dividend_yield REAL,
    bps REAL,
    bps_pred REAL,
    per_pred REAL,
    pbr_pred REAL,
    perf_yoy TEXT,                 -- qualitative surprise label
    perf_vs_3m_ago TEXT,
    perf_vs_consensus TEXT,
    -- Derived by the risk step
    max_drawdown REAL,
    avg_drawdown REAL,
    max_daily_fall_rate REAL,
    PRIMARY KEY (code, date)
  );

  CREATE TABLE IF NOT EXISTS indicator_states (
    code TEXT NOT NULL REFERENCES securities(code) ON DELETE CASCADE,
    date TEXT NOT NULL,
    macd REAL,
    macd_signal REAL,
    macd_hist REAL,
    macd_cross TEXT,               -- GOLDEN | DEAD | NULL
    rsi REAL,
    rsi_signal TEXT,               -- BUY | SELL | NULL
    ma5 REAL,
    ma20 REAL,
    ma60 REAL,
    ma120 REAL,
    cross_5_20 TEXT,
    cross_20_60 TEXT,
    cross_60_120 TEXT,
    PRIMARY KEY (code, date)
  );

  CREATE TABLE IF NOT EXISTS valuations (
    code TEXT NOT NULL REFERENCES securities(code) ON DELETE CASCADE,
    date TEXT NOT NULL,
    fair_value REAL NOT NULL,
    current_price REAL NOT NULL,
    discrepancy_ratio REAL NOT NULL,
    eps_growth_rate REAL,
    bps_growth_rate REAL,
    roe_growth_rate REAL,
    peg_ratio REAL,
    result TEXT NOT NULL,          -- UNDERVALUED | OVERVALUED | FAIR
    base_fair_value REAL,
    rim_value REAL,
    per_value REAL,
    pegr_value REAL,
    perf_adj_factor REAL,
    PRIMARY KEY (code, date)
  );

  CREATE INDEX IF NOT EXISTS idx_price_bars_date ON price_bars(date);
  CREATE INDEX IF NOT EXISTS idx_fundamentals_date ON fundamentals(date);
  CREATE INDEX IF NOT EXISTS idx_indicator_states_date ON indicator_states(date);
  CREATE INDEX IF NOT EXISTS idx_valuations_date_result ON valuations(date, result);
`;
