import { existsSync } from "node:fs";
import type { AppConfig } from "./config.js";

/**
 * Validation result with errors (fatal) and warnings (non-fatal).
 */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

/**
 * Validates configuration values.
 *
 * Checks:
 * - REST port is in valid range (1-65535)
 * - valuation weights are non-negative and at least one is positive
 * - haircut is in (0, 1]
 * - required ROE is positive
 * - PEGR growth band and classification thresholds are ordered
 * - indicator minimum history and risk window are positive integers
 * - STOCK_COUNT, when set, is a positive integer
 * - schedule time is HH:MM
 * - CSV paths exist if set (warning)
 */
export function validateConfig(cfg: AppConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const v = cfg.valuation;

  if (!isValidPort(cfg.rest.port)) {
    errors.push(`REST port must be between 1 and 65535, got ${cfg.rest.port}`);
  }

  if (cfg.rest.apiKey && cfg.rest.apiKey.length < 16) {
    warnings.push(`REST API key is only ${cfg.rest.apiKey.length} characters (recommended: at least 16)`);
  }

  for (const [name, weight] of Object.entries(v.weights)) {
    if (isNaN(weight) || weight < 0) {
      errors.push(`valuation.weights.${name} must be a non-negative number, got ${weight}`);
    }
  }
  const weightSum = v.weights.rim + v.weights.industryPer + v.weights.pegr;
  if (!(weightSum > 0)) {
    errors.push("At least one valuation weight must be positive");
  }

  if (isNaN(v.haircut) || v.haircut <= 0 || v.haircut > 1) {
    errors.push(`valuation.haircut must be in (0, 1], got ${v.haircut}`);
  }

  if (isNaN(v.requiredRoe) || v.requiredRoe <= 0) {
    errors.push(`valuation.requiredRoe must be positive, got ${v.requiredRoe}`);
  }

  if (isNaN(v.pegrMinGrowth) || isNaN(v.pegrMaxGrowth) || v.pegrMinGrowth >= v.pegrMaxGrowth) {
    errors.push(
      `valuation.pegrMinGrowth (${v.pegrMinGrowth}) must be below valuation.pegrMaxGrowth (${v.pegrMaxGrowth})`,
    );
  }

  if (isNaN(v.lowThreshold) || isNaN(v.highThreshold) || v.lowThreshold > v.highThreshold) {
    errors.push(
      `valuation.lowThreshold (${v.lowThreshold}) must not exceed valuation.highThreshold (${v.highThreshold})`,
    );
  }

  if (!Number.isInteger(cfg.indicators.minHistory) || cfg.indicators.minHistory < 2) {
    errors.push(`indicators.minHistory must be an integer >= 2, got ${cfg.indicators.minHistory}`);
  } else if (cfg.indicators.minHistory < 120) {
    warnings.push(`indicators.minHistory is ${cfg.indicators.minHistory}; the 120-day average will stay null for short series`);
  }

  if (!Number.isInteger(cfg.risk.windowDays) || cfg.risk.windowDays <= 0) {
    errors.push(`risk.windowDays must be a positive integer, got ${cfg.risk.windowDays}`);
  }

  if (!Number.isInteger(cfg.screening.lookbackDays) || cfg.screening.lookbackDays <= 0) {
    errors.push(`screening.lookbackDays must be a positive integer, got ${cfg.screening.lookbackDays}`);
  }

  if (cfg.ingest.limit !== null && (!Number.isInteger(cfg.ingest.limit) || cfg.ingest.limit <= 0)) {
    errors.push(`STOCK_COUNT must be a positive integer, got ${cfg.ingest.limit}`);
  }

  if (cfg.ingest.priceStartDate !== null && !/^\d{4}-\d{2}-\d{2}$/.test(cfg.ingest.priceStartDate)) {
    errors.push(`PRICE_FETCH_START_DATE must be YYYY-MM-DD, got ${cfg.ingest.priceStartDate}`);
  }

  if (!isValidClockTime(cfg.scheduler.runAt)) {
    errors.push(`SCHEDULE_TIME must be HH:MM, got ${cfg.scheduler.runAt}`);
  }

  if (cfg.ingest.listingCsvPath && !existsSync(cfg.ingest.listingCsvPath)) {
    warnings.push(`Listing CSV does not exist: ${cfg.ingest.listingCsvPath}`);
  }

  if (cfg.ingest.fundamentalsCsvPath && !existsSync(cfg.ingest.fundamentalsCsvPath)) {
    warnings.push(`Fundamentals CSV does not exist: ${cfg.ingest.fundamentalsCsvPath}`);
  }

  return { errors, warnings };
}

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

function isValidClockTime(value: string): boolean {
  const m = /^(\d{2}):(\d{2})$/.exec(value);
  if (!m) return false;
  return Number(m[1]) <= 23 && Number(m[2]) <= 59;
}
