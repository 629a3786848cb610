import { describe, it, expect } from "vitest";
import { computeIndicatorsForSecurity, computeIndicatorStates, FULL_HISTORY } from "../engine.js";
import { InsufficientHistoryError } from "../../shared/errors.js";
import { addDays } from "../../shared/dates.js";

// ── Helpers ──────────────────────────────────────────────────────────────────

function series(count: number, basePrice = 100) {
  return Array.from({ length: count }, (_, i) => ({
    date: addDays("2024-01-01", i),
    close: basePrice + Math.sin(i / 5) * 2,
  }));
}

describe("computeIndicatorStates", () => {
  it("emits one row per input date in date order", () => {
    const points = series(10);
    const shuffled = [points[3], points[0], ...points.slice(4), points[2], points[1]];
    const rows = computeIndicatorStates("005930", shuffled);
    expect(rows.map((r) => r.date)).toEqual(points.map((p) => p.date));
    expect(rows.every((r) => r.code === "005930")).toBe(true);
  });

  it("leaves windows that cannot be completed null", () => {
    const rows = computeIndicatorStates("005930", series(30));
    const last = rows[rows.length - 1];
    expect(last.ma5).not.toBeNull();
    expect(last.ma20).not.toBeNull();
    expect(last.ma60).toBeNull();
    expect(last.ma120).toBeNull();
    expect(rows[0].rsi).toBeNull();
    expect(rows[0].macd).toBe(0);
  });
});

describe("computeIndicatorsForSecurity", () => {
  it("refuses a history shorter than the minimum", () => {
    expect(() => computeIndicatorsForSecurity("005930", series(FULL_HISTORY - 1))).toThrow(InsufficientHistoryError);
  });

  it("reports the gap in the error", () => {
    try {
      computeIndicatorsForSecurity("000660", series(50));
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(InsufficientHistoryError);
      if (e instanceof InsufficientHistoryError) {
        expect(e.required).toBe(120);
        expect(e.actual).toBe(50);
        expect(e.security).toBe("000660");
        expect(e.code).toBe("insufficient-history");
      }
    }
  });

  it("computes the full set once 120 closes exist", () => {
    const rows = computeIndicatorsForSecurity("005930", series(FULL_HISTORY));
    expect(rows).toHaveLength(120);
    expect(rows[118].ma120).toBeNull();
    expect(rows[119].ma120).not.toBeNull();
  });

  it("honours a lower minimum", () => {
    expect(computeIndicatorsForSecurity("005930", series(30), 20)).toHaveLength(30);
  });
});
