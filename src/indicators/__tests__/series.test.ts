import { describe, it, expect } from "vitest";
import { detectCrosses, detectZeroCrosses, ema, ewm, finiteOrNull, rollingMean, subtract } from "../series.js";

describe("ewm", () => {
  it("seeds with the first value and smooths the rest", () => {
    expect(ewm([1, 2, 3], 0.5)).toEqual([1, 1.5, 2.25]);
  });

  it("keeps leading nulls and carries the average across later gaps", () => {
    expect(ewm([null, 2, null, 4], 0.5)).toEqual([null, 2, 2, 3]);
  });

  it("uses alpha = 2 / (span + 1) for ema", () => {
    expect(ema([10, 20], 3)).toEqual([10, 15]);
  });
});

describe("rollingMean", () => {
  it("is null until the window fills", () => {
    expect(rollingMean([1, 2, 3, 4, 5], 3)).toEqual([null, null, 2, 3, 4]);
  });

  it("is all null when the series is shorter than the window", () => {
    expect(rollingMean([1, 2], 5)).toEqual([null, null]);
  });
});

describe("subtract", () => {
  it("propagates nulls", () => {
    expect(subtract([5, null, 3], [1, 1, null])).toEqual([4, null, null]);
  });
});

describe("detectCrosses", () => {
  it("labels golden and dead crosses with ties on the crossing side", () => {
    expect(detectCrosses([1, 2, 3, 2], [2, 2, 2, 2])).toEqual([null, "GOLDEN", null, "DEAD"]);
  });

  it("never labels the first element", () => {
    expect(detectCrosses([5], [1])).toEqual([null]);
  });

  it("yields null when any operand is null", () => {
    expect(detectCrosses([1, null, 3], [2, 2, 2])).toEqual([null, null, null]);
  });

  it("does not count touching from an equal start as a cross", () => {
    expect(detectCrosses([2, 1], [2, 2])).toEqual([null, null]);
  });

  it("is idempotent", () => {
    const fast = [1, 3, 2, 4, 1];
    const slow = [2, 2, 3, 3, 2];
    expect(detectCrosses(fast, slow)).toEqual(detectCrosses(fast, slow));
  });
});

describe("detectZeroCrosses", () => {
  it("reads crosses off the zero line", () => {
    expect(detectZeroCrosses([-1, -0.5, 0.2, 0.1])).toEqual([null, null, "GOLDEN", null]);
  });
});

describe("finiteOrNull", () => {
  it("maps NaN and infinities to null", () => {
    expect(finiteOrNull(Number.NaN)).toBeNull();
    expect(finiteOrNull(Number.POSITIVE_INFINITY)).toBeNull();
    expect(finiteOrNull(undefined)).toBeNull();
    expect(finiteOrNull(0)).toBe(0);
  });
});
