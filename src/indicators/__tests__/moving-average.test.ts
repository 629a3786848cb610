import { describe, it, expect } from "vitest";
import { computeMovingAverages } from "../moving-average.js";

describe("computeMovingAverages", () => {
  it("fills each window only once enough closes exist", () => {
    const closes = Array.from({ length: 130 }, (_, i) => i + 1);
    const { averages } = computeMovingAverages(closes);
    expect(averages[5][3]).toBeNull();
    expect(averages[5][4]).toBe(3);
    expect(averages[120][118]).toBeNull();
    expect(averages[120][119]).toBe(60.5);
  });

  it("detects the 5/20 golden cross after a dip", () => {
    // 20 days at 10, 5 days at 5, 5 days at 20
    const closes = [...Array(20).fill(10), ...Array(5).fill(5), ...Array(5).fill(20)];
    const ma = computeMovingAverages(closes);
    expect(ma.averages[5][26]).toBe(11);
    expect(ma.averages[20][26]).toBe(9.75);
    expect(ma.cross_5_20[26]).toBe("GOLDEN");
    expect(ma.cross_5_20.filter((c) => c !== null)).toEqual(["GOLDEN"]);
    expect(ma.cross_20_60.every((c) => c === null)).toBe(true);
    expect(ma.averages[60].every((v) => v === null)).toBe(true);
  });
});
