import { INDICATOR_CONFIG, type CrossLabel, type MovingAverageWindow } from "./schema.js";
import { detectCrosses, rollingMean } from "./series.js";

export interface MovingAverageSeries {
  averages: Record<MovingAverageWindow, (number | null)[]>;
  cross_5_20: (CrossLabel | null)[];
  cross_20_60: (CrossLabel | null)[];
  cross_60_120: (CrossLabel | null)[];
}

/** Simple moving averages at 5/20/60/120 days and the crosses between adjacent windows. */
export function computeMovingAverages(closes: readonly number[]): MovingAverageSeries {
  const [w5, w20, w60, w120] = INDICATOR_CONFIG.movingAverages;
  const averages: Record<MovingAverageWindow, (number | null)[]> = {
    5: rollingMean(closes, w5),
    20: rollingMean(closes, w20),
    60: rollingMean(closes, w60),
    120: rollingMean(closes, w120),
  };
  return {
    averages,
    cross_5_20: detectCrosses(averages[5], averages[20]),
    cross_20_60: detectCrosses(averages[20], averages[60]),
    cross_60_120: detectCrosses(averages[60], averages[120]),
  };
}
