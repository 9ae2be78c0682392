import { emptySeries, sma, wilder } from "./movingAverages.js";
import type { IndicatorSeries } from "./types.js";

export interface BollingerOptions {
  readonly period: number;
  readonly stdDev: number;
}

export interface BollingerSeries {
  readonly upper: IndicatorSeries;
  readonly middle: IndicatorSeries;
  readonly lower: IndicatorSeries;
  /** Position of the close within the bands, 0 at the lower band and 1 at the upper. */
  readonly percentB: IndicatorSeries;
}

export const DEFAULT_BOLLINGER: BollingerOptions = { period: 20, stdDev: 2 };

export const bollingerBands = (
  closes: ReadonlyArray<number>,
  options: BollingerOptions = DEFAULT_BOLLINGER,
): BollingerSeries => {
  const middle = sma(closes, options.period);
  const upper = emptySeries(closes.length);
  const lower = emptySeries(closes.length);
  const percentB = emptySeries(closes.length);

  for (let i = 0; i < closes.length; i += 1) {
    const mean = middle[i];
    if (mean === null || mean === undefined) {
      continue;
    }
    let sumSquares = 0;
    for (let j = i - options.period + 1; j <= i; j += 1) {
      const diff = (closes[j] ?? mean) - mean;
      sumSquares += diff * diff;
    }
    // population deviation, matching the usual band definition
    const deviation = Math.sqrt(sumSquares / options.period);
    const up = mean + options.stdDev * deviation;
    const down = mean - options.stdDev * deviation;
    upper[i] = up;
    lower[i] = down;
    percentB[i] = up === down ? null : ((closes[i] ?? mean) - down) / (up - down);
  }

  return { upper, middle, lower, percentB };
};

interface RangeBar {
  readonly high: number;
  readonly low: number;
  readonly close: number;
}

/**
 * Average True Range with Wilder smoothing. True range needs a previous
 * close, so the first value lands at index `period`.
 */
export const atr = (bars: ReadonlyArray<RangeBar>, period = 14): IndicatorSeries => {
  const result = emptySeries(bars.length);
  if (bars.length < period + 1) {
    return result;
  }

  const trueRanges: number[] = [];
  for (let i = 1; i < bars.length; i += 1) {
    const bar = bars[i];
    const previous = bars[i - 1];
    if (!bar || !previous) {
      continue;
    }
    trueRanges.push(
      Math.max(
        bar.high - bar.low,
        Math.abs(bar.high - previous.close),
        Math.abs(bar.low - previous.close),
      ),
    );
  }

  const smoothed = wilder(trueRanges, period);
  smoothed.forEach((value, index) => {
    result[index + 1] = value;
  });
  return result;
};
