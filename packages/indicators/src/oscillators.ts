import { applyToDefined, ema, emptySeries, wilder } from "./movingAverages.js";
import type { IndicatorSeries } from "./types.js";

/**
 * Relative Strength Index on a 0-100 scale using Wilder smoothing of gains
 * and losses. Needs `period + 1` prices; the first value lands at index
 * `period`. A flat window (no gains, no losses) reads 50.
 */
export const rsi = (closes: ReadonlyArray<number>, period = 14): IndicatorSeries => {
  const result = emptySeries(closes.length);
  if (closes.length < period + 1) {
    return result;
  }

  const gains: number[] = [];
  const losses: number[] = [];
  for (let i = 1; i < closes.length; i += 1) {
    const change = (closes[i] ?? 0) - (closes[i - 1] ?? 0);
    gains.push(change > 0 ? change : 0);
    losses.push(change < 0 ? -change : 0);
  }

  const avgGain = wilder(gains, period);
  const avgLoss = wilder(losses, period);

  for (let i = 0; i < gains.length; i += 1) {
    const up = avgGain[i];
    const down = avgLoss[i];
    if (up === null || up === undefined || down === null || down === undefined) {
      continue;
    }
    if (down === 0) {
      result[i + 1] = up === 0 ? 50 : 100;
      continue;
    }
    result[i + 1] = 100 - 100 / (1 + up / down);
  }
  return result;
};

export interface MacdOptions {
  readonly fast: number;
  readonly slow: number;
  readonly signal: number;
}

export interface MacdSeries {
  readonly macd: IndicatorSeries;
  readonly signal: IndicatorSeries;
  readonly histogram: IndicatorSeries;
}

export const DEFAULT_MACD: MacdOptions = { fast: 12, slow: 26, signal: 9 };

/**
 * MACD line (fast EMA minus slow EMA), its signal EMA and the histogram.
 * Inputs shorter than `slow + signal` produce all-null series.
 */
export const macd = (closes: ReadonlyArray<number>, options: MacdOptions = DEFAULT_MACD): MacdSeries => {
  if (closes.length < options.slow + options.signal) {
    return {
      macd: emptySeries(closes.length),
      signal: emptySeries(closes.length),
      histogram: emptySeries(closes.length),
    };
  }

  const fast = ema(closes, options.fast);
  const slow = ema(closes, options.slow);
  const line: IndicatorSeries = fast.map((value, index) => {
    const slowValue = slow[index];
    return value === null || slowValue === null || slowValue === undefined ? null : value - slowValue;
  });
  const signal = applyToDefined(line, (values) => ema(values, options.signal));
  const histogram = line.map((value, index) => {
    const signalValue = signal[index];
    return value === null || signalValue === null || signalValue === undefined ? null : value - signalValue;
  });

  return { macd: line, signal, histogram };
};
