import type { IndicatorSeries } from "./types.js";

const emptySeries = (length: number): IndicatorSeries => new Array<number | null>(length).fill(null);

const assertPeriod = (period: number): void => {
  if (!Number.isInteger(period) || period < 1) {
    throw new RangeError(`period must be a positive integer, received ${period}`);
  }
};

/**
 * Simple moving average. The first `period - 1` positions are `null`.
 */
export const sma = (values: ReadonlyArray<number>, period: number): IndicatorSeries => {
  assertPeriod(period);
  const result = emptySeries(values.length);
  if (values.length < period) {
    return result;
  }

  let windowSum = 0;
  for (let i = 0; i < values.length; i += 1) {
    windowSum += values[i] ?? 0;
    if (i >= period) {
      windowSum -= values[i - period] ?? 0;
    }
    if (i >= period - 1) {
      result[i] = windowSum / period;
    }
  }
  return result;
};

/**
 * Exponential moving average with smoothing `2 / (period + 1)`, seeded with
 * the simple average of the first `period` values.
 */
export const ema = (values: ReadonlyArray<number>, period: number): IndicatorSeries => {
  assertPeriod(period);
  return smoothed(values, period, 2 / (period + 1));
};

/**
 * Wilder smoothing (ratio `1 / period`) used by RSI and ATR.
 */
export const wilder = (values: ReadonlyArray<number>, period: number): IndicatorSeries => {
  assertPeriod(period);
  return smoothed(values, period, 1 / period);
};

const smoothed = (values: ReadonlyArray<number>, period: number, ratio: number): IndicatorSeries => {
  const result = emptySeries(values.length);
  if (values.length < period) {
    return result;
  }

  let seed = 0;
  for (let i = 0; i < period; i += 1) {
    seed += values[i] ?? 0;
  }
  let previous = seed / period;
  result[period - 1] = previous;

  for (let i = period; i < values.length; i += 1) {
    const value = values[i] ?? previous;
    previous = previous + ratio * (value - previous);
    result[i] = previous;
  }
  return result;
};

/**
 * Applies `fn` to the defined tail of a series that starts with `null`s and
 * re-aligns the output with the original indices.
 */
export const applyToDefined = (
  series: IndicatorSeries,
  fn: (values: ReadonlyArray<number>) => IndicatorSeries,
): IndicatorSeries => {
  const firstDefined = series.findIndex((value) => value !== null);
  if (firstDefined === -1) {
    return emptySeries(series.length);
  }
  const tail: number[] = [];
  for (let i = firstDefined; i < series.length; i += 1) {
    const value = series[i];
    tail.push(value ?? Number.NaN);
  }
  const computed = fn(tail);
  return [...emptySeries(firstDefined), ...computed.map((value) => (value === null || Number.isNaN(value) ? null : value))];
};

export { emptySeries };
