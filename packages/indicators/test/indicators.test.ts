import { strict as assert } from "node:assert";
import test from "node:test";

import {
  atr,
  attachAllIndicators,
  attachIndicators,
  bollingerBands,
  ema,
  macd,
  movingAverageColumn,
  readColumn,
  rsi,
  sma,
  type IndicatorSeries,
} from "../src/index.js";

const approx = (actual: number | null | undefined, expected: number, tolerance = 1e-6): void => {
  assert.ok(
    typeof actual === "number" && Math.abs(actual - expected) < tolerance,
    `expected ${expected}, received ${String(actual)}`,
  );
};

const flatBars = (closes: number[]) =>
  closes.map((close, index) => ({
    timestamp: `2024-01-${String(index + 1).padStart(2, "0")}`,
    open: close,
    high: close + 1,
    low: close - 1,
    close,
    volume: 100 + index * 10,
  }));

test("sma leaves the warm-up window null", () => {
  assert.deepEqual(sma([1, 2, 3, 4, 5], 3), [null, null, 2, 3, 4]);
});

test("sma of a series shorter than the period is all null", () => {
  assert.deepEqual(sma([1, 2], 3), [null, null]);
});

test("sma rejects non-positive periods", () => {
  assert.throws(() => sma([1, 2, 3], 0), RangeError);
});

test("ema is seeded with the simple average of the first window", () => {
  const values = ema([2, 4, 6, 8, 20], 2);
  assert.equal(values[0], null);
  approx(values[1], 3);
  approx(values[2], 5);
  approx(values[3], 7);
  approx(values[4], 15.666667, 1e-5);
});

test("rsi uses Wilder smoothing of gains and losses", () => {
  const values = rsi([10, 11, 12, 11, 12], 2);
  assert.equal(values[0], null);
  assert.equal(values[1], null);
  assert.equal(values[2], 100);
  approx(values[3], 50);
  approx(values[4], 75);
});

test("rsi reads 50 on a flat series and needs period + 1 prices", () => {
  assert.deepEqual(rsi([5, 5, 5], 2), [null, null, 50]);
  assert.deepEqual(rsi([5, 5], 2), [null, null]);
});

test("macd is all null when the series is too short", () => {
  const series = macd([1, 2, 3], { fast: 2, slow: 3, signal: 2 });
  assert.deepEqual(series.macd, [null, null, null]);
  assert.deepEqual(series.signal, [null, null, null]);
});

test("macd of a constant series is zero once warmed up", () => {
  const closes = new Array<number>(35).fill(100);
  const series = macd(closes);
  assert.equal(series.macd[24], null);
  assert.equal(series.macd[25], 0);
  assert.equal(series.signal[32], null);
  assert.equal(series.signal[33], 0);
  assert.equal(series.histogram[34], 0);
});

test("bollinger bands use the population deviation", () => {
  const bands = bollingerBands([1, 2, 3], { period: 3, stdDev: 2 });
  const deviation = Math.sqrt(2 / 3);
  approx(bands.middle[2], 2);
  approx(bands.upper[2], 2 + 2 * deviation);
  approx(bands.lower[2], 2 - 2 * deviation);
  approx(bands.percentB[2], (3 - (2 - 2 * deviation)) / (4 * deviation));
  assert.equal(bands.upper[1], null);
});

test("bollinger %B is null when the bands collapse", () => {
  const bands = bollingerBands([4, 4, 4], { period: 3, stdDev: 2 });
  assert.equal(bands.upper[2], 4);
  assert.equal(bands.percentB[2], null);
});

test("atr starts once a previous close exists for every true range", () => {
  const values = atr(
    [
      { high: 10, low: 8, close: 9 },
      { high: 11, low: 9, close: 10 },
      { high: 12, low: 9, close: 11 },
      { high: 13, low: 10, close: 12 },
    ],
    2,
  );
  assert.equal(values[0], null);
  assert.equal(values[1], null);
  approx(values[2], 2.5);
  approx(values[3], 2.75);
});

test("movingAverageColumn builds lower-case column names", () => {
  assert.equal(movingAverageColumn("SMA", 20), "sma_20");
  assert.equal(movingAverageColumn("EMA", 5), "ema_5");
});

test("attachIndicators adds columns and keeps existing ones", () => {
  const bars = flatBars([1, 2, 3, 4]).map((bar) => ({ ...bar, indicators: { custom: 7 } }));
  const enriched = attachIndicators(bars, { sma: [2], volumeMa: 2 });

  assert.equal(enriched.length, 4);
  assert.equal(enriched[0]?.indicators.custom, 7);
  assert.equal(enriched[0]?.indicators.sma_2, null);
  assert.equal(enriched[1]?.indicators.sma_2, 1.5);
  assert.equal(enriched[1]?.indicators.volume_ma, 105);
  approx(enriched[1]?.indicators.volume_ratio, 110 / 105);
  assert.equal(bars[1]?.indicators.custom, 7);
  assert.equal("sma_2" in (bars[1]?.indicators ?? {}), false);
});

test("attachAllIndicators adds the default column set", () => {
  const enriched = attachAllIndicators(flatBars(new Array<number>(60).fill(0).map((_, i) => 100 + i)));
  const columns = Object.keys(enriched[59]?.indicators ?? {}).sort();
  assert.deepEqual(columns, [
    "atr",
    "bb_lower",
    "bb_middle",
    "bb_pctb",
    "bb_upper",
    "ema_10",
    "ema_20",
    "ema_50",
    "macd",
    "macd_histogram",
    "macd_signal",
    "rsi",
    "sma_10",
    "sma_20",
    "sma_50",
    "volume_ma",
    "volume_ratio",
  ]);
  assert.equal(enriched[59]?.indicators.rsi, 100);
});

test("readColumn returns null unless every bar carries the column", () => {
  const full = [{ indicators: { rsi: 40 } }, { indicators: { rsi: Number.NaN } }];
  const partial = [{ indicators: { rsi: 40 } }, {}];
  const expected: IndicatorSeries = [40, null];
  assert.deepEqual(readColumn(full, "rsi"), expected);
  assert.equal(readColumn(partial, "rsi"), null);
  assert.equal(readColumn([], "rsi"), null);
});
