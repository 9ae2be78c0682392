import { ema, sma } from "./movingAverages.js";
import { DEFAULT_MACD, macd, rsi, type MacdOptions } from "./oscillators.js";
import type { IndicatorBar, IndicatorSeries, IndicatorValues } from "./types.js";
import { DEFAULT_BOLLINGER, atr, bollingerBands, type BollingerOptions } from "./volatility.js";

export type MovingAverageType = "SMA" | "EMA";

export interface IndicatorOptions {
  readonly sma?: ReadonlyArray<number>;
  readonly ema?: ReadonlyArray<number>;
  readonly rsi?: number;
  readonly macd?: MacdOptions;
  readonly bollinger?: BollingerOptions;
  readonly atr?: number;
  readonly volumeMa?: number;
}

/** The full indicator set added by {@link attachAllIndicators}. */
export const DEFAULT_INDICATOR_OPTIONS: IndicatorOptions = {
  sma: [10, 20, 50],
  ema: [10, 20, 50],
  rsi: 14,
  macd: DEFAULT_MACD,
  bollinger: DEFAULT_BOLLINGER,
  atr: 14,
  volumeMa: 20,
};

/** Column name of a moving average, e.g. `sma_20` or `ema_10`. */
export const movingAverageColumn = (type: MovingAverageType, period: number): string =>
  `${type.toLowerCase()}_${period}`;

export const movingAverage = (
  values: ReadonlyArray<number>,
  type: MovingAverageType,
  period: number,
): IndicatorSeries => (type === "EMA" ? ema(values, period) : sma(values, period));

/**
 * Reads a precomputed column when every bar carries it, otherwise returns null
 * so the caller can compute it.
 */
export const readColumn = (
  bars: ReadonlyArray<{ readonly indicators?: IndicatorValues }>,
  column: string,
): IndicatorSeries | null => {
  if (bars.length === 0) {
    return null;
  }
  const values: IndicatorSeries = [];
  for (const bar of bars) {
    const value = bar.indicators?.[column];
    if (value === undefined) {
      return null;
    }
    values.push(value === null || Number.isNaN(value) ? null : value);
  }
  return values;
};

/**
 * Computes the requested indicator columns and returns new bars carrying them
 * under `indicators`, merged over any columns the bars already had.
 */
export const attachIndicators = <T extends IndicatorBar>(
  bars: ReadonlyArray<T>,
  options: IndicatorOptions,
): Array<T & { readonly indicators: IndicatorValues }> => {
  const closes = bars.map((bar) => bar.close);
  const columns = new Map<string, IndicatorSeries>();

  for (const period of options.sma ?? []) {
    columns.set(movingAverageColumn("SMA", period), sma(closes, period));
  }
  for (const period of options.ema ?? []) {
    columns.set(movingAverageColumn("EMA", period), ema(closes, period));
  }
  if (options.rsi !== undefined) {
    columns.set("rsi", rsi(closes, options.rsi));
  }
  if (options.macd) {
    const series = macd(closes, options.macd);
    columns.set("macd", series.macd);
    columns.set("macd_signal", series.signal);
    columns.set("macd_histogram", series.histogram);
  }
  if (options.bollinger) {
    const bands = bollingerBands(closes, options.bollinger);
    columns.set("bb_upper", bands.upper);
    columns.set("bb_middle", bands.middle);
    columns.set("bb_lower", bands.lower);
    columns.set("bb_pctb", bands.percentB);
  }
  if (options.atr !== undefined) {
    columns.set("atr", atr(bars, options.atr));
  }
  if (options.volumeMa !== undefined) {
    const volumes = bars.map((bar) => bar.volume);
    const volumeMa = sma(volumes, options.volumeMa);
    columns.set("volume_ma", volumeMa);
    columns.set(
      "volume_ratio",
      volumeMa.map((average, index) => {
        const volume = volumes[index];
        return average === null || average === 0 || volume === undefined ? null : volume / average;
      }),
    );
  }

  return bars.map((bar, index) => {
    const added: Record<string, number | null> = {};
    for (const [column, series] of columns) {
      added[column] = series[index] ?? null;
    }
    return { ...bar, indicators: { ...bar.indicators, ...added } };
  });
};

export const attachAllIndicators = <T extends IndicatorBar>(bars: ReadonlyArray<T>) =>
  attachIndicators(bars, DEFAULT_INDICATOR_OPTIONS);
