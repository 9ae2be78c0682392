/**
 * Indicator output aligned index-for-index with its input. `null` marks
 * positions without enough history (warm-up) or undefined values.
 */
export type IndicatorSeries = Array<number | null>;

/** Named indicator columns attached to a bar, e.g. `sma_20` or `rsi`. */
export type IndicatorValues = Readonly<Record<string, number | null>>;

/**
 * Minimal bar shape the indicators need; price bars satisfy it structurally.
 */
export interface IndicatorBar {
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
  readonly indicators?: IndicatorValues;
}
