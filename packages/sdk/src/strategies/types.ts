import type { PriceBar, SignalAction, SignaledBar } from "../index.js";

export type StrategyParams = Readonly<Record<string, unknown>>;

/**
 * A trading rule. `generateSignals` is a pure function of the strategy's
 * params and the bars: one signaled bar per input bar, in input order.
 */
export interface Strategy<P extends StrategyParams = StrategyParams> {
  /** Registry slug, e.g. "ma_crossover". */
  readonly key: string;
  /** Human readable name that appears in reports. */
  readonly name: string;
  readonly description: string;
  readonly params: P;
  generateSignals(bars: ReadonlyArray<PriceBar>): SignaledBar[];
}

export type StrategyFactory<P extends StrategyParams> = (params: P) => Strategy<P>;

export const withSignal = (bar: PriceBar, signal: SignalAction, signalStrength: number): SignaledBar => ({
  ...bar,
  signal,
  signalStrength,
});

export const holdAll = (bars: ReadonlyArray<PriceBar>): SignaledBar[] =>
  bars.map((bar) => withSignal(bar, "HOLD", 0));

/**
 * Crossover test shared by the line-vs-line strategies. Ties on the prior bar
 * count as "not yet crossed"; the current bar must be strictly across.
 */
export const crossoverAt = (
  fast: ReadonlyArray<number | null>,
  slow: ReadonlyArray<number | null>,
  index: number,
): "BUY" | "SELL" | null => {
  if (index < 1) {
    return null;
  }
  const prevFast = fast[index - 1];
  const prevSlow = slow[index - 1];
  const currFast = fast[index];
  const currSlow = slow[index];
  if (
    prevFast === null || prevFast === undefined ||
    prevSlow === null || prevSlow === undefined ||
    currFast === null || currFast === undefined ||
    currSlow === null || currSlow === undefined
  ) {
    return null;
  }
  if (prevFast <= prevSlow && currFast > currSlow) {
    return "BUY";
  }
  if (prevFast >= prevSlow && currFast < currSlow) {
    return "SELL";
  }
  return null;
};
