import type { PriceBar, SignalAction, SignaledBar, Strategy, StrategyParams } from "@strategy-lab/sdk";

/** Daily bars with the given closes; OHLC collapse onto the close. */
export const barsFromCloses = (closes: ReadonlyArray<number>): PriceBar[] =>
  closes.map((close, index) => ({
    timestamp: new Date(Date.UTC(2024, 0, 1 + index)).toISOString(),
    open: close,
    high: close,
    low: close,
    close,
    volume: 1_000,
  }));

/** Strategy that replays a fixed signal list; missing entries are HOLD. */
export const scriptedStrategy = (
  signals: ReadonlyArray<SignalAction>,
  params: StrategyParams = {},
  name = "Scripted",
): Strategy => ({
  key: "scripted",
  name,
  description: "Replays a fixed list of signals",
  params,
  generateSignals(bars: ReadonlyArray<PriceBar>): SignaledBar[] {
    return bars.map((bar, index) => {
      const signal = signals[index] ?? "HOLD";
      const signalStrength = signal === "BUY" ? 1 : signal === "SELL" ? -1 : 0;
      return { ...bar, signal, signalStrength };
    });
  },
});

export const signaled = (closes: ReadonlyArray<number>, signals: ReadonlyArray<SignalAction>): SignaledBar[] =>
  scriptedStrategy(signals).generateSignals(barsFromCloses(closes));

export const approx = (actual: number | null | undefined, expected: number, tolerance = 1e-6): void => {
  if (actual === null || actual === undefined || Math.abs(actual - expected) >= tolerance) {
    throw new Error(`expected ${expected}, received ${String(actual)}`);
  }
};

/** Worked example: buy 9.5 units at 100, sell them at 90. */
export const WORKED_CLOSES = [100, 110, 90, 120] as const;
export const WORKED_SIGNALS: ReadonlyArray<SignalAction> = ["BUY", "HOLD", "SELL", "HOLD"];
