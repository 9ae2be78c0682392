import type { PriceBar, SignalAction } from "@strategy-lab/sdk";

export const metadata = {
  key: "rate_of_change",
  name: "Rate of Change Momentum",
  description: "Buys when the N-bar rate of change rises through the threshold, sells when it falls through its negative",
  version: "1.0.0",
  tags: ["custom", "momentum"],
};

export const configSchema = {
  lookback: {
    type: "number" as const,
    label: "Lookback",
    default: 10,
    min: 1,
    max: 200,
    step: 1,
    description: "Bars between the compared closes",
  },
  threshold: {
    type: "number" as const,
    label: "Threshold %",
    default: 2,
    min: 0,
    max: 50,
    description: "Rate of change, in percent, that triggers a signal",
  },
};

const numberParam = (params: Readonly<Record<string, unknown>>, key: string, fallback: number): number => {
  const value = params[key];
  return typeof value === "number" ? value : fallback;
};

export function createStrategy(params: Readonly<Record<string, unknown>>) {
  const lookback = numberParam(params, "lookback", configSchema.lookback.default);
  const threshold = numberParam(params, "threshold", configSchema.threshold.default);

  const rateOfChange = (bars: ReadonlyArray<PriceBar>, index: number): number | null => {
    const current = bars[index];
    const past = bars[index - lookback];
    if (!current || !past || past.close <= 0) {
      return null;
    }
    return ((current.close - past.close) / past.close) * 100;
  };

  return {
    generateSignals(bars: ReadonlyArray<PriceBar>): SignalAction[] {
      return bars.map((_, index) => {
        const current = rateOfChange(bars, index);
        const previous = rateOfChange(bars, index - 1);
        if (current === null || previous === null) {
          return "HOLD";
        }
        if (previous <= threshold && current > threshold) {
          return "BUY";
        }
        if (previous >= -threshold && current < -threshold) {
          return "SELL";
        }
        return "HOLD";
      });
    },
  };
}
