import { z } from "zod";

import { readColumn, rsi } from "@strategy-lab/indicators";

import type { PriceBar, SignaledBar } from "../index.js";
import { withSignal } from "./types.js";
import type { StrategyFactory } from "./types.js";

export const name = "rsi_mean_reversion" as const;

/** Period whose values the bare `rsi` indicator column is assumed to hold. */
export const DEFAULT_RSI_PERIOD = 14;

export const schema = z
  .object({
    period: z.number().int().min(1).default(DEFAULT_RSI_PERIOD),
    oversold: z.number().gt(0).lt(100).default(30),
    overbought: z.number().gt(0).lt(100).default(70),
    positionSize: z.number().gt(0).max(1).optional(),
  })
  .superRefine((value, ctx) => {
    if (value.oversold >= value.overbought) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "oversold must be less than overbought",
        path: ["oversold"],
      });
    }
  });

export type RsiMeanReversionParams = z.infer<typeof schema>;

const resolveRsi = (bars: ReadonlyArray<PriceBar>, period: number) =>
  readColumn(bars, `rsi_${period}`) ??
  (period === DEFAULT_RSI_PERIOD ? readColumn(bars, "rsi") : null) ??
  rsi(
    bars.map((bar) => bar.close),
    period,
  );

export const factory: StrategyFactory<RsiMeanReversionParams> = (params) => ({
  key: name,
  name: "RSI Mean Reversion",
  description: `Buy when RSI is at or below ${params.oversold}, sell when it is at or above ${params.overbought}`,
  params,
  generateSignals(bars: ReadonlyArray<PriceBar>): SignaledBar[] {
    const values = resolveRsi(bars, params.period);

    return bars.map((bar, index) => {
      const value = values[index];
      if (value === null || value === undefined) {
        return withSignal(bar, "HOLD", 0);
      }
      if (value <= params.oversold) {
        // stronger the deeper into oversold territory
        return withSignal(bar, "BUY", (params.oversold - value) / params.oversold);
      }
      if (value >= params.overbought) {
        return withSignal(bar, "SELL", -(value - params.overbought) / (100 - params.overbought));
      }
      return withSignal(bar, "HOLD", 0);
    });
  },
});
