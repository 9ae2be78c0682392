import { z } from "zod";

import { movingAverage, movingAverageColumn, readColumn } from "@strategy-lab/indicators";

import type { PriceBar, SignaledBar } from "../index.js";
import { crossoverAt, withSignal } from "./types.js";
import type { StrategyFactory } from "./types.js";

export const name = "ma_crossover" as const;

export const schema = z
  .object({
    fastPeriod: z.number().int().min(1).default(10),
    slowPeriod: z.number().int().min(2).default(20),
    maType: z.enum(["SMA", "EMA"]).default("SMA"),
    positionSize: z.number().gt(0).max(1).optional(),
  })
  .superRefine((value, ctx) => {
    if (value.fastPeriod >= value.slowPeriod) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "fastPeriod must be less than slowPeriod",
        path: ["fastPeriod"],
      });
    }
  });

export type MaCrossoverParams = z.infer<typeof schema>;

export const factory: StrategyFactory<MaCrossoverParams> = (params) => {
  const fastColumn = movingAverageColumn(params.maType, params.fastPeriod);
  const slowColumn = movingAverageColumn(params.maType, params.slowPeriod);

  return {
    key: name,
    name: "Moving Average Crossover",
    description:
      `Buy when ${params.maType}${params.fastPeriod} crosses above ${params.maType}${params.slowPeriod}, ` +
      "sell when it crosses below",
    params,
    generateSignals(bars: ReadonlyArray<PriceBar>): SignaledBar[] {
      const closes = bars.map((bar) => bar.close);
      const fast = readColumn(bars, fastColumn) ?? movingAverage(closes, params.maType, params.fastPeriod);
      const slow = readColumn(bars, slowColumn) ?? movingAverage(closes, params.maType, params.slowPeriod);

      return bars.map((bar, index) => {
        const crossing = crossoverAt(fast, slow, index);
        if (crossing === "BUY") {
          return withSignal(bar, "BUY", 1);
        }
        if (crossing === "SELL") {
          return withSignal(bar, "SELL", -1);
        }
        return withSignal(bar, "HOLD", 0);
      });
    },
  };
};
