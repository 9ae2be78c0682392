import { z } from "zod";

import { DEFAULT_MACD, macd, readColumn } from "@strategy-lab/indicators";

import type { PriceBar, SignaledBar } from "../index.js";
import { crossoverAt, withSignal } from "./types.js";
import type { StrategyFactory } from "./types.js";

export const name = "macd_crossover" as const;

export const schema = z
  .object({
    fastPeriod: z.number().int().min(1).default(DEFAULT_MACD.fast),
    slowPeriod: z.number().int().min(2).default(DEFAULT_MACD.slow),
    signalPeriod: z.number().int().min(1).default(DEFAULT_MACD.signal),
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

export type MacdCrossoverParams = z.infer<typeof schema>;

const usesDefaultPeriods = (params: MacdCrossoverParams): boolean =>
  params.fastPeriod === DEFAULT_MACD.fast &&
  params.slowPeriod === DEFAULT_MACD.slow &&
  params.signalPeriod === DEFAULT_MACD.signal;

export const factory: StrategyFactory<MacdCrossoverParams> = (params) => ({
  key: name,
  name: "MACD Crossover",
  description: `Buy when MACD(${params.fastPeriod},${params.slowPeriod}) crosses above its ${params.signalPeriod}-bar signal line, sell when it crosses below`,
  params,
  generateSignals(bars: ReadonlyArray<PriceBar>): SignaledBar[] {
    const precomputedLine = usesDefaultPeriods(params) ? readColumn(bars, "macd") : null;
    const precomputedSignal = usesDefaultPeriods(params) ? readColumn(bars, "macd_signal") : null;
    const computed =
      precomputedLine && precomputedSignal
        ? { macd: precomputedLine, signal: precomputedSignal }
        : macd(
            bars.map((bar) => bar.close),
            { fast: params.fastPeriod, slow: params.slowPeriod, signal: params.signalPeriod },
          );

    return bars.map((bar, index) => {
      const crossing = crossoverAt(computed.macd, computed.signal, index);
      if (crossing === "BUY") {
        return withSignal(bar, "BUY", 1);
      }
      if (crossing === "SELL") {
        return withSignal(bar, "SELL", -1);
      }
      return withSignal(bar, "HOLD", 0);
    });
  },
});
