import { z } from "zod";

import { DEFAULT_BOLLINGER, bollingerBands, readColumn } from "@strategy-lab/indicators";

import type { PriceBar, SignaledBar } from "../index.js";
import { withSignal } from "./types.js";
import type { StrategyFactory } from "./types.js";

export const name = "bollinger_reversion" as const;

export const schema = z.object({
  period: z.number().int().min(2).default(DEFAULT_BOLLINGER.period),
  stdDev: z.number().positive().default(DEFAULT_BOLLINGER.stdDev),
  positionSize: z.number().gt(0).max(1).optional(),
});

export type BollingerReversionParams = z.infer<typeof schema>;

export const factory: StrategyFactory<BollingerReversionParams> = (params) => ({
  key: name,
  name: "Bollinger Band Reversion",
  description: `Buy at or below the lower ${params.period}-bar band (${params.stdDev} sd), sell at or above the upper band`,
  params,
  generateSignals(bars: ReadonlyArray<PriceBar>): SignaledBar[] {
    const defaults =
      params.period === DEFAULT_BOLLINGER.period && params.stdDev === DEFAULT_BOLLINGER.stdDev;
    const upperColumn = defaults ? readColumn(bars, "bb_upper") : null;
    const lowerColumn = defaults ? readColumn(bars, "bb_lower") : null;
    const bands =
      upperColumn && lowerColumn
        ? { upper: upperColumn, lower: lowerColumn }
        : bollingerBands(
            bars.map((bar) => bar.close),
            { period: params.period, stdDev: params.stdDev },
          );

    return bars.map((bar, index) => {
      const upper = bands.upper[index];
      const lower = bands.lower[index];
      if (upper === null || upper === undefined || lower === null || lower === undefined) {
        return withSignal(bar, "HOLD", 0);
      }
      if (bar.close <= lower) {
        return withSignal(bar, "BUY", 1);
      }
      if (bar.close >= upper) {
        return withSignal(bar, "SELL", -1);
      }
      return withSignal(bar, "HOLD", 0);
    });
  },
});
