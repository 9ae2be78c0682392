import type { IndicatorValues } from "@strategy-lab/indicators";

import type { PriceBar } from "../src/index.js";

/** Daily bars with the given closes; OHLC collapse onto the close. */
export const barsFromCloses = (
  closes: ReadonlyArray<number>,
  indicators?: ReadonlyArray<IndicatorValues>,
): PriceBar[] =>
  closes.map((close, index) => {
    const day = new Date(Date.UTC(2024, 0, 1 + index)).toISOString();
    const columns = indicators?.[index];
    return {
      timestamp: day,
      open: close,
      high: close,
      low: close,
      close,
      volume: 1_000,
      ...(columns ? { indicators: columns } : {}),
    };
  });
