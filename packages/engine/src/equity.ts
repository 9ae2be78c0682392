import type { EquityPoint, ISODate, PriceBar, Trade } from "@strategy-lab/sdk";

const compareTimestamps = (left: ISODate, right: ISODate): number => {
  const leftTime = Date.parse(left);
  const rightTime = Date.parse(right);
  if (Number.isFinite(leftTime) && Number.isFinite(rightTime)) {
    return leftTime - rightTime;
  }
  return left.localeCompare(right);
};

/**
 * One point per bar. Before the first trade the curve sits at
 * `initialCapital`; from the first bar at or after a trade it holds that
 * trade's portfolio value until the next trade.
 */
export const buildEquityCurve = <T extends Trade>(
  bars: ReadonlyArray<Pick<PriceBar, "timestamp">>,
  trades: ReadonlyArray<T>,
  initialCapital: number,
  valueOf: (trade: T) => number = (trade) => trade.portfolioValueAfter,
): EquityPoint[] => {
  let value = initialCapital;
  let next = 0;

  return bars.map((bar) => {
    let trade = trades[next];
    while (trade && compareTimestamps(trade.timestamp, bar.timestamp) <= 0) {
      value = valueOf(trade);
      next += 1;
      trade = trades[next];
    }
    return { timestamp: bar.timestamp, portfolioValue: value };
  });
};
