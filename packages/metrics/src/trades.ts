import type { ISODate, Trade } from "@strategy-lab/sdk";

import { mean } from "./stats.js";

/** One BUY matched with the SELL that closed it. */
export interface RoundTrip {
  readonly entryTime: ISODate;
  readonly exitTime: ISODate;
  readonly entryPrice: number;
  readonly exitPrice: number;
  readonly quantity: number;
  /** `(exitPrice − entryPrice) × quantity`, before costs. */
  readonly profit: number;
}

/**
 * Matches SELLs to the oldest unmatched BUY. On an alternating ledger this
 * pairs the i-th BUY with the i-th SELL; an unmatched trailing BUY is left
 * out.
 */
export const pairTrades = (trades: ReadonlyArray<Trade>): RoundTrip[] => {
  const open: Trade[] = [];
  const roundTrips: RoundTrip[] = [];

  for (const trade of trades) {
    if (trade.action === "BUY") {
      open.push(trade);
      continue;
    }
    const entry = open.shift();
    if (!entry) {
      continue;
    }
    roundTrips.push({
      entryTime: entry.timestamp,
      exitTime: trade.timestamp,
      entryPrice: entry.price,
      exitPrice: trade.price,
      quantity: entry.quantity,
      profit: (trade.price - entry.price) * entry.quantity,
    });
  }
  return roundTrips;
};

export interface TradeStats {
  /** Ledger rows, BUYs and SELLs alike. */
  readonly numTrades: number;
  readonly numCompletedTrades: number;
  readonly winningTrades: number;
  readonly losingTrades: number;
  /** Percent of completed trades with a positive profit. */
  readonly winRate: number;
  readonly grossProfit: number;
  readonly grossLoss: number;
  /** `null` when round trips exist but none lost money. */
  readonly profitFactor: number | null;
  readonly avgWin: number;
  /** Mean of the losing profits; negative or 0. */
  readonly avgLoss: number;
  readonly largestWin: number;
  readonly largestLoss: number;
  readonly avgTrade: number;
}

export const calculateTradeStats = (trades: ReadonlyArray<Trade>): TradeStats => {
  const profits = pairTrades(trades).map((roundTrip) => roundTrip.profit);
  const wins = profits.filter((profit) => profit > 0);
  const losses = profits.filter((profit) => profit < 0);
  const grossProfit = wins.reduce((acc, value) => acc + value, 0);
  const grossLoss = Math.abs(losses.reduce((acc, value) => acc + value, 0));

  if (profits.length === 0) {
    return {
      numTrades: trades.length,
      numCompletedTrades: 0,
      winningTrades: 0,
      losingTrades: 0,
      winRate: 0,
      grossProfit: 0,
      grossLoss: 0,
      profitFactor: 0,
      avgWin: 0,
      avgLoss: 0,
      largestWin: 0,
      largestLoss: 0,
      avgTrade: 0,
    };
  }

  return {
    numTrades: trades.length,
    numCompletedTrades: profits.length,
    winningTrades: wins.length,
    losingTrades: losses.length,
    winRate: (wins.length / profits.length) * 100,
    grossProfit,
    grossLoss,
    profitFactor: grossLoss > 0 ? grossProfit / grossLoss : null,
    avgWin: mean(wins),
    avgLoss: mean(losses),
    largestWin: wins.length > 0 ? Math.max(...wins) : 0,
    largestLoss: losses.length > 0 ? Math.min(...losses) : 0,
    avgTrade: mean(profits),
  };
};
