import type { CostAdjustedTrade, Trade, TradingConfig, TransactionCosts } from "@strategy-lab/sdk";

export type CostRates = Pick<TradingConfig, "commissionRate" | "slippageRate">;

export interface CostApplication {
  readonly trades: CostAdjustedTrade[];
  readonly costs: TransactionCosts;
}

/**
 * Charges commission and slippage on the notional of every fill. The ledger
 * is left as executed: each trade comes back with its cost and a portfolio
 * value net of every cost paid so far.
 */
export const applyTransactionCosts = (trades: ReadonlyArray<Trade>, rates: CostRates): CostApplication => {
  let totalCommission = 0;
  let totalSlippage = 0;

  const adjusted = trades.map((trade): CostAdjustedTrade => {
    const notional = Math.abs(trade.cashFlow);
    const commission = notional * rates.commissionRate;
    const slippage = notional * rates.slippageRate;
    totalCommission += commission;
    totalSlippage += slippage;
    const cumulativeCosts = totalCommission + totalSlippage;
    return {
      ...trade,
      commission,
      slippage,
      cumulativeCosts,
      adjustedPortfolioValue: trade.portfolioValueAfter - cumulativeCosts,
    };
  });

  return {
    trades: adjusted,
    costs: {
      totalCommission,
      totalSlippage,
      totalCosts: totalCommission + totalSlippage,
    },
  };
};
