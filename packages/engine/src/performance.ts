import { calculateMetricsSummary, calculateTradeStats } from "@strategy-lab/metrics";
import {
  DEFAULT_TRADING_CONFIG,
  type EquityPoint,
  type PerformanceReport,
  type Trade,
  type TradingConfig,
} from "@strategy-lab/sdk";

export interface PerformanceInput {
  readonly initialCapital: number;
  readonly finalValue: number;
  readonly trades: ReadonlyArray<Trade>;
  readonly equityCurve: ReadonlyArray<EquityPoint>;
  readonly config?: Pick<TradingConfig, "riskFreeRate" | "tradingDaysPerYear">;
}

/**
 * Derives the full report for one run. Pure: the same inputs always give the
 * same report.
 */
export const calculatePerformance = (input: PerformanceInput): PerformanceReport => {
  const config = input.config ?? DEFAULT_TRADING_CONFIG;
  const stats = calculateTradeStats(input.trades);
  const curve = calculateMetricsSummary(input.equityCurve, {
    riskFreeRate: config.riskFreeRate,
    tradingDaysPerYear: config.tradingDaysPerYear,
  });
  const totalReturn = input.finalValue - input.initialCapital;

  return {
    initialCapital: input.initialCapital,
    finalValue: input.finalValue,
    totalReturn,
    totalReturnPct: input.initialCapital > 0 ? (totalReturn / input.initialCapital) * 100 : 0,
    numTrades: stats.numTrades,
    numCompletedTrades: stats.numCompletedTrades,
    winRate: stats.winRate,
    profitFactor: stats.profitFactor,
    sharpeRatio: curve.sharpe,
    sortinoRatio: curve.sortino,
    cagr: curve.cagr * 100,
    maxDrawdown: curve.maxDrawdown,
    maxDrawdownValue: curve.maxDrawdownValue,
    avgWin: stats.avgWin,
    avgLoss: stats.avgLoss,
    largestWin: stats.largestWin,
    largestLoss: stats.largestLoss,
    avgTrade: stats.avgTrade,
  };
};
