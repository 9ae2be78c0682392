import { createLogger, type Logger } from "@strategy-lab/logger";
import type { BacktestResult, ComparisonRow, PriceBar, Strategy, TradingConfig } from "@strategy-lab/sdk";

import { runBacktest } from "./backtest.js";

export interface CompareStrategiesOptions {
  readonly config?: TradingConfig;
  readonly logger?: Logger;
}

export interface StrategyComparison {
  readonly results: ReadonlyArray<BacktestResult>;
  /** Best total return first. */
  readonly rows: ReadonlyArray<ComparisonRow>;
}

export const toComparisonRow = (result: BacktestResult): ComparisonRow => ({
  strategyName: result.strategyName,
  totalReturn: result.performance.totalReturn,
  totalReturnPct: result.performance.totalReturnPct,
  sharpeRatio: result.performance.sharpeRatio,
  maxDrawdown: result.performance.maxDrawdown,
  numTrades: result.performance.numCompletedTrades,
  winRate: result.performance.winRate,
  profitFactor: result.performance.profitFactor,
});

/**
 * Backtests every strategy over the same bars and configuration.
 */
export const compareStrategies = (
  candidates: ReadonlyArray<Strategy>,
  bars: ReadonlyArray<PriceBar>,
  options: CompareStrategiesOptions = {},
): StrategyComparison => {
  const logger = options.logger ?? createLogger("engine/compare");
  const results = candidates.map((strategy) =>
    runBacktest(strategy, bars, { config: options.config, logger: logger.child(strategy.key) }),
  );
  const rows = results
    .map(toComparisonRow)
    .sort((left, right) => right.totalReturnPct - left.totalReturnPct);

  logger.info("Compared strategies", {
    strategies: candidates.length,
    best: rows[0]?.strategyName ?? null,
  });
  return { results, rows };
};
