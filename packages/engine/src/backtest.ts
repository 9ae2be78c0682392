import { createLogger, type Logger } from "@strategy-lab/logger";
import {
  DEFAULT_TRADING_CONFIG,
  generateSignals,
  type BacktestResult,
  type PriceBar,
  type Strategy,
  type TradingConfig,
} from "@strategy-lab/sdk";

import { applyTransactionCosts } from "./costs.js";
import { buildEquityCurve } from "./equity.js";
import { calculatePerformance } from "./performance.js";
import { simulateTrades } from "./simulator.js";

export interface RunBacktestOptions {
  readonly config?: TradingConfig;
  readonly logger?: Logger;
  readonly runId?: string;
}

/**
 * Entry fraction for a strategy: its own `positionSize` param when it sets a
 * usable one, otherwise the configured default.
 */
export const resolvePositionSizeFraction = (strategy: Strategy, config: TradingConfig): number => {
  const fromParams = strategy.params.positionSize;
  return typeof fromParams === "number" && fromParams > 0 && fromParams <= 1
    ? fromParams
    : config.positionSizeFraction;
};

/**
 * Runs the full pipeline over one series: signals, simulation, costs, equity
 * curve and performance. Synchronous and deterministic; the input bars are
 * never modified.
 *
 * @throws InvalidDataError when a bar lacks `timestamp` or `close`.
 */
export const runBacktest = (
  strategy: Strategy,
  bars: ReadonlyArray<PriceBar>,
  options: RunBacktestOptions = {},
): BacktestResult => {
  const config = options.config ?? DEFAULT_TRADING_CONFIG;
  const logger = options.logger ?? createLogger("engine/backtest");
  const meta = options.runId ? { runId: options.runId } : {};

  const signaled = generateSignals(strategy, bars, { logger: logger.child("signals") });
  const simulation = simulateTrades(signaled, {
    initialCapital: config.initialCapital,
    positionSizeFraction: resolvePositionSizeFraction(strategy, config),
    logger: logger.child("simulator"),
  });
  const { trades: adjustedTrades, costs } = applyTransactionCosts(simulation.trades, config);
  const equityCurve = buildEquityCurve(
    signaled,
    adjustedTrades,
    config.initialCapital,
    (trade) => trade.adjustedPortfolioValue,
  );
  const performance = calculatePerformance({
    initialCapital: config.initialCapital,
    finalValue: simulation.finalValue - costs.totalCosts,
    trades: simulation.trades,
    equityCurve,
    config,
  });

  logger.info("Backtest completed", {
    ...meta,
    strategy: strategy.key,
    bars: simulation.processedBars,
    trades: performance.numTrades,
    totalReturnPct: performance.totalReturnPct,
    totalCosts: costs.totalCosts,
  });

  return {
    strategyKey: strategy.key,
    strategyName: strategy.name,
    params: strategy.params,
    initialCapital: config.initialCapital,
    startedAt: bars[0]?.timestamp ?? null,
    endedAt: bars[bars.length - 1]?.timestamp ?? null,
    bars: signaled,
    trades: simulation.trades,
    adjustedTrades,
    equityCurve,
    performance,
    transactionCosts: costs,
    openQuantity: simulation.openQuantity,
  };
};
