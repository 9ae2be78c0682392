import { createLogger, type Logger } from "@strategy-lab/logger";
import { calculateBracket, createDefaultRiskLimits } from "@strategy-lab/risk";
import {
  DEFAULT_TRADING_CONFIG,
  InsufficientFundsError,
  generateSignals,
  type CloseReason,
  type EquityPoint,
  type ISODate,
  type PaperPerformanceCounters,
  type PaperTrade,
  type PaperTradingResult,
  type PortfolioSnapshot,
  type Position,
  type PriceBar,
  type RealizedPerformance,
  type Strategy,
  type TradingConfig,
} from "@strategy-lab/sdk";

import { resolvePositionSizeFraction } from "./backtest.js";

export interface OpenPositionOrder {
  readonly symbol: string;
  readonly quantity: number;
  readonly price: number;
  readonly timestamp: ISODate;
  readonly stopLoss?: number | null;
  readonly takeProfit?: number | null;
}

interface MutableCounters {
  totalTrades: number;
  closedTrades: number;
  winningTrades: number;
  losingTrades: number;
  totalProfit: number;
  totalLoss: number;
}

/** Rounding slack allowed when an order spends the whole cash balance. */
const CASH_TOLERANCE = 1e-9;

const emptyCloseReasons = (): Record<CloseReason, number> => ({
  STOP_LOSS: 0,
  TAKE_PROFIT: 0,
  SIGNAL: 0,
  END_OF_SESSION: 0,
  MANUAL: 0,
});

/**
 * Cash plus at most one open position per symbol. Rejected orders are
 * logged and leave the portfolio untouched.
 */
export class PaperPortfolio {
  public readonly initialCapital: number;
  private cashBalance: number;
  private readonly positions = new Map<string, Position>();
  private readonly history: PaperTrade[] = [];
  private readonly counters: MutableCounters = {
    totalTrades: 0,
    closedTrades: 0,
    winningTrades: 0,
    losingTrades: 0,
    totalProfit: 0,
    totalLoss: 0,
  };
  private readonly closeReasons = emptyCloseReasons();
  private readonly logger: Logger;

  public constructor(initialCapital: number = DEFAULT_TRADING_CONFIG.initialCapital, logger?: Logger) {
    this.initialCapital = initialCapital;
    this.cashBalance = initialCapital;
    this.logger = logger ?? createLogger("engine/paper");
  }

  public get cash(): number {
    return this.cashBalance;
  }

  public position(symbol: string): Position | undefined {
    return this.positions.get(symbol);
  }

  public hasPosition(symbol: string): boolean {
    return this.positions.has(symbol);
  }

  /** Cash plus every open position at its last seen price. */
  public value(): number {
    let total = this.cashBalance;
    for (const position of this.positions.values()) {
      total += position.quantity * position.currentPrice;
    }
    return total;
  }

  /**
   * Buys `quantity` at `price`. Returns false, after logging, when the cost
   * exceeds cash or the symbol already has an open position.
   */
  public openPosition(order: OpenPositionOrder): boolean {
    const cost = order.quantity * order.price;
    if (cost - this.cashBalance > CASH_TOLERANCE) {
      const error = new InsufficientFundsError(order.symbol, cost, this.cashBalance);
      this.logger.warn(error.message, { code: error.code, symbol: order.symbol });
      return false;
    }
    if (this.positions.has(order.symbol)) {
      this.logger.warn("Position already open", { symbol: order.symbol });
      return false;
    }

    this.positions.set(order.symbol, {
      symbol: order.symbol,
      quantity: order.quantity,
      entryPrice: order.price,
      entryTime: order.timestamp,
      stopLoss: order.stopLoss ?? null,
      takeProfit: order.takeProfit ?? null,
      currentPrice: order.price,
      unrealizedPnl: 0,
      unrealizedPnlPct: 0,
    });
    this.cashBalance = Math.max(0, this.cashBalance - cost);
    this.counters.totalTrades += 1;
    this.history.push({
      timestamp: order.timestamp,
      symbol: order.symbol,
      action: "BUY",
      quantity: order.quantity,
      price: order.price,
      value: cost,
      cashAfter: this.cashBalance,
      portfolioValueAfter: this.value(),
      realizedPnl: null,
      reason: "ENTRY",
    });
    this.logger.info("Opened position", {
      symbol: order.symbol,
      quantity: order.quantity,
      price: order.price,
      stopLoss: order.stopLoss ?? null,
      takeProfit: order.takeProfit ?? null,
    });
    return true;
  }

  /**
   * Sells the whole position at `price`. Returns the SELL record, or `null`
   * when nothing is open for the symbol.
   */
  public closePosition(
    symbol: string,
    price: number,
    timestamp: ISODate,
    reason: CloseReason = "MANUAL",
  ): PaperTrade | null {
    const position = this.positions.get(symbol);
    if (!position) {
      this.logger.warn("No open position", { symbol });
      return null;
    }

    const proceeds = position.quantity * price;
    const profit = proceeds - position.quantity * position.entryPrice;
    this.positions.delete(symbol);
    this.cashBalance += proceeds;
    this.counters.totalTrades += 1;
    this.counters.closedTrades += 1;
    if (profit > 0) {
      this.counters.winningTrades += 1;
      this.counters.totalProfit += profit;
    } else {
      this.counters.losingTrades += 1;
      this.counters.totalLoss += Math.abs(profit);
    }
    this.closeReasons[reason] += 1;

    const trade: PaperTrade = {
      timestamp,
      symbol,
      action: "SELL",
      quantity: position.quantity,
      price,
      value: proceeds,
      cashAfter: this.cashBalance,
      portfolioValueAfter: this.value(),
      realizedPnl: profit,
      reason,
    };
    this.history.push(trade);
    this.logger.info("Closed position", { symbol, price, profit, reason });
    return trade;
  }

  /**
   * Marks the position to `price`, then closes it on a stop-loss or
   * take-profit hit. Returns the close reason when it closed.
   */
  public updatePosition(symbol: string, price: number, timestamp: ISODate): CloseReason | null {
    const position = this.positions.get(symbol);
    if (!position) {
      return null;
    }

    const costBasis = position.quantity * position.entryPrice;
    const unrealizedPnl = position.quantity * price - costBasis;
    this.positions.set(symbol, {
      ...position,
      currentPrice: price,
      unrealizedPnl,
      unrealizedPnlPct: costBasis > 0 ? (unrealizedPnl / costBasis) * 100 : 0,
    });

    if (position.stopLoss !== null && price <= position.stopLoss) {
      this.closePosition(symbol, price, timestamp, "STOP_LOSS");
      return "STOP_LOSS";
    }
    if (position.takeProfit !== null && price >= position.takeProfit) {
      this.closePosition(symbol, price, timestamp, "TAKE_PROFIT");
      return "TAKE_PROFIT";
    }
    return null;
  }

  public closeReasonCounts(): Readonly<Record<CloseReason, number>> {
    return { ...this.closeReasons };
  }

  public snapshot(): PortfolioSnapshot {
    const performance: PaperPerformanceCounters = { ...this.counters };
    return {
      initialCapital: this.initialCapital,
      cash: this.cashBalance,
      positions: Array.from(this.positions.values()),
      tradeHistory: [...this.history],
      performance,
    };
  }
}

export interface RunPaperTradingOptions {
  readonly symbol?: string;
  readonly config?: TradingConfig;
  readonly logger?: Logger;
}

export const DEFAULT_PAPER_SYMBOL = "ASSET";

/**
 * Steps through the bars as if they arrived live. Per bar the open position
 * is marked and checked against its stop and target, then the signal may
 * open a new position (with a bracket from the risk limits) or close the
 * current one. Whatever is still open after the last bar is closed at the
 * final close.
 *
 * @throws InvalidDataError when a bar lacks `timestamp` or `close`.
 */
export const runPaperTrading = (
  strategy: Strategy,
  bars: ReadonlyArray<PriceBar>,
  options: RunPaperTradingOptions = {},
): PaperTradingResult => {
  const config = options.config ?? DEFAULT_TRADING_CONFIG;
  const symbol = options.symbol ?? DEFAULT_PAPER_SYMBOL;
  const logger = options.logger ?? createLogger("engine/paper");
  const limits = createDefaultRiskLimits(config);
  const positionSizeFraction = resolvePositionSizeFraction(strategy, config);

  const signaled = generateSignals(strategy, bars, { logger: logger.child("signals") });
  const portfolio = new PaperPortfolio(config.initialCapital, logger.child("portfolio"));
  const equityCurve: EquityPoint[] = [];

  logger.info("Starting paper trading session", { strategy: strategy.key, symbol, bars: bars.length });

  for (const bar of signaled) {
    const price = bar.close;
    portfolio.updatePosition(symbol, price, bar.timestamp);

    if (bar.signal === "BUY" && !portfolio.hasPosition(symbol) && price > 0) {
      const quantity = (portfolio.cash * positionSizeFraction) / price;
      const bracket = calculateBracket(price, limits);
      portfolio.openPosition({
        symbol,
        quantity,
        price,
        timestamp: bar.timestamp,
        stopLoss: bracket.stopLoss,
        takeProfit: bracket.takeProfit,
      });
    } else if (bar.signal === "SELL" && portfolio.hasPosition(symbol)) {
      portfolio.closePosition(symbol, price, bar.timestamp, "SIGNAL");
    }

    equityCurve.push({ timestamp: bar.timestamp, portfolioValue: portfolio.value() });
  }

  const last = signaled[signaled.length - 1];
  if (last && portfolio.hasPosition(symbol)) {
    portfolio.closePosition(symbol, last.close, last.timestamp, "END_OF_SESSION");
  }

  const snapshot = portfolio.snapshot();
  const finalValue = portfolio.cash;
  const totalReturn = finalValue - config.initialCapital;
  const performance: RealizedPerformance = {
    finalValue,
    totalReturn,
    totalReturnPct: config.initialCapital > 0 ? (totalReturn / config.initialCapital) * 100 : 0,
    winRate:
      snapshot.performance.closedTrades > 0
        ? (snapshot.performance.winningTrades / snapshot.performance.closedTrades) * 100
        : 0,
    closeReasons: portfolio.closeReasonCounts(),
  };

  logger.info("Paper trading session complete", {
    strategy: strategy.key,
    symbol,
    finalValue,
    totalReturnPct: performance.totalReturnPct,
    closedTrades: snapshot.performance.closedTrades,
  });

  return {
    strategyName: strategy.name,
    symbol,
    portfolio: snapshot,
    equityCurve,
    performance,
  };
};
