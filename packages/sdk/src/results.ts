import type {
  EquityPoint,
  ISODate,
  PerformanceReport,
  SignaledBar,
  Trade,
  TradeAction,
  TransactionCosts,
} from "./index.js";

/** -----------------------------------------------------------------------
 *  Backtest
 *  -------------------------------------------------------------------- */

/** A ledger entry with its cost-adjusted valuation alongside the raw one. */
export interface CostAdjustedTrade extends Trade {
  readonly commission: number;
  readonly slippage: number;
  /** Costs of this trade plus every earlier one. */
  readonly cumulativeCosts: number;
  readonly adjustedPortfolioValue: number;
}

/**
 * Serializable bundle produced by one backtest, consumable by reporting and
 * persistence.
 */
export interface BacktestResult {
  readonly strategyKey: string;
  readonly strategyName: string;
  readonly params: Readonly<Record<string, unknown>>;
  readonly initialCapital: number;
  readonly startedAt: ISODate | null;
  readonly endedAt: ISODate | null;
  readonly bars: ReadonlyArray<SignaledBar>;
  readonly trades: ReadonlyArray<Trade>;
  readonly adjustedTrades: ReadonlyArray<CostAdjustedTrade>;
  readonly equityCurve: ReadonlyArray<EquityPoint>;
  readonly performance: PerformanceReport;
  readonly transactionCosts: TransactionCosts;
  /** Units still held after the last bar; backtests never auto-close. */
  readonly openQuantity: number;
}

/** -----------------------------------------------------------------------
 *  Paper trading
 *  -------------------------------------------------------------------- */

export type CloseReason = "STOP_LOSS" | "TAKE_PROFIT" | "SIGNAL" | "END_OF_SESSION" | "MANUAL";

/** Open position owned by a paper portfolio; at most one per symbol. */
export interface Position {
  readonly symbol: string;
  readonly quantity: number;
  readonly entryPrice: number;
  readonly entryTime: ISODate;
  readonly stopLoss: number | null;
  readonly takeProfit: number | null;
  readonly currentPrice: number;
  readonly unrealizedPnl: number;
  readonly unrealizedPnlPct: number;
}

export interface PaperTrade {
  readonly timestamp: ISODate;
  readonly symbol: string;
  readonly action: TradeAction;
  readonly quantity: number;
  readonly price: number;
  /** Notional of the fill (quantity × price). */
  readonly value: number;
  readonly cashAfter: number;
  readonly portfolioValueAfter: number;
  /** Realized profit, set on SELL only. */
  readonly realizedPnl: number | null;
  readonly reason: CloseReason | "ENTRY";
}

export interface PaperPerformanceCounters {
  readonly totalTrades: number;
  readonly closedTrades: number;
  readonly winningTrades: number;
  readonly losingTrades: number;
  readonly totalProfit: number;
  readonly totalLoss: number;
}

export interface PortfolioSnapshot {
  readonly initialCapital: number;
  readonly cash: number;
  readonly positions: ReadonlyArray<Position>;
  readonly tradeHistory: ReadonlyArray<PaperTrade>;
  readonly performance: PaperPerformanceCounters;
}

export interface RealizedPerformance {
  readonly finalValue: number;
  readonly totalReturn: number;
  readonly totalReturnPct: number;
  /** Winning closes over all closes, in percent. */
  readonly winRate: number;
  readonly closeReasons: Readonly<Record<CloseReason, number>>;
}

export interface PaperTradingResult {
  readonly strategyName: string;
  readonly symbol: string;
  readonly portfolio: PortfolioSnapshot;
  readonly equityCurve: ReadonlyArray<EquityPoint>;
  readonly performance: RealizedPerformance;
}

/** -----------------------------------------------------------------------
 *  Optimization & comparison
 *  -------------------------------------------------------------------- */

export interface OptimizationRow {
  readonly params: Readonly<Record<string, unknown>>;
  readonly totalReturn: number;
  readonly totalReturnPct: number;
  /** Completed round trips. */
  readonly numTrades: number;
  readonly winRate: number;
  readonly sharpeRatio: number;
}

export interface OptimizationResult {
  readonly strategyKey: string;
  readonly evaluated: number;
  readonly skipped: number;
  /** Sorted by `totalReturnPct`, best first. */
  readonly rows: ReadonlyArray<OptimizationRow>;
}

export interface ComparisonRow {
  readonly strategyName: string;
  readonly totalReturn: number;
  readonly totalReturnPct: number;
  readonly sharpeRatio: number;
  readonly maxDrawdown: number;
  readonly numTrades: number;
  readonly winRate: number;
  readonly profitFactor: number | null;
}

/** -----------------------------------------------------------------------
 *  Risk
 *  -------------------------------------------------------------------- */

/** Position as seen by the portfolio risk aggregate. */
export interface RiskPosition {
  readonly positionValue: number;
  /** Capital lost if the stop is hit. */
  readonly riskAmount: number;
}

export interface PortfolioRiskSummary {
  readonly totalExposure: number;
  readonly totalRisk: number;
  readonly portfolioRiskPct: number;
  readonly numPositions: number;
  readonly leverage: number;
}
