// Source of truth for the data shapes shared across Strategy Lab workspaces.

import { z } from "zod";

import type { IndicatorValues } from "@strategy-lab/indicators";

/** -----------------------------------------------------------------------
 *  Shared enums & primitives
 *  -------------------------------------------------------------------- */

/** ISO-8601 date string (UTC recommended). */
export type ISODate = string;

/** Per-bar decision emitted by a strategy. */
export type SignalAction = "BUY" | "SELL" | "HOLD";

/** Executed side of a trade; HOLD never reaches the ledger. */
export type TradeAction = "BUY" | "SELL";

/** Direction of a position for stop and target placement. */
export type Direction = "LONG" | "SHORT";

/** -----------------------------------------------------------------------
 *  Price series
 *  -------------------------------------------------------------------- */

/**
 * One OHLCV record for a symbol at a fixed interval. Series are ordered
 * ascending by timestamp without duplicates; the core never mutates them.
 */
export interface PriceBar {
  readonly timestamp: ISODate;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
  /** Optional precomputed columns such as `sma_20`, `rsi` or `bb_upper`. */
  readonly indicators?: IndicatorValues;
}

/** Runtime validator for {@link PriceBar}. */
export const PriceBarSchema = z.object({
  timestamp: z.string().min(1),
  open: z.number().finite(),
  high: z.number().finite(),
  low: z.number().finite(),
  close: z.number().finite(),
  volume: z.number().finite().nonnegative(),
  indicators: z.record(z.number().nullable()).optional(),
});

/**
 * The fields signal generation cannot run without. Other OHLCV fields are
 * only read by indicators that need them.
 */
export const SignalInputBarSchema = z
  .object({
    timestamp: z.string().min(1),
    close: z.number().finite(),
  })
  .passthrough();

/** A bar after signal generation. Produced once per run, never mutated. */
export interface SignaledBar extends PriceBar {
  readonly signal: SignalAction;
  /** Conviction in [-1, 1]; positive for BUY, negative for SELL, 0 for HOLD. */
  readonly signalStrength: number;
}

/** -----------------------------------------------------------------------
 *  Ledger & equity
 *  -------------------------------------------------------------------- */

/**
 * Append-only ledger entry. Cost adjustments produce derived values; the
 * economic facts (price, quantity, cash flow) stay as executed.
 */
export interface Trade {
  readonly timestamp: ISODate;
  readonly action: TradeAction;
  readonly price: number;
  readonly quantity: number;
  /** Negative when cash leaves the account (BUY), positive on SELL. */
  readonly cashFlow: number;
  readonly portfolioValueAfter: number;
}

/** Portfolio value sampled at one bar. */
export interface EquityPoint {
  readonly timestamp: ISODate;
  readonly portfolioValue: number;
}

export interface TransactionCosts {
  readonly totalCommission: number;
  readonly totalSlippage: number;
  readonly totalCosts: number;
}

/** Derived, read-only aggregate over one run. Percentages are 0-100 scaled. */
export interface PerformanceReport {
  readonly initialCapital: number;
  readonly finalValue: number;
  readonly totalReturn: number;
  readonly totalReturnPct: number;
  readonly numTrades: number;
  readonly numCompletedTrades: number;
  readonly winRate: number;
  /** `null` when there were no losing round trips (NA). */
  readonly profitFactor: number | null;
  readonly sharpeRatio: number;
  readonly sortinoRatio: number;
  /** Compound annual growth rate, in percent. */
  readonly cagr: number;
  readonly maxDrawdown: number;
  readonly maxDrawdownValue: number;
  readonly avgWin: number;
  readonly avgLoss: number;
  readonly largestWin: number;
  readonly largestLoss: number;
  readonly avgTrade: number;
}

/** -----------------------------------------------------------------------
 *  Re-exports grouped for convenience
 *  -------------------------------------------------------------------- */

/** Namespaced access to the primary schemas. */
export const Schemas = {
  PriceBar: PriceBarSchema,
  SignalInputBar: SignalInputBarSchema,
};

export { assertValid, formatIssues } from "./validation.js";
export * from "./errors.js";
export * from "./results.js";
export * from "./config.js";
export * from "./signals.js";
export * from "./strategies/types.js";
export * as strategies from "./strategies/index.js";
export {
  createStrategy,
  defineStrategy,
  isStrategyKey,
  strategyConfigs,
  strategyList,
  type StrategyConfig,
  type StrategyField,
  type StrategyKey,
} from "./strategies/config.js";
