import { createLogger, type Logger } from "@strategy-lab/logger";
import {
  DEFAULT_TRADING_CONFIG,
  DegenerateRiskInputError,
  type Direction,
  type PortfolioRiskSummary,
  type RiskPosition,
  type TradingConfig,
} from "@strategy-lab/sdk";

/** Fraction of capital used whenever a sizing input is unusable. */
export const FALLBACK_RISK_PCT = 0.02;

export interface RiskOptions {
  readonly logger?: Logger;
}

const resolveLogger = (options: RiskOptions): Logger => options.logger ?? createLogger("risk");

const warnDegenerate = (logger: Logger, error: DegenerateRiskInputError, meta: Record<string, unknown>) => {
  logger.warn(error.message, { code: error.code, input: error.input, ...meta });
};

/**
 * Risk limits applied when sizing and protecting new entries.
 */
export interface RiskLimits {
  readonly stopLossPct: number;
  readonly takeProfitPct: number;
  readonly maxPortfolioRisk: number;
  readonly maxKellyFraction: number;
}

/**
 * Returns the risk limits carried by a trading configuration.
 */
export const createDefaultRiskLimits = (config: TradingConfig = DEFAULT_TRADING_CONFIG): RiskLimits => {
  return {
    stopLossPct: config.stopLossPct,
    takeProfitPct: config.takeProfitPct,
    maxPortfolioRisk: config.maxPortfolioRisk,
    maxKellyFraction: config.maxKellyFraction,
  };
};

/** -----------------------------------------------------------------------
 *  Position sizing
 *  -------------------------------------------------------------------- */

export const calculatePositionSizeFixed = (capital: number, riskPct = FALLBACK_RISK_PCT): number =>
  capital * riskPct;

export interface KellyInput {
  readonly capital: number;
  /** Fraction of winning trades in [0, 1]; `null` when unknown. */
  readonly winRate: number | null;
  readonly avgWin: number;
  /** Average losing trade; its sign is ignored. */
  readonly avgLoss: number;
  readonly maxKellyFraction?: number;
}

/**
 * Kelly criterion sizing `f = (p·b − q) / b`, clamped to
 * `[0, maxKellyFraction]`. Falls back to a fixed 2% when the payoff ratio or
 * win rate is undefined.
 */
export const calculatePositionSizeKelly = (input: KellyInput, options: RiskOptions = {}): number => {
  const { capital, winRate, avgWin, avgLoss, maxKellyFraction = 0.5 } = input;

  if (avgLoss === 0 || winRate === null || Number.isNaN(winRate) || winRate === 0) {
    const input = avgLoss === 0 ? "avgLoss" : "winRate";
    warnDegenerate(
      resolveLogger(options),
      new DegenerateRiskInputError(input, `Kelly input ${input} is unusable, using 2% fixed sizing`),
      { capital },
    );
    return calculatePositionSizeFixed(capital, FALLBACK_RISK_PCT);
  }

  const winLossRatio = avgWin / Math.abs(avgLoss);
  const kellyFraction = (winRate * winLossRatio - (1 - winRate)) / winLossRatio;
  const clamped = Math.max(Math.min(kellyFraction, maxKellyFraction), 0);
  return capital * clamped;
};

export interface AtrSizingInput {
  readonly capital: number;
  readonly riskPct: number;
  readonly atr: number;
  readonly price: number;
  readonly atrMultiplier?: number;
}

export interface AtrPositionSize {
  readonly units: number;
  readonly positionValue: number;
  readonly stopDistance: number;
}

/**
 * Volatility-scaled sizing: risk `capital × riskPct` over a stop placed
 * `atr × atrMultiplier` away.
 */
export const calculatePositionSizeAtr = (input: AtrSizingInput, options: RiskOptions = {}): AtrPositionSize => {
  const { capital, riskPct, atr, price, atrMultiplier = 2 } = input;
  const stopDistance = atr * atrMultiplier;

  if (!(stopDistance > 0)) {
    warnDegenerate(
      resolveLogger(options),
      new DegenerateRiskInputError("atr", "Stop distance is not positive, using 2% fixed sizing"),
      { atr, atrMultiplier },
    );
    const positionValue = calculatePositionSizeFixed(capital, FALLBACK_RISK_PCT);
    return {
      units: price > 0 ? positionValue / price : 0,
      positionValue,
      stopDistance: 0,
    };
  }

  const units = (capital * riskPct) / stopDistance;
  return { units, positionValue: units * price, stopDistance };
};

/** -----------------------------------------------------------------------
 *  Stops & targets
 *  -------------------------------------------------------------------- */

export const calculateStopLoss = (entryPrice: number, stopPct = 0.02, direction: Direction = "LONG"): number =>
  direction === "LONG" ? entryPrice * (1 - stopPct) : entryPrice * (1 + stopPct);

export const calculateTakeProfit = (
  entryPrice: number,
  profitPct = 0.05,
  direction: Direction = "LONG",
): number => (direction === "LONG" ? entryPrice * (1 + profitPct) : entryPrice * (1 - profitPct));

export interface Bracket {
  readonly stopLoss: number;
  readonly takeProfit: number;
}

/** Stop-loss and take-profit for a new entry under the given limits. */
export const calculateBracket = (
  entryPrice: number,
  limits: Pick<RiskLimits, "stopLossPct" | "takeProfitPct">,
  direction: Direction = "LONG",
): Bracket => ({
  stopLoss: calculateStopLoss(entryPrice, limits.stopLossPct, direction),
  takeProfit: calculateTakeProfit(entryPrice, limits.takeProfitPct, direction),
});

/**
 * Reward over risk. `null` when entry and stop coincide.
 */
export const calculateRiskRewardRatio = (
  entryPrice: number,
  stopLoss: number,
  takeProfit: number,
  options: RiskOptions = {},
): number | null => {
  const risk = Math.abs(entryPrice - stopLoss);
  const reward = Math.abs(takeProfit - entryPrice);
  if (risk === 0) {
    warnDegenerate(
      resolveLogger(options),
      new DegenerateRiskInputError("stopLoss", "Risk is zero, cannot calculate risk/reward ratio"),
      { entryPrice },
    );
    return null;
  }
  return reward / risk;
};

export const checkStopLoss = (currentPrice: number, stopLoss: number, direction: Direction = "LONG"): boolean =>
  direction === "LONG" ? currentPrice <= stopLoss : currentPrice >= stopLoss;

export const checkTakeProfit = (
  currentPrice: number,
  takeProfit: number,
  direction: Direction = "LONG",
): boolean => (direction === "LONG" ? currentPrice >= takeProfit : currentPrice <= takeProfit);

export interface TrailingStopInput {
  readonly currentPrice: number;
  readonly currentStop: number;
  readonly trailPct?: number;
  readonly direction?: Direction;
}

/**
 * Re-anchors the stop to the current price but only ever tightens it: up for
 * LONG, down for SHORT.
 */
export const calculateTrailingStop = (input: TrailingStopInput, options: RiskOptions = {}): number => {
  const { currentPrice, currentStop, trailPct = 0.02, direction = "LONG" } = input;
  const candidate = direction === "LONG" ? currentPrice * (1 - trailPct) : currentPrice * (1 + trailPct);
  const next = direction === "LONG" ? Math.max(candidate, currentStop) : Math.min(candidate, currentStop);
  if (next !== currentStop) {
    resolveLogger(options).debug("Trailing stop moved", { from: currentStop, to: next, direction });
  }
  return next;
};

/** -----------------------------------------------------------------------
 *  Portfolio risk
 *  -------------------------------------------------------------------- */

/**
 * Sums exposure and at-risk capital across positions. Percentages are 0-100
 * scaled; leverage is exposure over capital.
 */
export const calculatePortfolioRisk = (
  positions: ReadonlyArray<RiskPosition>,
  totalCapital: number,
  options: RiskOptions = {},
): PortfolioRiskSummary => {
  const totalExposure = positions.reduce((sum, position) => sum + position.positionValue, 0);
  const totalRisk = positions.reduce((sum, position) => sum + position.riskAmount, 0);

  if (positions.length === 0) {
    return { totalExposure: 0, totalRisk: 0, portfolioRiskPct: 0, numPositions: 0, leverage: 0 };
  }
  if (!(totalCapital > 0)) {
    warnDegenerate(
      resolveLogger(options),
      new DegenerateRiskInputError("totalCapital", "Capital is not positive, reporting zero risk share"),
      { totalCapital },
    );
    return { totalExposure, totalRisk, portfolioRiskPct: 0, numPositions: positions.length, leverage: 0 };
  }

  return {
    totalExposure,
    totalRisk,
    portfolioRiskPct: (totalRisk / totalCapital) * 100,
    numPositions: positions.length,
    leverage: totalExposure / totalCapital,
  };
};

/**
 * Capital still available for new risk once existing positions are counted.
 */
export const calculateMaxPositionSize = (
  capital: number,
  maxPortfolioRisk = 0.1,
  currentPositions: ReadonlyArray<RiskPosition> = [],
  options: RiskOptions = {},
): number => {
  const current = calculatePortfolioRisk(currentPositions, capital, options);
  const remaining = Math.max(0, maxPortfolioRisk - current.portfolioRiskPct / 100);
  return capital * remaining;
};

/**
 * True when adding `proposed` keeps portfolio risk at or under `maxRisk`.
 * Without positive capital only risk-free positions pass.
 */
export const checkRiskLimits = (
  proposed: RiskPosition,
  currentPositions: ReadonlyArray<RiskPosition>,
  capital: number,
  maxRisk = 0.1,
  options: RiskOptions = {},
): boolean => {
  const next = calculatePortfolioRisk([...currentPositions, proposed], capital, options);
  if (!(capital > 0)) {
    return next.totalRisk <= 0;
  }
  const withinLimits = next.portfolioRiskPct <= maxRisk * 100;
  if (!withinLimits) {
    resolveLogger(options).warn("Risk limit exceeded", {
      portfolioRiskPct: next.portfolioRiskPct,
      maxRiskPct: maxRisk * 100,
    });
  }
  return withinLimits;
};
