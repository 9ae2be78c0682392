import type { EquityPoint } from "@strategy-lab/sdk";

import { mean, standardDeviation } from "./stats.js";

export type { EquityPoint };

const MS_PER_YEAR = 365.25 * 24 * 60 * 60 * 1000;
export const TRADING_DAYS_PER_YEAR = 252;

export interface RatioOptions {
  /** Annual risk-free rate, spread evenly over the trading days. */
  readonly riskFreeRate?: number;
  readonly tradingDaysPerYear?: number;
}

/**
 * Bar-over-bar simple returns. Bars following a non-positive value are
 * skipped.
 */
export const calculateReturns = (points: ReadonlyArray<EquityPoint>): number[] => {
  if (points.length < 2) {
    return [];
  }
  const returns: number[] = [];
  for (let i = 1; i < points.length; i += 1) {
    const prev = points[i - 1];
    const current = points[i];
    if (!prev || !current || prev.portfolioValue <= 0) {
      continue;
    }
    returns.push((current.portfolioValue - prev.portfolioValue) / prev.portfolioValue);
  }
  return returns;
};

const excessReturns = (points: ReadonlyArray<EquityPoint>, options: RatioOptions): number[] => {
  const riskFreeRate = options.riskFreeRate ?? 0;
  const days = options.tradingDaysPerYear ?? TRADING_DAYS_PER_YEAR;
  return calculateReturns(points).map((value) => value - riskFreeRate / days);
};

/**
 * Annualized Sharpe ratio `mean / stddev × √days` of the excess returns; 0
 * when there is no variation.
 */
export const calculateSharpe = (points: ReadonlyArray<EquityPoint>, options: RatioOptions = {}): number => {
  const returns = excessReturns(points, options);
  if (returns.length === 0) {
    return 0;
  }
  const std = standardDeviation(returns);
  if (std === 0 || !Number.isFinite(std)) {
    return 0;
  }
  return (mean(returns) / std) * Math.sqrt(options.tradingDaysPerYear ?? TRADING_DAYS_PER_YEAR);
};

export const calculateSortino = (points: ReadonlyArray<EquityPoint>, options: RatioOptions = {}): number => {
  const returns = excessReturns(points, options);
  if (returns.length === 0) {
    return 0;
  }
  const downside = returns.filter((value) => value < 0);
  if (downside.length === 0) {
    return 0;
  }
  const downsideVariance = downside.reduce((acc, value) => acc + value * value, 0) / downside.length;
  const downsideStd = Math.sqrt(downsideVariance);
  if (downsideStd === 0) {
    return 0;
  }
  return (mean(returns) / downsideStd) * Math.sqrt(options.tradingDaysPerYear ?? TRADING_DAYS_PER_YEAR);
};

export interface Drawdown {
  /** Deepest peak-to-trough decline in percent; always <= 0. */
  readonly pct: number;
  /** Deepest peak-to-trough decline in currency; always <= 0. */
  readonly value: number;
}

export const calculateDrawdown = (points: ReadonlyArray<EquityPoint>): Drawdown => {
  const first = points[0];
  if (!first) {
    return { pct: 0, value: 0 };
  }
  let peak = first.portfolioValue;
  let pct = 0;
  let value = 0;
  for (const point of points) {
    if (point.portfolioValue > peak) {
      peak = point.portfolioValue;
    }
    const decline = point.portfolioValue - peak;
    if (decline < value) {
      value = decline;
    }
    if (peak > 0) {
      const drawdown = (decline / peak) * 100;
      if (drawdown < pct) {
        pct = drawdown;
      }
    }
  }
  return { pct, value };
};

/** Maximum drawdown in percent (0-100 scale, <= 0). */
export const calculateMaxDrawdown = (points: ReadonlyArray<EquityPoint>): number =>
  calculateDrawdown(points).pct;

export const calculateCagr = (points: ReadonlyArray<EquityPoint>): number => {
  const start = points[0];
  const end = points[points.length - 1];
  if (points.length < 2 || !start || !end) {
    return 0;
  }
  if (start.portfolioValue <= 0 || end.portfolioValue <= 0) {
    return 0;
  }
  const startTime = Date.parse(start.timestamp);
  const endTime = Date.parse(end.timestamp);
  if (!Number.isFinite(startTime) || !Number.isFinite(endTime) || startTime >= endTime) {
    return 0;
  }
  const years = (endTime - startTime) / MS_PER_YEAR;
  return Math.pow(end.portfolioValue / start.portfolioValue, 1 / years) - 1;
};

export interface MetricSummary {
  readonly sharpe: number;
  readonly sortino: number;
  readonly maxDrawdown: number;
  readonly maxDrawdownValue: number;
  readonly cagr: number;
}

export const calculateMetricsSummary = (
  points: ReadonlyArray<EquityPoint>,
  options: RatioOptions = {},
): MetricSummary => {
  const drawdown = calculateDrawdown(points);
  return {
    sharpe: calculateSharpe(points, options),
    sortino: calculateSortino(points, options),
    maxDrawdown: drawdown.pct,
    maxDrawdownValue: drawdown.value,
    cagr: calculateCagr(points),
  };
};

export { mean, standardDeviation } from "./stats.js";
export * from "./trades.js";
