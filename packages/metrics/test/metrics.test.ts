import { strict as assert } from "node:assert";
import test from "node:test";

import {
  calculateCagr,
  calculateDrawdown,
  calculateMaxDrawdown,
  calculateMetricsSummary,
  calculateReturns,
  calculateSharpe,
  calculateSortino,
  mean,
  standardDeviation,
  type EquityPoint,
} from "../src/index.js";

const curve = (values: ReadonlyArray<number>, start = Date.UTC(2024, 0, 1)): EquityPoint[] =>
  values.map((portfolioValue, index) => ({
    timestamp: new Date(start + index * 86_400_000).toISOString(),
    portfolioValue,
  }));

const approx = (actual: number | undefined, expected: number, tolerance = 1e-6): void => {
  assert.ok(
    typeof actual === "number" && Math.abs(actual - expected) < tolerance,
    `expected ${expected}, received ${String(actual)}`,
  );
};

// Returns of +10%, -10%, +10%.
const zigzag = curve([100, 110, 99, 108.9]);

// ============================================================================
// calculateReturns tests
// ============================================================================

test("calculateReturns computes sequential percentage returns", () => {
  const returns = calculateReturns(zigzag);
  assert.equal(returns.length, 3);
  approx(returns[0], 0.1);
  approx(returns[1], -0.1);
  approx(returns[2], 0.1);
});

test("calculateReturns returns an empty array below two points", () => {
  assert.deepEqual(calculateReturns([]), []);
  assert.deepEqual(calculateReturns(curve([100])), []);
});

test("calculateReturns skips bars after a non-positive value", () => {
  assert.deepEqual(calculateReturns(curve([0, 100])), []);
  assert.deepEqual(calculateReturns(curve([-100, 100])), []);
});

test("calculateReturns of a flat curve is all zeros", () => {
  assert.deepEqual(calculateReturns(curve([100, 100, 100])), [0, 0]);
});

// ============================================================================
// mean & standardDeviation tests
// ============================================================================

test("standardDeviation uses the sample estimator", () => {
  approx(standardDeviation([2, 4, 4, 4, 5, 5, 7, 9]), Math.sqrt(32 / 7));
  assert.equal(standardDeviation([5]), 0);
  assert.equal(mean([]), 0);
});

// ============================================================================
// calculateSharpe tests
// ============================================================================

test("calculateSharpe annualizes mean over sample deviation", () => {
  const expected = ((0.1 / 3) / Math.sqrt(0.04 / 3)) * Math.sqrt(252);
  approx(calculateSharpe(zigzag), expected, 1e-4);
});

test("calculateSharpe returns zero without variation", () => {
  assert.equal(calculateSharpe([]), 0);
  assert.equal(calculateSharpe(curve([100])), 0);
  assert.equal(calculateSharpe(curve([100, 100, 100])), 0);
  assert.equal(calculateSharpe(curve([100, 110])), 0);
});

test("calculateSharpe subtracts the per-day risk-free rate", () => {
  const withRate = calculateSharpe(zigzag, { riskFreeRate: 0.252 });
  const expected = ((0.1 / 3 - 0.001) / Math.sqrt(0.04 / 3)) * Math.sqrt(252);
  approx(withRate, expected, 1e-4);
});

test("calculateSharpe honours a custom annualization", () => {
  const daily = calculateSharpe(zigzag);
  const weekly = calculateSharpe(zigzag, { tradingDaysPerYear: 52 });
  approx(weekly / daily, Math.sqrt(52 / 252));
});

// ============================================================================
// calculateSortino tests
// ============================================================================

test("calculateSortino divides by the downside deviation", () => {
  approx(calculateSortino(zigzag), ((0.1 / 3) / 0.1) * Math.sqrt(252), 1e-4);
});

test("calculateSortino returns zero when nothing went down", () => {
  assert.equal(calculateSortino(curve([100, 110, 121])), 0);
  assert.equal(calculateSortino([]), 0);
});

test("calculateSortino is negative for a falling curve", () => {
  assert.ok(calculateSortino(curve([100, 90, 80])) < 0);
});

// ============================================================================
// Drawdown tests
// ============================================================================

test("calculateDrawdown reports percent and currency depth", () => {
  const drawdown = calculateDrawdown(zigzag);
  approx(drawdown.pct, -10);
  approx(drawdown.value, -11);
});

test("calculateMaxDrawdown is zero for empty or rising curves", () => {
  assert.equal(calculateMaxDrawdown([]), 0);
  assert.equal(calculateMaxDrawdown(curve([100, 110, 121])), 0);
});

test("calculateMaxDrawdown measures from the running peak", () => {
  approx(calculateMaxDrawdown(curve([100, 90, 95, 80])), -20);
  approx(calculateMaxDrawdown(curve([100, 50, 75])), -50);
  assert.equal(calculateMaxDrawdown(curve([100, 0])), -100);
});

// ============================================================================
// calculateCagr tests
// ============================================================================

test("calculateCagr annualizes growth over the elapsed time", () => {
  const points: EquityPoint[] = [
    { timestamp: "2023-01-01T00:00:00.000Z", portfolioValue: 100 },
    { timestamp: "2024-01-01T00:00:00.000Z", portfolioValue: 110 },
  ];
  approx(calculateCagr(points), 0.1, 0.001);
});

test("calculateCagr returns zero for unusable inputs", () => {
  assert.equal(calculateCagr([]), 0);
  assert.equal(calculateCagr(curve([100])), 0);
  assert.equal(calculateCagr(curve([0, 100])), 0);
  assert.equal(
    calculateCagr([
      { timestamp: "invalid", portfolioValue: 100 },
      { timestamp: "2024-01-01T00:00:00.000Z", portfolioValue: 110 },
    ]),
    0,
  );
  assert.equal(
    calculateCagr([
      { timestamp: "2024-01-01T00:00:00.000Z", portfolioValue: 100 },
      { timestamp: "2024-01-01T00:00:00.000Z", portfolioValue: 110 },
    ]),
    0,
  );
});

// ============================================================================
// calculateMetricsSummary tests
// ============================================================================

test("calculateMetricsSummary aggregates the curve metrics", () => {
  const summary = calculateMetricsSummary(zigzag);
  assert.deepEqual(Object.keys(summary).sort(), ["cagr", "maxDrawdown", "maxDrawdownValue", "sharpe", "sortino"]);
  approx(summary.maxDrawdown, -10);
  approx(summary.maxDrawdownValue, -11);
  assert.equal(summary.sharpe, calculateSharpe(zigzag));
});

test("calculateMetricsSummary is idempotent", () => {
  assert.deepEqual(calculateMetricsSummary(zigzag), calculateMetricsSummary(zigzag));
});
