import { strict as assert } from "node:assert";
import test from "node:test";

import { createLogger, createSilentLogger } from "@strategy-lab/logger";
import { InvalidDataError, createStrategy, createTradingConfig } from "@strategy-lab/sdk";

import { resolvePositionSizeFraction, runBacktest } from "../src/index.js";
import { WORKED_CLOSES, WORKED_SIGNALS, approx, barsFromCloses, scriptedStrategy } from "./helpers.js";

const config = createTradingConfig({
  initialCapital: 1000,
  positionSizeFraction: 0.95,
  commissionRate: 0.001,
  slippageRate: 0.0005,
});
const logger = createSilentLogger();

test("runBacktest reports performance net of transaction costs", () => {
  const result = runBacktest(scriptedStrategy(WORKED_SIGNALS), barsFromCloses(WORKED_CLOSES), { config, logger });

  approx(result.performance.finalValue, 902.2925);
  approx(result.performance.totalReturn, -97.7075);
  approx(result.performance.totalReturnPct, -9.77075);
  approx(result.transactionCosts.totalCosts, 2.7075);
  assert.equal(result.performance.numTrades, 2);
  assert.equal(result.performance.numCompletedTrades, 1);
  assert.equal(result.performance.winRate, 0);
  assert.equal(result.performance.profitFactor, 0);
  approx(result.performance.avgLoss, -95);
  approx(result.performance.largestLoss, -95);
  assert.equal(result.openQuantity, 0);
});

test("runBacktest builds the equity curve from cost-adjusted values", () => {
  const result = runBacktest(scriptedStrategy(WORKED_SIGNALS), barsFromCloses(WORKED_CLOSES), { config, logger });
  const values = result.equityCurve.map((point) => point.portfolioValue);

  assert.equal(values.length, 4);
  approx(values[0], 998.575);
  approx(values[1], 998.575);
  approx(values[2], 902.2925);
  approx(values[3], 902.2925);
  approx(result.performance.maxDrawdownValue, 902.2925 - 998.575);
  approx(result.performance.maxDrawdown, ((902.2925 - 998.575) / 998.575) * 100);
});

test("runBacktest keeps run metadata and the signaled bars", () => {
  const bars = barsFromCloses(WORKED_CLOSES);
  const result = runBacktest(scriptedStrategy(WORKED_SIGNALS, { lookback: 3 }, "Worked"), bars, { config, logger });

  assert.equal(result.strategyKey, "scripted");
  assert.equal(result.strategyName, "Worked");
  assert.deepEqual(result.params, { lookback: 3 });
  assert.equal(result.startedAt, "2024-01-01T00:00:00.000Z");
  assert.equal(result.endedAt, "2024-01-04T00:00:00.000Z");
  assert.deepEqual(
    result.bars.map((bar) => bar.signal),
    ["BUY", "HOLD", "SELL", "HOLD"],
  );
});

test("runBacktest does not modify the input bars", () => {
  const bars = barsFromCloses(WORKED_CLOSES);
  const before = structuredClone(bars);

  runBacktest(scriptedStrategy(WORKED_SIGNALS), bars, { config, logger });

  assert.deepEqual(bars, before);
});

test("runBacktest with no signals yields a flat curve and zero metrics", () => {
  const result = runBacktest(scriptedStrategy([]), barsFromCloses([100, 101, 99, 102]), { config, logger });

  assert.deepEqual(result.trades, []);
  assert.deepEqual(
    result.equityCurve.map((point) => point.portfolioValue),
    [1000, 1000, 1000, 1000],
  );
  assert.equal(result.performance.totalReturn, 0);
  assert.equal(result.performance.sharpeRatio, 0);
  assert.equal(result.performance.maxDrawdown, 0);
  assert.equal(result.performance.profitFactor, 0);
  assert.equal(result.transactionCosts.totalCosts, 0);
});

test("runBacktest on an empty series returns the initial capital", () => {
  const result = runBacktest(scriptedStrategy([]), [], { config, logger });

  assert.equal(result.performance.finalValue, 1000);
  assert.equal(result.startedAt, null);
  assert.deepEqual(result.equityCurve, []);
});

test("runBacktest leaves a trailing position open without forcing a sale", () => {
  const result = runBacktest(scriptedStrategy(["BUY"]), barsFromCloses([100, 120]), { config, logger });

  approx(result.openQuantity, 9.5);
  assert.equal(result.performance.numCompletedTrades, 0);
  approx(result.performance.finalValue, 50 + 9.5 * 120 - 0.95 - 0.475);
});

test("runBacktest honours a strategy's positionSize param", () => {
  const result = runBacktest(scriptedStrategy(WORKED_SIGNALS, { positionSize: 0.5 }), barsFromCloses(WORKED_CLOSES), {
    config,
    logger,
  });

  approx(result.trades[0]?.quantity, 5);
});

test("resolvePositionSizeFraction ignores unusable positionSize values", () => {
  assert.equal(resolvePositionSizeFraction(scriptedStrategy([], { positionSize: 0.25 }), config), 0.25);
  assert.equal(resolvePositionSizeFraction(scriptedStrategy([], { positionSize: 1.5 }), config), 0.95);
  assert.equal(resolvePositionSizeFraction(scriptedStrategy([], { positionSize: "half" }), config), 0.95);
  assert.equal(resolvePositionSizeFraction(scriptedStrategy([]), config), 0.95);
});

test("runBacktest runs a registered strategy end to end", () => {
  const strategy = createStrategy("ma_crossover", { fastPeriod: 2, slowPeriod: 3 });
  const result = runBacktest(strategy, barsFromCloses([10, 9, 8, 9, 11, 12, 10, 8, 7]), { config, logger });

  assert.deepEqual(
    result.trades.map((trade) => [trade.action, trade.price]),
    [
      ["BUY", 11],
      ["SELL", 8],
    ],
  );
  approx(result.performance.finalValue, 50 + (950 / 11) * 8 - (950 + (950 / 11) * 8) * 0.0015);
});

test("runBacktest rejects bars without a finite close", () => {
  const bars = barsFromCloses([100, 101]).map((bar, index) => (index === 1 ? { ...bar, close: Number.NaN } : bar));

  assert.throws(() => runBacktest(scriptedStrategy([]), bars, { config, logger }), InvalidDataError);
});

test("runBacktest logs a completion line tagged with the run id", () => {
  const lines: string[] = [];
  const capture = createLogger("test/backtest", { level: "info", sink: (_level, line) => lines.push(line) });

  runBacktest(scriptedStrategy(WORKED_SIGNALS), barsFromCloses(WORKED_CLOSES), {
    config,
    logger: capture,
    runId: "run-1",
  });

  const completed = lines.map((line) => JSON.parse(line)).find((entry) => entry.msg === "Backtest completed");
  assert.equal(completed?.runId, "run-1");
  assert.equal(completed?.module, "test/backtest");
  assert.equal(completed?.trades, 2);
});
