import { strict as assert } from "node:assert";
import test from "node:test";

import type { SaveBacktestOptions } from "@strategy-lab/engine";
import { createSilentLogger } from "@strategy-lab/logger";
import {
  InvalidDataError,
  ParameterValidationError,
  createTradingConfig,
  strategyConfigs,
  type BacktestResult,
  type PriceBar,
} from "@strategy-lab/sdk";

import { createRunHandler, parseRunnerArgs, type RunnerArgs, type RunnerDependencies } from "../src/runner.js";

const closes = [10, 9, 8, 9, 11, 12, 10, 8, 7, 9, 12, 13, 11, 9, 10, 12];

const bars: PriceBar[] = closes.map((close, index) => ({
  timestamp: new Date(Date.UTC(2024, 0, 1 + index)).toISOString(),
  open: close,
  high: close,
  low: close,
  close,
  volume: 1_000,
}));

const argsFor = (argv: ReadonlyArray<string>): RunnerArgs => {
  const parsed = parseRunnerArgs(argv);
  if (parsed.help) {
    throw new Error("expected a command");
  }
  return parsed.args;
};

const createDeps = (overrides: Partial<RunnerDependencies> = {}) => {
  const written: string[] = [];
  const saved: Array<{ result: BacktestResult; options: SaveBacktestOptions }> = [];
  const requests: Array<Record<string, unknown>> = [];
  const deps: RunnerDependencies = {
    config: createTradingConfig({ initialCapital: 1000 }),
    logger: createSilentLogger(),
    loadBars: async (request) => {
      requests.push({ ...request });
      return bars;
    },
    loadRegistry: async () => strategyConfigs,
    saveBacktest: async (result, options) => {
      saved.push({ result, options });
      return {
        runDir: `${options.dir}/run`,
        resultJson: `${options.dir}/run/result.json`,
        equityParquet: `${options.dir}/run/equity.parquet`,
        tradesParquet: `${options.dir}/run/trades.parquet`,
        reportMd: `${options.dir}/run/report.md`,
      };
    },
    write: (text) => {
      written.push(text);
    },
    ...overrides,
  };
  return { deps, written, saved, requests };
};

// ============================================================================
// Argument parsing
// ============================================================================

test("parseRunnerArgs applies defaults", () => {
  const args = argsFor(["backtest"]);

  assert.equal(args.command, "backtest");
  assert.equal(args.symbol, "ASSET");
  assert.equal(args.interval, "1d");
  assert.equal(args.strategy, "ma_crossover");
  assert.deepEqual(args.params, {});
  assert.deepEqual(args.positions, []);
  assert.equal(args.top, 10);
  assert.equal(args.grid, undefined);
});

test("parseRunnerArgs decodes JSON and list options", () => {
  const args = argsFor([
    "optimize",
    "--strategy",
    "rsi_mean_reversion",
    "--grid",
    '{"period":[7,14]}',
    "--params",
    '{"oversold":25}',
    "--strategies",
    "ma_crossover, macd_crossover",
    "--top",
    "3",
  ]);

  assert.deepEqual(args.grid, { period: [7, 14] });
  assert.deepEqual(args.params, { oversold: 25 });
  assert.deepEqual(args.strategies, ["ma_crossover", "macd_crossover"]);
  assert.equal(args.top, 3);
});

test("parseRunnerArgs reports help without a command", () => {
  assert.deepEqual(parseRunnerArgs([]), { help: true });
  assert.deepEqual(parseRunnerArgs(["backtest", "--help"]), { help: true });
});

test("parseRunnerArgs rejects unknown commands and malformed JSON", () => {
  assert.throws(() => parseRunnerArgs(["launch"]), /Invalid arguments: command/);
  assert.throws(() => parseRunnerArgs(["backtest", "--params", "{oops"]), /--params must be valid JSON/);
  assert.throws(() => parseRunnerArgs(["backtest", "--bogus", "1"]));
});

// ============================================================================
// Commands
// ============================================================================

test("backtest prints the report and saves artifacts when --out is given", async () => {
  const { deps, written, saved, requests } = createDeps({ now: () => new Date(Date.UTC(2024, 5, 1)) });
  const handle = createRunHandler(deps);

  const outcome = await handle(
    argsFor([
      "backtest",
      "--symbol",
      "TEST",
      "--params",
      '{"fastPeriod":2,"slowPeriod":3}',
      "--out",
      "/tmp/runs",
      "--name",
      "demo",
      "--datasets",
      "/data",
    ]),
  );

  assert.equal(outcome.command, "backtest");
  assert.equal(outcome.artifacts?.runDir, "/tmp/runs/run");
  assert.equal(written.length, 1);
  assert.equal(written[0]?.split("\n")[0], "# Backtest: Moving Average Crossover");
  assert.equal(saved.length, 1);
  assert.equal(saved[0]?.options.name, "demo");
  assert.equal(saved[0]?.options.now?.toISOString(), "2024-06-01T00:00:00.000Z");
  assert.deepEqual(saved[0]?.result.params, { fastPeriod: 2, slowPeriod: 3, maType: "SMA" });
  assert.equal(requests[0]?.symbol, "TEST");
  assert.equal(requests[0]?.datasetsDir, "/data");
});

test("backtest without an output directory saves nothing", async () => {
  const { deps, saved } = createDeps();

  const outcome = await createRunHandler(deps)(argsFor(["backtest"]));

  assert.equal(outcome.artifacts, undefined);
  assert.equal(saved.length, 0);
});

test("paper renders a paper trading report for the symbol", async () => {
  const { deps } = createDeps();

  const outcome = await createRunHandler(deps)(
    argsFor(["paper", "--symbol", "TEST", "--strategy", "rsi_mean_reversion", "--params", '{"period":2}']),
  );

  const lines = outcome.report.split("\n");
  assert.equal(lines[0], "# Paper Trading: RSI Mean Reversion");
  assert.ok(lines.includes("- Symbol: TEST"));
});

test("optimize uses the built-in grid or an explicit one", async () => {
  const { deps } = createDeps();
  const handle = createRunHandler(deps);

  const defaults = await handle(argsFor(["optimize", "--top", "2"]));
  assert.ok(defaults.report.split("\n").includes("- Evaluated: 15"));
  assert.ok(defaults.report.split("\n").includes("## Top 2"));

  const explicit = await handle(
    argsFor(["optimize", "--strategy", "bollinger_reversion", "--grid", '{"period":[5,10],"stdDev":[1,2]}']),
  );
  assert.ok(explicit.report.split("\n").includes("- Evaluated: 4"));

  await assert.rejects(() => handle(argsFor(["optimize", "--strategy", "macd_crossover"])), /--grid is required/);
});

test("compare ranks the selected strategies", async () => {
  const { deps } = createDeps();

  const outcome = await createRunHandler(deps)(
    argsFor(["compare", "--strategies", "ma_crossover,rsi_mean_reversion"]),
  );

  const rows = outcome.report
    .split("\n")
    .filter((line) => line.startsWith("| ") && !line.startsWith("| Strategy") && !line.startsWith("| ---"));
  assert.equal(rows.length, 2);
});

test("risk summarizes positions against the configured limit", async () => {
  const { deps, requests } = createDeps();

  const outcome = await createRunHandler(deps)(
    argsFor(["risk", "--positions", '[{"positionValue":500,"riskAmount":150}]']),
  );

  const lines = outcome.report.split("\n");
  assert.ok(lines.includes("| Portfolio Risk | 15.00% |"));
  assert.ok(lines.includes("| Status | LIMIT EXCEEDED |"));
  assert.equal(requests.length, 0);
});

test("commands fail on an empty dataset or an unknown strategy", async () => {
  const empty = createDeps({ loadBars: async () => [] });
  await assert.rejects(() => createRunHandler(empty.deps)(argsFor(["backtest"])), InvalidDataError);

  const { deps } = createDeps();
  await assert.rejects(
    () => createRunHandler(deps)(argsFor(["backtest", "--strategy", "nope"])),
    ParameterValidationError,
  );
});
