import type { DataRequest } from "@strategy-lab/data";
import {
  compareStrategies,
  optimizeMaCrossover,
  optimizeParameters,
  optimizeRsi,
  runBacktest,
  runPaperTrading,
  type OptimizeOptions,
  type SaveBacktestOptions,
  type SavedBacktestArtifacts,
} from "@strategy-lab/engine";
import type { Logger } from "@strategy-lab/logger";
import {
  renderBacktestReport,
  renderComparisonReport,
  renderOptimizationReport,
  renderPaperReport,
  renderRiskReport,
} from "@strategy-lab/report";
import { calculatePortfolioRisk } from "@strategy-lab/risk";
import {
  InvalidDataError,
  assertValid,
  createStrategy,
  type BacktestResult,
  type OptimizationResult,
  type PriceBar,
  type StrategyConfig,
  type TradingConfig,
} from "@strategy-lab/sdk";
import { z } from "zod";

import type { RunnerArgs, RunnerCommand } from "./args.js";

export * from "./args.js";

type StrategyRegistry = Readonly<Record<string, StrategyConfig>>;

export interface RunnerDependencies {
  readonly config: TradingConfig;
  readonly logger: Logger;
  readonly loadBars: (request: DataRequest & { readonly datasetsDir?: string }) => Promise<ReadonlyArray<PriceBar>>;
  readonly loadRegistry: (customDir?: string) => Promise<StrategyRegistry>;
  readonly saveBacktest: (result: BacktestResult, options: SaveBacktestOptions) => Promise<SavedBacktestArtifacts>;
  /** Receives the rendered markdown report. */
  readonly write: (text: string) => void;
  readonly now?: () => Date;
  /** Fallback for `--out` when the flag is absent. */
  readonly defaultOutDir?: string;
}

export interface RunOutcome {
  readonly command: RunnerCommand;
  readonly report: string;
  readonly artifacts?: SavedBacktestArtifacts;
}

const FixedParamsSchema = z.record(z.union([z.number(), z.string()]));

const loadSeries = async (deps: RunnerDependencies, args: RunnerArgs): Promise<ReadonlyArray<PriceBar>> => {
  const bars = await deps.loadBars({
    symbol: args.symbol,
    interval: args.interval,
    start: args.start,
    end: args.end,
    datasetsDir: args.datasets,
  });
  if (bars.length === 0) {
    throw new InvalidDataError(`No bars found for ${args.symbol} ${args.interval}`);
  }
  return bars;
};

const optimize = (
  args: RunnerArgs,
  bars: ReadonlyArray<PriceBar>,
  options: OptimizeOptions,
): OptimizationResult => {
  if (args.grid) {
    const fixedParams = assertValid(FixedParamsSchema, args.params, "--params");
    return optimizeParameters(args.strategy, bars, args.grid, { ...options, fixedParams });
  }
  if (args.strategy === "ma_crossover") {
    return optimizeMaCrossover(bars, {}, options);
  }
  if (args.strategy === "rsi_mean_reversion") {
    return optimizeRsi(bars, {}, options);
  }
  throw new Error(`--grid is required to optimize ${args.strategy}`);
};

/**
 * Builds the command handler. Every side effect goes through `deps`, so the
 * same handler serves the CLI and tests.
 */
export const createRunHandler =
  (deps: RunnerDependencies) =>
  async (args: RunnerArgs): Promise<RunOutcome> => {
    const { config, logger } = deps;
    logger.info("Running command", { command: args.command, symbol: args.symbol, strategy: args.strategy });

    const finish = (report: string, artifacts?: SavedBacktestArtifacts): RunOutcome => {
      deps.write(report);
      logger.info("Command completed", { command: args.command, ...(artifacts ? { runDir: artifacts.runDir } : {}) });
      return { command: args.command, report, ...(artifacts ? { artifacts } : {}) };
    };

    if (args.command === "risk") {
      const summary = calculatePortfolioRisk(args.positions, config.initialCapital, { logger });
      return finish(renderRiskReport(summary, { maxPortfolioRisk: config.maxPortfolioRisk }));
    }

    const registry = await deps.loadRegistry(args.custom);
    const bars = await loadSeries(deps, args);

    switch (args.command) {
      case "backtest": {
        const strategy = createStrategy(args.strategy, args.params, registry);
        const result = runBacktest(strategy, bars, { config, logger: logger.child("backtest") });
        const outDir = args.out ?? deps.defaultOutDir;
        const artifacts = outDir
          ? await deps.saveBacktest(result, { dir: outDir, name: args.name, now: deps.now?.() })
          : undefined;
        return finish(renderBacktestReport(result), artifacts);
      }
      case "paper": {
        const strategy = createStrategy(args.strategy, args.params, registry);
        const result = runPaperTrading(strategy, bars, {
          symbol: args.symbol,
          config,
          logger: logger.child("paper"),
        });
        return finish(renderPaperReport(result));
      }
      case "optimize": {
        const result = optimize(args, bars, { config, logger: logger.child("optimizer"), registry });
        return finish(renderOptimizationReport(result, { top: args.top }));
      }
      case "compare": {
        const keys = args.strategies ?? Object.keys(registry);
        const candidates = keys.map((key) => createStrategy(key, {}, registry));
        const { rows } = compareStrategies(candidates, bars, { config, logger: logger.child("compare") });
        return finish(renderComparisonReport(rows));
      }
    }
  };
