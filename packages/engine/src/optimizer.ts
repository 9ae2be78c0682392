import { createLogger, type Logger } from "@strategy-lab/logger";
import {
  ParameterValidationError,
  createStrategy,
  strategyConfigs,
  type OptimizationResult,
  type OptimizationRow,
  type PriceBar,
  type Strategy,
  type StrategyConfig,
  type TradingConfig,
} from "@strategy-lab/sdk";

import { runBacktest } from "./backtest.js";

export type ParameterValue = number | string;

/** Candidate values per parameter; the search covers their cartesian product. */
export type ParameterGrid = Readonly<Record<string, ReadonlyArray<ParameterValue>>>;

export interface OptimizeOptions {
  readonly config?: TradingConfig;
  readonly logger?: Logger;
  /** Logger handed to each trial's backtest; defaults to warnings only. */
  readonly trialLogger?: Logger;
  /** Params applied to every combination. */
  readonly fixedParams?: Readonly<Record<string, ParameterValue>>;
  readonly registry?: Readonly<Record<string, StrategyConfig>>;
}

/** Every combination of the grid, keys varying right-most fastest. */
export const expandGrid = (grid: ParameterGrid): Array<Record<string, ParameterValue>> => {
  let combinations: Array<Record<string, ParameterValue>> = [{}];
  for (const [key, values] of Object.entries(grid)) {
    const next: Array<Record<string, ParameterValue>> = [];
    for (const combination of combinations) {
      for (const value of values) {
        next.push({ ...combination, [key]: value });
      }
    }
    combinations = next;
  }
  return combinations;
};

const instantiate = (
  strategyKey: string,
  params: Readonly<Record<string, ParameterValue>>,
  registry: Readonly<Record<string, StrategyConfig>>,
): Strategy | ParameterValidationError => {
  try {
    return createStrategy(strategyKey, params, registry);
  } catch (error) {
    if (error instanceof ParameterValidationError) {
      return error;
    }
    throw error;
  }
};

/** Params the backtest reads from every strategy, beyond its own fields. */
const SHARED_PARAM_KEYS: ReadonlyArray<string> = ["positionSize"];

const assertKnownParams = (
  strategyKey: string,
  config: StrategyConfig,
  keys: ReadonlyArray<string>,
): void => {
  const known = new Set([
    ...config.fields.map((field) => field.key),
    ...Object.keys(config.defaults),
    ...SHARED_PARAM_KEYS,
  ]);
  const unknown = keys.filter((key) => !known.has(key));
  if (unknown.length > 0) {
    throw new ParameterValidationError(
      strategyKey,
      unknown.map((key) => `${key}: unknown parameter, expected one of: ${[...known].join(", ")}`),
    );
  }
};

/**
 * Exhaustive grid search. Grid and fixed params must name parameters the
 * strategy declares. Combinations the strategy schema rejects are
 * counted as skipped; every other one runs the full backtest over its own
 * copy of the bars. Rows come back best `totalReturnPct` first.
 */
export const optimizeParameters = (
  strategyKey: string,
  bars: ReadonlyArray<PriceBar>,
  grid: ParameterGrid,
  options: OptimizeOptions = {},
): OptimizationResult => {
  const logger = options.logger ?? createLogger("engine/optimizer");
  const trialLogger = options.trialLogger ?? createLogger(`${logger.module}/trial`, { level: "warn" });
  const registry: Readonly<Record<string, StrategyConfig>> = options.registry ?? strategyConfigs;
  const strategyConfig = Object.prototype.hasOwnProperty.call(registry, strategyKey)
    ? registry[strategyKey]
    : undefined;
  if (!strategyConfig) {
    throw new ParameterValidationError(strategyKey, [
      `unknown strategy, expected one of: ${Object.keys(registry).join(", ")}`,
    ]);
  }
  assertKnownParams(strategyKey, strategyConfig, [...Object.keys(options.fixedParams ?? {}), ...Object.keys(grid)]);
  const combinations = expandGrid(grid);
  const rows: OptimizationRow[] = [];
  let skipped = 0;

  logger.info("Starting grid search", { strategy: strategyKey, combinations: combinations.length });

  for (const combination of combinations) {
    const params = { ...options.fixedParams, ...combination };
    const strategy = instantiate(strategyKey, params, registry);
    if (strategy instanceof ParameterValidationError) {
      skipped += 1;
      logger.debug("Skipped invalid combination", { params, issues: strategy.issues });
      continue;
    }

    const result = runBacktest(strategy, structuredClone(bars), {
      config: options.config,
      logger: trialLogger,
    });
    rows.push({
      params,
      totalReturn: result.performance.totalReturn,
      totalReturnPct: result.performance.totalReturnPct,
      numTrades: result.performance.numCompletedTrades,
      winRate: result.performance.winRate,
      sharpeRatio: result.performance.sharpeRatio,
    });
  }

  rows.sort((left, right) => right.totalReturnPct - left.totalReturnPct);
  logger.info("Grid search complete", {
    strategy: strategyKey,
    evaluated: rows.length,
    skipped,
    bestReturnPct: rows[0]?.totalReturnPct ?? null,
  });

  return { strategyKey, evaluated: rows.length, skipped, rows };
};

export interface MaCrossoverGrid {
  readonly fastPeriods?: ReadonlyArray<number>;
  readonly slowPeriods?: ReadonlyArray<number>;
  readonly maType?: "SMA" | "EMA";
}

export const optimizeMaCrossover = (
  bars: ReadonlyArray<PriceBar>,
  grid: MaCrossoverGrid = {},
  options: OptimizeOptions = {},
): OptimizationResult =>
  optimizeParameters(
    "ma_crossover",
    bars,
    {
      fastPeriod: grid.fastPeriods ?? [5, 10, 15, 20],
      slowPeriod: grid.slowPeriods ?? [20, 30, 50, 100],
    },
    { ...options, fixedParams: { ...options.fixedParams, maType: grid.maType ?? "SMA" } },
  );

export interface RsiGrid {
  readonly periods?: ReadonlyArray<number>;
  readonly oversoldLevels?: ReadonlyArray<number>;
  readonly overboughtLevels?: ReadonlyArray<number>;
}

export const optimizeRsi = (
  bars: ReadonlyArray<PriceBar>,
  grid: RsiGrid = {},
  options: OptimizeOptions = {},
): OptimizationResult =>
  optimizeParameters(
    "rsi_mean_reversion",
    bars,
    {
      period: grid.periods ?? [7, 14, 21],
      oversold: grid.oversoldLevels ?? [20, 30, 40],
      overbought: grid.overboughtLevels ?? [60, 70, 80],
    },
    options,
  );
