import type { z } from "zod";

import { ParameterValidationError } from "../errors.js";
import { formatIssues } from "../validation.js";
import * as bollingerReversion from "./bollinger_reversion.js";
import * as macdCrossover from "./macd_crossover.js";
import * as maCrossover from "./ma_crossover.js";
import * as rsiMeanReversion from "./rsi_mean_reversion.js";
import type { Strategy, StrategyFactory, StrategyParams } from "./types.js";

export type StrategyKey =
  | typeof maCrossover.name
  | typeof rsiMeanReversion.name
  | typeof macdCrossover.name
  | typeof bollingerReversion.name;

export interface StrategyField {
  readonly key: string;
  readonly label: string;
  readonly description?: string;
  readonly type: "number" | "choice";
  readonly min?: number;
  readonly max?: number;
  readonly step?: number;
  readonly options?: ReadonlyArray<string>;
}

export interface StrategyConfig {
  readonly key: string;
  readonly title: string;
  readonly description: string;
  readonly defaults: Readonly<Record<string, number | string>>;
  readonly fields: ReadonlyArray<StrategyField>;
  readonly schema: z.ZodTypeAny;
  /**
   * Validates raw params against `schema` and builds the strategy.
   *
   * @throws ParameterValidationError when the params are rejected.
   */
  create(params: unknown): Strategy;
}

export interface StrategyDefinition<P extends StrategyParams> {
  readonly key: string;
  readonly title: string;
  readonly description: string;
  readonly defaults: Readonly<Record<string, number | string>>;
  readonly fields: ReadonlyArray<StrategyField>;
  readonly schema: z.ZodType<P, z.ZodTypeDef, unknown>;
  readonly factory: StrategyFactory<P>;
}

/**
 * Wraps a schema and factory into a registry entry. Built-ins are declared
 * through it, and so are user-defined variants.
 */
export const defineStrategy = <P extends StrategyParams>(
  definition: StrategyDefinition<P>,
): StrategyConfig => ({
  key: definition.key,
  title: definition.title,
  description: definition.description,
  defaults: definition.defaults,
  fields: definition.fields,
  schema: definition.schema,
  create(params: unknown): Strategy {
    const parsed = definition.schema.safeParse(params ?? {});
    if (!parsed.success) {
      throw new ParameterValidationError(definition.key, formatIssues(parsed.error));
    }
    return definition.factory(parsed.data);
  },
});

const periodField = (key: string, label: string, description: string, min = 1): StrategyField => ({
  key,
  label,
  description,
  type: "number",
  min,
  step: 1,
});

export const strategyConfigs: Readonly<Record<StrategyKey, StrategyConfig>> = {
  [maCrossover.name]: defineStrategy({
    key: maCrossover.name,
    title: "Moving Average Crossover",
    description: "Trend-following crossover with fast/slow moving averages.",
    defaults: { fastPeriod: 10, slowPeriod: 20, maType: "SMA" },
    fields: [
      periodField("fastPeriod", "Fast Period", "Short-term moving average window."),
      periodField("slowPeriod", "Slow Period", "Long-term moving average window.", 2),
      {
        key: "maType",
        label: "Average Type",
        type: "choice",
        options: ["SMA", "EMA"],
      },
    ],
    schema: maCrossover.schema,
    factory: maCrossover.factory,
  }),
  [rsiMeanReversion.name]: defineStrategy({
    key: rsiMeanReversion.name,
    title: "RSI Mean Reversion",
    description: "Buys oversold conditions and sells overbought extremes.",
    defaults: { period: rsiMeanReversion.DEFAULT_RSI_PERIOD, oversold: 30, overbought: 70 },
    fields: [
      periodField("period", "RSI Period", "Bars in the Wilder smoothing window."),
      {
        key: "oversold",
        label: "Oversold",
        description: "RSI at or below which the strategy buys.",
        type: "number",
        min: 1,
        max: 99,
        step: 1,
      },
      {
        key: "overbought",
        label: "Overbought",
        description: "RSI at or above which the strategy sells.",
        type: "number",
        min: 1,
        max: 99,
        step: 1,
      },
    ],
    schema: rsiMeanReversion.schema,
    factory: rsiMeanReversion.factory,
  }),
  [macdCrossover.name]: defineStrategy({
    key: macdCrossover.name,
    title: "MACD Crossover",
    description: "Momentum entries on MACD crossing its signal line.",
    defaults: { fastPeriod: 12, slowPeriod: 26, signalPeriod: 9 },
    fields: [
      periodField("fastPeriod", "Fast EMA", "Fast EMA window of the MACD line."),
      periodField("slowPeriod", "Slow EMA", "Slow EMA window of the MACD line.", 2),
      periodField("signalPeriod", "Signal EMA", "EMA window of the signal line."),
    ],
    schema: macdCrossover.schema,
    factory: macdCrossover.factory,
  }),
  [bollingerReversion.name]: defineStrategy({
    key: bollingerReversion.name,
    title: "Bollinger Band Reversion",
    description: "Buys at the lower band and sells at the upper band.",
    defaults: { period: 20, stdDev: 2 },
    fields: [
      periodField("period", "Period", "Window of the middle band.", 2),
      {
        key: "stdDev",
        label: "Band Width",
        description: "Standard deviations between the middle and outer bands.",
        type: "number",
        min: 0.5,
        step: 0.5,
      },
    ],
    schema: bollingerReversion.schema,
    factory: bollingerReversion.factory,
  }),
};

export const strategyList: ReadonlyArray<StrategyConfig> = Object.values(strategyConfigs);

export const isStrategyKey = (value: string): value is StrategyKey =>
  Object.prototype.hasOwnProperty.call(strategyConfigs, value);

/**
 * Looks up a strategy by key and instantiates it with validated params.
 *
 * @param registry - Entries to search; defaults to the built-ins.
 * @throws ParameterValidationError for unknown keys or rejected params.
 */
export const createStrategy = (
  key: string,
  params: unknown = {},
  registry: Readonly<Record<string, StrategyConfig>> = strategyConfigs,
): Strategy => {
  const config = Object.prototype.hasOwnProperty.call(registry, key) ? registry[key] : undefined;
  if (!config) {
    throw new ParameterValidationError(key, [
      `unknown strategy, expected one of: ${Object.keys(registry).join(", ")}`,
    ]);
  }
  return config.create(params);
};
