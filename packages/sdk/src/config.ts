import { z } from "zod";

import { assertValid } from "./validation.js";

/**
 * Immutable settings passed explicitly into every component. Rates and
 * percentages are fractions (0.02 for 2%).
 */
export interface TradingConfig {
  readonly initialCapital: number;
  /** Share of available cash spent on each entry. */
  readonly positionSizeFraction: number;
  readonly commissionRate: number;
  readonly slippageRate: number;
  readonly stopLossPct: number;
  readonly takeProfitPct: number;
  /** Cap on summed position risk as a fraction of capital. */
  readonly maxPortfolioRisk: number;
  readonly maxKellyFraction: number;
  /** Annual rate, de-annualized per bar for Sharpe and Sortino. */
  readonly riskFreeRate: number;
  readonly tradingDaysPerYear: number;
}

export const TradingConfigSchema = z.object({
  initialCapital: z.number().positive().default(10_000),
  positionSizeFraction: z.number().gt(0).max(1).default(0.95),
  commissionRate: z.number().min(0).max(1).default(0.001),
  slippageRate: z.number().min(0).max(1).default(0.0005),
  stopLossPct: z.number().gt(0).lt(1).default(0.02),
  takeProfitPct: z.number().gt(0).default(0.05),
  maxPortfolioRisk: z.number().gt(0).max(1).default(0.1),
  maxKellyFraction: z.number().gt(0).max(1).default(0.5),
  riskFreeRate: z.number().min(0).default(0),
  tradingDaysPerYear: z.number().int().positive().default(252),
});

/**
 * Builds a frozen configuration from defaults plus overrides.
 *
 * @throws Error when an override is out of range.
 */
export const createTradingConfig = (overrides: Partial<TradingConfig> = {}): TradingConfig =>
  Object.freeze(assertValid(TradingConfigSchema, overrides, "TradingConfig"));

export const DEFAULT_TRADING_CONFIG: TradingConfig = createTradingConfig();

/** Environment variable backing each overridable setting. */
export const TRADING_CONFIG_ENV: Readonly<Record<string, keyof TradingConfig>> = {
  STRATEGY_LAB_INITIAL_CAPITAL: "initialCapital",
  STRATEGY_LAB_POSITION_SIZE: "positionSizeFraction",
  STRATEGY_LAB_COMMISSION: "commissionRate",
  STRATEGY_LAB_SLIPPAGE: "slippageRate",
  STRATEGY_LAB_STOP_LOSS_PCT: "stopLossPct",
  STRATEGY_LAB_TAKE_PROFIT_PCT: "takeProfitPct",
  STRATEGY_LAB_MAX_PORTFOLIO_RISK: "maxPortfolioRisk",
  STRATEGY_LAB_MAX_KELLY_FRACTION: "maxKellyFraction",
  STRATEGY_LAB_RISK_FREE_RATE: "riskFreeRate",
};

const NumericEnvSchema = z.coerce.number().finite();

/**
 * Reads overrides from environment variables. Blank variables are ignored;
 * non-numeric ones are reported together.
 */
export const tradingConfigFromEnv = (
  env: Readonly<Record<string, string | undefined>>,
): TradingConfig => {
  const overrides: Record<string, number> = {};
  const problems: string[] = [];

  for (const [variable, key] of Object.entries(TRADING_CONFIG_ENV)) {
    const raw = env[variable];
    if (raw === undefined || raw.trim().length === 0) {
      continue;
    }
    const parsed = NumericEnvSchema.safeParse(raw);
    if (!parsed.success) {
      problems.push(`${variable}: expected a number, received "${raw}"`);
      continue;
    }
    overrides[key] = parsed.data;
  }

  if (problems.length > 0) {
    throw new Error(`Invalid environment: ${problems.join("; ")}`);
  }
  return Object.freeze(assertValid(TradingConfigSchema, overrides, "TradingConfig"));
};
