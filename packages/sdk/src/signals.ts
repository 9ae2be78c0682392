import { createLogger, type Logger } from "@strategy-lab/logger";

import { InvalidDataError } from "./errors.js";
import { SignalInputBarSchema, type PriceBar, type SignaledBar } from "./index.js";
import type { Strategy } from "./strategies/types.js";
import { formatIssues } from "./validation.js";

export interface GenerateSignalsOptions {
  readonly logger?: Logger;
}

export interface SignalCounts {
  readonly buy: number;
  readonly sell: number;
  readonly hold: number;
}

/**
 * Checks that every bar carries the fields signal generation needs.
 *
 * @throws InvalidDataError listing the offending bars.
 */
export const validateSignalInput = (bars: ReadonlyArray<unknown>): void => {
  const issues: string[] = [];
  bars.forEach((bar, index) => {
    const parsed = SignalInputBarSchema.safeParse(bar);
    if (!parsed.success) {
      issues.push(...formatIssues(parsed.error).map((issue) => `bars[${index}].${issue}`));
    }
  });
  if (issues.length > 0) {
    throw new InvalidDataError(`Invalid price series: ${issues.slice(0, 5).join("; ")}`, issues);
  }
};

export const countSignals = (bars: ReadonlyArray<SignaledBar>): SignalCounts => {
  let buy = 0;
  let sell = 0;
  for (const bar of bars) {
    if (bar.signal === "BUY") {
      buy += 1;
    } else if (bar.signal === "SELL") {
      sell += 1;
    }
  }
  return { buy, sell, hold: bars.length - buy - sell };
};

/**
 * Annotates each bar with the strategy's signal. The input is left untouched;
 * series too short for the strategy's indicators come back all HOLD.
 *
 * @throws InvalidDataError when a bar lacks `timestamp` or `close`.
 */
export const generateSignals = (
  strategy: Strategy,
  bars: ReadonlyArray<PriceBar>,
  options: GenerateSignalsOptions = {},
): SignaledBar[] => {
  const logger = options.logger ?? createLogger("sdk/signals");
  validateSignalInput(bars);

  const signaled = strategy.generateSignals(bars);
  if (signaled.length !== bars.length) {
    throw new InvalidDataError(
      `${strategy.name} produced ${signaled.length} signals for ${bars.length} bars`,
    );
  }

  const counts = countSignals(signaled);
  logger.info("Generated signals", {
    strategy: strategy.key,
    bars: bars.length,
    buySignals: counts.buy,
    sellSignals: counts.sell,
  });
  return signaled;
};
