import { createLogger, type Logger } from "@strategy-lab/logger";
import { DEFAULT_TRADING_CONFIG, type SignaledBar, type Trade } from "@strategy-lab/sdk";

export interface SimulateTradesOptions {
  readonly initialCapital?: number;
  /** Share of cash spent on each entry, in (0, 1]. */
  readonly positionSizeFraction?: number;
  readonly logger?: Logger;
}

export interface SimulationResult {
  /** Alternating BUY, SELL, ... ledger in bar order. */
  readonly trades: Trade[];
  readonly cash: number;
  /** Units still held after the last bar. */
  readonly openQuantity: number;
  /** Cash plus any open position marked at the last close. */
  readonly finalValue: number;
  readonly processedBars: number;
}

interface AccountState {
  cash: number;
  quantity: number;
}

/**
 * Replays signals through a single-position long-only account. FLAT + BUY
 * spends a fraction of cash at the close; LONG + SELL liquidates everything.
 * Every other combination is a no-op, and nothing is closed after the last
 * bar.
 */
export const simulateTrades = (
  bars: ReadonlyArray<SignaledBar>,
  options: SimulateTradesOptions = {},
): SimulationResult => {
  const logger = options.logger ?? createLogger("engine/simulator");
  const positionSizeFraction = options.positionSizeFraction ?? DEFAULT_TRADING_CONFIG.positionSizeFraction;
  const state: AccountState = {
    cash: options.initialCapital ?? DEFAULT_TRADING_CONFIG.initialCapital,
    quantity: 0,
  };
  const trades: Trade[] = [];

  for (const bar of bars) {
    executeSignal({ bar, state, trades, positionSizeFraction, logger });
  }

  const lastClose = bars[bars.length - 1]?.close ?? 0;
  return {
    trades,
    cash: state.cash,
    openQuantity: state.quantity,
    finalValue: state.cash + state.quantity * lastClose,
    processedBars: bars.length,
  };
};

interface ExecuteSignalArgs {
  readonly bar: SignaledBar;
  readonly state: AccountState;
  readonly trades: Trade[];
  readonly positionSizeFraction: number;
  readonly logger: Logger;
}

const executeSignal = ({ bar, state, trades, positionSizeFraction, logger }: ExecuteSignalArgs): void => {
  const price = bar.close;
  if (price <= 0) {
    return;
  }

  if (bar.signal === "BUY" && state.quantity === 0 && state.cash > 0) {
    const spend = state.cash * positionSizeFraction;
    const quantity = spend / price;
    state.cash -= spend;
    state.quantity = quantity;
    trades.push({
      timestamp: bar.timestamp,
      action: "BUY",
      price,
      quantity,
      cashFlow: -spend,
      portfolioValueAfter: state.cash + quantity * price,
    });
    logger.debug("Filled BUY", { timestamp: bar.timestamp, price, quantity });
    return;
  }

  if (bar.signal === "SELL" && state.quantity > 0) {
    const quantity = state.quantity;
    const proceeds = quantity * price;
    state.cash += proceeds;
    state.quantity = 0;
    trades.push({
      timestamp: bar.timestamp,
      action: "SELL",
      price,
      quantity,
      cashFlow: proceeds,
      portfolioValueAfter: state.cash,
    });
    logger.debug("Filled SELL", { timestamp: bar.timestamp, price, quantity });
  }
};
