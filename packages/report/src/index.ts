import type {
  BacktestResult,
  CloseReason,
  ComparisonRow,
  OptimizationResult,
  PaperTradingResult,
  PortfolioRiskSummary,
} from "@strategy-lab/sdk";

import {
  formatCurrency,
  formatParams,
  formatPercent,
  formatRatio,
  keyValueTable,
  markdownTable,
} from "./format.js";

export * from "./format.js";

const section = (title: string, body: string): string => `## ${title}\n\n${body}\n`;

/** -----------------------------------------------------------------------
 *  Backtest
 *  -------------------------------------------------------------------- */

export const renderBacktestReport = (result: BacktestResult): string => {
  const { performance, transactionCosts } = result;
  const netFinalValue = performance.finalValue - transactionCosts.totalCosts;
  const period =
    result.startedAt && result.endedAt ? `${result.startedAt} → ${result.endedAt}` : "no bars";

  const summary = keyValueTable([
    ["Initial Capital", formatCurrency(performance.initialCapital)],
    ["Final Value", formatCurrency(performance.finalValue)],
    ["Total Return", `${formatCurrency(performance.totalReturn)} (${formatPercent(performance.totalReturnPct)})`],
    ["CAGR", formatPercent(performance.cagr)],
    ["Sharpe Ratio", formatRatio(performance.sharpeRatio)],
    ["Sortino Ratio", formatRatio(performance.sortinoRatio)],
    ["Max Drawdown", `${formatPercent(performance.maxDrawdown)} (${formatCurrency(performance.maxDrawdownValue)})`],
  ]);

  const trades = keyValueTable([
    ["Trades", String(performance.numTrades)],
    ["Completed Round Trips", String(performance.numCompletedTrades)],
    ["Win Rate", formatPercent(performance.winRate)],
    ["Profit Factor", formatRatio(performance.profitFactor)],
    ["Average Win", formatCurrency(performance.avgWin)],
    ["Average Loss", formatCurrency(performance.avgLoss)],
    ["Largest Win", formatCurrency(performance.largestWin)],
    ["Largest Loss", formatCurrency(performance.largestLoss)],
    ["Average Trade", formatCurrency(performance.avgTrade)],
  ]);

  const costs = keyValueTable([
    ["Commission", formatCurrency(transactionCosts.totalCommission)],
    ["Slippage", formatCurrency(transactionCosts.totalSlippage)],
    ["Total Costs", formatCurrency(transactionCosts.totalCosts)],
    ["Final Value (net of costs)", formatCurrency(netFinalValue)],
  ]);

  const ledger =
    result.trades.length === 0
      ? "No trades executed."
      : markdownTable(
          ["Time", "Action", "Price", "Quantity", "Cash Flow", "Portfolio Value"],
          result.trades.map((trade) => [
            trade.timestamp,
            trade.action,
            trade.price.toFixed(2),
            trade.quantity.toFixed(4),
            formatCurrency(trade.cashFlow),
            formatCurrency(trade.portfolioValueAfter),
          ]),
        );

  const parts = [
    `# Backtest: ${result.strategyName}`,
    "",
    `- Strategy: \`${result.strategyKey}\``,
    `- Parameters: ${formatParams(result.params)}`,
    `- Period: ${period}`,
    `- Bars: ${result.bars.length}`,
    "",
    section("Performance", summary),
    section("Trades", trades),
    section("Transaction Costs", costs),
    section("Ledger", ledger),
  ];
  if (result.openQuantity > 0) {
    parts.push(`> Position of ${result.openQuantity.toFixed(4)} units still open at the last bar.\n`);
  }
  return parts.join("\n");
};

/** -----------------------------------------------------------------------
 *  Paper trading
 *  -------------------------------------------------------------------- */

const CLOSE_REASON_LABELS: ReadonlyArray<readonly [CloseReason, string]> = [
  ["STOP_LOSS", "Stop Loss"],
  ["TAKE_PROFIT", "Take Profit"],
  ["SIGNAL", "Signal"],
  ["END_OF_SESSION", "End of Session"],
  ["MANUAL", "Manual"],
];

export const renderPaperReport = (result: PaperTradingResult): string => {
  const { performance, portfolio } = result;
  const counters = portfolio.performance;

  const summary = keyValueTable([
    ["Initial Capital", formatCurrency(portfolio.initialCapital)],
    ["Final Value", formatCurrency(performance.finalValue)],
    ["Total Return", `${formatCurrency(performance.totalReturn)} (${formatPercent(performance.totalReturnPct)})`],
    ["Trades", String(counters.totalTrades)],
    ["Closed Trades", String(counters.closedTrades)],
    ["Winning Trades", String(counters.winningTrades)],
    ["Losing Trades", String(counters.losingTrades)],
    ["Win Rate", formatPercent(performance.winRate)],
    ["Gross Profit", formatCurrency(counters.totalProfit)],
    ["Gross Loss", formatCurrency(counters.totalLoss)],
  ]);

  const reasons = markdownTable(
    ["Exit", "Count"],
    CLOSE_REASON_LABELS.map(([reason, label]) => [label, String(performance.closeReasons[reason])]),
  );

  const history =
    portfolio.tradeHistory.length === 0
      ? "No trades executed."
      : markdownTable(
          ["Time", "Action", "Price", "Quantity", "P&L", "Reason"],
          portfolio.tradeHistory.map((trade) => [
            trade.timestamp,
            trade.action,
            trade.price.toFixed(2),
            trade.quantity.toFixed(4),
            trade.realizedPnl === null ? "" : formatCurrency(trade.realizedPnl),
            trade.reason,
          ]),
        );

  return [
    `# Paper Trading: ${result.strategyName}`,
    "",
    `- Symbol: ${result.symbol}`,
    "",
    section("Performance", summary),
    section("Exits", reasons),
    section("Trade History", history),
  ].join("\n");
};

/** -----------------------------------------------------------------------
 *  Comparison & optimization
 *  -------------------------------------------------------------------- */

export const renderComparisonReport = (rows: ReadonlyArray<ComparisonRow>): string => {
  const body =
    rows.length === 0
      ? "No strategies compared."
      : markdownTable(
          ["Strategy", "Return", "Return %", "Sharpe", "Max DD", "Trades", "Win Rate", "Profit Factor"],
          rows.map((row) => [
            row.strategyName,
            formatCurrency(row.totalReturn),
            formatPercent(row.totalReturnPct),
            formatRatio(row.sharpeRatio),
            formatPercent(row.maxDrawdown),
            String(row.numTrades),
            formatPercent(row.winRate),
            formatRatio(row.profitFactor),
          ]),
        );
  return [`# Strategy Comparison`, "", body, ""].join("\n");
};

export interface OptimizationReportOptions {
  /** Rows to show, best first. */
  readonly top?: number;
}

export const renderOptimizationReport = (
  result: OptimizationResult,
  options: OptimizationReportOptions = {},
): string => {
  const top = options.top ?? 10;
  const shown = result.rows.slice(0, Math.max(0, top));
  const body =
    shown.length === 0
      ? "No valid parameter combinations."
      : markdownTable(
          ["Rank", "Parameters", "Return", "Return %", "Trades", "Win Rate", "Sharpe"],
          shown.map((row, index) => [
            String(index + 1),
            formatParams(row.params),
            formatCurrency(row.totalReturn),
            formatPercent(row.totalReturnPct),
            String(row.numTrades),
            formatPercent(row.winRate),
            formatRatio(row.sharpeRatio),
          ]),
        );
  return [
    `# Optimization: ${result.strategyKey}`,
    "",
    `- Evaluated: ${result.evaluated}`,
    `- Skipped: ${result.skipped}`,
    "",
    section(`Top ${shown.length}`, body),
  ].join("\n");
};

/** -----------------------------------------------------------------------
 *  Risk
 *  -------------------------------------------------------------------- */

export interface RiskReportOptions {
  /** Limit as a fraction of capital; adds a status line when given. */
  readonly maxPortfolioRisk?: number;
}

export const renderRiskReport = (summary: PortfolioRiskSummary, options: RiskReportOptions = {}): string => {
  const entries: Array<readonly [string, string]> = [
    ["Open Positions", String(summary.numPositions)],
    ["Total Exposure", formatCurrency(summary.totalExposure)],
    ["Capital at Risk", formatCurrency(summary.totalRisk)],
    ["Portfolio Risk", formatPercent(summary.portfolioRiskPct)],
    ["Leverage", `${summary.leverage.toFixed(2)}x`],
  ];
  if (options.maxPortfolioRisk !== undefined) {
    const limitPct = options.maxPortfolioRisk * 100;
    entries.push(["Risk Limit", formatPercent(limitPct)]);
    entries.push(["Status", summary.portfolioRiskPct <= limitPct ? "within limit" : "LIMIT EXCEEDED"]);
  }
  return [`# Portfolio Risk`, "", keyValueTable(entries), ""].join("\n");
};
