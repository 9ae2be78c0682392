import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { renderBacktestReport } from "@strategy-lab/report";
import type { BacktestResult, CostAdjustedTrade, EquityPoint } from "@strategy-lab/sdk";
import parquetjs from "parquetjs";

const { ParquetSchema, ParquetWriter } = parquetjs;

export interface EquityRow extends Record<string, unknown> {
  readonly time: string;
  readonly equity: number;
}

export interface TradeRow extends Record<string, unknown> {
  readonly time: string;
  readonly side: string;
  readonly qty: number;
  readonly price: number;
  readonly cashFlow: number;
  readonly fees: number;
  readonly portfolioValue: number;
  readonly adjustedPortfolioValue: number;
}

const equitySchema = new ParquetSchema({
  time: { type: "UTF8" },
  equity: { type: "DOUBLE" },
});

const tradesSchema = new ParquetSchema({
  time: { type: "UTF8" },
  side: { type: "UTF8" },
  qty: { type: "DOUBLE" },
  price: { type: "DOUBLE" },
  cashFlow: { type: "DOUBLE" },
  fees: { type: "DOUBLE" },
  portfolioValue: { type: "DOUBLE" },
  adjustedPortfolioValue: { type: "DOUBLE" },
});

const EPOCH = new Date(0).toISOString();

// parquetjs cannot write a file without rows, so empty tables get one zero row.
const EMPTY_EQUITY_ROW: EquityRow = { time: EPOCH, equity: 0 };
const EMPTY_TRADE_ROW: TradeRow = {
  time: EPOCH,
  side: "none",
  qty: 0,
  price: 0,
  cashFlow: 0,
  fees: 0,
  portfolioValue: 0,
  adjustedPortfolioValue: 0,
};

const orPlaceholder = <T>(rows: ReadonlyArray<T>, placeholder: T): ReadonlyArray<T> =>
  rows.length > 0 ? rows : [placeholder];

export interface SaveBacktestOptions {
  /** Parent directory; one sub-directory is created per run. */
  readonly dir: string;
  /** Run label; defaults to the strategy key. */
  readonly name?: string;
  readonly now?: Date;
}

export interface SavedBacktestArtifacts {
  readonly runDir: string;
  readonly resultJson: string;
  readonly equityParquet: string;
  readonly tradesParquet: string;
  readonly reportMd: string;
}

export const slugify = (value: string): string => {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  return slug.length > 0 ? slug : "run";
};

const pad = (value: number): string => String(value).padStart(2, "0");

/** UTC `yyyymmdd_hhmmss`. */
export const formatRunStamp = (date: Date): string =>
  `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
  `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;

export const toEquityRows = (points: ReadonlyArray<EquityPoint>): EquityRow[] =>
  points.map((point) => ({ time: point.timestamp, equity: point.portfolioValue }));

export const toTradeRows = (trades: ReadonlyArray<CostAdjustedTrade>): TradeRow[] =>
  trades.map((trade) => ({
    time: trade.timestamp,
    side: trade.action.toLowerCase(),
    qty: trade.quantity,
    price: trade.price,
    cashFlow: trade.cashFlow,
    fees: trade.commission + trade.slippage,
    portfolioValue: trade.portfolioValueAfter,
    adjustedPortfolioValue: trade.adjustedPortfolioValue,
  }));

/**
 * Writes one run directory `<name>_<yyyymmdd_hhmmss>` holding the full result
 * as JSON, the equity curve and cost-adjusted ledger as Parquet, and the
 * markdown report.
 */
export const saveBacktestResults = async (
  result: BacktestResult,
  options: SaveBacktestOptions,
): Promise<SavedBacktestArtifacts> => {
  const now = options.now ?? new Date();
  const runDir = join(options.dir, `${slugify(options.name ?? result.strategyKey)}_${formatRunStamp(now)}`);
  await mkdir(runDir, { recursive: true });

  const artifacts: SavedBacktestArtifacts = {
    runDir,
    resultJson: join(runDir, "result.json"),
    equityParquet: join(runDir, "equity.parquet"),
    tradesParquet: join(runDir, "trades.parquet"),
    reportMd: join(runDir, "report.md"),
  };

  await Promise.all([
    writeFile(artifacts.resultJson, `${JSON.stringify(result, null, 2)}\n`, { encoding: "utf-8" }),
    writeParquet(
      artifacts.equityParquet,
      equitySchema,
      orPlaceholder(toEquityRows(result.equityCurve), EMPTY_EQUITY_ROW),
    ),
    writeParquet(
      artifacts.tradesParquet,
      tradesSchema,
      orPlaceholder(toTradeRows(result.adjustedTrades), EMPTY_TRADE_ROW),
    ),
    writeFile(artifacts.reportMd, renderBacktestReport(result), { encoding: "utf-8" }),
  ]);

  return artifacts;
};

const writeParquet = async <T extends Record<string, unknown>>(
  filePath: string,
  schema: InstanceType<typeof ParquetSchema>,
  rows: ReadonlyArray<T>,
): Promise<void> => {
  const writer = await ParquetWriter.openFile(schema, filePath);
  try {
    for (const row of rows) {
      await writer.appendRow(row);
    }
  } finally {
    await writer.close();
  }
};
