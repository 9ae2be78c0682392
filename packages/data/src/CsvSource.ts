import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { z } from "zod";

import { createLogger, type Logger } from "@strategy-lab/logger";
import { InvalidDataError, assertValid, type PriceBar } from "@strategy-lab/sdk";

import { DataRequestSchema, type DataRequest, type IDataSource } from "./IDataSource.js";
import { filterBarsForRequest, sanitizeBar, slugify, sortBarsChronologically } from "./internalUtils.js";

export const DEFAULT_DATASETS_DIR = join(process.cwd(), "storage", "datasets");

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const REQUIRED_COLUMNS = ["open", "high", "low", "close", "volume"] as const;
const TIMESTAMP_COLUMNS = ["timestamp", "date", "time", "datetime"] as const;

const CsvCachePayloadSchema = z.object({
  mtimeMs: z.number(),
  bars: z.array(z.unknown()),
});

type CsvCachePayload = z.infer<typeof CsvCachePayloadSchema>;

export interface CsvSourceOptions {
  readonly datasetsDir?: string;
  /** Parsed-bar cache; defaults to `<datasetsDir>/.cache`. */
  readonly cacheDir?: string;
  readonly logger?: Logger;
}

export interface CsvParseResult {
  readonly bars: PriceBar[];
  /** Data rows dropped because a field was missing or not numeric. */
  readonly dropped: number;
}

interface ColumnLayout {
  readonly timestamp: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

const resolveLayout = (header: string): ColumnLayout => {
  const columns = header.split(",").map((column) => column.trim().toLowerCase());
  const timestamp = columns.findIndex((column) =>
    TIMESTAMP_COLUMNS.some((candidate) => candidate === column),
  );
  const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column));
  if (timestamp < 0 || missing.length > 0) {
    const absent = timestamp < 0 ? ["timestamp", ...missing] : missing;
    throw new InvalidDataError(`CSV header is missing columns: ${absent.join(", ")}`, absent);
  }
  return {
    timestamp,
    open: columns.indexOf("open"),
    high: columns.indexOf("high"),
    low: columns.indexOf("low"),
    close: columns.indexOf("close"),
    volume: columns.indexOf("volume"),
  };
};

const toNumber = (value: string | undefined): number =>
  value === undefined || value === "" ? Number.NaN : Number(value);

const toBar = (row: string, layout: ColumnLayout): PriceBar | null => {
  const cells = row.split(",").map((cell) => cell.trim());
  return sanitizeBar({
    timestamp: cells[layout.timestamp] ?? "",
    open: toNumber(cells[layout.open]),
    high: toNumber(cells[layout.high]),
    low: toNumber(cells[layout.low]),
    close: toNumber(cells[layout.close]),
    volume: toNumber(cells[layout.volume]),
  });
};

/**
 * Parses OHLCV CSV text. The header names the columns in any order; rows
 * that do not yield a complete bar are dropped, duplicates keep the last row
 * and the result is sorted by time.
 *
 * @throws InvalidDataError when the header lacks a required column.
 */
export const parseCsvBars = (content: string): CsvParseResult => {
  const lines = content
    .split(/\r?\n/u)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const [header, ...rows] = lines;
  if (header === undefined) {
    return { bars: [], dropped: 0 };
  }

  const layout = resolveLayout(header);
  const bars: PriceBar[] = [];
  let dropped = 0;
  for (const row of rows) {
    const bar = toBar(row, layout);
    if (bar) {
      bars.push(bar);
    } else {
      dropped += 1;
    }
  }

  return { bars: sortBarsChronologically(bars), dropped };
};

/**
 * CSV-backed data source reading `<symbol>_<interval>.csv` files and caching
 * the parsed bars until the file changes.
 */
export class CsvSource implements IDataSource {
  public readonly id = "csv";

  private readonly datasetsDir: string;
  private readonly cacheDir: string;
  private readonly logger: Logger;

  public constructor(options: CsvSourceOptions = {}) {
    this.datasetsDir = options.datasetsDir ?? DEFAULT_DATASETS_DIR;
    this.cacheDir = options.cacheDir ?? join(this.datasetsDir, ".cache");
    this.logger = options.logger ?? createLogger("data/csv");
  }

  /**
   * Returns the bars of one dataset within the requested range. A missing
   * dataset yields an empty series.
   *
   * @throws Error when the request itself is malformed.
   * @throws InvalidDataError when the CSV header lacks a required column.
   */
  public async loadBars(input: DataRequest): Promise<ReadonlyArray<PriceBar>> {
    const request = assertValid(DataRequestSchema, input, "DataRequest");
    const datasetPath = this.resolveDatasetPath(request);

    let datasetStat: Awaited<ReturnType<typeof stat>>;
    try {
      datasetStat = await stat(datasetPath);
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
      this.logger.warn("Dataset not found", { path: datasetPath });
      return [];
    }

    const cachePath = this.resolveCachePath(request);
    const cached = await this.readCache(cachePath, datasetStat.mtimeMs);
    if (cached) {
      return filterBarsForRequest(cached, request);
    }

    const content = await readFile(datasetPath, { encoding: "utf-8" });
    const parsed = parseCsvBars(content);
    if (parsed.dropped > 0) {
      this.logger.warn("Dropped malformed CSV rows", { path: datasetPath, dropped: parsed.dropped });
    }

    await this.writeCache(cachePath, {
      mtimeMs: datasetStat.mtimeMs,
      bars: parsed.bars,
    });

    const filtered = filterBarsForRequest(parsed.bars, request);
    this.logger.info("Loaded dataset", {
      symbol: request.symbol,
      interval: request.interval,
      bars: filtered.length,
    });
    return filtered;
  }

  public resolveDatasetPath(request: Pick<DataRequest, "symbol" | "interval">): string {
    return join(this.datasetsDir, `${slugify(request.symbol)}_${slugify(request.interval)}.csv`);
  }

  private resolveCachePath(request: DataRequest): string {
    return join(this.cacheDir, `${slugify(request.symbol)}_${slugify(request.interval)}.json`);
  }

  private async readCache(cachePath: string, expectedMtimeMs: number): Promise<ReadonlyArray<PriceBar> | null> {
    let raw: string;
    try {
      raw = await readFile(cachePath, { encoding: "utf-8" });
    } catch (error) {
      this.logger.debug("Cache miss", {
        path: cachePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn("Ignoring unreadable cache", {
        path: cachePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    const payload = CsvCachePayloadSchema.safeParse(json);
    if (!payload.success || payload.data.mtimeMs !== expectedMtimeMs) {
      return null;
    }
    return payload.data.bars.map(sanitizeBar).filter((bar): bar is PriceBar => bar !== null);
  }

  private async writeCache(cachePath: string, payload: CsvCachePayload): Promise<void> {
    await mkdir(this.cacheDir, { recursive: true });
    await writeFile(cachePath, JSON.stringify(payload), { encoding: "utf-8" });
  }
}

/**
 * Factory used by callers to construct the CSV data source.
 */
export const createCsvSource = (options?: CsvSourceOptions): CsvSource => {
  return new CsvSource(options);
};
