import { PriceBarSchema, type PriceBar } from "@strategy-lab/sdk";

import type { DataRequest } from "./IDataSource.js";

/**
 * Shared helpers used across data sources to enforce consistent behaviour.
 */
export const slugify = (value: string): string => {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/gu, "_")
    .replace(/^_+|_+$/gu, "");
};

export const parseTimestamp = (value: string): number | null => {
  const epoch = Date.parse(value);
  if (Number.isNaN(epoch)) {
    return null;
  }
  return epoch;
};

/** Rewrites any parseable timestamp as ISO-8601 UTC; `null` otherwise. */
export const normalizeTimestamp = (value: string): string | null => {
  const epoch = parseTimestamp(value);
  return epoch === null ? null : new Date(epoch).toISOString();
};

/**
 * Normalises bars that may come from caches or files. Anything that is not a
 * complete OHLCV record with a parseable timestamp becomes `null`.
 */
export const sanitizeBar = (maybeBar: unknown): PriceBar | null => {
  const parsed = PriceBarSchema.omit({ indicators: true }).safeParse(maybeBar);
  if (!parsed.success) {
    return null;
  }
  const timestamp = normalizeTimestamp(parsed.data.timestamp);
  if (timestamp === null) {
    return null;
  }
  return { ...parsed.data, timestamp };
};

/**
 * Filters bars by the optional start/end timestamps inside a {@link DataRequest}.
 * Both bounds are inclusive.
 */
export const filterBarsForRequest = (
  bars: ReadonlyArray<PriceBar>,
  request: Pick<DataRequest, "start" | "end">,
): ReadonlyArray<PriceBar> => {
  const startEpoch = parseTimestamp(request.start ?? "");
  const endEpoch = parseTimestamp(request.end ?? "");
  if (startEpoch === null && endEpoch === null) {
    return bars;
  }

  return bars.filter((bar) => {
    const barEpoch = parseTimestamp(bar.timestamp);
    if (barEpoch === null) {
      return false;
    }
    const afterStart = startEpoch === null ? true : barEpoch >= startEpoch;
    const beforeEnd = endEpoch === null ? true : barEpoch <= endEpoch;
    return afterStart && beforeEnd;
  });
};

/**
 * Ensures all sources return bars in chronological order with one bar per
 * timestamp; later duplicates replace earlier ones.
 */
export const sortBarsChronologically = (bars: ReadonlyArray<PriceBar>): PriceBar[] => {
  const byTimestamp = new Map<string, PriceBar>();
  for (const bar of bars) {
    byTimestamp.set(bar.timestamp, bar);
  }
  return Array.from(byTimestamp.values()).sort((a, b) => {
    const epochA = parseTimestamp(a.timestamp) ?? 0;
    const epochB = parseTimestamp(b.timestamp) ?? 0;
    return epochA - epochB;
  });
};
