import { z } from "zod";

import type { PriceBar } from "@strategy-lab/sdk";

export const DataRequestSchema = z.object({
  symbol: z.string().min(1),
  /** Bar interval label used in dataset names, e.g. "1d" or "1h". */
  interval: z.string().min(1),
  start: z.string().min(1).optional(),
  end: z.string().min(1).optional(),
});

export type DataRequest = z.infer<typeof DataRequestSchema>;

/**
 * Generic contract for loading market data series.
 */
export interface IDataSource {
  readonly id: string;
  loadBars(request: DataRequest): Promise<ReadonlyArray<PriceBar>>;
}
