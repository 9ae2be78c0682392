export { DataRequestSchema, type DataRequest, type IDataSource } from "./IDataSource.js";
export { CsvSource, DEFAULT_DATASETS_DIR, createCsvSource, parseCsvBars } from "./CsvSource.js";
export type { CsvParseResult, CsvSourceOptions } from "./CsvSource.js";
export { filterBarsForRequest, normalizeTimestamp, slugify, sortBarsChronologically } from "./internalUtils.js";
