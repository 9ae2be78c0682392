#!/usr/bin/env -S node --import tsx
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import { config as loadEnv } from "dotenv";

const MODULE_DIR = fileURLToPath(new URL(".", import.meta.url));
const REPO_ROOT = join(MODULE_DIR, "..", "..", "..");
loadEnv({ path: join(REPO_ROOT, ".env") });
loadEnv();

import { CsvSource } from "@strategy-lab/data";
import { loadStrategyRegistry, saveBacktestResults } from "@strategy-lab/engine";
import { createLogger } from "@strategy-lab/logger";
import { tradingConfigFromEnv } from "@strategy-lab/sdk";

import { USAGE, createRunHandler, parseRunnerArgs } from "./runner.js";

const logger = createLogger("services/runner");

const main = async (): Promise<void> => {
  const parsed = parseRunnerArgs(process.argv.slice(2));
  if (parsed.help) {
    process.stdout.write(USAGE);
    return;
  }

  const defaultDatasetsDir = process.env.STRATEGY_LAB_DATASETS_DIR ?? join(REPO_ROOT, "storage", "datasets");
  const handle = createRunHandler({
    config: tradingConfigFromEnv(process.env),
    logger,
    loadBars: ({ datasetsDir, ...request }) =>
      new CsvSource({ datasetsDir: datasetsDir ?? defaultDatasetsDir, logger: logger.child("data") }).loadBars(request),
    loadRegistry: (customDir) => loadStrategyRegistry({ dir: customDir, logger: logger.child("custom-strategies") }),
    saveBacktest: saveBacktestResults,
    write: (text) => {
      process.stdout.write(`${text}\n`);
    },
    now: () => new Date(),
    defaultOutDir: process.env.STRATEGY_LAB_RUNS_DIR,
  });

  const outcome = await handle(parsed.args);
  if (outcome.artifacts) {
    process.stdout.write(`Artifacts saved to ${outcome.artifacts.runDir}\n`);
  }
};

main().catch((error: unknown) => {
  logger.error("Runner failed", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exitCode = 1;
});
