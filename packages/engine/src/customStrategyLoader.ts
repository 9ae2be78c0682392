import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import { createJiti } from "jiti";
import { z } from "zod";

import { createLogger, type Logger } from "@strategy-lab/logger";
import {
  InvalidDataError,
  defineStrategy,
  formatIssues,
  strategyConfigs,
  withSignal,
  type PriceBar,
  type SignaledBar,
  type Strategy,
  type StrategyConfig,
  type StrategyField,
  type StrategyParams,
} from "@strategy-lab/sdk";

import { slugify } from "./persistence.js";

const MODULE_DIR = fileURLToPath(new URL(".", import.meta.url));
const REPO_ROOT = join(MODULE_DIR, "..", "..", "..");
export const DEFAULT_CUSTOM_STRATEGIES_DIR = join(REPO_ROOT, "storage", "strategies", "custom");

const jiti = createJiti(import.meta.url, {
  interopDefault: true,
});

/** -----------------------------------------------------------------------
 *  Module contract
 *  -------------------------------------------------------------------- */

const FieldSpecSchema = z.object({
  type: z.literal("number"),
  label: z.string().min(1),
  default: z.number().finite(),
  min: z.number().finite().optional(),
  max: z.number().finite().optional(),
  step: z.number().positive().optional(),
  description: z.string().optional(),
});

type FieldSpec = z.infer<typeof FieldSpecSchema>;

type SignalSource = (params: StrategyParams) => unknown;

const CustomStrategyModuleSchema = z.object({
  metadata: z.object({
    key: z
      .string()
      .regex(/^[a-z0-9_]+$/, "key must be lowercase letters, digits or underscores")
      .optional(),
    name: z.string().min(1),
    description: z.string().default(""),
    version: z.string().optional(),
    author: z.string().optional(),
    tags: z.array(z.string()).optional(),
  }),
  configSchema: z.record(FieldSpecSchema).optional(),
  createStrategy: z.custom<SignalSource>(
    (value) => typeof value === "function",
    "createStrategy must be a function",
  ),
});

export type CustomStrategyModule = z.infer<typeof CustomStrategyModuleSchema>;

interface SignalGenerator {
  generateSignals(bars: ReadonlyArray<PriceBar>): unknown;
}

const isSignalGenerator = (value: unknown): value is SignalGenerator =>
  typeof value === "object" &&
  value !== null &&
  "generateSignals" in value &&
  typeof value.generateSignals === "function";

const SignalActionSchema = z.enum(["BUY", "SELL", "HOLD"]);

/** A custom strategy may return bare actions or objects carrying a strength. */
const CustomSignalSchema = z.union([
  SignalActionSchema.transform((signal) => ({ signal, signalStrength: 0 })),
  z.object({
    signal: SignalActionSchema,
    signalStrength: z.number().finite().min(-1).max(1).default(0),
  }),
]);

const CustomSignalsSchema = z.array(CustomSignalSchema);

/** -----------------------------------------------------------------------
 *  Registration
 *  -------------------------------------------------------------------- */

const buildParamsSchema = (
  specs: Readonly<Record<string, FieldSpec>>,
): z.ZodType<StrategyParams, z.ZodTypeDef, unknown> => {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [key, spec] of Object.entries(specs)) {
    let field = z.number().finite();
    if (spec.min !== undefined) {
      field = field.min(spec.min);
    }
    if (spec.max !== undefined) {
      field = field.max(spec.max);
    }
    shape[key] = field.default(spec.default);
  }
  return z.object(shape).passthrough();
};

const buildFields = (specs: Readonly<Record<string, FieldSpec>>): StrategyField[] =>
  Object.entries(specs).map(([key, spec]) => ({
    key,
    label: spec.label,
    description: spec.description,
    type: "number",
    min: spec.min,
    max: spec.max,
    step: spec.step,
  }));

/**
 * Turns a validated custom module into a registry entry. The module's
 * `createStrategy` is called once per instantiation; its signals are checked
 * and merged onto the input bars.
 */
export const registerCustomStrategy = (module: CustomStrategyModule): StrategyConfig => {
  const { metadata } = module;
  const key = metadata.key ?? slugify(metadata.name);
  const specs = module.configSchema ?? {};
  const defaults: Record<string, number> = {};
  for (const [field, spec] of Object.entries(specs)) {
    defaults[field] = spec.default;
  }

  return defineStrategy({
    key,
    title: metadata.name,
    description: metadata.description,
    defaults,
    fields: buildFields(specs),
    schema: buildParamsSchema(specs),
    factory: (params): Strategy => {
      const generator = module.createStrategy(params);
      if (!isSignalGenerator(generator)) {
        throw new InvalidDataError(`${metadata.name}: createStrategy must return an object with generateSignals`);
      }
      return {
        key,
        name: metadata.name,
        description: metadata.description,
        params,
        generateSignals(bars: ReadonlyArray<PriceBar>): SignaledBar[] {
          const parsed = CustomSignalsSchema.safeParse(generator.generateSignals(bars));
          if (!parsed.success) {
            throw new InvalidDataError(`${metadata.name} returned malformed signals`, formatIssues(parsed.error));
          }
          if (parsed.data.length !== bars.length) {
            throw new InvalidDataError(
              `${metadata.name} produced ${parsed.data.length} signals for ${bars.length} bars`,
            );
          }
          return bars.map((bar, index) => {
            const entry = parsed.data[index];
            return entry ? withSignal(bar, entry.signal, entry.signalStrength) : withSignal(bar, "HOLD", 0);
          });
        },
      };
    },
  });
};

/** -----------------------------------------------------------------------
 *  Discovery
 *  -------------------------------------------------------------------- */

export interface LoadCustomStrategiesOptions {
  readonly dir?: string;
  readonly logger?: Logger;
}

const isMissingDirectory = (error: unknown): boolean =>
  error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");

const isStrategyFile = (filename: string): boolean =>
  filename.endsWith(".ts") && !filename.endsWith(".d.ts") && !filename.includes(".test.");

/**
 * Loads every `*.ts` module in `dir` that exports `metadata` and
 * `createStrategy`. Files that fail to load or validate are logged and
 * skipped; a missing directory yields an empty registry.
 */
export const loadCustomStrategies = async (
  options: LoadCustomStrategiesOptions = {},
): Promise<Record<string, StrategyConfig>> => {
  const dir = options.dir ?? DEFAULT_CUSTOM_STRATEGIES_DIR;
  const logger = options.logger ?? createLogger("engine/custom-strategies");
  const registry: Record<string, StrategyConfig> = {};

  let files: string[];
  try {
    files = await readdir(dir);
  } catch (error) {
    if (isMissingDirectory(error)) {
      logger.warn("Custom strategy directory not found", { dir });
      return registry;
    }
    throw error;
  }

  for (const filename of files.filter(isStrategyFile).sort()) {
    const filePath = join(dir, filename);
    try {
      const loaded: unknown = await jiti.import(filePath);
      const parsed = CustomStrategyModuleSchema.safeParse(loaded);
      if (!parsed.success) {
        logger.warn("Skipping custom strategy with invalid exports", {
          file: filename,
          issues: formatIssues(parsed.error),
        });
        continue;
      }

      const config = registerCustomStrategy(parsed.data);
      if (Object.prototype.hasOwnProperty.call(strategyConfigs, config.key) || registry[config.key]) {
        logger.warn("Skipping custom strategy with duplicate key", { file: filename, key: config.key });
        continue;
      }
      registry[config.key] = config;
      logger.info("Loaded custom strategy", { file: filename, key: config.key });
    } catch (error) {
      logger.error("Failed to load custom strategy", {
        file: filename,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  logger.info("Custom strategies loaded", { dir, count: Object.keys(registry).length });
  return registry;
};

/** Built-ins plus whatever `dir` contributes. */
export const loadStrategyRegistry = async (
  options: LoadCustomStrategiesOptions = {},
): Promise<Readonly<Record<string, StrategyConfig>>> => ({
  ...strategyConfigs,
  ...(await loadCustomStrategies(options)),
});
