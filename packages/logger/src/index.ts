export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = {
  readonly runId?: string;
} & Record<string, unknown>;

export interface Logger {
  readonly module: string;
  readonly level: LogLevel;
  log(level: LogLevel, msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  child(suffix: string): Logger;
}

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Minimum level written; defaults to STRATEGY_LAB_LOG_LEVEL or "info". */
  readonly level?: LogLevel;
  /** Destination for serialized lines; defaults to stdout/stderr. */
  readonly sink?: LogSink;
}

export const LOG_LEVEL_ENV = "STRATEGY_LAB_LOG_LEVEL";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && value in LEVEL_RANK;

const writeLine: LogSink = (level, line) => {
  const output = level === "error" ? process.stderr : process.stdout;
  output.write(`${line}\n`);
};

const resolveLevel = (explicit?: LogLevel): LogLevel => {
  if (explicit) {
    return explicit;
  }
  const fromEnv = process.env[LOG_LEVEL_ENV]?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "info";
};

const buildEntry = (moduleName: string, level: LogLevel, msg: string, meta?: LogMeta) => {
  const { runId, ...rest } = meta ?? {};

  return {
    ts: new Date().toISOString(),
    level,
    module: moduleName,
    msg,
    ...(typeof runId === "string" ? { runId } : {}),
    ...rest,
  };
};

export const createLogger = (moduleName: string, options: LoggerOptions = {}): Logger => {
  const threshold = resolveLevel(options.level);
  const sink = options.sink ?? writeLine;

  const log = (level: LogLevel, msg: string, meta?: LogMeta): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) {
      return;
    }
    const entry = buildEntry(moduleName, level, msg, meta);
    sink(level, JSON.stringify(entry));
  };

  return {
    module: moduleName,
    level: threshold,
    log,
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
    child: (suffix) => createLogger(`${moduleName}/${suffix}`, { level: threshold, sink }),
  };
};

/**
 * Logger that discards everything, for callers that run many quiet trials.
 */
export const createSilentLogger = (moduleName = "silent"): Logger =>
  createLogger(moduleName, { level: "error", sink: () => {} });
