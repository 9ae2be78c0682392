export type StrategyLabErrorCode =
  | "INVALID_DATA"
  | "INSUFFICIENT_FUNDS"
  | "DEGENERATE_RISK_INPUT"
  | "PARAMETER_VALIDATION";

/**
 * Base class for every recoverable failure raised by the core. None of them
 * is fatal: callers either skip the unit of work or fall back to a default.
 */
export class StrategyLabError extends Error {
  public readonly code: StrategyLabErrorCode;

  public constructor(code: StrategyLabErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Input series is missing required fields or is otherwise unusable. */
export class InvalidDataError extends StrategyLabError {
  public readonly issues: ReadonlyArray<string>;

  public constructor(message: string, issues: ReadonlyArray<string> = []) {
    super("INVALID_DATA", message);
    this.issues = issues;
  }
}

/** An order needs more cash than the portfolio holds. Logged, never thrown by the core. */
export class InsufficientFundsError extends StrategyLabError {
  public readonly required: number;
  public readonly available: number;

  public constructor(symbol: string, required: number, available: number) {
    super(
      "INSUFFICIENT_FUNDS",
      `Insufficient cash for ${symbol}: need ${required.toFixed(2)}, have ${available.toFixed(2)}`,
    );
    this.required = required;
    this.available = available;
  }
}

/** A risk calculator received an input that would divide by zero. */
export class DegenerateRiskInputError extends StrategyLabError {
  public readonly input: string;

  public constructor(input: string, message: string) {
    super("DEGENERATE_RISK_INPUT", message);
    this.input = input;
  }
}

/** Strategy parameters failed their schema (e.g. fast period >= slow period). */
export class ParameterValidationError extends StrategyLabError {
  public readonly strategy: string;
  public readonly issues: ReadonlyArray<string>;

  public constructor(strategy: string, issues: ReadonlyArray<string>) {
    super("PARAMETER_VALIDATION", `Invalid parameters for ${strategy}: ${issues.join("; ")}`);
    this.strategy = strategy;
    this.issues = issues;
  }
}

export const isStrategyLabError = (value: unknown): value is StrategyLabError =>
  value instanceof StrategyLabError;
