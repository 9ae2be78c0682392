import { strict as assert } from "node:assert";
import test from "node:test";

import {
  DegenerateRiskInputError,
  InsufficientFundsError,
  InvalidDataError,
  ParameterValidationError,
  StrategyLabError,
  isStrategyLabError,
} from "../src/index.js";

test("InvalidDataError carries its code and issues", () => {
  const error = new InvalidDataError("Invalid price series", ["bars[0].close: Required"]);
  assert.ok(error instanceof StrategyLabError);
  assert.ok(error instanceof Error);
  assert.equal(error.name, "InvalidDataError");
  assert.equal(error.code, "INVALID_DATA");
  assert.deepEqual(error.issues, ["bars[0].close: Required"]);
});

test("InsufficientFundsError formats required and available cash", () => {
  const error = new InsufficientFundsError("TEST", 1500, 999.5);
  assert.equal(error.code, "INSUFFICIENT_FUNDS");
  assert.equal(error.message, "Insufficient cash for TEST: need 1500.00, have 999.50");
  assert.equal(error.required, 1500);
  assert.equal(error.available, 999.5);
});

test("DegenerateRiskInputError names the offending input", () => {
  const error = new DegenerateRiskInputError("avgLoss", "avgLoss is zero");
  assert.equal(error.code, "DEGENERATE_RISK_INPUT");
  assert.equal(error.input, "avgLoss");
  assert.equal(error.name, "DegenerateRiskInputError");
});

test("ParameterValidationError joins issues into the message", () => {
  const error = new ParameterValidationError("ma_crossover", ["fastPeriod: too big", "slowPeriod: too small"]);
  assert.equal(error.code, "PARAMETER_VALIDATION");
  assert.equal(error.message, "Invalid parameters for ma_crossover: fastPeriod: too big; slowPeriod: too small");
  assert.equal(error.strategy, "ma_crossover");
});

test("isStrategyLabError narrows only library errors", () => {
  assert.equal(isStrategyLabError(new InvalidDataError("bad")), true);
  assert.equal(isStrategyLabError(new Error("plain")), false);
  assert.equal(isStrategyLabError("INVALID_DATA"), false);
});

test("StrategyLabError keeps the cause", () => {
  const cause = new Error("root");
  const error = new StrategyLabError("INVALID_DATA", "wrapped", { cause });
  assert.equal(error.cause, cause);
});
