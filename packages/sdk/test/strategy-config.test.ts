import { strict as assert } from "node:assert";
import test from "node:test";
import { z } from "zod";

import {
  ParameterValidationError,
  createStrategy,
  defineStrategy,
  holdAll,
  isStrategyKey,
  strategyConfigs,
  strategyList,
} from "../src/index.js";

test("all strategy defaults satisfy their schemas", () => {
  for (const config of strategyList) {
    const result = config.schema.safeParse(config.defaults);
    assert.ok(result.success, `defaults for ${config.key} should be valid`);
  }
});

test("every field is present in the defaults", () => {
  for (const config of strategyList) {
    for (const field of config.fields) {
      assert.ok(field.key in config.defaults, `${config.key}.${field.key} should have a default`);
    }
  }
});

test("registry keys match the strategy keys they create", () => {
  for (const [key, config] of Object.entries(strategyConfigs)) {
    assert.equal(config.key, key);
    assert.equal(config.create({}).key, key);
  }
});

test("createStrategy fills in schema defaults", () => {
  const strategy = createStrategy("rsi_mean_reversion", { period: 7 });
  assert.deepEqual(strategy.params, { period: 7, oversold: 30, overbought: 70 });
});

test("createStrategy rejects a fast period not below the slow period", () => {
  assert.throws(
    () => createStrategy("ma_crossover", { fastPeriod: 30, slowPeriod: 10 }),
    (error: unknown) => {
      assert.ok(error instanceof ParameterValidationError);
      assert.equal(error.strategy, "ma_crossover");
      assert.deepEqual(error.issues, ["fastPeriod: fastPeriod must be less than slowPeriod"]);
      return true;
    },
  );
});

test("createStrategy rejects unknown keys", () => {
  assert.throws(
    () => createStrategy("coin_flip", {}),
    /Invalid parameters for coin_flip: unknown strategy, expected one of: ma_crossover, rsi_mean_reversion, macd_crossover, bollinger_reversion/,
  );
});

test("isStrategyKey only accepts built-in keys", () => {
  assert.equal(isStrategyKey("macd_crossover"), true);
  assert.equal(isStrategyKey("toString"), false);
  assert.equal(isStrategyKey("coin_flip"), false);
});

test("defineStrategy registers a user-defined variant", () => {
  const schema = z.object({ label: z.string().default("idle") });
  const idle = defineStrategy({
    key: "idle",
    title: "Idle",
    description: "Never trades.",
    defaults: { label: "idle" },
    fields: [],
    schema,
    factory: (params) => ({
      key: "idle",
      name: `Idle (${params.label})`,
      description: "Never trades.",
      params,
      generateSignals: holdAll,
    }),
  });

  const strategy = createStrategy("idle", { label: "quiet" }, { ...strategyConfigs, idle });
  assert.equal(strategy.name, "Idle (quiet)");
  assert.throws(() => idle.create({ label: 3 }), ParameterValidationError);
});
