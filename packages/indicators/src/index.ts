/**
 * Technical indicators over price series. Every function is pure and returns
 * a series aligned with its input.
 * @packageDocumentation
 */

export * from "./types.js";
export { sma, ema, wilder } from "./movingAverages.js";
export * from "./oscillators.js";
export * from "./volatility.js";
export * from "./attach.js";
