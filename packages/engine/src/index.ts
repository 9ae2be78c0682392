export * from "./simulator.js";
export * from "./costs.js";
export * from "./equity.js";
export * from "./performance.js";
export * from "./backtest.js";
export * from "./compare.js";
export * from "./paper.js";
export * from "./optimizer.js";
export * from "./persistence.js";
export * from "./customStrategyLoader.js";
