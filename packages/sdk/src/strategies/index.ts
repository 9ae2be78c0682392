export * as maCrossover from "./ma_crossover.js";
export * as rsiMeanReversion from "./rsi_mean_reversion.js";
export * as macdCrossover from "./macd_crossover.js";
export * as bollingerReversion from "./bollinger_reversion.js";
