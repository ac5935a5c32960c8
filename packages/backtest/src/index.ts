// Types
export type { Bar, BarSeries } from "./types/bar.js";
export { BarSchema, toBarSeries } from "./types/bar.js";
export type { Direction, Signal, ExitReason, Position, Trade, EquityPoint } from "./types/trade.js";
export type { Metrics, ExitReasonStats } from "./types/metrics.js";

// Errors
export { InvalidArgumentError, tryResult } from "./errors.js";
export type { Result } from "./errors.js";

// Rolling statistics
export { rollingMean, emaRecursion, rollingStdDev } from "./indicators/rolling.js";

// Indicators
export { sma } from "./indicators/sma.js";
export { ema } from "./indicators/ema.js";
export { rsi } from "./indicators/rsi.js";
export { atr, trueRange } from "./indicators/atr.js";
export { stddev } from "./indicators/stddev.js";
export { bollinger } from "./indicators/bollinger.js";
export type { BollingerResult } from "./indicators/bollinger.js";

// Engine
export { simulateTrades, safeSimulateTrades, simulateTradesFromArrays } from "./engine/simulate-trades.js";
export type { SimulationResult } from "./engine/simulate-trades.js";
export { SimulationOptionsSchema, StopConfigSchema } from "./engine/simulation-options.js";
export type { SimulationOptions, ResolvedSimulationOptions, StopConfig } from "./engine/simulation-options.js";
export { PositionTracker } from "./engine/position-tracker.js";
export { EquityCurve } from "./engine/equity-curve.js";
export { computeStopLevels, resolveExit } from "./engine/exit-rules.js";
export type { StopLevels, ExitFill } from "./engine/exit-rules.js";

// Analysis
export { computeMetrics, annualizationFactor } from "./analysis/metrics-calculator.js";

// Strategies
export { maCrossoverSignals } from "./strategies/ma-crossover.js";
export { volatilityBreakoutSignals } from "./strategies/volatility-breakout.js";

export { logger } from "./lib/logger.js";
