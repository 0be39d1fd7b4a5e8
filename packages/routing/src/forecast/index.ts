/**
 * Forecast module.
 *
 * Flow predictors (context -> per-edge flow) and the per-context forecast
 * cache the router reads congestion ratios from.
 */

export type { FlowPredictor } from "./predictor.js";
export { BaselineFlowPredictor } from "./baseline-predictor.js";
export { StaticFlowPredictor } from "./static-predictor.js";
export {
  HttpFlowPredictor,
  buildFeatureRows,
  type HttpPredictorConfig,
  type FlowFeatureRow,
} from "./http-predictor.js";
export { ForecastCache, toForecastRows, type ForecastRow } from "./forecast-cache.js";
export {
  validateTimeContext,
  timeContextKey,
  congestionRatio,
  congestionLevel,
  CONGESTION_THRESHOLDS,
  TIME_CONTEXT_KEY_SPACE,
} from "./time-context.js";
