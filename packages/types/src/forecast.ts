/**
 * Congestion forecast types.
 *
 * A forecast is a point-in-time snapshot of predicted pedestrian flow for
 * every edge, keyed by a discretized time context.
 */

/** Discretized time context used as the forecast key */
export interface TimeContext {
  /** Hour of day, 0-23 */
  hour: number;
  /** Day of week, 0-6 */
  dayOfWeek: number;
  /** 1 during class-change peaks, 0 otherwise */
  isPeak: 0 | 1;
}

/** Congestion class derived from the flow/capacity ratio */
export type CongestionLevel = "low" | "medium" | "high";

/** Forecast for a single edge */
export interface EdgeForecast {
  edgeId: string;
  /** Predicted flow (>= 0) */
  predFlow: number;
  capacity: number;
  /** predFlow / max(capacity, 1) */
  ratio: number;
  level: CongestionLevel;
}

/** A cached, immutable forecast for one time context */
export interface ForecastEntry {
  context: Readonly<TimeContext>;
  /** Cache key, "hour:dayOfWeek:isPeak" */
  key: string;
  /** When the entry was computed (ISO 8601) */
  createdAt: string;
  /** Name of the predictor that produced the flows */
  predictor: string;
  edges: ReadonlyMap<string, Readonly<EdgeForecast>>;
}

/** Forecast cache counters */
export interface ForecastCacheStats {
  entries: number;
  /** Served from a stored entry */
  hits: number;
  /** Joined a computation already in flight */
  awaited: number;
  misses: number;
  computations: number;
  inFlight: number;
}
