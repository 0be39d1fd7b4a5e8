/**
 * Forecast cache: one immutable forecast per time context.
 *
 * The key space is bounded (24 hours x 7 days x 2 peak flags = 336), so
 * entries are kept for the life of the process with no eviction.
 *
 * Population is single-flight per key: the first caller for a missing key
 * starts the prediction and every concurrent caller awaits that same
 * promise. A failed prediction stores nothing, so the next caller retries
 * from scratch.
 */

import type {
  CongestionLevel,
  EdgeForecast,
  ForecastCacheStats,
  ForecastEntry,
  TimeContext,
} from "@campus-flow/types";
import { CampusFlowError, PredictionError } from "../errors.js";
import type { GraphStore } from "../graph/graph-store.js";
import type { FlowPredictor } from "./predictor.js";
import {
  TIME_CONTEXT_KEY_SPACE,
  congestionLevel,
  congestionRatio,
  timeContextKey,
  validateTimeContext,
} from "./time-context.js";

/** External row form of a forecast entry */
export interface ForecastRow {
  edgeId: string;
  predFlow: number;
  capacity: number;
  ratio: number;
  level: CongestionLevel;
}

export class ForecastCache {
  private readonly entries = new Map<string, ForecastEntry>();
  private readonly inFlight = new Map<string, Promise<ForecastEntry>>();
  private latestEntry: ForecastEntry | null = null;
  private hits = 0;
  private awaited = 0;
  private misses = 0;
  private computations = 0;

  constructor(
    private readonly graph: GraphStore,
    private readonly predictor: FlowPredictor,
  ) {}

  /**
   * Return the forecast for a context, computing it on first request.
   *
   * @throws InvalidTimeContextError for out-of-range contexts
   * @throws PredictionError when the predictor fails or returns non-finite flows
   */
  async getOrCompute(context: TimeContext): Promise<ForecastEntry> {
    const valid = validateTimeContext(context);
    const key = timeContextKey(valid);

    const cached = this.entries.get(key);
    if (cached) {
      this.hits++;
      this.latestEntry = cached;
      console.log(`[forecast] HIT ${key}`);
      return cached;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.awaited++;
      console.log(`[forecast] Awaiting in-flight computation for ${key}`);
      return pending;
    }

    this.misses++;
    const computation = this.compute(valid, key).then(
      (entry) => {
        this.entries.set(key, entry);
        this.inFlight.delete(key);
        this.latestEntry = entry;
        return entry;
      },
      (err: unknown) => {
        this.inFlight.delete(key);
        throw err;
      },
    );
    this.inFlight.set(key, computation);
    return computation;
  }

  /** Peek without computing */
  get(context: TimeContext): ForecastEntry | undefined {
    return this.entries.get(timeContextKey(validateTimeContext(context)));
  }

  /** The most recently resolved entry, the forecast penalized routing uses by default */
  latest(): ForecastEntry | null {
    return this.latestEntry;
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): ForecastCacheStats {
    return {
      entries: this.entries.size,
      hits: this.hits,
      awaited: this.awaited,
      misses: this.misses,
      computations: this.computations,
      inFlight: this.inFlight.size,
    };
  }

  private async compute(context: TimeContext, key: string): Promise<ForecastEntry> {
    this.computations++;
    const edges = [...this.graph.edges()];
    const start = performance.now();

    let flows: Map<string, number>;
    try {
      flows = await this.predictor.predictAll(context, edges);
    } catch (err) {
      if (err instanceof CampusFlowError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new PredictionError(`Predictor "${this.predictor.name}" failed for ${key}: ${reason}`, {
        cause: err,
      });
    }

    const forecasts = new Map<string, Readonly<EdgeForecast>>();
    let missing = 0;
    for (const edge of edges) {
      const raw = flows.get(edge.id);
      if (raw === undefined) {
        missing++;
        continue;
      }
      if (!Number.isFinite(raw)) {
        throw new PredictionError(`Predictor "${this.predictor.name}" returned ${raw} for edge ${edge.id}`);
      }
      const predFlow = Math.max(0, raw);
      const ratio = congestionRatio(predFlow, edge.capacity);
      forecasts.set(
        edge.id,
        Object.freeze({
          edgeId: edge.id,
          predFlow,
          capacity: edge.capacity,
          ratio,
          level: congestionLevel(ratio),
        }),
      );
    }

    console.log(
      `[forecast] MISS ${key}: predicted ${forecasts.size} edges with "${this.predictor.name}" in ${(performance.now() - start).toFixed(0)}ms` +
        (missing > 0 ? ` (${missing} edges without prediction)` : "") +
        ` [${this.entries.size + 1}/${TIME_CONTEXT_KEY_SPACE}]`,
    );

    return Object.freeze({
      context: Object.freeze({ ...context }),
      key,
      createdAt: new Date().toISOString(),
      predictor: this.predictor.name,
      edges: forecasts,
    });
  }
}

/** Rows sorted by edge id, the shape served to clients */
export function toForecastRows(entry: ForecastEntry): ForecastRow[] {
  return [...entry.edges.values()]
    .map((f) => ({
      edgeId: f.edgeId,
      predFlow: f.predFlow,
      capacity: f.capacity,
      ratio: f.ratio,
      level: f.level,
    }))
    .sort((a, b) => (a.edgeId < b.edgeId ? -1 : a.edgeId > b.edgeId ? 1 : 0));
}
