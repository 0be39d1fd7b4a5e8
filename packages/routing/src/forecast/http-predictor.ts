/**
 * Predictor backed by an external model service.
 *
 * The trained flow regressor is served separately; this adapter sends one
 * feature row per edge and reads back one prediction per row, in order.
 */

import axios from "axios";

import type { GraphEdge, TimeContext } from "@campus-flow/types";
import { PredictionError } from "../errors.js";
import type { FlowPredictor } from "./predictor.js";

export interface HttpPredictorConfig {
  /** Model service base URL (e.g., "http://localhost:8500") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeout?: number;
  /** Lag features as a share of capacity, used when no live history exists (default: 0.1) */
  lagShare?: number;
}

/** Feature row in the column order the regressor was trained on */
export interface FlowFeatureRow {
  edge_id: string;
  hour: number;
  day_of_week: number;
  is_peak: number;
  capacity: number;
  length_m: number;
  flow_lag1: number;
  flow_lag2: number;
}

export function buildFeatureRows(
  context: TimeContext,
  edges: readonly GraphEdge[],
  lagShare: number,
): FlowFeatureRow[] {
  return edges.map((edge) => ({
    edge_id: edge.id,
    hour: context.hour,
    day_of_week: context.dayOfWeek,
    is_peak: context.isPeak,
    capacity: edge.capacity,
    length_m: edge.lengthMeters,
    flow_lag1: lagShare * edge.capacity,
    flow_lag2: lagShare * edge.capacity,
  }));
}

function readPredictions(data: unknown, expected: number): number[] {
  if (typeof data !== "object" || data === null || !("predictions" in data)) {
    throw new PredictionError("Model service response has no predictions");
  }
  const { predictions } = data;
  if (!Array.isArray(predictions) || predictions.length !== expected) {
    throw new PredictionError(
      `Model service returned ${Array.isArray(predictions) ? predictions.length : "no"} predictions for ${expected} edges`,
    );
  }
  return predictions.map((value: unknown, i) => {
    if (typeof value !== "number") {
      throw new PredictionError(`Prediction ${i} is not a number`);
    }
    return value;
  });
}

export class HttpFlowPredictor implements FlowPredictor {
  readonly name = "http";
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly lagShare: number;

  constructor(config: HttpPredictorConfig) {
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? 10000;
    this.lagShare = config.lagShare ?? 0.1;
  }

  async predictAll(context: TimeContext, edges: readonly GraphEdge[]): Promise<Map<string, number>> {
    const rows = buildFeatureRows(context, edges, this.lagShare);

    let data: unknown;
    try {
      const response = await axios.post<unknown>(
        "/predict",
        { rows },
        {
          baseURL: this.baseUrl,
          timeout: this.timeout,
          headers: {
            "Content-Type": "application/json",
            Accept: "application/json",
          },
        },
      );
      data = response.data;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new PredictionError(`Model service unavailable: ${reason}`, { cause: err });
    }

    const predictions = readPredictions(data, rows.length);
    const flows = new Map<string, number>();
    rows.forEach((row, i) => {
      const value = predictions[i];
      if (value !== undefined) flows.set(row.edge_id, value);
    });
    return flows;
  }
}
