/**
 * Edge weight functions.
 *
 * distance:  cost = length
 * penalized: cost = length * (1 + alpha * curve(ratio))
 *
 * The ratio comes from the forecast entry; edges without a forecast count
 * as uncongested. "both" is not a weighting; the engine runs one search
 * per weighting instead.
 */

import type { ForecastEntry, GraphEdge, PenaltyCurve, Weighting } from "@campus-flow/types";
import { ForecastNotReadyError, InvalidQueryError } from "../errors.js";
import { CONGESTION_THRESHOLDS } from "../forecast/time-context.js";

export type WeightFunction = (edge: GraphEdge) => number;

export interface WeightOptions {
  /** Required for penalized weighting */
  forecast?: ForecastEntry | null;
  /** Congestion weight alpha (>= 0) */
  congestionWeight: number;
  penaltyCurve: PenaltyCurve;
}

/** Banded penalties for the stepped curve, by congestion level */
export const STEPPED_PENALTIES = { low: 0, medium: 0.3, high: 0.7 } as const;

export function penaltyFactor(ratio: number, curve: PenaltyCurve): number {
  if (curve === "linear") return ratio;
  if (ratio < CONGESTION_THRESHOLDS.low) return STEPPED_PENALTIES.low;
  if (ratio < CONGESTION_THRESHOLDS.medium) return STEPPED_PENALTIES.medium;
  return STEPPED_PENALTIES.high;
}

export function distanceWeight(edge: GraphEdge): number {
  return edge.lengthMeters;
}

/**
 * @throws ForecastNotReadyError for penalized weighting without a forecast
 * @throws InvalidQueryError for a negative or non-finite congestion weight
 */
export function createWeightFunction(weighting: Weighting, options: WeightOptions): WeightFunction {
  if (weighting === "distance") return distanceWeight;

  const { forecast, congestionWeight, penaltyCurve } = options;
  if (!forecast) throw new ForecastNotReadyError();
  if (!Number.isFinite(congestionWeight) || congestionWeight < 0) {
    throw new InvalidQueryError(`congestionWeight must be a finite number >= 0, got ${congestionWeight}`);
  }

  return (edge) => {
    const ratio = forecast.edges.get(edge.id)?.ratio ?? 0;
    return edge.lengthMeters * (1 + congestionWeight * penaltyFactor(ratio, penaltyCurve));
  };
}
