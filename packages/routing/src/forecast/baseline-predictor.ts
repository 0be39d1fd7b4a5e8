import type { GraphEdge, TimeContext } from "@campus-flow/types";
import type { FlowPredictor } from "./predictor.js";

/** Share of capacity used at any hour */
const BASE_SHARE = 0.25;
const PEAK_SHARE = 0.4;
const OFF_PEAK_SHARE = 0.1;
/** Afternoon drift: up to this share is added linearly over the day */
const HOUR_TREND_SHARE = 0.05;

/**
 * Linear baseline: the mean of the synthetic flow generator, without noise.
 */
export class BaselineFlowPredictor implements FlowPredictor {
  readonly name = "baseline";

  static expectedFlow(capacity: number, context: TimeContext): number {
    const share =
      BASE_SHARE +
      (context.isPeak === 1 ? PEAK_SHARE : OFF_PEAK_SHARE) +
      HOUR_TREND_SHARE * (context.hour / 24);
    return share * capacity;
  }

  async predictAll(context: TimeContext, edges: readonly GraphEdge[]): Promise<Map<string, number>> {
    const flows = new Map<string, number>();
    for (const edge of edges) {
      flows.set(edge.id, BaselineFlowPredictor.expectedFlow(edge.capacity, context));
    }
    return flows;
  }
}
