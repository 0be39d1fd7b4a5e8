/**
 * Flow predictor contract.
 *
 * The routing core never sees the model itself: anything that maps a time
 * context to a per-edge flow can back the forecast cache (a trained
 * regressor behind HTTP, the rule-based baseline, or a test stub).
 */

import type { GraphEdge, TimeContext } from "@campus-flow/types";

export interface FlowPredictor {
  /** Identifies the predictor in forecast entries and logs */
  readonly name: string;
  /**
   * Predict flow for every given edge.
   *
   * Edges missing from the returned map are treated as uncongested.
   */
  predictAll(context: TimeContext, edges: readonly GraphEdge[]): Promise<Map<string, number>>;
}
