import type { GraphEdge, TimeContext } from "@campus-flow/types";
import type { FlowPredictor } from "./predictor.js";

/**
 * Fixed per-edge flows, independent of the time context.
 * Edges not in the table get `defaultFlow` (0 unless given).
 */
export class StaticFlowPredictor implements FlowPredictor {
  readonly name: string;
  private readonly flows: ReadonlyMap<string, number>;
  private readonly defaultFlow: number;

  constructor(flows: Record<string, number> | Map<string, number>, options: { name?: string; defaultFlow?: number } = {}) {
    this.flows = flows instanceof Map ? new Map(flows) : new Map(Object.entries(flows));
    this.name = options.name ?? "static";
    this.defaultFlow = options.defaultFlow ?? 0;
  }

  async predictAll(_context: TimeContext, edges: readonly GraphEdge[]): Promise<Map<string, number>> {
    const out = new Map<string, number>();
    for (const edge of edges) {
      out.set(edge.id, this.flows.get(edge.id) ?? this.defaultFlow);
    }
    return out;
  }
}
