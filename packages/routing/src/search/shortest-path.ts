/**
 * Single-pair shortest path (Dijkstra).
 *
 * Weights are non-negative, so the first time the target is settled its
 * label is optimal. Labels carry the full node sequence so that equal-cost
 * paths can be ordered lexicographically: among paths of equal cost the one
 * with the smaller node-id sequence always wins, which makes every search
 * reproducible regardless of insertion order.
 */

import type { GraphEdge } from "@campus-flow/types";
import type { GraphStore } from "../graph/graph-store.js";
import { InvalidQueryError } from "../errors.js";
import type { WeightFunction } from "../weights/weight-function.js";
import { MinHeap } from "./priority-queue.js";

/** A path with its total cost under some weight function */
export interface WeightedPath {
  /** Node ids, source first (length = edgeIds.length + 1) */
  nodeIds: string[];
  edgeIds: string[];
  cost: number;
}

/** Nodes and edges a search may not use */
export interface SearchExclusions {
  nodeIds?: ReadonlySet<string>;
  edgeIds?: ReadonlySet<string>;
}

const COST_EPSILON = 1e-9;

export function costsEqual(a: number, b: number): boolean {
  return Math.abs(a - b) <= COST_EPSILON * Math.max(1, Math.abs(a), Math.abs(b));
}

/** Lexicographic order of node-id sequences (code-unit order, shorter prefix first) */
export function compareNodeSequences(a: readonly string[], b: readonly string[]): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i] ?? "";
    const y = b[i] ?? "";
    if (x < y) return -1;
    if (x > y) return 1;
  }
  return a.length - b.length;
}

/** Order by cost, then by node-id sequence */
export function comparePaths(a: WeightedPath, b: WeightedPath): number {
  if (!costsEqual(a.cost, b.cost)) return a.cost < b.cost ? -1 : 1;
  return compareNodeSequences(a.nodeIds, b.nodeIds);
}

export function pathKey(path: WeightedPath): string {
  return path.nodeIds.join("\u0000");
}

function edgeWeight(weight: WeightFunction, edge: GraphEdge): number {
  const w = weight(edge);
  if (!Number.isFinite(w) || w < 0) {
    throw new InvalidQueryError(`Edge ${edge.id} has invalid weight ${w}`);
  }
  return w;
}

/** Sum of weights along an edge sequence, in travel order */
export function pathCost(graph: GraphStore, edgeIds: readonly string[], weight: WeightFunction): number {
  let cost = 0;
  for (const id of edgeIds) {
    const edge = graph.edgeById(id);
    if (!edge) throw new InvalidQueryError(`Unknown edge ${id} in path`);
    cost += edgeWeight(weight, edge);
  }
  return cost;
}

/**
 * Cheapest path from source to target, or null if unreachable.
 * Both endpoints are assumed to exist in the graph.
 */
export function shortestPath(
  graph: GraphStore,
  source: string,
  target: string,
  weight: WeightFunction,
  exclusions: SearchExclusions = {},
): WeightedPath | null {
  const excludedNodes = exclusions.nodeIds;
  const excludedEdges = exclusions.edgeIds;
  if (excludedNodes?.has(source) || excludedNodes?.has(target)) return null;

  const start: WeightedPath = { nodeIds: [source], edgeIds: [], cost: 0 };
  const best = new Map<string, WeightedPath>([[source, start]]);
  const settled = new Set<string>();
  const heap = new MinHeap<WeightedPath>(comparePaths);
  heap.push(start);

  for (let label = heap.pop(); label !== undefined; label = heap.pop()) {
    const nodeId = label.nodeIds[label.nodeIds.length - 1];
    if (nodeId === undefined || settled.has(nodeId)) continue;
    // Superseded by a better label pushed later
    if (best.get(nodeId) !== label) continue;
    settled.add(nodeId);
    if (nodeId === target) return label;

    for (const { edge, otherNodeId } of graph.neighbors(nodeId)) {
      if (settled.has(otherNodeId)) continue;
      if (excludedNodes?.has(otherNodeId) || excludedEdges?.has(edge.id)) continue;

      const candidate: WeightedPath = {
        nodeIds: [...label.nodeIds, otherNodeId],
        edgeIds: [...label.edgeIds, edge.id],
        cost: label.cost + edgeWeight(weight, edge),
      };
      const existing = best.get(otherNodeId);
      if (existing === undefined || comparePaths(candidate, existing) < 0) {
        best.set(otherNodeId, candidate);
        heap.push(candidate);
      }
    }
  }

  return null;
}
