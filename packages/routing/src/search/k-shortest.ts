/**
 * Top-k loopless paths (Yen's deviation algorithm).
 *
 * For each node of the most recently accepted path, the prefix up to that
 * node is kept as the root and a new spur is searched from it with:
 *   - every edge that continues an accepted path sharing the same root removed
 *   - every root node except the spur node removed (keeps results loopless)
 * Spliced root+spur candidates wait in a min-heap keyed by (cost, node-id
 * sequence); the cheapest unseen candidate is accepted next.
 */

import type { GraphStore } from "../graph/graph-store.js";
import type { WeightFunction } from "../weights/weight-function.js";
import { MinHeap } from "./priority-queue.js";
import {
  comparePaths,
  pathCost,
  pathKey,
  shortestPath,
  type WeightedPath,
} from "./shortest-path.js";

function hasPrefix(nodeIds: readonly string[], prefix: readonly string[]): boolean {
  if (nodeIds.length < prefix.length) return false;
  return prefix.every((id, i) => nodeIds[i] === id);
}

/**
 * Up to k distinct loopless paths in non-decreasing cost order.
 * Returns an empty array when target is unreachable.
 */
export function kShortestPaths(
  graph: GraphStore,
  source: string,
  target: string,
  weight: WeightFunction,
  k: number,
): WeightedPath[] {
  const first = shortestPath(graph, source, target, weight);
  if (!first || k < 1) return [];

  const accepted: WeightedPath[] = [first];
  const seen = new Set<string>([pathKey(first)]);
  const candidates = new MinHeap<WeightedPath>(comparePaths);

  while (accepted.length < k) {
    const last = accepted[accepted.length - 1];
    if (last === undefined) break;

    for (let i = 0; i < last.nodeIds.length - 1; i++) {
      const spurNode = last.nodeIds[i];
      if (spurNode === undefined) continue;
      const rootNodes = last.nodeIds.slice(0, i + 1);
      const rootEdges = last.edgeIds.slice(0, i);

      const excludedEdges = new Set<string>();
      for (const path of accepted) {
        const nextEdge = path.edgeIds[i];
        if (nextEdge !== undefined && hasPrefix(path.nodeIds, rootNodes)) {
          excludedEdges.add(nextEdge);
        }
      }
      const excludedNodes = new Set(rootNodes.slice(0, -1));

      const spur = shortestPath(graph, spurNode, target, weight, {
        nodeIds: excludedNodes,
        edgeIds: excludedEdges,
      });
      if (!spur) continue;

      const edgeIds = [...rootEdges, ...spur.edgeIds];
      const candidate: WeightedPath = {
        nodeIds: [...rootNodes.slice(0, -1), ...spur.nodeIds],
        edgeIds,
        cost: pathCost(graph, edgeIds, weight),
      };
      const key = pathKey(candidate);
      if (seen.has(key)) continue;
      seen.add(key);
      candidates.push(candidate);
    }

    const next = candidates.pop();
    if (!next) break;
    accepted.push(next);
  }

  return accepted;
}
