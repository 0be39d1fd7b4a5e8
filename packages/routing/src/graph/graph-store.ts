/**
 * Immutable in-memory campus graph.
 *
 * Built once at startup from ingested node/edge tables and read-only
 * afterwards, so concurrent queries share it without synchronization.
 * Loading is all-or-nothing: every row is checked and all issues are
 * reported together in a single MalformedGraphError.
 */

import type { Coordinate, GraphEdge, GraphNode, Neighbor } from "@campus-flow/types";
import { MalformedGraphError } from "../errors.js";
import { haversineDistance } from "./geo.js";

/** Result of snapping a coordinate to the nearest node */
export interface SnapResult {
  node: GraphNode;
  distanceMeters: number;
}

function pairKey(u: string, v: string): string {
  return u < v ? `${u}\u0000${v}` : `${v}\u0000${u}`;
}

function isPositiveFinite(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

export class GraphStore {
  private readonly nodeMap: ReadonlyMap<string, GraphNode>;
  private readonly edgeMap: ReadonlyMap<string, GraphEdge>;
  private readonly pairs: ReadonlyMap<string, GraphEdge>;
  private readonly adjacency: ReadonlyMap<string, readonly Neighbor[]>;

  private constructor(
    nodeMap: Map<string, GraphNode>,
    edgeMap: Map<string, GraphEdge>,
    pairs: Map<string, GraphEdge>,
    adjacency: Map<string, Neighbor[]>,
  ) {
    this.nodeMap = nodeMap;
    this.edgeMap = edgeMap;
    this.pairs = pairs;
    this.adjacency = adjacency;
  }

  /**
   * Validate and index a graph.
   *
   * @throws MalformedGraphError on duplicate ids, dangling endpoints,
   *   self loops, parallel edges, or non-positive/non-finite numbers
   */
  static load(nodes: Iterable<GraphNode>, edges: Iterable<GraphEdge>): GraphStore {
    const issues: string[] = [];
    const nodeMap = new Map<string, GraphNode>();
    const edgeMap = new Map<string, GraphEdge>();
    const pairs = new Map<string, GraphEdge>();
    const adjacency = new Map<string, Neighbor[]>();

    for (const node of nodes) {
      if (nodeMap.has(node.id)) {
        issues.push(`duplicate node id "${node.id}"`);
        continue;
      }
      const { lat, lng } = node.coordinate;
      if (!Number.isFinite(lat) || lat < -90 || lat > 90) {
        issues.push(`node "${node.id}": invalid lat ${lat}`);
      }
      if (!Number.isFinite(lng) || lng < -180 || lng > 180) {
        issues.push(`node "${node.id}": invalid lng ${lng}`);
      }
      nodeMap.set(node.id, Object.freeze({ ...node, coordinate: Object.freeze({ lat, lng }) }));
      adjacency.set(node.id, []);
    }

    for (const edge of edges) {
      if (edgeMap.has(edge.id)) {
        issues.push(`duplicate edge id "${edge.id}"`);
        continue;
      }
      const before = issues.length;
      if (!nodeMap.has(edge.source)) {
        issues.push(`edge "${edge.id}": unknown source node "${edge.source}"`);
      }
      if (!nodeMap.has(edge.target)) {
        issues.push(`edge "${edge.id}": unknown target node "${edge.target}"`);
      }
      if (edge.source === edge.target) {
        issues.push(`edge "${edge.id}": self loop on "${edge.source}"`);
      }
      if (!isPositiveFinite(edge.lengthMeters)) {
        issues.push(`edge "${edge.id}": length_m must be positive, got ${edge.lengthMeters}`);
      }
      if (!isPositiveFinite(edge.capacity)) {
        issues.push(`edge "${edge.id}": capacity must be positive, got ${edge.capacity}`);
      }
      const key = pairKey(edge.source, edge.target);
      const existing = pairs.get(key);
      if (existing) {
        issues.push(
          `edge "${edge.id}": parallel to edge "${existing.id}" between "${edge.source}" and "${edge.target}"`,
        );
      }
      if (issues.length > before) continue;

      const frozen = Object.freeze({ ...edge });
      edgeMap.set(edge.id, frozen);
      pairs.set(key, frozen);
      adjacency.get(edge.source)?.push({ edge: frozen, otherNodeId: edge.target });
      adjacency.get(edge.target)?.push({ edge: frozen, otherNodeId: edge.source });
    }

    if (issues.length > 0) {
      throw new MalformedGraphError(issues);
    }

    // Stable neighbor order keeps search output reproducible
    for (const list of adjacency.values()) {
      list.sort((a, b) => (a.otherNodeId < b.otherNodeId ? -1 : a.otherNodeId > b.otherNodeId ? 1 : 0));
      Object.freeze(list);
    }

    console.log(`[graph] Loaded ${nodeMap.size} nodes, ${edgeMap.size} edges`);
    return new GraphStore(nodeMap, edgeMap, pairs, adjacency);
  }

  get nodeCount(): number {
    return this.nodeMap.size;
  }

  get edgeCount(): number {
    return this.edgeMap.size;
  }

  hasNode(id: string): boolean {
    return this.nodeMap.has(id);
  }

  node(id: string): GraphNode | undefined {
    return this.nodeMap.get(id);
  }

  edgeById(id: string): GraphEdge | undefined {
    return this.edgeMap.get(id);
  }

  /** Undirected lookup of the edge joining u and v */
  edge(u: string, v: string): GraphEdge | undefined {
    return this.pairs.get(pairKey(u, v));
  }

  /** Edges incident to a node, ordered by the id of the node at the other end */
  neighbors(nodeId: string): readonly Neighbor[] {
    return this.adjacency.get(nodeId) ?? [];
  }

  nodes(): IterableIterator<GraphNode> {
    return this.nodeMap.values();
  }

  edges(): IterableIterator<GraphEdge> {
    return this.edgeMap.values();
  }

  /** Snap a coordinate to the closest node (ties go to the smaller id) */
  nearestNode(coordinate: Coordinate): SnapResult | null {
    let best: SnapResult | null = null;
    for (const node of this.nodeMap.values()) {
      const d = haversineDistance(coordinate, node.coordinate);
      if (
        best === null ||
        d < best.distanceMeters ||
        (d === best.distanceMeters && node.id < best.node.id)
      ) {
        best = { node, distanceMeters: d };
      }
    }
    return best;
  }

  /** True when every node is reachable from every other (false for an empty graph) */
  isConnected(): boolean {
    const first = this.nodeMap.keys().next();
    if (first.done) return false;

    const visited = new Set<string>([first.value]);
    const stack = [first.value];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      for (const { otherNodeId } of this.neighbors(current)) {
        if (visited.has(otherNodeId)) continue;
        visited.add(otherNodeId);
        stack.push(otherNodeId);
      }
    }
    return visited.size === this.nodeMap.size;
  }
}
