/**
 * Campus walking graph.
 *
 * Nodes are junctions and points of interest; edges are walkable path
 * segments. Edges are undirected for walking but stored in the direction
 * they were authored (source -> target).
 */

/** Geographic coordinate (WGS84) */
export interface Coordinate {
  lat: number;
  lng: number;
}

/** Node category, e.g. "poi" or "junction" (the values the ingestion tools emit) */
export type NodeKind = string;

/** Edge category, e.g. "path", or "poi-link" for edges that attach a point of interest to the path network */
export type EdgeKind = string;

/** A node in the campus graph */
export interface GraphNode {
  id: string;
  coordinate: Coordinate;
  /** Display name (building, gate, junction label) */
  label: string;
  kind: NodeKind;
}

/** An undirected walkable segment between two nodes */
export interface GraphEdge {
  id: string;
  source: string;
  target: string;
  /** Path length in meters (> 0) */
  lengthMeters: number;
  /** Maximum sustainable pedestrian flow (> 0) */
  capacity: number;
  kind: EdgeKind;
}

/** An edge as seen from one of its endpoints */
export interface Neighbor {
  edge: GraphEdge;
  otherNodeId: string;
}
