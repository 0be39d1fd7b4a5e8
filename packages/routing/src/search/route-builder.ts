/**
 * Convert weighted search paths into RouteResults.
 *
 * Physical length is always re-summed from edge lengths so routes found
 * under different weightings can be compared on one scale.
 */

import type { RouteCoordinate, RouteOutcome, RouteResult } from "@campus-flow/types";
import type { GraphStore } from "../graph/graph-store.js";
import { InvalidQueryError, UnknownNodeError } from "../errors.js";
import type { WeightFunction } from "../weights/weight-function.js";
import { kShortestPaths } from "./k-shortest.js";
import type { WeightedPath } from "./shortest-path.js";

/** Default walking speed, meters per second */
export const DEFAULT_WALKING_SPEED_MPS = 1.3;

export function walkingMinutes(lengthMeters: number, speedMps: number = DEFAULT_WALKING_SPEED_MPS): number {
  return lengthMeters / speedMps / 60;
}

export function pathToRoute(
  graph: GraphStore,
  path: WeightedPath,
  walkingSpeedMps: number = DEFAULT_WALKING_SPEED_MPS,
): RouteResult {
  let lengthMeters = 0;
  for (const id of path.edgeIds) {
    lengthMeters += graph.edgeById(id)?.lengthMeters ?? 0;
  }

  const coords: RouteCoordinate[] = [];
  for (const id of path.nodeIds) {
    const node = graph.node(id);
    if (!node) throw new UnknownNodeError(id);
    coords.push({ id, lat: node.coordinate.lat, lng: node.coordinate.lng, label: node.label });
  }

  return {
    path: [...path.nodeIds],
    coords,
    lengthMeters,
    cost: path.cost,
    walkingMinutes: walkingMinutes(lengthMeters, walkingSpeedMps),
  };
}

export interface FindRoutesOptions {
  walkingSpeedMps?: number;
}

/**
 * Best route plus up to k-1 loopless alternates under one weighting.
 *
 * @throws UnknownNodeError if source or target is not in the graph
 * @throws InvalidQueryError if k is not an integer >= 1
 */
export function findRoutes(
  graph: GraphStore,
  source: string,
  target: string,
  weight: WeightFunction,
  k: number,
  options: FindRoutesOptions = {},
): RouteOutcome {
  if (!graph.hasNode(source)) throw new UnknownNodeError(source);
  if (!graph.hasNode(target)) throw new UnknownNodeError(target);
  if (!Number.isInteger(k) || k < 1) {
    throw new InvalidQueryError(`k must be an integer >= 1, got ${k}`);
  }

  const paths = kShortestPaths(graph, source, target, weight, k);
  const [primary, ...alternates] = paths;
  if (!primary) {
    return { kind: "no-path", message: `No path between ${source} and ${target}` };
  }

  const speed = options.walkingSpeedMps ?? DEFAULT_WALKING_SPEED_MPS;
  return {
    kind: "found",
    primary: pathToRoute(graph, primary, speed),
    alternates: alternates.map((p) => pathToRoute(graph, p, speed)),
  };
}
