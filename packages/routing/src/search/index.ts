/**
 * Route search module.
 *
 * Dijkstra for the single best path, Yen's deviation search for loopless
 * alternates, and conversion of weighted paths into RouteResults.
 */

export { MinHeap } from "./priority-queue.js";
export {
  shortestPath,
  pathCost,
  pathKey,
  comparePaths,
  compareNodeSequences,
  costsEqual,
  type WeightedPath,
  type SearchExclusions,
} from "./shortest-path.js";
export { kShortestPaths } from "./k-shortest.js";
export {
  findRoutes,
  pathToRoute,
  walkingMinutes,
  DEFAULT_WALKING_SPEED_MPS,
  type FindRoutesOptions,
} from "./route-builder.js";
