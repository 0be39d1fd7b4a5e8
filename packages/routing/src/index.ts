/**
 * @campus-flow/routing
 *
 * Congestion-aware multi-path routing for pedestrians on a campus graph.
 *
 * Key concepts:
 * - GraphStore: immutable walking network
 * - FlowPredictor: black-box context -> per-edge flow
 * - ForecastCache: one immutable forecast per time context
 * - WeightFunction: distance or congestion-penalized edge cost
 * - Search: Dijkstra + Yen's loopless alternates
 *
 * Pipeline:
 * 1. Ingest nodes/edges CSV -> GraphStore
 * 2. Time context -> ForecastCache -> ForecastEntry
 * 3. Query mode -> WeightFunction(s)
 * 4. Search per weighting -> primary route + alternates
 */

export * from "./errors.js";
export * from "./graph/index.js";
export * from "./ingestion/index.js";
export * from "./forecast/index.js";
export * from "./weights/index.js";
export * from "./search/index.js";
export * from "./engine/index.js";
export * from "./export/index.js";
export * from "./config/index.js";
