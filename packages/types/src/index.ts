/**
 * @campus-flow/types
 *
 * Shared domain types for the congestion-aware campus router.
 *
 * - Graph: walkable campus network
 * - Forecast: predicted flow per edge for a time context
 * - Route: the result of routing
 */

export * from "./graph.js";
export * from "./forecast.js";
export * from "./route.js";
export * from "./errors.js";
