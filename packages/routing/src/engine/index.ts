export { RoutingEngine, isRouteMode, weightingsFor } from "./routing-engine.js";
