import type { GraphEdge, GraphNode } from "@campus-flow/types";
import {
  DEFAULT_ROUTING_CONFIG,
  ForecastCache,
  GraphStore,
  RoutingEngine,
  StaticFlowPredictor,
} from "@campus-flow/routing";

function node(id: string, lat: number, lng: number): GraphNode {
  return { id, coordinate: { lat, lng }, label: `${id} block`, kind: "poi" };
}

function edge(id: string, source: string, target: string): GraphEdge {
  return { id, source, target, lengthMeters: 10, capacity: 100, kind: "path" };
}

/** Diamond A-B-D / A-C-D plus a detached E-F pair */
export function makeCampusGraph(): GraphStore {
  return GraphStore.load(
    [
      node("A", 33.64, 72.36),
      node("B", 33.641, 72.36),
      node("C", 33.64, 72.361),
      node("D", 33.641, 72.361),
      node("E", 33.65, 72.37),
      node("F", 33.651, 72.37),
    ],
    [
      edge("ab", "A", "B"),
      edge("ac", "A", "C"),
      edge("bd", "B", "D"),
      edge("cd", "C", "D"),
      edge("ef", "E", "F"),
    ],
  );
}

/** Engine whose static predictor puts 90 walkers on A-B */
export function makeEngine(flows: Record<string, number> = { ab: 90 }): RoutingEngine {
  const graph = makeCampusGraph();
  return new RoutingEngine(graph, new ForecastCache(graph, new StaticFlowPredictor(flows)), DEFAULT_ROUTING_CONFIG);
}
