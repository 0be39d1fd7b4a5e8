import { describe, it, expect } from "vitest";
import { GraphService } from "./graph.service.js";
import { GraphController } from "../controllers/graph.controller.js";
import { createServices, registerServices } from "./registry.js";
import { makeCampusGraph, makeEngine } from "./test-fixtures.js";

describe("GraphService", () => {
  it("lists every node and edge", () => {
    const graph = new GraphService(makeCampusGraph()).getGraph();
    expect(graph.nodes.map((n) => n.id)).toEqual(["A", "B", "C", "D", "E", "F"]);
    expect(graph.edges).toHaveLength(5);
  });

  it("exports edges then nodes as GeoJSON", () => {
    const collection = new GraphService(makeCampusGraph()).getGraphGeoJson();

    expect(collection.features).toHaveLength(11);
    expect(collection.features[0]?.geometry).toEqual({
      type: "LineString",
      coordinates: [
        [72.36, 33.64],
        [72.36, 33.641],
      ],
    });
    expect(collection.features[5]?.geometry).toEqual({ type: "Point", coordinates: [72.36, 33.64] });
    expect(collection.features[5]?.properties).toEqual({ id: "A", label: "A block", kind: "poi" });
  });

  it("snaps a coordinate to the closest node", () => {
    const nearest = new GraphService(makeCampusGraph()).nearest(33.6501, 72.3701);
    expect(nearest.node.id).toBe("E");
    expect(nearest.distanceMeters).toBeGreaterThan(0);
    expect(nearest.distanceMeters).toBeLessThan(20);
  });

  it("rejects coordinates off the globe", () => {
    const service = new GraphService(makeCampusGraph());
    expect(() => service.nearest(91, 0)).toThrow("coordinate out of range: 91, 0");
  });
});

describe("GraphController", () => {
  it("switches to GeoJSON on request", async () => {
    registerServices(createServices(makeEngine(), { profiles: [] }));
    const controller = new GraphController();
    const json = await controller.getGraph();
    const geojson = await controller.getGraph("geojson");

    expect("nodes" in json && json.nodes).toHaveLength(6);
    expect("type" in geojson && geojson.type).toBe("FeatureCollection");
  });
});
