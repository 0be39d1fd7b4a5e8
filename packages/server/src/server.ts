import { resolve } from "node:path";
import {
  BaselineFlowPredictor,
  ForecastCache,
  HttpFlowPredictor,
  RoutingEngine,
  loadBaseConfig,
  loadGraphFromCsv,
  loadProfileConfig,
  type FlowPredictor,
  type RoutingConfig,
} from "@campus-flow/routing";
import { createApp } from "./app.js";

const PORT = parseInt(process.env["PORT"] ?? "5000", 10);
const DATA_DIR = resolve(process.env["DATA_DIR"] ?? "data");
const PROFILE = process.env["ROUTING_PROFILE"];
const PREDICTOR_URL = process.env["PREDICTOR_URL"];

function loadConfig(): RoutingConfig {
  if (!PROFILE) return loadBaseConfig();
  const { _profile, ...config } = loadProfileConfig(PROFILE);
  console.log(`[server] Routing profile: ${_profile.name} (${_profile.description})`);
  return config;
}

function createPredictor(): FlowPredictor {
  if (PREDICTOR_URL) {
    console.log(`[server] Flow predictions from ${PREDICTOR_URL}`);
    return new HttpFlowPredictor({ baseUrl: PREDICTOR_URL });
  }
  console.log("[server] No PREDICTOR_URL set, using baseline flow predictor");
  return new BaselineFlowPredictor();
}

async function main(): Promise<void> {
  const graph = await loadGraphFromCsv({
    nodesPath: resolve(DATA_DIR, "nodes.csv"),
    edgesPath: resolve(DATA_DIR, "edges.csv"),
  });
  if (!graph.isConnected()) {
    console.warn("[server] Graph is not connected; some node pairs have no path");
  }

  const config = loadConfig();
  const engine = new RoutingEngine(graph, new ForecastCache(graph, createPredictor()), config);
  const app = createApp(engine, PROFILE);

  app.listen(PORT, () => {
    console.log(`\nCampus routing API server running at http://localhost:${PORT}`);
    console.log(`Graph: ${graph.nodeCount} nodes, ${graph.edgeCount} edges from ${DATA_DIR}\n`);
  });
}

main().catch((err: unknown) => {
  console.error("[server] Failed to start:", err instanceof Error ? err.message : err);
  process.exit(1);
});
