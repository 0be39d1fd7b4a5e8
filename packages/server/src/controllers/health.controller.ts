import { Controller, Get, Route, Tags } from "@tsoa/runtime";
import type { HealthResponse } from "../models/responses.js";
import { getServices } from "../services/registry.js";

@Route("health")
@Tags("Health")
export class HealthController extends Controller {
  /** Health check with graph size, forecast cache statistics and routing profiles */
  @Get()
  public async getHealth(): Promise<HealthResponse> {
    const { engine, profile, profiles } = getServices();
    const response: HealthResponse = {
      status: "ok",
      uptime: process.uptime(),
      graph: { nodes: engine.graph.nodeCount, edges: engine.graph.edgeCount },
      cache: engine.forecasts.stats(),
      profiles,
    };
    if (profile) response.profile = profile;
    return response;
  }
}
