import { listProfiles, type ProfileInfo, type RoutingEngine } from "@campus-flow/routing";
import { GraphService } from "./graph.service.js";
import { ForecastService } from "./forecast.service.js";
import { RouteService } from "./route.service.js";

/** Long-lived services the per-request controllers read from */
export interface AppServices {
  engine: RoutingEngine;
  graph: GraphService;
  forecast: ForecastService;
  route: RouteService;
  /** Active routing profile name, if one was selected */
  profile?: string;
  /** Profiles available under configs/routing/profiles */
  profiles: ProfileInfo[];
}

let current: AppServices | null = null;

export function createServices(
  engine: RoutingEngine,
  options: { profile?: string; profiles?: ProfileInfo[] } = {},
): AppServices {
  return {
    engine,
    graph: new GraphService(engine.graph),
    forecast: new ForecastService(engine),
    route: new RouteService(engine),
    profile: options.profile,
    profiles: options.profiles ?? listProfiles(),
  };
}

export function registerServices(services: AppServices): void {
  current = services;
}

/** @throws Error if no services were registered (createApp does this) */
export function getServices(): AppServices {
  if (!current) {
    throw new Error("Services not registered; build the app with createApp()");
  }
  return current;
}
