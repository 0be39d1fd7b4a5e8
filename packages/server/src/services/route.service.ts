import type { RouteAnswer, RouteQuery } from "@campus-flow/types";
import { routeAnswerToGeoJson, type RoutingEngine } from "@campus-flow/routing";
import type { RouteRequest } from "../models/requests.js";
import type { RouteGeoJsonResponse } from "../models/responses.js";
import { resolveTimeContext } from "./forecast.service.js";

/** Build an engine query. A time context is only set when the request names part of one. */
export function toRouteQuery(req: RouteRequest): RouteQuery {
  const query: RouteQuery = { source: req.source, target: req.target, mode: req.mode ?? "both" };
  if (req.k !== undefined) query.k = req.k;
  if (req.congestionWeight !== undefined) query.congestionWeight = req.congestionWeight;
  if (req.hour !== undefined || req.dayOfWeek !== undefined || req.isPeak !== undefined) {
    query.timeContext = resolveTimeContext(req);
  }
  return query;
}

function countRoutes(answer: RouteAnswer): number {
  let count = 0;
  for (const outcome of [answer.distance, answer.penalized]) {
    if (outcome?.kind === "found") count += 1 + outcome.alternates.length;
  }
  return count;
}

export class RouteService {
  constructor(private readonly engine: RoutingEngine) {}

  /**
   * Route between two nodes.
   *
   * @throws RouteNotFoundError when no requested weighting found a path
   */
  async findRoutes(req: RouteRequest): Promise<RouteAnswer> {
    const answer = await this.engine.findRoutes(toRouteQuery(req));
    if (countRoutes(answer) === 0) {
      throw new RouteNotFoundError(`No path between ${req.source} and ${req.target}`);
    }
    return answer;
  }

  async findRoutesGeoJson(req: RouteRequest): Promise<RouteGeoJsonResponse> {
    const answer = await this.findRoutes(req);
    return {
      ...routeAnswerToGeoJson(answer),
      _meta: {
        mode: answer.mode,
        forecastKey: answer.forecastKey ?? null,
        routeCount: countRoutes(answer),
      },
    };
  }
}

export class RouteNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RouteNotFoundError";
  }
}
