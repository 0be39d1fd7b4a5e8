import { Controller, Get, Query, Response, Route, SuccessResponse, Tags } from "@tsoa/runtime";
import type { RouteMode } from "@campus-flow/types";
import type { RouteRequest } from "../models/requests.js";
import type { NoPathResponse, RouteGeoJsonResponse, RouteResponse } from "../models/responses.js";
import { RouteNotFoundError } from "../services/route.service.js";
import { getServices } from "../services/registry.js";

const NO_PATH: NoPathResponse = { message: "no path", kind: "no-path" };

@Route("api/routes")
@Tags("Routes")
export class RouteController extends Controller {
  /**
   * Primary route plus alternates between two nodes, per weighting.
   * Without a time context, penalized routing uses the active forecast.
   *
   * @isInt k
   * @isInt hour
   * @isInt dayOfWeek
   */
  @Get()
  @SuccessResponse(200, "Routes found")
  @Response<NoPathResponse>(404, "No path")
  public async getRoutes(
    @Query() source: string,
    @Query() target: string,
    @Query() mode?: RouteMode,
    @Query() k?: number,
    @Query() hour?: number,
    @Query() dayOfWeek?: number,
    @Query() isPeak?: 0 | 1,
    @Query() congestionWeight?: number,
  ): Promise<RouteResponse | NoPathResponse> {
    const request: RouteRequest = { source, target, mode, k, hour, dayOfWeek, isPeak, congestionWeight };
    try {
      return await getServices().route.findRoutes(request);
    } catch (err) {
      if (err instanceof RouteNotFoundError) {
        this.setStatus(404);
        return NO_PATH;
      }
      throw err;
    }
  }

  /**
   * Same query as getRoutes, as a styled FeatureCollection
   *
   * @isInt k
   * @isInt hour
   * @isInt dayOfWeek
   */
  @Get("geojson")
  @Response<NoPathResponse>(404, "No path")
  public async getRoutesGeoJson(
    @Query() source: string,
    @Query() target: string,
    @Query() mode?: RouteMode,
    @Query() k?: number,
    @Query() hour?: number,
    @Query() dayOfWeek?: number,
    @Query() isPeak?: 0 | 1,
    @Query() congestionWeight?: number,
  ): Promise<RouteGeoJsonResponse | NoPathResponse> {
    const request: RouteRequest = { source, target, mode, k, hour, dayOfWeek, isPeak, congestionWeight };
    try {
      return await getServices().route.findRoutesGeoJson(request);
    } catch (err) {
      if (err instanceof RouteNotFoundError) {
        this.setStatus(404);
        return NO_PATH;
      }
      throw err;
    }
  }
}
