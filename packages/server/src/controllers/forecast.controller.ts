import { Controller, Get, Query, Route, Tags } from "@tsoa/runtime";
import type { GeoJsonFeatureCollection } from "@campus-flow/routing";
import type { ResponseFormat } from "../models/requests.js";
import type { ForecastResponse } from "../models/responses.js";
import { getServices } from "../services/registry.js";

@Route("api/forecast")
@Tags("Forecast")
export class ForecastController extends Controller {
  /**
   * Congestion forecast for a time context (defaults: Monday 09:00, peak).
   * The returned forecast becomes the one penalized routing uses by default.
   *
   * @isInt hour
   * @isInt dayOfWeek
   */
  @Get()
  public async getForecast(
    @Query() hour?: number,
    @Query() dayOfWeek?: number,
    @Query() isPeak?: 0 | 1,
    @Query() format?: ResponseFormat,
  ): Promise<ForecastResponse | GeoJsonFeatureCollection> {
    const { forecast } = getServices();
    const query = { hour, dayOfWeek, isPeak };
    if (format === "geojson") {
      return forecast.getForecastGeoJson(query);
    }
    return forecast.getForecast(query);
  }
}
