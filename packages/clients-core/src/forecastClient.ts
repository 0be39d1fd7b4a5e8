import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { ForecastResponse, GeoJsonFeatureCollection, TimeContextQuery } from "./types.js";

export class ForecastClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/forecast", config);
  }

  /** Forecast for a time context. It becomes the server's active forecast. */
  public async getForecast(context: TimeContextQuery = {}): Promise<ForecastResponse> {
    return this.client.get<ForecastResponse>({ query: { ...context } });
  }

  public async getForecastGeoJson(context: TimeContextQuery = {}): Promise<GeoJsonFeatureCollection> {
    return this.client.get<GeoJsonFeatureCollection>({ query: { ...context, format: "geojson" } });
  }
}
