import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { GeoJsonFeatureCollection, GraphResponse, NearestNodeRequest, NearestNodeResponse } from "./types.js";

export class GraphClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/graph", config);
  }

  /** Full node and edge lists */
  public async getGraph(): Promise<GraphResponse> {
    return this.client.get<GraphResponse>();
  }

  /** Edges as LineStrings followed by nodes as Points */
  public async getGraphGeoJson(): Promise<GeoJsonFeatureCollection> {
    return this.client.get<GeoJsonFeatureCollection>({ query: { format: "geojson" } });
  }

  /** Snap a coordinate to the closest node */
  public async nearest(request: NearestNodeRequest): Promise<NearestNodeResponse> {
    return this.client.get<NearestNodeResponse>({
      path: "nearest",
      query: { lat: request.lat, lng: request.lng },
    });
  }
}
