import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { HealthResponse, ProfileInfo } from "./types.js";
import type { ForecastCacheStats } from "@campus-flow/types";

export class HealthClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("health", config);
  }

  public async getHealth(): Promise<HealthResponse> {
    return this.client.get<HealthResponse>();
  }

  /** Forecast cache counters: stored hits, joined in-flight computations, misses */
  public async getCacheStats(): Promise<ForecastCacheStats> {
    const health = await this.getHealth();
    return health.cache;
  }

  /** Routing profiles the server can be started with, and the active one */
  public async getProfiles(): Promise<{ active: string | null; available: ProfileInfo[] }> {
    const health = await this.getHealth();
    return { active: health.profile ?? null, available: health.profiles };
  }
}
