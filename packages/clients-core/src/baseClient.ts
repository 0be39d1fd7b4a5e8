import axios, { type AxiosRequestConfig } from "axios";
import type { ErrorResponse } from "./types.js";

export interface ClientConfig {
  /** Base URL for the API server (e.g., "http://localhost:5000") */
  baseUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
}

export type QueryValue = string | number | boolean | undefined;

export interface RequestParams {
  path?: string;
  query?: Record<string, QueryValue>;
}

/** Error response from the API, carrying the server's error kind */
export class ApiError extends Error {
  readonly status: number | undefined;
  readonly kind: string | undefined;
  readonly details: unknown;

  constructor(message: string, status?: number, kind?: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ApiError";
    this.status = status;
    this.kind = kind;
    this.details = details;
  }
}

function isErrorResponse(value: unknown): value is ErrorResponse {
  return typeof value === "object" && value !== null && "message" in value && typeof value.message === "string";
}

/** Drop unset values so they never reach the query string */
export function compactQuery(query: Record<string, QueryValue>): Record<string, string | number | boolean> {
  const out: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export class BaseClient {
  protected baseUrl: string;
  protected resource: string;
  protected timeout: number;

  constructor(resource: string, config: ClientConfig) {
    this.resource = "/" + resource;
    this.baseUrl = config.baseUrl;
    this.timeout = config.timeout ?? 30000;
  }

  protected buildPath(params: RequestParams): string {
    return params.path ? this.resource + "/" + params.path : this.resource;
  }

  protected buildConfig(params: RequestParams): AxiosRequestConfig {
    const config: AxiosRequestConfig = {
      baseURL: this.baseUrl,
      timeout: this.timeout,
      headers: {
        Accept: "application/json",
      },
    };

    if (params.query) {
      config.params = compactQuery(params.query);
    }

    return config;
  }

  /**
   * GET a resource.
   *
   * @throws ApiError with the server's status and error kind
   */
  public async get<T>(params: RequestParams = {}): Promise<T> {
    const path = this.buildPath(params);
    const config = this.buildConfig(params);
    try {
      const response = await axios.get<T>(path, config);
      return response.data;
    } catch (err) {
      throw toApiError(err);
    }
  }
}

export function toApiError(err: unknown): ApiError {
  if (err instanceof ApiError) return err;
  if (axios.isAxiosError(err)) {
    const body: unknown = err.response?.data;
    if (isErrorResponse(body)) {
      return new ApiError(body.message, err.response?.status, body.kind, body.details, { cause: err });
    }
    return new ApiError(err.message, err.response?.status, undefined, undefined, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ApiError(message, undefined, undefined, undefined, { cause: err });
}
