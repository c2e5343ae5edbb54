/**
 * HTTP client for the WAQI feed endpoint.
 */

import axios, { isAxiosError } from "axios";
import type { Logger } from "@airwatch/logger";
import { FetchUnavailableError } from "@airwatch/contracts";
import type { HttpClient } from "./types.js";

export const DEFAULT_BASE_URL = "https://api.waqi.info";
export const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * HTTP client configuration.
 */
export interface ClientConfig {
  token: string;
  baseUrl: string;
  timeout: number;
  http?: HttpClient;
  logger?: Logger;
}

/**
 * Thin wrapper over axios that returns the raw response body and maps
 * transport failures to FetchUnavailableError.
 *
 * @internal
 */
export class WaqiClient {
  private readonly config: ClientConfig;
  private readonly http: HttpClient;

  constructor(config: ClientConfig) {
    this.config = config;
    this.http = config.http ?? axios.create({ baseURL: config.baseUrl, timeout: config.timeout });
  }

  /**
   * Fetches the station feed.
   *
   * @param target - Target name, used for error context only
   * @param stationId - WAQI station id (e.g. '@10557')
   * @returns Unvalidated response body
   *
   * @throws FetchUnavailableError on network errors, timeouts and non-2xx responses
   */
  async getFeed(target: string, stationId: string): Promise<unknown> {
    const path = `/feed/${stationId}/`;

    this.config.logger?.debug("WAQI API request", { target, station: stationId, path });

    try {
      const response = await this.http.get<unknown>(path, { params: { token: this.config.token } });
      return response.data;
    } catch (error) {
      throw toFetchUnavailable(target, error);
    }
  }
}

function toFetchUnavailable(target: string, error: unknown): FetchUnavailableError {
  if (isAxiosError(error)) {
    const statusCode = error.response?.status;
    const reason = statusCode === undefined ? error.message : `HTTP ${statusCode}`;
    return new FetchUnavailableError(
      `WAQI request failed for ${target}: ${reason}`,
      statusCode === undefined ? { target } : { target, statusCode },
      error
    );
  }

  const message = error instanceof Error ? error.message : String(error);
  return new FetchUnavailableError(`WAQI request failed for ${target}: ${message}`, { target }, error);
}

/**
 * Creates a new WAQI HTTP client.
 */
export function createClient(config: ClientConfig): WaqiClient {
  return new WaqiClient(config);
}
