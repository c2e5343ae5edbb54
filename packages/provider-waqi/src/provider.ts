/**
 * WAQI implementation of the AirQualityFetcher contract.
 */

import { systemClock } from "@airwatch/contracts";
import type { AirQualityFetcher, Clock, RawPayload } from "@airwatch/contracts";
import type { Logger } from "@airwatch/logger";
import { createClient, DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from "./client.js";
import type { WaqiClient } from "./client.js";
import { parseFeedResponse } from "./parse.js";
import { resolveStation } from "./stations.js";
import type { WaqiProviderConfig } from "./types.js";

/**
 * Fetches the current reading and daily forecast for a target.
 *
 * Every failure surfaces as an AirwatchError subclass:
 * - NotConfiguredError for targets without a station
 * - FetchUnavailableError for transport failures and non-"ok" statuses
 * - MalformedPayloadError for bodies that do not match the feed schema
 */
export class WaqiProvider implements AirQualityFetcher {
  private readonly client: WaqiClient;
  private readonly clock: Clock;
  private readonly logger?: Logger;

  constructor(config: WaqiProviderConfig) {
    if (!config.token) {
      throw new Error("WaqiProviderConfig.token is required");
    }

    this.client = createClient({
      token: config.token,
      baseUrl: config.baseUrl ?? DEFAULT_BASE_URL,
      timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
      http: config.http,
      logger: config.logger,
    });
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger;
  }

  async fetch(target: string): Promise<RawPayload> {
    const station = resolveStation(target);
    const body = await this.client.getFeed(station.name, station.stationId);
    const payload = parseFeedResponse(station.name, body, this.clock.now());

    this.logger?.debug("WAQI feed parsed", {
      target: station.name,
      index: payload.index,
      observed_at: new Date(payload.timestamp).toISOString(),
      forecast_series: payload.forecast ? Object.keys(payload.forecast).length : 0,
    });

    return payload;
  }
}

/**
 * Creates a new WAQI provider.
 *
 * @example
 * ```typescript
 * const provider = createWaqiProvider({
 *   token: process.env.WAQI_API_TOKEN ?? "",
 *   logger: createLogger({ level: "debug" }),
 * });
 *
 * const payload = await provider.fetch("Sarajevo");
 * ```
 */
export function createWaqiProvider(config: WaqiProviderConfig): WaqiProvider {
  return new WaqiProvider(config);
}
