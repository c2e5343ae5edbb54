/**
 * Type definitions for the WAQI feed adapter.
 */

import type { AxiosInstance } from "axios";
import type { Logger } from "@airwatch/logger";
import type { Clock } from "@airwatch/contracts";

/**
 * The part of an axios instance the client uses. Tests pass a stub.
 */
export type HttpClient = Pick<AxiosInstance, "get">;

/**
 * WAQI provider configuration.
 */
export interface WaqiProviderConfig {
  /**
   * WAQI API token.
   */
  token: string;

  /**
   * Base URL for the WAQI API.
   * Defaults to https://api.waqi.info
   */
  baseUrl?: string;

  /**
   * Request timeout in milliseconds.
   * Defaults to 10000 (10 seconds).
   */
  timeout?: number;

  /**
   * Pre-built HTTP client; overrides baseUrl and timeout.
   */
  http?: HttpClient;

  /**
   * Fallback time source when the feed reports no usable timestamp.
   */
  clock?: Clock;

  /**
   * Logger instance for debug and error logging.
   */
  logger?: Logger;
}
