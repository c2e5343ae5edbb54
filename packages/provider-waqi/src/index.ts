/**
 * @airwatch/provider-waqi
 *
 * World Air Quality Index (aqicn.org) feed adapter. Resolves targets to
 * station ids, fetches `/feed/@{station}/` and turns the response into the
 * RawPayload shape the refresh pipeline consumes.
 *
 * @packageDocumentation
 */

export { WaqiProvider, createWaqiProvider } from "./provider.js";
export { WaqiClient, createClient, DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from "./client.js";
export type { ClientConfig } from "./client.js";
export { parseFeedResponse, parseTimestamp } from "./parse.js";
export type { WaqiFeedData } from "./parse.js";
export { STATIONS, findStation, resolveStation, listTargets } from "./stations.js";
export type { Station } from "./stations.js";
export type { HttpClient, WaqiProviderConfig } from "./types.js";
