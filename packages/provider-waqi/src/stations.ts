/**
 * Known monitoring targets and their WAQI station identifiers.
 */

import { NotConfiguredError } from "@airwatch/contracts";

/**
 * A monitoring target and the upstream station that reports for it.
 */
export interface Station {
  /** Display name, also the canonical target identifier */
  name: string;
  /** WAQI station id including the '@' prefix */
  stationId: string;
}

export const STATIONS: readonly Station[] = [
  { name: "Sarajevo", stationId: "@10557" },
  { name: "Tuzla", stationId: "@8739" },
  { name: "Zenica", stationId: "@8740" },
  { name: "Mostar", stationId: "@8741" },
  { name: "Travnik", stationId: "@8742" },
  { name: "Bihac", stationId: "@8743" },
];

/**
 * Case-insensitive station lookup.
 *
 * @returns The station, or undefined when the target is unknown
 */
export function findStation(target: string): Station | undefined {
  const key = target.trim().toLowerCase();
  return STATIONS.find((station) => station.name.toLowerCase() === key);
}

/**
 * Like findStation, but unknown targets are an error.
 *
 * @throws NotConfiguredError if no station is registered for the target
 *
 * @example
 * ```typescript
 * resolveStation("tuzla"); // { name: "Tuzla", stationId: "@8739" }
 * resolveStation("Banja Luka"); // throws NotConfiguredError
 * ```
 */
export function resolveStation(target: string): Station {
  const station = findStation(target);
  if (!station) {
    throw new NotConfiguredError(`No WAQI station configured for target "${target}"`, { target });
  }
  return station;
}

/**
 * Canonical names of every known target, in registry order.
 */
export function listTargets(): string[] {
  return STATIONS.map((station) => station.name);
}
