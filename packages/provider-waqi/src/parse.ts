/**
 * Parsing utilities for WAQI feed responses.
 *
 * This module validates the `/feed/@{station}/` response body with zod and
 * converts it into the RawPayload the refresh pipeline consumes. Only the
 * fields the pipeline reads are validated; everything else is ignored.
 */

import { z } from "zod";
import { FetchUnavailableError, MalformedPayloadError, POLLUTANTS } from "@airwatch/contracts";
import type { DayPoint, ForecastSeries, Pollutant, RawPayload } from "@airwatch/contracts";

const envelopeSchema = z.object({
  status: z.string(),
  data: z.unknown(),
});

const measurementSchema = z.object({ v: z.number() });

const forecastEntrySchema = z.object({
  day: z.string(),
  avg: z.number(),
  min: z.number(),
  max: z.number(),
});

const feedDataSchema = z.object({
  // Numeric index, or "-" when the station has no current reading
  aqi: z.union([z.number(), z.string()]).optional(),
  dominentpol: z.string().optional(),
  iaqi: z.record(z.string(), measurementSchema).optional(),
  time: z
    .object({
      iso: z.string().optional(),
      v: z.number().optional(),
    })
    .optional(),
  forecast: z
    .object({
      daily: z
        .object({
          pm25: z.array(forecastEntrySchema).optional(),
          pm10: z.array(forecastEntrySchema).optional(),
          o3: z.array(forecastEntrySchema).optional(),
        })
        .optional(),
    })
    .optional(),
});

export type WaqiFeedData = z.infer<typeof feedDataSchema>;

/**
 * Formats zod issues as `path: message` lines.
 */
function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`);
}

/**
 * Overall index as reported, or null when the station reported none.
 */
function parseIndex(aqi: number | string | undefined): number | null {
  if (typeof aqi === "number") {
    return aqi;
  }
  if (aqi === undefined || aqi.trim() === "") {
    return null;
  }
  const numeric = Number(aqi);
  return Number.isFinite(numeric) ? numeric : null;
}

/**
 * Resolves the observation time: ISO string first, then Unix seconds, then now.
 */
export function parseTimestamp(time: WaqiFeedData["time"], now: number): number {
  if (time?.iso) {
    const parsed = Date.parse(time.iso);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  if (time?.v !== undefined && time.v > 0) {
    return time.v * 1000;
  }
  return now;
}

function toDayPoints(entries: z.infer<typeof forecastEntrySchema>[]): DayPoint[] {
  return entries.map((entry) => ({ date: entry.day, avg: entry.avg, min: entry.min, max: entry.max }));
}

/**
 * Parses a WAQI feed response body into a RawPayload.
 *
 * @param target - Canonical target name the payload is for
 * @param body - Response body as received
 * @param now - Fallback timestamp (Unix ms)
 *
 * @throws FetchUnavailableError if the API reports a non-"ok" status
 * @throws MalformedPayloadError if the body does not match the feed schema
 *
 * @example
 * ```typescript
 * const payload = parseFeedResponse("Sarajevo", {
 *   status: "ok",
 *   data: {
 *     aqi: 57,
 *     dominentpol: "pm25",
 *     iaqi: { pm25: { v: 57 }, co: { v: 0.4 } },
 *     time: { iso: "2025-01-15T10:00:00+01:00" },
 *   },
 * }, Date.now());
 * // { target: "Sarajevo", timestamp: 1736931600000, index: 57, dominantPollutant: "pm25",
 * //   concentrations: { pm25: 57, co: 0.4 } }
 * ```
 */
export function parseFeedResponse(target: string, body: unknown, now: number): RawPayload {
  const envelope = envelopeSchema.safeParse(body);
  if (!envelope.success) {
    throw new MalformedPayloadError(`Unexpected WAQI response for ${target}`, {
      target,
      issues: describeIssues(envelope.error),
    });
  }

  if (envelope.data.status.toLowerCase() !== "ok") {
    const detail = typeof envelope.data.data === "string" ? `: ${envelope.data.data}` : "";
    throw new FetchUnavailableError(`WAQI API returned status "${envelope.data.status}" for ${target}${detail}`, {
      target,
    });
  }

  const feed = feedDataSchema.safeParse(envelope.data.data);
  if (!feed.success) {
    throw new MalformedPayloadError(`Malformed WAQI feed for ${target}`, {
      target,
      issues: describeIssues(feed.error),
    });
  }

  const data = feed.data;

  const concentrations: Partial<Record<Pollutant, number>> = {};
  for (const pollutant of POLLUTANTS) {
    const measurement = data.iaqi?.[pollutant];
    if (measurement) {
      concentrations[pollutant] = measurement.v;
    }
  }

  const payload: RawPayload = {
    target,
    timestamp: parseTimestamp(data.time, now),
    index: parseIndex(data.aqi),
    dominantPollutant: data.dominentpol ?? null,
    concentrations,
  };

  const daily = data.forecast?.daily;
  if (daily) {
    const forecast: ForecastSeries = {};
    if (daily.pm25) forecast.pm25 = toDayPoints(daily.pm25);
    if (daily.pm10) forecast.pm10 = toDayPoints(daily.pm10);
    if (daily.o3) forecast.o3 = toDayPoints(daily.o3);
    payload.forecast = forecast;
  }

  return payload;
}
