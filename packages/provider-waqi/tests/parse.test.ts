/**
 * @fileoverview Tests for WAQI feed parsing.
 */

import { describe, it, expect } from "vitest";
import { FetchUnavailableError, MalformedPayloadError } from "@airwatch/contracts";
import { parseFeedResponse, parseTimestamp } from "../src/parse.js";

const NOW = Date.parse("2025-01-15T12:00:00Z");

describe("parseFeedResponse", () => {
  it("should map index, dominant pollutant and concentrations", () => {
    const payload = parseFeedResponse(
      "Sarajevo",
      {
        status: "ok",
        data: {
          aqi: 57,
          idx: 10557,
          dominentpol: "pm25",
          iaqi: { pm25: { v: 57 }, pm10: { v: 21 }, co: { v: 0.4 }, t: { v: 3.5 }, h: { v: 81 } },
          time: { s: "2025-01-15 10:00:00", tz: "+01:00", v: 1736935200, iso: "2025-01-15T10:00:00+01:00" },
        },
      },
      NOW
    );

    expect(payload).toEqual({
      target: "Sarajevo",
      timestamp: Date.parse("2025-01-15T09:00:00Z"),
      index: 57,
      dominantPollutant: "pm25",
      concentrations: { pm25: 57, pm10: 21, co: 0.4 },
    });
  });

  it("should report a missing reading as a null index", () => {
    const payload = parseFeedResponse("Tuzla", { status: "ok", data: { aqi: "-", iaqi: { pm25: { v: 70 } } } }, NOW);

    expect(payload.index).toBeNull();
    expect(payload.concentrations).toEqual({ pm25: 70 });
    expect(payload.dominantPollutant).toBeNull();
    expect(payload.timestamp).toBe(NOW);
  });

  it("should accept a numeric index sent as a string", () => {
    const payload = parseFeedResponse("Tuzla", { status: "ok", data: { aqi: "88" } }, NOW);

    expect(payload.index).toBe(88);
  });

  it("should read the daily pm25, pm10 and o3 forecast series", () => {
    const payload = parseFeedResponse(
      "Zenica",
      {
        status: "ok",
        data: {
          aqi: 120,
          forecast: {
            daily: {
              pm25: [{ day: "2025-01-15", avg: 70, min: 50, max: 90 }],
              o3: [{ day: "2025-01-16", avg: 8, min: 4, max: 12 }],
              uvi: [{ day: "2025-01-15", avg: 1, min: 0, max: 2 }],
            },
          },
        },
      },
      NOW
    );

    expect(payload.forecast).toEqual({
      pm25: [{ date: "2025-01-15", avg: 70, min: 50, max: 90 }],
      o3: [{ date: "2025-01-16", avg: 8, min: 4, max: 12 }],
    });
  });

  it("should omit the forecast when the feed has none", () => {
    const payload = parseFeedResponse("Mostar", { status: "ok", data: { aqi: 30 } }, NOW);

    expect(payload.forecast).toBeUndefined();
  });

  it("should throw FetchUnavailableError for an error status", () => {
    let caught: unknown;
    try {
      parseFeedResponse("Bihac", { status: "error", data: "Invalid key" }, NOW);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(FetchUnavailableError);
    expect(caught).toMatchObject({
      message: 'WAQI API returned status "error" for Bihac: Invalid key',
      data: { target: "Bihac" },
    });
  });

  it("should throw MalformedPayloadError listing schema issues", () => {
    let caught: unknown;
    try {
      parseFeedResponse("Travnik", { status: "ok", data: { aqi: 40, iaqi: { pm25: { v: "high" } } } }, NOW);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MalformedPayloadError);
    expect(caught).toMatchObject({
      code: "MALFORMED_PAYLOAD",
      data: { target: "Travnik", issues: ["iaqi.pm25.v: Expected number, received string"] },
    });
  });

  it("should reject a body without a status", () => {
    expect(() => parseFeedResponse("Travnik", "<html>", NOW)).toThrow(MalformedPayloadError);
  });
});

describe("parseTimestamp", () => {
  it("should prefer the ISO string", () => {
    expect(parseTimestamp({ iso: "2025-01-15T08:00:00Z", v: 1 }, NOW)).toBe(Date.parse("2025-01-15T08:00:00Z"));
  });

  it("should fall back to Unix seconds", () => {
    expect(parseTimestamp({ iso: "not a date", v: 1736928000 }, NOW)).toBe(1736928000000);
  });

  it("should fall back to now", () => {
    expect(parseTimestamp({ v: 0 }, NOW)).toBe(NOW);
    expect(parseTimestamp(undefined, NOW)).toBe(NOW);
  });
});
