/**
 * Shared fakes for app tests
 */

import { FetchUnavailableError, NotConfiguredError } from '@airwatch/contracts';
import type { AirQualityFetcher, Clock, RawPayload } from '@airwatch/contracts';
import { createLogger, type Logger } from '@airwatch/logger';

export const KNOWN_TARGETS = ['Sarajevo', 'Tuzla', 'Zenica', 'Mostar', 'Travnik', 'Bihac'];

export class ManualClock implements Clock {
  constructor(public current: number) {}

  static at(iso: string): ManualClock {
    return new ManualClock(Date.parse(iso));
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

type Response = RawPayload | Error | (() => Promise<RawPayload>);

/**
 * Upstream stand-in. Unscripted known targets fail as unavailable,
 * unknown ones as not configured.
 */
export class ScriptedFetcher implements AirQualityFetcher {
  readonly calls: string[] = [];
  private responses = new Map<string, Response>();

  respond(target: string, response: Response): this {
    this.responses.set(target.toLowerCase(), response);
    return this;
  }

  async fetch(target: string): Promise<RawPayload> {
    this.calls.push(target);
    const response = this.responses.get(target.toLowerCase());
    if (response === undefined) {
      if (!KNOWN_TARGETS.some((known) => known.toLowerCase() === target.toLowerCase())) {
        throw new NotConfiguredError(`No WAQI station configured for target "${target}"`, { target });
      }
      throw new FetchUnavailableError(`No response scripted for ${target}`, { target });
    }
    if (response instanceof Error) {
      throw response;
    }
    if (typeof response === 'function') {
      return response();
    }
    return response;
  }
}

export function payload(target: string, iso: string, overrides: Partial<RawPayload> = {}): RawPayload {
  return {
    target,
    timestamp: Date.parse(iso),
    index: 57,
    dominantPollutant: 'pm25',
    concentrations: { pm25: 20.5 },
    ...overrides,
  };
}

export function silentLogger(): Logger {
  return createLogger({ level: 'debug', silent: true });
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
