/**
 * @fileoverview High-resolution duration measurement for log fields.
 */

export interface PerfTimer {
  /** performance.now() at start */
  readonly startTime: number;

  /** Milliseconds since start, or until stop() if stopped */
  elapsed(): number;

  /** Freezes the timer; repeated calls return the same duration */
  stop(): number;

  isRunning(): boolean;
}

/**
 * @example
 * ```typescript
 * const timer = startTimer();
 * await pipeline.refreshOne('Tuzla');
 * logger.info('Refreshed', { duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    startTime,

    elapsed(): number {
      return Math.round((endTime ?? performance.now()) - startTime);
    },

    stop(): number {
      if (endTime === null) {
        endTime = performance.now();
      }
      return Math.round(endTime - startTime);
    },

    isRunning(): boolean {
      return endTime === null;
    },
  };
}

/**
 * Awaits `fn` and reports how long it took.
 */
export async function measureAsync<T>(fn: () => Promise<T>): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer();
  const result = await fn();
  return { result, duration_ms: timer.stop() };
}
