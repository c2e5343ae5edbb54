/**
 * @fileoverview Tests for performance timing utilities
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { startTimer, measureAsync } from '../src/perf-timer.js';

describe('Performance Timers', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should report rounded elapsed milliseconds', () => {
    vi.spyOn(performance, 'now').mockReturnValueOnce(1000).mockReturnValueOnce(1250.4);

    const timer = startTimer();

    expect(timer.startTime).toBe(1000);
    expect(timer.elapsed()).toBe(250);
    expect(timer.isRunning()).toBe(true);
  });

  it('should freeze the duration on stop', () => {
    vi.spyOn(performance, 'now')
      .mockReturnValueOnce(0)
      .mockReturnValueOnce(40)
      .mockReturnValueOnce(900);

    const timer = startTimer();

    expect(timer.stop()).toBe(40);
    expect(timer.stop()).toBe(40);
    expect(timer.elapsed()).toBe(40);
    expect(timer.isRunning()).toBe(false);
  });

  it('should measure async functions', async () => {
    vi.spyOn(performance, 'now').mockReturnValueOnce(10).mockReturnValueOnce(35);

    const { result, duration_ms } = await measureAsync(async () => 'done');

    expect(result).toBe('done');
    expect(duration_ms).toBe(25);
  });
});
