/**
 * Periodic multi-target refresh loop
 */

import { isAirwatchError, systemClock } from '@airwatch/contracts';
import type { Clock } from '@airwatch/contracts';
import { startTimer, withRequestContext, type Logger } from '@airwatch/logger';
import type { HealthStatus, Service } from '../../container/types.js';
import type { CycleSummary, SchedulerState, TargetRefresher } from './types.js';

/**
 * Waits `ms` or until the signal aborts, whichever comes first. Never rejects.
 */
export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export const sleepUntilAborted: SleepFn = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });

export const MIN_INTERVAL_MS = 60_000;

export interface RefreshSchedulerConfig {
  refresher: TargetRefresher;
  targets: string[];
  /** Raised to one minute when lower */
  intervalMs: number;
  logger: Logger;
  clock?: Clock;
  sleep?: SleepFn;
}

/**
 * Idle → Running → Waiting → Running → … until stopped.
 *
 * The first cycle starts immediately. Each cycle refreshes every target
 * concurrently and waits for all of them; one target failing is logged
 * and never affects the others. The next cycle is due one interval after
 * the previous one started. Stopping interrupts a wait but lets an
 * in-flight cycle finish.
 *
 * Example:
 * ```typescript
 * const scheduler = new RefreshScheduler({ refresher: pipeline, targets, intervalMs: 600_000, logger });
 * await scheduler.initialize(); // starts the loop
 * ...
 * await scheduler.shutdown(); // waits for the current cycle
 * ```
 */
export class RefreshScheduler implements Service {
  readonly name = 'RefreshScheduler';
  readonly dependencies = ['SnapshotStore', 'ViewCache'];

  private refresher: TargetRefresher;
  private targets: string[];
  private intervalMs: number;
  private logger: Logger;
  private clock: Clock;
  private sleep: SleepFn;

  private state: SchedulerState = 'idle';
  private controller?: AbortController;
  private loop?: Promise<void>;
  private cycles = 0;
  private lastCycle?: CycleSummary;

  constructor(config: RefreshSchedulerConfig) {
    this.refresher = config.refresher;
    this.targets = [...config.targets];
    this.intervalMs = Math.max(MIN_INTERVAL_MS, config.intervalMs);
    this.logger = config.logger;
    this.clock = config.clock ?? systemClock;
    this.sleep = config.sleep ?? sleepUntilAborted;
  }

  async initialize(): Promise<void> {
    this.start();
  }

  async shutdown(): Promise<void> {
    await this.stop();
  }

  healthCheck(): HealthStatus {
    const failed = this.lastCycle?.failed.length ?? 0;
    return {
      healthy: this.state !== 'stopped' && (this.lastCycle === undefined || failed < this.targets.length),
      message: `Scheduler ${this.state}`,
      details: {
        state: this.state,
        targets: this.targets,
        intervalMs: this.intervalMs,
        cycles: this.cycles,
        lastCycle: this.lastCycle ?? null,
      },
    };
  }

  getState(): SchedulerState {
    return this.state;
  }

  /**
   * Starts the background loop. Calling it while running does nothing.
   */
  start(): void {
    if (this.loop) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal).catch((error: unknown) => {
      this.state = 'stopped';
      this.logger.error('Refresh scheduler loop crashed', { error });
    });
    this.logger.info('Refresh scheduler started', { targets: this.targets, intervalMs: this.intervalMs });
  }

  /**
   * Signals the loop to stop and waits for the in-flight cycle.
   */
  async stop(): Promise<void> {
    if (!this.controller || !this.loop) {
      return;
    }
    this.controller.abort();
    await this.loop;
    this.loop = undefined;
    this.controller = undefined;
    this.logger.info('Refresh scheduler stopped', { cycles: this.cycles });
  }

  /**
   * Runs cycles until the signal aborts.
   */
  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const cycleStart = this.clock.now();
      await this.runCycle(signal);

      if (signal.aborted) {
        break;
      }

      // A cycle that overran the interval is followed immediately
      const delay = Math.max(0, cycleStart + this.intervalMs - this.clock.now());
      this.state = 'waiting';
      await this.sleep(delay, signal);
    }
    this.state = 'stopped';
  }

  /**
   * Refreshes every target once. Never rejects.
   */
  async runCycle(signal?: AbortSignal): Promise<CycleSummary> {
    this.state = 'running';

    return withRequestContext(async () => {
      const timer = startTimer();
      const succeeded: string[] = [];
      const failed: string[] = [];

      await Promise.all(
        this.targets.map(async (target) => {
          if (signal?.aborted) {
            return;
          }
          try {
            await this.refresher.refreshOne(target);
            succeeded.push(target);
          } catch (error) {
            failed.push(target);
            this.logger.error(`Failed to refresh data for ${target}`, {
              target,
              error_code: isAirwatchError(error) ? error.code : undefined,
              error: error instanceof Error ? error.message : String(error),
            });
          }
        })
      );

      const summary: CycleSummary = { succeeded, failed, duration_ms: timer.stop() };
      this.cycles++;
      this.lastCycle = summary;

      this.logger.info('Refresh cycle completed', {
        succeeded: succeeded.length,
        failed: failed.length,
        duration_ms: summary.duration_ms,
      });

      return summary;
    });
  }
}
