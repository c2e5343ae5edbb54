/**
 * Backoff for transient connection errors
 */

import { noopLogger, type Logger, type RetryOptions } from './types.js'

const DEFAULT_RETRY: Required<RetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 100,
  backoffMultiplier: 2,
  jitterPercent: 25,
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

/**
 * Connection refusals, timeouts and connection-slot exhaustion are worth retrying
 */
export function isRetryableError(err: unknown): boolean {
  if (!isRecord(err)) return false

  const code = err['code']
  if (code === 'ECONNREFUSED' || code === 'ETIMEDOUT' || code === 'ENOTFOUND') return true
  // too_many_connections, cannot_connect_now
  return code === '53300' || code === '57P03'
}

/**
 * Delay before retry number `attempt` (0-based), jittered by ±jitterPercent
 */
export function backoffDelay(attempt: number, options: RetryOptions = {}, random: () => number = Math.random): number {
  const retry = { ...DEFAULT_RETRY, ...options }
  const base = retry.initialDelayMs * Math.pow(retry.backoffMultiplier, attempt)
  const jitter = base * (retry.jitterPercent / 100)
  return base + (random() * 2 - 1) * jitter
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  operation: string,
  options: RetryOptions = {},
  logger: Logger = noopLogger
): Promise<T> {
  const maxRetries = options.maxRetries ?? DEFAULT_RETRY.maxRetries

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn()
    } catch (err) {
      if (!isRetryableError(err) || attempt >= maxRetries) {
        throw err
      }

      const delayMs = backoffDelay(attempt, options)
      logger.warn(`Retrying ${operation} after transient error`, {
        attempt: attempt + 1,
        maxRetries,
        delayMs: Math.round(delayMs),
        error: String(err),
      })

      await sleep(delayMs)
    }
  }
}
