/**
 * @fileoverview Type definitions for the airwatch logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity that will be emitted.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/airwatch.log'
 * };
 * ```
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * Machine-readable JSON lines instead of the colorized pretty print.
   * @default true when NODE_ENV is 'production'
   */
  json?: boolean;

  /** Also write to this file */
  filePath?: string;

  /** @default true */
  console?: boolean;

  /**
   * Suppress all output. Used by tests that need a real logger.
   * @default false
   */
  silent?: boolean;
}

/**
 * Structured log entry with the standard fields this project emits.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  /** ISO 8601 */
  timestamp: string;

  /** Correlates every line of one refresh cycle or read request */
  request_id?: string;
  component?: string;
  /** City or station being refreshed */
  target?: string;
  /** Cache namespace ('live' or 'forecast') */
  namespace?: string;
  duration_ms?: number;
  /** e.g. 'success', 'error', 'skipped' */
  result?: string;
  error_code?: string;
  cache?: 'hit' | 'miss';

  [key: string]: unknown;
}

/**
 * Fields attached to every entry of a child logger.
 */
export interface ChildLoggerContext {
  component?: string;
  target?: string;
  request_id?: string;
  [key: string]: unknown;
}

export type Logger = WinstonLogger;
