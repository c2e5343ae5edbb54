/**
 * Minimal logger accepted by the core. Any winston logger satisfies it.
 */
export interface Logger {
  warn(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

export const noopLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
