/**
 * @fileoverview Custom Winston formats: PII redaction, standard fields with
 * request ID injection, and the development pretty printer.
 */

import { format } from 'winston';
import { getRequestId } from './request-context.js';

/**
 * Field names whose values never reach a transport. Case-insensitive.
 */
const SENSITIVE_FIELD_PATTERNS: readonly RegExp[] = [
  /password/i,
  /passwd/i,
  /pwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /auth/i,
  /private[_-]?key/i,
  /credit[_-]?card/i,
  /ssn/i,
];

const REDACTED = '[REDACTED]';

const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

export function isSensitiveFieldName(name: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(name));
}

/**
 * Returns a copy of the value with sensitive keys replaced, at any depth.
 * Error instances pass through untouched so `format.errors` can read them.
 */
export function redactSensitiveFields(value: unknown, seen: WeakSet<object> = new WeakSet()): unknown {
  if (value === null || typeof value !== 'object' || value instanceof Error) {
    return value;
  }
  if (seen.has(value)) {
    return '[Circular]';
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactSensitiveFields(item, seen));
  }

  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    result[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(nested, seen);
  }
  return result;
}

/**
 * Winston format that redacts sensitive fields from log metadata.
 *
 * @example
 * ```typescript
 * logger.info('Upstream request', { url: '/feed/@10557/', token: 'test-secret' });
 * // {"message":"Upstream request","url":"/feed/@10557/","token":"[REDACTED]",...}
 * ```
 */
export const redactPII = format((info) => {
  const redacted = { ...info };

  for (const key of Object.keys(redacted)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    redacted[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(redacted[key]);
  }

  return redacted;
});

/**
 * ISO timestamp, error stacks, and the request_id of the active context.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  format((info) => {
    const requestId = getRequestId();
    if (requestId && !info['request_id']) {
      info['request_id'] = requestId;
    }
    return info;
  })()
);

/**
 * Human-readable output for development.
 *
 * @example
 * ```
 * [2025-01-15T10:00:00.000Z] info: Refresh cycle complete component=scheduler request_id=... succeeded=5 failed=1
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, target, request_id, stack, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (target) context.push(`target=${String(target)}`);
    if (request_id) context.push(`request_id=${String(request_id)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (key === 'splat') {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    return stack ? `${baseMsg}\n${String(stack)}` : baseMsg;
  })
);
