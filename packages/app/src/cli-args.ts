/**
 * Argument parsers for the command line
 */

import { InvalidArgumentError } from 'commander';

/**
 * Whole number of days, at least 1.
 *
 * @throws InvalidArgumentError for anything else; commander reports it and exits
 */
export function parseWindowDays(value: string): number {
  const trimmed = value.trim();
  const days = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(days) || days < 1) {
    throw new InvalidArgumentError('Expected a whole number of days, at least 1.');
  }
  return days;
}
