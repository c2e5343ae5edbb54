/**
 * PostgreSQL spelling of portable column kinds and parameter markers
 */

import type { ColumnKind, DbType } from './types.js'

const COLUMN_TYPES: Record<DbType, Record<ColumnKind, string>> = {
  postgres: {
    text: 'TEXT',
    integer: 'INTEGER',
    // Unix milliseconds overflow a 32-bit INTEGER
    epochMillis: 'BIGINT',
    real: 'DOUBLE PRECISION',
  },
}

/**
 * Column type for a portable kind.
 *
 * Example:
 * ```typescript
 * columnType('postgres', 'epochMillis') // 'BIGINT'
 * ```
 */
export function columnType(dbType: DbType, kind: ColumnKind): string {
  return COLUMN_TYPES[dbType][kind]
}

export function paramMarker(position: number): string {
  return `$${position}`
}

/**
 * Comma-separated markers for `count` parameters starting at `first`
 */
export function paramList(count: number, first = 1): string {
  return Array.from({ length: count }, (_, i) => paramMarker(first + i)).join(', ')
}
