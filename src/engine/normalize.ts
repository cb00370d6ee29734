/**
 * Row value normalization
 *
 * Converts driver-level values into values JSON can carry. The column set of
 * an export is not known ahead of time, so this is total: unknown types pass
 * through unchanged instead of failing.
 */

/** Scalar values an exported row may hold */
export type JsonScalar = string | number | boolean | null

/** The zero instant drivers use for unset temporal columns */
const ZERO_INSTANT_MS = Date.parse('0001-01-01T00:00:00Z')

const textDecoder = new TextDecoder('utf-8')

/**
 * Format a Date as RFC 3339 in UTC at second precision,
 * e.g. `2024-03-01T12:30:00Z`.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z')
}

/**
 * Whether a Date is invalid or the zero instant
 */
export function isZeroDate(date: Date): boolean {
  const ms = date.getTime()
  return Number.isNaN(ms) || ms === ZERO_INSTANT_MS
}

/**
 * Normalize a single column value.
 *
 * - raw bytes: decoded as UTF-8 text
 * - Date: `null` when zero/invalid, otherwise an RFC 3339 UTC string
 * - null/undefined: `null`
 * - bigint: a number when it is a safe integer, otherwise its decimal string
 * - everything else: unchanged
 */
export function normalizeValue(value: unknown): unknown {
  if (value === null || value === undefined) {
    return null
  }
  if (value instanceof Uint8Array) {
    return textDecoder.decode(value)
  }
  if (value instanceof Date) {
    return isZeroDate(value) ? null : formatTimestamp(value)
  }
  if (typeof value === 'bigint') {
    const asNumber = Number(value)
    return Number.isSafeInteger(asNumber) ? asNumber : value.toString()
  }
  return value
}
