/**
 * Row helpers shared by the table and incremental exporters
 *
 * Rows arrive as positional arrays with column names discovered at run time.
 * This module normalizes them, merges a primary and a shadow result by key,
 * and serializes each row as one compact JSON object in column order.
 */

import { ErrorCode, QueryError, SerializationError, toError } from '../errors'
import type { RowSet } from '../store/types'
import { normalizeValue } from './normalize'

// =============================================================================
// Normalization
// =============================================================================

/**
 * Normalize every value of a result set
 */
export function normalizeRowSet(set: RowSet): RowSet {
  return {
    columns: set.columns,
    rows: set.rows.map((row) => row.map(normalizeValue)),
  }
}

// =============================================================================
// Ordering
// =============================================================================

function typeRank(value: unknown): number {
  if (value === null || value === undefined) return 0
  switch (typeof value) {
    case 'boolean':
      return 1
    case 'number':
    case 'bigint':
      return 2
    case 'string':
      return 3
    default:
      return 4
  }
}

/**
 * Compare two normalized key values. Nulls sort first, numbers numerically,
 * strings by code unit; values of different types order by type.
 */
export function compareValues(a: unknown, b: unknown): number {
  const rankA = typeRank(a)
  const rankB = typeRank(b)
  if (rankA !== rankB) return rankA - rankB
  if (rankA === 0) return 0

  if (typeof a === 'number' && typeof b === 'number') {
    return a < b ? -1 : a > b ? 1 : 0
  }
  const strA = typeof a === 'string' ? a : String(a)
  const strB = typeof b === 'string' ? b : String(b)
  return strA < strB ? -1 : strA > strB ? 1 : 0
}

/**
 * Resolve key column names to positions
 *
 * @throws QueryError when a key column is not in the result
 */
export function keyIndexes(columns: string[], keyColumns: readonly string[]): number[] {
  return keyColumns.map((key) => {
    const index = columns.indexOf(key)
    if (index < 0) {
      throw new QueryError(
        `Key column "${key}" not found in result columns [${columns.join(', ')}]`,
        ErrorCode.COLUMN_MISMATCH
      )
    }
    return index
  })
}

function compareRows(a: unknown[], b: unknown[], indexes: number[]): number {
  for (const index of indexes) {
    const cmp = compareValues(a[index], b[index])
    if (cmp !== 0) return cmp
  }
  return 0
}

// =============================================================================
// Merge
// =============================================================================

/**
 * Merge a primary and a shadow result, both already sorted by `keyColumns`,
 * into one result sorted by the same key. The merge is stable: on equal keys
 * every primary row comes before the shadow rows.
 *
 * Like UNION ALL, both results must have the same number of columns; the
 * merged result takes the primary's column names.
 *
 * Keys compare with compareValues (strings by UTF-16 code unit). The store's
 * ORDER BY must agree with that order: a case-insensitive collation, or
 * SQLite BINARY order for characters above U+E000 against astral ones,
 * yields an interleaving that is not globally sorted.
 */
export function mergeRowSets(primary: RowSet, shadow: RowSet | undefined, keyColumns: readonly string[]): RowSet {
  if (!shadow) {
    return primary
  }

  const columns = primary.columns.length > 0 ? primary.columns : shadow.columns
  if (primary.columns.length > 0 && shadow.columns.length > 0 && primary.columns.length !== shadow.columns.length) {
    throw new QueryError(
      `Shadow result has ${shadow.columns.length} columns, primary has ${primary.columns.length}`,
      ErrorCode.COLUMN_MISMATCH
    )
  }
  if (shadow.rows.length === 0) {
    return { columns, rows: primary.rows }
  }
  if (primary.rows.length === 0) {
    return { columns, rows: shadow.rows }
  }

  const indexes = keyIndexes(columns, keyColumns)
  const merged: unknown[][] = []
  let i = 0
  let j = 0

  while (i < primary.rows.length && j < shadow.rows.length) {
    const p = primary.rows[i]
    const s = shadow.rows[j]
    if (p === undefined || s === undefined) break
    if (compareRows(p, s, indexes) <= 0) {
      merged.push(p)
      i++
    } else {
      merged.push(s)
      j++
    }
  }
  for (; i < primary.rows.length; i++) {
    const row = primary.rows[i]
    if (row !== undefined) merged.push(row)
  }
  for (; j < shadow.rows.length; j++) {
    const row = shadow.rows[j]
    if (row !== undefined) merged.push(row)
  }

  return { columns, rows: merged }
}

// =============================================================================
// Serialization
// =============================================================================

/**
 * Build an ordered column -> value mapping. A repeated column name keeps its
 * first position and takes the last value.
 */
export function buildRow(columns: string[], values: unknown[]): Map<string, unknown> {
  const row = new Map<string, unknown>()
  columns.forEach((column, index) => {
    row.set(column, values[index] ?? null)
  })
  return row
}

/**
 * Serialize a row as compact JSON with keys in column order (no newline)
 *
 * @throws SerializationError when a value has no JSON representation
 */
export function serializeRow(row: Map<string, unknown>): string {
  const parts: string[] = []
  for (const [column, value] of row) {
    let encoded: string | undefined
    try {
      encoded = JSON.stringify(value)
    } catch (error: unknown) {
      const cause = toError(error)
      throw new SerializationError(`Cannot serialize column "${column}": ${cause.message}`, column, cause)
    }
    if (encoded === undefined) {
      throw new SerializationError(`Cannot serialize column "${column}": unsupported ${typeof value} value`, column)
    }
    parts.push(`${JSON.stringify(column)}:${encoded}`)
  }
  return `{${parts.join(',')}}`
}

/**
 * Serialize every row of a normalized result as JSONL (one object per line,
 * each line newline-terminated)
 */
export function encodeJsonl(set: RowSet): string {
  let out = ''
  for (const values of set.rows) {
    out += serializeRow(buildRow(set.columns, values)) + '\n'
  }
  return out
}
