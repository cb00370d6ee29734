/**
 * Store access helpers for the exporters
 */

import { BackupError, CancelledError, QueryError, ErrorCode, toError } from '../errors'
import type { ExportContext, ExportStore, QueryArg, RowSet } from '../store/types'
import { mergeRowSets, normalizeRowSet } from './rows'

/**
 * A primary statement, an optional shadow statement with the same columns,
 * and the key columns both are ordered by.
 */
export interface ExportSource {
  /** Entity name, used in logs and errors */
  name: string
  primary: string
  shadow?: string | undefined
  orderBy: readonly string[]
  /** Parameters bound to both statements */
  args?: readonly QueryArg[] | undefined
}

/**
 * Throw CancelledError if the run's signal has been aborted
 */
export function throwIfAborted(ctx: ExportContext): void {
  if (ctx.signal?.aborted) {
    const reason: unknown = ctx.signal.reason
    throw new CancelledError('Backup export was cancelled', reason instanceof Error ? reason : undefined)
  }
}

/**
 * Run one statement, converting driver failures into QueryError
 */
export async function runQuery(
  store: ExportStore,
  ctx: ExportContext,
  statement: string,
  args: readonly QueryArg[] = []
): Promise<RowSet> {
  throwIfAborted(ctx)
  try {
    return await store.query(ctx, statement, args)
  } catch (error: unknown) {
    if (error instanceof BackupError) throw error
    const cause = toError(error)
    throw new QueryError(`Query failed: ${cause.message}`, ErrorCode.QUERY_ERROR, { statement }, cause)
  }
}

/**
 * Query the primary (and shadow) statements of a source and return one
 * normalized result, merged by key.
 */
export async function collectRows(store: ExportStore, ctx: ExportContext, source: ExportSource): Promise<RowSet> {
  const primary = normalizeRowSet(await runQuery(store, ctx, source.primary, source.args))
  const shadow = source.shadow !== undefined
    ? normalizeRowSet(await runQuery(store, ctx, source.shadow, source.args))
    : undefined
  return mergeRowSets(primary, shadow, source.orderBy)
}
