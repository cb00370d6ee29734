/**
 * Full-snapshot table export
 *
 * Runs a projection whose columns are discovered at run time, serializes
 * every row as one JSON object per line, and replaces the output file
 * atomically. Nothing is written until every row has been buffered, so a
 * failed query leaves the previous file untouched.
 */

import { writeFileAtomic } from '../storage/atomic-write'
import type { ExportContext, ExportStore } from '../store/types'
import { logger as defaultLogger, type Logger } from '../utils/logger'
import { collectRows, throwIfAborted, type ExportSource } from './query'
import { encodeJsonl } from './rows'

/**
 * Export one source to `outputPath` as a full snapshot.
 *
 * A query with no rows still replaces the file (with an empty one).
 *
 * @returns Number of rows written
 */
export async function exportTable(
  store: ExportStore,
  source: ExportSource,
  outputPath: string,
  ctx: ExportContext = {},
  log: Logger = defaultLogger
): Promise<number> {
  const rows = await collectRows(store, ctx, source)
  const payload = encodeJsonl(rows)

  throwIfAborted(ctx)
  await writeFileAtomic(outputPath, payload)

  log.debug(`wrote ${rows.rows.length} ${source.name} row(s) to ${outputPath}`)
  return rows.rows.length
}
