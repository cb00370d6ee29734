/**
 * Incremental export of an append-only stream (events)
 *
 * Only rows whose key is above the stored watermark are selected. On the
 * first run (watermark 0) the rows are written as a complete file through
 * the atomic writer; afterwards they are appended to the existing file.
 * The watermark then moves to the highest key seen.
 */

import { promises as fs } from 'node:fs'
import { StorageError, toError } from '../errors'
import { FILE_MODE, writeFileAtomic } from '../storage/atomic-write'
import type { ExportContext, ExportStore } from '../store/types'
import { logger as defaultLogger, type Logger } from '../utils/logger'
import { collectRows, throwIfAborted } from './query'
import { encodeJsonl, keyIndexes } from './rows'

/**
 * Statements for an incremental stream. Each statement takes exactly one
 * parameter, the current watermark (`WHERE <key> > ?`), and orders by the key.
 */
export interface IncrementalSource {
  name: string
  primary: string
  shadow?: string | undefined
  /** Integer key column the watermark tracks */
  keyColumn: string
}

/** The part of the backup state this exporter reads and advances */
export interface WatermarkState {
  lastWatermark: number
}

/**
 * Export rows newer than `state.lastWatermark` to `outputPath`.
 *
 * With no new rows the file and watermark are left untouched.
 *
 * @returns Number of new rows exported
 */
export async function exportIncremental(
  store: ExportStore,
  source: IncrementalSource,
  outputPath: string,
  state: WatermarkState,
  ctx: ExportContext = {},
  log: Logger = defaultLogger
): Promise<number> {
  const watermark = state.lastWatermark
  const rows = await collectRows(store, ctx, {
    name: source.name,
    primary: source.primary,
    shadow: source.shadow,
    orderBy: [source.keyColumn],
    args: [watermark],
  })

  if (rows.rows.length === 0) {
    log.debug(`no new ${source.name} since watermark ${watermark}`)
    return 0
  }

  const maxKey = highestKey(rows.columns, rows.rows, source.keyColumn, watermark)
  const payload = encodeJsonl(rows)

  throwIfAborted(ctx)
  if (watermark === 0) {
    await writeFileAtomic(outputPath, payload)
  } else {
    await appendLines(outputPath, payload)
  }

  state.lastWatermark = maxKey
  log.debug(`exported ${rows.rows.length} ${source.name} row(s), watermark ${watermark} -> ${maxKey}`)
  return rows.rows.length
}

/**
 * Append encoded JSONL to `path` in one call, creating the file if missing.
 * Durable at close, not atomic: a crash can leave a truncated last line,
 * which the next full export (watermark 0) replaces.
 */
async function appendLines(path: string, data: string): Promise<void> {
  try {
    await fs.appendFile(path, data, { encoding: 'utf-8', mode: FILE_MODE })
  } catch (error: unknown) {
    const cause = toError(error)
    throw new StorageError(`Failed to append to ${path}: ${cause.message}`, path, 'append', cause)
  }
}

/**
 * Highest integer key among `rows`, never lower than `floor`.
 * Non-integer keys are ignored.
 */
export function highestKey(columns: string[], rows: unknown[][], keyColumn: string, floor: number): number {
  const [index] = keyIndexes(columns, [keyColumn])
  let max = floor
  if (index === undefined) return max
  for (const row of rows) {
    const key = row[index]
    if (typeof key === 'number' && Number.isInteger(key) && key > max) {
      max = key
    }
  }
  return max
}
