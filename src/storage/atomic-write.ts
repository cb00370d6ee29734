/**
 * Atomic file replacement
 *
 * The payload is written to a temp file next to the target, fsynced, closed
 * and renamed over the target. Rename within one directory is atomic, so the
 * target always holds either its previous content or the full new payload.
 * On any failure the temp file is removed and a StorageError is thrown.
 *
 * @module storage/atomic-write
 */

import { promises as fs } from 'node:fs'
import { randomBytes } from 'node:crypto'
import type { FileHandle } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import { StorageError, toError, type StorageOperation } from '../errors'
import { logger } from '../utils/logger'

const TEMP_CHARSET = '0123456789abcdefghijklmnopqrstuvwxyz'

/** Mode for files and directories created by the backup */
export const FILE_MODE = 0o600
export const DIR_MODE = 0o700

/**
 * Random base36 suffix for temp file names
 */
function randomSuffix(length: number): string {
  const bytes = randomBytes(length)
  let result = ''
  for (const byte of bytes) {
    result += TEMP_CHARSET.charAt(byte % TEMP_CHARSET.length)
  }
  return result
}

/**
 * Temp file path in the same directory as `target` (same filesystem, so the
 * final rename cannot cross devices). Dot-prefixed so directory listings of
 * `*.jsonl` never pick it up.
 */
export function tempPathFor(target: string): string {
  return join(dirname(target), `.${basename(target)}.tmp-${randomSuffix(10)}`)
}

/**
 * Write `data` to `path` atomically.
 *
 * @throws StorageError tagged with the step that failed
 */
export async function writeFileAtomic(path: string, data: Uint8Array | string): Promise<void> {
  const dir = dirname(path)
  await step('mkdir', path, () => fs.mkdir(dir, { recursive: true, mode: DIR_MODE }))

  const tempPath = tempPathFor(path)
  let handle: FileHandle | undefined

  try {
    handle = await step('open', path, () => fs.open(tempPath, 'wx', FILE_MODE))
    const opened = handle
    await step('write', path, () => opened.writeFile(data))
    await step('sync', path, () => opened.sync())
    handle = undefined
    await step('close', path, () => opened.close())
    await step('rename', path, () => fs.rename(tempPath, path))
  } catch (error: unknown) {
    if (handle) {
      await handle.close().catch((closeError: unknown) => {
        logger.debug(`Failed to close temp file ${tempPath}`, closeError)
      })
    }
    await fs.unlink(tempPath).catch((unlinkError: unknown) => {
      // The temp file may never have been created
      logger.debug(`Failed to remove temp file ${tempPath}`, unlinkError)
    })
    throw error
  }
}

/**
 * Run one file system step, converting failures into a StorageError
 */
async function step<T>(operation: StorageOperation, path: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn()
  } catch (error: unknown) {
    const cause = toError(error)
    throw new StorageError(`Failed to ${operation} while writing ${path}: ${cause.message}`, path, operation, cause)
  }
}
