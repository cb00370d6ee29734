/**
 * Backup Commands
 *
 * Usage:
 *   issue-backup export [--force]   Export the store to JSONL files
 *   issue-backup status             Show the state of the last export
 */

import { BackupError, isCancelledError } from '../../errors'
import { findDataDir, loadConfig, resolveBackupDir } from '../../config'
import { BackupExporter, truncateHash } from '../../export/orchestrator'
import { COUNTED_ENTITIES, loadBackupState } from '../../state/backup-state'
import { SqliteExportStore } from '../../store/sqlite'
import { logger } from '../../utils/logger'
import type { ExportStore } from '../../store/types'
import type { ParsedArgs } from '../types'
import { print, printError, printSuccess } from '../types'

/** A store the command opens for one run and closes afterwards */
export interface ClosableStore extends ExportStore {
  close(): void
}

export interface BackupCommandDeps {
  /** Opens the store at the configured path (default: SQLite) */
  openStore?: ((path: string) => ClosableStore) | undefined
  signal?: AbortSignal | undefined
}

/**
 * Run one export
 */
export async function exportCommand(parsed: ParsedArgs, deps: BackupCommandDeps = {}): Promise<number> {
  const openStore = deps.openStore ?? ((path: string) => SqliteExportStore.open(path))
  let store: ClosableStore | undefined

  try {
    const dataDir = await findDataDir(parsed.options.directory)
    const config = await loadConfig(dataDir)
    store = openStore(config.storePath)

    const exporter = new BackupExporter({
      store,
      resolveDir: () => resolveBackupDir(config),
    })
    const result = await exporter.run({ force: parsed.options.force, signal: deps.signal })

    if (!parsed.options.quiet) {
      if (result.outcome === 'short-circuited') {
        print(`No changes since last backup (revision ${truncateHash(result.state.lastRevision)})`)
      } else {
        printSuccess(`Backup complete: ${result.dir}`)
        for (const entity of COUNTED_ENTITIES) {
          print(`  ${entity}: ${result.state.counts[entity]}`)
        }
      }
    }
    return 0
  } catch (error: unknown) {
    if (isCancelledError(error)) {
      printError('Backup cancelled')
      return 1
    }
    logger.error('export failed', error instanceof BackupError ? error.toJSON() : error)
    const message = error instanceof Error ? error.message : String(error)
    printError(`Backup failed: ${message}`)
    return 1
  } finally {
    store?.close()
  }
}

/**
 * Print the state of the last successful export
 */
export async function statusCommand(parsed: ParsedArgs): Promise<number> {
  try {
    const dataDir = await findDataDir(parsed.options.directory)
    const config = await loadConfig(dataDir)
    const dir = await resolveBackupDir(config)
    const state = await loadBackupState(dir)

    print(`Backup directory: ${dir}`)
    if (state.lastRevision === '') {
      print('No backup has been made yet')
      return 0
    }
    print(`Last backup: ${state.timestamp}`)
    print(`Revision: ${truncateHash(state.lastRevision)}`)
    print(`Event watermark: ${state.lastWatermark}`)
    for (const entity of COUNTED_ENTITIES) {
      print(`  ${entity}: ${state.counts[entity]}`)
    }
    return 0
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error)
    printError(`Status failed: ${message}`)
    return 1
  }
}
