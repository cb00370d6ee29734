/**
 * Backup export orchestration
 *
 * One run: load state, skip if the store revision is unchanged, probe for the
 * shadow tables, export every entity in a fixed order, then record the new
 * revision and save state. State is saved only after every entity file has
 * been written; any failure leaves the previous state file untouched.
 *
 * @module export/orchestrator
 */

import { join } from 'node:path'
import { BackupError, CancelledError, ExportError, QueryError, ErrorCode, toError } from '../errors'
import { exportIncremental } from '../engine/incremental-exporter'
import { throwIfAborted } from '../engine/query'
import { exportTable } from '../engine/table-exporter'
import { formatTimestamp } from '../engine/normalize'
import {
  cloneBackupState,
  loadBackupState,
  saveBackupState,
  type BackupState,
} from '../state/backup-state'
import type { ExportContext, ExportStore } from '../store/types'
import { logger as defaultLogger, type Logger } from '../utils/logger'
import { EXPORT_PLAN, SHADOW_PROBE_TABLE, incrementalSource, snapshotSource } from './entities'

// =============================================================================
// Types
// =============================================================================

export interface BackupExporterOptions {
  store: ExportStore
  /** Resolves (and creates) the backup directory */
  resolveDir: () => Promise<string>
  logger?: Logger | undefined
  /** Clock for the state timestamp */
  now?: (() => Date) | undefined
}

export interface RunOptions {
  /** Export even if the store revision has not changed */
  force?: boolean | undefined
  signal?: AbortSignal | undefined
}

export type RunOutcome = 'short-circuited' | 'completed'

export interface RunResult {
  outcome: RunOutcome
  state: BackupState
  /** Backup directory the run used */
  dir: string
}

// =============================================================================
// BackupExporter
// =============================================================================

export class BackupExporter {
  private readonly store: ExportStore
  private readonly resolveDir: () => Promise<string>
  private readonly log: Logger | undefined
  private readonly now: () => Date

  constructor(options: BackupExporterOptions) {
    this.store = options.store
    this.resolveDir = options.resolveDir
    this.log = options.logger
    this.now = options.now ?? (() => new Date())
  }

  private get logger(): Logger {
    return this.log ?? defaultLogger
  }

  /**
   * Run one export. Returns the resulting state; throws on any failure
   * without saving state.
   */
  async run(options: RunOptions = {}): Promise<RunResult> {
    const ctx: ExportContext = { signal: options.signal }
    const log = this.logger

    const dir = await this.resolveDir()
    const previous = await loadBackupState(dir)

    if (!options.force) {
      const revision = await this.currentRevision(ctx)
      if (previous.lastRevision !== '' && revision === previous.lastRevision) {
        log.debug(`no changes since last backup (revision ${truncateHash(revision)})`)
        return { outcome: 'short-circuited', state: previous, dir }
      }
    }

    const state = cloneBackupState(previous)
    const withShadow = await this.probeShadowTables(ctx)

    for (const step of EXPORT_PLAN) {
      const entity = step.entity
      const outputPath = join(dir, entity.file)
      try {
        throwIfAborted(ctx)
        if (step.kind === 'snapshot') {
          const count = await exportTable(this.store, snapshotSource(step.entity, withShadow), outputPath, ctx, log)
          state.counts[entity.name] = count
          log.info(`${entity.name}: ${count} row(s)`)
        } else {
          const count = await exportIncremental(
            this.store,
            incrementalSource(step.entity, withShadow),
            outputPath,
            state,
            ctx,
            log
          )
          state.counts[entity.name] += count
          log.info(`${entity.name}: ${count} new row(s), ${state.counts[entity.name]} total`)
        }
      } catch (error: unknown) {
        throw entityError(entity.name, error)
      }
    }

    state.lastRevision = await this.currentRevision(ctx)
    state.timestamp = formatTimestamp(this.now())

    throwIfAborted(ctx)
    await saveBackupState(dir, state)

    log.info(`backup complete at revision ${truncateHash(state.lastRevision)}`)
    return { outcome: 'completed', state, dir }
  }

  private async currentRevision(ctx: ExportContext): Promise<string> {
    throwIfAborted(ctx)
    try {
      return await this.store.currentRevision(ctx)
    } catch (error: unknown) {
      if (error instanceof BackupError) throw error
      const cause = toError(error)
      throw new QueryError(`Failed to get current revision: ${cause.message}`, ErrorCode.QUERY_ERROR, undefined, cause)
    }
  }

  private async probeShadowTables(ctx: ExportContext): Promise<boolean> {
    throwIfAborted(ctx)
    try {
      return await this.store.tableExists(ctx, SHADOW_PROBE_TABLE)
    } catch (error: unknown) {
      if (error instanceof BackupError) throw error
      const cause = toError(error)
      throw new QueryError(
        `Failed to check for table ${SHADOW_PROBE_TABLE}: ${cause.message}`,
        ErrorCode.QUERY_ERROR,
        { table: SHADOW_PROBE_TABLE },
        cause
      )
    }
  }
}

/**
 * Attach the entity name to a failure. Cancellation passes through unchanged.
 */
function entityError(entity: string, error: unknown): Error {
  if (error instanceof CancelledError) {
    return error
  }
  return new ExportError(entity, toError(error))
}

/**
 * First 8 characters of a revision hash
 */
export function truncateHash(hash: string): string {
  return hash.length > 8 ? hash.slice(0, 8) : hash
}
