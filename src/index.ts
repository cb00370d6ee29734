/**
 * issue-backup - incremental, crash-safe JSONL backups of the issue store
 *
 * @packageDocumentation
 */

// =============================================================================
// Orchestration (Recommended Entry Point)
// =============================================================================

export {
  BackupExporter,
  truncateHash,
  type BackupExporterOptions,
  type RunOptions,
  type RunOutcome,
  type RunResult,
} from './export/orchestrator'

export {
  EXPORT_PLAN,
  SHADOW_PROBE_TABLE,
  ISSUES,
  EVENTS,
  COMMENTS,
  DEPENDENCIES,
  LABELS,
  CONFIG,
  snapshotSource,
  incrementalSource,
  type SnapshotEntity,
  type IncrementalEntity,
} from './export/entities'

// =============================================================================
// Exporters
// =============================================================================

export { exportTable } from './engine/table-exporter'
export { exportIncremental, highestKey, type IncrementalSource, type WatermarkState } from './engine/incremental-exporter'
export { collectRows, runQuery, throwIfAborted, type ExportSource } from './engine/query'
export { normalizeValue, formatTimestamp, isZeroDate, type JsonScalar } from './engine/normalize'
export { buildRow, serializeRow, encodeJsonl, mergeRowSets, normalizeRowSet, compareValues } from './engine/rows'

// =============================================================================
// State & Storage
// =============================================================================

export {
  loadBackupState,
  saveBackupState,
  parseBackupState,
  zeroBackupState,
  cloneBackupState,
  statePath,
  STATE_FILENAME,
  COUNTED_ENTITIES,
  type BackupState,
  type CountedEntity,
  type EntityCounts,
} from './state/backup-state'

export { writeFileAtomic, tempPathFor } from './storage/atomic-write'

// =============================================================================
// Store
// =============================================================================

export type { ExportStore, ExportContext, RowSet, QueryArg } from './store/types'
export { SqliteExportStore, contentRevision, isTemporalType, parseTemporal, type SqliteExportStoreOptions } from './store/sqlite'

// =============================================================================
// Configuration, Errors, Logging
// =============================================================================

export * from './config'
export * from './errors'
export { logger, setLogger, consoleLogger, noopLogger, createConsoleLogger, type Logger, type LogLevel } from './utils/logger'
