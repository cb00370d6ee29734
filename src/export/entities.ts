/**
 * Catalog of exported entities
 *
 * Each entity has a primary statement and, where the legacy wisp tables hold
 * rows of the same entity, a shadow statement over the wisp table with the
 * same column list. Whether the shadow statements are used is decided once
 * per run by probing for SHADOW_PROBE_TABLE.
 */

import type { ExportSource } from '../engine/query'
import type { IncrementalSource } from '../engine/incremental-exporter'
import type { CountedEntity } from '../state/backup-state'

/** Table whose presence enables every shadow statement */
export const SHADOW_PROBE_TABLE = 'wisps'

export interface SnapshotEntity {
  name: CountedEntity
  file: string
  primary: string
  shadow?: string
  orderBy: readonly string[]
}

export interface IncrementalEntity {
  name: CountedEntity
  file: string
  primary: string
  shadow?: string
  keyColumn: string
}

const EVENT_COLUMNS = 'id, issue_id, event_type, actor, old_value, new_value, comment, created_at'
const COMMENT_COLUMNS = 'id, issue_id, author, text, created_at'
const DEPENDENCY_COLUMNS = 'issue_id, depends_on_id, type, created_at, created_by'

export const ISSUES: SnapshotEntity = {
  name: 'issues',
  file: 'issues.jsonl',
  // Wildcard on purpose: the issues schema is wide and keeps growing
  primary: 'SELECT * FROM issues ORDER BY id',
  shadow: 'SELECT * FROM wisps ORDER BY id',
  orderBy: ['id'],
}

export const EVENTS: IncrementalEntity = {
  name: 'events',
  file: 'events.jsonl',
  primary: `SELECT ${EVENT_COLUMNS} FROM events WHERE id > ? ORDER BY id ASC`,
  shadow: `SELECT ${EVENT_COLUMNS} FROM wisp_events WHERE id > ? ORDER BY id ASC`,
  keyColumn: 'id',
}

export const COMMENTS: SnapshotEntity = {
  name: 'comments',
  file: 'comments.jsonl',
  primary: `SELECT ${COMMENT_COLUMNS} FROM comments ORDER BY id`,
  shadow: `SELECT ${COMMENT_COLUMNS} FROM wisp_comments ORDER BY id`,
  orderBy: ['id'],
}

export const DEPENDENCIES: SnapshotEntity = {
  name: 'dependencies',
  file: 'dependencies.jsonl',
  primary: `SELECT ${DEPENDENCY_COLUMNS} FROM dependencies ORDER BY issue_id, depends_on_id`,
  shadow: `SELECT ${DEPENDENCY_COLUMNS} FROM wisp_dependencies ORDER BY issue_id, depends_on_id`,
  orderBy: ['issue_id', 'depends_on_id'],
}

export const LABELS: SnapshotEntity = {
  name: 'labels',
  file: 'labels.jsonl',
  primary: 'SELECT issue_id, label FROM labels ORDER BY issue_id, label',
  shadow: 'SELECT issue_id, label FROM wisp_labels ORDER BY issue_id, label',
  orderBy: ['issue_id', 'label'],
}

export const CONFIG: SnapshotEntity = {
  name: 'config',
  file: 'config.jsonl',
  primary: 'SELECT `key`, value FROM config ORDER BY `key`',
  orderBy: ['key'],
}

/**
 * Export order: every full snapshot first, then the events stream.
 */
export const EXPORT_PLAN: ReadonlyArray<
  { kind: 'snapshot'; entity: SnapshotEntity } | { kind: 'incremental'; entity: IncrementalEntity }
> = [
  { kind: 'snapshot', entity: ISSUES },
  { kind: 'snapshot', entity: COMMENTS },
  { kind: 'snapshot', entity: DEPENDENCIES },
  { kind: 'snapshot', entity: LABELS },
  { kind: 'snapshot', entity: CONFIG },
  { kind: 'incremental', entity: EVENTS },
]

/**
 * Statements for a full-snapshot entity, with or without its shadow table
 */
export function snapshotSource(entity: SnapshotEntity, withShadow: boolean): ExportSource {
  return {
    name: entity.name,
    primary: entity.primary,
    shadow: withShadow ? entity.shadow : undefined,
    orderBy: entity.orderBy,
  }
}

/**
 * Statements for an incremental entity, with or without its shadow table
 */
export function incrementalSource(entity: IncrementalEntity, withShadow: boolean): IncrementalSource {
  return {
    name: entity.name,
    primary: entity.primary,
    shadow: withShadow ? entity.shadow : undefined,
    keyColumn: entity.keyColumn,
  }
}
