/**
 * Backup state persistence
 *
 * `backup_state.json` records the revision and event watermark of the last
 * successful export, plus informational row counts. It is read once at the
 * start of a run and rewritten atomically as the last step of a successful
 * one, so a crash mid-run leaves the previous state in place.
 *
 * @module state/backup-state
 */

import { promises as fs } from 'node:fs'
import { join } from 'node:path'
import { StorageError, ValidationError, hasErrorCode, toError } from '../errors'
import { writeFileAtomic } from '../storage/atomic-write'
import { isNumber, isRecord, isString } from '../utils/json-validation'

export const STATE_FILENAME = 'backup_state.json'

/** Entities with a row count in the state file, in file order */
export const COUNTED_ENTITIES = ['issues', 'events', 'comments', 'dependencies', 'labels', 'config'] as const

export type CountedEntity = (typeof COUNTED_ENTITIES)[number]

export type EntityCounts = Record<CountedEntity, number>

export interface BackupState {
  /** Store revision at the last successful export; '' when never exported */
  lastRevision: string
  /** Highest exported event key; 0 when never exported */
  lastWatermark: number
  /** RFC 3339 UTC time of the last successful export; '' when never exported */
  timestamp: string
  counts: EntityCounts
}

/**
 * State of a backup directory that has never been exported to
 */
export function zeroBackupState(): BackupState {
  return {
    lastRevision: '',
    lastWatermark: 0,
    timestamp: '',
    counts: { issues: 0, events: 0, comments: 0, dependencies: 0, labels: 0, config: 0 },
  }
}

export function statePath(dir: string): string {
  return join(dir, STATE_FILENAME)
}

/**
 * Load the state file from `dir`. A missing file is the normal first-run
 * condition and yields the zero state.
 *
 * @throws StorageError if the file exists but cannot be read
 * @throws ValidationError if the file is not a valid state document
 */
export async function loadBackupState(dir: string): Promise<BackupState> {
  const path = statePath(dir)
  let text: string
  try {
    text = await fs.readFile(path, 'utf-8')
  } catch (error: unknown) {
    if (hasErrorCode(error, 'ENOENT')) {
      return zeroBackupState()
    }
    const cause = toError(error)
    throw new StorageError(`Failed to read backup state: ${cause.message}`, path, 'read', cause)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (error: unknown) {
    const cause = toError(error)
    throw new ValidationError(`Failed to parse backup state: ${cause.message}`, { path }, cause)
  }
  return parseBackupState(parsed, path)
}

/**
 * Validate a parsed state document. Missing fields take their zero values.
 */
export function parseBackupState(value: unknown, path = STATE_FILENAME): BackupState {
  if (!isRecord(value)) {
    throw new ValidationError('Backup state must be a JSON object', { path, expectedType: 'object' })
  }

  const state = zeroBackupState()

  if (value.lastRevision !== undefined) {
    if (!isString(value.lastRevision)) throw invalidField(path, 'lastRevision', 'string', 'a string')
    state.lastRevision = value.lastRevision
  }
  if (value.lastWatermark !== undefined) {
    if (!isNumber(value.lastWatermark) || !Number.isInteger(value.lastWatermark) || value.lastWatermark < 0) {
      throw invalidField(path, 'lastWatermark', 'integer', 'a non-negative integer')
    }
    state.lastWatermark = value.lastWatermark
  }
  if (value.timestamp !== undefined) {
    if (!isString(value.timestamp)) throw invalidField(path, 'timestamp', 'string', 'a string')
    state.timestamp = value.timestamp
  }
  if (value.counts !== undefined) {
    if (!isRecord(value.counts)) throw invalidField(path, 'counts', 'object', 'an object')
    for (const entity of COUNTED_ENTITIES) {
      const count = value.counts[entity]
      if (count === undefined) continue
      if (!isNumber(count) || !Number.isInteger(count)) throw invalidField(path, `counts.${entity}`, 'integer', 'an integer')
      state.counts[entity] = count
    }
  }

  return state
}

function invalidField(path: string, field: string, expectedType: string, description: string): ValidationError {
  return new ValidationError(`Invalid backup state: "${field}" must be ${description}`, {
    path,
    field,
    expectedType,
  })
}

/**
 * Serialize state as 2-space indented JSON and replace the state file
 * atomically. Call only after every entity file has been written.
 */
export async function saveBackupState(dir: string, state: BackupState): Promise<void> {
  const document = {
    lastRevision: state.lastRevision,
    lastWatermark: state.lastWatermark,
    timestamp: state.timestamp,
    counts: Object.fromEntries(COUNTED_ENTITIES.map((entity) => [entity, state.counts[entity]])),
  }
  await writeFileAtomic(statePath(dir), JSON.stringify(document, null, 2))
}

/**
 * Deep copy of a state, so a run can mutate its own copy
 */
export function cloneBackupState(state: BackupState): BackupState {
  return { ...state, counts: { ...state.counts } }
}
