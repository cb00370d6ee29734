/**
 * SQLite ExportStore backed by better-sqlite3
 *
 * Queries run in raw (array) mode so column order and duplicate column
 * names survive; column names come from the prepared statement's metadata.
 *
 * SQLite stores date/time values as text. Values in columns declared
 * DATE, DATETIME or TIMESTAMP are parsed into Date objects (UTC unless the
 * text carries an offset) so the normalizer renders them like any other
 * temporal value; text that is not a date is returned unchanged.
 *
 * SQLite has no commit hash, so the default revision marker is a SHA-256
 * digest over the schema and the rows of every user table. Pass `revision`
 * to use something cheaper (e.g. a version table the application maintains).
 */

import { createHash } from 'node:crypto'
import Database from 'better-sqlite3'
import { normalizeValue } from '../engine/normalize'
import type { ExportContext, ExportStore, QueryArg, RowSet } from './types'

export interface SqliteExportStoreOptions {
  /** Computes the revision marker; defaults to a content digest */
  revision?: ((db: Database.Database) => string) | undefined
}

export class SqliteExportStore implements ExportStore {
  readonly db: Database.Database
  private readonly revisionFn: (db: Database.Database) => string

  constructor(db: Database.Database, options: SqliteExportStoreOptions = {}) {
    this.db = db
    this.revisionFn = options.revision ?? contentRevision
  }

  /**
   * Open a database file read-only
   */
  static open(path: string, options: SqliteExportStoreOptions = {}): SqliteExportStore {
    return new SqliteExportStore(new Database(path, { readonly: true, fileMustExist: true }), options)
  }

  async query(_ctx: ExportContext, statement: string, args: readonly QueryArg[] = []): Promise<RowSet> {
    const stmt = this.db.prepare<unknown[], unknown[]>(statement)
    const definitions = stmt.columns()
    const columns = definitions.map((column) => column.name)
    const rows = stmt.raw(true).all(...args)

    const temporal = definitions.flatMap((column, index) => (isTemporalType(column.type) ? [index] : []))
    if (temporal.length > 0) {
      for (const row of rows) {
        for (const index of temporal) {
          row[index] = parseTemporal(row[index])
        }
      }
    }
    return { columns, rows }
  }

  async currentRevision(_ctx: ExportContext): Promise<string> {
    return this.revisionFn(this.db)
  }

  async tableExists(_ctx: ExportContext, name: string): Promise<boolean> {
    const row = this.db
      .prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
      .get(name)
    return row !== undefined
  }

  close(): void {
    this.db.close()
  }
}

const TEMPORAL_TYPE = /^(DATE|DATETIME|TIMESTAMP)\b/i

const TEMPORAL_TEXT =
  /^(\d{4}-\d{2}-\d{2})(?:[ T](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?))?\s*(Z|[+-]\d{2}:?\d{2})?$/i

/**
 * Whether a declared column type holds dates or times
 */
export function isTemporalType(declared: string | null): boolean {
  return declared !== null && TEMPORAL_TYPE.test(declared)
}

/**
 * Parse SQLite date/time text (`YYYY-MM-DD`, `YYYY-MM-DD HH:MM[:SS[.fff]]`,
 * optionally with `T`, `Z` or an offset) into a Date. Zero dates such as
 * `0000-00-00 00:00:00` become an invalid Date. Anything else is returned
 * as is.
 */
export function parseTemporal(value: unknown): unknown {
  if (typeof value !== 'string') return value
  const match = TEMPORAL_TEXT.exec(value.trim())
  if (!match) return value

  const [, date, time, zone] = match
  if (date === undefined || date.startsWith('0000-')) return new Date(Number.NaN)
  let offset = zone === undefined || zone.toUpperCase() === 'Z' ? 'Z' : zone
  if (/^[+-]\d{4}$/.test(offset)) {
    offset = `${offset.slice(0, 3)}:${offset.slice(3)}`
  }
  let clock = time ?? '00:00:00'
  if (clock.length === 5) clock += ':00'
  const dot = clock.indexOf('.')
  if (dot >= 0) {
    clock = clock.slice(0, dot + 1) + clock.slice(dot + 1).padEnd(3, '0').slice(0, 3)
  }
  return new Date(Date.parse(`${date}T${clock}${offset}`))
}

/**
 * SHA-256 over the schema and every user table's rows, in table name order
 */
export function contentRevision(db: Database.Database): string {
  const hash = createHash('sha256')
  const tables = db
    .prepare<[], { name: string; sql: string | null }>(
      "SELECT name, sql FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .all()

  for (const table of tables) {
    hash.update(`table:${table.name}\n${table.sql ?? ''}\n`)
    const rows = db.prepare<[], unknown[]>(`SELECT * FROM "${table.name.replace(/"/g, '""')}"`).raw(true).iterate()
    for (const row of rows) {
      hash.update(JSON.stringify(row.map(normalizeValue)) + '\n')
    }
  }

  return hash.digest('hex')
}
