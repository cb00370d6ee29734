/**
 * Store collaborator interface
 *
 * The exporters only need three things from the relational store: run a
 * statement, report a revision marker, and probe for a table. Anything that
 * implements ExportStore can be backed up; tests use in-memory fakes.
 */

/**
 * Per-run context threaded through every store call
 */
export interface ExportContext {
  /** Aborts the run; checked before each store call */
  signal?: AbortSignal | undefined
}

/**
 * Result of a query: column names discovered from result metadata, and one
 * positional array of driver-level values per row.
 */
export interface RowSet {
  columns: string[]
  rows: unknown[][]
}

/** Bound statement parameter */
export type QueryArg = string | number | bigint | boolean | null | Uint8Array

/**
 * Relational store the backup reads from
 */
export interface ExportStore {
  /**
   * Run a statement and return every row. Rows of a statement with an
   * ORDER BY on text keys must come back in UTF-16 code unit order (a binary
   * collation); the shadow merge relies on it.
   */
  query(ctx: ExportContext, statement: string, args?: readonly QueryArg[]): Promise<RowSet>

  /**
   * Opaque marker of the store's current state (e.g. a commit hash).
   * Equal markers mean nothing changed.
   */
  currentRevision(ctx: ExportContext): Promise<string>

  /** Whether a table with this name exists */
  tableExists(ctx: ExportContext, name: string): Promise<boolean>
}
