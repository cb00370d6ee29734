/**
 * Error hierarchy tests
 */

import { describe, it, expect } from 'vitest'
import {
  BackupError,
  CancelledError,
  ErrorCode,
  ExportError,
  QueryError,
  StorageError,
  hasErrorCode,
  isCancelledError,
  toError,
} from '../../../src/errors'

describe('errors', () => {
  it('should map storage operations to read and write codes', () => {
    expect(new StorageError('x', '/b/state.json', 'read').code).toBe(ErrorCode.STORAGE_READ_ERROR)
    expect(new StorageError('x', '/b/issues.jsonl', 'rename').code).toBe(ErrorCode.STORAGE_WRITE_ERROR)
  })

  it('should keep subclass identity', () => {
    const error = new ExportError('labels', new Error('boom'))

    expect(error).toBeInstanceOf(ExportError)
    expect(error).toBeInstanceOf(BackupError)
    expect(error.name).toBe('ExportError')
    expect(error.entity).toBe('labels')
  })

  it('should serialize the cause chain', () => {
    const query = new QueryError('Query failed: connection reset', ErrorCode.QUERY_ERROR, {
      statement: 'SELECT issue_id, label FROM labels',
    })
    const error = new ExportError('labels', query)

    expect(error.toJSON()).toEqual({
      name: 'ExportError',
      code: ErrorCode.EXPORT_FAILED,
      message: 'Failed to back up labels: Query failed: connection reset',
      context: { entity: 'labels' },
      cause: {
        name: 'QueryError',
        code: ErrorCode.QUERY_ERROR,
        message: 'Query failed: connection reset',
        context: { statement: 'SELECT issue_id, label FROM labels' },
        cause: undefined,
      },
    })
  })

  it('should omit empty context', () => {
    expect(new CancelledError().toJSON()).toEqual({
      name: 'CancelledError',
      code: ErrorCode.CANCELLED,
      message: 'Backup export was cancelled',
      context: undefined,
      cause: undefined,
    })
  })

  it('should recognize cancellation', () => {
    expect(isCancelledError(new CancelledError())).toBe(true)
    expect(isCancelledError(new Error('Backup export was cancelled'))).toBe(false)
  })

  it('should match system error codes', () => {
    expect(hasErrorCode(Object.assign(new Error('missing'), { code: 'ENOENT' }), 'ENOENT')).toBe(true)
    expect(hasErrorCode(new Error('missing'), 'ENOENT')).toBe(false)
    expect(hasErrorCode('ENOENT', 'ENOENT')).toBe(false)
  })

  it('should coerce thrown values to Error', () => {
    const original = new Error('kept')

    expect(toError(original)).toBe(original)
    expect(toError('text').message).toBe('text')
  })
})
