import { describe, it, expect } from 'vitest'
import {
  buildRow,
  compareValues,
  encodeJsonl,
  mergeRowSets,
  normalizeRowSet,
  serializeRow,
} from '../../../src/engine/rows'
import { QueryError, SerializationError } from '../../../src/errors'

describe('mergeRowSets', () => {
  it('should interleave primary and shadow rows by key', () => {
    const primary = { columns: ['id', 'src'], rows: [[1, 'p'], [3, 'p'], [5, 'p']] }
    const shadow = { columns: ['id', 'src'], rows: [[2, 's'], [3, 's'], [4, 's']] }

    const merged = mergeRowSets(primary, shadow, ['id'])

    expect(merged.rows).toEqual([[1, 'p'], [2, 's'], [3, 'p'], [3, 's'], [4, 's'], [5, 'p']])
  })

  it('should append a large remainder once the other side runs out', () => {
    const primary = { columns: ['id'], rows: Array.from({ length: 500_000 }, (_, n) => [n + 10]) }
    const shadow = { columns: ['id'], rows: [[1]] }

    const merged = mergeRowSets(primary, shadow, ['id'])

    expect(merged.rows).toHaveLength(500_001)
    expect(merged.rows[0]).toEqual([1])
    expect(merged.rows[1]).toEqual([10])
    expect(merged.rows[500_000]).toEqual([500_009])
  })

  it('should append a large shadow remainder after the last primary row', () => {
    const primary = { columns: ['id'], rows: [[1]] }
    const shadow = { columns: ['id'], rows: Array.from({ length: 500_000 }, (_, n) => [n + 2]) }

    const merged = mergeRowSets(primary, shadow, ['id'])

    expect(merged.rows).toHaveLength(500_001)
    expect(merged.rows[0]).toEqual([1])
    expect(merged.rows[500_000]).toEqual([500_001])
  })

  it('should put every primary row before shadow rows with the same key', () => {
    const primary = { columns: ['k', 'n'], rows: [['a', 1], ['a', 2]] }
    const shadow = { columns: ['k', 'n'], rows: [['a', 3]] }

    expect(mergeRowSets(primary, shadow, ['k']).rows).toEqual([['a', 1], ['a', 2], ['a', 3]])
  })

  it('should compare composite keys column by column', () => {
    const primary = { columns: ['issue_id', 'label'], rows: [['is-1', 'bug'], ['is-2', 'ui']] }
    const shadow = { columns: ['issue_id', 'label'], rows: [['is-1', 'p1'], ['is-2', 'backend']] }

    expect(mergeRowSets(primary, shadow, ['issue_id', 'label']).rows).toEqual([
      ['is-1', 'bug'],
      ['is-1', 'p1'],
      ['is-2', 'backend'],
      ['is-2', 'ui'],
    ])
  })

  it('should return the primary result when there is no shadow', () => {
    const primary = { columns: ['id'], rows: [[2], [1]] }

    expect(mergeRowSets(primary, undefined, ['id'])).toBe(primary)
  })

  it('should take the shadow columns when the primary result has none', () => {
    const merged = mergeRowSets({ columns: [], rows: [] }, { columns: ['id'], rows: [[1]] }, ['id'])

    expect(merged).toEqual({ columns: ['id'], rows: [[1]] })
  })

  it('should reject results with different column counts', () => {
    const primary = { columns: ['id', 'a'], rows: [[1, 'x']] }
    const shadow = { columns: ['id'], rows: [[2]] }

    expect(() => mergeRowSets(primary, shadow, ['id'])).toThrow(QueryError)
  })

  it('should reject a key column that is not in the result', () => {
    const primary = { columns: ['id'], rows: [[1]] }
    const shadow = { columns: ['id'], rows: [[2]] }

    expect(() => mergeRowSets(primary, shadow, ['created_at'])).toThrow('Key column "created_at" not found')
  })
})

describe('compareValues', () => {
  it('should sort nulls first, then numbers, then strings', () => {
    const values = ['b', 10, null, 2, 'a']

    expect([...values].sort(compareValues)).toEqual([null, 2, 10, 'a', 'b'])
  })
})

describe('serializeRow', () => {
  it('should keep keys in column order', () => {
    expect(serializeRow(buildRow(['z', 'a', 'm'], [1, 'two', null]))).toBe('{"z":1,"a":"two","m":null}')
  })

  it('should keep the first position and last value of a repeated column', () => {
    expect(serializeRow(buildRow(['id', 'name', 'id'], [1, 'x', 2]))).toBe('{"id":2,"name":"x"}')
  })

  it('should escape strings', () => {
    expect(serializeRow(buildRow(['text'], ['line one\nline "two"']))).toBe('{"text":"line one\\nline \\"two\\""}')
  })

  it('should fill missing values with null', () => {
    expect(serializeRow(buildRow(['a', 'b'], [1]))).toBe('{"a":1,"b":null}')
  })

  it('should throw SerializationError for values JSON cannot represent', () => {
    expect(() => serializeRow(buildRow(['n'], [10n]))).toThrow(SerializationError)
    expect(() => serializeRow(buildRow(['fn'], [() => 1]))).toThrow('Cannot serialize column "fn"')
  })
})

describe('encodeJsonl', () => {
  it('should write one newline-terminated object per row', () => {
    const set = normalizeRowSet({
      columns: ['id', 'body', 'at'],
      rows: [
        [1, Buffer.from('hi'), new Date('2024-01-01T00:00:00Z')],
        [2, null, new Date('0001-01-01T00:00:00Z')],
      ],
    })

    expect(encodeJsonl(set)).toBe(
      '{"id":1,"body":"hi","at":"2024-01-01T00:00:00Z"}\n{"id":2,"body":null,"at":null}\n'
    )
  })

  it('should return an empty string for no rows', () => {
    expect(encodeJsonl({ columns: ['id'], rows: [] })).toBe('')
  })
})
