/**
 * Full-snapshot exporter tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { writeFile } from 'node:fs/promises'
import { exportTable } from '../../../src/engine/table-exporter'
import { CancelledError, QueryError } from '../../../src/errors'
import { createTestContext, parseJsonl, StaticStore, type TestContext } from '../../helpers'

const ISSUES_QUERY = 'SELECT * FROM issues ORDER BY id'
const WISPS_QUERY = 'SELECT * FROM wisps ORDER BY id'

describe('exportTable', () => {
  let ctx: TestContext

  beforeEach(async () => {
    ctx = await createTestContext()
  })

  afterEach(async () => {
    await ctx.cleanup()
  })

  it('should write one object per row using the discovered columns', async () => {
    const store = new StaticStore({
      [ISSUES_QUERY]: {
        columns: ['id', 'title', 'description', 'closed_at', 'pinned'],
        rows: [
          ['is-1', 'Crash on start', Buffer.from('stack trace'), new Date('2024-02-03T04:05:06Z'), true],
          ['is-2', 'Typo', null, new Date('0001-01-01T00:00:00Z'), false],
        ],
      },
    })

    const count = await exportTable(
      store,
      { name: 'issues', primary: ISSUES_QUERY, orderBy: ['id'] },
      ctx.path('issues.jsonl')
    )

    expect(count).toBe(2)
    expect(await ctx.read('issues.jsonl')).toBe(
      '{"id":"is-1","title":"Crash on start","description":"stack trace","closed_at":"2024-02-03T04:05:06Z","pinned":true}\n' +
        '{"id":"is-2","title":"Typo","description":null,"closed_at":null,"pinned":false}\n'
    )
  })

  it('should write an empty file for a query with no rows', async () => {
    const store = new StaticStore({ [ISSUES_QUERY]: { columns: ['id'], rows: [] } })

    const count = await exportTable(
      store,
      { name: 'issues', primary: ISSUES_QUERY, orderBy: ['id'] },
      ctx.path('issues.jsonl')
    )

    expect(count).toBe(0)
    expect(await ctx.read('issues.jsonl')).toBe('')
  })

  it('should merge shadow rows by key', async () => {
    const store = new StaticStore({
      [ISSUES_QUERY]: { columns: ['id', 'src'], rows: [[1, 'primary'], [3, 'primary'], [5, 'primary']] },
      [WISPS_QUERY]: { columns: ['id', 'src'], rows: [[2, 'shadow'], [3, 'shadow'], [4, 'shadow']] },
    })

    const count = await exportTable(
      store,
      { name: 'issues', primary: ISSUES_QUERY, shadow: WISPS_QUERY, orderBy: ['id'] },
      ctx.path('issues.jsonl')
    )

    expect(count).toBe(6)
    expect(parseJsonl(await ctx.read('issues.jsonl'))).toEqual([
      { id: 1, src: 'primary' },
      { id: 2, src: 'shadow' },
      { id: 3, src: 'primary' },
      { id: 3, src: 'shadow' },
      { id: 4, src: 'shadow' },
      { id: 5, src: 'primary' },
    ])
  })

  it('should leave the previous file untouched when the query fails', async () => {
    await writeFile(ctx.path('issues.jsonl'), '{"id":"old"}\n')
    const store = new StaticStore({})

    const error = await exportTable(
      store,
      { name: 'issues', primary: ISSUES_QUERY, orderBy: ['id'] },
      ctx.path('issues.jsonl')
    ).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(QueryError)
    expect(error).toMatchObject({ message: `Query failed: no such table for statement: ${ISSUES_QUERY}` })
    expect(await ctx.read('issues.jsonl')).toBe('{"id":"old"}\n')
  })

  it('should not write anything when a row cannot be serialized', async () => {
    await writeFile(ctx.path('issues.jsonl'), '{"id":"old"}\n')
    const store = new StaticStore({
      [ISSUES_QUERY]: { columns: ['id', 'hook'], rows: [['is-1', Symbol('opaque')]] },
    })

    await expect(
      exportTable(store, { name: 'issues', primary: ISSUES_QUERY, orderBy: ['id'] }, ctx.path('issues.jsonl'))
    ).rejects.toThrow('Cannot serialize column "hook"')
    expect(await ctx.read('issues.jsonl')).toBe('{"id":"old"}\n')
  })

  it('should stop before querying when the signal is aborted', async () => {
    const controller = new AbortController()
    controller.abort()
    const store = new StaticStore({ [ISSUES_QUERY]: { columns: ['id'], rows: [['is-1']] } })

    await expect(
      exportTable(
        store,
        { name: 'issues', primary: ISSUES_QUERY, orderBy: ['id'] },
        ctx.path('issues.jsonl'),
        { signal: controller.signal }
      )
    ).rejects.toThrow(CancelledError)
    expect(await ctx.list()).toEqual([])
  })
})
