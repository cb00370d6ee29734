import { describe, it, expect } from 'vitest'
import { normalizeValue, formatTimestamp, isZeroDate } from '../../../src/engine/normalize'

describe('normalizeValue', () => {
  it('should decode byte sequences as text', () => {
    expect(normalizeValue(Buffer.from('hello wörld', 'utf-8'))).toBe('hello wörld')
    expect(normalizeValue(new Uint8Array([0x6f, 0x6b]))).toBe('ok')
  })

  it('should render dates as RFC 3339 UTC at second precision', () => {
    const date = new Date('2024-03-01T12:30:45Z')

    const normalized = normalizeValue(date)

    expect(normalized).toBe('2024-03-01T12:30:45Z')
    expect(Date.parse('2024-03-01T12:30:45Z')).toBe(date.getTime())
  })

  it('should drop milliseconds', () => {
    expect(normalizeValue(new Date('2024-03-01T12:30:45.987Z'))).toBe('2024-03-01T12:30:45Z')
  })

  it('should normalize zero and invalid dates to null', () => {
    expect(normalizeValue(new Date('0001-01-01T00:00:00Z'))).toBeNull()
    expect(normalizeValue(new Date('not a date'))).toBeNull()
  })

  it('should normalize null and undefined to null', () => {
    expect(normalizeValue(null)).toBeNull()
    expect(normalizeValue(undefined)).toBeNull()
  })

  it('should convert bigint to a number when safe and to a string otherwise', () => {
    expect(normalizeValue(42n)).toBe(42)
    expect(normalizeValue(2n ** 64n)).toBe('18446744073709551616')
  })

  it('should pass other values through unchanged', () => {
    const obj = { nested: true }
    expect(normalizeValue(7)).toBe(7)
    expect(normalizeValue(1.5)).toBe(1.5)
    expect(normalizeValue('text')).toBe('text')
    expect(normalizeValue(false)).toBe(false)
    expect(normalizeValue(obj)).toBe(obj)
  })
})

describe('formatTimestamp', () => {
  it('should format the epoch', () => {
    expect(formatTimestamp(new Date(0))).toBe('1970-01-01T00:00:00Z')
  })
})

describe('isZeroDate', () => {
  it('should only flag the zero instant and invalid dates', () => {
    expect(isZeroDate(new Date('0001-01-01T00:00:00Z'))).toBe(true)
    expect(isZeroDate(new Date(Number.NaN))).toBe(true)
    expect(isZeroDate(new Date(0))).toBe(false)
  })
})
