import { describe, expect, it } from 'vitest'
import { parseCsv, readCell, toNumber } from './csv'

describe('toNumber', () => {
  it('parses trimmed numbers', () => {
    expect(toNumber(' 12.5 ')).toBe(12.5)
    expect(toNumber('-3')).toBe(-3)
  })

  it('returns null for blanks and text', () => {
    expect(toNumber('')).toBeNull()
    expect(toNumber('   ')).toBeNull()
    expect(toNumber('12abc')).toBeNull()
  })
})

describe('readCell', () => {
  it('trims values and treats missing columns as empty', () => {
    const [first] = parseCsv('a,b\n  x ,y')
    expect(readCell(first, 'a')).toBe('x')
    expect(readCell(first, 'missing')).toBe('')
  })
})
