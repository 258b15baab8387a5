import { describe, it, expect } from 'vitest'
import { parsePrepTime } from '@application/extraction/parsePrepTime.ts'

describe('parsePrepTime', () => {
  it('parses minutes', () => {
    expect(parsePrepTime('45 minutes')).toBe(45)
    expect(parsePrepTime('20 mins')).toBe(20)
    expect(parsePrepTime('30m')).toBe(30)
  })

  it('parses hours, including fractions', () => {
    expect(parsePrepTime('2 hours')).toBe(120)
    expect(parsePrepTime('1.5 hours')).toBe(90)
  })

  it('adds hours and minutes together', () => {
    expect(parsePrepTime('1 hr 15 min')).toBe(75)
    expect(parsePrepTime('1 hour 30 minutes')).toBe(90)
  })

  it('treats a bare number as minutes', () => {
    expect(parsePrepTime('25')).toBe(25)
  })

  it('returns null when there is nothing to read', () => {
    expect(parsePrepTime('')).toBeNull()
    expect(parsePrepTime('a while')).toBeNull()
    expect(parsePrepTime('0 min')).toBeNull()
  })
})
