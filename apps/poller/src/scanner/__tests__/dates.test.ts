import { describe, expect, it } from 'vitest'
import { ConfigurationError } from '../../errors.js'
import { createDateRange, expandDateRange, parseIsoDate } from '../dates.js'

describe('parseIsoDate', () => {
  it('accepts a real calendar date', () => {
    expect(parseIsoDate('2024-02-29')).toBe('2024-02-29')
  })

  it.each(['2025-02-29', '2025-13-01', '2025-1-01', '01/02/2025', ''])('rejects %j', value => {
    expect(() => parseIsoDate(value)).toThrow(ConfigurationError)
  })
})

describe('createDateRange', () => {
  it('accepts a single-day range', () => {
    expect(createDateRange('2025-01-01', '2025-01-01')).toEqual({ start: '2025-01-01', end: '2025-01-01' })
  })

  it('rejects an end before the start', () => {
    try {
      createDateRange('2025-01-02', '2025-01-01')
      expect.unreachable('expected a ConfigurationError')
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError)
      if (!(error instanceof ConfigurationError)) return
      expect(error.code).toBe('INVALID_DATE_RANGE')
      expect(error.fatal).toBe(true)
    }
  })
})

describe('expandDateRange', () => {
  it('yields one date per day, inclusive of both ends', () => {
    expect(expandDateRange({ start: '2024-12-30', end: '2025-01-02' })).toEqual([
      '2024-12-30',
      '2024-12-31',
      '2025-01-01',
      '2025-01-02',
    ])
  })

  it('crosses a leap day', () => {
    expect(expandDateRange({ start: '2024-02-28', end: '2024-03-01' })).toEqual(['2024-02-28', '2024-02-29', '2024-03-01'])
  })

  it('crosses a daylight saving change without drifting', () => {
    const dates = expandDateRange({ start: '2025-03-08', end: '2025-03-11' })

    expect(dates).toEqual(['2025-03-08', '2025-03-09', '2025-03-10', '2025-03-11'])
  })
})
