import { describe, expect, it } from 'vitest'
import { createFilterCriteria, filterByRegion } from '../filter.js'
import { aggregatedResult, locationRecord } from './fixtures.js'

const result = aggregatedResult(
  [
    { date: '2025-01-01', location: locationRecord(1, 'CA') },
    { date: '2025-01-01', location: locationRecord(2, 'NY') },
    { date: '2025-01-02', location: locationRecord(3, 'WA') },
    { date: '2025-01-03', location: locationRecord(4, 'CA') },
  ],
  { failures: [{ date: '2025-01-03', reason: 'timeout', error: 'Request timed out after 30000ms', attempts: 4 }] }
)

describe('filterByRegion', () => {
  it('keeps matching entries in their original order', () => {
    const filtered = filterByRegion(result, createFilterCriteria(['WA', 'CA']))

    expect(filtered.entries.map(entry => entry.location.id)).toEqual([1, 3, 4])
  })

  it('carries failures and date bookkeeping over unchanged', () => {
    const filtered = filterByRegion(result, createFilterCriteria(['CA']))

    expect(filtered.failures).toBe(result.failures)
    expect(filtered.succeededDates).toBe(result.succeededDates)
    expect(filtered.range).toEqual(result.range)
  })

  it('does not mutate the input', () => {
    filterByRegion(result, createFilterCriteria(['CA']))

    expect(result.entries).toHaveLength(4)
  })

  it('is idempotent', () => {
    const criteria = createFilterCriteria(['CA', 'NY'])
    const once = filterByRegion(result, criteria)

    expect(filterByRegion(once, criteria)).toEqual(once)
  })

  it('matches region codes case-sensitively', () => {
    const filtered = filterByRegion(result, createFilterCriteria(['ca']))

    expect(filtered.entries).toEqual([])
  })

  it('returns no entries for an empty accepted set', () => {
    const filtered = filterByRegion(result, createFilterCriteria([]))

    expect(filtered.entries).toEqual([])
    expect(filtered.failures).toHaveLength(1)
  })
})
