import type { AggregatedResult, FilterCriteria } from './types.js'

export function createFilterCriteria(regions: Iterable<string>): FilterCriteria {
  return { regions: new Set(regions) }
}

/**
 * Keep only entries whose region code is in the accepted set (exact,
 * case-sensitive). Does not mutate `result`; failures and date bookkeeping are
 * carried over unchanged.
 */
export function filterByRegion(result: AggregatedResult, criteria: FilterCriteria): AggregatedResult {
  return {
    ...result,
    entries: result.entries.filter(entry => criteria.regions.has(entry.location.regionCode)),
  }
}
