import type { AggregatedResult, DatedLocation, LocationRecord } from '../types.js'

export interface UpstreamFixture {
  id: number
  name: string
  state: string
  city: string
  address: string
  addressAdditional?: string | null
  postalCode: string
  phoneNumber?: string | null
}

export function upstreamLocation(id: number, state: string, overrides: Partial<UpstreamFixture> = {}): UpstreamFixture {
  return {
    id,
    name: `Enrollment Center ${id}`,
    state,
    city: `City ${id}`,
    address: `${id} Main St`,
    postalCode: '90001',
    ...overrides,
  }
}

export function locationRecord(id: number, regionCode: string, overrides: Partial<LocationRecord> = {}): LocationRecord {
  return {
    id,
    name: `Enrollment Center ${id}`,
    regionCode,
    city: `City ${id}`,
    address: `${id} Main St`,
    postalCode: '90001',
    raw: JSON.stringify({ id }),
    ...overrides,
  }
}

export function aggregatedResult(entries: DatedLocation[], overrides: Partial<AggregatedResult> = {}): AggregatedResult {
  return {
    range: { start: '2025-01-01', end: '2025-01-03' },
    entries,
    failures: [],
    skippedDates: [],
    succeededDates: [...new Set(entries.map(entry => entry.date))],
    cancelled: false,
    ...overrides,
  }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}
