/**
 * Upstream response parsing.
 *
 * The slots endpoint answers with a JSON array of location objects. A body that
 * is not JSON, or not an array, is malformed and the attempt is retried. Array
 * entries that do not match the location shape are skipped individually.
 */

import { z } from 'zod'
import type { LocationRecord } from '../types.js'

export const upstreamLocationSchema = z.object({
  id: z.number().int().nonnegative(),
  name: z.string(),
  state: z.string(),
  city: z.string(),
  address: z.string(),
  addressAdditional: z.string().nullish(),
  postalCode: z.string(),
  phoneNumber: z.string().nullish(),
})

export type UpstreamLocation = z.infer<typeof upstreamLocationSchema>

export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'MalformedResponseError'
  }
}

export interface ParsedLocations {
  records: LocationRecord[]
  skipped: Array<{ index: number; issues: string[] }>
}

/**
 * Parse a response body into location records.
 * Throws MalformedResponseError when the body is not a JSON array.
 */
export function parseLocations(body: string): ParsedLocations {
  let data: unknown
  try {
    data = JSON.parse(body)
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error)
    throw new MalformedResponseError(`Response is not valid JSON: ${detail}`)
  }

  if (!Array.isArray(data)) {
    throw new MalformedResponseError(`Expected a JSON array, got ${describe(data)}`)
  }

  const records: LocationRecord[] = []
  const skipped: ParsedLocations['skipped'] = []

  data.forEach((entry: unknown, index) => {
    const result = upstreamLocationSchema.safeParse(entry)
    if (!result.success) {
      skipped.push({
        index,
        issues: result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      })
      return
    }
    records.push(toLocationRecord(result.data, JSON.stringify(entry)))
  })

  return { records, skipped }
}

export function toLocationRecord(location: UpstreamLocation, raw: string): LocationRecord {
  return {
    id: location.id,
    name: location.name,
    regionCode: location.state,
    city: location.city,
    address: location.address,
    ...(location.addressAdditional ? { addressAdditional: location.addressAdditional } : {}),
    postalCode: location.postalCode,
    ...(location.phoneNumber ? { phoneNumber: location.phoneNumber } : {}),
    raw,
  }
}

function describe(value: unknown): string {
  if (value === null) return 'null'
  return typeof value === 'object' ? 'object' : typeof value
}
