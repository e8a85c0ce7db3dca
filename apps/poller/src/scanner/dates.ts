/**
 * Calendar date helpers. All arithmetic runs in UTC so ranges never drift
 * across DST changes in the host timezone.
 */

import { ConfigurationError, ERROR_CODES } from '../errors.js'
import type { DateRange, IsoDate } from './types.js'

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/
const MS_PER_DAY = 24 * 60 * 60 * 1000

/**
 * Validate a `YYYY-MM-DD` string as a real calendar date.
 * Throws ConfigurationError for malformed or impossible dates (e.g. 2025-02-30).
 */
export function parseIsoDate(value: string): IsoDate {
  const match = ISO_DATE_PATTERN.exec(value)
  if (!match) {
    throw new ConfigurationError(ERROR_CODES.INVALID_DATE, `Invalid date "${value}", expected YYYY-MM-DD`)
  }

  const [, year, month, day] = match
  const parsed = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)))
  if (formatIsoDate(parsed) !== value) {
    throw new ConfigurationError(ERROR_CODES.INVALID_DATE, `Invalid calendar date "${value}"`)
  }

  return value
}

export function formatIsoDate(date: Date): IsoDate {
  return date.toISOString().slice(0, 10)
}

/**
 * Build a validated range. Throws ConfigurationError when end < start.
 */
export function createDateRange(start: string, end: string): DateRange {
  const range = { start: parseIsoDate(start), end: parseIsoDate(end) }
  if (range.end < range.start) {
    throw new ConfigurationError(
      ERROR_CODES.INVALID_DATE_RANGE,
      `Date range end ${range.end} is before start ${range.start}`,
      { start: range.start, end: range.end }
    )
  }
  return range
}

/**
 * Expand an inclusive range into one date per calendar day, in order.
 */
export function expandDateRange(range: DateRange): IsoDate[] {
  const { start, end } = createDateRange(range.start, range.end)
  const dates: IsoDate[] = []

  let cursor = Date.parse(`${start}T00:00:00Z`)
  const last = Date.parse(`${end}T00:00:00Z`)
  while (cursor <= last) {
    dates.push(formatIsoDate(new Date(cursor)))
    cursor += MS_PER_DAY
  }

  return dates
}

