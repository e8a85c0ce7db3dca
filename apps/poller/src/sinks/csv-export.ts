/**
 * CSV Export Sink
 *
 * Overwrites one file per cycle with a header row and one row per location.
 */

import { writeFile } from 'node:fs/promises'
import { stringify } from 'csv-stringify/sync'
import type { ILogger } from '@slotwatch/logger'
import { loggers } from '../config/logger.js'
import { ERROR_CODES, errorMessage, SinkError } from '../errors.js'
import type { AggregatedResult, DatedLocation } from '../scanner/types.js'
import type { Sink } from './types.js'

export const CSV_COLUMNS = [
  'Date',
  'ID',
  'Name',
  'State',
  'City',
  'Address',
  'PostalCode',
  'Phone',
  'RawJSON',
] as const

const MISSING_PHONE = 'N/A'

/** File-system errors that will not clear up on the next cycle */
const FATAL_FS_CODES = new Set(['EACCES', 'EPERM', 'EROFS', 'ENOENT', 'EISDIR'])

export function toCsvRow(entry: DatedLocation): string[] {
  const { date, location } = entry
  return [
    date,
    String(location.id),
    location.name,
    location.regionCode,
    location.city,
    location.address,
    location.postalCode,
    location.phoneNumber ?? MISSING_PHONE,
    location.raw,
  ]
}

export function renderCsv(result: AggregatedResult): string {
  return stringify([[...CSV_COLUMNS], ...result.entries.map(toCsvRow)])
}

export class CsvExportSink implements Sink {
  readonly name = 'csv'
  private readonly path: string
  private readonly log: ILogger

  constructor(path: string, log: ILogger = loggers.sink.child('csv')) {
    this.path = path
    this.log = log
  }

  async deliver(result: AggregatedResult): Promise<void> {
    try {
      await writeFile(this.path, renderCsv(result), 'utf8')
    } catch (error) {
      const code = fsErrorCode(error)
      throw new SinkError(this.name, ERROR_CODES.SINK_WRITE_FAILED, `Failed to write ${this.path}: ${errorMessage(error)}`, {
        fatal: code !== undefined && FATAL_FS_CODES.has(code),
        details: { path: this.path, errorCode: code },
        cause: error,
      })
    }

    this.log.info('Exported locations', { path: this.path, rows: result.entries.length })
  }
}

function fsErrorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined
}
