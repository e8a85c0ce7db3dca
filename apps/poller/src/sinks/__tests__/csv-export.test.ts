import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { SinkError } from '../../errors.js'
import { aggregatedResult, locationRecord } from '../../scanner/__tests__/fixtures.js'
import { CsvExportSink, renderCsv } from '../csv-export.js'

const HEADER = 'Date,ID,Name,State,City,Address,PostalCode,Phone,RawJSON'

describe('renderCsv', () => {
  it('writes a header and one row per location', () => {
    const csv = renderCsv(
      aggregatedResult([
        {
          date: '2025-01-02',
          location: locationRecord(5, 'WA', {
            name: 'Blaine',
            city: 'Blaine',
            address: '100 Peace Portal Dr',
            postalCode: '98230',
            raw: '{"id":5}',
          }),
        },
        {
          date: '2025-01-03',
          location: locationRecord(6, 'CA', {
            name: 'San Diego, Otay Mesa',
            city: 'San Diego',
            address: '9777 Via de la Amistad',
            postalCode: '92154',
            phoneNumber: '555-0100',
            raw: '{"id":6}',
          }),
        },
      ])
    )

    expect(csv.split('\n')).toEqual([
      HEADER,
      '2025-01-02,5,Blaine,WA,Blaine,100 Peace Portal Dr,98230,N/A,"{""id"":5}"',
      '2025-01-03,6,"San Diego, Otay Mesa",CA,San Diego,9777 Via de la Amistad,92154,555-0100,"{""id"":6}"',
      '',
    ])
  })

  it('writes only the header for an empty result', () => {
    expect(renderCsv(aggregatedResult([]))).toBe(`${HEADER}\n`)
  })
})

describe('CsvExportSink', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'slotwatch-csv-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('overwrites the file on each delivery', async () => {
    const path = join(dir, 'appointments.csv')
    const sink = new CsvExportSink(path)

    await sink.deliver(aggregatedResult([{ date: '2025-01-01', location: locationRecord(1, 'CA') }]))
    await sink.deliver(aggregatedResult([]))

    expect(await readFile(path, 'utf8')).toBe(`${HEADER}\n`)
  })

  it('raises a fatal SinkError when the directory does not exist', async () => {
    const sink = new CsvExportSink(join(dir, 'missing', 'appointments.csv'))

    const error = await sink.deliver(aggregatedResult([])).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(SinkError)
    if (!(error instanceof SinkError)) return
    expect(error.code).toBe('SINK_WRITE_FAILED')
    expect(error.fatal).toBe(true)
    expect(error.details?.errorCode).toBe('ENOENT')
  })
})
