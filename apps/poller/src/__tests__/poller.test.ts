import { afterEach, describe, expect, it, vi } from 'vitest'
import { parseSettings } from '../config/settings.js'
import { createPoller } from '../poller.js'
import { jsonResponse, upstreamLocation } from '../scanner/__tests__/fixtures.js'
import type { AggregatedResult } from '../scanner/types.js'
import { CsvExportSink } from '../sinks/csv-export.js'
import { SlackNotificationSink } from '../sinks/slack-notification.js'

const settings = parseSettings({
  date_range: { start: '2025-01-01', end: '2025-01-02' },
  search_states: ['CA'],
  api_rate_limit_seconds: 0,
  max_retries: 0,
  api_url: 'https://slots.example.test/api',
  api_token: 'test-secret',
})

describe('createPoller', () => {
  const originalFetch = globalThis.fetch

  afterEach(() => {
    if (originalFetch) {
      globalThis.fetch = originalFetch
    }
  })

  it('selects the sink from the settings', () => {
    expect(createPoller(settings).sink).toBeInstanceOf(CsvExportSink)
    expect(
      createPoller({ ...settings, slack: { ...settings.slack, enabled: true, token: 'test-token', channelId: 'C0TEST' } })
        .sink
    ).toBeInstanceOf(SlackNotificationSink)
  })

  it('runs one cycle end to end', async () => {
    const fetchSpy = vi.fn().mockImplementation((url: string) => {
      const date = new URL(url).searchParams.get('timestamp')
      return Promise.resolve(
        jsonResponse(date === '2025-01-01' ? [upstreamLocation(1, 'CA'), upstreamLocation(2, 'NV')] : [])
      )
    })
    globalThis.fetch = fetchSpy
    const delivered: AggregatedResult[] = []
    const sink = {
      name: 'memory',
      deliver: async (result: AggregatedResult) => {
        delivered.push(result)
      },
    }

    const summary = await createPoller(settings, sink).run()

    expect(summary).toEqual({ cycles: 1, delivered: 1, sinkFailures: 0, cancelled: false })
    expect(delivered[0].entries.map(entry => entry.location.id)).toEqual([1])
    expect(delivered[0].succeededDates).toEqual(['2025-01-01', '2025-01-02'])
    expect(fetchSpy).toHaveBeenCalledTimes(2)
    expect(fetchSpy.mock.calls[0][1].headers.Authorization).toBe('Bearer test-secret')
  })
})
