import type { SlackDestination } from '@slotwatch/notifications'
import type { PollerSettings } from '../config/settings.js'
import { CsvExportSink } from './csv-export.js'
import { SlackNotificationSink } from './slack-notification.js'
import type { Sink } from './types.js'

export type { Sink } from './types.js'
export { CsvExportSink } from './csv-export.js'
export { SlackNotificationSink } from './slack-notification.js'

/**
 * Pick the sink for the resolved settings: Slack when enabled, CSV otherwise.
 */
export function createSink(settings: PollerSettings): Sink {
  if (!settings.slack.enabled) {
    return new CsvExportSink(settings.csvPath)
  }

  const destination: SlackDestination = settings.slack.webhookUrl
    ? { kind: 'webhook', webhookUrl: settings.slack.webhookUrl }
    : { kind: 'api', token: settings.slack.token, channel: settings.slack.channelId }

  return new SlackNotificationSink({ destination, maxLocations: settings.slack.maxLocations })
}
