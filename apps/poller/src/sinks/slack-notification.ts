/**
 * Slack Notification Sink
 *
 * Posts a bounded summary of a cycle's result: the first N locations with
 * their key fields, a count of the rest, and any dates that failed.
 */

import {
  sendSlackMessage,
  slackContext,
  slackDivider,
  slackHeader,
  slackText,
  type SlackBlock,
  type SlackDestination,
  type SlackMessage,
} from '@slotwatch/notifications'
import type { ILogger } from '@slotwatch/logger'
import { loggers } from '../config/logger.js'
import { ERROR_CODES, SinkError } from '../errors.js'
import type { AggregatedResult, DatedLocation } from '../scanner/types.js'
import type { Sink } from './types.js'

export const DEFAULT_MAX_LOCATIONS = 5
const TITLE = 'Appointment Availability'
const EMPTY_TEXT = 'No appointments found.'

/** Slack errors that no later cycle can recover from without operator action */
const FATAL_SLACK_ERRORS = new Set([
  'invalid_auth',
  'not_authed',
  'account_inactive',
  'token_revoked',
  'token_expired',
  'channel_not_found',
  'not_in_channel',
  'is_archived',
  'no_service',
])

export interface SlackNotificationSinkOptions {
  destination: SlackDestination
  maxLocations?: number
  logger?: ILogger
}

function formatEntry(entry: DatedLocation, position: number): string {
  const { date, location } = entry
  const extra = location.addressAdditional ?? ''
  const phone = location.phoneNumber ?? 'N/A'
  return (
    `${position}. (Date: ${date}) *${location.name}* (ID: ${location.id}) in ${location.city}, ${location.regionCode}\n` +
    `Address: ${location.address} ${extra}\n` +
    `Zip: ${location.postalCode}\n` +
    `Phone: ${phone}`
  )
}

function formatFailedDates(result: AggregatedResult): string | null {
  if (result.failures.length === 0) {
    return null
  }
  return `Failed dates: ${result.failures.map(failure => failure.date).join(', ')}`
}

/**
 * Plain-text summary, also used as the message fallback text.
 */
export function buildSummaryText(result: AggregatedResult, maxLocations = DEFAULT_MAX_LOCATIONS): string {
  const failedLine = formatFailedDates(result)

  if (result.entries.length === 0) {
    return failedLine ? `${EMPTY_TEXT}\n${failedLine}\n` : EMPTY_TEXT
  }

  let text = `*${TITLE}*\n\n`
  result.entries.slice(0, maxLocations).forEach((entry, index) => {
    text += `${formatEntry(entry, index + 1)}\n\n`
  })

  if (result.entries.length > maxLocations) {
    text += `...and ${result.entries.length - maxLocations} more.\n`
  }
  if (failedLine) {
    text += `${failedLine}\n`
  }

  return text
}

export function buildSummaryMessage(result: AggregatedResult, maxLocations = DEFAULT_MAX_LOCATIONS): SlackMessage {
  const blocks: SlackBlock[] = [slackHeader(TITLE)]

  if (result.entries.length === 0) {
    blocks.push(slackText(EMPTY_TEXT))
  } else {
    result.entries.slice(0, maxLocations).forEach((entry, index) => {
      blocks.push(slackText(formatEntry(entry, index + 1)))
    })
    if (result.entries.length > maxLocations) {
      blocks.push(slackText(`...and ${result.entries.length - maxLocations} more.`))
    }
  }

  blocks.push(slackDivider())
  blocks.push(
    slackContext(
      [`Searched ${result.range.start} → ${result.range.end}`, formatFailedDates(result)]
        .filter((part): part is string => part !== null)
        .join(' • ')
    )
  )

  return { text: buildSummaryText(result, maxLocations), blocks }
}

export class SlackNotificationSink implements Sink {
  readonly name = 'slack'
  private readonly destination: SlackDestination
  private readonly maxLocations: number
  private readonly log: ILogger

  constructor(options: SlackNotificationSinkOptions) {
    this.destination = options.destination
    this.maxLocations = options.maxLocations ?? DEFAULT_MAX_LOCATIONS
    this.log = options.logger ?? loggers.sink.child('slack')
  }

  async deliver(result: AggregatedResult): Promise<void> {
    const message = buildSummaryMessage(result, this.maxLocations)
    const sent = await sendSlackMessage(message, this.destination)

    if (!sent.success) {
      const reason = sent.error ?? 'unknown_error'
      const authFailure = FATAL_SLACK_ERRORS.has(reason) || sent.statusCode === 401 || sent.statusCode === 403
      throw new SinkError(
        this.name,
        authFailure ? ERROR_CODES.SINK_AUTH_FAILED : ERROR_CODES.SINK_DELIVERY_FAILED,
        `Slack post failed: ${reason}`,
        { fatal: authFailure, details: { statusCode: sent.statusCode, slackError: reason } }
      )
    }

    this.log.info('Posted summary to Slack', {
      locations: result.entries.length,
      shown: Math.min(result.entries.length, this.maxLocations),
      ts: sent.ts,
    })
  }
}
