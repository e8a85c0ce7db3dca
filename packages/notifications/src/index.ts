/**
 * @slotwatch/notifications
 *
 * Outbound notification channels for slotwatch.
 *
 * Usage:
 * ```typescript
 * import { sendSlackMessage, slackHeader, slackText } from '@slotwatch/notifications';
 *
 * await sendSlackMessage(
 *   { text: 'New slots', blocks: [slackHeader('New slots'), slackText('*3* locations')] },
 *   { kind: 'api', token: process.env.SLACK_TOKEN ?? '', channel: 'C0123' }
 * );
 * ```
 *
 * Environment Variables:
 * - SLACK_API_URL: Slack Web API base URL (default: https://slack.com/api)
 */

export {
  sendSlackMessage,
  slackHeader,
  slackText,
  slackDivider,
  slackContext,
  slackFieldsSection,
  SLACK_CONFIG,
  type SlackResult,
  type SlackMessage,
  type SlackBlock,
  type SlackTextObject,
  type SlackDestination,
} from './channels/slack.js';
