/**
 * Slack Channel - Web API and Incoming Webhooks
 *
 * Posts messages either through `chat.postMessage` (bot token + channel id)
 * or through an incoming webhook URL.
 */

// =============================================================================
// Configuration
// =============================================================================

export const SLACK_CONFIG = {
  apiBaseUrl: process.env.SLACK_API_URL || 'https://slack.com/api',
  timeoutMs: 15_000,
};

/** Slack rejects header text above 150 characters and section text above 3000. */
const HEADER_MAX_CHARS = 150;
const SECTION_MAX_CHARS = 3000;
const MAX_FIELDS = 10;

// =============================================================================
// Types
// =============================================================================

export interface SlackResult {
  success: boolean;
  statusCode?: number;
  ts?: string;
  error?: string;
}

export interface SlackTextObject {
  type: 'mrkdwn' | 'plain_text';
  text: string;
  emoji?: boolean;
}

export type SlackBlock =
  | { type: 'header'; text: SlackTextObject }
  | { type: 'section'; text?: SlackTextObject; fields?: SlackTextObject[] }
  | { type: 'divider' }
  | { type: 'context'; elements: SlackTextObject[] };

export interface SlackMessage {
  /** Fallback text, shown in notifications and by clients that cannot render blocks */
  text: string;
  blocks?: SlackBlock[];
}

export type SlackDestination =
  | { kind: 'api'; token: string; channel: string }
  | { kind: 'webhook'; webhookUrl: string };

// =============================================================================
// Block Builders
// =============================================================================

export function slackHeader(text: string): SlackBlock {
  return {
    type: 'header',
    text: { type: 'plain_text', text: truncate(text, HEADER_MAX_CHARS), emoji: true },
  };
}

export function slackText(text: string): SlackBlock {
  return {
    type: 'section',
    text: { type: 'mrkdwn', text: truncate(text, SECTION_MAX_CHARS) },
  };
}

export function slackDivider(): SlackBlock {
  return { type: 'divider' };
}

export function slackContext(text: string): SlackBlock {
  return {
    type: 'context',
    elements: [{ type: 'mrkdwn', text: truncate(text, SECTION_MAX_CHARS) }],
  };
}

export function slackFieldsSection(fields: Record<string, string>): SlackBlock {
  return {
    type: 'section',
    fields: Object.entries(fields)
      .slice(0, MAX_FIELDS)
      .map(([label, value]): SlackTextObject => ({ type: 'mrkdwn', text: `*${label}:*\n${value}` })),
  };
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

// =============================================================================
// Core Slack Function
// =============================================================================

export async function sendSlackMessage(
  message: SlackMessage,
  destination: SlackDestination
): Promise<SlackResult> {
  try {
    return destination.kind === 'api'
      ? await postViaApi(message, destination.token, destination.channel)
      : await postViaWebhook(message, destination.webhookUrl);
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'Unknown error';
    return { success: false, error: reason };
  }
}

async function postViaApi(message: SlackMessage, token: string, channel: string): Promise<SlackResult> {
  const response = await fetch(`${SLACK_CONFIG.apiBaseUrl}/chat.postMessage`, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json; charset=utf-8',
      Authorization: `Bearer ${token}`,
    },
    body: JSON.stringify({ channel, ...message }),
    signal: AbortSignal.timeout(SLACK_CONFIG.timeoutMs),
  });

  if (!response.ok) {
    return {
      success: false,
      statusCode: response.status,
      error: `HTTP ${response.status}: ${response.statusText}`,
    };
  }

  const body: unknown = await response.json();
  if (!isApiResponse(body)) {
    return { success: false, statusCode: response.status, error: 'invalid_response' };
  }

  if (!body.ok) {
    return { success: false, statusCode: response.status, error: body.error ?? 'unknown_error' };
  }

  return { success: true, statusCode: response.status, ts: body.ts };
}

async function postViaWebhook(message: SlackMessage, webhookUrl: string): Promise<SlackResult> {
  const response = await fetch(webhookUrl, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(message),
    signal: AbortSignal.timeout(SLACK_CONFIG.timeoutMs),
  });

  if (!response.ok) {
    const detail = (await response.text()).trim();
    return {
      success: false,
      statusCode: response.status,
      error: detail || `HTTP ${response.status}: ${response.statusText}`,
    };
  }

  return { success: true, statusCode: response.status };
}

interface ApiResponse {
  ok: boolean;
  error?: string;
  ts?: string;
}

function isApiResponse(value: unknown): value is ApiResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'ok' in value &&
    typeof value.ok === 'boolean' &&
    (!('error' in value) || typeof value.error === 'string') &&
    (!('ts' in value) || typeof value.ts === 'string')
  );
}
