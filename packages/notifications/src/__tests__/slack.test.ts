import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  sendSlackMessage,
  slackFieldsSection,
  slackHeader,
  SLACK_CONFIG,
} from '../channels/slack.js';

describe('sendSlackMessage', () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('posts to chat.postMessage with a bearer token and the channel id', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(
      new Response(JSON.stringify({ ok: true, ts: '1700000000.000100' }), { status: 200 })
    );
    globalThis.fetch = fetchSpy;

    const result = await sendSlackMessage(
      { text: 'hello' },
      { kind: 'api', token: 'test-token', channel: 'C123' }
    );

    expect(result).toEqual({ success: true, statusCode: 200, ts: '1700000000.000100' });
    expect(fetchSpy).toHaveBeenCalledTimes(1);

    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe(`${SLACK_CONFIG.apiBaseUrl}/chat.postMessage`);
    expect(init.method).toBe('POST');
    expect(init.headers.Authorization).toBe('Bearer test-token');
    expect(JSON.parse(init.body)).toEqual({ channel: 'C123', text: 'hello' });
  });

  it('reports the Slack error code when the API answers ok: false', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(
      new Response(JSON.stringify({ ok: false, error: 'channel_not_found' }), { status: 200 })
    );

    const result = await sendSlackMessage(
      { text: 'hello' },
      { kind: 'api', token: 'test-token', channel: 'C404' }
    );

    expect(result).toEqual({ success: false, statusCode: 200, error: 'channel_not_found' });
  });

  it('reports non-2xx responses from the API', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(
      new Response('busy', { status: 503, statusText: 'Service Unavailable' })
    );

    const result = await sendSlackMessage(
      { text: 'hello' },
      { kind: 'api', token: 'test-token', channel: 'C123' }
    );

    expect(result).toEqual({
      success: false,
      statusCode: 503,
      error: 'HTTP 503: Service Unavailable',
    });
  });

  it('posts the message body as-is to a webhook URL', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(new Response('ok', { status: 200 }));
    globalThis.fetch = fetchSpy;

    const result = await sendSlackMessage(
      { text: 'hello', blocks: [slackHeader('Title')] },
      { kind: 'webhook', webhookUrl: 'https://hooks.example.test/services/T/B/X' }
    );

    expect(result).toEqual({ success: true, statusCode: 200 });
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://hooks.example.test/services/T/B/X');
    expect(JSON.parse(init.body)).toEqual({
      text: 'hello',
      blocks: [{ type: 'header', text: { type: 'plain_text', text: 'Title', emoji: true } }],
    });
  });

  it('surfaces the webhook error body', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(
      new Response('invalid_payload\n', { status: 400, statusText: 'Bad Request' })
    );

    const result = await sendSlackMessage(
      { text: 'hello' },
      { kind: 'webhook', webhookUrl: 'https://hooks.example.test/services/T/B/X' }
    );

    expect(result).toEqual({ success: false, statusCode: 400, error: 'invalid_payload' });
  });

  it('converts thrown network errors into a failed result', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new TypeError('fetch failed'));

    const result = await sendSlackMessage(
      { text: 'hello' },
      { kind: 'api', token: 'test-token', channel: 'C123' }
    );

    expect(result).toEqual({ success: false, error: 'fetch failed' });
  });
});

describe('block builders', () => {
  it('truncates header text to the Slack limit', () => {
    const block = slackHeader('x'.repeat(200));
    expect(block.type).toBe('header');
    if (block.type === 'header') {
      expect(block.text.text).toHaveLength(150);
      expect(block.text.text.endsWith('…')).toBe(true);
    }
  });

  it('renders label/value pairs as mrkdwn fields', () => {
    expect(slackFieldsSection({ Cycle: '3', Failed: '0' })).toEqual({
      type: 'section',
      fields: [
        { type: 'mrkdwn', text: '*Cycle:*\n3' },
        { type: 'mrkdwn', text: '*Failed:*\n0' },
      ],
    });
  });
});
