/**
 * Run Settings
 *
 * Loads the JSON run configuration, applies environment overrides and
 * validates the result. Every failure surfaces as a ConfigurationError before
 * any fetch begins.
 */

import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import { z } from 'zod'
import { REDACTED, type LogContext } from '@slotwatch/logger'
import { ConfigurationError, ERROR_CODES, errorMessage, formatZodIssues } from '../errors.js'
import { createDateRange } from '../scanner/dates.js'
import type { DateRange, RetryPolicy } from '../scanner/types.js'

export const DEFAULT_CONFIG_PATH = 'slotwatch.json'
export const DEFAULT_API_URL = 'https://ttp.cbp.dhs.gov/schedulerapi/slots/asLocations'
export const DEFAULT_SERVICE_NAME = 'Global Entry'

const MAX_BACKOFF_MS = 30_000
const MAX_REQUEST_TIMEOUT_SECONDS = 600
const REGION_CODE_PATTERN = /^[A-Za-z]{2}$/

const settingsFileSchema = z
  .object({
    date_range: z.object({
      start: z.string(),
      end: z.string(),
    }),
    search_states: z.array(z.string().regex(REGION_CODE_PATTERN, 'Expected a 2-letter region code')),
    api_rate_limit_seconds: z.number().min(0).default(1),
    max_concurrent_fetches: z.number().int().min(1).default(4),
    max_retries: z.number().int().min(0).default(3),
    retry_backoff_seconds: z.number().min(0).default(1),
    request_timeout_seconds: z.number().positive().max(MAX_REQUEST_TIMEOUT_SECONDS).default(30),
    fetch_interval_minutes: z.number().min(0).default(0),
    enable_slack: z.boolean().default(false),
    slack_token: z.string().default(''),
    slack_channel_id: z.string().default(''),
    slack_webhook_url: z.string().url().optional(),
    slack_max_locations: z.number().int().min(1).default(5),
    csv_path: z.string().min(1).default('appointments.csv'),
    sink_failures_fatal: z.boolean().default(false),
    api_url: z.string().url().default(DEFAULT_API_URL),
    service_name: z.string().min(1).default(DEFAULT_SERVICE_NAME),
    api_token: z.string().min(1).optional(),
  })
  .superRefine((value, ctx) => {
    if (!value.enable_slack || value.slack_webhook_url) {
      return
    }
    if (!value.slack_token) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['slack_token'],
        message: 'Required when enable_slack is true and no slack_webhook_url is set',
      })
    }
    if (!value.slack_channel_id) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['slack_channel_id'],
        message: 'Required when enable_slack is true and no slack_webhook_url is set',
      })
    }
  })

export type SettingsFile = z.infer<typeof settingsFileSchema>

export interface PollerSettings {
  dateRange: DateRange
  regions: string[]
  rateLimitSeconds: number
  maxConcurrency: number
  retryPolicy: RetryPolicy
  requestTimeoutMs: number
  intervalMinutes: number
  sinkFailuresFatal: boolean
  csvPath: string
  slack: {
    enabled: boolean
    token: string
    channelId: string
    webhookUrl?: string
    maxLocations: number
  }
  api: {
    url: string
    serviceName: string
    token?: string
  }
}

type Env = Record<string, string | undefined>

/** Environment variable → settings file key */
const ENV_OVERRIDES = {
  SLACK_TOKEN: 'slack_token',
  SLACK_CHANNEL_ID: 'slack_channel_id',
  SLACK_WEBHOOK_URL: 'slack_webhook_url',
  SLOTWATCH_API_URL: 'api_url',
  SLOTWATCH_API_TOKEN: 'api_token',
} as const

export function resolveConfigPath(env: Env = process.env): string {
  return resolve(env.SLOTWATCH_CONFIG || DEFAULT_CONFIG_PATH)
}

/**
 * Read, override and validate the settings file at `path`.
 */
export async function loadSettings(path: string = resolveConfigPath(), env: Env = process.env): Promise<PollerSettings> {
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error) {
    throw new ConfigurationError(ERROR_CODES.CONFIG_NOT_FOUND, `Cannot read config file ${path}: ${errorMessage(error)}`, {
      path,
    })
  }

  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (error) {
    throw new ConfigurationError(ERROR_CODES.CONFIG_INVALID_JSON, `Config file ${path} is not valid JSON: ${errorMessage(error)}`, {
      path,
    })
  }

  return parseSettings(raw, env)
}

/**
 * Validate an already-decoded settings object. Environment overrides win over
 * file values.
 */
export function parseSettings(raw: unknown, env: Env = {}): PollerSettings {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigurationError(ERROR_CODES.CONFIG_VALIDATION_FAILED, 'Config must be a JSON object')
  }

  const parsed = settingsFileSchema.safeParse(applyEnvOverrides({ ...raw }, env))
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error)
    throw new ConfigurationError(
      ERROR_CODES.CONFIG_VALIDATION_FAILED,
      `Invalid config: ${issues.map(issue => `${issue.path || '(root)'}: ${issue.message}`).join('; ')}`,
      { issues }
    )
  }

  return toSettings(parsed.data)
}

function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  for (const [variable, key] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable]
    if (value) {
      raw[key] = value
    }
  }

  const interval = env.SLOTWATCH_INTERVAL_MINUTES
  if (interval !== undefined && interval.trim() !== '') {
    const minutes = Number(interval)
    if (!Number.isFinite(minutes)) {
      throw new ConfigurationError(
        ERROR_CODES.CONFIG_VALIDATION_FAILED,
        `SLOTWATCH_INTERVAL_MINUTES must be a number, got "${interval}"`
      )
    }
    raw.fetch_interval_minutes = minutes
  }

  return raw
}

function toSettings(file: SettingsFile): PollerSettings {
  return {
    dateRange: createDateRange(file.date_range.start, file.date_range.end),
    regions: file.search_states,
    rateLimitSeconds: file.api_rate_limit_seconds,
    maxConcurrency: file.max_concurrent_fetches,
    retryPolicy: {
      maxRetries: file.max_retries,
      initialDelayMs: Math.round(file.retry_backoff_seconds * 1000),
      backoffMultiplier: 2,
      maxDelayMs: MAX_BACKOFF_MS,
    },
    requestTimeoutMs: Math.round(file.request_timeout_seconds * 1000),
    intervalMinutes: file.fetch_interval_minutes,
    sinkFailuresFatal: file.sink_failures_fatal,
    csvPath: file.csv_path,
    slack: {
      enabled: file.enable_slack,
      token: file.slack_token,
      channelId: file.slack_channel_id,
      ...(file.slack_webhook_url ? { webhookUrl: file.slack_webhook_url } : {}),
      maxLocations: file.slack_max_locations,
    },
    api: {
      url: file.api_url,
      serviceName: file.service_name,
      ...(file.api_token ? { token: file.api_token } : {}),
    },
  }
}

/**
 * Flat view of the settings for the startup log line. Credentials are masked
 * here as well as by the logger, since the webhook URL carries its secret in
 * the path.
 */
export function describeSettings(settings: PollerSettings): LogContext {
  return {
    start: settings.dateRange.start,
    end: settings.dateRange.end,
    regions: settings.regions.join(','),
    rateLimitSeconds: settings.rateLimitSeconds,
    maxConcurrency: settings.maxConcurrency,
    maxRetries: settings.retryPolicy.maxRetries,
    requestTimeoutMs: settings.requestTimeoutMs,
    intervalMinutes: settings.intervalMinutes,
    sink: settings.slack.enabled ? 'slack' : 'csv',
    csvPath: settings.csvPath,
    slackChannelId: settings.slack.channelId || undefined,
    slackToken: settings.slack.token ? REDACTED : undefined,
    slackWebhookUrl: settings.slack.webhookUrl ? REDACTED : undefined,
    apiUrl: settings.api.url,
    apiToken: settings.api.token ? REDACTED : undefined,
    sinkFailuresFatal: settings.sinkFailuresFatal,
  }
}
