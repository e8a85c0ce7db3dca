import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import {
  classifyError,
  ConfigurationError,
  ERROR_CODES,
  findNetworkCode,
  PollerError,
  SinkError,
} from '../errors.js'

describe('classifyError', () => {
  it('keeps the classification of a PollerError', () => {
    const error = new SinkError('slack', ERROR_CODES.SINK_AUTH_FAILED, 'Slack post failed: token_revoked', {
      fatal: true,
    })

    expect(classifyError(error)).toMatchObject({
      category: 'sink',
      code: 'SINK_AUTH_FAILED',
      fatal: true,
      details: { sink: 'slack' },
    })
  })

  it('treats configuration errors as fatal', () => {
    const classified = classifyError(new ConfigurationError(ERROR_CODES.INVALID_DATE, 'Invalid date "x"'))

    expect(classified.category).toBe('configuration')
    expect(classified.fatal).toBe(true)
  })

  it('maps a ZodError to a validation failure', () => {
    const parsed = z.object({ start: z.string() }).safeParse({ start: 1 })
    if (parsed.success) throw new Error('expected a parse failure')

    const classified = classifyError(parsed.error)

    expect(classified.code).toBe('CONFIG_VALIDATION_FAILED')
    expect(classified.details).toEqual({ issues: [{ path: 'start', message: 'Expected string, received number' }] })
  })

  it('maps AbortError to cancelled', () => {
    const classified = classifyError(new DOMException('This operation was aborted', 'AbortError'))

    expect(classified.category).toBe('cancelled')
    expect(classified.fatal).toBe(false)
  })

  it('maps TimeoutError to a timeout', () => {
    const classified = classifyError(new DOMException('The operation was aborted due to timeout', 'TimeoutError'))

    expect(classified).toMatchObject({ category: 'timeout', code: 'OPERATION_TIMEOUT', fatal: false })
  })

  it('finds a network code in the cause chain', () => {
    const error = new TypeError('fetch failed', {
      cause: Object.assign(new Error('getaddrinfo ENOTFOUND slack.com'), { code: 'ENOTFOUND' }),
    })

    expect(classifyError(error)).toMatchObject({
      category: 'external',
      code: 'NETWORK_ERROR',
      message: 'Network error: ENOTFOUND',
      details: { errorCode: 'ENOTFOUND' },
    })
  })

  it('treats anything else as an internal, non-fatal error', () => {
    expect(classifyError(new Error('boom'))).toMatchObject({ category: 'internal', code: 'UNEXPECTED_ERROR', fatal: false })
    expect(classifyError('boom')).toMatchObject({ category: 'internal', message: 'boom' })
  })
})

describe('findNetworkCode', () => {
  it('ignores codes that are not network failures', () => {
    expect(findNetworkCode(Object.assign(new Error('denied'), { code: 'EACCES' }))).toBeNull()
  })
})

describe('PollerError', () => {
  it('serializes without the stack', () => {
    const error = new PollerError('fetch', ERROR_CODES.NETWORK_ERROR, 'down', { details: { date: '2025-01-01' } })

    expect(error.toJSON()).toEqual({
      name: 'PollerError',
      category: 'fetch',
      code: 'NETWORK_ERROR',
      message: 'down',
      fatal: false,
      details: { date: '2025-01-01' },
    })
  })
})
