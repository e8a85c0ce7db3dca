#!/usr/bin/env node

/**
 * Poller Worker
 * Polls appointment availability once, or on a fixed interval until stopped.
 *
 * Exit codes: 0 on completion or shutdown, 1 on a configuration or fatal error.
 */

// Load environment variables first, before any other imports
import 'dotenv/config'

import { loggers } from './config/logger.js'
import { loadSettings, resolveConfigPath } from './config/settings.js'
import { classifyError } from './errors.js'
import { createPoller } from './poller.js'

const log = loggers.worker
const controller = new AbortController()

// A second signal while stopping forces exit
const shutdown = (signal: string) => {
  if (controller.signal.aborted) {
    log.warn('Second signal received, exiting immediately', { signal })
    process.exit(1)
  }
  log.info('Shutdown signal received, finishing in-flight work', { signal })
  controller.abort()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))

async function main(): Promise<number> {
  const configPath = resolveConfigPath()
  log.info('Loading settings', { path: configPath })

  try {
    const settings = await loadSettings(configPath)
    const summary = await createPoller(settings).run(controller.signal)
    log.info('Poller stopped', { ...summary })
    return 0
  } catch (error) {
    const classified = classifyError(error)
    log.fatal(
      classified.category === 'configuration' ? 'Invalid configuration' : 'Poller stopped on fatal error',
      { code: classified.code, category: classified.category, details: classified.details },
      error
    )
    return 1
  }
}

main()
  .then(code => process.exit(code))
  .catch(error => {
    log.fatal('Unhandled error in worker', {}, error)
    process.exit(1)
  })
