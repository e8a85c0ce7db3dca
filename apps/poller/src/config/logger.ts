import { createLogger } from '@slotwatch/logger'

export const logger = createLogger('poller')

export const loggers = {
  worker: logger.child('worker'),
  config: logger.child('config'),
  fetch: logger.child('fetch'),
  orchestrator: logger.child('orchestrator'),
  cycle: logger.child('cycle'),
  sink: logger.child('sink'),
}
