/**
 * Harvester Logger Configuration
 *
 * Pre-configured loggers for harvester components
 */

import { createLogger } from '@boardwatch/logger'

export const logger = createLogger('harvester')

export const loggers = {
  store: logger.child('store'),
  queue: logger.child('queue'),
  metrics: logger.child('metrics'),
  escalation: logger.child('escalation'),
  orchestrator: logger.child('orchestrator'),
  evaluation: logger.child('evaluation'),
  fetch: logger.child('fetch'),
  redis: logger.child('redis'),
}
