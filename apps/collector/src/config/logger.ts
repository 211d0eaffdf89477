/**
 * Collector Logger Configuration
 *
 * Pre-configured loggers for collector components
 */

import { createLogger } from '@anistat/logger'

// Root logger for the collector service
export const logger = createLogger('collector')

// Pre-configured child loggers per pipeline area
export const loggers = {
  fetch: logger.child('fetch'),
  listing: logger.child('listing'),
  details: logger.child('details'),
  pipeline: logger.child('pipeline'),
  export: logger.child('export'),
  cli: logger.child('cli'),
}
