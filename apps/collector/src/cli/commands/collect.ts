import type { ILogger } from '@anistat/logger'
import { loggers } from '../../config/logger.js'
import { configFromEnv, mergeConfigInputs, resolveConfig } from '../../config/settings.js'
import type { CollectorConfig } from '../../config/settings.js'
import { ConfigurationError } from '../../errors.js'
import { FileSink } from '../../export/file-sink.js'
import { runPipeline, summarizeReport } from '../../pipeline/coordinator.js'
import type { PipelineSink } from '../../pipeline/types.js'
import { createMyAnimeListAdapter } from '../../scraper/adapters/myanimelist/index.js'
import { HttpFetcher } from '../../scraper/fetch/http-fetcher.js'
import { rateLimiterFromSeconds } from '../../scraper/fetch/rate-limiter.js'
import type { DocumentFetcher } from '../../scraper/types.js'
import { flagsToConfigInput } from '../parse-flags.js'
import type { Flags } from '../parse-flags.js'

export const EXIT_OK = 0
export const EXIT_FAULT = 1
export const EXIT_USAGE = 2

export interface CollectCommandOptions {
  env?: NodeJS.ProcessEnv
  signal?: AbortSignal
  logger?: ILogger
  /** Overrides for the network and persistence boundaries */
  createFetcher?: (config: CollectorConfig) => DocumentFetcher
  createSink?: (config: CollectorConfig) => PipelineSink
}

function defaultFetcher(config: CollectorConfig): DocumentFetcher {
  return new HttpFetcher({
    baseUrl: config.baseUrl,
    identityPool: config.identityPool,
    rateLimiter: rateLimiterFromSeconds(config.rateLimitDelayRange),
    timeoutMs: config.requestTimeoutMs,
  })
}

function defaultSink(config: CollectorConfig): PipelineSink {
  return new FileSink({ outputDir: config.outputDir })
}

/**
 * Resolve config from env and flags, then run one collection.
 * Any run that completes (partial or exhausted included) exits 0.
 */
export async function runCollectCommand(flags: Flags, options: CollectCommandOptions = {}): Promise<number> {
  const log = options.logger ?? loggers.cli

  let config: CollectorConfig
  try {
    const fromFlags = flagsToConfigInput(flags)
    if (fromFlags.issues.length > 0) {
      throw new ConfigurationError(fromFlags.issues)
    }
    config = resolveConfig(mergeConfigInputs(configFromEnv(options.env ?? process.env), fromFlags.input))
  } catch (error) {
    if (error instanceof ConfigurationError) {
      log.error('Invalid configuration', { issues: error.issues })
      return EXIT_USAGE
    }
    throw error
  }

  log.info('Starting collection', {
    baseUrl: config.baseUrl,
    listingLimit: config.listingLimit,
    detailsLimit: config.detailsLimit,
    maxWorkers: config.maxWorkers,
    reviewsPerEntity: config.reviewsPerEntity,
    outputDir: config.outputDir,
  })

  const report = await runPipeline(
    {
      fetcher: (options.createFetcher ?? defaultFetcher)(config),
      adapter: createMyAnimeListAdapter({ baseUrl: config.baseUrl }),
      sink: (options.createSink ?? defaultSink)(config),
      logger: options.logger?.child('pipeline'),
    },
    config,
    {
      signal: options.signal,
      onDetailProgress: (completed, total) => {
        if (completed === total || completed % 10 === 0) {
          log.info('Detail progress', { completed, total })
        }
      },
    }
  )

  summarizeReport(report, log)
  return EXIT_OK
}
