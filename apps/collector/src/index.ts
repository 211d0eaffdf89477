/**
 * @anistat/collector
 *
 * Ranked-catalog collection pipeline: paced fetching, field extraction,
 * parallel detail batches, dimensional transform and file export.
 */

export * from './scraper/types.js'
export { JitterRateLimiter, rateLimiterFromSeconds } from './scraper/fetch/rate-limiter.js'
export type { JitterRateLimiterConfig } from './scraper/fetch/rate-limiter.js'
export { HttpFetcher, fetchTransport, DEFAULT_TIMEOUT_MS } from './scraper/fetch/http-fetcher.js'
export type { HttpFetcherOptions } from './scraper/fetch/http-fetcher.js'
export { loadDocument } from './scraper/html/cheerio-document.js'
export * from './scraper/parse/dates.js'
export * from './scraper/parse/numbers.js'
export * from './scraper/parse/text.js'
export * from './scraper/adapters/myanimelist/index.js'

export * from './pipeline/types.js'
export { fetchListing, selectDetailIds } from './pipeline/listing.js'
export type { ListingOptions, ListingOutcome } from './pipeline/listing.js'
export { fetchAllDetails } from './pipeline/batch.js'
export type { DetailBatchOptions } from './pipeline/batch.js'
export { transform, toFact } from './pipeline/transform.js'
export { runPipeline, summarizeReport } from './pipeline/coordinator.js'
export type { PipelineDeps, PipelineSettings, RunOptions } from './pipeline/coordinator.js'

export { FileSink, OUTPUT_FILES, toCsv } from './export/file-sink.js'
export type { FileSinkOptions } from './export/file-sink.js'

export {
  collectorConfigSchema,
  configFromEnv,
  mergeConfigInputs,
  resolveConfig,
  DEFAULT_BASE_URL,
  DEFAULT_IDENTITY_POOL,
} from './config/settings.js'
export type { CollectorConfig, CollectorConfigInput } from './config/settings.js'
export { ConfigurationError, describeExtractError, describeFetchError, toErrorMessage } from './errors.js'
export type { ConfigurationIssue } from './errors.js'
