/**
 * Pipeline Coordinator
 *
 * Runs one collection end to end:
 * 1. listing   - ranking pages until listingLimit rows
 * 2. selection - first detailsLimit distinct ids
 * 3. details   - detail and review pages, in parallel
 * 4. transform - dimensional tables
 * 5. persist   - hand everything to the sink
 *
 * A fetching stage that yields nothing ends the run early with a warning;
 * whatever was collected up to that point is still persisted. Persist
 * failures are reported on the run, not thrown.
 */

import type { ILogger } from '@anistat/logger'
import { loggers } from '../config/logger.js'
import type { CollectorConfig } from '../config/settings.js'
import { toErrorMessage } from '../errors.js'
import type { DetailRecord, ListingRecord } from '../scraper/types.js'
import { fetchAllDetails } from './batch.js'
import { fetchListing, selectDetailIds } from './listing.js'
import { transform } from './transform.js'
import type {
  CollectorDeps,
  DetailFailure,
  DimensionalTables,
  PipelineReport,
  PipelineSink,
  PipelineStageExhausted,
  ProgressCallback,
  StageName,
  StageReport,
  StageStatus,
} from './types.js'

export interface PipelineDeps extends CollectorDeps {
  sink: PipelineSink
}

export type PipelineSettings = Pick<
  CollectorConfig,
  'listingLimit' | 'detailsLimit' | 'maxWorkers' | 'reviewsPerEntity'
>

export interface RunOptions {
  signal?: AbortSignal
  onDetailProgress?: ProgressCallback
}

export async function runPipeline(
  deps: PipelineDeps,
  settings: PipelineSettings,
  options: RunOptions = {}
): Promise<PipelineReport> {
  const { signal } = options
  const log = deps.logger ?? loggers.pipeline
  const stageDeps: CollectorDeps = { fetcher: deps.fetcher, adapter: deps.adapter, now: deps.now }

  const stages: StageReport[] = []
  const warnings: PipelineStageExhausted[] = []
  let listing: ListingRecord[] = []
  let details: DetailRecord[] = []
  let failures: DetailFailure[] = []
  let cancelled = false
  let ended = false

  const record = (
    stage: StageName,
    status: StageStatus,
    startedAt: number,
    counts: { produced: number; failed?: number },
    message?: string
  ): void => {
    const report: StageReport = {
      stage,
      status,
      produced: counts.produced,
      failed: counts.failed ?? 0,
      durationMs: Date.now() - startedAt,
    }
    if (message !== undefined) report.message = message
    stages.push(report)
    log.info('Stage finished', { ...report })
  }

  const exhaust = (stage: StageName, startedAt: number, message: string, failed = 0): void => {
    warnings.push({ stage, message })
    log.warn('Stage exhausted; ending run early', { stage, message })
    record(stage, 'exhausted', startedAt, { produced: 0, failed }, message)
    ended = true
  }

  const skip = (stage: StageName, message: string): void => {
    record(stage, 'skipped', Date.now(), { produced: 0 }, message)
  }

  log.info('Pipeline started', { ...settings })

  // 1. listing
  let startedAt = Date.now()
  const listed = await fetchListing(
    { ...stageDeps, logger: deps.logger?.child('listing') },
    settings.listingLimit,
    { signal }
  )
  listing = listed.records
  cancelled = listed.cancelled
  if (listing.length === 0) {
    exhaust(
      'listing',
      startedAt,
      cancelled ? 'Cancelled before any listing rows were collected' : 'No listing rows collected',
      listed.pagesFailed
    )
  } else {
    const partial = listed.pagesFailed > 0 || listing.length < settings.listingLimit
    record('listing', partial ? 'partial' : 'succeeded', startedAt, {
      produced: listing.length,
      failed: listed.pagesFailed,
    })
  }

  // 2. selection
  let ids: number[] = []
  if (ended) {
    skip('selection', 'Earlier stage exhausted')
  } else {
    startedAt = Date.now()
    ids = selectDetailIds(listing, settings.detailsLimit)
    if (ids.length === 0) {
      exhaust('selection', startedAt, 'No ids selected for detail fetching')
    } else {
      record('selection', 'succeeded', startedAt, { produced: ids.length })
    }
  }

  // 3. details
  if (ended) {
    skip('details', 'Earlier stage exhausted')
  } else if (cancelled || signal?.aborted) {
    cancelled = true
    skip('details', 'Run cancelled')
  } else {
    startedAt = Date.now()
    const batch = await fetchAllDetails(
      { ...stageDeps, logger: deps.logger?.child('details') },
      ids,
      {
        maxWorkers: settings.maxWorkers,
        reviewsPerEntity: settings.reviewsPerEntity,
        signal,
        onProgress: options.onDetailProgress,
      }
    )
    details = batch.records
    failures = batch.failures
    cancelled = cancelled || batch.cancelled

    const failed = batch.failures.length
    if (details.length === 0) {
      exhaust('details', startedAt, 'No detail records collected', failed)
    } else {
      const partial = failed > 0 || batch.skipped.length > 0
      record('details', partial ? 'partial' : 'succeeded', startedAt, { produced: details.length, failed })
    }
  }

  // 4. transform
  let tables: DimensionalTables = { facts: [], genreEdges: [], studioEdges: [], reviewEdges: [] }
  if (ended) {
    skip('transform', 'Earlier stage exhausted')
  } else {
    startedAt = Date.now()
    tables = transform(details)
    record('transform', 'succeeded', startedAt, { produced: tables.facts.length })
  }

  // 5. persist - always, with whatever was produced
  startedAt = Date.now()
  let writtenFiles: string[] = []
  try {
    writtenFiles = await deps.sink.write({ listing, details, tables })
    record('persist', 'succeeded', startedAt, { produced: writtenFiles.length })
  } catch (error) {
    const message = toErrorMessage(error)
    log.error('Persist failed', { message }, error)
    record('persist', 'failed', startedAt, { produced: 0, failed: 1 }, message)
  }

  log.info('Pipeline finished', {
    cancelled,
    warnings: warnings.length,
    listing: listing.length,
    details: details.length,
    facts: tables.facts.length,
  })

  return { stages, warnings, failures, cancelled, writtenFiles, listing, details, tables }
}

/**
 * Compact per-stage lines for the CLI summary.
 */
export function summarizeReport(report: PipelineReport, logger: ILogger): void {
  for (const stage of report.stages) {
    const meta = { status: stage.status, produced: stage.produced, failed: stage.failed, durationMs: stage.durationMs }
    logger.info(`Stage ${stage.stage}`, stage.message ? { ...meta, message: stage.message } : meta)
  }
  for (const warning of report.warnings) {
    logger.warn('Stage exhausted', { stage: warning.stage, message: warning.message })
  }
  if (report.cancelled) {
    logger.warn('Run was cancelled; results are partial')
  }
}
