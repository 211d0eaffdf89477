/**
 * Detail Batch
 *
 * Fetches detail (and review) pages for a list of ids with bounded
 * concurrency. Each id is one unit of work that resolves to an outcome; a
 * single collector folds outcomes into the batch result as they complete.
 * A failing unit never stops the others.
 */

import type { ILogger } from '@anistat/logger'
import pLimit from 'p-limit'
import { loggers } from '../config/logger.js'
import { describeExtractError, describeFetchError, toErrorMessage } from '../errors.js'
import type { ReviewRecord } from '../scraper/types.js'
import type { BatchOutcome, CollectorDeps, ProgressCallback, UnitOutcome } from './types.js'

export interface DetailBatchOptions {
  maxWorkers: number
  reviewsPerEntity: number
  signal?: AbortSignal
  onProgress?: ProgressCallback
}

function uniqueIds(ids: readonly number[]): number[] {
  return Array.from(new Set(ids))
}

async function fetchReviews(
  deps: CollectorDeps,
  animeId: number,
  limit: number,
  signal: AbortSignal | undefined,
  log: ILogger
): Promise<ReviewRecord[]> {
  const result = await deps.fetcher.fetch(deps.adapter.reviewsUrl(animeId), undefined, { signal })
  if (!result.ok) {
    if (result.error.kind !== 'cancelled') {
      log.warn('Reviews fetch failed; keeping record without reviews', {
        animeId,
        reason: describeFetchError(result.error),
      })
    }
    return []
  }
  return deps.adapter.extractReviews(result.document, limit)
}

/**
 * One unit: detail fetch → extract → reviews fetch → extract.
 */
async function runUnit(
  deps: CollectorDeps,
  animeId: number,
  options: DetailBatchOptions,
  log: ILogger
): Promise<UnitOutcome> {
  const { signal } = options
  if (signal?.aborted) {
    return { kind: 'skipped', animeId }
  }

  const url = deps.adapter.detailUrl(animeId)
  const fetched = await deps.fetcher.fetch(url, undefined, { signal })
  if (!fetched.ok) {
    if (fetched.error.kind === 'cancelled') {
      return { kind: 'skipped', animeId }
    }
    return {
      kind: 'failure',
      failure: { animeId, stage: 'detail_fetch', reason: describeFetchError(fetched.error) },
    }
  }

  const now = deps.now ?? (() => new Date())
  const extracted = deps.adapter.extractDetail(fetched.document, {
    requestedId: animeId,
    url,
    fetchedAt: now(),
  })
  if (!extracted.ok) {
    return {
      kind: 'failure',
      failure: { animeId, stage: 'detail_extract', reason: describeExtractError(extracted.error) },
    }
  }
  if (extracted.issues.length > 0) {
    log.debug('Unparseable detail fields', { animeId, issues: extracted.issues })
  }

  const reviews =
    options.reviewsPerEntity > 0
      ? await fetchReviews(deps, animeId, options.reviewsPerEntity, signal, log)
      : []

  return { kind: 'record', record: { ...extracted.record, reviews } }
}

/**
 * Fetch every id's detail record, at most `maxWorkers` at a time.
 *
 * Duplicate ids are fetched once. After the signal aborts, units that have
 * not started resolve as skipped; units in flight finish.
 */
export async function fetchAllDetails(
  deps: CollectorDeps,
  ids: readonly number[],
  options: DetailBatchOptions
): Promise<BatchOutcome> {
  const log = deps.logger ?? loggers.details
  const unique = uniqueIds(ids)
  const outcome: BatchOutcome = { records: [], failures: [], skipped: [], cancelled: false }

  if (unique.length === 0) {
    outcome.cancelled = options.signal?.aborted ?? false
    return outcome
  }

  const limit = pLimit(Math.max(1, options.maxWorkers))
  let completed = 0

  const collect = (result: UnitOutcome): void => {
    switch (result.kind) {
      case 'record':
        outcome.records.push(result.record)
        break
      case 'failure':
        outcome.failures.push(result.failure)
        log.warn('Detail fetch failed', { ...result.failure })
        break
      case 'skipped':
        outcome.skipped.push(result.animeId)
        break
    }
    completed++
    options.onProgress?.(completed, unique.length)
  }

  await Promise.all(
    unique.map(animeId =>
      limit(async () => {
        let result: UnitOutcome
        try {
          result = await runUnit(deps, animeId, options, log)
        } catch (error) {
          result = {
            kind: 'failure',
            failure: { animeId, stage: 'unexpected', reason: toErrorMessage(error) },
          }
        }
        collect(result)
      })
    )
  )

  outcome.cancelled = options.signal?.aborted ?? false
  log.info('Detail batch finished', {
    requested: unique.length,
    records: outcome.records.length,
    failures: outcome.failures.length,
    skipped: outcome.skipped.length,
  })

  return outcome
}
