/**
 * Listing Stage
 *
 * Walks ranking pages in order until enough rows are collected. Pages are
 * fetched one at a time; a failed page is logged and skipped.
 */

import { loggers } from '../config/logger.js'
import { describeExtractError, describeFetchError } from '../errors.js'
import type { ListingRecord } from '../scraper/types.js'
import type { CollectorDeps } from './types.js'

export interface ListingOptions {
  signal?: AbortSignal
}

export interface ListingOutcome {
  records: ListingRecord[]
  pagesFetched: number
  pagesFailed: number
  cancelled: boolean
}

export async function fetchListing(
  deps: CollectorDeps,
  limit: number,
  options: ListingOptions = {}
): Promise<ListingOutcome> {
  const { fetcher, adapter } = deps
  const { signal } = options
  const log = deps.logger ?? loggers.listing

  const outcome: ListingOutcome = { records: [], pagesFetched: 0, pagesFailed: 0, cancelled: false }
  if (limit <= 0) return outcome

  const pageCount = Math.ceil(limit / adapter.listingPageSize)

  for (let page = 1; page <= pageCount; page++) {
    if (signal?.aborted) {
      outcome.cancelled = true
      break
    }

    const request = adapter.listingPage(page)
    const result = await fetcher.fetch(request.url, request.query, { signal })

    if (!result.ok) {
      if (result.error.kind === 'cancelled') {
        outcome.cancelled = true
        break
      }
      outcome.pagesFailed++
      log.warn('Listing page failed', { page, url: result.url, reason: describeFetchError(result.error) })
      continue
    }

    outcome.pagesFetched++
    const extracted = adapter.extractListingPage(result.document)

    if (extracted.dropped.length > 0) {
      log.debug('Dropped listing rows', {
        page,
        count: extracted.dropped.length,
        reasons: extracted.dropped.map(describeExtractError),
      })
    }
    if (extracted.issues.length > 0) {
      log.debug('Unparseable listing fields', { page, issues: extracted.issues })
    }

    const remaining = limit - outcome.records.length
    outcome.records.push(...extracted.records.slice(0, remaining))
    log.info('Listing page collected', { page, rows: extracted.records.length, total: outcome.records.length })

    if (outcome.records.length >= limit) break
  }

  return outcome
}

/**
 * First `limit` distinct ids, in listing order.
 */
export function selectDetailIds(records: readonly ListingRecord[], limit: number): number[] {
  const ids: number[] = []
  const seen = new Set<number>()
  for (const record of records) {
    if (ids.length >= limit) break
    if (seen.has(record.id)) continue
    seen.add(record.id)
    ids.push(record.id)
  }
  return ids
}
