import { describe, it, expect } from 'vitest'
import { createMemoryLogger } from '@anistat/logger'
import { myanimelistAdapter } from '../../scraper/adapters/myanimelist/index.js'
import type { CatalogAdapter } from '../../scraper/types.js'
import { fetchAllDetails } from '../batch.js'
import {
  detailPageHtml,
  detailUrl,
  FakeFetcher,
  reviewsPageHtml,
  reviewsUrl,
} from './helpers.js'

function detailPages(ids: readonly number[]): Record<string, string> {
  const pages: Record<string, string> = {}
  for (const id of ids) {
    pages[detailUrl(id)] = detailPageHtml(id)
  }
  return pages
}

const now = () => new Date('2026-01-29T00:00:00Z')

describe('fetchAllDetails', () => {
  it('keeps going when one entity fails and warns exactly once for it', async () => {
    const ids = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10]
    const fetcher = new FakeFetcher({
      ...detailPages(ids),
      [detailUrl(7)]: { kind: 'http_status', statusCode: 503, statusText: 'Service Unavailable' },
    })
    const { logger, entries } = createMemoryLogger('test')

    const outcome = await fetchAllDetails(
      { fetcher, adapter: myanimelistAdapter, logger, now },
      ids,
      { maxWorkers: 3, reviewsPerEntity: 0 }
    )

    expect(outcome.records).toHaveLength(9)
    expect(outcome.records.map(r => r.id).sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 8, 9, 10])
    expect(outcome.failures).toEqual([
      { animeId: 7, stage: 'detail_fetch', reason: 'HTTP 503: Service Unavailable' },
    ])
    expect(outcome.skipped).toEqual([])
    expect(outcome.cancelled).toBe(false)

    const warnings = entries.filter(entry => entry.level === 'warn')
    expect(warnings).toHaveLength(1)
    expect(warnings[0]).toMatchObject({
      message: 'Detail fetch failed',
      animeId: 7,
      stage: 'detail_fetch',
      reason: 'HTTP 503: Service Unavailable',
    })
  })

  it('stamps each record with the requested id, url and fetch time', async () => {
    const fetcher = new FakeFetcher(detailPages([5]))
    const { logger } = createMemoryLogger('test')

    const outcome = await fetchAllDetails(
      { fetcher, adapter: myanimelistAdapter, logger, now },
      [5],
      { maxWorkers: 1, reviewsPerEntity: 0 }
    )

    expect(outcome.records[0]).toMatchObject({
      id: 5,
      title: 'Title 5',
      url: 'https://myanimelist.net/anime/5',
      genres: ['Drama'],
      studios: ['Studio 5'],
      fetchedAt: '2026-01-29T00:00:00.000Z',
    })
  })

  it('fetches each distinct id once', async () => {
    const fetcher = new FakeFetcher(detailPages([1, 2]))
    const { logger } = createMemoryLogger('test')

    const outcome = await fetchAllDetails(
      { fetcher, adapter: myanimelistAdapter, logger, now },
      [1, 2, 1, 2, 1],
      { maxWorkers: 2, reviewsPerEntity: 0 }
    )

    expect(outcome.records).toHaveLength(2)
    expect(fetcher.calls.sort()).toEqual([detailUrl(1), detailUrl(2)])
  })

  it('never runs more than maxWorkers units at once', async () => {
    const ids = [1, 2, 3, 4, 5, 6]
    const fetcher = new FakeFetcher(detailPages(ids), 5)
    const { logger } = createMemoryLogger('test')

    const outcome = await fetchAllDetails(
      { fetcher, adapter: myanimelistAdapter, logger, now },
      ids,
      { maxWorkers: 2, reviewsPerEntity: 0 }
    )

    expect(outcome.records).toHaveLength(6)
    expect(fetcher.maxActive).toBeLessThanOrEqual(2)
  })

  it('reports progress once per unit', async () => {
    const fetcher = new FakeFetcher(detailPages([1, 2, 3]))
    const { logger } = createMemoryLogger('test')
    const progress: string[] = []

    await fetchAllDetails({ fetcher, adapter: myanimelistAdapter, logger, now }, [1, 2, 3], {
      maxWorkers: 2,
      reviewsPerEntity: 0,
      onProgress: (completed, total) => progress.push(`${completed}/${total}`),
    })

    expect(progress).toEqual(['1/3', '2/3', '3/3'])
  })

  it('attaches up to reviewsPerEntity reviews', async () => {
    const fetcher = new FakeFetcher({
      ...detailPages([1]),
      [reviewsUrl(1)]: reviewsPageHtml(['alpha', 'beta', 'gamma']),
    })
    const { logger } = createMemoryLogger('test')

    const outcome = await fetchAllDetails(
      { fetcher, adapter: myanimelistAdapter, logger, now },
      [1],
      { maxWorkers: 1, reviewsPerEntity: 2 }
    )

    expect(outcome.records[0]?.reviews).toEqual([
      { reviewer: 'alpha', date: '2024-02-01', score: 8, content: 'Review by alpha', helpfulCount: 2 },
      { reviewer: 'beta', date: '2024-02-01', score: 8, content: 'Review by beta', helpfulCount: 2 },
    ])
  })

  it('keeps the record without reviews when the reviews page fails', async () => {
    const fetcher = new FakeFetcher(detailPages([1]))
    const { logger, entries } = createMemoryLogger('test')

    const outcome = await fetchAllDetails(
      { fetcher, adapter: myanimelistAdapter, logger, now },
      [1],
      { maxWorkers: 1, reviewsPerEntity: 5 }
    )

    expect(outcome.records).toHaveLength(1)
    expect(outcome.records[0]?.reviews).toEqual([])
    expect(outcome.failures).toEqual([])
    const warnings = entries.filter(entry => entry.level === 'warn')
    expect(warnings).toHaveLength(1)
    expect(warnings[0]).toMatchObject({
      message: 'Reviews fetch failed; keeping record without reviews',
      animeId: 1,
      reason: 'HTTP 404',
    })
  })

  it('turns a thrown fault into an unexpected failure', async () => {
    const adapter: CatalogAdapter = {
      ...myanimelistAdapter,
      extractDetail: (doc, ctx) => {
        if (ctx.requestedId === 3) throw new Error('selector engine exploded')
        return myanimelistAdapter.extractDetail(doc, ctx)
      },
    }
    const fetcher = new FakeFetcher(detailPages([2, 3, 4]))
    const { logger } = createMemoryLogger('test')

    const outcome = await fetchAllDetails({ fetcher, adapter, logger, now }, [2, 3, 4], {
      maxWorkers: 2,
      reviewsPerEntity: 0,
    })

    expect(outcome.records.map(r => r.id).sort((a, b) => a - b)).toEqual([2, 4])
    expect(outcome.failures).toEqual([
      { animeId: 3, stage: 'unexpected', reason: 'selector engine exploded' },
    ])
  })

  it('skips units that have not started once the signal aborts', async () => {
    const fetcher = new FakeFetcher(detailPages([1, 2, 3]))
    const { logger } = createMemoryLogger('test')
    const controller = new AbortController()

    const outcome = await fetchAllDetails(
      { fetcher, adapter: myanimelistAdapter, logger, now },
      [1, 2, 3],
      {
        maxWorkers: 1,
        reviewsPerEntity: 0,
        signal: controller.signal,
        onProgress: completed => {
          if (completed === 1) controller.abort()
        },
      }
    )

    expect(outcome.records.map(r => r.id)).toEqual([1])
    expect(outcome.skipped).toEqual([2, 3])
    expect(outcome.failures).toEqual([])
    expect(outcome.cancelled).toBe(true)
    expect(fetcher.calls).toEqual([detailUrl(1)])
  })

  it('returns an empty outcome for no ids', async () => {
    const fetcher = new FakeFetcher({})
    const outcome = await fetchAllDetails({ fetcher, adapter: myanimelistAdapter, now }, [], {
      maxWorkers: 5,
      reviewsPerEntity: 5,
    })
    expect(outcome).toEqual({ records: [], failures: [], skipped: [], cancelled: false })
    expect(fetcher.calls).toEqual([])
  })
})
