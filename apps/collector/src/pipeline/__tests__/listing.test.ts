import { describe, it, expect } from 'vitest'
import { createMemoryLogger } from '@anistat/logger'
import { myanimelistAdapter } from '../../scraper/adapters/myanimelist/index.js'
import { fetchListing, selectDetailIds } from '../listing.js'
import { FakeFetcher, listingPageHtml, listingUrl } from './helpers.js'

function range(from: number, count: number): number[] {
  return Array.from({ length: count }, (_, i) => from + i)
}

describe('fetchListing', () => {
  it('stops mid-page once the limit is reached', async () => {
    const fetcher = new FakeFetcher({
      [listingUrl(1)]: listingPageHtml(range(1, 50)),
      [listingUrl(2)]: listingPageHtml(range(51, 50), 51),
    })
    const { logger } = createMemoryLogger('test')

    const outcome = await fetchListing({ fetcher, adapter: myanimelistAdapter, logger }, 55)

    expect(outcome.records).toHaveLength(55)
    expect(outcome.records[54]).toMatchObject({ id: 55, rank: 55, title: 'Title 55' })
    expect(outcome.pagesFetched).toBe(2)
    expect(fetcher.calls).toEqual([listingUrl(1), listingUrl(2)])
  })

  it('fetches only the pages the limit needs', async () => {
    const fetcher = new FakeFetcher({ [listingUrl(1)]: listingPageHtml(range(1, 50)) })
    const { logger } = createMemoryLogger('test')

    const outcome = await fetchListing({ fetcher, adapter: myanimelistAdapter, logger }, 10)

    expect(outcome.records.map(r => r.id)).toEqual(range(1, 10))
    expect(fetcher.calls).toEqual([listingUrl(1)])
  })

  it('skips a failed page and moves on', async () => {
    const fetcher = new FakeFetcher({
      [listingUrl(1)]: { kind: 'timeout', timeoutMs: 10000 },
      [listingUrl(2)]: listingPageHtml(range(51, 50), 51),
    })
    const { logger, entries } = createMemoryLogger('test')

    const outcome = await fetchListing({ fetcher, adapter: myanimelistAdapter, logger }, 60)

    expect(outcome.pagesFailed).toBe(1)
    expect(outcome.pagesFetched).toBe(1)
    expect(outcome.records).toHaveLength(50)
    expect(outcome.records[0]?.id).toBe(51)
    expect(entries.filter(entry => entry.level === 'warn')).toEqual([
      expect.objectContaining({
        message: 'Listing page failed',
        page: 1,
        reason: 'Request timed out after 10000ms',
      }),
    ])
  })

  it('only yields positive integer ids', async () => {
    const fetcher = new FakeFetcher({ [listingUrl(1)]: listingPageHtml([3, 9, 27]) })
    const { logger } = createMemoryLogger('test')

    const outcome = await fetchListing({ fetcher, adapter: myanimelistAdapter, logger }, 50)

    for (const record of outcome.records) {
      expect(Number.isInteger(record.id)).toBe(true)
      expect(record.id).toBeGreaterThan(0)
    }
  })

  it('does not fetch once cancelled', async () => {
    const fetcher = new FakeFetcher({ [listingUrl(1)]: listingPageHtml([1]) })
    const controller = new AbortController()
    controller.abort()
    const { logger } = createMemoryLogger('test')

    const outcome = await fetchListing({ fetcher, adapter: myanimelistAdapter, logger }, 50, {
      signal: controller.signal,
    })

    expect(outcome).toEqual({ records: [], pagesFetched: 0, pagesFailed: 0, cancelled: true })
    expect(fetcher.calls).toEqual([])
  })
})

describe('selectDetailIds', () => {
  it('takes the first distinct ids in listing order', () => {
    const records = [4, 2, 4, 9, 1].map(id => ({
      id,
      rank: null,
      title: '',
      url: '',
      score: null,
      mediaType: '',
      episodeCount: null,
      memberCount: null,
    }))
    expect(selectDetailIds(records, 3)).toEqual([4, 2, 9])
    expect(selectDetailIds(records, 0)).toEqual([])
  })
})
