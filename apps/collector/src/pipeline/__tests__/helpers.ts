/**
 * In-process stand-ins for the network and the sink, plus page and record
 * builders shared by the pipeline suites.
 */

import { loadDocument } from '../../scraper/html/cheerio-document.js'
import type { DetailRecord, DocumentFetcher, FetchCallOptions, FetchError, FetchResult, QueryParams } from '../../scraper/types.js'
import { buildUrl } from '../../scraper/utils/url.js'
import type { PipelineOutput, PipelineSink } from '../types.js'

export const BASE = 'https://myanimelist.net'

/**
 * Serves canned pages by URL. Unknown URLs answer 404; a FetchError value
 * is returned as that failure.
 */
export class FakeFetcher implements DocumentFetcher {
  readonly calls: string[] = []
  active = 0
  maxActive = 0

  constructor(
    private readonly pages: Record<string, string | FetchError>,
    private readonly latencyMs = 0
  ) {}

  async fetch(url: string, query?: QueryParams, options: FetchCallOptions = {}): Promise<FetchResult> {
    const target = buildUrl(url, query)
    if (options.signal?.aborted) {
      return { ok: false, url: target, error: { kind: 'cancelled' }, durationMs: 0 }
    }

    this.calls.push(target)
    this.active++
    this.maxActive = Math.max(this.maxActive, this.active)
    try {
      if (this.latencyMs > 0) {
        await new Promise(resolve => setTimeout(resolve, this.latencyMs))
      }
      const page = this.pages[target]
      if (page === undefined) {
        return { ok: false, url: target, error: { kind: 'http_status', statusCode: 404 }, durationMs: 0 }
      }
      if (typeof page !== 'string') {
        return { ok: false, url: target, error: page, durationMs: 0 }
      }
      return { ok: true, url: target, statusCode: 200, document: loadDocument(page), durationMs: 0 }
    } finally {
      this.active--
    }
  }
}

export class MemorySink implements PipelineSink {
  readonly outputs: PipelineOutput[] = []

  async write(output: PipelineOutput): Promise<string[]> {
    this.outputs.push(output)
    return ['memory://run']
  }
}

export function listingUrl(page: number): string {
  return `${BASE}/topanime.php?limit=${(page - 1) * 50}`
}

export function detailUrl(id: number): string {
  return `${BASE}/anime/${id}`
}

export function reviewsUrl(id: number): string {
  return `${BASE}/anime/${id}/reviews`
}

export function listingPageHtml(ids: readonly number[], firstRank = 1): string {
  const rows = ids
    .map(
      (id, index) => `
    <tr class="ranking-list">
      <td>
        <span class="top-anime-rank-text">${firstRank + index}</span>
        <h3 class="anime_ranking_h3"><a href="${BASE}/anime/${id}/Title_${id}">Title ${id}</a></h3>
        <div class="information">TV (12 eps) 1,000 members</div>
        <span class="score-label">8.50</span>
      </td>
    </tr>`
    )
    .join('')
  return `<html><body><table>${rows}</table></body></html>`
}

export function detailPageHtml(id: number, options: { genres?: string[]; episodes?: string } = {}): string {
  const genres = (options.genres ?? ['Drama'])
    .map(genre => `<span itemprop="genre">${genre}</span>`)
    .join('')
  return `<html>
  <head><link rel="canonical" href="${BASE}/anime/${id}/Title_${id}" /></head>
  <body>
    <h1 class="title-name">Title ${id}</h1>
    <div class="score-label">8.50</div>
    <div class="leftside">
      <div class="spaceit_pad"><span class="dark_text">Episodes:</span> ${options.episodes ?? '12'}</div>
      <div class="spaceit_pad"><span class="dark_text">Duration:</span> 24 min. per ep.</div>
      <div class="spaceit_pad"><span class="dark_text">Aired:</span> Jan 5, 2023 to Mar 30, 2023</div>
      <div class="spaceit_pad"><span class="dark_text">Studios:</span> <a href="/anime/producer/1">Studio ${id}</a></div>
      <div class="spaceit_pad"><span class="dark_text">Genres:</span> ${genres}</div>
    </div>
  </body>
</html>`
}

export function reviewsPageHtml(reviewers: readonly string[]): string {
  const items = reviewers
    .map(
      reviewer => `
    <div class="review-element">
      <div class="update_at">Feb 1, 2024</div>
      <div class="username"><a href="/profile/${reviewer}">${reviewer}</a></div>
      <div class="rating"><span>8</span></div>
      <div class="text">Review by ${reviewer}</div>
      <div class="helpful_yes"><span>2</span></div>
    </div>`
    )
    .join('')
  return `<html><body>${items}</body></html>`
}

export function detailRecord(overrides: Partial<DetailRecord> = {}): DetailRecord {
  return {
    id: 1,
    title: 'Lantern Keepers',
    url: `${BASE}/anime/1`,
    score: 9.1,
    genres: ['Action', 'Adventure'],
    studios: ['Harbor Light'],
    synopsis: 'Two siblings keep the lamps lit.',
    rawAttributes: {
      episodes: '64',
      status: 'Finished Airing',
      premiered: 'Spring 2009',
      duration: '24 min. per ep.',
    },
    rawStats: { members: '3,456,789', favorites: '223,100' },
    airingInfo: { startDate: '2009-04-05', endDate: '2010-07-04', status: 'Finished Airing' },
    broadcastInfo: { day: 'Sunday', time: '17:00' },
    reviews: [],
    fetchedAt: '2026-01-29T00:00:00.000Z',
    ...overrides,
  }
}
