/**
 * MyAnimeList Adapter
 *
 * Turns ranking, profile and review pages into ListingRecord, DetailRecord
 * and ReviewRecord values.
 *
 * A missing or unreadable element leaves its field null (or empty) and the
 * record goes on. The one hard requirement is the entity id; a row or page
 * without one is dropped with `missing_identity`.
 */

import type {
  CatalogAdapter,
  DetailExtractContext,
  DetailRecord,
  ExtractResult,
  FieldIssue,
  ListingPageExtract,
  ListingRecord,
  PageRequest,
  ReviewRecord,
  ScrapeDocument,
  ScrapeNode,
} from '../../types.js'
import { findFullDate, parseAiringDates } from '../../parse/dates.js'
import { parseInteger, parseScore } from '../../parse/numbers.js'
import {
  cleanText,
  collapseWhitespace,
  parseBroadcast,
  parseLabeledBlocks,
  trimText,
  truncateContent,
} from '../../parse/text.js'
import { extractEntityId, joinUrl, resolveUrl } from '../../utils/url.js'
import { MYANIMELIST_SELECTORS, type MyAnimeListSelectors } from './selectors.js'

const ADAPTER_ID = 'myanimelist'
const ADAPTER_VERSION = '1.0.0'
const DEFAULT_BASE_URL = 'https://myanimelist.net'
const LISTING_PAGE_SIZE = 50
const ANONYMOUS_REVIEWER = 'Anonymous'

/** Placeholders the site prints for "no value"; not parse failures */
const UNKNOWN_MARKERS = new Set(['', 'n/a', '?', '-', 'unknown', 'none found'])

function isUnknownMarker(raw: string): boolean {
  // "? eps" and "? members" carry a unit after the marker
  const bare = raw.trim().toLowerCase().replace(/\s*(eps|episodes|members)$/, '')
  return UNKNOWN_MARKERS.has(bare)
}

export interface MyAnimeListAdapterOptions {
  baseUrl?: string
  selectors?: MyAnimeListSelectors
}

function firstText(node: ScrapeNode, selector: string): string | null {
  return cleanText(node.selectFirst(selector)?.text())
}

/** Multi-paragraph fields keep their inner line breaks */
function firstBlock(node: ScrapeNode, selector: string): string | null {
  return trimText(node.selectFirst(selector)?.text())
}

function allTexts(node: ScrapeNode, selector: string): string[] {
  const texts: string[] = []
  for (const match of node.select(selector)) {
    const text = cleanText(match.text())
    if (text) texts.push(text)
  }
  return texts
}

function uniqueInOrder(values: readonly string[]): string[] {
  return Array.from(new Set(values))
}

/**
 * Run a parser over optional text, recording an issue when text was present
 * but did not parse.
 */
function parseField<T>(
  field: string,
  raw: string | null,
  parse: (text: string) => T | null,
  issues: FieldIssue[]
): T | null {
  if (raw === null) return null
  const value = parse(raw)
  if (value === null && !isUnknownMarker(raw)) {
    issues.push({ field, raw })
  }
  return value
}

/**
 * "TV (64 eps)" → { mediaType: 'TV', episodes: '64 eps' }
 */
function splitMediaLine(information: string): { mediaType: string; episodes: string | null } {
  const match = information.match(/^([^(]*)\(([^)]*)\)/)
  if (!match) {
    return { mediaType: '', episodes: null }
  }
  return { mediaType: collapseWhitespace(match[1] ?? ''), episodes: collapseWhitespace(match[2] ?? '') }
}

function extractMembers(information: string): string | null {
  const match = information.match(/([\d,]+)\s*members/i)
  return match ? (match[1] ?? null) : null
}

export function createMyAnimeListAdapter(options: MyAnimeListAdapterOptions = {}): CatalogAdapter {
  const baseUrl = options.baseUrl ?? DEFAULT_BASE_URL
  const selectors = options.selectors ?? MYANIMELIST_SELECTORS

  function extractListingRow(row: ScrapeNode, issues: FieldIssue[]): ExtractResult<ListingRecord> {
    const link = row.selectFirst(selectors.listing.titleLink)
    const href = link?.attr('href') ?? null
    const id = extractEntityId(href)
    if (id === null) {
      return {
        ok: false,
        error: { kind: 'missing_identity', details: href ? `No id in ${href}` : 'No detail link' },
      }
    }

    const rowIssues: FieldIssue[] = []
    const information = firstText(row, selectors.listing.information) ?? ''
    const media = splitMediaLine(information)

    const record: ListingRecord = {
      id,
      rank: parseField('rank', firstText(row, selectors.listing.rank), parseInteger, rowIssues),
      title: cleanText(link?.text()) ?? '',
      url: resolveUrl(href, baseUrl) ?? joinUrl(baseUrl, `anime/${id}`),
      score: parseField('score', firstText(row, selectors.listing.score), parseScore, rowIssues),
      mediaType: media.mediaType,
      episodeCount: parseField('episodeCount', media.episodes, parseInteger, rowIssues),
      memberCount: parseField('memberCount', extractMembers(information), parseInteger, rowIssues),
    }

    issues.push(...rowIssues)
    return { ok: true, record, issues: rowIssues }
  }

  function extractReview(element: ScrapeNode): ReviewRecord {
    const content = firstBlock(element, selectors.reviews.content) ?? ''
    return {
      reviewer: firstText(element, selectors.reviews.reviewer) ?? ANONYMOUS_REVIEWER,
      date: findFullDate(firstText(element, selectors.reviews.date)),
      score: parseInteger(firstText(element, selectors.reviews.score)),
      content: truncateContent(content),
      helpfulCount: parseInteger(firstText(element, selectors.reviews.helpful)) ?? 0,
    }
  }

  return {
    id: ADAPTER_ID,
    version: ADAPTER_VERSION,
    listingPageSize: LISTING_PAGE_SIZE,

    listingPage(page: number): PageRequest {
      return {
        url: joinUrl(baseUrl, 'topanime.php'),
        query: { limit: (page - 1) * LISTING_PAGE_SIZE },
      }
    },

    detailUrl(id: number): string {
      return joinUrl(baseUrl, `anime/${id}`)
    },

    reviewsUrl(id: number): string {
      return joinUrl(baseUrl, `anime/${id}/reviews`)
    },

    extractListingPage(doc: ScrapeDocument): ListingPageExtract {
      const page: ListingPageExtract = { records: [], dropped: [], issues: [] }
      for (const row of doc.select(selectors.listing.row)) {
        const result = extractListingRow(row, page.issues)
        if (result.ok) {
          page.records.push(result.record)
        } else {
          page.dropped.push(result.error)
        }
      }
      return page
    },

    extractDetail(doc: ScrapeDocument, ctx: DetailExtractContext): ExtractResult<DetailRecord> {
      const requested =
        ctx.requestedId !== undefined && Number.isSafeInteger(ctx.requestedId) && ctx.requestedId > 0
          ? ctx.requestedId
          : null
      const id =
        requested ?? extractEntityId(doc.selectFirst(selectors.detail.canonical)?.attr('href'))
      if (id === null) {
        return {
          ok: false,
          error: { kind: 'missing_identity', details: `No entity id for ${ctx.url}` },
        }
      }

      const issues: FieldIssue[] = []
      const rawAttributes = parseLabeledBlocks(
        doc.select(selectors.detail.attributeBlocks).map(block => block.text())
      )
      const rawStats = parseLabeledBlocks(
        doc.select(selectors.detail.statsBlocks).map(block => block.text())
      )

      const record: DetailRecord = {
        id,
        title: firstText(doc, selectors.detail.title) ?? '',
        url: ctx.url,
        score: parseField('score', firstText(doc, selectors.detail.score), parseScore, issues),
        genres: uniqueInOrder(allTexts(doc, selectors.detail.genres)),
        studios: uniqueInOrder(allTexts(doc, selectors.detail.studios)),
        synopsis: firstBlock(doc, selectors.detail.synopsis) ?? '',
        rawAttributes,
        rawStats,
        airingInfo: parseAiringDates(rawAttributes.aired),
        broadcastInfo: parseBroadcast(rawAttributes.broadcast),
        reviews: [],
        fetchedAt: ctx.fetchedAt.toISOString(),
      }

      return { ok: true, record, issues }
    },

    extractReviews(doc: ScrapeDocument, limit: number): ReviewRecord[] {
      if (limit <= 0) return []
      return doc.select(selectors.reviews.item).slice(0, limit).map(extractReview)
    },
  }
}

/**
 * Adapter bound to the public site and the default selectors.
 */
export const myanimelistAdapter = createMyAnimeListAdapter()
