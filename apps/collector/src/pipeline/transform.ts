/**
 * Dimensional Transform
 *
 * Flattens detail records into one fact table and three edge tables
 * (genres, studios, reviews). Pure: the same records always give the same
 * tables, and the input is never modified.
 *
 * Edges are only emitted for records that also produce a fact row, so every
 * edge id refers to a fact id.
 */

import type { DetailRecord } from '../scraper/types.js'
import {
  multiplyKnown,
  parseInteger,
  parseMinutesPerEpisode,
  parsePremiered,
} from '../scraper/parse/numbers.js'
import type { AnimeFact, DimensionalTables, GenreEdge, ReviewEdge, StudioEdge } from './types.js'

function statValue(record: DetailRecord, key: string): number | null {
  return parseInteger(record.rawStats[key]) ?? parseInteger(record.rawAttributes[key])
}

export function toFact(record: DetailRecord): AnimeFact {
  const attributes = record.rawAttributes
  const episodes = parseInteger(attributes.episodes)
  const minutesPerEpisode = parseMinutesPerEpisode(attributes.duration)
  const { season, year } = parsePremiered(attributes.premiered)

  return {
    id: record.id,
    title: record.title,
    score: record.score,
    episodes,
    status: attributes.status?.trim() || null,
    season,
    year,
    members: statValue(record, 'members'),
    favorites: statValue(record, 'favorites'),
    minutesPerEpisode,
    totalRuntimeMinutes: multiplyKnown(episodes, minutesPerEpisode),
    startDate: record.airingInfo.startDate,
    endDate: record.airingInfo.endDate,
    airingStatus: record.airingInfo.status,
    broadcastDay: record.broadcastInfo.day,
    broadcastTime: record.broadcastInfo.time,
    url: record.url,
  }
}

/**
 * Trimmed, non-blank values in first-seen order without repeats.
 */
function distinctValues(values: readonly string[]): string[] {
  const seen = new Set<string>()
  const result: string[] = []
  for (const value of values) {
    const trimmed = value.trim()
    if (!trimmed || seen.has(trimmed)) continue
    seen.add(trimmed)
    result.push(trimmed)
  }
  return result
}

function isValidId(id: number): boolean {
  return Number.isSafeInteger(id) && id > 0
}

export function transform(details: readonly DetailRecord[]): DimensionalTables {
  const tables: DimensionalTables = { facts: [], genreEdges: [], studioEdges: [], reviewEdges: [] }
  const seen = new Set<number>()

  for (const record of details) {
    // Invalid and repeated ids contribute no rows at all
    if (!isValidId(record.id) || seen.has(record.id)) continue
    seen.add(record.id)

    const { id } = record
    tables.facts.push(toFact(record))

    for (const genre of distinctValues(record.genres)) {
      const edge: GenreEdge = { id, genre }
      tables.genreEdges.push(edge)
    }
    for (const studio of distinctValues(record.studios)) {
      const edge: StudioEdge = { id, studio }
      tables.studioEdges.push(edge)
    }
    for (const review of record.reviews) {
      const edge: ReviewEdge = {
        id,
        reviewer: review.reviewer,
        date: review.date,
        score: review.score,
        content: review.content,
        helpfulCount: review.helpfulCount,
      }
      tables.reviewEdges.push(edge)
    }
  }

  return tables
}
