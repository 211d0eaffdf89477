/**
 * File Sink
 *
 * Writes a run's output as CSV tables plus the raw detail records as JSON.
 * Empty tables are skipped. Nulls become empty cells.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { stringify } from 'csv-stringify/sync'
import type { ILogger } from '@anistat/logger'
import { loggers } from '../config/logger.js'
import type {
  AnimeFact,
  GenreEdge,
  PipelineOutput,
  PipelineSink,
  ReviewEdge,
  StudioEdge,
} from '../pipeline/types.js'
import type { ListingRecord } from '../scraper/types.js'

export const OUTPUT_FILES = {
  listing: 'top_anime.csv',
  details: 'anime_details_raw.json',
  facts: 'anime_facts.csv',
  genres: 'anime_genres.csv',
  studios: 'anime_studios.csv',
  reviews: 'anime_reviews.csv',
} as const

type Column<T> = readonly [key: keyof T, header: string]

const LISTING_COLUMNS: readonly Column<ListingRecord>[] = [
  ['id', 'id'],
  ['rank', 'rank'],
  ['title', 'title'],
  ['url', 'url'],
  ['score', 'score'],
  ['mediaType', 'media_type'],
  ['episodeCount', 'episode_count'],
  ['memberCount', 'member_count'],
]

const FACT_COLUMNS: readonly Column<AnimeFact>[] = [
  ['id', 'id'],
  ['title', 'title'],
  ['score', 'score'],
  ['episodes', 'episodes'],
  ['status', 'status'],
  ['season', 'season'],
  ['year', 'year'],
  ['members', 'members'],
  ['favorites', 'favorites'],
  ['minutesPerEpisode', 'minutes_per_episode'],
  ['totalRuntimeMinutes', 'total_runtime_minutes'],
  ['startDate', 'start_date'],
  ['endDate', 'end_date'],
  ['airingStatus', 'airing_status'],
  ['broadcastDay', 'broadcast_day'],
  ['broadcastTime', 'broadcast_time'],
  ['url', 'url'],
]

const GENRE_COLUMNS: readonly Column<GenreEdge>[] = [
  ['id', 'id'],
  ['genre', 'genre'],
]

const STUDIO_COLUMNS: readonly Column<StudioEdge>[] = [
  ['id', 'id'],
  ['studio', 'studio'],
]

const REVIEW_COLUMNS: readonly Column<ReviewEdge>[] = [
  ['id', 'id'],
  ['reviewer', 'reviewer'],
  ['date', 'date'],
  ['score', 'score'],
  ['content', 'content'],
  ['helpfulCount', 'helpful_count'],
]

/**
 * Render rows as CSV with a header line.
 */
export function toCsv<T>(rows: readonly T[], columns: readonly Column<T>[]): string {
  const cells = rows.map(row => columns.map(([key]) => row[key] ?? null))
  return stringify(cells, {
    header: true,
    columns: columns.map(([, header]) => header),
  })
}

export interface FileSinkOptions {
  outputDir: string
  logger?: ILogger
}

export class FileSink implements PipelineSink {
  private readonly outputDir: string
  private readonly log: ILogger

  constructor(options: FileSinkOptions) {
    this.outputDir = options.outputDir
    this.log = options.logger ?? loggers.export
  }

  async write(output: PipelineOutput): Promise<string[]> {
    await mkdir(this.outputDir, { recursive: true })

    const written: string[] = []
    const writeTable = async <T>(
      file: string,
      rows: readonly T[],
      columns: readonly Column<T>[]
    ): Promise<void> => {
      if (rows.length === 0) {
        this.log.warn('Skipping empty table', { file })
        return
      }
      const path = join(this.outputDir, file)
      await writeFile(path, toCsv(rows, columns), 'utf8')
      written.push(path)
      this.log.info('Wrote table', { file, rows: rows.length })
    }

    await writeTable(OUTPUT_FILES.listing, output.listing, LISTING_COLUMNS)

    if (output.details.length === 0) {
      this.log.warn('Skipping empty table', { file: OUTPUT_FILES.details })
    } else {
      const path = join(this.outputDir, OUTPUT_FILES.details)
      await writeFile(path, JSON.stringify(output.details, null, 2), 'utf8')
      written.push(path)
      this.log.info('Wrote raw details', { file: OUTPUT_FILES.details, records: output.details.length })
    }

    await writeTable(OUTPUT_FILES.facts, output.tables.facts, FACT_COLUMNS)
    await writeTable(OUTPUT_FILES.genres, output.tables.genreEdges, GENRE_COLUMNS)
    await writeTable(OUTPUT_FILES.studios, output.tables.studioEdges, STUDIO_COLUMNS)
    await writeTable(OUTPUT_FILES.reviews, output.tables.reviewEdges, REVIEW_COLUMNS)

    return written
  }
}
