/**
 * Pipeline Types
 *
 * Dimensional tables, batch outcomes and the run report.
 */

import type { ILogger } from '@anistat/logger'
import type { AiringStatus, CatalogAdapter, DetailRecord, DocumentFetcher, ListingRecord } from '../scraper/types.js'

// ═══════════════════════════════════════════════════════════════════════════════
// Dimensional Tables
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One row per entity
 */
export interface AnimeFact {
  readonly id: number
  readonly title: string
  readonly score: number | null
  readonly episodes: number | null
  readonly status: string | null
  readonly season: string | null
  readonly year: number | null
  readonly members: number | null
  readonly favorites: number | null
  readonly minutesPerEpisode: number | null
  /** episodes × minutesPerEpisode when both are known */
  readonly totalRuntimeMinutes: number | null
  readonly startDate: string | null
  readonly endDate: string | null
  readonly airingStatus: AiringStatus
  readonly broadcastDay: string | null
  readonly broadcastTime: string | null
  readonly url: string
}

export interface GenreEdge {
  readonly id: number
  readonly genre: string
}

export interface StudioEdge {
  readonly id: number
  readonly studio: string
}

export interface ReviewEdge {
  readonly id: number
  readonly reviewer: string
  readonly date: string | null
  readonly score: number | null
  readonly content: string
  readonly helpfulCount: number
}

export interface DimensionalTables {
  facts: AnimeFact[]
  genreEdges: GenreEdge[]
  studioEdges: StudioEdge[]
  reviewEdges: ReviewEdge[]
}

// ═══════════════════════════════════════════════════════════════════════════════
// Batch
// ═══════════════════════════════════════════════════════════════════════════════

/** Shared collaborators of the fetching stages */
export interface CollectorDeps {
  fetcher: DocumentFetcher
  adapter: CatalogAdapter
  logger?: ILogger
  /** Clock for fetchedAt; defaults to the system clock */
  now?: () => Date
}

export type DetailFailureStage = 'detail_fetch' | 'detail_extract' | 'unexpected'

export interface DetailFailure {
  animeId: number
  stage: DetailFailureStage
  reason: string
}

/**
 * What one unit of the detail batch resolved to
 */
export type UnitOutcome =
  | { kind: 'record'; record: DetailRecord }
  | { kind: 'failure'; failure: DetailFailure }
  | { kind: 'skipped'; animeId: number }

export interface BatchOutcome {
  /** Completion order */
  records: DetailRecord[]
  failures: DetailFailure[]
  /** Ids never attempted because the run was cancelled */
  skipped: number[]
  cancelled: boolean
}

export type ProgressCallback = (completed: number, total: number) => void

// ═══════════════════════════════════════════════════════════════════════════════
// Run Report
// ═══════════════════════════════════════════════════════════════════════════════

export type StageName = 'listing' | 'selection' | 'details' | 'transform' | 'persist'

export type StageStatus = 'succeeded' | 'partial' | 'exhausted' | 'skipped' | 'failed'

export interface StageReport {
  stage: StageName
  status: StageStatus
  /** Records (or files, for persist) the stage produced */
  produced: number
  /** Pages, entities or writes that failed */
  failed: number
  durationMs: number
  message?: string
}

/**
 * A fetching stage produced nothing, so the run ended early.
 */
export interface PipelineStageExhausted {
  stage: StageName
  message: string
}

export interface PipelineOutput {
  listing: readonly ListingRecord[]
  details: readonly DetailRecord[]
  tables: DimensionalTables
}

/**
 * Persistence boundary. Returns the locations written.
 */
export interface PipelineSink {
  write(output: PipelineOutput): Promise<string[]>
}

export interface PipelineReport extends PipelineOutput {
  stages: StageReport[]
  warnings: PipelineStageExhausted[]
  failures: DetailFailure[]
  cancelled: boolean
  writtenFiles: string[]
}
