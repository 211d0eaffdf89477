/**
 * Collector Core Types
 *
 * Document capability, fetch and extraction results, and the three record
 * shapes produced from catalog pages.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Document Capability
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A node of a parsed document. Extraction code talks to this interface only;
 * the markup library behind it is an adapter detail.
 */
export interface ScrapeNode {
  /** All descendants matching the selector, in document order */
  select(selector: string): ScrapeNode[]

  /** First descendant matching the selector, or null */
  selectFirst(selector: string): ScrapeNode | null

  /** Concatenated text content (untrimmed) */
  text(): string

  /** Attribute value, or null when absent */
  attr(name: string): string | null
}

/**
 * A whole parsed page. Selection starts at the document root.
 */
export type ScrapeDocument = ScrapeNode

export type DocumentParser = (html: string) => ScrapeDocument

// ═══════════════════════════════════════════════════════════════════════════════
// Transport & Fetch Results
// ═══════════════════════════════════════════════════════════════════════════════

export type QueryParams = Record<string, string | number>

export interface TransportRequest {
  url: string
  headers: Record<string, string>
  signal: AbortSignal
}

export interface TransportResponse {
  status: number
  statusText: string
  body: string
}

/**
 * Issues one HTTP GET. Must reject (not resolve) on network faults and when
 * the signal aborts.
 */
export type HttpTransport = (request: TransportRequest) => Promise<TransportResponse>

export type FetchError =
  | { kind: 'timeout'; timeoutMs: number }
  | { kind: 'http_status'; statusCode: number; statusText?: string }
  | { kind: 'transport'; cause: string }
  | { kind: 'cancelled' } // Run aborted before the request was sent

export type FetchResult =
  | { ok: true; url: string; statusCode: number; document: ScrapeDocument; durationMs: number }
  | { ok: false; url: string; error: FetchError; durationMs: number }

export interface FetchCallOptions {
  /** Aborts the pre-request delay; in-flight requests are left to finish */
  signal?: AbortSignal
}

/**
 * Fetches one page and hands back a parsed document or a typed failure.
 * Never throws for network conditions and never retries.
 */
export interface DocumentFetcher {
  fetch(url: string, query?: QueryParams, options?: FetchCallOptions): Promise<FetchResult>
}

/**
 * Source of inter-request delays, in milliseconds.
 */
export interface DelaySource {
  nextDelay(): number
}

// ═══════════════════════════════════════════════════════════════════════════════
// Extraction Results
// ═══════════════════════════════════════════════════════════════════════════════

export type ExtractError = { kind: 'missing_identity'; details?: string }

/**
 * A field whose text was present but could not be parsed; the field is null
 * on the record.
 */
export interface FieldIssue {
  field: string
  raw: string
}

export type ExtractResult<T> =
  | { ok: true; record: T; issues: FieldIssue[] }
  | { ok: false; error: ExtractError }

// ═══════════════════════════════════════════════════════════════════════════════
// Records
// ═══════════════════════════════════════════════════════════════════════════════

export interface ListingRecord {
  readonly id: number
  readonly rank: number | null
  readonly title: string
  readonly url: string
  readonly score: number | null
  readonly mediaType: string
  readonly episodeCount: number | null
  readonly memberCount: number | null
}

export type AiringStatus = 'Unknown' | 'Aired' | 'Currently Airing' | 'Finished Airing'

export interface AiringInfo {
  readonly startDate: string | null
  readonly endDate: string | null
  readonly status: AiringStatus
}

export interface BroadcastInfo {
  readonly day: string | null
  /** HH:MM */
  readonly time: string | null
}

export interface ReviewRecord {
  readonly reviewer: string
  readonly date: string | null
  readonly score: number | null
  readonly content: string
  readonly helpfulCount: number
}

export interface DetailRecord {
  readonly id: number
  readonly title: string
  readonly url: string
  readonly score: number | null
  readonly genres: readonly string[]
  readonly studios: readonly string[]
  readonly synopsis: string
  /** Normalized label → raw value, from the information sidebar */
  readonly rawAttributes: Readonly<Record<string, string>>
  /** Normalized label → raw value, from the statistics block */
  readonly rawStats: Readonly<Record<string, string>>
  readonly airingInfo: AiringInfo
  readonly broadcastInfo: BroadcastInfo
  readonly reviews: readonly ReviewRecord[]
  /** ISO 8601 timestamp */
  readonly fetchedAt: string
}

// ═══════════════════════════════════════════════════════════════════════════════
// Catalog Adapter
// ═══════════════════════════════════════════════════════════════════════════════

export interface PageRequest {
  url: string
  query?: QueryParams
}

export interface DetailExtractContext {
  /** Id the page was requested for; preferred over anything read from the page */
  requestedId?: number
  url: string
  fetchedAt: Date
}

export interface ListingPageExtract {
  records: ListingRecord[]
  /** Rows discarded for lack of an id */
  dropped: ExtractError[]
  issues: FieldIssue[]
}

/**
 * Site adapter: knows the site's URLs and turns its documents into records.
 * Must be deterministic given the same document.
 */
export interface CatalogAdapter {
  /** Unique adapter identifier (e.g., 'myanimelist') */
  readonly id: string

  /** Semver version (increment on extraction logic changes) */
  readonly version: string

  /** Rows per listing page */
  readonly listingPageSize: number

  /** Request for the 1-based listing page */
  listingPage(page: number): PageRequest

  detailUrl(id: number): string

  reviewsUrl(id: number): string

  extractListingPage(doc: ScrapeDocument): ListingPageExtract

  extractDetail(doc: ScrapeDocument, ctx: DetailExtractContext): ExtractResult<DetailRecord>

  extractReviews(doc: ScrapeDocument, limit: number): ReviewRecord[]
}
