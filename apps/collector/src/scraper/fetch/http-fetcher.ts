/**
 * HTTP Fetcher Implementation
 *
 * One paced GET per call: wait out the rate limiter's delay, send the request
 * under a rotating browser identity, and hand back a parsed document or a
 * typed failure. No retries; a failed page is reported, never re-requested.
 */

import type { ILogger } from '@anistat/logger'
import { loggers } from '../../config/logger.js'
import { loadDocument } from '../html/cheerio-document.js'
import type {
  DelaySource,
  DocumentFetcher,
  DocumentParser,
  FetchCallOptions,
  FetchError,
  FetchResult,
  HttpTransport,
  QueryParams,
} from '../types.js'
import { buildUrl } from '../utils/url.js'
import { sleep as abortableSleep } from '../utils/sleep.js'

export const DEFAULT_TIMEOUT_MS = 10_000

const DEFAULT_HEADERS = {
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
}

export interface HttpFetcherOptions {
  /** Origin of the catalog; sent as the Referer */
  baseUrl: string

  /** User-Agent strings, one picked per request */
  identityPool: readonly string[]

  /** Delay drawn before every request */
  rateLimiter: DelaySource

  timeoutMs?: number

  transport?: HttpTransport
  parseDocument?: DocumentParser
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
  random?: () => number
  logger?: ILogger
}

/**
 * Transport backed by the global fetch.
 */
export const fetchTransport: HttpTransport = async request => {
  const response = await fetch(request.url, {
    method: 'GET',
    headers: request.headers,
    signal: request.signal,
    redirect: 'follow',
  })
  return {
    status: response.status,
    statusText: response.statusText,
    body: await response.text(),
  }
}

export class HttpFetcher implements DocumentFetcher {
  private readonly baseUrl: string
  private readonly identityPool: readonly string[]
  private readonly rateLimiter: DelaySource
  private readonly timeoutMs: number
  private readonly transport: HttpTransport
  private readonly parseDocument: DocumentParser
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  private readonly random: () => number
  private readonly log: ILogger

  constructor(options: HttpFetcherOptions) {
    if (options.identityPool.length === 0) {
      throw new RangeError('identityPool must contain at least one identity')
    }

    this.baseUrl = options.baseUrl
    this.identityPool = options.identityPool
    this.rateLimiter = options.rateLimiter
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.transport = options.transport ?? fetchTransport
    this.parseDocument = options.parseDocument ?? loadDocument
    this.sleep = options.sleep ?? abortableSleep
    this.random = options.random ?? Math.random
    this.log = options.logger ?? loggers.fetch
  }

  /**
   * Fetch a page and return the parsed document.
   */
  async fetch(url: string, query?: QueryParams, options: FetchCallOptions = {}): Promise<FetchResult> {
    const { signal } = options
    const target = buildUrl(url, query)

    await this.sleep(this.rateLimiter.nextDelay(), signal)

    const startTime = Date.now()
    if (signal?.aborted) {
      return { ok: false, url: target, error: { kind: 'cancelled' }, durationMs: 0 }
    }

    const headers: Record<string, string> = {
      ...DEFAULT_HEADERS,
      'User-Agent': this.pickIdentity(),
      Referer: this.baseUrl,
    }

    const result = await this.fetchOnce(target, headers, startTime)
    if (result.ok) {
      this.log.debug('Fetched page', { url: target, statusCode: result.statusCode, durationMs: result.durationMs })
    } else {
      this.log.debug('Fetch failed', { url: target, errorKind: result.error.kind, durationMs: result.durationMs })
    }
    return result
  }

  /**
   * Single request under a timeout.
   */
  private async fetchOnce(
    url: string,
    headers: Record<string, string>,
    startTime: number
  ): Promise<FetchResult> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)

    const fail = (error: FetchError): FetchResult => ({
      ok: false,
      url,
      error,
      durationMs: Date.now() - startTime,
    })

    try {
      const response = await this.transport({ url, headers, signal: controller.signal })

      if (response.status < 200 || response.status > 299) {
        return fail({
          kind: 'http_status',
          statusCode: response.status,
          statusText: response.statusText || undefined,
        })
      }

      return {
        ok: true,
        url,
        statusCode: response.status,
        document: this.parseDocument(response.body),
        durationMs: Date.now() - startTime,
      }
    } catch (error) {
      if (controller.signal.aborted) {
        return fail({ kind: 'timeout', timeoutMs: this.timeoutMs })
      }
      return fail({ kind: 'transport', cause: error instanceof Error ? error.message : String(error) })
    } finally {
      clearTimeout(timeoutId)
    }
  }

  private pickIdentity(): string {
    const index = Math.min(
      Math.floor(this.random() * this.identityPool.length),
      this.identityPool.length - 1
    )
    return this.identityPool[index] ?? this.identityPool[0] ?? ''
  }
}
