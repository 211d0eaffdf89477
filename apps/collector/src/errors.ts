/**
 * Collector Errors
 *
 * Expected failures travel as values (FetchResult, ExtractResult). The helpers
 * here render them for log metadata. ConfigurationError is the one thrown
 * error that ends the process.
 */

import type { ExtractError, FetchError } from './scraper/types.js'

export interface ConfigurationIssue {
  /** Dotted config path, e.g. "rateLimitDelayRange.min" */
  path: string
  message: string
}

/**
 * Raised before any network activity when the resolved configuration breaks
 * a rule. Carries every violated rule, not just the first.
 */
export class ConfigurationError extends Error {
  readonly issues: readonly ConfigurationIssue[]

  constructor(issues: readonly ConfigurationIssue[]) {
    super(
      `Invalid configuration: ${issues.map(issue => `${issue.path || '(root)'}: ${issue.message}`).join('; ')}`
    )
    this.name = 'ConfigurationError'
    this.issues = issues
  }
}

export function describeFetchError(error: FetchError): string {
  switch (error.kind) {
    case 'timeout':
      return `Request timed out after ${error.timeoutMs}ms`
    case 'http_status':
      return error.statusText
        ? `HTTP ${error.statusCode}: ${error.statusText}`
        : `HTTP ${error.statusCode}`
    case 'transport':
      return `Transport failure: ${error.cause}`
    case 'cancelled':
      return 'Cancelled before the request was sent'
  }
}

export function describeExtractError(error: ExtractError): string {
  switch (error.kind) {
    case 'missing_identity':
      return error.details ? `Missing entity id (${error.details})` : 'Missing entity id'
  }
}

/**
 * Message of a thrown value, whatever was thrown.
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  try {
    return JSON.stringify(error) ?? String(error)
  } catch {
    return String(error)
  }
}
