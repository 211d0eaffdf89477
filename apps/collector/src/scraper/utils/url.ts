/**
 * URL Utilities
 *
 * Query-string assembly and entity-id extraction from catalog URLs.
 */

import type { QueryParams } from '../types.js'

/**
 * Append query parameters to a URL. Existing parameters are kept; a key
 * present in both is overwritten by the new value.
 *
 * @throws TypeError if url is not absolute
 */
export function buildUrl(url: string, query?: QueryParams): string {
  const parsed = new URL(url)
  if (query) {
    for (const [key, value] of Object.entries(query)) {
      parsed.searchParams.set(key, String(value))
    }
  }
  return parsed.toString()
}

/**
 * Resolve a possibly-relative href against a base URL.
 * Returns null for empty or unparseable input.
 */
export function resolveUrl(href: string | null | undefined, baseUrl: string): string | null {
  const trimmed = href?.trim()
  if (!trimmed) return null
  try {
    return new URL(trimmed, baseUrl).toString()
  } catch {
    return null
  }
}

/**
 * Join a base URL and a path without doubling slashes.
 */
export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`
}

/**
 * Pull the numeric entity id out of a detail-page URL.
 *
 * The id is the all-digit path segment following the entity segment
 * (`/anime/5114/Some_Title` → 5114). Returns null when there is no such
 * segment or the id is not a positive integer.
 */
export function extractEntityId(href: string | null | undefined, entitySegment = 'anime'): number | null {
  const trimmed = href?.trim()
  if (!trimmed) return null

  let pathname: string
  try {
    // Relative paths are resolved against a throwaway origin
    pathname = new URL(trimmed, 'https://placeholder.invalid').pathname
  } catch {
    return null
  }

  const segments = pathname.split('/').filter(segment => segment.length > 0)
  const index = segments.indexOf(entitySegment)
  if (index < 0 || index + 1 >= segments.length) return null

  const candidate = segments[index + 1] ?? ''
  if (!/^\d+$/.test(candidate)) return null

  const id = Number.parseInt(candidate, 10)
  return Number.isSafeInteger(id) && id > 0 ? id : null
}
