/**
 * Numeric Parsing
 *
 * Lenient parsers for counts, scores and durations. Every function returns
 * null on anything it cannot read; none of them throw.
 */

/** Unit words the catalog prints after counts */
const UNIT_SUFFIXES = ['members', 'member', 'episodes', 'episode', 'eps', 'ep', 'favorites', 'users']

const SCORE_MIN = 0
const SCORE_MAX = 10

function stripUnits(text: string): string {
  let value = text.replace(/,/g, '').trim()
  const lower = value.toLowerCase()
  for (const suffix of UNIT_SUFFIXES) {
    if (lower.endsWith(suffix)) {
      value = value.slice(0, value.length - suffix.length).trim()
      break
    }
  }
  return value.replace(/\.$/, '').trim()
}

/**
 * Parse an integer after removing thousands separators and a trailing unit
 * ("3,456,789 members" → 3456789, "64 eps" → 64). "Unknown" → null.
 */
export function parseInteger(text: string | null | undefined): number | null {
  if (text === null || text === undefined) return null
  const cleaned = stripUnits(text)
  if (!/^-?\d+$/.test(cleaned)) return null
  const value = Number.parseInt(cleaned, 10)
  return Number.isSafeInteger(value) ? value : null
}

/**
 * Parse a score in [0, 10]. Out-of-range or unparseable → null.
 */
export function parseScore(text: string | null | undefined): number | null {
  const trimmed = text?.trim()
  if (!trimmed || !/^\d+(?:\.\d+)?$/.test(trimmed)) return null
  const value = Number.parseFloat(trimmed)
  if (!Number.isFinite(value) || value < SCORE_MIN || value > SCORE_MAX) return null
  return value
}

/**
 * Minutes per episode from a duration string.
 *
 * Takes the number right before "min"; for a range ("23-24 min") the upper
 * bound. An "hr" figure adds 60 minutes per hour ("1 hr. 30 min." → 90).
 */
export function parseMinutesPerEpisode(text: string | null | undefined): number | null {
  if (!text) return null

  const minutesMatch = text.match(/(\d+(?:\s*-\s*\d+)?)\s*min/i)
  const hoursMatch = text.match(/(\d+)\s*hr/i)
  if (!minutesMatch && !hoursMatch) return null

  let minutes = 0
  if (minutesMatch) {
    const bounds = (minutesMatch[1] ?? '').split('-')
    const upper = parseInteger(bounds[bounds.length - 1])
    if (upper === null) return null
    minutes += upper
  }
  if (hoursMatch) {
    const hours = parseInteger(hoursMatch[1])
    if (hours === null) return null
    minutes += hours * 60
  }

  return minutes
}

/**
 * Product of two counts when both are known, otherwise null.
 */
export function multiplyKnown(a: number | null, b: number | null): number | null {
  if (a === null || b === null) return null
  return a * b
}

export interface Premiere {
  season: string | null
  year: number | null
}

/**
 * Split a "premiered" value into season and year ("Spring 2009").
 * Fewer than two tokens, or a non-numeric year, leaves both null.
 */
export function parsePremiered(text: string | null | undefined): Premiere {
  const tokens = text?.trim().split(/\s+/) ?? []
  if (tokens.length < 2) return { season: null, year: null }

  const [season = '', yearToken = ''] = tokens
  if (!/^\d{4}$/.test(yearToken)) return { season: null, year: null }

  return { season, year: Number.parseInt(yearToken, 10) }
}
