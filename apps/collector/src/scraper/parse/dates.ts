/**
 * Date Parsing
 *
 * Turns the catalog's human-readable dates into ISO `YYYY-MM-DD` strings.
 * Two tiers: a full "Mon D, YYYY" date first, a bare year second. A bare year
 * is pinned to January 1st. Anything else is null, never an error.
 */

import type { AiringInfo } from '../types.js'

const MONTHS: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  sept: 9,
  oct: 10,
  nov: 11,
  dec: 12,
}

const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
]

const FULL_DATE = /^([A-Za-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})$/
const YEAR_ONLY = /^(\d{4})$/
const EMBEDDED_FULL_DATE = /([A-Za-z]+\.?\s+\d{1,2},\s*\d{4})/

const OPEN_ENDED_MARKER = 'to ?'
const RANGE_SEPARATOR = ' to '

function monthFromName(name: string): number | null {
  const lower = name.toLowerCase()
  const abbreviated = MONTHS[lower]
  if (abbreviated !== undefined) return abbreviated
  const index = MONTH_NAMES.indexOf(lower)
  return index >= 0 ? index + 1 : null
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate()
}

export function toIsoDate(year: number, month: number, day: number): string {
  const yyyy = String(year).padStart(4, '0')
  const mm = String(month).padStart(2, '0')
  const dd = String(day).padStart(2, '0')
  return `${yyyy}-${mm}-${dd}`
}

/**
 * Parse "Jan 5, 2023" / "January 5, 2023". Returns null for impossible
 * calendar dates.
 */
export function parseFullDate(text: string | null | undefined): string | null {
  const match = text?.trim().match(FULL_DATE)
  if (!match) return null

  const month = monthFromName(match[1] ?? '')
  const day = Number.parseInt(match[2] ?? '', 10)
  const year = Number.parseInt(match[3] ?? '', 10)
  if (month === null || !Number.isFinite(day) || !Number.isFinite(year)) return null
  if (day < 1 || day > daysInMonth(year, month)) return null

  return toIsoDate(year, month, day)
}

/**
 * Parse "2023" as 2023-01-01.
 */
export function parseYearOnly(text: string | null | undefined): string | null {
  const match = text?.trim().match(YEAR_ONLY)
  if (!match) return null
  return toIsoDate(Number.parseInt(match[1] ?? '', 10), 1, 1)
}

/**
 * Full date first, bare year second.
 */
export function parseDate(text: string | null | undefined): string | null {
  return parseFullDate(text) ?? parseYearOnly(text)
}

/**
 * Find the first full date embedded in longer text
 * (e.g. "Dec 3, 2024 10:15 PM" → 2024-12-03).
 */
export function findFullDate(text: string | null | undefined): string | null {
  const match = text?.match(EMBEDDED_FULL_DATE)
  return match ? parseFullDate(match[1]) : null
}

const UNKNOWN_AIRING: AiringInfo = { startDate: null, endDate: null, status: 'Unknown' }

/**
 * Classify and parse an "Aired" value.
 *
 * - "Jan 5, 2023 to ?"          → Currently Airing, end null
 * - "Apr 5, 2009 to Jul 4, 2010" → Finished Airing
 * - "Aug 21, 2010"              → Aired, end = start
 * - "" / "Not available"        → Unknown
 *
 * Each side of a range is parsed on its own; a side that fails both tiers is
 * null and does not affect the other.
 */
export function parseAiringDates(text: string | null | undefined): AiringInfo {
  const trimmed = text?.trim().replace(/\s+/g, ' ') ?? ''
  if (!trimmed || trimmed.toLowerCase() === 'not available') {
    return UNKNOWN_AIRING
  }

  if (trimmed.includes(OPEN_ENDED_MARKER)) {
    const [start = ''] = trimmed.split(RANGE_SEPARATOR)
    return { startDate: parseDate(start), endDate: null, status: 'Currently Airing' }
  }

  if (trimmed.includes(RANGE_SEPARATOR)) {
    const separatorAt = trimmed.indexOf(RANGE_SEPARATOR)
    const start = trimmed.slice(0, separatorAt)
    const end = trimmed.slice(separatorAt + RANGE_SEPARATOR.length)
    return { startDate: parseDate(start), endDate: parseDate(end), status: 'Finished Airing' }
  }

  const single = parseDate(trimmed)
  return { startDate: single, endDate: single, status: 'Aired' }
}
