/**
 * Text helpers shared by the extractors: whitespace cleanup, "label: value"
 * blocks, broadcast slots and review truncation.
 */

import type { BroadcastInfo } from '../types.js'

export const REVIEW_MAX_LENGTH = 500
export const ELLIPSIS = '...'

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

/**
 * Trimmed text, or null when nothing is left.
 */
export function cleanText(text: string | null | undefined): string | null {
  if (text === null || text === undefined) return null
  const cleaned = collapseWhitespace(text)
  return cleaned.length > 0 ? cleaned : null
}

/**
 * Text with only its ends trimmed, or null when nothing is left. Line breaks
 * inside multi-paragraph fields survive.
 */
export function trimText(text: string | null | undefined): string | null {
  if (text === null || text === undefined) return null
  const trimmed = text.trim()
  return trimmed.length > 0 ? trimmed : null
}

/**
 * "Broadcast Time " → "broadcast_time"
 */
export function normalizeLabel(label: string): string {
  return collapseWhitespace(label).toLowerCase().replace(/ /g, '_')
}

/**
 * Split one "label: value" block on its first colon.
 * Blocks without a colon or with an empty label yield null.
 */
export function splitLabeledBlock(text: string): { key: string; value: string } | null {
  const colonAt = text.indexOf(':')
  if (colonAt < 0) return null

  const key = normalizeLabel(text.slice(0, colonAt))
  if (!key) return null

  return { key, value: collapseWhitespace(text.slice(colonAt + 1)) }
}

/**
 * Fold "label: value" blocks into a mapping. A label seen twice keeps the
 * last value.
 */
export function parseLabeledBlocks(blocks: readonly string[]): Record<string, string> {
  const result: Record<string, string> = {}
  for (const block of blocks) {
    const entry = splitLabeledBlock(block)
    if (entry) {
      result[entry.key] = entry.value
    }
  }
  return result
}

const WEEKDAY = /([A-Za-z]+day)/
const CLOCK_TIME = /(\d{1,2}):(\d{2})/

/**
 * Mine a broadcast slot ("Saturdays at 17:00 (JST)") for its weekday and
 * HH:MM time independently.
 */
export function parseBroadcast(text: string | null | undefined): BroadcastInfo {
  const trimmed = text?.trim()
  if (!trimmed || trimmed.toLowerCase() === 'unknown') {
    return { day: null, time: null }
  }

  const dayMatch = trimmed.match(WEEKDAY)
  const timeMatch = trimmed.match(CLOCK_TIME)

  let time: string | null = null
  if (timeMatch) {
    const hours = Number.parseInt(timeMatch[1] ?? '', 10)
    const minutes = Number.parseInt(timeMatch[2] ?? '', 10)
    if (hours <= 23 && minutes <= 59) {
      time = `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`
    }
  }

  return { day: dayMatch?.[1] ?? null, time }
}

/**
 * Cap review text at REVIEW_MAX_LENGTH characters, ending in an ellipsis when cut.
 * Counts code points, so a surrogate pair is never split.
 */
export function truncateContent(text: string, maxLength = REVIEW_MAX_LENGTH): string {
  const chars = Array.from(text)
  if (chars.length <= maxLength) return text
  return chars.slice(0, maxLength - ELLIPSIS.length).join('') + ELLIPSIS
}
