/**
 * Collector Settings
 *
 * Every tunable of a run in one validated object. Sources, lowest precedence
 * first: built-in defaults, ANISTAT_* environment variables, CLI flags.
 */

import { z } from 'zod'
import { ConfigurationError } from '../errors.js'

export const DEFAULT_BASE_URL = 'https://myanimelist.net'

export const DEFAULT_IDENTITY_POOL = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.1 Safari/605.1.15',
  'Mozilla/5.0 (X11; Linux x86_64; rv:121.0) Gecko/20100101 Firefox/121.0',
] as const

const delayRangeSchema = z
  .object({
    min: z.number().min(0).default(2),
    max: z.number().min(0).default(4),
  })
  .default({})

export const collectorConfigSchema = z
  .object({
    baseUrl: z.string().url().default(DEFAULT_BASE_URL),
    /** Seconds between requests, drawn per request */
    rateLimitDelayRange: delayRangeSchema,
    listingLimit: z.number().int().min(1).default(55),
    detailsLimit: z.number().int().min(0).default(30),
    maxWorkers: z.number().int().min(1).default(5),
    reviewsPerEntity: z.number().int().min(0).default(5),
    requestTimeoutMs: z.number().int().min(1).default(10_000),
    identityPool: z
      .array(z.string().min(1))
      .min(1)
      .default(() => [...DEFAULT_IDENTITY_POOL]),
    outputDir: z.string().min(1).default('anime_data'),
  })
  .superRefine((config, ctx) => {
    if (config.rateLimitDelayRange.min > config.rateLimitDelayRange.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['rateLimitDelayRange'],
        message: `min (${config.rateLimitDelayRange.min}) must not exceed max (${config.rateLimitDelayRange.max})`,
      })
    }
    if (config.detailsLimit > config.listingLimit) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['detailsLimit'],
        message: `must not exceed listingLimit (${config.listingLimit})`,
      })
    }
  })

export type CollectorConfig = z.output<typeof collectorConfigSchema>
export type CollectorConfigInput = z.input<typeof collectorConfigSchema>

/**
 * Apply defaults and validate.
 *
 * @throws ConfigurationError listing every violated rule
 */
export function resolveConfig(input: CollectorConfigInput = {}): CollectorConfig {
  const parsed = collectorConfigSchema.safeParse(input)
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
    )
  }
  return parsed.data
}

/**
 * Layer config inputs; later inputs win key by key, including inside the
 * delay range.
 */
export function mergeConfigInputs(...inputs: CollectorConfigInput[]): CollectorConfigInput {
  let merged: CollectorConfigInput = {}
  for (const input of inputs) {
    const rateLimitDelayRange =
      merged.rateLimitDelayRange || input.rateLimitDelayRange
        ? { ...merged.rateLimitDelayRange, ...input.rateLimitDelayRange }
        : undefined
    merged = { ...merged, ...input }
    if (rateLimitDelayRange) {
      merged.rateLimitDelayRange = rateLimitDelayRange
    }
  }
  return merged
}

function envNumber(value: string | undefined): number | undefined {
  const trimmed = value?.trim()
  // Unparseable text becomes NaN so validation reports it instead of dropping it
  return trimmed ? Number(trimmed) : undefined
}

function envString(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

/**
 * Read ANISTAT_* variables into a partial config input. Unset and blank
 * variables are omitted.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): CollectorConfigInput {
  const input: CollectorConfigInput = {}

  const baseUrl = envString(env.ANISTAT_BASE_URL)
  if (baseUrl !== undefined) input.baseUrl = baseUrl

  const min = envNumber(env.ANISTAT_MIN_DELAY)
  const max = envNumber(env.ANISTAT_MAX_DELAY)
  if (min !== undefined || max !== undefined) {
    input.rateLimitDelayRange = {}
    if (min !== undefined) input.rateLimitDelayRange.min = min
    if (max !== undefined) input.rateLimitDelayRange.max = max
  }

  const listingLimit = envNumber(env.ANISTAT_LISTING_LIMIT)
  if (listingLimit !== undefined) input.listingLimit = listingLimit

  const detailsLimit = envNumber(env.ANISTAT_DETAILS_LIMIT)
  if (detailsLimit !== undefined) input.detailsLimit = detailsLimit

  const maxWorkers = envNumber(env.ANISTAT_MAX_WORKERS)
  if (maxWorkers !== undefined) input.maxWorkers = maxWorkers

  const reviews = envNumber(env.ANISTAT_REVIEWS)
  if (reviews !== undefined) input.reviewsPerEntity = reviews

  const timeoutMs = envNumber(env.ANISTAT_TIMEOUT_MS)
  if (timeoutMs !== undefined) input.requestTimeoutMs = timeoutMs

  const outputDir = envString(env.ANISTAT_OUTPUT_DIR)
  if (outputDir !== undefined) input.outputDir = outputDir

  return input
}
