import type { CollectorConfigInput } from '../config/settings.js'
import type { ConfigurationIssue } from '../errors.js'

export type Flags = Record<string, string | boolean>

/**
 * `--key value` pairs; a flag with no value is `true`. Tokens after a flag
 * up to the next flag are joined with spaces.
 */
export function parseFlags(argv: readonly string[]): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? ''
    if (!token.startsWith('--')) {
      continue
    }

    const key = token.slice(2)
    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && !(argv[j] ?? '').startsWith('--')) {
      valueTokens.push(argv[j] ?? '')
      j++
    }

    if (valueTokens.length > 0) {
      flags[key] = valueTokens.join(' ')
      i = j - 1
    } else {
      flags[key] = true
    }
  }

  return flags
}

export function asString(value: string | boolean | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined
}

/**
 * Absent → undefined. Present but not numeric (including a bare flag) → NaN,
 * so validation can name the flag.
 */
export function asNumber(value: string | boolean | undefined): number | undefined {
  if (value === undefined) return undefined
  if (typeof value !== 'string' || value.trim() === '') return Number.NaN
  return Number(value)
}

const NUMERIC_FLAGS = {
  'listing-limit': 'listingLimit',
  'details-limit': 'detailsLimit',
  'max-workers': 'maxWorkers',
  reviews: 'reviewsPerEntity',
  'timeout-ms': 'requestTimeoutMs',
} as const

const KNOWN_FLAGS = new Set<string>([
  ...Object.keys(NUMERIC_FLAGS),
  'min-delay',
  'max-delay',
  'base-url',
  'output-dir',
  'help',
])

function isNumericFlag(flag: string): flag is keyof typeof NUMERIC_FLAGS {
  return Object.hasOwn(NUMERIC_FLAGS, flag)
}

/**
 * Map `collect` flags onto config input. Unknown flags come back as issues.
 */
export function flagsToConfigInput(flags: Flags): {
  input: CollectorConfigInput
  issues: ConfigurationIssue[]
} {
  const input: CollectorConfigInput = {}
  const issues: ConfigurationIssue[] = []

  for (const [flag, value] of Object.entries(flags)) {
    if (!KNOWN_FLAGS.has(flag)) {
      issues.push({ path: `--${flag}`, message: 'Unknown flag' })
      continue
    }
    if (isNumericFlag(flag)) {
      const parsed = asNumber(value)
      if (parsed !== undefined) input[NUMERIC_FLAGS[flag]] = parsed
    }
  }

  const minDelay = asNumber(flags['min-delay'])
  const maxDelay = asNumber(flags['max-delay'])
  if (minDelay !== undefined || maxDelay !== undefined) {
    input.rateLimitDelayRange = {}
    if (minDelay !== undefined) input.rateLimitDelayRange.min = minDelay
    if (maxDelay !== undefined) input.rateLimitDelayRange.max = maxDelay
  }

  for (const flag of ['base-url', 'output-dir']) {
    if (flags[flag] === true) issues.push({ path: `--${flag}`, message: 'Missing value' })
  }

  const baseUrl = asString(flags['base-url'])
  if (baseUrl !== undefined) input.baseUrl = baseUrl

  const outputDir = asString(flags['output-dir'])
  if (outputDir !== undefined) input.outputDir = outputDir

  return { input, issues }
}
