#!/usr/bin/env node
import '../env.js'
import { loggers } from '../config/logger.js'
import { toErrorMessage } from '../errors.js'
import { EXIT_FAULT, EXIT_USAGE, runCollectCommand } from './commands/collect.js'
import { parseFlags } from './parse-flags.js'

const log = loggers.cli

function printHelp(): void {
  console.log('anistat - ranked anime catalog collector')
  console.log('')
  console.log('Commands:')
  console.log('  collect [--listing-limit 55] [--details-limit 30] [--max-workers 5] [--reviews 5]')
  console.log('          [--min-delay 2] [--max-delay 4] [--timeout-ms 10000]')
  console.log('          [--base-url https://myanimelist.net] [--output-dir anime_data]')
  console.log('')
  console.log('Environment: ANISTAT_* variables set the same options; flags take precedence.')
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(0)
  }

  const flags = parseFlags(rest)
  if (flags.help === true) {
    printHelp()
    process.exit(0)
  }

  let exitCode = EXIT_USAGE

  switch (command) {
    case 'collect': {
      const controller = new AbortController()
      // A second interrupt falls through to Node's default and kills the process
      process.once('SIGINT', () => {
        log.warn('Interrupt received; finishing in-flight requests')
        controller.abort()
      })
      exitCode = await runCollectCommand(flags, { signal: controller.signal })
      break
    }
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      exitCode = EXIT_USAGE
  }

  process.exit(exitCode)
}

main().catch(error => {
  log.fatal('Collector crashed', { message: toErrorMessage(error) }, error)
  process.exit(EXIT_FAULT)
})
