#!/usr/bin/env node
/**
 * chat-digest CLI
 *
 * Local shell around the core library: archive loading, terminal output and
 * persistent settings.
 *
 * @license AGPL-3.0
 */

import { parseCliArgs } from './cli/args'
import { cmdConfig } from './cli/commands/config'
import { cmdParse } from './cli/commands/parse'
import { cmdPreview } from './cli/commands/preview'
import { cmdStats } from './cli/commands/stats'
import { cmdSummarize } from './cli/commands/summarize'
import { createLogger } from './cli/logger'

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    switch (args.command) {
      case 'parse':
        await cmdParse(args, logger)
        break

      case 'stats':
        await cmdStats(args, logger)
        break

      case 'summarize':
        await cmdSummarize(args, logger)
        break

      case 'preview':
        await cmdPreview(args, logger)
        break

      case 'config':
        await cmdConfig(args, logger)
        break

      default:
        logger.error(`Unknown command: ${args.command}. Run 'chat-digest --help' for usage.`)
        process.exit(1)
    }
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

main().catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})
