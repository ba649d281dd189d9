/**
 * CLI Helpers
 *
 * Shared utilities for CLI commands.
 */

import { basename } from 'node:path'
import { buildTimeline, openArchive, type Timeline, VERSION } from '../index'
import type { CLIArgs } from './args'
import type { Logger } from './logger'

// ============================================================================
// Formatting
// ============================================================================

export function formatDate(date: Date): string {
  return date.toLocaleDateString('en-US', { month: 'short', day: 'numeric', year: 'numeric' })
}

/**
 * Format a participant list, showing the first 5 + "and N others" if more.
 */
export function formatParticipants(authors: readonly string[]): string {
  if (authors.length <= 5) {
    return authors.join(', ')
  }
  const top5 = authors.slice(0, 5).join(', ')
  return `${top5}, and ${authors.length - 5} others`
}

export function plural(count: number, noun: string): string {
  return `${count.toLocaleString('en-US')} ${noun}${count === 1 ? '' : 's'}`
}

// ============================================================================
// Command Initialization
// ============================================================================

/**
 * Initialize a command: validate input, log header, open the archive.
 */
export async function initCommand(
  commandName: string,
  args: CLIArgs,
  logger: Logger
): Promise<Timeline> {
  if (!args.input) {
    throw new Error('No input file specified')
  }

  logger.log(`\nchat-digest ${commandName} v${VERSION}`)
  logger.log(`\n📁 ${basename(args.input)}`)

  const listing = await openArchive(args.input)
  logger.verbose(`Transcript: ${listing.transcriptName}`)
  logger.verbose(`${listing.mediaNames.length} media entries`)
  return buildTimeline(listing)
}
