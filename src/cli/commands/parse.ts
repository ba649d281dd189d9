/**
 * Parse Command
 *
 * Parse and validate a chat export.
 */

import { summarizeTimeline } from '../../index'
import type { CLIArgs } from '../args'
import { formatDate, formatParticipants, initCommand, plural } from '../helpers'
import { writeJsonOutput } from '../io'
import type { Logger } from '../logger'

export async function cmdParse(args: CLIArgs, logger: Logger): Promise<void> {
  const timeline = await initCommand('parse', args, logger)
  const stats = summarizeTimeline(timeline)

  logger.success(`Valid WhatsApp export (${timeline.transcriptName})`)
  logger.success(plural(stats.messageCount, 'message'))

  if (stats.dateRange) {
    logger.success(
      `Date range: ${formatDate(stats.dateRange.start)} to ${formatDate(stats.dateRange.end)}`
    )
  }

  logger.success(
    `${plural(stats.authors.length, 'participant')}: ${formatParticipants(stats.authors)}`
  )
  logger.success(
    `${plural(stats.imageCount, 'image')}, ${plural(stats.videoCount, 'video')} in archive ` +
      `(${stats.attachedMediaCount} linked to messages)`
  )

  if (args.jsonOutput) {
    await writeJsonOutput(args.jsonOutput, timeline.messages, logger)
  }
}
