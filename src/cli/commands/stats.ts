/**
 * Stats Command
 *
 * Per-participant text and media activity within a time window.
 */

import { analyzeParticipants, filterByTimeWindow, TIME_WINDOW_LABELS } from '../../index'
import type { CLIArgs } from '../args'
import { loadConfig } from '../config'
import { initCommand, plural } from '../helpers'
import { writeJsonOutput } from '../io'
import type { Logger } from '../logger'
import { renderParticipants } from '../render'
import { resolveTimeWindow } from '../settings'

export async function cmdStats(args: CLIArgs, logger: Logger): Promise<void> {
  const config = await loadConfig(args.configFile)
  const window = resolveTimeWindow(args.timeWindow ?? config?.timeWindow)

  const timeline = await initCommand('stats', args, logger)
  const messages = filterByTimeWindow(timeline.messages, window)
  const analytics = analyzeParticipants(messages)

  if (args.jsonOutput) {
    const output = { window, messageCount: messages.length, analytics }
    await writeJsonOutput(args.jsonOutput, output, logger)
    return
  }

  logger.log(`\n📊 ${TIME_WINDOW_LABELS[window]}: ${plural(messages.length, 'message')}\n`)
  for (const line of renderParticipants(analytics)) {
    logger.log(line)
  }

  if (analytics.text.length > 0) {
    logger.log('\nText messages:')
    for (const { author, count } of analytics.text) {
      logger.log(`  ${author}: ${count}`)
    }
  }
  if (analytics.media.length > 0) {
    logger.log('\nMedia messages:')
    for (const { author, count } of analytics.media) {
      logger.log(`  ${author}: ${count}`)
    }
  }
}
