/**
 * Summarize Command
 *
 * One summarization cycle through a SummarySession backed by Gemini.
 */

import { createGeminiSummarizer, SummarySession, TIME_WINDOW_LABELS } from '../../index'
import type { CLIArgs } from '../args'
import { loadConfig } from '../config'
import { plural } from '../helpers'
import { writeJsonOutput } from '../io'
import type { Logger } from '../logger'
import { renderReport } from '../render'
import { resolveApiKey, resolveSummarySettings } from '../settings'

export async function cmdSummarize(args: CLIArgs, logger: Logger): Promise<void> {
  if (!args.input) {
    throw new Error('No input file specified')
  }

  const config = await loadConfig(args.configFile)
  const settings = resolveSummarySettings(args, config)

  const apiKey = resolveApiKey()
  if (!apiKey) {
    throw new Error('GEMINI_API_KEY environment variable is required for summarize')
  }

  const session = new SummarySession({
    summarizer: createGeminiSummarizer({
      apiKey,
      model: settings.model,
      timeoutMs: settings.timeoutMs
    }),
    cooldownMs: settings.cooldownMs,
    onStateChange: (state) => logger.verbose(`Session: ${state}`)
  })

  const timeline = await session.loadArchive(args.input)
  logger.success(`Loaded ${plural(timeline.messages.length, 'message')}`)
  logger.log(
    `\n🤖 Summarizing ${TIME_WINDOW_LABELS[settings.timeWindow]} with ${settings.model} ` +
      `(${settings.detailLevel})...\n`
  )

  const outcome = await session.summarize({
    timeWindow: settings.timeWindow,
    detailLevel: settings.detailLevel,
    mediaBudget: settings.mediaBudget,
    includeMedia: settings.includeMedia
  })

  if (!outcome.ok) {
    if (outcome.failure.error) {
      logger.verbose(`${outcome.failure.error.type}: ${outcome.failure.error.message}`)
    }
    throw new Error(outcome.failure.message)
  }

  const report = outcome.value
  for (const skip of report.skipped) {
    logger.warn(`Not attached: ${skip.filename} (${skip.reason})`)
  }
  for (const drop of report.summary.dropped) {
    logger.verbose(`Dropped summary part ${drop.index}: ${drop.reason}`)
  }
  logger.verbose(`Attached ${plural(report.attached.length, 'media file')}`)

  if (args.jsonOutput) {
    await writeJsonOutput(args.jsonOutput, report, logger)
    return
  }

  for (const line of renderReport(report)) {
    logger.log(line)
  }
}
