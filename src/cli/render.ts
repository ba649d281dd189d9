/**
 * Summary Rendering
 *
 * Turns a SummaryReport into terminal lines. Media parts show the filename
 * the model referenced; the preview command produces the actual still.
 */

import type { ParticipantAnalytics, SummaryPart, SummaryReport } from '../index'
import { plural } from './helpers'

function renderPart(part: SummaryPart): string[] {
  switch (part.type) {
    case 'text':
      return [part.content, '']
    case 'key_message':
      return [`  > ${part.content}${part.author ? ` (${part.author})` : ''}`, '']
    case 'media':
      return [`  [${part.filename}]${part.content ? ` ${part.content}` : ''}`, '']
  }
}

export function renderParticipants(participants: ParticipantAnalytics): string[] {
  return [
    `Most active (text): ${participants.topTextAuthor}`,
    `Most active (media): ${participants.topMediaAuthor}`
  ]
}

/**
 * Render a report for the terminal, one string per line.
 */
export function renderReport(report: SummaryReport): string[] {
  const { summary } = report
  const lines: string[] = []

  lines.push(`Summary of ${plural(report.messageCount, 'message')}`, '')

  for (const part of summary.parts) {
    lines.push(...renderPart(part))
  }

  if (summary.bulletPoints.length > 0) {
    lines.push('Highlights:')
    for (const point of summary.bulletPoints) {
      lines.push(`  • ${point}`)
    }
    lines.push('')
  }

  if (summary.sentiments && summary.sentiments.length > 0) {
    const moods = summary.sentiments.map((s) => `${s.sentiment} ${s.count}`).join(', ')
    lines.push(`Sentiment: ${moods}`, '')
  }

  lines.push(...renderParticipants(report.participants))

  return lines
}
