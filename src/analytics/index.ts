/**
 * Participant Analytics
 *
 * Per-author tallies of text and media activity.
 */

import { type ChatMessage, getMediaRef, SYSTEM_AUTHOR } from '../types'

/** Returned as the top author when a tally is empty */
export const NOT_AVAILABLE = 'N/A'

export interface AuthorCount {
  readonly author: string
  readonly count: number
}

export interface ParticipantAnalytics {
  readonly topTextAuthor: string
  readonly topMediaAuthor: string
  /** Text messages per author, in order of each author's first message */
  readonly text: readonly AuthorCount[]
  /** Media messages per author, in order of each author's first media message */
  readonly media: readonly AuthorCount[]
}

function toCounts(tally: Map<string, number>): AuthorCount[] {
  return [...tally].map(([author, count]) => ({ author, count }))
}

/**
 * Single left-to-right scan; only a strictly greater count replaces the
 * current leader, so ties go to the author seen first.
 */
function topAuthor(counts: readonly AuthorCount[]): string {
  let leader: AuthorCount | undefined
  for (const entry of counts) {
    if (!leader || entry.count > leader.count) {
      leader = entry
    }
  }
  return leader?.author ?? NOT_AVAILABLE
}

/**
 * Tally text and media activity per author. System events are not counted.
 */
export function analyzeParticipants(messages: readonly ChatMessage[]): ParticipantAnalytics {
  const text = new Map<string, number>()
  const media = new Map<string, number>()

  for (const message of messages) {
    if (message.author === SYSTEM_AUTHOR) continue
    const tally = getMediaRef(message) === undefined ? text : media
    tally.set(message.author, (tally.get(message.author) ?? 0) + 1)
  }

  const textCounts = toCounts(text)
  const mediaCounts = toCounts(media)

  return {
    topTextAuthor: topAuthor(textCounts),
    topMediaAuthor: topAuthor(mediaCounts),
    text: textCounts,
    media: mediaCounts
  }
}
