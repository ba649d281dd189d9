/**
 * Timeline Module
 *
 * Builds the immutable message timeline for one archive. The timeline is the
 * unit every downstream step reads; loading another archive replaces it.
 */

import { type ArchiveListing, classifyMediaName } from '../archive'
import { correlateMedia, parseTranscript } from '../parser'
import { getMediaRef, SYSTEM_AUTHOR, type Timeline, type TimelineStats } from '../types'

export { filterByTimeWindow, parseTimeWindow, TIME_WINDOW_LABELS, TIME_WINDOWS } from './filter'

/**
 * Build a timeline from transcript text and the archive's media entry names.
 */
export function buildTimelineFromText(
  transcript: string,
  mediaNames: readonly string[],
  transcriptName = '_chat.txt'
): Timeline {
  const messages = correlateMedia(parseTranscript(transcript), mediaNames)

  return {
    messages,
    imageFilenames: new Set(mediaNames.filter((name) => classifyMediaName(name) === 'image')),
    videoFilenames: new Set(mediaNames.filter((name) => classifyMediaName(name) === 'video')),
    transcriptName
  }
}

/**
 * Build a timeline from an opened archive.
 */
export function buildTimeline(listing: ArchiveListing): Timeline {
  return buildTimelineFromText(listing.transcript, listing.mediaNames, listing.transcriptName)
}

/**
 * Compute display statistics for a timeline.
 */
export function summarizeTimeline(timeline: Timeline): TimelineStats {
  const { messages } = timeline
  const authors = [
    ...new Set(messages.map((m) => m.author).filter((author) => author !== SYSTEM_AUTHOR))
  ]

  let start: Date | undefined
  let end: Date | undefined
  for (const message of messages) {
    if (!start || message.timestamp < start) start = message.timestamp
    if (!end || message.timestamp > end) end = message.timestamp
  }

  return {
    messageCount: messages.length,
    authors,
    dateRange: start && end ? { start, end } : null,
    imageCount: timeline.imageFilenames.size,
    videoCount: timeline.videoFilenames.size,
    attachedMediaCount: messages.filter((m) => getMediaRef(m) !== undefined).length
  }
}
