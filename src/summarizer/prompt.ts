/**
 * Summary Prompt
 *
 * Assembles the detail-conditioned instructions and the request for one
 * summarization cycle.
 */

import type { ChatMessage, DetailLevel, MediaSelection, SummaryRequest } from '../types'
import { getDetailInstructions } from './detail'
import { DEFAULT_MEDIA_BUDGET, selectMedia } from './media-selection'
import { RESPONSE_SHAPE_TEXT, SUMMARY_RESPONSE_SCHEMA } from './schema'
import { renderTranscript } from './transcript'

export interface BuildSummaryRequestOptions {
  readonly detailLevel: DetailLevel
  /** Max attachments (default 15) */
  readonly mediaBudget?: number | undefined
  /** Attach media at all (default true) */
  readonly includeMedia?: boolean | undefined
}

function range(min: number, max: number): string {
  return min === max ? `exactly ${min}` : `between ${min} and ${max}`
}

/**
 * Build the instruction text for a detail level and the media actually offered.
 * Media call-out counts are capped by the number of attachments.
 */
export function buildInstructions(level: DetailLevel, mediaCount: number): string {
  const detail = getDetailInstructions(level)
  const lines = [
    'Summarize the following WhatsApp group chat conversation.',
    `Write the summary as "text" parts totalling no more than ${detail.maxWords} words.`,
    `Quote ${range(detail.keyMessages.min, detail.keyMessages.max)} notable messages as "key_message" parts, with the message text in "content" and its sender in "author".`
  ]

  if (mediaCount > 0) {
    const max = Math.min(detail.mediaCallouts.max, mediaCount)
    const min = Math.min(detail.mediaCallouts.min, max)
    lines.push(
      'Images and video stills from the chat are attached after the chat log. Each attachment is preceded by a line "FILENAME: <name>".',
      'Describe what they show where it matters to the conversation.',
      `Include ${range(min, max)} of them as "media" parts. A media part's "filename" must be copied exactly from a FILENAME line; never reference any other file.`
    )
  } else {
    lines.push('No media is attached. Do not produce "media" parts.')
  }

  lines.push(
    'Then list the main points as "bullet_points".',
    'Optionally add "sentiments": the moods present in the chat, each with the number of messages expressing it.',
    `Respond with JSON only, in this shape: ${RESPONSE_SHAPE_TEXT}`
  )

  return lines.join('\n')
}

/**
 * Build a summary request from the (already filtered) messages.
 */
export function buildSummaryRequest(
  messages: readonly ChatMessage[],
  options: BuildSummaryRequestOptions
): SummaryRequest {
  const media: MediaSelection =
    options.includeMedia === false
      ? { filenames: [], images: [], videos: [] }
      : selectMedia(messages, options.mediaBudget ?? DEFAULT_MEDIA_BUDGET)

  return {
    detailLevel: options.detailLevel,
    instructions: buildInstructions(options.detailLevel, media.filenames.length),
    transcript: renderTranscript(messages),
    media,
    responseSchema: SUMMARY_RESPONSE_SCHEMA
  }
}

/**
 * Narrow a request's media to the attachments that could actually be loaded,
 * re-deriving the instructions so they never mention a missing file.
 */
export function restrictRequestMedia(
  request: SummaryRequest,
  attached: readonly string[]
): SummaryRequest {
  const keep = new Set(attached)
  const media: MediaSelection = {
    filenames: request.media.filenames.filter((name) => keep.has(name)),
    images: request.media.images.filter((name) => keep.has(name)),
    videos: request.media.videos.filter((name) => keep.has(name))
  }

  return {
    ...request,
    media,
    instructions: buildInstructions(request.detailLevel, media.filenames.length)
  }
}
