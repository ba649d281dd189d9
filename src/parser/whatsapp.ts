/**
 * WhatsApp Transcript Parser
 *
 * Converts transcript lines into message drafts. Each line is tried against
 * TRANSCRIPT_FORMATS in order; the first format that matches AND yields a valid
 * timestamp wins. Lines matching no format are continuation lines of the
 * previous message; lines shaped like a header with an impossible date are
 * dropped.
 */

import { type ChatMessageDraft, SYSTEM_AUTHOR } from '../types'
import { parseTimestamp, TRANSCRIPT_FORMATS, type TranscriptFormat } from './formats'

// Android: "IMG-20200129-WA0000.jpg (file attached)"
const FILE_ATTACHED_PATTERN = /\s*,?\s*\(file attached\)$/i

// iOS: "<attached: 00000012-PHOTO-2020-01-29-23-29-05.jpg>"
const IOS_ATTACHED_PATTERN = /^<attached:\s*(.+?)>$/i

// Exports made "without media" replace every attachment with a placeholder
const MEDIA_OMITTED_PATTERN =
  /^(<Media omitted>|(image|video|audio|GIF|sticker|document) omitted|Contact card omitted)$/i

interface LineMatch {
  readonly timestamp: Date
  readonly author: string
  readonly body: string
  readonly format: string
}

function stripDirectionMarks(text: string): string {
  return text.replace(/[\u200E\u200F]/g, '')
}

/**
 * Normalize a message body: direction marks, attachment markers, whitespace.
 */
export function cleanBody(body: string): string {
  const stripped = stripDirectionMarks(body).trim().replace(FILE_ATTACHED_PATTERN, '').trim()
  const iosAttachment = IOS_ATTACHED_PATTERN.exec(stripped)
  return iosAttachment?.[1]?.trim() ?? stripped
}

export function isMediaOmitted(body: string): boolean {
  return MEDIA_OMITTED_PATTERN.test(body)
}

function tryFormat(
  groups: Record<string, string | undefined>,
  format: TranscriptFormat
): LineMatch | null {
  if (!groups.date || !groups.time || groups.body === undefined) return null

  const timestamp = parseTimestamp(groups.date, groups.time, format.dateOrder)
  if (!timestamp) return null

  const author = format.hasAuthor ? stripDirectionMarks(groups.author ?? '').trim() : SYSTEM_AUTHOR
  if (!author) return null

  return { timestamp, author, body: cleanBody(groups.body), format: format.name }
}

/**
 * Match a line against the known formats without media-placeholder handling.
 * 'malformed' means the line has a message header shape but no format yields
 * a valid timestamp (e.g. 31/02/2020).
 */
function matchLine(line: string): LineMatch | 'malformed' | null {
  let shaped = false
  for (const format of TRANSCRIPT_FORMATS) {
    const groups = format.pattern.exec(line)?.groups
    if (!groups) continue

    shaped = true
    const match = tryFormat(groups, format)
    if (match) return match
  }
  return shaped ? 'malformed' : null
}

/**
 * Parse a single transcript line.
 * Returns null for unparseable lines and media-omission placeholders; never throws.
 */
export function parseLine(line: string): ChatMessageDraft | null {
  const match = matchLine(line.replace(/\r$/, ''))
  if (match === null || match === 'malformed' || isMediaOmitted(match.body)) return null
  return match
}

interface MessageBuilder {
  timestamp: Date
  author: string
  body: string
  format: string
}

function finalize(builder: MessageBuilder): ChatMessageDraft {
  return {
    timestamp: builder.timestamp,
    author: builder.author,
    body: builder.body.trimEnd(),
    format: builder.format
  }
}

/**
 * Parse a whole transcript.
 *
 * Continuation policy: non-matching lines after a parsed message are appended
 * to its body with a newline. Lines before the first message, header-shaped
 * lines with an invalid date, and whatever follows a discarded line are
 * dropped.
 */
export function parseTranscript(raw: string): ChatMessageDraft[] {
  const lines = raw.replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n')
  const drafts: ChatMessageDraft[] = []

  let current: MessageBuilder | null = null

  for (const line of lines) {
    const match = matchLine(line)

    if (match === 'malformed') {
      if (current) drafts.push(finalize(current))
      current = null
    } else if (match) {
      if (current) drafts.push(finalize(current))
      current = isMediaOmitted(match.body) ? null : { ...match }
    } else if (current) {
      current.body += `\n${line}`
    }
  }

  if (current) drafts.push(finalize(current))

  return drafts
}
