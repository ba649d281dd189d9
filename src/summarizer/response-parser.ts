/**
 * Response Parser
 *
 * Validates the summarizer's JSON reply into a SummaryResult. The reply is
 * untrusted: malformed parts and media parts naming a file that was not
 * attached are dropped one by one, the rest is kept.
 */

import type { DroppedPart, SentimentBucket, SummaryPart, SummaryResult } from '../types'

function extractJsonFromResponse(response: string): string | null {
  // Might be wrapped in ```json```
  const fenced = response.match(/```(?:json)?\s*([\s\S]*?)\s*```/)
  if (fenced?.[1]) {
    return fenced[1]
  }
  const start = response.indexOf('{')
  const end = response.lastIndexOf('}')
  return start !== -1 && end > start ? response.slice(start, end + 1) : null
}

function isRecord(val: unknown): val is Record<string, unknown> {
  return typeof val === 'object' && val !== null && !Array.isArray(val)
}

function parseString(val: unknown): string | null {
  return typeof val === 'string' && val.trim() ? val.trim() : null
}

function parseStringArray(val: unknown): string[] {
  if (!Array.isArray(val)) return []
  return val
    .filter((item): item is string => typeof item === 'string' && item.trim().length > 0)
    .map((item) => item.trim())
}

type PartOutcome = { readonly part: SummaryPart } | { readonly reason: string }

function parsePart(item: unknown, attached: ReadonlySet<string>): PartOutcome {
  if (!isRecord(item)) {
    return { reason: 'part is not an object' }
  }

  const content = parseString(item.content)

  switch (item.type) {
    case 'text':
      return content
        ? { part: { type: 'text', content } }
        : { reason: 'text part has no content' }

    case 'key_message': {
      if (!content) return { reason: 'key_message part has no content' }
      const author = parseString(item.author)
      return {
        part: author ? { type: 'key_message', content, author } : { type: 'key_message', content }
      }
    }

    case 'media': {
      const filename = parseString(item.filename)
      if (!filename) return { reason: 'media part has no filename' }
      if (!attached.has(filename)) {
        return { reason: `media part references unattached file "${filename}"` }
      }
      return {
        part: content ? { type: 'media', filename, content } : { type: 'media', filename }
      }
    }

    default:
      return { reason: `unknown part type ${JSON.stringify(item.type)}` }
  }
}

function parseSentiments(val: unknown): SentimentBucket[] | undefined {
  if (!Array.isArray(val)) return undefined

  const buckets: SentimentBucket[] = []
  for (const item of val) {
    if (!isRecord(item)) continue
    const sentiment = parseString(item.sentiment)
    const count =
      typeof item.count === 'number' ? item.count : Number.parseInt(String(item.count), 10)
    if (sentiment && Number.isFinite(count) && count >= 0) {
      buckets.push({ sentiment, count: Math.round(count) })
    }
  }
  return buckets
}

/**
 * Parse a summarizer reply.
 *
 * @param response Raw reply text
 * @param attachedFilenames Filenames that were actually sent with the request
 */
export function parseSummaryResponse(
  response: string,
  attachedFilenames: Iterable<string>
): SummaryResult {
  const jsonStr = extractJsonFromResponse(response)
  let parsed: unknown = null
  if (jsonStr !== null) {
    try {
      parsed = JSON.parse(jsonStr)
    } catch {
      parsed = null
    }
  }

  // Not the required shape at all: show the reply as plain prose
  if (!isRecord(parsed)) {
    const text = response.trim()
    return {
      parts: text ? [{ type: 'text', content: text }] : [],
      bulletPoints: [],
      dropped: []
    }
  }

  const attached = new Set(attachedFilenames)
  const parts: SummaryPart[] = []
  const dropped: DroppedPart[] = []

  const rawParts = Array.isArray(parsed.summary_parts) ? parsed.summary_parts : []
  rawParts.forEach((item: unknown, index: number) => {
    const outcome = parsePart(item, attached)
    if ('part' in outcome) {
      parts.push(outcome.part)
    } else {
      dropped.push({ index, reason: outcome.reason })
    }
  })

  const sentiments = parseSentiments(parsed.sentiments)

  return {
    parts,
    bulletPoints: parseStringArray(parsed.bullet_points),
    ...(sentiments !== undefined && { sentiments }),
    dropped
  }
}
