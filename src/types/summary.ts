/**
 * Summary Types
 *
 * Types for summarization requests and the validated reply.
 */

import type { MediaKind } from './message'

export type DetailLevel = 'brief' | 'standard' | 'verbose'

export const DETAIL_LEVELS: readonly DetailLevel[] = ['brief', 'standard', 'verbose']

export type TimeWindow = 'last-24h' | 'last-7d' | 'last-30d' | 'all-time'

export interface TextPart {
  readonly type: 'text'
  readonly content: string
}

export interface KeyMessagePart {
  readonly type: 'key_message'
  readonly content: string
  readonly author?: string | undefined
}

export interface MediaPart {
  readonly type: 'media'
  readonly filename: string
  /** Caption or description from the summarizer */
  readonly content?: string | undefined
}

export type SummaryPart = TextPart | KeyMessagePart | MediaPart

export interface SentimentBucket {
  readonly sentiment: string
  readonly count: number
}

export interface DroppedPart {
  readonly index: number
  readonly reason: string
}

export interface SummaryResult {
  readonly parts: readonly SummaryPart[]
  readonly bulletPoints: readonly string[]
  readonly sentiments?: readonly SentimentBucket[] | undefined
  /** Parts discarded during validation */
  readonly dropped: readonly DroppedPart[]
}

export interface MediaSelection {
  /** Selected filenames, most recent first */
  readonly filenames: readonly string[]
  readonly images: readonly string[]
  readonly videos: readonly string[]
}

export interface DetailInstructions {
  readonly maxWords: number
  readonly keyMessages: { readonly min: number; readonly max: number }
  readonly mediaCallouts: { readonly min: number; readonly max: number }
}

export interface SummaryRequest {
  readonly detailLevel: DetailLevel
  readonly instructions: string
  readonly transcript: string
  readonly media: MediaSelection
  readonly responseSchema: Readonly<Record<string, unknown>>
}

export interface Attachment {
  readonly filename: string
  readonly kind: MediaKind
  readonly mimeType: string
  readonly data: Uint8Array
}
