/**
 * Message Types
 *
 * Types for transcript parsing and the message timeline.
 */

export type MediaKind = 'image' | 'video'

/** Author assigned to lines that carry no sender (group events, encryption notices). */
export const SYSTEM_AUTHOR = 'System'

/**
 * A message as produced by the line parser, before media correlation.
 */
export interface ChatMessageDraft {
  readonly timestamp: Date
  readonly author: string
  readonly body: string
  /** Name of the transcript format that matched the line */
  readonly format: string
}

export interface ChatMessage extends ChatMessageDraft {
  /** Insertion index in the transcript (0-based) */
  readonly id: number
  /** Archive entry name, set only when the entry exists and is an image */
  readonly imageRef?: string | undefined
  /** Archive entry name, set only when the entry exists and is a video */
  readonly videoRef?: string | undefined
}

export interface Timeline {
  /** Messages in transcript order (not re-sorted) */
  readonly messages: readonly ChatMessage[]
  /** Every image entry in the archive, referenced or not */
  readonly imageFilenames: ReadonlySet<string>
  /** Every video entry in the archive, referenced or not */
  readonly videoFilenames: ReadonlySet<string>
  readonly transcriptName: string
}

export interface TimelineStats {
  readonly messageCount: number
  readonly authors: readonly string[]
  readonly dateRange: {
    readonly start: Date
    readonly end: Date
  } | null
  readonly imageCount: number
  readonly videoCount: number
  /** Messages carrying an image or video reference */
  readonly attachedMediaCount: number
}

/** Returns the media filename a message carries, if any. */
export function getMediaRef(message: ChatMessage): string | undefined {
  return message.imageRef ?? message.videoRef
}
