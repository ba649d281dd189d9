/**
 * Summary Session
 *
 * Explicit context object for one loaded archive: owns the timeline, the last
 * summary, the single in-flight summarization cycle and the cooldown after it.
 *
 * Cycle: idle → building → awaiting → (rendering | error) → cooldown → idle
 *
 * A cycle reads the timeline captured when it starts and hands back exactly one
 * SummaryOutcome; it never writes session state other than its own phase and,
 * on success, the last result.
 */

import { analyzeParticipants, type ParticipantAnalytics } from '../analytics'
import { openArchive } from '../archive'
import {
  buildSummaryRequest,
  describeSummarizerError,
  parseSummaryResponse,
  resolveAttachments,
  restrictRequestMedia,
  type SkippedAttachment,
  type Summarizer
} from '../summarizer'
import { buildTimeline, filterByTimeWindow, parseTimeWindow } from '../timeline'
import type { ApiError, DetailLevel, SummaryResult, Timeline } from '../types'

export type SessionState = 'idle' | 'building' | 'awaiting' | 'rendering' | 'error' | 'cooldown'

export const DEFAULT_COOLDOWN_MS = 10_000

export interface SessionOptions {
  readonly summarizer: Summarizer
  /** Fixed pause after every cycle before another may start */
  readonly cooldownMs?: number | undefined
  /** Clock in epoch milliseconds (default Date.now) */
  readonly now?: (() => number) | undefined
  /** Directory for transient video extraction */
  readonly tempDir?: string | undefined
  readonly onStateChange?: ((state: SessionState) => void) | undefined
}

export interface SummarizeOptions {
  /** Window id or display label, e.g. "last-7d" or "Last 7 days" */
  readonly timeWindow: string
  readonly detailLevel: DetailLevel
  readonly mediaBudget?: number | undefined
  readonly includeMedia?: boolean | undefined
  /** Aborts the external call; the cycle still ends in cooldown */
  readonly signal?: AbortSignal | undefined
}

export interface SummaryReport {
  readonly summary: SummaryResult
  readonly participants: ParticipantAnalytics
  /** Messages inside the time window */
  readonly messageCount: number
  /** Filenames sent with the request */
  readonly attached: readonly string[]
  readonly skipped: readonly SkippedAttachment[]
}

export type SummaryFailureKind =
  | 'no_archive'
  | 'busy'
  | 'invalid_window'
  | 'no_messages'
  | 'service'

export interface SummaryFailure {
  readonly kind: SummaryFailureKind
  /** User-facing explanation */
  readonly message: string
  /** Underlying service error, for verbose logs */
  readonly error?: ApiError | undefined
}

export type SummaryOutcome =
  | { readonly ok: true; readonly value: SummaryReport }
  | { readonly ok: false; readonly failure: SummaryFailure }

interface LoadedArchive {
  readonly path: string
  readonly timeline: Timeline
}

function fail(kind: SummaryFailureKind, message: string, error?: ApiError): SummaryOutcome {
  return { ok: false, failure: { kind, message, error } }
}

export class SummarySession {
  private readonly summarizer: Summarizer
  private readonly cooldownMs: number
  private readonly now: () => number
  private readonly tempDir: string | undefined
  private readonly onStateChange: ((state: SessionState) => void) | undefined

  private archive: LoadedArchive | null = null
  private lastReport: SummaryReport | null = null
  private phase: SessionState = 'idle'
  private cooldownUntil = 0

  constructor(options: SessionOptions) {
    this.summarizer = options.summarizer
    this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS
    this.now = options.now ?? Date.now
    this.tempDir = options.tempDir
    this.onStateChange = options.onStateChange
  }

  /** Current phase; cooldown lapses into idle once its window has passed */
  get state(): SessionState {
    if (this.phase === 'cooldown' && this.now() >= this.cooldownUntil) {
      this.phase = 'idle'
    }
    return this.phase
  }

  get timeline(): Timeline | null {
    return this.archive?.timeline ?? null
  }

  get archivePath(): string | null {
    return this.archive?.path ?? null
  }

  get lastSummary(): SummaryReport | null {
    return this.lastReport
  }

  /** Milliseconds until another cycle may start */
  get cooldownRemainingMs(): number {
    return this.state === 'cooldown' ? this.cooldownUntil - this.now() : 0
  }

  /**
   * Load an archive, replacing the current timeline wholesale. On failure the
   * session is cleared and the ArchiveError rethrown.
   */
  async loadArchive(path: string): Promise<Timeline> {
    try {
      const listing = await openArchive(path)
      const timeline = buildTimeline(listing)
      this.archive = { path, timeline }
      this.lastReport = null
      return timeline
    } catch (error) {
      this.archive = null
      this.lastReport = null
      throw error
    }
  }

  private transition(state: SessionState): void {
    this.phase = state
    this.onStateChange?.(state)
  }

  /**
   * Run one summarization cycle. Never throws: every failure inside the cycle
   * comes back as a failed outcome.
   */
  async summarize(options: SummarizeOptions): Promise<SummaryOutcome> {
    if (this.state !== 'idle') {
      const wait = Math.ceil(this.cooldownRemainingMs / 1000)
      return fail(
        'busy',
        wait > 0
          ? `Please wait ${wait}s before requesting another summary.`
          : 'A summary is already being generated.'
      )
    }

    const snapshot = this.archive
    if (!snapshot) {
      return fail('no_archive', 'Import a chat archive first.')
    }

    if (parseTimeWindow(options.timeWindow) === null) {
      return fail('invalid_window', `No messages: unknown time window "${options.timeWindow}".`)
    }

    this.transition('building')
    try {
      const outcome = await this.runCycle(snapshot, options)
      this.transition(outcome.ok ? 'rendering' : 'error')
      if (outcome.ok) {
        this.lastReport = outcome.value
      }
      return outcome
    } catch (error) {
      this.transition('error')
      const cause: ApiError = {
        type: 'network',
        message: error instanceof Error ? error.message : String(error)
      }
      return fail('service', describeSummarizerError(cause), cause)
    } finally {
      this.cooldownUntil = this.now() + this.cooldownMs
      this.transition('cooldown')
    }
  }

  private async runCycle(
    snapshot: LoadedArchive,
    options: SummarizeOptions
  ): Promise<SummaryOutcome> {
    const messages = filterByTimeWindow(
      snapshot.timeline.messages,
      options.timeWindow,
      new Date(this.now())
    )
    if (messages.length === 0) {
      return fail('no_messages', 'No messages found in the selected time frame.')
    }

    const draft = buildSummaryRequest(messages, {
      detailLevel: options.detailLevel,
      mediaBudget: options.mediaBudget,
      includeMedia: options.includeMedia
    })

    const { attachments, skipped } = await resolveAttachments(snapshot.path, draft.media, {
      tempDir: this.tempDir
    })
    const attached = attachments.map((a) => a.filename)
    const request = skipped.length > 0 ? restrictRequestMedia(draft, attached) : draft

    this.transition('awaiting')
    const reply = await this.summarizer.summarize(request, attachments, options.signal)
    if (!reply.ok) {
      return fail('service', describeSummarizerError(reply.error), reply.error)
    }

    return {
      ok: true,
      value: {
        summary: parseSummaryResponse(reply.value, attached),
        participants: analyzeParticipants(messages),
        messageCount: messages.length,
        attached,
        skipped
      }
    }
  }
}
