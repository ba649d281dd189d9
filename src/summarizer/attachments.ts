/**
 * Attachment Loading
 *
 * Reads the selected media out of the archive: image bytes as-is, one sampled
 * still per video. Entries that cannot be loaded are skipped, not fatal.
 */

import { getImageMimeType, readArchiveEntry } from '../archive'
import { sampleVideoFrame } from '../media'
import type { Attachment, MediaSelection } from '../types'

export interface SkippedAttachment {
  readonly filename: string
  readonly reason: string
}

export interface ResolvedAttachments {
  /** In selection order (most recent first) */
  readonly attachments: readonly Attachment[]
  readonly skipped: readonly SkippedAttachment[]
}

export interface ResolveAttachmentsOptions {
  /** Directory for transient video extraction */
  readonly tempDir?: string | undefined
}

type LoadOutcome = { readonly attachment: Attachment } | { readonly skipped: SkippedAttachment }

async function loadImage(archivePath: string, filename: string): Promise<LoadOutcome> {
  const mimeType = getImageMimeType(filename)
  if (!mimeType) {
    return { skipped: { filename, reason: 'unsupported image type' } }
  }

  const data = await readArchiveEntry(archivePath, filename)
  if (!data) {
    return { skipped: { filename, reason: 'entry could not be read' } }
  }

  return { attachment: { filename, kind: 'image', mimeType, data } }
}

async function loadVideoStill(
  archivePath: string,
  filename: string,
  tempDir: string | undefined
): Promise<LoadOutcome> {
  const still = await sampleVideoFrame(archivePath, filename, { intent: 'full', tempDir })
  if (!still) {
    return { skipped: { filename, reason: 'no frame available' } }
  }

  return { attachment: { filename, kind: 'video', mimeType: still.mimeType, data: still.data } }
}

/**
 * Load every selected attachment. Each load reopens the archive independently.
 */
export async function resolveAttachments(
  archivePath: string,
  selection: MediaSelection,
  options: ResolveAttachmentsOptions = {}
): Promise<ResolvedAttachments> {
  const videos = new Set(selection.videos)

  const outcomes = await Promise.all(
    selection.filenames.map((filename) =>
      videos.has(filename)
        ? loadVideoStill(archivePath, filename, options.tempDir)
        : loadImage(archivePath, filename)
    )
  )

  const attachments: Attachment[] = []
  const skipped: SkippedAttachment[] = []
  for (const outcome of outcomes) {
    if ('attachment' in outcome) {
      attachments.push(outcome.attachment)
    } else {
      skipped.push(outcome.skipped)
    }
  }

  return { attachments, skipped }
}
