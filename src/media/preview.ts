/**
 * Media Previews
 *
 * On-demand stills for any media filename in an archive.
 */

import { classifyMediaName, readArchiveEntry } from '../archive'
import { sampleVideoFrame } from './frame-sampler'
import { encodeStill, type StillImage, type StillIntent } from './still'

export interface PreviewOptions {
  readonly tempDir?: string | undefined
}

/**
 * Decode a still for an image or video entry.
 * Returns null when no preview can be produced.
 */
export async function loadMediaPreview(
  archivePath: string,
  filename: string,
  intent: StillIntent,
  options: PreviewOptions = {}
): Promise<StillImage | null> {
  const kind = classifyMediaName(filename)

  if (kind === 'video') {
    return sampleVideoFrame(archivePath, filename, { intent, tempDir: options.tempDir })
  }

  if (kind !== 'image') return null

  const bytes = await readArchiveEntry(archivePath, filename)
  if (!bytes) return null

  try {
    return await encodeStill(bytes, intent)
  } catch {
    return null
  }
}
