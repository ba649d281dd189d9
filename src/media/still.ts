/**
 * Still Image Encoding
 *
 * Converts decoded frames and archive images into JPEG stills with sharp.
 */

import sharp from 'sharp'

export type StillIntent = 'thumbnail' | 'full'

/** Thumbnails fit inside a square of this size, preserving aspect ratio */
export const THUMBNAIL_SIZE = 256

export interface StillImage {
  readonly data: Buffer
  readonly mimeType: 'image/jpeg'
  readonly width: number
  readonly height: number
}

/**
 * Encode image bytes as a JPEG still: thumbnail-sized or full resolution.
 */
export async function encodeStill(input: Uint8Array, intent: StillIntent): Promise<StillImage> {
  const pipeline = sharp(input).rotate()
  const resized =
    intent === 'thumbnail'
      ? pipeline.resize(THUMBNAIL_SIZE, THUMBNAIL_SIZE, { fit: 'inside', withoutEnlargement: true })
      : pipeline

  const { data, info } = await resized
    .jpeg({ quality: intent === 'thumbnail' ? 80 : 90 })
    .toBuffer({ resolveWithObject: true })

  return { data, mimeType: 'image/jpeg', width: info.width, height: info.height }
}
