/**
 * Media Selection
 *
 * Picks which attachments accompany a summary request: most recent first,
 * one per filename, at most `budget` of them.
 */

import { type ChatMessage, getMediaRef, type MediaSelection } from '../types'

export const DEFAULT_MEDIA_BUDGET = 15

export function selectMedia(
  messages: readonly ChatMessage[],
  budget: number = DEFAULT_MEDIA_BUDGET
): MediaSelection {
  // Newest timestamp first; on equal timestamps the later message wins
  const newestFirst = messages
    .map((message, index) => ({ message, index }))
    .filter(({ message }) => getMediaRef(message) !== undefined)
    .sort(
      (a, b) => b.message.timestamp.getTime() - a.message.timestamp.getTime() || b.index - a.index
    )

  const filenames: string[] = []
  const images: string[] = []
  const videos: string[] = []
  const seen = new Set<string>()

  for (const { message } of newestFirst) {
    if (filenames.length >= budget) break

    const filename = getMediaRef(message)
    if (filename === undefined || seen.has(filename)) continue
    seen.add(filename)

    filenames.push(filename)
    if (message.imageRef) {
      images.push(filename)
    } else {
      videos.push(filename)
    }
  }

  return { filenames, images, videos }
}
