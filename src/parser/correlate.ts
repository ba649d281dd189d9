/**
 * Media Correlator
 *
 * Links messages whose first line names an attachment to the archive's media
 * entries. A body that only looks like a filename stays plain text.
 */

import { classifyMediaName } from '../archive'
import type { ChatMessage, ChatMessageDraft } from '../types'

/**
 * Assign ids and image/video references to parsed drafts.
 *
 * @param drafts Messages in transcript order
 * @param mediaNames Entry names verified to exist in the archive
 */
export function correlateMedia(
  drafts: readonly ChatMessageDraft[],
  mediaNames: Iterable<string>
): ChatMessage[] {
  const available = new Set(mediaNames)

  return drafts.map((draft, id) => {
    // Captions follow the attachment on continuation lines
    const candidate = (draft.body.split('\n')[0] ?? '').trim()
    const kind = classifyMediaName(candidate)

    if (kind === null || !available.has(candidate)) {
      return { ...draft, id }
    }

    return kind === 'image'
      ? { ...draft, id, imageRef: candidate }
      : { ...draft, id, videoRef: candidate }
  })
}
