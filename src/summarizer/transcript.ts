/**
 * Transcript Rendering
 *
 * Flattens messages into the plain-text chat log sent to the summarizer.
 * Media messages get a placeholder, never the raw body.
 */

import type { ChatMessage } from '../types'

export const IMAGE_PLACEHOLDER = '[Image Sent]'

function pad(n: number): string {
  return String(n).padStart(2, '0')
}

/**
 * Format a timestamp as local `YYYY-MM-DD HH:MM`.
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  return `${day} ${pad(date.getHours())}:${pad(date.getMinutes())}`
}

function messageText(message: ChatMessage): string {
  if (message.imageRef) return IMAGE_PLACEHOLDER
  if (message.videoRef) return `[Video Sent: ${message.videoRef}]`
  return message.body
}

/**
 * Render one line per message: `[timestamp] author: text`.
 */
export function renderTranscript(messages: readonly ChatMessage[]): string {
  return messages
    .map((m) => `[${formatTimestamp(m.timestamp)}] ${m.author}: ${messageText(m)}`)
    .join('\n')
}
