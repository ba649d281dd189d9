/**
 * Time-Range Filter
 *
 * Selects messages newer than a wall-clock cutoff relative to "now".
 */

import type { ChatMessage, TimeWindow } from '../types'

const HOUR_MS = 60 * 60 * 1000

const WINDOW_DURATIONS: Record<Exclude<TimeWindow, 'all-time'>, number> = {
  'last-24h': 24 * HOUR_MS,
  'last-7d': 7 * 24 * HOUR_MS,
  'last-30d': 30 * 24 * HOUR_MS
}

export const TIME_WINDOWS: readonly TimeWindow[] = ['last-24h', 'last-7d', 'last-30d', 'all-time']

/** Display labels accepted as aliases for window ids */
export const TIME_WINDOW_LABELS: Readonly<Record<TimeWindow, string>> = {
  'last-24h': 'Last 24 hours',
  'last-7d': 'Last 7 days',
  'last-30d': 'Last 30 days',
  'all-time': 'All time'
}

/**
 * Resolve a window id or display label. Returns null for anything else.
 */
export function parseTimeWindow(value: string): TimeWindow | null {
  const normalized = value.trim().toLowerCase()
  return (
    TIME_WINDOWS.find(
      (window) => normalized === window || normalized === TIME_WINDOW_LABELS[window].toLowerCase()
    ) ?? null
  )
}

/**
 * Keep messages with `timestamp >= now - window`, preserving order.
 * `all-time` returns the input unchanged; an unrecognized window returns [].
 */
export function filterByTimeWindow(
  messages: readonly ChatMessage[],
  window: string,
  now: Date = new Date()
): readonly ChatMessage[] {
  const resolved = parseTimeWindow(window)
  if (resolved === null) return []
  if (resolved === 'all-time') return messages

  const cutoff = now.getTime() - WINDOW_DURATIONS[resolved]
  return messages.filter((message) => message.timestamp.getTime() >= cutoff)
}
