import { describe, expect, it } from 'vitest'
import { createMessage } from '../test-support'
import { filterByTimeWindow, parseTimeWindow, TIME_WINDOWS } from './filter'

const HOUR_MS = 60 * 60 * 1000
const NOW = new Date(2024, 0, 10, 12, 0)

function hoursAgo(hours: number): Date {
  return new Date(NOW.getTime() - hours * HOUR_MS)
}

const messages = [
  createMessage({ id: 0, timestamp: hoursAgo(24 * 40), body: 'old' }),
  createMessage({ id: 1, timestamp: hoursAgo(24 * 10), body: 'ten days' }),
  createMessage({ id: 2, timestamp: hoursAgo(25), body: 'yesterday-ish' }),
  createMessage({ id: 3, timestamp: hoursAgo(24), body: 'boundary' }),
  createMessage({ id: 4, timestamp: hoursAgo(1), body: 'recent' })
]

describe('Time-Range Filter', () => {
  describe('parseTimeWindow', () => {
    it('accepts window ids', () => {
      for (const window of TIME_WINDOWS) {
        expect(parseTimeWindow(window)).toBe(window)
      }
    })

    it('accepts display labels case-insensitively', () => {
      expect(parseTimeWindow('Last 24 hours')).toBe('last-24h')
      expect(parseTimeWindow('last 7 days')).toBe('last-7d')
      expect(parseTimeWindow(' ALL TIME ')).toBe('all-time')
    })

    it('returns null for unknown windows', () => {
      expect(parseTimeWindow('last-year')).toBeNull()
      expect(parseTimeWindow('')).toBeNull()
    })
  })

  describe('filterByTimeWindow', () => {
    it('keeps messages inside the last 24 hours, including the boundary', () => {
      const result = filterByTimeWindow(messages, 'last-24h', NOW)

      expect(result.map((m) => m.id)).toEqual([3, 4])
    })

    it('applies 7 and 30 day windows', () => {
      expect(filterByTimeWindow(messages, 'last-7d', NOW).map((m) => m.id)).toEqual([2, 3, 4])
      expect(filterByTimeWindow(messages, 'Last 30 days', NOW).map((m) => m.id)).toEqual([
        1, 2, 3, 4
      ])
    })

    it('returns the input unchanged for all-time', () => {
      expect(filterByTimeWindow(messages, 'all-time', NOW)).toBe(messages)
    })

    it('returns an empty list for an unknown window', () => {
      expect(filterByTimeWindow(messages, 'fortnight', NOW)).toEqual([])
    })

    it('never grows as the window narrows', () => {
      const sizes = ['all-time', 'last-30d', 'last-7d', 'last-24h'].map(
        (window) => filterByTimeWindow(messages, window, NOW).length
      )

      expect(sizes).toEqual([5, 4, 3, 2])
    })

    it('preserves transcript order when timestamps are out of order', () => {
      const shuffled = [messages[4], messages[2], messages[3]].flatMap((m) => (m ? [m] : []))

      expect(filterByTimeWindow(shuffled, 'last-7d', NOW).map((m) => m.id)).toEqual([4, 2, 3])
    })
  })
})
