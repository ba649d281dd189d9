import { describe, expect, it } from 'vitest'
import { resolveApiKey, resolveSummarySettings, resolveTimeWindow } from './settings'

const noArgs = {
  timeWindow: undefined,
  detailLevel: undefined,
  mediaBudget: undefined,
  includeMedia: undefined,
  model: undefined
}

describe('settings', () => {
  describe('resolveSummarySettings', () => {
    it('uses built-in defaults', () => {
      expect(resolveSummarySettings(noArgs, null)).toEqual({
        timeWindow: 'last-7d',
        detailLevel: 'standard',
        mediaBudget: 15,
        includeMedia: true,
        model: 'gemini-2.0-flash',
        timeoutMs: 120_000,
        cooldownMs: 10_000
      })
    })

    it('prefers config values over defaults', () => {
      const settings = resolveSummarySettings(noArgs, {
        timeWindow: 'Last 30 days',
        detailLevel: 'brief',
        mediaBudget: 4,
        includeMedia: false,
        model: 'gemini-1.5-pro',
        timeoutSeconds: 30,
        cooldownSeconds: 0
      })

      expect(settings).toEqual({
        timeWindow: 'last-30d',
        detailLevel: 'brief',
        mediaBudget: 4,
        includeMedia: false,
        model: 'gemini-1.5-pro',
        timeoutMs: 30_000,
        cooldownMs: 0
      })
    })

    it('prefers CLI flags over config', () => {
      const settings = resolveSummarySettings(
        {
          timeWindow: 'last-24h',
          detailLevel: 'VERBOSE',
          mediaBudget: 2,
          includeMedia: false,
          model: 'gemini-2.0-pro'
        },
        { timeWindow: 'all-time', detailLevel: 'brief', mediaBudget: 9, includeMedia: true }
      )

      expect(settings.timeWindow).toBe('last-24h')
      expect(settings.detailLevel).toBe('verbose')
      expect(settings.mediaBudget).toBe(2)
      expect(settings.includeMedia).toBe(false)
      expect(settings.model).toBe('gemini-2.0-pro')
    })

    it('rejects unknown values', () => {
      expect(() => resolveSummarySettings({ ...noArgs, detailLevel: 'epic' }, null)).toThrow(
        'Unknown detail level "epic". Valid: brief, standard, verbose'
      )
      expect(() => resolveSummarySettings({ ...noArgs, mediaBudget: Number.NaN }, null)).toThrow(
        'Media budget must be a non-negative integer'
      )
    })

    it('rejects a zero timeout from the config file', () => {
      expect(() => resolveSummarySettings(noArgs, { timeoutSeconds: 0 })).toThrow(
        'Timeout must be at least 1 second'
      )
      expect(resolveSummarySettings(noArgs, { timeoutSeconds: 1 }).timeoutMs).toBe(1000)
    })
  })

  describe('resolveTimeWindow', () => {
    it('defaults to the last 7 days', () => {
      expect(resolveTimeWindow(undefined)).toBe('last-7d')
    })

    it('rejects unknown windows', () => {
      expect(() => resolveTimeWindow('yesterday')).toThrow(
        'Unknown time window "yesterday". Valid: last-24h, last-7d, last-30d, all-time'
      )
    })
  })

  describe('resolveApiKey', () => {
    it('reads GEMINI_API_KEY first', () => {
      expect(resolveApiKey({ GEMINI_API_KEY: 'test-key', GOOGLE_AI_API_KEY: 'other' })).toBe(
        'test-key'
      )
    })

    it('falls back to GOOGLE_AI_API_KEY', () => {
      expect(resolveApiKey({ GOOGLE_AI_API_KEY: 'test-key' })).toBe('test-key')
    })

    it('returns null when unset', () => {
      expect(resolveApiKey({})).toBeNull()
    })
  })
})
