/**
 * Effective Settings
 *
 * Merges CLI flags, the config file and built-in defaults, in that order of
 * precedence, and validates the result.
 */

import {
  DEFAULT_COOLDOWN_MS,
  DEFAULT_MEDIA_BUDGET,
  DEFAULT_MODEL,
  DEFAULT_TIMEOUT_MS,
  type DetailLevel,
  isDetailLevel,
  parseTimeWindow,
  TIME_WINDOWS,
  type TimeWindow
} from '../index'
import type { CLIArgs } from './args'
import type { Config } from './config'

export const DEFAULT_TIME_WINDOW: TimeWindow = 'last-7d'
export const DEFAULT_DETAIL_LEVEL: DetailLevel = 'standard'

export interface SummarySettings {
  readonly timeWindow: TimeWindow
  readonly detailLevel: DetailLevel
  readonly mediaBudget: number
  readonly includeMedia: boolean
  readonly model: string
  readonly timeoutMs: number
  readonly cooldownMs: number
}

type SettingsArgs = Pick<
  CLIArgs,
  'timeWindow' | 'detailLevel' | 'mediaBudget' | 'includeMedia' | 'model'
>

export function resolveTimeWindow(value: string | undefined): TimeWindow {
  const raw = value ?? DEFAULT_TIME_WINDOW
  const window = parseTimeWindow(raw)
  if (!window) {
    throw new Error(`Unknown time window "${raw}". Valid: ${TIME_WINDOWS.join(', ')}`)
  }
  return window
}

function resolveDetailLevel(value: string | undefined): DetailLevel {
  const raw = (value ?? DEFAULT_DETAIL_LEVEL).toLowerCase()
  if (!isDetailLevel(raw)) {
    throw new Error(`Unknown detail level "${raw}". Valid: brief, standard, verbose`)
  }
  return raw
}

function resolveMediaBudget(value: number | undefined): number {
  const budget = value ?? DEFAULT_MEDIA_BUDGET
  if (!Number.isInteger(budget) || budget < 0) {
    throw new Error('Media budget must be a non-negative integer')
  }
  return budget
}

function resolveTimeoutMs(seconds: number | undefined): number {
  if (seconds === undefined) return DEFAULT_TIMEOUT_MS
  if (!Number.isInteger(seconds) || seconds < 1) {
    throw new Error('Timeout must be at least 1 second')
  }
  return seconds * 1000
}

/**
 * Resolve the settings for one summarize run.
 * Throws on values no component accepts.
 */
export function resolveSummarySettings(args: SettingsArgs, config: Config | null): SummarySettings {
  return {
    timeWindow: resolveTimeWindow(args.timeWindow ?? config?.timeWindow),
    detailLevel: resolveDetailLevel(args.detailLevel ?? config?.detailLevel),
    mediaBudget: resolveMediaBudget(args.mediaBudget ?? config?.mediaBudget),
    includeMedia: args.includeMedia ?? config?.includeMedia ?? true,
    model: args.model ?? config?.model ?? DEFAULT_MODEL,
    timeoutMs: resolveTimeoutMs(config?.timeoutSeconds),
    cooldownMs:
      config?.cooldownSeconds !== undefined ? config.cooldownSeconds * 1000 : DEFAULT_COOLDOWN_MS
  }
}

/**
 * Gemini API key from the environment.
 */
export function resolveApiKey(env: NodeJS.ProcessEnv = process.env): string | null {
  return env.GEMINI_API_KEY || env.GOOGLE_AI_API_KEY || null
}
