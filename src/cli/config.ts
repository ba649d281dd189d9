/**
 * CLI Configuration
 *
 * Persistent settings stored in ~/.config/chat-digest/config.json (XDG standard).
 * Supports a custom location via the --config-file flag or CHAT_DIGEST_CONFIG.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'

/**
 * All persistable CLI settings.
 */
export interface Config {
  /** Gemini model name (e.g. "gemini-2.0-flash") */
  model?: string | undefined
  /** Default detail level: brief, standard, verbose */
  detailLevel?: string | undefined
  /** Max media files attached to a summary request */
  mediaBudget?: number | undefined
  /** Default time window (e.g. "last-7d") */
  timeWindow?: string | undefined
  /** Attach images and video stills to summary requests */
  includeMedia?: boolean | undefined
  /** Summarizer request timeout in seconds */
  timeoutSeconds?: number | undefined
  /** Pause after each summary before another may start, in seconds */
  cooldownSeconds?: number | undefined

  /** When settings were last updated */
  updatedAt?: string | undefined
}

/** Valid config keys for type-safe access */
export type ConfigKey = keyof Omit<Config, 'updatedAt'>

export type ConfigValue = string | boolean | number

const STRING_KEYS: readonly ConfigKey[] = ['model', 'detailLevel', 'timeWindow']
const BOOLEAN_KEYS: readonly ConfigKey[] = ['includeMedia']
const NUMBER_KEYS: readonly ConfigKey[] = ['mediaBudget', 'timeoutSeconds', 'cooldownSeconds']

/** Smallest accepted value per numeric key */
const NUMBER_MINIMUMS: Readonly<Partial<Record<ConfigKey, number>>> = { timeoutSeconds: 1 }

export function getConfigMinimum(key: ConfigKey): number {
  return NUMBER_MINIMUMS[key] ?? 0
}

const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  model: 'Gemini model name (default: gemini-2.0-flash)',
  detailLevel: 'Summary detail: brief, standard, verbose (default: standard)',
  mediaBudget: 'Max media files sent per summary (default: 15)',
  timeWindow: 'Time window: last-24h, last-7d, last-30d, all-time (default: last-7d)',
  includeMedia: 'Attach images and video stills to summaries (default: true)',
  timeoutSeconds: 'Summarizer request timeout in seconds (default: 120)',
  cooldownSeconds: 'Pause between summaries in seconds (default: 10)'
}

/**
 * Get the type of a config key, as shown in CLI help.
 */
export function getConfigType(key: ConfigKey): string {
  if (BOOLEAN_KEYS.includes(key)) return 'boolean'
  if (NUMBER_KEYS.includes(key)) return 'number'
  return 'string'
}

export function getConfigDescription(key: ConfigKey): string {
  return CONFIG_DESCRIPTIONS[key]
}

function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'chat-digest')
}

/**
 * Get the config file path.
 * Priority: configFile arg > CHAT_DIGEST_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  if (process.env.CHAT_DIGEST_CONFIG) {
    return process.env.CHAT_DIGEST_CONFIG
  }
  return join(getDefaultConfigDir(), 'config.json')
}

function isRecord(val: unknown): val is Record<string, unknown> {
  return typeof val === 'object' && val !== null && !Array.isArray(val)
}

/**
 * Keep only known keys whose stored value has the right type.
 */
function toConfig(raw: Record<string, unknown>): Config {
  const config: Config = {}
  for (const key of getValidConfigKeys()) {
    const value = raw[key]
    const expected = getConfigType(key)
    if (typeof value === expected) {
      Object.assign(config, { [key]: value })
    }
  }
  if (typeof raw.updatedAt === 'string') {
    config.updatedAt = raw.updatedAt
  }
  return config
}

/**
 * Load config from the config file.
 * Returns null if the file doesn't exist or can't be parsed.
 */
export async function loadConfig(configFile?: string): Promise<Config | null> {
  const path = getConfigPath(configFile)
  if (!existsSync(path)) {
    return null
  }
  try {
    const parsed: unknown = JSON.parse(await readFile(path, 'utf-8'))
    return isRecord(parsed) ? toConfig(parsed) : null
  } catch {
    return null
  }
}

/**
 * Save config, creating parent directories if needed.
 */
export async function saveConfig(config: Config, configFile?: string): Promise<void> {
  const path = getConfigPath(configFile)
  await mkdir(dirname(path), { recursive: true })
  const withTimestamp: Config = {
    ...config,
    updatedAt: new Date().toISOString()
  }
  await writeFile(path, JSON.stringify(withTimestamp, null, 2))
}

/**
 * Parse a string value into the type a config key stores.
 * Returns null for numbers that don't parse to an integer at or above the
 * key's minimum (0, or 1 for timeoutSeconds).
 */
export function parseConfigValue(key: ConfigKey, value: string): ConfigValue | null {
  if (BOOLEAN_KEYS.includes(key)) {
    return value === 'true' || value === '1' || value === 'yes'
  }
  if (NUMBER_KEYS.includes(key)) {
    const num = Number.parseInt(value, 10)
    return Number.isInteger(num) && num >= getConfigMinimum(key) ? num : null
  }
  return value
}

export function formatConfigValue(value: unknown): string {
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false'
  }
  return String(value)
}

export function isValidConfigKey(key: string): key is ConfigKey {
  return getValidConfigKeys().some((k) => k === key)
}

/**
 * Get all valid config keys (sorted alphabetically).
 */
export function getValidConfigKeys(): ConfigKey[] {
  return [...STRING_KEYS, ...BOOLEAN_KEYS, ...NUMBER_KEYS].sort()
}

export async function setConfigValue(
  key: ConfigKey,
  value: ConfigValue,
  configFile?: string
): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  Object.assign(config, { [key]: value })
  await saveConfig(config, configFile)
}

export async function unsetConfigValue(key: ConfigKey, configFile?: string): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  delete config[key]
  await saveConfig(config, configFile)
}
