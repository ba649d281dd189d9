/**
 * Config Command
 *
 * Manage persistent CLI settings stored in ~/.config/chat-digest/config.json.
 * Supports list, set, and unset operations.
 */

import type { CLIArgs } from '../args'
import {
  type ConfigKey,
  formatConfigValue,
  getConfigMinimum,
  getConfigPath,
  getValidConfigKeys,
  isValidConfigKey,
  loadConfig,
  parseConfigValue,
  setConfigValue,
  unsetConfigValue
} from '../config'
import type { Logger } from '../logger'

export async function cmdConfig(args: CLIArgs, logger: Logger): Promise<void> {
  const configFile = args.configFile

  switch (args.configAction) {
    case 'list':
      await listConfig(configFile, logger)
      break
    case 'set':
      await setConfig(args.configKey, args.configValue, configFile, logger)
      break
    case 'unset':
      await unsetConfig(args.configKey, configFile, logger)
      break
  }
}

async function listConfig(configFile: string | undefined, logger: Logger): Promise<void> {
  const config = await loadConfig(configFile)

  logger.log(`\nConfig file: ${getConfigPath(configFile)}\n`)

  const setKeys = getValidConfigKeys().filter((key) => config?.[key] !== undefined)
  if (setKeys.length === 0) {
    logger.log('No settings configured. Run `chat-digest config --help` for available settings.')
    return
  }
  for (const key of setKeys) {
    logger.log(`  ${key}: ${formatConfigValue(config?.[key])}`)
  }
}

function validateConfigKey(key: string | undefined, usage: string): ConfigKey {
  if (!key) {
    throw new Error(`Missing key. Usage: ${usage}`)
  }
  if (!isValidConfigKey(key)) {
    throw new Error(`Invalid key: ${key}. Valid keys: ${getValidConfigKeys().join(', ')}`)
  }
  return key
}

async function setConfig(
  key: string | undefined,
  value: string | undefined,
  configFile: string | undefined,
  logger: Logger
): Promise<void> {
  const usage = 'chat-digest config set <key> <value>'
  const validKey = validateConfigKey(key, usage)
  if (value === undefined) {
    throw new Error(`Missing value. Usage: ${usage}`)
  }
  const parsedValue = parseConfigValue(validKey, value)
  if (parsedValue === null) {
    const minimum = getConfigMinimum(validKey)
    throw new Error(`Invalid value for ${validKey}: ${value} (expected an integer >= ${minimum})`)
  }
  await setConfigValue(validKey, parsedValue, configFile)
  logger.success(`Set ${validKey}=${formatConfigValue(parsedValue)}`)
}

async function unsetConfig(
  key: string | undefined,
  configFile: string | undefined,
  logger: Logger
): Promise<void> {
  const validKey = validateConfigKey(key, 'chat-digest config unset <key>')
  await unsetConfigValue(validKey, configFile)
  logger.success(`Unset ${validKey}`)
}
