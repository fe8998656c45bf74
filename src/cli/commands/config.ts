/**
 * Config Command
 *
 * Shows the settings the bot runs with and edits the settings file.
 * `list` prints every key with its effective value, so defaults are visible too.
 */

import type { CLIArgs } from '../args'
import {
  type ConfigKey,
  DEFAULT_SETTINGS,
  describeSettings,
  formatConfigValue,
  getConfigPath,
  getValidConfigKeys,
  isValidConfigKey,
  loadConfig,
  parseConfigValue,
  setConfigValue,
  unsetConfigValue
} from '../config'
import type { Logger } from '../logger'

type Env = Readonly<Record<string, string | undefined>>

export async function cmdConfig(
  args: CLIArgs,
  logger: Logger,
  env: Env = process.env
): Promise<void> {
  const configFile = args.configFile

  switch (args.configAction) {
    case 'list':
      await listConfig(configFile, env, logger)
      break
    case 'set':
      await setConfig(args.configKey, args.configValue, configFile, logger)
      break
    case 'unset':
      await unsetConfig(args.configKey, configFile, logger)
      break
  }
}

async function listConfig(configFile: string | undefined, env: Env, logger: Logger): Promise<void> {
  const config = await loadConfig(configFile)
  const path = getConfigPath(configFile)

  logger.log(`\nConfig file: ${path}${config ? '' : ' (not found, using defaults)'}\n`)

  const entries = describeSettings(config)
  const width = Math.max(...entries.map((entry) => entry.key.length))
  for (const entry of entries) {
    const marker = entry.source === 'default' ? '  (default)' : ''
    logger.log(`  ${entry.key.padEnd(width)}  ${formatConfigValue(entry.value)}${marker}`)
  }

  // The token itself is never printed
  logger.log(`\n  BOT_TOKEN ${env.BOT_TOKEN?.trim() ? 'is set' : 'is not set'} (environment only)`)
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
  const usage = 'route-eta-bot config set <key> <value>'
  const validKey = validateConfigKey(key, usage)
  if (value === undefined) {
    throw new Error(`Missing value. Usage: ${usage}`)
  }
  const parsedValue = parseConfigValue(validKey, value)
  await setConfigValue(validKey, parsedValue, configFile)
  logger.log(
    `Set ${validKey}=${formatConfigValue(parsedValue)} (default: ${formatConfigValue(DEFAULT_SETTINGS[validKey])})`
  )
}

async function unsetConfig(
  key: string | undefined,
  configFile: string | undefined,
  logger: Logger
): Promise<void> {
  const validKey = validateConfigKey(key, 'route-eta-bot config unset <key>')
  await unsetConfigValue(validKey, configFile)
  logger.log(`Unset ${validKey} (now ${formatConfigValue(DEFAULT_SETTINGS[validKey])}, the default)`)
}
