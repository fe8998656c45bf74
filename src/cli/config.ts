/**
 * CLI Configuration
 *
 * Manages persistent settings stored in ~/.config/route-eta-bot/config.json (XDG standard).
 * Supports custom config file location via --config-file flag or ROUTE_ETA_BOT_CONFIG env var.
 *
 * Secrets never live here: the bot token comes from the environment only.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { isRecord } from '../labels'
import type { BotConfig } from '../types'

/**
 * All persistable settings.
 */
export interface Config {
  /** Nominatim search endpoint */
  nominatimUrl?: string | undefined
  /** OSRM route endpoint including the profile */
  osrmUrl?: string | undefined
  /** Directions page for result links */
  directionsUrl?: string | undefined
  /** Routing engine named in result links */
  directionsEngine?: string | undefined
  /** Search bounding box: left,bottom,right,top */
  viewbox?: string | undefined
  /** Comma-separated ISO country codes for search */
  countryCodes?: string | undefined
  /** Language of place names */
  acceptLanguage?: string | undefined
  /** User-Agent sent to Nominatim and OSRM */
  userAgent?: string | undefined
  /** Max places offered per search */
  resultLimit?: number | undefined
  /** Timeout for each request in ms */
  requestTimeoutMs?: number | undefined

  /** When settings were last updated */
  updatedAt?: string | undefined
}

/** Valid config keys for type-safe access */
export type ConfigKey = keyof Omit<Config, 'updatedAt'>

/** Config keys that accept string values */
const STRING_KEYS: ConfigKey[] = [
  'nominatimUrl',
  'osrmUrl',
  'directionsUrl',
  'directionsEngine',
  'viewbox',
  'countryCodes',
  'acceptLanguage',
  'userAgent'
]
/** Config keys that accept number values */
const NUMBER_KEYS: ConfigKey[] = ['resultLimit', 'requestTimeoutMs']

/** Defaults for every setting */
export const DEFAULT_SETTINGS = {
  nominatimUrl: 'https://nominatim.openstreetmap.org/search',
  osrmUrl: 'https://router.project-osrm.org/route/v1/driving',
  directionsUrl: 'https://www.openstreetmap.org/directions',
  directionsEngine: 'fossgis_osrm_car',
  viewbox: '106.3567007,10.1399458,107.0276712,11.1603083',
  countryCodes: 'vn',
  acceptLanguage: 'vi',
  userAgent: 'route-eta-bot/0.3 (https://github.com/route-eta-bot/route-eta-bot)',
  resultLimit: 3,
  requestTimeoutMs: 12_000
} satisfies Required<Omit<Config, 'updatedAt'>>

/** Descriptions for config keys (for help output) */
const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  nominatimUrl: `Nominatim search endpoint (default: ${DEFAULT_SETTINGS.nominatimUrl})`,
  osrmUrl: `OSRM route endpoint (default: ${DEFAULT_SETTINGS.osrmUrl})`,
  directionsUrl: `Directions page for result links (default: ${DEFAULT_SETTINGS.directionsUrl})`,
  directionsEngine: `Routing engine in result links (default: ${DEFAULT_SETTINGS.directionsEngine})`,
  viewbox: 'Search bounding box left,bottom,right,top (default: Ho Chi Minh City)',
  countryCodes: `Country codes for search (default: ${DEFAULT_SETTINGS.countryCodes})`,
  acceptLanguage: `Language of place names (default: ${DEFAULT_SETTINGS.acceptLanguage})`,
  userAgent: 'User-Agent for Nominatim and OSRM; include a contact address',
  resultLimit: `Max places offered per search (default: ${DEFAULT_SETTINGS.resultLimit})`,
  requestTimeoutMs: `Request timeout in ms (default: ${DEFAULT_SETTINGS.requestTimeoutMs})`
}

/**
 * Get the type of a config key (derived from key arrays).
 */
export function getConfigType(key: ConfigKey): string {
  if (NUMBER_KEYS.includes(key)) return 'number'
  return 'string'
}

/**
 * Get the description of a config key.
 */
export function getConfigDescription(key: ConfigKey): string {
  return CONFIG_DESCRIPTIONS[key]
}

function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'route-eta-bot')
}

/**
 * Get the config file path.
 * Priority: configFile arg > ROUTE_ETA_BOT_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  if (process.env.ROUTE_ETA_BOT_CONFIG) {
    return process.env.ROUTE_ETA_BOT_CONFIG
  }
  return join(getDefaultConfigDir(), 'config.json')
}

/**
 * Keep the known keys whose values have the right type.
 */
export function parseConfig(data: unknown): Config {
  if (!isRecord(data)) {
    return {}
  }
  const config: Config = {}
  for (const key of STRING_KEYS) {
    const value = data[key]
    if (typeof value === 'string') {
      Object.assign(config, { [key]: value })
    }
  }
  for (const key of NUMBER_KEYS) {
    const value = data[key]
    if (typeof value === 'number' && Number.isFinite(value)) {
      Object.assign(config, { [key]: value })
    }
  }
  if (typeof data.updatedAt === 'string') {
    config.updatedAt = data.updatedAt
  }
  return config
}

/**
 * Load config from the config file.
 * Returns null if file doesn't exist or can't be parsed.
 */
export async function loadConfig(configFile?: string): Promise<Config | null> {
  const path = getConfigPath(configFile)
  if (!existsSync(path)) {
    return null
  }
  try {
    const content = await readFile(path, 'utf-8')
    return parseConfig(JSON.parse(content))
  } catch {
    return null
  }
}

/**
 * Save config to the config file.
 * Creates parent directories if needed.
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
 * Parse a string value into the appropriate type for a config key.
 *
 * @throws Error for a number key whose value is not a positive integer
 */
export function parseConfigValue(key: ConfigKey, value: string): string | number {
  if (NUMBER_KEYS.includes(key)) {
    const parsed = Number.parseInt(value, 10)
    if (!/^\d+$/.test(value.trim()) || parsed <= 0) {
      throw new Error(`Invalid value for ${key}: ${value} (expected a positive integer)`)
    }
    return parsed
  }
  return value
}

/**
 * Format a config value for display.
 */
export function formatConfigValue(value: unknown): string {
  return String(value)
}

/**
 * Check if a string is a valid config key.
 */
export function isValidConfigKey(key: string): key is ConfigKey {
  return getValidConfigKeys().some((valid) => valid === key)
}

/**
 * Get all valid config keys (sorted alphabetically).
 */
export function getValidConfigKeys(): ConfigKey[] {
  return [...STRING_KEYS, ...NUMBER_KEYS].sort()
}

/** One setting as the bot will run with it */
export interface SettingEntry {
  key: ConfigKey
  value: string | number
  source: 'file' | 'default'
}

/**
 * Effective value of every setting, marking which come from the file.
 */
export function describeSettings(config: Config | null): SettingEntry[] {
  return getValidConfigKeys().map((key): SettingEntry => {
    const value = config?.[key]
    if (value === undefined) {
      return { key, value: DEFAULT_SETTINGS[key], source: 'default' }
    }
    return { key, value, source: 'file' }
  })
}

/**
 * Set a single config value and save.
 */
export async function setConfigValue(
  key: ConfigKey,
  value: string | number,
  configFile?: string
): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  await saveConfig(parseConfig({ ...config, [key]: value }), configFile)
}

/**
 * Unset (remove) a config value and save.
 */
export async function unsetConfigValue(key: ConfigKey, configFile?: string): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  delete config[key]
  await saveConfig(config, configFile)
}

/**
 * Merge defaults with file settings into the runtime config.
 * The bot token is read from `env.BOT_TOKEN` only.
 */
export function resolveBotConfig(
  settings: Config | null,
  env: Readonly<Record<string, string | undefined>>
): BotConfig {
  const file = parseConfig(settings ?? {})
  const botToken = env.BOT_TOKEN?.trim()
  const userAgent = file.userAgent ?? DEFAULT_SETTINGS.userAgent
  const timeoutMs = file.requestTimeoutMs ?? DEFAULT_SETTINGS.requestTimeoutMs

  return {
    botToken: botToken || undefined,
    geocoder: {
      url: file.nominatimUrl ?? DEFAULT_SETTINGS.nominatimUrl,
      viewbox: file.viewbox ?? DEFAULT_SETTINGS.viewbox,
      countryCodes: file.countryCodes ?? DEFAULT_SETTINGS.countryCodes,
      acceptLanguage: file.acceptLanguage ?? DEFAULT_SETTINGS.acceptLanguage,
      limit: file.resultLimit ?? DEFAULT_SETTINGS.resultLimit,
      userAgent,
      timeoutMs
    },
    router: {
      url: file.osrmUrl ?? DEFAULT_SETTINGS.osrmUrl,
      userAgent,
      timeoutMs
    },
    mapLink: {
      url: file.directionsUrl ?? DEFAULT_SETTINGS.directionsUrl,
      engine: file.directionsEngine ?? DEFAULT_SETTINGS.directionsEngine
    }
  }
}
