/**
 * CLI Helpers
 *
 * Shared utilities for CLI commands.
 */

import { parseCoordinate } from '../candidates'
import type { BotConfig, LatLng } from '../types'
import { VERSION } from '../version'
import type { CLIArgs } from './args'
import { loadConfig, resolveBotConfig } from './config'
import type { Logger } from './logger'

// ============================================================================
// Formatting
// ============================================================================

export function formatKilometers(distanceMeters: number): string {
  return `${(distanceMeters / 1000).toFixed(1)} km`
}

export function formatMinutes(durationSeconds: number): string {
  return `${Math.round(durationSeconds / 60)} min`
}

// ============================================================================
// Input
// ============================================================================

/**
 * Parse a `lat,lon` pair. Returns null unless both parts are decimal numbers
 * inside the valid latitude and longitude ranges.
 */
export function parseLatLng(text: string): LatLng | null {
  const parts = text.split(',')
  if (parts.length !== 2) {
    return null
  }
  const latitude = parseCoordinate(parts[0])
  const longitude = parseCoordinate(parts[1])
  if (latitude === null || longitude === null) {
    return null
  }
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) {
    return null
  }
  return { latitude, longitude }
}

// ============================================================================
// Command Initialization
// ============================================================================

/**
 * Initialize a command: log header, then resolve settings and environment.
 * The header is skipped for JSON output so stdout stays parseable.
 */
export async function initCommand(
  commandName: string,
  args: CLIArgs,
  logger: Logger
): Promise<BotConfig> {
  if (!args.json) {
    logger.log(`\nroute-eta-bot ${commandName} v${VERSION}`)
  }
  const settings = await loadConfig(args.configFile)
  return resolveBotConfig(settings, process.env)
}
