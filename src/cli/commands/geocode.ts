/**
 * Geocode Command
 *
 * Runs one place search and prints the labels the bot would offer.
 */

import { geocodeCandidates } from '../../geocoder'
import type { CLIArgs } from '../args'
import { initCommand } from '../helpers'
import type { Logger } from '../logger'

export async function cmdGeocode(args: CLIArgs, logger: Logger): Promise<void> {
  const config = await initCommand('Geocode', args, logger)
  const query = args.inputs.join(' ').trim()
  if (!query) {
    logger.error('Missing query. Usage: route-eta-bot geocode <query...>')
    process.exit(1)
  }

  logger.verbose(`🔍 Searching "${query}" (limit ${config.geocoder.limit})`)
  const result = await geocodeCandidates(query, config.geocoder)
  if (!result.ok) {
    logger.error(`Geocoding failed (${result.error.type}): ${result.error.message}`)
    process.exit(1)
  }

  const candidates = result.value
  if (args.json) {
    console.log(JSON.stringify(candidates, null, 2))
    return
  }

  if (candidates.length === 0) {
    logger.log('\nNo places found.')
    return
  }

  logger.log(`\n📍 ${candidates.length} place${candidates.length === 1 ? '' : 's'}:`)
  for (const [index, candidate] of candidates.entries()) {
    logger.log(`   ${index + 1}. ${candidate.label}`)
    logger.log(`      ${candidate.latitude},${candidate.longitude}`)
    logger.verbose(`      ${candidate.fullName}`)
  }
}
