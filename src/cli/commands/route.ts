/**
 * Route Command
 *
 * Driving distance, duration and directions link between two coordinates.
 */

import { buildDirectionsLink } from '../../maplink'
import { planRoute } from '../../routing'
import type { RouteResult } from '../../types'
import type { CLIArgs } from '../args'
import { formatKilometers, formatMinutes, initCommand, parseLatLng } from '../helpers'
import type { Logger } from '../logger'

const USAGE = 'route-eta-bot route <lat,lon> <lat,lon>'

export async function cmdRoute(args: CLIArgs, logger: Logger): Promise<void> {
  const config = await initCommand('Route', args, logger)
  const [fromText = '', toText = ''] = args.inputs
  const from = parseLatLng(fromText)
  const to = parseLatLng(toText)
  if (!from || !to) {
    logger.error(`Invalid coordinates "${fromText}" "${toText}". Usage: ${USAGE}`)
    process.exit(1)
  }

  const estimate = await planRoute(from, to, config.router)
  if (!estimate.ok) {
    logger.error(`Routing failed (${estimate.error.type}): ${estimate.error.message}`)
    process.exit(1)
  }

  const route: RouteResult = {
    ...estimate.value,
    link: buildDirectionsLink(from, to, config.mapLink)
  }

  if (args.json) {
    console.log(JSON.stringify(route, null, 2))
    return
  }

  logger.log(`\n📐 ${formatKilometers(route.distanceMeters)}`)
  logger.log(`⏱️  ${formatMinutes(route.durationSeconds)}`)
  logger.log(`🗺️  ${route.link}`)
}
