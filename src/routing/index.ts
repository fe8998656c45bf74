/**
 * Routing Module
 *
 * Driving distance and duration between two points from OSRM.
 */

import { emptyResponseError, handleHttpError, handleNetworkError, httpFetch } from '../http'
import { isRecord } from '../labels'
import type { LatLng, Result, RouteEstimate, RouterConfig } from '../types'

/**
 * Build the OSRM route URL. OSRM takes coordinates as `lon,lat`.
 */
export function buildRouteUrl(from: LatLng, to: LatLng, config: RouterConfig): string {
  const coords = `${from.longitude},${from.latitude};${to.longitude},${to.latitude}`
  return `${config.url}/${coords}?overview=false`
}

function readFinite(source: Readonly<Record<string, unknown>>, key: string): number | null {
  const value = source[key]
  return typeof value === 'number' && Number.isFinite(value) ? value : null
}

/**
 * Extract the first route's distance and duration from an OSRM body.
 */
export function parseRouteResponse(data: unknown): RouteEstimate | null {
  if (!isRecord(data) || !Array.isArray(data.routes)) {
    return null
  }
  const first: unknown = data.routes[0]
  if (!isRecord(first)) {
    return null
  }
  const distanceMeters = readFinite(first, 'distance')
  const durationSeconds = readFinite(first, 'duration')
  if (distanceMeters === null || durationSeconds === null) {
    return null
  }
  return { distanceMeters, durationSeconds }
}

/**
 * Compute a driving route.
 *
 * "No route" (OSRM code NoRoute, empty routes, missing numbers) comes back
 * as an invalid_response error, the same as a malformed body.
 */
export async function planRoute(
  from: LatLng,
  to: LatLng,
  config: RouterConfig
): Promise<Result<RouteEstimate>> {
  try {
    const response = await httpFetch(buildRouteUrl(from, to, config), {
      headers: {
        'User-Agent': config.userAgent,
        Accept: 'application/json'
      },
      timeoutMs: config.timeoutMs
    })

    if (!response.ok) {
      return handleHttpError(response)
    }

    const estimate = parseRouteResponse(await response.json())
    if (!estimate) {
      return emptyResponseError('No route found')
    }
    return { ok: true, value: estimate }
  } catch (error) {
    return handleNetworkError(error)
  }
}
