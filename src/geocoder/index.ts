/**
 * Geocoder Module
 *
 * Search place names with Nominatim, bounded to a fixed region.
 *
 * Failures come back as Result errors so callers can tell "no match" from
 * "provider unreachable"; the flow collapses both to an empty candidate list.
 */

import { normalizeCandidates } from '../candidates'
import { emptyResponseError, handleHttpError, handleNetworkError, httpFetch } from '../http'
import { isRecord } from '../labels'
import type { Candidate, GeocoderConfig, RawMatch, Result } from '../types'

/**
 * Build the Nominatim search URL for a query.
 */
export function buildSearchUrl(query: string, config: GeocoderConfig): string {
  const params = new URLSearchParams({
    q: query,
    format: 'jsonv2',
    limit: String(config.limit),
    addressdetails: '1',
    countrycodes: config.countryCodes,
    'accept-language': config.acceptLanguage,
    viewbox: config.viewbox,
    bounded: '1'
  })
  return `${config.url}?${params.toString()}`
}

/**
 * Search for places matching free text.
 *
 * @returns raw matches in provider order (possibly empty), or an error
 */
export async function searchPlaces(
  query: string,
  config: GeocoderConfig
): Promise<Result<RawMatch[]>> {
  const q = query.trim()
  if (!q) {
    return { ok: true, value: [] }
  }

  try {
    const response = await httpFetch(buildSearchUrl(q, config), {
      headers: {
        'User-Agent': config.userAgent,
        Accept: 'application/json'
      },
      timeoutMs: config.timeoutMs
    })

    if (!response.ok) {
      return handleHttpError(response)
    }

    const data = await response.json()
    if (!Array.isArray(data)) {
      return emptyResponseError(`Unexpected Nominatim response for: ${q}`)
    }

    // Non-object entries cannot carry coordinates
    return { ok: true, value: data.filter(isRecord) }
  } catch (error) {
    return handleNetworkError(error)
  }
}

/**
 * Search and normalize in one step.
 */
export async function geocodeCandidates(
  query: string,
  config: GeocoderConfig
): Promise<Result<Candidate[]>> {
  const result = await searchPlaces(query, config)
  if (!result.ok) {
    return result
  }
  return { ok: true, value: normalizeCandidates(result.value) }
}
