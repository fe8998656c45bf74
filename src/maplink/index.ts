/**
 * Map Link Module
 *
 * OpenStreetMap directions links for a computed route.
 */

import type { LatLng, MapLinkConfig } from '../types'

function formatPoint(point: LatLng): string {
  return `${point.latitude.toFixed(6)},${point.longitude.toFixed(6)}`
}

/**
 * Build a directions URL with both endpoints at six decimals.
 *
 * The `route` value is left unencoded: OSM expects the literal `,` and `;`.
 */
export function buildDirectionsLink(from: LatLng, to: LatLng, config: MapLinkConfig): string {
  const engine = encodeURIComponent(config.engine)
  return `${config.url}?engine=${engine}&route=${formatPoint(from)};${formatPoint(to)}`
}
