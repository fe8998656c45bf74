/**
 * Label Builder
 *
 * Turns a raw Nominatim match into a short display label such as
 * "Chợ Bến Thành — 45 Lê Lợi, P. Bến Thành".
 *
 * Pure and total: any input, however malformed, yields a non-empty string.
 */

import type { RawMatch } from '../types'

/** Fallback base name when a match carries neither `name` nor `display_name` */
export const UNKNOWN_PLACE = 'Không rõ'

/** Separates the base name from the address segments */
export const LABEL_SEPARATOR = ' — '

const MAX_SEGMENTS = 3

/**
 * Administrative-prefix abbreviations, applied in order.
 */
const ABBREVIATIONS: ReadonlyArray<readonly [string, string]> = [
  ['Phường ', 'P. '],
  ['Khu phố ', 'KP '],
  ['Đường ', '']
]

/**
 * Read a trimmed string field; anything that is not a string reads as ''.
 */
export function readText(source: Readonly<Record<string, unknown>>, key: string): string {
  const value = source[key]
  return typeof value === 'string' ? value.trim() : ''
}

export function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readAddress(match: RawMatch): Readonly<Record<string, unknown>> {
  const address = match.address
  return isRecord(address) ? address : {}
}

/**
 * First comma-separated segment of `display_name`, trimmed.
 */
export function firstDisplaySegment(match: RawMatch): string {
  const displayName = readText(match, 'display_name')
  return (displayName.split(',')[0] ?? '').trim()
}

/**
 * Resolve the base name: `name`, else the head of `display_name`, else the placeholder.
 */
export function resolveBaseName(match: RawMatch): string {
  return readText(match, 'name') || firstDisplaySegment(match) || UNKNOWN_PLACE
}

function streetSegment(houseNumber: string, road: string): string {
  if (houseNumber && road) return `${houseNumber} ${road}`.trim()
  return houseNumber || road
}

/**
 * Apply the abbreviation table until the text stops changing.
 *
 * A single pass can splice a new match together (removing "Đường " from
 * "PhĐường ường " leaves "Phường "), so passes repeat. Every change shortens
 * the text, which bounds the loop.
 */
export function beautify(text: string): string {
  let current = text
  for (;;) {
    let next = current
    for (const [pattern, replacement] of ABBREVIATIONS) {
      next = next.replaceAll(pattern, replacement)
    }
    if (next === current) return current
    current = next
  }
}

/**
 * Build the short display label for a raw geocoder match.
 */
export function buildLabel(match: RawMatch): string {
  const baseName = resolveBaseName(match)
  const address = readAddress(match)

  const houseNumber = readText(address, 'house_number')
  let road = readText(address, 'road')
  // Bus stops and streets often repeat their own name as the road
  if (road === baseName) {
    road = ''
  }

  const segments: string[] = []
  const street = streetSegment(houseNumber, road)
  if (street) segments.push(street)

  const neighbourhood = readText(address, 'neighbourhood')
  if (neighbourhood) segments.push(neighbourhood)

  const suburb = readText(address, 'suburb')
  if (suburb) segments.push(suburb)

  const label =
    segments.length === 0
      ? baseName
      : `${baseName}${LABEL_SEPARATOR}${segments.slice(0, MAX_SEGMENTS).join(', ')}`

  return beautify(label)
}

/**
 * The part of a label before the separator, used for compact result lines.
 */
export function labelBaseName(label: string): string {
  return (label.split(LABEL_SEPARATOR)[0] ?? '').trim()
}
