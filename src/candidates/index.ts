/**
 * Candidate Normalizer
 *
 * Convert raw geocoder matches into validated, labeled candidates.
 * Provider order is authoritative: entries are never re-sorted, and a
 * match without usable coordinates is dropped without failing the batch.
 */

import { buildLabel, firstDisplaySegment, readText, UNKNOWN_PLACE } from '../labels'
import type { Candidate, RawMatch } from '../types'

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

/**
 * Parse a coordinate given as a number or a decimal string.
 * Returns null for anything else, including NaN and infinities.
 */
export function parseCoordinate(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }
  if (typeof value !== 'string') {
    return null
  }
  const text = value.trim()
  if (!DECIMAL_PATTERN.test(text)) {
    return null
  }
  const parsed = Number.parseFloat(text)
  return Number.isFinite(parsed) ? parsed : null
}

function toCandidate(match: RawMatch): Candidate | null {
  const latitude = parseCoordinate(match.lat)
  const longitude = parseCoordinate(match.lon)
  if (latitude === null || longitude === null) {
    return null
  }

  const label = buildLabel(match).trim() || firstDisplaySegment(match) || UNKNOWN_PLACE

  return {
    latitude,
    longitude,
    label,
    fullName: readText(match, 'display_name')
  }
}

/**
 * Normalize a batch of raw matches, preserving their relative order.
 */
export function normalizeCandidates(matches: readonly RawMatch[]): Candidate[] {
  const candidates: Candidate[] = []
  for (const match of matches) {
    const candidate = toCandidate(match)
    if (candidate) candidates.push(candidate)
  }
  return candidates
}
