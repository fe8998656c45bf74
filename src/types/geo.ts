/**
 * Geo Types
 *
 * Coordinates, geocoder matches, candidates and route estimates.
 */

export interface LatLng {
  readonly latitude: number
  readonly longitude: number
}

/**
 * One entry of a Nominatim `jsonv2` search response.
 *
 * Kept untyped on purpose: only `lat`, `lon`, `name`, `display_name` and
 * `address.{house_number,road,neighbourhood,suburb}` are read, and each read
 * tolerates a missing or wrongly-typed value.
 */
export type RawMatch = Readonly<Record<string, unknown>>

/** A normalized, labeled geocoding result the user can pick */
export interface Candidate extends LatLng {
  /** Short display label (see buildLabel) */
  readonly label: string
  /** Provider's full display name, trimmed */
  readonly fullName: string
}

export interface RouteEstimate {
  readonly distanceMeters: number
  readonly durationSeconds: number
}

/** Outcome of a successful route computation, cached on the session */
export interface RouteResult extends RouteEstimate {
  readonly link: string
}
