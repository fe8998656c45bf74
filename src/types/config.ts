/**
 * Config Types
 *
 * Resolved runtime configuration, threaded explicitly into the gateways,
 * the flow controller and the transport.
 */

export interface GeocoderConfig {
  /** Nominatim search endpoint */
  readonly url: string
  /** Bounding box as `left,bottom,right,top` (lon,lat,lon,lat) */
  readonly viewbox: string
  readonly countryCodes: string
  readonly acceptLanguage: string
  /** Max matches requested per query */
  readonly limit: number
  readonly userAgent: string
  readonly timeoutMs: number
}

export interface RouterConfig {
  /** OSRM route endpoint including the profile, e.g. `.../route/v1/driving` */
  readonly url: string
  readonly userAgent: string
  readonly timeoutMs: number
}

export interface MapLinkConfig {
  readonly url: string
  /** Routing engine identifier understood by the directions viewer */
  readonly engine: string
}

export interface BotConfig {
  /** Telegram bot token; only required to run the bot */
  readonly botToken?: string | undefined
  readonly geocoder: GeocoderConfig
  readonly router: RouterConfig
  readonly mapLink: MapLinkConfig
}
