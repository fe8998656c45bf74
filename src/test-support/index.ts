/**
 * Test Support Module
 *
 * Factories for raw matches, candidates and config, plus a logger that
 * records what it was given instead of printing it.
 */

import type { Logger } from '../cli/logger'
import type { BotConfig, Candidate, RawMatch } from '../types'

/**
 * Create a raw Nominatim match with default values for testing.
 * An override set to `undefined` replaces the default with an absent value.
 */
export function createRawMatch(overrides: Record<string, unknown> = {}): RawMatch {
  return {
    place_id: 1,
    lat: '10.7769',
    lon: '106.7009',
    name: 'Nhà hát Thành phố',
    display_name: 'Nhà hát Thành phố, Đồng Khởi, Phường Sài Gòn, Thành phố Hồ Chí Minh',
    ...overrides
  }
}

/**
 * Create a Candidate with default values for testing.
 */
export function createCandidate(overrides: Partial<Candidate> & { label: string }): Candidate {
  return {
    latitude: 10.7769,
    longitude: 106.7009,
    fullName: '',
    ...overrides
  }
}

/**
 * Config pointing at hosts that never resolve.
 */
export function createTestConfig(overrides: Partial<BotConfig> = {}): BotConfig {
  return {
    botToken: 'test-secret',
    geocoder: {
      url: 'https://nominatim.test/search',
      viewbox: '106.3567007,10.1399458,107.0276712,11.1603083',
      countryCodes: 'vn',
      acceptLanguage: 'vi',
      limit: 3,
      userAgent: 'route-eta-bot-test',
      timeoutMs: 1000
    },
    router: {
      url: 'https://osrm.test/route/v1/driving',
      userAgent: 'route-eta-bot-test',
      timeoutMs: 1000
    },
    mapLink: {
      url: 'https://www.openstreetmap.org/directions',
      engine: 'fossgis_osrm_car'
    },
    ...overrides
  }
}

export type LogLevel = keyof Logger

export interface RecordingLogger extends Logger {
  readonly entries: Array<{ level: LogLevel; msg: string }>
  /** Messages logged at one level, in order */
  messages(level: LogLevel): string[]
}

export function createRecordingLogger(): RecordingLogger {
  const entries: Array<{ level: LogLevel; msg: string }> = []
  const record = (level: LogLevel) => (msg: string) => {
    entries.push({ level, msg })
  }
  return {
    entries,
    messages: (level) => entries.filter((e) => e.level === level).map((e) => e.msg),
    log: record('log'),
    verbose: record('verbose'),
    success: record('success'),
    warn: record('warn'),
    error: record('error')
  }
}
