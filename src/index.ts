/**
 * route-eta-bot Core Library
 *
 * Place search, labeling, routing and the conversation state machine of the
 * route assistant. The Telegram transport and the CLI sit on top of these.
 *
 * @license AGPL-3.0
 */

// Telegram transport
export { type ChatPort, deliverReplies, type ReplyExtra, replyExtra } from './bot/dispatch'
export { messageEvent } from './bot/events'
export { createBot, runBot } from './bot/telegram'
export { decodeToken, encodeToken } from './bot/tokens'
// Candidates
export { normalizeCandidates, parseCoordinate } from './candidates/index'
// Settings and logging
export { type Config, DEFAULT_SETTINGS, resolveBotConfig } from './cli/config'
export { createLogger, type Logger, silentLogger } from './cli/logger'
// Conversation flow
export {
  createFlowController,
  type FlowDependencies,
  FlowController,
  type PlaceSearch,
  type RoutePlanner
} from './flow/controller'
export {
  candidatePicker,
  escapeMarkdown,
  formatRouteResult,
  HELP_TEXT,
  INTRO_TEXT,
  modePicker,
  TEXT
} from './flow/messages'
// Geocoder
export { buildSearchUrl, geocodeCandidates, searchPlaces } from './geocoder/index'
// HTTP
export {
  BlockedHttpRequestError,
  emptyResponseError,
  handleHttpError,
  handleNetworkError,
  type HttpFetchOptions,
  type HttpResponse,
  httpFetch
} from './http'
// Labels
export {
  beautify,
  buildLabel,
  firstDisplaySegment,
  LABEL_SEPARATOR,
  labelBaseName,
  resolveBaseName,
  UNKNOWN_PLACE
} from './labels/index'
// Map links
export { buildDirectionsLink } from './maplink/index'
// Routing
export { buildRouteUrl, parseRouteResponse, planRoute } from './routing/index'
// Sessions
export { type ChatId, Conversations, KeyedQueue, SessionStore } from './session/index'
// Types
export * from './types'
export { VERSION } from './version'
