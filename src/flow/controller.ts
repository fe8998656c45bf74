/**
 * Flow Controller
 *
 * The route conversation as a state machine: (session, event) in,
 * (next session, replies) out. Gateways are injected so the controller
 * holds no I/O of its own and can be driven directly in tests.
 */

import { normalizeCandidates } from '../candidates'
import type { Logger } from '../cli/logger'
import { silentLogger } from '../cli/logger'
import { searchPlaces } from '../geocoder'
import { buildDirectionsLink } from '../maplink'
import { planRoute } from '../routing'
import type {
  BotConfig,
  ButtonToken,
  Candidate,
  ChosenPlace,
  FlowCommand,
  FlowOutcome,
  InboundEvent,
  LatLng,
  MapLinkConfig,
  OutboundReply,
  RawMatch,
  Result,
  RouteEstimate,
  Session
} from '../types'
import {
  candidatePicker,
  destChosenText,
  formatRouteResult,
  HELP_TEXT,
  INTRO_TEXT,
  markdownReply,
  modePicker,
  originChosenText,
  reply,
  TEXT
} from './messages'

export type PlaceSearch = (query: string) => Promise<Result<RawMatch[]>>
export type RoutePlanner = (from: LatLng, to: LatLng) => Promise<Result<RouteEstimate>>

export interface FlowDependencies {
  readonly searchPlaces: PlaceSearch
  readonly planRoute: RoutePlanner
  readonly mapLink: MapLinkConfig
  readonly logger?: Logger | undefined
}

type Role = 'origin' | 'dest'

const IDLE: Session = { step: 'idle' }

function outcome(session: Session, ...replies: OutboundReply[]): FlowOutcome {
  return { session, replies }
}

function notice(text: string): OutboundReply {
  return { kind: 'notice', text }
}

function collapse(text: string): OutboundReply {
  return { kind: 'collapse', text }
}

function invalidChoice(session: Session): FlowOutcome {
  return outcome(session, notice(TEXT.invalidNotice), reply(TEXT.invalidChoice))
}

function choose(candidate: Candidate): ChosenPlace {
  return {
    point: { latitude: candidate.latitude, longitude: candidate.longitude },
    label: candidate.label
  }
}

/**
 * Candidate at a button index, or undefined when the index is stale or out of range.
 */
function pick(candidates: readonly Candidate[], index: number): Candidate | undefined {
  return Number.isInteger(index) ? candidates[index] : undefined
}

export class FlowController {
  private readonly logger: Logger

  constructor(private readonly deps: FlowDependencies) {
    this.logger = deps.logger ?? silentLogger
  }

  async handle(session: Session, event: InboundEvent): Promise<FlowOutcome> {
    switch (event.kind) {
      case 'command':
        return this.onCommand(session, event.command)
      case 'text':
        return this.onText(session, event.text)
      case 'non_text':
        return this.onNonText(session)
      case 'button':
        return this.onButton(session, event.token)
    }
  }

  private onCommand(session: Session, command: FlowCommand): FlowOutcome {
    switch (command) {
      case 'start':
        return outcome(session, markdownReply(INTRO_TEXT))
      case 'help':
        return outcome(session, markdownReply(HELP_TEXT))
      case 'route':
        if (session.step === 'idle' || session.step === 'finished') {
          return outcome({ step: 'awaiting_origin_text' }, reply(TEXT.routeStart))
        }
        return outcome(session, reply(TEXT.alreadyInFlow))
      case 'cancel':
        return outcome(IDLE, reply(TEXT.cancelled))
    }
  }

  private async onText(session: Session, raw: string): Promise<FlowOutcome> {
    const text = raw.trim()
    switch (session.step) {
      case 'awaiting_origin_text': {
        const candidates = await this.lookup(text, 'origin')
        if (candidates.length === 0) {
          return outcome({ step: 'awaiting_origin_text', originText: text }, reply(TEXT.notFound))
        }
        return outcome(
          { step: 'choosing_origin', originText: text, originCandidates: candidates },
          candidatePicker(TEXT.pickOrigin, candidates, 'origin')
        )
      }
      case 'awaiting_dest_text': {
        const candidates = await this.lookup(text, 'dest')
        if (candidates.length === 0) {
          return outcome(
            { step: 'awaiting_dest_text', origin: session.origin, destText: text },
            reply(TEXT.notFound)
          )
        }
        return outcome(
          {
            step: 'choosing_dest',
            origin: session.origin,
            destText: text,
            destCandidates: candidates
          },
          candidatePicker(TEXT.pickDest, candidates, 'dest')
        )
      }
      case 'choosing_origin':
      case 'choosing_dest':
        return outcome(session, reply(TEXT.useButtons))
      case 'choosing_mode':
        return outcome(session, reply(TEXT.useModeButtons))
      case 'idle':
      case 'finished':
        return outcome(session)
    }
  }

  private onNonText(session: Session): FlowOutcome {
    switch (session.step) {
      case 'awaiting_origin_text':
        return outcome(session, reply(TEXT.originTextOnly))
      case 'awaiting_dest_text':
        return outcome(session, reply(TEXT.destTextOnly))
      case 'choosing_origin':
      case 'choosing_dest':
        return outcome(session, reply(TEXT.useButtons))
      case 'choosing_mode':
        return outcome(session, reply(TEXT.useModeButtons))
      case 'idle':
      case 'finished':
        return outcome(session)
    }
  }

  private async onButton(session: Session, token: ButtonToken): Promise<FlowOutcome> {
    switch (session.step) {
      case 'idle':
      case 'finished':
        // Buttons of an old conversation: acknowledge so the client stops spinning
        return outcome(session, notice(''))

      case 'awaiting_origin_text':
        return outcome(session, notice(TEXT.invalidNotice), reply(TEXT.askOrigin))

      case 'awaiting_dest_text':
        return outcome(session, notice(TEXT.invalidNotice), reply(TEXT.askDest))

      case 'choosing_origin': {
        if (token.kind === 'back_origin') {
          return outcome(
            { step: 'awaiting_origin_text' },
            collapse(TEXT.reenterOrigin),
            reply(TEXT.askOrigin)
          )
        }
        const candidate =
          token.kind === 'select_origin' ? pick(session.originCandidates, token.index) : undefined
        if (!candidate) {
          return invalidChoice(session)
        }
        const origin = choose(candidate)
        return outcome(
          { step: 'awaiting_dest_text', origin },
          collapse(originChosenText(origin.label)),
          reply(TEXT.askDest)
        )
      }

      case 'choosing_dest': {
        if (token.kind === 'back_dest') {
          return outcome(
            { step: 'awaiting_dest_text', origin: session.origin },
            collapse(TEXT.reenterDest),
            reply(TEXT.askDestAgain)
          )
        }
        const candidate =
          token.kind === 'select_dest' ? pick(session.destCandidates, token.index) : undefined
        if (!candidate) {
          return invalidChoice(session)
        }
        const dest = choose(candidate)
        return outcome(
          { step: 'choosing_mode', origin: session.origin, dest },
          collapse(destChosenText(dest.label)),
          modePicker()
        )
      }

      case 'choosing_mode': {
        if (token.kind !== 'mode_confirm' && token.kind !== 'mode_skip') {
          return invalidChoice(session)
        }
        const confirmation = collapse(
          token.kind === 'mode_confirm' ? TEXT.modeConfirmed : TEXT.modeSkipped
        )
        return this.finish(session.origin, session.dest, confirmation)
      }
    }
  }

  /**
   * Route between the chosen places and end the conversation either way.
   */
  private async finish(
    origin: ChosenPlace,
    dest: ChosenPlace,
    confirmation: OutboundReply
  ): Promise<FlowOutcome> {
    const result = await this.deps.planRoute(origin.point, dest.point)
    if (!result.ok) {
      this.logger.warn(`Routing failed (${result.error.type}): ${result.error.message}`)
      return outcome(
        { step: 'finished', origin, dest, mode: 'car', lastResult: null },
        confirmation,
        reply(TEXT.routeFailed)
      )
    }

    const lastResult = {
      ...result.value,
      link: buildDirectionsLink(origin.point, dest.point, this.deps.mapLink)
    }
    this.logger.verbose(
      `Route ${origin.label} → ${dest.label}: ${lastResult.distanceMeters} m, ${lastResult.durationSeconds} s`
    )
    return outcome(
      { step: 'finished', origin, dest, mode: 'car', lastResult },
      confirmation,
      markdownReply(formatRouteResult(origin.label, dest.label, lastResult), true)
    )
  }

  /**
   * Geocode and normalize. Failures and empty results both come back as
   * an empty list; only the log tells them apart.
   */
  private async lookup(query: string, role: Role): Promise<Candidate[]> {
    const result = await this.deps.searchPlaces(query)
    if (!result.ok) {
      this.logger.warn(
        `Geocoding ${role} "${query}" failed (${result.error.type}): ${result.error.message}`
      )
      return []
    }
    if (result.value.length === 0) {
      this.logger.verbose(`No matches for ${role} "${query}"`)
      return []
    }
    const candidates = normalizeCandidates(result.value)
    if (candidates.length === 0) {
      this.logger.verbose(`${result.value.length} matches for ${role} "${query}" had no coordinates`)
    }
    return candidates
  }
}

/**
 * Controller wired to the Nominatim and OSRM gateways.
 */
export function createFlowController(config: BotConfig, logger?: Logger): FlowController {
  return new FlowController({
    searchPlaces: (query) => searchPlaces(query, config.geocoder),
    planRoute: (from, to) => planRoute(from, to, config.router),
    mapLink: config.mapLink,
    logger
  })
}
