/**
 * Flow Types
 *
 * Session states, inbound events and outbound replies of the route conversation.
 */

import type { Candidate, LatLng, RouteResult } from './geo'

export type TravelMode = 'car'

/** A picked candidate. Point and label only ever exist together. */
export interface ChosenPlace {
  readonly point: LatLng
  readonly label: string
}

// ============================================================================
// Session
// ============================================================================

export interface IdleSession {
  readonly step: 'idle'
}

export interface AwaitingOriginTextSession {
  readonly step: 'awaiting_origin_text'
  /** Last text that produced no candidates */
  readonly originText?: string | undefined
}

export interface ChoosingOriginSession {
  readonly step: 'choosing_origin'
  readonly originText: string
  readonly originCandidates: readonly Candidate[]
}

export interface AwaitingDestTextSession {
  readonly step: 'awaiting_dest_text'
  readonly origin: ChosenPlace
  readonly destText?: string | undefined
}

export interface ChoosingDestSession {
  readonly step: 'choosing_dest'
  readonly origin: ChosenPlace
  readonly destText: string
  readonly destCandidates: readonly Candidate[]
}

export interface ChoosingModeSession {
  readonly step: 'choosing_mode'
  readonly origin: ChosenPlace
  readonly dest: ChosenPlace
}

/** Terminal state. `lastResult` is null when routing failed. */
export interface FinishedSession {
  readonly step: 'finished'
  readonly origin: ChosenPlace
  readonly dest: ChosenPlace
  readonly mode: TravelMode
  readonly lastResult: RouteResult | null
}

export type Session =
  | IdleSession
  | AwaitingOriginTextSession
  | ChoosingOriginSession
  | AwaitingDestTextSession
  | ChoosingDestSession
  | ChoosingModeSession
  | FinishedSession

export type SessionStep = Session['step']

// ============================================================================
// Inbound
// ============================================================================

export type ButtonToken =
  | { readonly kind: 'select_origin'; readonly index: number }
  | { readonly kind: 'select_dest'; readonly index: number }
  | { readonly kind: 'back_origin' }
  | { readonly kind: 'back_dest' }
  | { readonly kind: 'mode_confirm' }
  | { readonly kind: 'mode_skip' }
  | { readonly kind: 'other'; readonly raw: string }

export type FlowCommand = 'start' | 'help' | 'route' | 'cancel'

export type InboundEvent =
  | { readonly kind: 'command'; readonly command: FlowCommand }
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'non_text' }
  | { readonly kind: 'button'; readonly token: ButtonToken }

// ============================================================================
// Outbound
// ============================================================================

export interface ReplyButton {
  readonly label: string
  readonly token: ButtonToken
}

export type OutboundReply =
  | {
      readonly kind: 'reply'
      readonly text: string
      readonly format?: 'markdown' | undefined
      /** Rows of inline buttons */
      readonly buttons?: readonly (readonly ReplyButton[])[] | undefined
      readonly disablePreview?: boolean | undefined
    }
  /** Replace the text of the message whose button was pressed, dropping its keyboard */
  | { readonly kind: 'collapse'; readonly text: string }
  /** Short toast answering a button press */
  | { readonly kind: 'notice'; readonly text: string }

export interface FlowOutcome {
  readonly session: Session
  readonly replies: readonly OutboundReply[]
}
