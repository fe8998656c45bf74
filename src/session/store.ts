/**
 * Session Store
 *
 * In-memory sessions keyed by chat. A chat without an entry is idle.
 * Idle and finished sessions are never kept: both react to input the same
 * way, so a completed flow leaves nothing behind.
 */

import type { Session } from '../types'

export type ChatId = number | string

const IDLE: Session = { step: 'idle' }

export class SessionStore {
  private readonly sessions = new Map<ChatId, Session>()

  get(chatId: ChatId): Session {
    return this.sessions.get(chatId) ?? IDLE
  }

  set(chatId: ChatId, session: Session): void {
    if (session.step === 'idle' || session.step === 'finished') {
      this.sessions.delete(chatId)
    } else {
      this.sessions.set(chatId, session)
    }
  }

  /** Number of chats in the middle of a flow */
  get size(): number {
    return this.sessions.size
  }
}
