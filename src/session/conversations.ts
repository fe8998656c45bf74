/**
 * Conversations
 *
 * Ties the store, the queue and the flow controller together: each event
 * for a chat is handled against that chat's current session, strictly
 * after the chat's previous event.
 */

import type { FlowController } from '../flow/controller'
import type { InboundEvent, OutboundReply } from '../types'
import { KeyedQueue } from './queue'
import { type ChatId, SessionStore } from './store'

export class Conversations {
  private readonly queue = new KeyedQueue<ChatId>()

  constructor(
    private readonly controller: FlowController,
    readonly store: SessionStore = new SessionStore()
  ) {}

  /**
   * Handle one event and return the replies to deliver.
   * A failed handler leaves the stored session unchanged.
   */
  dispatch(chatId: ChatId, event: InboundEvent): Promise<readonly OutboundReply[]> {
    return this.queue.run(chatId, async () => {
      const { session, replies } = await this.controller.handle(this.store.get(chatId), event)
      this.store.set(chatId, session)
      return replies
    })
  }
}
