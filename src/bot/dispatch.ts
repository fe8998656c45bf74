/**
 * Reply Delivery
 *
 * Turns flow replies into Bot API calls through a small port, so the
 * delivery order can be checked without a Telegram connection.
 */

import { Markup } from 'telegraf'
import type { OutboundReply } from '../types'
import { encodeToken } from './tokens'

type MessageReply = Extract<OutboundReply, { kind: 'reply' }>
type NoticeReply = Extract<OutboundReply, { kind: 'notice' }>

/**
 * Extra parameters for `sendMessage`.
 */
export function replyExtra(reply: MessageReply) {
  return {
    ...(reply.format === 'markdown' ? { parse_mode: 'Markdown' as const } : {}),
    ...(reply.disablePreview ? { link_preview_options: { is_disabled: true } } : {}),
    ...(reply.buttons
      ? Markup.inlineKeyboard(
          reply.buttons.map((row) =>
            row.map((button) => Markup.button.callback(button.label, encodeToken(button.token)))
          )
        )
      : {})
  }
}

export type ReplyExtra = ReturnType<typeof replyExtra>

export interface ChatPort {
  /** Send a new message to the chat */
  send(text: string, extra: ReplyExtra): Promise<unknown>
  /** Edit the message carrying the pressed button, removing its keyboard */
  edit(text: string): Promise<unknown>
  /** Answer the pending callback query */
  answer(text: string): Promise<unknown>
}

function isNotice(reply: OutboundReply): reply is NoticeReply {
  return reply.kind === 'notice'
}

/**
 * Deliver replies in order.
 *
 * A button press is always answered, first, even when the flow produced
 * no notice; Telegram clients show a spinner until it is.
 */
export async function deliverReplies(
  port: ChatPort,
  replies: readonly OutboundReply[],
  fromButton: boolean
): Promise<void> {
  if (fromButton) {
    await port.answer(replies.find(isNotice)?.text ?? '')
  }

  for (const reply of replies) {
    switch (reply.kind) {
      case 'reply':
        await port.send(reply.text, replyExtra(reply))
        break
      case 'collapse':
        if (fromButton) await port.edit(reply.text)
        break
      case 'notice':
        break
    }
  }
}
