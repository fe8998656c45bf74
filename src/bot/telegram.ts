/**
 * Telegram Transport
 *
 * Long-polling bot wiring: updates become inbound events, flow replies
 * become Bot API calls. Events of one chat are handled one at a time.
 */

import { type Context, Telegraf } from 'telegraf'
import { callbackQuery, message } from 'telegraf/filters'
import type { Logger } from '../cli/logger'
import { createFlowController } from '../flow/controller'
import { Conversations } from '../session'
import type { BotConfig, InboundEvent } from '../types'
import { type ChatPort, deliverReplies } from './dispatch'
import { messageEvent } from './events'
import { decodeToken } from './tokens'

function chatPort(ctx: Context): ChatPort {
  return {
    send: (text, extra) => ctx.reply(text, extra),
    edit: (text) => ctx.editMessageText(text),
    answer: (text) => ctx.answerCbQuery(text || undefined)
  }
}

/**
 * Build the bot with all handlers attached. Does not start polling.
 */
export function createBot(
  token: string,
  config: BotConfig,
  logger: Logger,
  conversations = new Conversations(createFlowController(config, logger))
): Telegraf {
  const bot = new Telegraf(token)

  async function handle(ctx: Context, event: InboundEvent, fromButton: boolean): Promise<void> {
    const chatId = ctx.chat?.id
    if (chatId === undefined) return
    logger.verbose(`chat ${chatId}: ${event.kind}`)
    const replies = await conversations.dispatch(chatId, event)
    await deliverReplies(chatPort(ctx), replies, fromButton)
  }

  bot.on(callbackQuery('data'), (ctx) =>
    handle(ctx, { kind: 'button', token: decodeToken(ctx.callbackQuery.data) }, true)
  )

  bot.on(message(), async (ctx) => {
    const event = messageEvent('text' in ctx.message ? ctx.message.text : undefined)
    if (event) {
      await handle(ctx, event, false)
    }
  })

  bot.catch(async (error, ctx) => {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(`Update ${ctx.update.update_id} failed: ${msg}`)
    if (ctx.callbackQuery) {
      // The query may already be answered or expired
      await ctx.answerCbQuery().catch((answerError: unknown) => {
        logger.verbose(`Could not answer callback query: ${String(answerError)}`)
      })
    }
  })

  return bot
}

/**
 * Start long polling. Resolves once the bot stops on SIGINT or SIGTERM.
 */
export async function runBot(config: BotConfig, logger: Logger): Promise<void> {
  if (!config.botToken) {
    throw new Error('BOT_TOKEN is not set. Add it to the environment or a .env file.')
  }
  const bot = createBot(config.botToken, config, logger)

  process.once('SIGINT', () => bot.stop('SIGINT'))
  process.once('SIGTERM', () => bot.stop('SIGTERM'))

  await bot.launch(() => {
    logger.success(`Bot @${bot.botInfo?.username ?? 'unknown'} is polling for updates`)
  })
  logger.log('Bot stopped')
}
