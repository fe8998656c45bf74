/**
 * Bot Command
 *
 * Runs the Telegram bot with long polling until SIGINT or SIGTERM.
 */

import { runBot } from '../../bot/telegram'
import type { CLIArgs } from '../args'
import { initCommand } from '../helpers'
import type { Logger } from '../logger'

export async function cmdBot(args: CLIArgs, logger: Logger): Promise<void> {
  const config = await initCommand('Bot', args, logger)
  await runBot(config, logger)
}
