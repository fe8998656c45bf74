#!/usr/bin/env node
/**
 * route-eta-bot CLI
 *
 * Runs the Telegram bot, plus one-shot geocode, route and label commands
 * for checking the providers from a terminal.
 *
 * @license AGPL-3.0
 */

import 'dotenv/config'
import { parseCliArgs } from './cli/args'
import { cmdBot } from './cli/commands/bot'
import { cmdConfig } from './cli/commands/config'
import { cmdGeocode } from './cli/commands/geocode'
import { cmdLabel } from './cli/commands/label'
import { cmdRoute } from './cli/commands/route'
import { createLogger } from './cli/logger'

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    switch (args.command) {
      case 'bot':
        await cmdBot(args, logger)
        break

      case 'geocode':
        await cmdGeocode(args, logger)
        break

      case 'route':
        await cmdRoute(args, logger)
        break

      case 'label':
        await cmdLabel(args, logger)
        break

      case 'config':
        await cmdConfig(args, logger)
        break

      default:
        logger.error(`Unknown command: ${args.command}. Run 'route-eta-bot --help' for usage.`)
        process.exit(1)
    }
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

void main()
