/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command } from 'commander'
import { VERSION } from '../version'
import { getConfigDescription, getConfigType, getValidConfigKeys } from './config'

export interface CLIArgs {
  command: string
  /** Positional arguments of the command */
  inputs: string[]
  quiet: boolean
  verbose: boolean
  json: boolean
  configFile: string | undefined
  /** For config command: action (list, set, unset) */
  configAction: 'list' | 'set' | 'unset'
  /** For config command: key name */
  configKey: string | undefined
  /** For config command: value to set */
  configValue: string | undefined
}

const DESCRIPTION = `Telegram assistant for driving routes and ETAs in Ho Chi Minh City.

Places are found with Nominatim, routes computed with OSRM.

Examples:
  $ route-eta-bot bot
  $ route-eta-bot geocode "chợ Bến Thành"
  $ route-eta-bot route 10.7725,106.698 10.8185,106.6588
  $ route-eta-bot label match.json

The bot reads BOT_TOKEN from the environment or a .env file.`

function createProgram(): Command {
  const program = new Command()
    .name('route-eta-bot')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--config-file <path>', 'Config file path (or set ROUTE_ETA_BOT_CONFIG)')

  // ============ BOT ============
  program.command('bot').description('Run the Telegram bot (long polling)')

  // ============ GEOCODE ============
  program
    .command('geocode')
    .description('Search places and show the labels the bot would offer')
    .argument('<query...>', 'Place name, address or landmark')
    .option('--json', 'Output as JSON')

  // ============ ROUTE ============
  program
    .command('route')
    .description('Driving distance, duration and directions link between two points')
    .argument('<from>', 'Origin as lat,lon')
    .argument('<to>', 'Destination as lat,lon')
    .option('--json', 'Output as JSON')

  // ============ LABEL ============
  program
    .command('label')
    .description('Build labels for saved Nominatim results (one object or an array)')
    .argument('<file>', 'JSON file with Nominatim search results')

  // ============ CONFIG ============
  const configKeys = getValidConfigKeys()
  const maxLen = Math.max(...configKeys.map((k) => `${k} (${getConfigType(k)})`.length))
  const settingsHelp = configKeys
    .map((key) => {
      const label = `${key} (${getConfigType(key)})`
      return `  ${label.padEnd(maxLen)}  ${getConfigDescription(key)}`
    })
    .join('\n')
  program
    .command('config')
    .description('Manage persistent settings')
    .argument('[action]', 'Action: list (default), set, unset')
    .argument('[key]', 'Config key to set/unset')
    .argument('[value]', 'Value to set')
    .addHelpText(
      'after',
      `
Available settings:
${settingsHelp}

Examples:
  route-eta-bot config                                   List current settings
  route-eta-bot config set osrmUrl http://localhost:5000/route/v1/driving
  route-eta-bot config set requestTimeoutMs 8000
  route-eta-bot config unset osrmUrl`
    )

  return program
}

function buildCLIArgs(
  commandName: string,
  inputs: string[],
  opts: Record<string, unknown>
): CLIArgs {
  return {
    command: commandName,
    inputs,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    json: opts.json === true,
    configFile: typeof opts.configFile === 'string' ? opts.configFile : undefined,
    configAction: 'list',
    configKey: undefined,
    configValue: undefined
  }
}

function parseConfigAction(action: string | undefined): 'list' | 'set' | 'unset' {
  if (action === 'set' || action === 'unset') {
    return action
  }
  return 'list'
}

/**
 * Positional values commander passes ahead of the options object and the command.
 */
function positionals(values: unknown[]): string[] {
  return values.flatMap((value) => {
    if (typeof value === 'string') return [value]
    if (Array.isArray(value)) return value.filter((v): v is string => typeof v === 'string')
    return []
  })
}

function attachActions(program: Command, onParsed: (args: CLIArgs) => void): void {
  for (const cmd of program.commands) {
    if (cmd.name() === 'config') {
      cmd.action((action?: string, key?: string, value?: string) => {
        onParsed({
          ...buildCLIArgs('config', [], cmd.optsWithGlobals()),
          configAction: parseConfigAction(action),
          configKey: key,
          configValue: value
        })
      })
    } else {
      // Arguments arrive first, then the options object and the command itself
      cmd.action((...values: unknown[]) => {
        const args = values.slice(0, cmd.registeredArguments.length)
        onParsed(buildCLIArgs(cmd.name(), positionals(args), cmd.optsWithGlobals()))
      })
    }
  }
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program = createProgram()

  let result: CLIArgs | null = null
  attachActions(program, (args) => {
    result = args
  })

  program.parse()

  if (!result) {
    return program.help()
  }

  return result
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()

  if (!exitOnHelp) {
    // Subcommands do not inherit an override set after they were added
    for (const cmd of [program, ...program.commands]) {
      cmd.exitOverride()
    }
  }

  let result: CLIArgs | null = null
  attachActions(program, (args) => {
    result = args
  })

  try {
    program.parse(argv, { from: 'user' })
  } catch {
    // exitOverride throws on help, version and usage errors
  }

  return result ?? buildCLIArgs('help', [], {})
}
