/**
 * CLI Logger
 *
 * Console logging for the CLI and the running bot.
 */

export interface Logger {
  log: (msg: string) => void
  verbose: (msg: string) => void
  success: (msg: string) => void
  warn: (msg: string) => void
  error: (msg: string) => void
}

export function createLogger(quiet: boolean, verbose: boolean): Logger {
  return {
    log: (msg: string) => {
      if (!quiet) console.log(msg)
    },
    verbose: (msg: string) => {
      if (verbose) console.log(`  [debug] ${msg}`)
    },
    success: (msg: string) => {
      if (!quiet) console.log(`  ✓ ${msg}`)
    },
    warn: (msg: string) => {
      console.warn(`  ⚠ ${msg}`)
    },
    error: (msg: string) => {
      console.error(`  ✗ ${msg}`)
    }
  }
}

/**
 * A logger that drops everything. Used where the library runs without a CLI.
 */
export const silentLogger: Logger = {
  log: () => {},
  verbose: () => {},
  success: () => {},
  warn: () => {},
  error: () => {}
}
