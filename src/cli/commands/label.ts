/**
 * Label Command
 *
 * Builds display labels for saved Nominatim results, without any network call.
 * Useful for checking how a stored response will look in the picker.
 */

import { readFile } from 'node:fs/promises'
import { buildLabel, isRecord } from '../../labels'
import type { RawMatch } from '../../types'
import type { CLIArgs } from '../args'
import type { Logger } from '../logger'

function toMatches(data: unknown): RawMatch[] {
  if (Array.isArray(data)) {
    return data.filter(isRecord)
  }
  return isRecord(data) ? [data] : []
}

export async function cmdLabel(args: CLIArgs, logger: Logger): Promise<void> {
  const [file] = args.inputs
  if (!file) {
    logger.error('Missing file. Usage: route-eta-bot label <file>')
    process.exit(1)
  }

  let data: unknown
  try {
    data = JSON.parse(await readFile(file, 'utf-8'))
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(`Cannot read ${file}: ${msg}`)
    process.exit(1)
  }

  const matches = toMatches(data)
  if (matches.length === 0) {
    logger.warn('No Nominatim results in file')
    return
  }
  for (const match of matches) {
    console.log(buildLabel(match))
  }
}
