/**
 * Button Tokens
 *
 * Conversion between button tokens and Telegram `callback_data`.
 * Decoding happens once, when an update arrives; the flow only sees tokens.
 */

import type { ButtonToken } from '../types'

const PICK_ORIGIN = /^PICK_FROM_(\d+)$/
const PICK_DEST = /^PICK_TO_(\d+)$/

export function encodeToken(token: ButtonToken): string {
  switch (token.kind) {
    case 'select_origin':
      return `PICK_FROM_${token.index}`
    case 'select_dest':
      return `PICK_TO_${token.index}`
    case 'back_origin':
      return 'BACK_FROM'
    case 'back_dest':
      return 'BACK_TO'
    case 'mode_confirm':
      return 'MODE_CAR'
    case 'mode_skip':
      return 'MODE_SKIP'
    case 'other':
      return token.raw
  }
}

/**
 * Decode callback data. Anything unrecognised becomes an `other` token.
 */
export function decodeToken(data: string): ButtonToken {
  switch (data) {
    case 'BACK_FROM':
      return { kind: 'back_origin' }
    case 'BACK_TO':
      return { kind: 'back_dest' }
    case 'MODE_CAR':
      return { kind: 'mode_confirm' }
    case 'MODE_SKIP':
      return { kind: 'mode_skip' }
  }

  const origin = PICK_ORIGIN.exec(data)
  if (origin?.[1] !== undefined) {
    return { kind: 'select_origin', index: Number.parseInt(origin[1], 10) }
  }
  const dest = PICK_DEST.exec(data)
  if (dest?.[1] !== undefined) {
    return { kind: 'select_dest', index: Number.parseInt(dest[1], 10) }
  }
  return { kind: 'other', raw: data }
}
