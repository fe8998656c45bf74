import { describe, expect, it } from 'vitest'
import type { ButtonToken } from '../types'
import { decodeToken, encodeToken } from './tokens'

describe('Button Tokens', () => {
  it('encodes every token kind', () => {
    expect(encodeToken({ kind: 'select_origin', index: 2 })).toBe('PICK_FROM_2')
    expect(encodeToken({ kind: 'select_dest', index: 0 })).toBe('PICK_TO_0')
    expect(encodeToken({ kind: 'back_origin' })).toBe('BACK_FROM')
    expect(encodeToken({ kind: 'back_dest' })).toBe('BACK_TO')
    expect(encodeToken({ kind: 'mode_confirm' })).toBe('MODE_CAR')
    expect(encodeToken({ kind: 'mode_skip' })).toBe('MODE_SKIP')
    expect(encodeToken({ kind: 'other', raw: 'X' })).toBe('X')
  })

  it('decodes what it encodes', () => {
    const tokens: ButtonToken[] = [
      { kind: 'select_origin', index: 1 },
      { kind: 'select_dest', index: 12 },
      { kind: 'back_origin' },
      { kind: 'back_dest' },
      { kind: 'mode_confirm' },
      { kind: 'mode_skip' }
    ]

    for (const token of tokens) {
      expect(decodeToken(encodeToken(token))).toEqual(token)
    }
  })

  it('decodes malformed data as other', () => {
    for (const data of ['', 'PICK_FROM_', 'PICK_FROM_-1', 'PICK_FROM_1a', 'pick_from_1', 'MODE_BIKE']) {
      expect(decodeToken(data)).toEqual({ kind: 'other', raw: data })
    }
  })
})
