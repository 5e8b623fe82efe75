// CFF DICT data: operand lists keyed by operator
// https://adobe-type-tools.github.io/font-tech-notes/pdfs/5176.CFF.pdf (section 4)

import { Reader } from '../shared/reader'

// Two-byte operators are keyed as 1200 + second byte
export const OP_CHARSTRINGS = 17
export const OP_PRIVATE = 18
export const OP_SUBRS = 19
export const OP_CHARSTRING_TYPE = 1206
export const OP_ROS = 1230
export const OP_FD_ARRAY = 1236
export const OP_FD_SELECT = 1237

const ESCAPE = 12
const SHORT_INT = 28
const LONG_INT = 29
const REAL = 30

const REAL_NIBBLES = '0123456789.'

export type Dict = Map<number, number[]>

/**
 * Parse a DICT. Returns null on truncated operands or reserved bytes.
 */
export function parseDict(data: Uint8Array): Dict | null {
  const dict: Dict = new Map()
  const buf = new Reader(data)
  let operands: number[] = []

  while (!buf.atEnd) {
    const b0 = buf.readU8()
    if (b0 === null) return null

    if (b0 <= 21) {
      let op = b0
      if (b0 === ESCAPE) {
        const b1 = buf.readU8()
        if (b1 === null) return null
        op = 1200 + b1
      }
      dict.set(op, operands)
      operands = []
      continue
    }

    let value: number | null
    if (b0 === SHORT_INT) {
      value = buf.readS16()
    } else if (b0 === LONG_INT) {
      value = buf.readS32()
    } else if (b0 === REAL) {
      value = readReal(buf)
    } else if (b0 >= 32 && b0 <= 246) {
      value = b0 - 139
    } else if (b0 >= 247 && b0 <= 250) {
      const b1 = buf.readU8()
      value = b1 === null ? null : (b0 - 247) * 256 + b1 + 108
    } else if (b0 >= 251 && b0 <= 254) {
      const b1 = buf.readU8()
      value = b1 === null ? null : -(b0 - 251) * 256 - b1 - 108
    } else {
      return null
    }

    if (value === null) return null
    operands.push(value)
  }

  return dict
}

// Packed BCD real number, terminated by an 0xf nibble
function readReal(buf: Reader): number | null {
  let text = ''
  for (;;) {
    const byte = buf.readU8()
    if (byte === null) return null
    for (const nibble of [byte >> 4, byte & 0xf]) {
      if (nibble === 0xf) return Number.parseFloat(text) || 0
      if (nibble <= 0xa) text += REAL_NIBBLES[nibble]
      else if (nibble === 0xb) text += 'E'
      else if (nibble === 0xc) text += 'E-'
      else if (nibble === 0xe) text += '-'
      else return null
    }
  }
}

// First operand of an operator, if present
export function dictNumber(dict: Dict, op: number): number | null {
  const operands = dict.get(op)
  return operands && operands.length > 0 ? operands[0] : null
}
