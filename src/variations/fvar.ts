// Font variations table and axis normalization
// https://learn.microsoft.com/en-us/typography/opentype/spec/fvar

import { Reader } from '../shared/reader'
import { tagToString } from '../shared/known-tags'
import type { VariationAxis } from '../types'

const AXIS_RECORD_MIN_SIZE = 20
const AXIS_FLAG_HIDDEN = 0x0001

// Normalized values this close to zero snap to the default
export const NORMALIZE_EPSILON = 1e-6

// 2.14 fixed point bounds
export const F2DOT14_ONE = 16384

/**
 * Parse the axis records of `fvar`.
 *
 * Returns null when the table is unusable or declares no axes, which makes
 * the font non-variable.
 */
export function parseFvar(data: Uint8Array): VariationAxis[] | null {
  const buf = new Reader(data)
  const majorVersion = buf.readU16()
  buf.skip(2) // minorVersion
  const axesArrayOffset = buf.readU16()
  buf.skip(2) // reserved
  const axisCount = buf.readU16()
  const axisSize = buf.readU16()

  if (
    majorVersion !== 1 ||
    axesArrayOffset === null ||
    axisCount === null ||
    axisSize === null ||
    axisCount === 0 ||
    axisSize < AXIS_RECORD_MIN_SIZE
  ) {
    return null
  }

  const axes: VariationAxis[] = []
  for (let i = 0; i < axisCount; i++) {
    if (!buf.seek(axesArrayOffset + i * axisSize)) return null
    const tag = buf.readU32()
    const min = buf.readFixed()
    const def = buf.readFixed()
    const max = buf.readFixed()
    const flags = buf.readU16()
    const nameId = buf.readU16()
    if (
      tag === null ||
      min === null ||
      def === null ||
      max === null ||
      flags === null ||
      nameId === null
    ) {
      return null
    }

    axes.push({
      tag: tagToString(tag),
      // Keep min <= default <= max even for sloppy fonts
      minValue: Math.min(min, def),
      defaultValue: def,
      maxValue: Math.max(max, def),
      nameId,
      hidden: (flags & AXIS_FLAG_HIDDEN) !== 0,
    })
  }

  return axes
}

/**
 * Map a user-space value onto -1..1 for one axis.
 *
 * Values are clamped to the axis range; the default maps to 0, the minimum
 * to -1 and the maximum to +1, linearly in between.
 */
export function normalizeAxisValue(axis: VariationAxis, value: number): number {
  const v = Math.min(axis.maxValue, Math.max(axis.minValue, value))
  const def = axis.defaultValue

  let normalized = 0
  if (v < def) {
    normalized = (v - def) / (def - axis.minValue)
  } else if (v > def) {
    normalized = (v - def) / (axis.maxValue - def)
  }

  return Math.abs(normalized) < NORMALIZE_EPSILON ? 0 : normalized
}

// Float in -1..1 to the nearest 2.14 value
export function toF2Dot14(value: number): number {
  const clamped = Math.min(1, Math.max(-1, value))
  return Math.round(clamped * F2DOT14_ONE) | 0
}

export function clampF2Dot14(value: number): number {
  return Math.min(F2DOT14_ONE, Math.max(-F2DOT14_ONE, Math.round(value)))
}
