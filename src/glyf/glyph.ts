// glyf table glyph records
// https://learn.microsoft.com/en-us/typography/opentype/spec/glyf

import { Reader } from '../shared/reader'
import { MalformedGlyphError } from '../shared/errors'
import type { Rect } from '../types'

// TrueType glyph flags
export const FLAG_ON_CURVE = 0x01
export const FLAG_X_SHORT = 0x02
export const FLAG_Y_SHORT = 0x04
export const FLAG_REPEAT = 0x08
export const FLAG_X_SAME_OR_POSITIVE = 0x10
export const FLAG_Y_SAME_OR_POSITIVE = 0x20

// Composite glyph flags
export const COMP_ARG_1_AND_2_ARE_WORDS = 0x0001
export const COMP_ARGS_ARE_XY_VALUES = 0x0002
export const COMP_WE_HAVE_A_SCALE = 0x0008
export const COMP_MORE_COMPONENTS = 0x0020
export const COMP_WE_HAVE_AN_X_AND_Y_SCALE = 0x0040
export const COMP_WE_HAVE_A_TWO_BY_TWO = 0x0080
export const COMP_SCALED_COMPONENT_OFFSET = 0x0800
export const COMP_UNSCALED_COMPONENT_OFFSET = 0x1000

const GLYPH_HEADER_SIZE = 10

export interface GlyphPoint {
  x: number
  y: number
  onCurve: boolean
  // Last point of its contour
  lastPoint: boolean
}

export interface SimpleGlyph {
  kind: 'simple'
  bbox: Rect
  points: GlyphPoint[]
  // Index of the last point of each contour
  endPoints: number[]
}

// Linear part of a component transform:
//   x' = a * x + c * y
//   y' = b * x + d * y
export interface Transform {
  a: number
  b: number
  c: number
  d: number
}

export interface Component {
  glyphId: number
  flags: number
  // The offset comes from arg1/arg2
  transform: Transform
  // x/y offset when ARGS_ARE_XY_VALUES, point numbers otherwise
  arg1: number
  arg2: number
}

export interface CompositeGlyph {
  kind: 'composite'
  bbox: Rect
  components: Component[]
}

export type ParsedGlyph = SimpleGlyph | CompositeGlyph

function truncated(glyphId: number, what: string): MalformedGlyphError {
  return new MalformedGlyphError(glyphId, `${what} truncated`)
}

// Parse a single non-empty glyph record
export function parseGlyph(glyphId: number, data: Uint8Array): ParsedGlyph {
  if (data.byteLength < GLYPH_HEADER_SIZE) {
    throw truncated(glyphId, 'glyph header')
  }

  const buf = new Reader(data)
  const nContours = buf.readS16() ?? 0
  const bbox: Rect = {
    xMin: buf.readS16() ?? 0,
    yMin: buf.readS16() ?? 0,
    xMax: buf.readS16() ?? 0,
    yMax: buf.readS16() ?? 0,
  }

  if (nContours >= 0) {
    return parseSimpleGlyph(glyphId, buf, nContours, bbox)
  }
  return parseCompositeGlyph(glyphId, buf, bbox)
}

function parseSimpleGlyph(
  glyphId: number,
  buf: Reader,
  nContours: number,
  bbox: Rect
): SimpleGlyph {
  // Read endPtsOfContours
  const endPoints: number[] = []
  let previous = -1
  for (let i = 0; i < nContours; i++) {
    const end = buf.readU16()
    if (end === null) throw truncated(glyphId, 'contour end points')
    if (end < previous) {
      throw new MalformedGlyphError(glyphId, `contour end point ${end} precedes ${previous}`)
    }
    endPoints.push(end)
    previous = end
  }

  const numPoints = nContours > 0 ? endPoints[nContours - 1] + 1 : 0

  // Skip instructions
  const instructionLength = buf.readU16()
  if (instructionLength === null || !buf.skip(instructionLength)) {
    throw truncated(glyphId, 'instructions')
  }

  // Read flags (run-length encoded)
  const flags = new Uint8Array(numPoints)
  let flagIndex = 0
  while (flagIndex < numPoints) {
    const flag = buf.readU8()
    if (flag === null) throw truncated(glyphId, 'flags')
    flags[flagIndex++] = flag

    if (flag & FLAG_REPEAT) {
      const repeatCount = buf.readU8()
      if (repeatCount === null) throw truncated(glyphId, 'flag repeat count')
      if (flagIndex + repeatCount > numPoints) {
        throw new MalformedGlyphError(glyphId, 'flag repeat runs past the last point')
      }
      for (let j = 0; j < repeatCount; j++) {
        flags[flagIndex++] = flag
      }
    }
  }

  const xCoordinates = readCoordinates(glyphId, buf, flags, FLAG_X_SHORT, FLAG_X_SAME_OR_POSITIVE)
  const yCoordinates = readCoordinates(glyphId, buf, flags, FLAG_Y_SHORT, FLAG_Y_SAME_OR_POSITIVE)

  const points: GlyphPoint[] = new Array(numPoints)
  let contour = 0
  for (let i = 0; i < numPoints; i++) {
    while (endPoints[contour] < i) contour++
    points[i] = {
      x: xCoordinates[i],
      y: yCoordinates[i],
      onCurve: (flags[i] & FLAG_ON_CURVE) !== 0,
      lastPoint: endPoints[contour] === i,
    }
  }

  return { kind: 'simple', bbox, points, endPoints }
}

// Delta-encoded coordinates into absolute int16 values
function readCoordinates(
  glyphId: number,
  buf: Reader,
  flags: Uint8Array,
  shortFlag: number,
  sameOrPositiveFlag: number
): Int16Array {
  const coordinates = new Int16Array(flags.length)
  let value = 0
  for (let i = 0; i < flags.length; i++) {
    const flag = flags[i]
    if (flag & shortFlag) {
      const delta = buf.readU8()
      if (delta === null) throw truncated(glyphId, 'coordinates')
      value += (flag & sameOrPositiveFlag) ? delta : -delta
    } else if (!(flag & sameOrPositiveFlag)) {
      const delta = buf.readS16()
      if (delta === null) throw truncated(glyphId, 'coordinates')
      value += delta
    }
    // Int16Array storage wraps like the format's 16-bit arithmetic
    coordinates[i] = value
    value = coordinates[i]
  }
  return coordinates
}

function parseCompositeGlyph(glyphId: number, buf: Reader, bbox: Rect): CompositeGlyph {
  const components: Component[] = []
  let flags = COMP_MORE_COMPONENTS

  while (flags & COMP_MORE_COMPONENTS) {
    const nextFlags = buf.readU16()
    const childId = buf.readU16()
    if (nextFlags === null || childId === null) throw truncated(glyphId, 'component record')
    flags = nextFlags

    let arg1: number | null
    let arg2: number | null
    const xyValues = (flags & COMP_ARGS_ARE_XY_VALUES) !== 0
    if (flags & COMP_ARG_1_AND_2_ARE_WORDS) {
      arg1 = xyValues ? buf.readS16() : buf.readU16()
      arg2 = xyValues ? buf.readS16() : buf.readU16()
    } else {
      arg1 = xyValues ? buf.readI8() : buf.readU8()
      arg2 = xyValues ? buf.readI8() : buf.readU8()
    }
    if (arg1 === null || arg2 === null) throw truncated(glyphId, 'component arguments')

    const transform: Transform = { a: 1, b: 0, c: 0, d: 1 }
    if (flags & COMP_WE_HAVE_A_TWO_BY_TWO) {
      const a = buf.readF2Dot14()
      const b = buf.readF2Dot14()
      const c = buf.readF2Dot14()
      const d = buf.readF2Dot14()
      if (a === null || b === null || c === null || d === null) {
        throw truncated(glyphId, 'component matrix')
      }
      transform.a = a
      transform.b = b
      transform.c = c
      transform.d = d
    } else if (flags & COMP_WE_HAVE_AN_X_AND_Y_SCALE) {
      const a = buf.readF2Dot14()
      const d = buf.readF2Dot14()
      if (a === null || d === null) throw truncated(glyphId, 'component scale')
      transform.a = a
      transform.d = d
    } else if (flags & COMP_WE_HAVE_A_SCALE) {
      const scale = buf.readF2Dot14()
      if (scale === null) throw truncated(glyphId, 'component scale')
      // Scale is documented to lie in -2..2
      transform.a = Math.min(2, Math.max(-2, scale))
      transform.d = transform.a
    }

    components.push({ glyphId: childId, flags, transform, arg1, arg2 })
  }

  return { kind: 'composite', bbox, components }
}
