// Glyph variations: per-point deltas for glyf outlines
// https://learn.microsoft.com/en-us/typography/opentype/spec/gvar

import { Reader, readU16At, readU32At } from '../shared/reader'
import { MalformedGlyphError } from '../shared/errors'
import { tupleScalar } from './tuple'

const GVAR_LONG_OFFSETS = 0x0001

// GlyphVariationData.tupleVariationCount
const SHARED_POINT_NUMBERS = 0x8000
const COUNT_MASK = 0x0fff

// TupleVariationHeader.tupleIndex
const EMBEDDED_PEAK_TUPLE = 0x8000
const INTERMEDIATE_REGION = 0x4000
const PRIVATE_POINT_NUMBERS = 0x2000
const TUPLE_INDEX_MASK = 0x0fff

// Packed point numbers
const POINTS_ARE_WORDS = 0x80
const POINT_RUN_COUNT_MASK = 0x7f

// Packed deltas
const DELTAS_ARE_ZERO = 0x80
const DELTAS_ARE_WORDS = 0x40
const DELTA_RUN_COUNT_MASK = 0x3f

// Left, right, top and bottom metrics points follow the outline points
export const PHANTOM_POINT_COUNT = 4

export interface PointDeltas {
  x: Float64Array
  y: Float64Array
}

interface Coordinate {
  x: number
  y: number
}

export class GlyphVariations {
  private constructor(
    private readonly data: Uint8Array,
    private readonly axisCount: number,
    private readonly sharedTuples: Int16Array,
    private readonly glyphCount: number,
    private readonly longOffsets: boolean,
    private readonly dataArrayOffset: number
  ) {}

  /**
   * Parse the gvar header. Returns null for an unsupported version, a header
   * that overruns the table, or an axis count that disagrees with fvar.
   */
  static parse(data: Uint8Array, axisCount: number): GlyphVariations | null {
    const buf = new Reader(data)
    const majorVersion = buf.readU16()
    buf.skip(2) // minorVersion
    const tableAxisCount = buf.readU16()
    const sharedTupleCount = buf.readU16()
    const sharedTuplesOffset = buf.readU32()
    const glyphCount = buf.readU16()
    const flags = buf.readU16()
    const dataArrayOffset = buf.readU32()

    if (
      majorVersion !== 1 ||
      tableAxisCount !== axisCount ||
      sharedTupleCount === null ||
      sharedTuplesOffset === null ||
      glyphCount === null ||
      flags === null ||
      dataArrayOffset === null
    ) {
      return null
    }

    const longOffsets = (flags & GVAR_LONG_OFFSETS) !== 0
    const offsetsSize = (glyphCount + 1) * (longOffsets ? 4 : 2)
    if (buf.remaining < offsetsSize) return null

    const sharedTuples = new Int16Array(sharedTupleCount * axisCount)
    const tuples = new Reader(data)
    if (!tuples.seek(sharedTuplesOffset)) return null
    for (let i = 0; i < sharedTuples.length; i++) {
      const value = tuples.readS16()
      if (value === null) return null
      sharedTuples[i] = value
    }

    return new GlyphVariations(data, axisCount, sharedTuples, glyphCount, longOffsets, dataArrayOffset)
  }

  private variationData(glyphId: number): Uint8Array | null {
    if (glyphId >= this.glyphCount) return null

    // Offsets array starts right after the 20-byte header
    let start: number | null
    let end: number | null
    if (this.longOffsets) {
      start = readU32At(this.data, 20 + glyphId * 4)
      end = readU32At(this.data, 20 + glyphId * 4 + 4)
    } else {
      const s = readU16At(this.data, 20 + glyphId * 2)
      const e = readU16At(this.data, 20 + glyphId * 2 + 2)
      start = s === null ? null : s * 2
      end = e === null ? null : e * 2
    }
    if (start === null || end === null || start === end) return null

    const from = this.dataArrayOffset + start
    const to = this.dataArrayOffset + end
    if (start > end || to > this.data.byteLength) {
      throw new MalformedGlyphError(glyphId, 'variation data outside the gvar table')
    }
    return this.data.subarray(from, to)
  }

  /**
   * Accumulated deltas for every point of a glyph plus its four phantom
   * points, or null when the glyph has no variation data.
   *
   * `points` are the default-instance coordinates (component offsets for a
   * composite glyph) and `endPoints` the contour ends used to infer deltas
   * of points a tuple leaves untouched; composites pass no contours.
   */
  glyphDeltas(
    glyphId: number,
    coordinates: ArrayLike<number>,
    points: readonly Coordinate[],
    endPoints: readonly number[]
  ): PointDeltas | null {
    const data = this.variationData(glyphId)
    if (!data) return null

    const malformed = (what: string) => new MalformedGlyphError(glyphId, `gvar ${what} truncated`)

    const buf = new Reader(data)
    const countField = buf.readU16()
    const serializedOffset = buf.readU16()
    if (countField === null || serializedOffset === null) throw malformed('header')

    const totalPoints = points.length + PHANTOM_POINT_COUNT
    const result: PointDeltas = {
      x: new Float64Array(totalPoints),
      y: new Float64Array(totalPoints),
    }

    const serialized = new Reader(data)
    if (!serialized.seek(serializedOffset)) throw malformed('serialized data')

    let sharedPoints: number[] | null = null
    if (countField & SHARED_POINT_NUMBERS) {
      const shared = readPackedPoints(serialized)
      if (shared === undefined) throw malformed('shared point numbers')
      sharedPoints = shared
    }

    const tupleCount = countField & COUNT_MASK
    const peak = new Int16Array(this.axisCount)
    const start = new Int16Array(this.axisCount)
    const end = new Int16Array(this.axisCount)

    for (let t = 0; t < tupleCount; t++) {
      const dataSize = buf.readU16()
      const tupleIndex = buf.readU16()
      if (dataSize === null || tupleIndex === null) throw malformed('tuple header')

      if (tupleIndex & EMBEDDED_PEAK_TUPLE) {
        if (!readTuple(buf, peak)) throw malformed('peak tuple')
      } else {
        const shared = tupleIndex & TUPLE_INDEX_MASK
        if ((shared + 1) * this.axisCount > this.sharedTuples.length) {
          throw new MalformedGlyphError(glyphId, `shared tuple ${shared} out of range`)
        }
        peak.set(this.sharedTuples.subarray(shared * this.axisCount, (shared + 1) * this.axisCount))
      }

      const intermediate = (tupleIndex & INTERMEDIATE_REGION) !== 0
      if (intermediate && !(readTuple(buf, start) && readTuple(buf, end))) {
        throw malformed('intermediate region')
      }

      const tupleData = serialized.readBytes(dataSize)
      if (!tupleData) throw malformed('tuple data')

      const scalar = tupleScalar(coordinates, peak, intermediate ? start : null, intermediate ? end : null)
      if (scalar === 0) continue

      const tuple = new Reader(tupleData)
      let pointNumbers = sharedPoints
      if (tupleIndex & PRIVATE_POINT_NUMBERS) {
        const own = readPackedPoints(tuple)
        if (own === undefined) throw malformed('point numbers')
        pointNumbers = own
      }

      const count = pointNumbers ? pointNumbers.length : totalPoints
      const xDeltas = readPackedDeltas(tuple, count)
      const yDeltas = xDeltas && readPackedDeltas(tuple, count)
      if (!xDeltas || !yDeltas) throw malformed('deltas')

      if (!pointNumbers) {
        for (let i = 0; i < totalPoints; i++) {
          result.x[i] += xDeltas[i] * scalar
          result.y[i] += yDeltas[i] * scalar
        }
        continue
      }

      const touched = new Uint8Array(totalPoints)
      const dx = new Float64Array(totalPoints)
      const dy = new Float64Array(totalPoints)
      pointNumbers.forEach((point, i) => {
        if (point >= totalPoints) return
        touched[point] = 1
        dx[point] = xDeltas[i]
        dy[point] = yDeltas[i]
      })

      inferDeltas(points, endPoints, touched, dx, dy)

      for (let i = 0; i < totalPoints; i++) {
        result.x[i] += dx[i] * scalar
        result.y[i] += dy[i] * scalar
      }
    }

    return result
  }
}

function readTuple(buf: Reader, into: Int16Array): boolean {
  for (let i = 0; i < into.length; i++) {
    const value = buf.readS16()
    if (value === null) return false
    into[i] = value
  }
  return true
}

/**
 * Packed point numbers. null means "all points"; undefined means the data
 * was truncated.
 */
function readPackedPoints(buf: Reader): number[] | null | undefined {
  const first = buf.readU8()
  if (first === null) return undefined
  if (first === 0) return null

  let count = first
  if (first & POINTS_ARE_WORDS) {
    const second = buf.readU8()
    if (second === null) return undefined
    count = ((first & POINT_RUN_COUNT_MASK) << 8) | second
  }

  const points: number[] = []
  let point = 0
  while (points.length < count) {
    const control = buf.readU8()
    if (control === null) return undefined
    const runCount = (control & POINT_RUN_COUNT_MASK) + 1
    const words = (control & POINTS_ARE_WORDS) !== 0

    for (let i = 0; i < runCount && points.length < count; i++) {
      const delta = words ? buf.readU16() : buf.readU8()
      if (delta === null) return undefined
      point += delta
      points.push(point)
    }
  }
  return points
}

function readPackedDeltas(buf: Reader, count: number): Int32Array | null {
  const deltas = new Int32Array(count)
  let i = 0
  while (i < count) {
    const control = buf.readU8()
    if (control === null) return null
    const runCount = (control & DELTA_RUN_COUNT_MASK) + 1
    const kind = control & (DELTAS_ARE_ZERO | DELTAS_ARE_WORDS)

    for (let j = 0; j < runCount && i < count; j++) {
      let delta: number | null = 0
      if (kind === (DELTAS_ARE_ZERO | DELTAS_ARE_WORDS)) {
        delta = buf.readS32()
      } else if (kind === DELTAS_ARE_WORDS) {
        delta = buf.readS16()
      } else if (kind === 0) {
        delta = buf.readI8()
      }
      if (delta === null) return null
      deltas[i++] = delta
    }
  }
  return deltas
}

/**
 * Interpolate deltas of untouched points from the nearest touched points on
 * either side within each contour. Phantom points and points outside every
 * contour keep whatever delta they were given.
 */
export function inferDeltas(
  points: readonly Coordinate[],
  endPoints: readonly number[],
  touched: Uint8Array,
  dx: Float64Array,
  dy: Float64Array
): void {
  let start = 0
  for (const end of endPoints) {
    if (end >= points.length) break
    inferContour(points, start, end, touched, dx, dy)
    start = end + 1
  }
}

function inferContour(
  points: readonly Coordinate[],
  start: number,
  end: number,
  touched: Uint8Array,
  dx: Float64Array,
  dy: Float64Array
): void {
  const touchedIndices: number[] = []
  for (let i = start; i <= end; i++) {
    if (touched[i]) touchedIndices.push(i)
  }

  if (touchedIndices.length === 0 || touchedIndices.length === end - start + 1) return

  if (touchedIndices.length === 1) {
    const only = touchedIndices[0]
    for (let i = start; i <= end; i++) {
      dx[i] = dx[only]
      dy[i] = dy[only]
    }
    return
  }

  const size = end - start + 1
  for (let k = 0; k < touchedIndices.length; k++) {
    const i1 = touchedIndices[k]
    const i2 = touchedIndices[(k + 1) % touchedIndices.length]
    // Walk the untouched run between i1 and i2, wrapping around the contour
    for (let i = start + ((i1 - start + 1) % size); i !== i2; i = start + ((i - start + 1) % size)) {
      dx[i] = interpolate(points[i].x, points[i1].x, dx[i1], points[i2].x, dx[i2])
      dy[i] = interpolate(points[i].y, points[i1].y, dy[i1], points[i2].y, dy[i2])
    }
  }
}

function interpolate(c: number, c1: number, d1: number, c2: number, d2: number): number {
  if (c1 === c2) return d1 === d2 ? d1 : 0
  if (c1 > c2) return interpolate(c, c2, d2, c1, d1)
  if (c <= c1) return d1
  if (c >= c2) return d2
  return d1 + ((c - c1) * (d2 - d1)) / (c2 - c1)
}
