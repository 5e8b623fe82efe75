// Axis variations: piecewise-linear remapping of normalized coordinates
// https://learn.microsoft.com/en-us/typography/opentype/spec/avar

import { Reader } from '../shared/reader'

const AVAR_VERSION_1_0 = 0x00010000

// One segment map per axis; pairs of (from, to) in 2.14 units
export interface SegmentMap {
  from: Int16Array
  to: Int16Array
}

export class AxisVariations {
  private constructor(private readonly maps: SegmentMap[]) {}

  static parse(data: Uint8Array): AxisVariations | null {
    const buf = new Reader(data)
    if (buf.readU32() !== AVAR_VERSION_1_0) return null
    buf.skip(2) // reserved
    const axisCount = buf.readU16()
    if (axisCount === null) return null

    const maps: SegmentMap[] = []
    for (let i = 0; i < axisCount; i++) {
      const count = buf.readU16()
      if (count === null) return null
      const from = new Int16Array(count)
      const to = new Int16Array(count)
      for (let j = 0; j < count; j++) {
        const f = buf.readS16()
        const t = buf.readS16()
        if (f === null || t === null) return null
        from[j] = f
        to[j] = t
      }
      maps.push({ from, to })
    }

    return new AxisVariations(maps)
  }

  get axisCount(): number {
    return this.maps.length
  }

  // Remap one normalized 2.14 coordinate; axes without a segment map pass through
  map(axisIndex: number, value: number): number {
    const map = this.maps[axisIndex]
    return map ? mapValue(map, value) : value
  }
}

export function mapValue(map: SegmentMap, value: number): number {
  const { from, to } = map
  const len = from.length
  if (len === 0) return value
  if (len === 1 || value <= from[0]) {
    return value - from[0] + to[0]
  }

  let i = 1
  while (i < len && value > from[i]) i++
  if (i === len) i--

  if (value >= from[i]) {
    return value - from[i] + to[i]
  }

  if (from[i - 1] === from[i]) return to[i - 1]

  const denom = from[i] - from[i - 1]
  const mapped =
    to[i - 1] + Math.trunc(((to[i] - to[i - 1]) * (value - from[i - 1]) + Math.trunc(denom / 2)) / denom)
  return mapped < -32768 || mapped > 32767 ? 0 : mapped
}
