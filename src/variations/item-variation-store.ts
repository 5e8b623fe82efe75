// Item variation store and delta-set index maps
// https://learn.microsoft.com/en-us/typography/opentype/spec/otvarcommonformats

import { Reader } from '../shared/reader'
import { axisScalar } from './tuple'

const LONG_WORDS = 0x8000
const WORD_DELTA_COUNT_MASK = 0x7fff

interface ItemVariationData {
  itemCount: number
  wordDeltaCount: number
  longWords: boolean
  regionIndexes: Uint16Array
  rowSize: number
  deltas: Uint8Array
}

export class ItemVariationStore {
  private constructor(
    private readonly axisCount: number,
    // start, peak, end per axis per region
    private readonly regions: Int16Array,
    private readonly regionCount: number,
    private readonly subtables: (ItemVariationData | null)[]
  ) {}

  static parse(data: Uint8Array): ItemVariationStore | null {
    const buf = new Reader(data)
    const format = buf.readU16()
    const regionListOffset = buf.readU32()
    const dataCount = buf.readU16()
    if (format !== 1 || regionListOffset === null || dataCount === null) return null

    const dataOffsets: number[] = []
    for (let i = 0; i < dataCount; i++) {
      const offset = buf.readU32()
      if (offset === null) return null
      dataOffsets.push(offset)
    }

    const regionBuf = new Reader(data)
    if (!regionBuf.seek(regionListOffset)) return null
    const axisCount = regionBuf.readU16()
    const regionCount = regionBuf.readU16()
    if (axisCount === null || regionCount === null) return null

    const regions = new Int16Array(axisCount * regionCount * 3)
    for (let i = 0; i < regions.length; i++) {
      const value = regionBuf.readS16()
      if (value === null) return null
      regions[i] = value
    }

    const subtables = dataOffsets.map((offset) => parseItemVariationData(data, offset))
    return new ItemVariationStore(axisCount, regions, regionCount, subtables)
  }

  private regionScalar(region: number, coordinates: ArrayLike<number>): number {
    if (region >= this.regionCount) return 0

    let scalar = 1
    for (let axis = 0; axis < this.axisCount; axis++) {
      const base = (region * this.axisCount + axis) * 3
      const coord = axis < coordinates.length ? coordinates[axis] : 0
      const factor = axisScalar(coord, this.regions[base], this.regions[base + 1], this.regions[base + 2])
      if (factor === 0) return 0
      scalar *= factor
    }
    return scalar
  }

  // Interpolated delta for one item, or null when the indices are out of range
  delta(outer: number, inner: number, coordinates: ArrayLike<number>): number | null {
    const subtable = this.subtables[outer]
    if (!subtable || inner >= subtable.itemCount) return null

    const row = new Reader(subtable.deltas, inner * subtable.rowSize, subtable.rowSize)
    let total = 0
    for (let i = 0; i < subtable.regionIndexes.length; i++) {
      const isWord = i < subtable.wordDeltaCount
      let delta: number | null
      if (subtable.longWords) {
        delta = isWord ? row.readS32() : row.readS16()
      } else {
        delta = isWord ? row.readS16() : row.readI8()
      }
      if (delta === null) return null
      if (delta === 0) continue
      total += delta * this.regionScalar(subtable.regionIndexes[i], coordinates)
    }
    return total
  }
}

function parseItemVariationData(data: Uint8Array, offset: number): ItemVariationData | null {
  const buf = new Reader(data)
  if (!buf.seek(offset)) return null
  const itemCount = buf.readU16()
  const wordField = buf.readU16()
  const regionIndexCount = buf.readU16()
  if (itemCount === null || wordField === null || regionIndexCount === null) return null

  const regionIndexes = new Uint16Array(regionIndexCount)
  for (let i = 0; i < regionIndexCount; i++) {
    const index = buf.readU16()
    if (index === null) return null
    regionIndexes[i] = index
  }

  const longWords = (wordField & LONG_WORDS) !== 0
  const wordDeltaCount = Math.min(wordField & WORD_DELTA_COUNT_MASK, regionIndexCount)
  const wordSize = longWords ? 4 : 2
  const shortSize = longWords ? 2 : 1
  const rowSize = wordDeltaCount * wordSize + (regionIndexCount - wordDeltaCount) * shortSize

  const deltas = buf.readBytes(rowSize * itemCount)
  if (!deltas) return null

  return { itemCount, wordDeltaCount, longWords, regionIndexes, rowSize, deltas }
}

export interface DeltaSetIndex {
  outer: number
  inner: number
}

/**
 * Glyph id to (outer, inner) store index. Glyph ids past the end of the map
 * use its last entry.
 */
export class DeltaSetIndexMap {
  private constructor(
    private readonly entries: Uint8Array,
    private readonly mapCount: number,
    private readonly entrySize: number,
    private readonly innerBits: number
  ) {}

  static parse(data: Uint8Array): DeltaSetIndexMap | null {
    const buf = new Reader(data)
    const format = buf.readU8()
    const entryFormat = buf.readU8()
    if (format === null || entryFormat === null) return null

    let mapCount: number | null
    if (format === 0) {
      mapCount = buf.readU16()
    } else if (format === 1) {
      mapCount = buf.readU32()
    } else {
      return null
    }
    if (mapCount === null || mapCount === 0) return null

    const entrySize = ((entryFormat >> 4) & 3) + 1
    const innerBits = (entryFormat & 0xf) + 1
    const entries = buf.readBytes(entrySize * mapCount)
    if (!entries) return null

    return new DeltaSetIndexMap(entries, mapCount, entrySize, innerBits)
  }

  map(glyphId: number): DeltaSetIndex {
    const idx = Math.min(glyphId, this.mapCount - 1)
    let n = 0
    for (let i = 0; i < this.entrySize; i++) {
      n = n * 256 + this.entries[idx * this.entrySize + i]
    }
    const divisor = 2 ** this.innerBits
    return { outer: Math.floor(n / divisor), inner: n % divisor }
  }
}
