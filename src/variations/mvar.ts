// Metrics variations
// https://learn.microsoft.com/en-us/typography/opentype/spec/mvar

import { Reader, readU16At, readU32At } from '../shared/reader'
import { stringToTag } from '../shared/known-tags'
import { ItemVariationStore } from './item-variation-store'

const MVAR_VERSION_1_0 = 0x00010000
// valueTag, deltaSetOuterIndex, deltaSetInnerIndex
const VALUE_RECORD_SIZE = 8

// Value tags for the metrics the font handle reports
export const MetricTag = {
  horizontalAscender: stringToTag('hasc'),
  horizontalDescender: stringToTag('hdsc'),
  horizontalLineGap: stringToTag('hlgp'),
  verticalAscender: stringToTag('vasc'),
  verticalDescender: stringToTag('vdsc'),
  verticalLineGap: stringToTag('vlgp'),
  xHeight: stringToTag('xhgt'),
  capHeight: stringToTag('cpht'),
  subscriptXSize: stringToTag('sbxs'),
  subscriptYSize: stringToTag('sbys'),
  subscriptXOffset: stringToTag('sbxo'),
  subscriptYOffset: stringToTag('sbyo'),
  superscriptXSize: stringToTag('spxs'),
  superscriptYSize: stringToTag('spys'),
  superscriptXOffset: stringToTag('spxo'),
  superscriptYOffset: stringToTag('spyo'),
  strikeoutSize: stringToTag('strs'),
  strikeoutOffset: stringToTag('stro'),
  underlineSize: stringToTag('unds'),
  underlineOffset: stringToTag('undo'),
} as const

/**
 * Font-wide metric deltas keyed by value tag. Records are sorted by tag and
 * may be longer than the eight bytes read from each.
 */
export class MetricsVariations {
  private constructor(
    private readonly records: Uint8Array,
    private readonly recordSize: number,
    private readonly recordCount: number,
    private readonly store: ItemVariationStore
  ) {}

  static parse(data: Uint8Array): MetricsVariations | null {
    const buf = new Reader(data)
    if (buf.readU32() !== MVAR_VERSION_1_0) return null
    buf.skip(2) // reserved
    const recordSize = buf.readU16()
    const recordCount = buf.readU16()
    const storeOffset = buf.readU16()
    if (recordSize === null || recordCount === null || storeOffset === null) return null
    if (recordSize < VALUE_RECORD_SIZE || recordCount === 0) return null
    if (storeOffset === 0 || storeOffset >= data.byteLength) return null

    const records = buf.readBytes(recordSize * recordCount)
    if (!records) return null
    const store = ItemVariationStore.parse(data.subarray(storeOffset))
    if (!store) return null

    return new MetricsVariations(records, recordSize, recordCount, store)
  }

  /** Interpolated delta for a value tag, or null when the tag has no record */
  delta(tag: number, coordinates: ArrayLike<number>): number | null {
    let lo = 0
    let hi = this.recordCount - 1
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1
      const offset = mid * this.recordSize
      const recordTag = readU32At(this.records, offset) ?? 0
      if (recordTag < tag) {
        lo = mid + 1
      } else if (recordTag > tag) {
        hi = mid - 1
      } else {
        const outer = readU16At(this.records, offset + 4) ?? 0
        const inner = readU16At(this.records, offset + 6) ?? 0
        return this.store.delta(outer, inner, coordinates)
      }
    }
    return null
  }
}
