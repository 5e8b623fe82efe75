// Glyph metrics variations, HVAR and VVAR
// https://learn.microsoft.com/en-us/typography/opentype/spec/hvar
// https://learn.microsoft.com/en-us/typography/opentype/spec/vvar

import { Reader } from '../shared/reader'
import { DeltaSetIndexMap, ItemVariationStore, type DeltaSetIndex } from './item-variation-store'

const VERSION_1_0 = 0x00010000

// Both tables start with the store offset, the advance mapping and the
// leading side bearing mapping (lsb for HVAR, tsb for VVAR). The trailing
// side bearing and vertical origin mappings are not read.
export class GlyphMetricsVariations {
  private constructor(
    private readonly store: ItemVariationStore,
    private readonly advanceMap: DeltaSetIndexMap | null,
    private readonly lsbMap: DeltaSetIndexMap | null
  ) {}

  static parse(data: Uint8Array): GlyphMetricsVariations | null {
    const buf = new Reader(data)
    if (buf.readU32() !== VERSION_1_0) return null
    const storeOffset = buf.readU32()
    const advanceMapOffset = buf.readU32()
    const lsbMapOffset = buf.readU32()
    if (storeOffset === null || advanceMapOffset === null || lsbMapOffset === null) return null
    if (storeOffset >= data.byteLength) return null

    const store = ItemVariationStore.parse(data.subarray(storeOffset))
    if (!store) return null

    const mapAt = (offset: number): DeltaSetIndexMap | null =>
      offset !== 0 && offset < data.byteLength ? DeltaSetIndexMap.parse(data.subarray(offset)) : null

    return new GlyphMetricsVariations(store, mapAt(advanceMapOffset), mapAt(lsbMapOffset))
  }

  // Without a mapping the glyph id is the inner index of subtable 0
  advanceDelta(glyphId: number, coordinates: ArrayLike<number>): number {
    const index: DeltaSetIndex = this.advanceMap
      ? this.advanceMap.map(glyphId)
      : { outer: glyphId >>> 16, inner: glyphId & 0xffff }
    return this.store.delta(index.outer, index.inner, coordinates) ?? 0
  }

  // Side bearings only vary through an explicit mapping
  sideBearingDelta(glyphId: number, coordinates: ArrayLike<number>): number {
    if (!this.lsbMap) return 0
    const index = this.lsbMap.map(glyphId)
    return this.store.delta(index.outer, index.inner, coordinates) ?? 0
  }
}
