// Index to location
// https://learn.microsoft.com/en-us/typography/opentype/spec/loca

import { readU16At, readU32At } from '../shared/reader'
import type { IndexToLocFormat } from '../sfnt/metrics'

export interface GlyphRange {
  start: number
  end: number
}

export class GlyphLocations {
  private readonly data: Uint8Array
  private readonly format: IndexToLocFormat
  // Entries actually present, at most numGlyphs + 1
  private readonly entryCount: number

  constructor(data: Uint8Array, format: IndexToLocFormat, numGlyphs: number) {
    this.data = data
    this.format = format
    const entrySize = format === 0 ? 2 : 4
    this.entryCount = Math.min(numGlyphs + 1, Math.floor(data.byteLength / entrySize))
  }

  /**
   * Byte range of a glyph inside `glyf`, or null when `loca` has no entries
   * for it. The range is not validated against `glyf`.
   */
  range(glyphId: number): GlyphRange | null {
    if (glyphId < 0 || glyphId + 1 >= this.entryCount) return null

    if (this.format === 0) {
      // Short format: uint16, multiply by 2
      const start = readU16At(this.data, glyphId * 2)
      const end = readU16At(this.data, glyphId * 2 + 2)
      if (start === null || end === null) return null
      return { start: start * 2, end: end * 2 }
    }

    const start = readU32At(this.data, glyphId * 4)
    const end = readU32At(this.data, glyphId * 4 + 4)
    if (start === null || end === null) return null
    return { start, end }
  }
}
