// Fixed-layout metric tables: head, hhea/vhea, maxp, OS/2, post and hmtx/vmtx

import { Reader, readS16At, readU16At } from '../shared/reader'
import { MalformedFontError } from '../shared/errors'
import type { LineMetrics, Rect, ScriptMetrics } from '../types'

const HEAD_MIN_LENGTH = 54
// hhea and vhea share one layout
const METRICS_HEADER_LENGTH = 36
const MAXP_MIN_LENGTH = 6
// OS/2 version 0 with the typographic metrics present
const OS2_MIN_LENGTH = 78
// Version 2 adds sxHeight and sCapHeight
const OS2_V2_LENGTH = 96
const POST_HEADER_LENGTH = 32

const MAXP_VERSION_0_5 = 0x00005000
const MAXP_VERSION_1_0 = 0x00010000

// OS/2 fsSelection
const OS2_ITALIC = 1 << 0
const OS2_BOLD = 1 << 5
const OS2_REGULAR = 1 << 6
const OS2_USE_TYPO_METRICS = 1 << 7
const OS2_OBLIQUE = 1 << 9

// 0 = short (uint16 / 2), 1 = long (uint32)
export type IndexToLocFormat = 0 | 1

export interface HeadTable {
  unitsPerEm: number
  bbox: Rect
  // null when the stored value is neither 0 nor 1
  indexToLocFormat: IndexToLocFormat | null
}

// hhea or vhea
export interface MetricsHeader {
  ascender: number
  descender: number
  lineGap: number
  // Long records in the matching hmtx or vmtx
  numberOfMetrics: number
}

export interface Os2Table {
  version: number
  weightClass: number
  widthClass: number
  subscript: ScriptMetrics
  superscript: ScriptMetrics
  strikeout: LineMetrics
  fsSelection: number
  typoAscender: number
  typoDescender: number
  typoLineGap: number
  // Version 2 and later
  xHeight: number | null
  capHeight: number | null
}

export interface PostTable {
  italicAngle: number
  underline: LineMetrics
}

export function parseHead(data: Uint8Array | null): HeadTable {
  if (!data || data.byteLength < HEAD_MIN_LENGTH) {
    throw new MalformedFontError('Missing or invalid head table')
  }

  const buf = new Reader(data)
  buf.seek(18)
  const unitsPerEm = buf.readU16() ?? 0
  buf.seek(36)
  const bbox = {
    xMin: buf.readS16() ?? 0,
    yMin: buf.readS16() ?? 0,
    xMax: buf.readS16() ?? 0,
    yMax: buf.readS16() ?? 0,
  }
  buf.seek(50)
  const format = buf.readS16()

  return {
    unitsPerEm,
    bbox,
    indexToLocFormat: format === 0 || format === 1 ? format : null,
  }
}

// null when the table is too short
export function parseMetricsHeader(data: Uint8Array): MetricsHeader | null {
  if (data.byteLength < METRICS_HEADER_LENGTH) return null

  const buf = new Reader(data)
  buf.skip(4) // majorVersion, minorVersion
  const ascender = buf.readS16() ?? 0
  const descender = buf.readS16() ?? 0
  const lineGap = buf.readS16() ?? 0
  buf.seek(34)
  const numberOfMetrics = buf.readU16() ?? 0

  return { ascender, descender, lineGap, numberOfMetrics }
}

export function parseHhea(data: Uint8Array | null): MetricsHeader {
  const hhea = data ? parseMetricsHeader(data) : null
  if (!hhea) {
    throw new MalformedFontError('Missing or invalid hhea table')
  }
  return hhea
}

// Returns numGlyphs
export function parseMaxp(data: Uint8Array | null): number {
  if (!data || data.byteLength < MAXP_MIN_LENGTH) {
    throw new MalformedFontError('Missing or invalid maxp table')
  }

  const buf = new Reader(data)
  const version = buf.readU32()
  if (version !== MAXP_VERSION_0_5 && version !== MAXP_VERSION_1_0) {
    throw new MalformedFontError(`Unsupported maxp version: 0x${(version ?? 0).toString(16)}`)
  }

  const numGlyphs = buf.readU16() ?? 0
  if (numGlyphs === 0) {
    throw new MalformedFontError('Font has no glyphs')
  }
  return numGlyphs
}

function readScriptMetrics(buf: Reader): ScriptMetrics {
  return {
    xSize: buf.readS16() ?? 0,
    ySize: buf.readS16() ?? 0,
    xOffset: buf.readS16() ?? 0,
    yOffset: buf.readS16() ?? 0,
  }
}

// https://learn.microsoft.com/en-us/typography/opentype/spec/os2
export function parseOs2(data: Uint8Array): Os2Table | null {
  if (data.byteLength < OS2_MIN_LENGTH) return null

  const buf = new Reader(data)
  const version = buf.readU16() ?? 0
  buf.skip(2) // xAvgCharWidth
  const weightClass = buf.readU16() ?? 0
  const widthClass = buf.readU16() ?? 0
  buf.skip(2) // fsType
  const subscript = readScriptMetrics(buf)
  const superscript = readScriptMetrics(buf)
  const strikeoutSize = buf.readS16() ?? 0
  const strikeoutPosition = buf.readS16() ?? 0

  buf.seek(62)
  const fsSelection = buf.readU16() ?? 0
  buf.seek(68)
  const typoAscender = buf.readS16() ?? 0
  const typoDescender = buf.readS16() ?? 0
  const typoLineGap = buf.readS16() ?? 0

  const hasV2Fields = version >= 2 && data.byteLength >= OS2_V2_LENGTH

  return {
    version,
    weightClass,
    widthClass,
    subscript,
    superscript,
    strikeout: { position: strikeoutPosition, thickness: strikeoutSize },
    fsSelection,
    typoAscender,
    typoDescender,
    typoLineGap,
    xHeight: hasV2Fields ? readS16At(data, 86) : null,
    capHeight: hasV2Fields ? readS16At(data, 88) : null,
  }
}

export const os2Flags = {
  italic: (os2: Os2Table) => (os2.fsSelection & OS2_ITALIC) !== 0,
  bold: (os2: Os2Table) => (os2.fsSelection & OS2_BOLD) !== 0,
  regular: (os2: Os2Table) => (os2.fsSelection & OS2_REGULAR) !== 0,
  useTypoMetrics: (os2: Os2Table) => (os2.fsSelection & OS2_USE_TYPO_METRICS) !== 0,
  // Defined from version 4
  oblique: (os2: Os2Table) => os2.version >= 4 && (os2.fsSelection & OS2_OBLIQUE) !== 0,
}

// https://learn.microsoft.com/en-us/typography/opentype/spec/post
export function parsePost(data: Uint8Array): PostTable | null {
  if (data.byteLength < POST_HEADER_LENGTH) return null

  const buf = new Reader(data)
  buf.skip(4) // version
  const italicAngle = buf.readFixed() ?? 0
  const position = buf.readS16() ?? 0
  const thickness = buf.readS16() ?? 0

  return { italicAngle, underline: { position, thickness } }
}

/**
 * Per-glyph metrics from hmtx or vmtx.
 *
 * The first `numberOfMetrics` glyphs have a long record (advance + side
 * bearing). Every glyph after them reuses the advance of the last long record
 * and takes its side bearing from the trailing array.
 */
export class GlyphMetrics {
  private constructor(
    private readonly data: Uint8Array,
    private readonly numberOfMetrics: number,
    private readonly numGlyphs: number
  ) {}

  static parse(data: Uint8Array, numberOfMetrics: number, numGlyphs: number): GlyphMetrics | null {
    if (numberOfMetrics === 0 || data.byteLength < numberOfMetrics * 4) {
      return null
    }
    return new GlyphMetrics(data, numberOfMetrics, numGlyphs)
  }

  advance(glyphId: number): number | null {
    if (glyphId < 0 || glyphId >= this.numGlyphs) return null
    const record = Math.min(glyphId, this.numberOfMetrics - 1)
    return readU16At(this.data, record * 4)
  }

  sideBearing(glyphId: number): number | null {
    if (glyphId < 0 || glyphId >= this.numGlyphs) return null
    if (glyphId < this.numberOfMetrics) {
      return readS16At(this.data, glyphId * 4 + 2)
    }
    const tailOffset = this.numberOfMetrics * 4 + (glyphId - this.numberOfMetrics) * 2
    return readS16At(this.data, tailOffset)
  }
}
