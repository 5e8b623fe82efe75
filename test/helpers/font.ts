// Assemble complete synthetic fonts from table specs

import { buildSfnt, FLAVOR_CFF, FLAVOR_TRUETYPE, type TableList } from './sfnt'
import {
  encodeGlyfLoca,
  encodeGlyph,
  encodeHead,
  encodeHhea,
  encodeHmtx,
  encodeMaxp,
  type BBox,
  type GlyphSpec,
  type HorizontalMetric,
} from './tables'

export interface TestFontSpec {
  glyphs?: GlyphSpec[]
  // Raw glyph records, overriding `glyphs`
  glyphRecords?: Uint8Array[]
  // Replaces glyf/loca with a CFF table
  cff?: Uint8Array
  numGlyphs?: number
  unitsPerEm?: number
  bbox?: BBox
  ascender?: number
  descender?: number
  lineGap?: number
  indexToLocFormat?: 0 | 1
  // Defaults to one 500-unit record per glyph
  metrics?: HorizontalMetric[]
  trailingSideBearings?: number[]
  tables?: Record<string, Uint8Array>
}

export function fontTables(desc: TestFontSpec): TableList {
  const records = desc.glyphRecords ?? (desc.glyphs ?? []).map(encodeGlyph)
  const numGlyphs = desc.numGlyphs ?? Math.max(records.length, 1)
  const metrics = desc.metrics ?? Array.from({ length: numGlyphs }, () => ({ advance: 500, lsb: 0 }))
  const indexToLocFormat = desc.indexToLocFormat ?? 1

  const tables: TableList = [
    ['head', encodeHead({ unitsPerEm: desc.unitsPerEm, bbox: desc.bbox, indexToLocFormat })],
    [
      'hhea',
      encodeHhea({
        ascender: desc.ascender,
        descender: desc.descender,
        lineGap: desc.lineGap,
        numberOfHMetrics: metrics.length,
      }),
    ],
    ['maxp', encodeMaxp(numGlyphs)],
    ['hmtx', encodeHmtx(metrics, desc.trailingSideBearings)],
  ]

  if (desc.cff) {
    tables.push(['CFF ', desc.cff])
  } else if (records.length > 0) {
    const { glyf, loca } = encodeGlyfLoca(records, indexToLocFormat)
    tables.push(['glyf', glyf], ['loca', loca])
  }

  for (const [tag, data] of Object.entries(desc.tables ?? {})) {
    tables.push([tag, data])
  }
  return tables
}

export function buildFont(desc: TestFontSpec): Uint8Array {
  return buildSfnt(fontTables(desc), desc.cff ? FLAVOR_CFF : FLAVOR_TRUETYPE)
}
