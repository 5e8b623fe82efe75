// Font handle: table directory, cached metrics, outlines and variation state

import { CompactFontTable } from './cff/table'
import { GlyphLocations } from './glyf/loca'
import { glyfBoundingBox, outlineGlyf, type GlyfContext } from './glyf/outline'
import { OutOfRangeError, UnknownAxisError } from './shared/errors'
import { discardingBuilder } from './shared/path-sink'
import {
  TAG_AVAR,
  TAG_CFF,
  TAG_FVAR,
  TAG_GLYF,
  TAG_GVAR,
  TAG_HEAD,
  TAG_HHEA,
  TAG_HMTX,
  TAG_HVAR,
  TAG_LOCA,
  TAG_MAXP,
  TAG_MVAR,
  TAG_OS2,
  TAG_POST,
  TAG_VHEA,
  TAG_VMTX,
  TAG_VVAR,
  stringToTag,
} from './shared/known-tags'
import { getTableData, parseDirectory, type TableDirectory } from './sfnt/directory'
import {
  GlyphMetrics,
  os2Flags,
  parseHead,
  parseHhea,
  parseMaxp,
  parseMetricsHeader,
  parseOs2,
  parsePost,
  type HeadTable,
  type MetricsHeader,
  type Os2Table,
  type PostTable,
} from './sfnt/metrics'
import {
  DEFAULT_FONT_OPTIONS,
  type FontOptions,
  type LineMetrics,
  type Logger,
  type OutlineBuilder,
  type Rect,
  type ScriptMetrics,
  type VariationAxis,
  type VariationSetting,
} from './types'
import { AxisVariations } from './variations/avar'
import { clampF2Dot14, normalizeAxisValue, parseFvar, toF2Dot14 } from './variations/fvar'
import { GlyphVariations } from './variations/gvar'
import { GlyphMetricsVariations } from './variations/hvar'
import { MetricTag, MetricsVariations } from './variations/mvar'

const MIN_UNITS_PER_EM = 16
const MAX_UNITS_PER_EM = 16384

const DEFAULT_WEIGHT_CLASS = 400
const DEFAULT_WIDTH_CLASS = 5

interface GlyfTables {
  glyf: Uint8Array
  loca: GlyphLocations
}

interface MetricTables {
  head: HeadTable
  hhea: MetricsHeader
  vhea: MetricsHeader | null
  os2: Os2Table | null
  post: PostTable | null
  hmtx: GlyphMetrics | null
  vmtx: GlyphMetrics | null
}

interface VariationTables {
  axes: VariationAxis[]
  avar: AxisVariations | null
  gvar: GlyphVariations | null
  hvar: GlyphMetricsVariations | null
  vvar: GlyphMetricsVariations | null
  mvar: MetricsVariations | null
}

function toUint8Array(data: ArrayBuffer | Uint8Array): Uint8Array {
  return data instanceof Uint8Array ? data : new Uint8Array(data)
}

/**
 * A parsed font over a borrowed buffer.
 *
 * Everything except the variation coordinates is immutable once created.
 * Setting coordinates while an outline request on the same handle is in
 * progress is not supported; use one handle per coordinate setting.
 */
export class Font {
  private coordinates: Int16Array

  private constructor(
    private readonly directory: TableDirectory,
    private readonly metrics: MetricTables,
    private readonly numGlyphs: number,
    private readonly glyfTables: GlyfTables | null,
    private readonly cff: CompactFontTable | null,
    private readonly variations: VariationTables,
    private readonly maxComponentDepth: number
  ) {
    this.coordinates = new Int16Array(variations.axes.length)
  }

  /**
   * Parse font `index` of `data` (0 for a single font).
   *
   * Throws MalformedFontError when the directory or a required table (head,
   * hhea, maxp) is unusable, and FontIndexOutOfBoundsError for a bad
   * collection index. Broken optional tables are dropped with a warning.
   */
  static create(data: ArrayBuffer | Uint8Array, index: number = 0, options: FontOptions = {}): Font {
    const logger = options.logger ?? DEFAULT_FONT_OPTIONS.logger
    const maxComponentDepth = Math.max(
      1,
      Math.floor(options.maxComponentDepth ?? DEFAULT_FONT_OPTIONS.maxComponentDepth)
    )

    const directory = parseDirectory(toUint8Array(data), index, logger)
    const table = (tag: number) => getTableData(directory, tag)

    const head = parseHead(table(TAG_HEAD))
    const hhea = parseHhea(table(TAG_HHEA))
    const numGlyphs = parseMaxp(table(TAG_MAXP))

    const metrics = loadMetrics(table, head, hhea, numGlyphs, logger)
    const glyfTables = loadGlyf(table(TAG_GLYF), table(TAG_LOCA), head, numGlyphs, logger)

    let cff: CompactFontTable | null = null
    const cffData = table(TAG_CFF)
    if (cffData && !glyfTables) {
      cff = CompactFontTable.parse(cffData, numGlyphs)
      if (!cff) logger.warn('CFF table is not a supported CFF version 1 font; outlines are unavailable')
    }

    const variations = loadVariations(table, logger)

    return new Font(directory, metrics, numGlyphs, glyfTables, cff, variations, maxComponentDepth)
  }

  // Metrics. Font-wide values follow MVAR away from the default instance.

  private varied(value: number, tag: number): number {
    const mvar = this.variations.mvar
    if (!mvar || !this.hasActiveCoordinates) return value
    return Math.round(value + (mvar.delta(tag, this.coordinates) ?? 0))
  }

  // OS/2 when its typographic metrics replace hhea's
  private get typoMetrics(): Os2Table | null {
    const os2 = this.metrics.os2
    return os2 && os2Flags.useTypoMetrics(os2) ? os2 : null
  }

  get ascender(): number {
    const value = this.typoMetrics?.typoAscender ?? this.metrics.hhea.ascender
    return this.varied(value, MetricTag.horizontalAscender)
  }

  get descender(): number {
    const value = this.typoMetrics?.typoDescender ?? this.metrics.hhea.descender
    return this.varied(value, MetricTag.horizontalDescender)
  }

  get lineGap(): number {
    const value = this.typoMetrics?.typoLineGap ?? this.metrics.hhea.lineGap
    return this.varied(value, MetricTag.horizontalLineGap)
  }

  get height(): number {
    return this.ascender - this.descender
  }

  // null when the stored value is outside the valid 16..16384 range
  get unitsPerEm(): number | null {
    const upem = this.metrics.head.unitsPerEm
    return upem >= MIN_UNITS_PER_EM && upem <= MAX_UNITS_PER_EM ? upem : null
  }

  get globalBoundingBox(): Rect {
    return { ...this.metrics.head.bbox }
  }

  get numberOfGlyphs(): number {
    return this.numGlyphs
  }

  // usWeightClass, 400 without OS/2
  get weight(): number {
    return this.metrics.os2?.weightClass ?? DEFAULT_WEIGHT_CLASS
  }

  // usWidthClass 1..9, 5 (normal) without OS/2 or for an invalid value
  get width(): number {
    const width = this.metrics.os2?.widthClass ?? DEFAULT_WIDTH_CLASS
    return width >= 1 && width <= 9 ? width : DEFAULT_WIDTH_CLASS
  }

  get isRegular(): boolean {
    return this.metrics.os2 ? os2Flags.regular(this.metrics.os2) : false
  }

  get isItalic(): boolean {
    return this.metrics.os2 ? os2Flags.italic(this.metrics.os2) : false
  }

  get isBold(): boolean {
    return this.metrics.os2 ? os2Flags.bold(this.metrics.os2) : false
  }

  get isOblique(): boolean {
    return this.metrics.os2 ? os2Flags.oblique(this.metrics.os2) : false
  }

  // Degrees counter-clockwise from vertical, from post
  get italicAngle(): number | null {
    return this.metrics.post?.italicAngle ?? null
  }

  // OS/2 version 2 and later
  get xHeight(): number | null {
    const value = this.metrics.os2?.xHeight ?? null
    return value === null ? null : this.varied(value, MetricTag.xHeight)
  }

  get capitalHeight(): number | null {
    const value = this.metrics.os2?.capHeight ?? null
    return value === null ? null : this.varied(value, MetricTag.capHeight)
  }

  get underlineMetrics(): LineMetrics | null {
    const underline = this.metrics.post?.underline
    if (!underline) return null
    return {
      position: this.varied(underline.position, MetricTag.underlineOffset),
      thickness: this.varied(underline.thickness, MetricTag.underlineSize),
    }
  }

  get strikeoutMetrics(): LineMetrics | null {
    const strikeout = this.metrics.os2?.strikeout
    if (!strikeout) return null
    return {
      position: this.varied(strikeout.position, MetricTag.strikeoutOffset),
      thickness: this.varied(strikeout.thickness, MetricTag.strikeoutSize),
    }
  }

  get subscriptMetrics(): ScriptMetrics | null {
    const subscript = this.metrics.os2?.subscript
    if (!subscript) return null
    return {
      xSize: this.varied(subscript.xSize, MetricTag.subscriptXSize),
      ySize: this.varied(subscript.ySize, MetricTag.subscriptYSize),
      xOffset: this.varied(subscript.xOffset, MetricTag.subscriptXOffset),
      yOffset: this.varied(subscript.yOffset, MetricTag.subscriptYOffset),
    }
  }

  get superscriptMetrics(): ScriptMetrics | null {
    const superscript = this.metrics.os2?.superscript
    if (!superscript) return null
    return {
      xSize: this.varied(superscript.xSize, MetricTag.superscriptXSize),
      ySize: this.varied(superscript.ySize, MetricTag.superscriptYSize),
      xOffset: this.varied(superscript.xOffset, MetricTag.superscriptXOffset),
      yOffset: this.varied(superscript.yOffset, MetricTag.superscriptYOffset),
    }
  }

  /**
   * MVAR delta for a value tag (e.g. 'xhgt') at the stored coordinates, or
   * null when the font has no MVAR record for it.
   */
  metricsVariation(tag: string): number | null {
    const mvar = this.variations.mvar
    return mvar ? mvar.delta(stringToTag(tag), this.coordinates) : null
  }

  hasTable(tag: string): boolean {
    return this.directory.tables.has(stringToTag(tag))
  }

  private isValidGlyph(glyphId: number): boolean {
    return Number.isInteger(glyphId) && glyphId >= 0 && glyphId < this.numGlyphs
  }

  private get hasActiveCoordinates(): boolean {
    return this.coordinates.some((c) => c !== 0)
  }

  private advanceOf(
    table: GlyphMetrics | null,
    variations: GlyphMetricsVariations | null,
    glyphId: number
  ): number | null {
    if (!table || !this.isValidGlyph(glyphId)) return null
    const advance = table.advance(glyphId)
    if (advance === null || !variations || !this.hasActiveCoordinates) return advance
    return Math.max(0, Math.round(advance + variations.advanceDelta(glyphId, this.coordinates)))
  }

  private sideBearingOf(
    table: GlyphMetrics | null,
    variations: GlyphMetricsVariations | null,
    glyphId: number
  ): number | null {
    if (!table || !this.isValidGlyph(glyphId)) return null
    const sideBearing = table.sideBearing(glyphId)
    if (sideBearing === null || !variations || !this.hasActiveCoordinates) return sideBearing
    return Math.round(sideBearing + variations.sideBearingDelta(glyphId, this.coordinates))
  }

  glyphAdvance(glyphId: number): number | null {
    return this.advanceOf(this.metrics.hmtx, this.variations.hvar, glyphId)
  }

  glyphSideBearing(glyphId: number): number | null {
    return this.sideBearingOf(this.metrics.hmtx, this.variations.hvar, glyphId)
  }

  // Vertical metrics, from vhea, vmtx and VVAR

  get isVertical(): boolean {
    return this.metrics.vhea !== null
  }

  get verticalAscender(): number | null {
    const vhea = this.metrics.vhea
    return vhea ? this.varied(vhea.ascender, MetricTag.verticalAscender) : null
  }

  get verticalDescender(): number | null {
    const vhea = this.metrics.vhea
    return vhea ? this.varied(vhea.descender, MetricTag.verticalDescender) : null
  }

  get verticalLineGap(): number | null {
    const vhea = this.metrics.vhea
    return vhea ? this.varied(vhea.lineGap, MetricTag.verticalLineGap) : null
  }

  glyphVerticalAdvance(glyphId: number): number | null {
    return this.advanceOf(this.metrics.vmtx, this.variations.vvar, glyphId)
  }

  // Top side bearing
  glyphVerticalSideBearing(glyphId: number): number | null {
    return this.sideBearingOf(this.metrics.vmtx, this.variations.vvar, glyphId)
  }

  /**
   * The bbox `outlineGlyph` would return, without emitting an outline. Only
   * simple glyf glyphs at the default instance skip decoding: they report the
   * stored header bbox. Composites report the bounds of their resolved points.
   */
  glyphBoundingBox(glyphId: number): Rect | null {
    if (!this.isValidGlyph(glyphId)) return null
    if (this.glyfTables) {
      const active = this.hasActiveCoordinates ? this.coordinates : null
      return glyfBoundingBox(this.glyfContext(this.glyfTables, active), glyphId)
    }
    return this.outlineGlyph(glyphId, discardingBuilder)
  }

  // Outlines

  private glyfContext(tables: GlyfTables, coordinates: Int16Array | null): GlyfContext {
    return {
      glyf: tables.glyf,
      loca: tables.loca,
      numGlyphs: this.numGlyphs,
      maxDepth: this.maxComponentDepth,
      gvar: this.variations.gvar,
      coordinates,
    }
  }

  private outlineWith(glyphId: number, builder: OutlineBuilder, coordinates: Int16Array | null): Rect | null {
    if (!this.isValidGlyph(glyphId)) return null

    if (this.glyfTables) {
      const active = coordinates && coordinates.some((c) => c !== 0) ? coordinates : null
      return outlineGlyf(this.glyfContext(this.glyfTables, active), glyphId, builder)
    }
    if (this.cff) {
      return this.cff.outline(glyphId, builder)
    }
    return null
  }

  /**
   * Emit a glyph outline at the stored variation coordinates.
   *
   * Returns the glyph bbox, or null for an empty glyph (no contours, a
   * zero-length record, or a glyph id past the end of the font). Malformed
   * glyph data throws MalformedGlyphError; the font stays usable.
   */
  outlineGlyph(glyphId: number, builder: OutlineBuilder): Rect | null {
    return this.outlineWith(glyphId, builder, this.coordinates)
  }

  /**
   * Emit a glyph outline at explicit normalized 2.14 coordinates, one per
   * axis in fvar order, ignoring the stored ones. Values are clamped to
   * -16384..16384.
   */
  outlineVariableGlyph(glyphId: number, builder: OutlineBuilder, coordinates: readonly number[]): Rect | null {
    if (coordinates.length !== this.variations.axes.length) {
      throw new OutOfRangeError(
        `Expected ${this.variations.axes.length} coordinates, got ${coordinates.length}`
      )
    }
    return this.outlineWith(glyphId, builder, Int16Array.from(coordinates, clampF2Dot14))
  }

  // Variation axes

  get isVariable(): boolean {
    return this.variations.axes.length > 0
  }

  get variationAxisCount(): number {
    return this.variations.axes.length
  }

  variationAxis(index: number): VariationAxis {
    const axis = this.variations.axes[index]
    if (!Number.isInteger(index) || !axis) {
      throw new OutOfRangeError(
        `Axis index ${index} is out of range for ${this.variations.axes.length} axes`
      )
    }
    return { ...axis }
  }

  variationAxisByTag(tag: string): VariationAxis {
    return { ...this.variations.axes[this.axisIndex(tag)] }
  }

  variationAxes(): VariationAxis[] {
    return this.variations.axes.map((axis) => ({ ...axis }))
  }

  private axisIndex(tag: string): number {
    const index = this.variations.axes.findIndex((axis) => axis.tag === tag)
    if (index < 0) throw new UnknownAxisError(tag)
    return index
  }

  // User-space value to a normalized, avar-mapped 2.14 coordinate
  private normalizeAxis(index: number, value: number): number {
    const normalized = toF2Dot14(normalizeAxisValue(this.variations.axes[index], value))
    const avar = this.variations.avar
    return avar ? clampF2Dot14(avar.map(index, normalized)) : normalized
  }

  /**
   * Normalized coordinates for user-space settings without storing them.
   * Axes not named stay at their default (0).
   */
  normalizeVariationCoordinates(settings: readonly VariationSetting[]): number[] {
    const coordinates = new Array<number>(this.variations.axes.length).fill(0)
    for (const { tag, value } of settings) {
      const index = this.axisIndex(tag)
      coordinates[index] = this.normalizeAxis(index, value)
    }
    return coordinates
  }

  /**
   * Replace the stored coordinates. Axes not named are reset to their
   * default; an unknown tag throws UnknownAxisError and changes nothing.
   */
  setVariationCoordinates(settings: readonly VariationSetting[]): void {
    this.coordinates = Int16Array.from(this.normalizeVariationCoordinates(settings))
  }

  // Set a single axis, keeping the others
  setVariation(tag: string, value: number): void {
    const index = this.axisIndex(tag)
    this.coordinates[index] = this.normalizeAxis(index, value)
  }

  get variationCoordinates(): number[] {
    return Array.from(this.coordinates)
  }

  // Apply avar to normalized coordinates already in fvar order
  mapVariationCoordinates(coordinates: readonly number[]): number[] {
    if (coordinates.length !== this.variations.axes.length) {
      throw new OutOfRangeError(
        `Expected ${this.variations.axes.length} coordinates, got ${coordinates.length}`
      )
    }
    const avar = this.variations.avar
    return coordinates.map((value, i) => {
      const clamped = clampF2Dot14(value)
      return avar ? clampF2Dot14(avar.map(i, clamped)) : clamped
    })
  }
}

function loadMetrics(
  table: (tag: number) => Uint8Array | null,
  head: HeadTable,
  hhea: MetricsHeader,
  numGlyphs: number,
  logger: Logger
): MetricTables {
  const os2Data = table(TAG_OS2)
  const os2 = os2Data ? parseOs2(os2Data) : null
  if (os2Data && !os2) logger.warn('OS/2 table is truncated and was ignored')

  const postData = table(TAG_POST)
  const post = postData ? parsePost(postData) : null
  if (postData && !post) logger.warn('post table is truncated and was ignored')

  const hmtxData = table(TAG_HMTX)
  const hmtx = hmtxData ? GlyphMetrics.parse(hmtxData, hhea.numberOfMetrics, numGlyphs) : null
  if (hmtxData && !hmtx) logger.warn('hmtx table is truncated; advances are unavailable')

  const vheaData = table(TAG_VHEA)
  const vhea = vheaData ? parseMetricsHeader(vheaData) : null
  if (vheaData && !vhea) logger.warn('vhea table is truncated and was ignored')

  let vmtx: GlyphMetrics | null = null
  const vmtxData = table(TAG_VMTX)
  if (vhea && vmtxData) {
    vmtx = GlyphMetrics.parse(vmtxData, vhea.numberOfMetrics, numGlyphs)
    if (!vmtx) logger.warn('vmtx table is truncated; vertical advances are unavailable')
  }

  return { head, hhea, vhea, os2, post, hmtx, vmtx }
}

function loadGlyf(
  glyf: Uint8Array | null,
  loca: Uint8Array | null,
  head: HeadTable,
  numGlyphs: number,
  logger: Logger
): GlyfTables | null {
  if (!glyf) return null
  if (!loca) {
    logger.warn('glyf table without loca; outlines are unavailable')
    return null
  }
  if (head.indexToLocFormat === null) {
    logger.warn('head.indexToLocFormat is invalid; outlines are unavailable')
    return null
  }
  return { glyf, loca: new GlyphLocations(loca, head.indexToLocFormat, numGlyphs) }
}

function loadVariations(table: (tag: number) => Uint8Array | null, logger: Logger): VariationTables {
  const none: VariationTables = { axes: [], avar: null, gvar: null, hvar: null, vvar: null, mvar: null }

  const fvarData = table(TAG_FVAR)
  if (!fvarData) return none
  const axes = parseFvar(fvarData)
  if (!axes) {
    logger.warn('fvar table is invalid or has no axes; font is treated as not variable')
    return none
  }

  let avar: AxisVariations | null = null
  const avarData = table(TAG_AVAR)
  if (avarData) {
    avar = AxisVariations.parse(avarData)
    if (!avar) {
      logger.warn('avar table is invalid and was ignored')
    } else if (avar.axisCount !== axes.length) {
      logger.warn(`avar has ${avar.axisCount} axes but fvar has ${axes.length}; avar ignored`)
      avar = null
    }
  }

  let gvar: GlyphVariations | null = null
  const gvarData = table(TAG_GVAR)
  if (gvarData) {
    gvar = GlyphVariations.parse(gvarData, axes.length)
    if (!gvar) logger.warn('gvar table is invalid and was ignored')
  }

  const optional = <T>(tag: number, name: string, parse: (data: Uint8Array) => T | null): T | null => {
    const data = table(tag)
    if (!data) return null
    const parsed = parse(data)
    if (!parsed) logger.warn(`${name} table is invalid and was ignored`)
    return parsed
  }

  const hvar = optional(TAG_HVAR, 'HVAR', GlyphMetricsVariations.parse)
  const vvar = optional(TAG_VVAR, 'VVAR', GlyphMetricsVariations.parse)
  const mvar = optional(TAG_MVAR, 'MVAR', MetricsVariations.parse)

  return { axes, avar, gvar, hvar, vvar, mvar }
}
