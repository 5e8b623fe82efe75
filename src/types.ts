// Public types shared by the outline decoders and the Font handle

/**
 * Sink for glyph outlines.
 *
 * Commands arrive in emission order. Every contour starts with `moveTo` and
 * ends with `close`; coordinates are font units.
 */
export interface OutlineBuilder {
  moveTo(x: number, y: number): void
  lineTo(x: number, y: number): void
  quadTo(x1: number, y1: number, x: number, y: number): void
  curveTo(x1: number, y1: number, x2: number, y2: number, x: number, y: number): void
  close(): void
}

// Bounding box in font units
export interface Rect {
  xMin: number
  yMin: number
  xMax: number
  yMax: number
}

// Underline or strikeout: offset of the stroke from the baseline and its size
export interface LineMetrics {
  position: number
  thickness: number
}

// Subscript or superscript: em box size and offset of the scaled glyph
export interface ScriptMetrics {
  xSize: number
  ySize: number
  xOffset: number
  yOffset: number
}

export interface VariationAxis {
  tag: string
  minValue: number
  defaultValue: number
  maxValue: number
  /** Axis name id in the `name` table */
  nameId: number
  hidden: boolean
}

// A user-space value for one axis, e.g. { tag: 'wght', value: 700 }
export interface VariationSetting {
  tag: string
  value: number
}

export interface Logger {
  warn(message: string): void
}

export interface FontOptions {
  /** Maximum composite glyph nesting, default 32 */
  maxComponentDepth?: number
  /** Receives diagnostics about ignored table data; silent by default */
  logger?: Logger
}

export const silentLogger: Logger = {
  warn() {},
}

export const DEFAULT_FONT_OPTIONS: Required<FontOptions> = {
  maxComponentDepth: 32,
  logger: silentLogger,
}
