// Error taxonomy
// Construction errors abort Font.create; the rest are local to one call

export class FontError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'FontError'
  }
}

// Directory or mandatory table failure while building a Font
export class MalformedFontError extends FontError {
  constructor(message: string) {
    super(message)
    this.name = 'MalformedFontError'
  }
}

export class FontIndexOutOfBoundsError extends FontError {
  readonly index: number
  readonly numFonts: number

  constructor(index: number, numFonts: number) {
    super(`Font index ${index} is out of bounds for a collection of ${numFonts} fonts`)
    this.name = 'FontIndexOutOfBoundsError'
    this.index = index
    this.numFonts = numFonts
  }
}

// Structurally invalid outline data for a single glyph
export class MalformedGlyphError extends FontError {
  readonly glyphId: number

  constructor(glyphId: number, message: string) {
    super(`Glyph ${glyphId}: ${message}`)
    this.name = 'MalformedGlyphError'
    this.glyphId = glyphId
  }
}

export class UnknownAxisError extends FontError {
  readonly tag: string

  constructor(tag: string) {
    super(`Font has no '${tag}' variation axis`)
    this.name = 'UnknownAxisError'
    this.tag = tag
  }
}

export class OutOfRangeError extends FontError {
  constructor(message: string) {
    super(message)
    this.name = 'OutOfRangeError'
  }
}
