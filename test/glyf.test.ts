import { describe, it, expect } from 'vitest'
import { Font } from '../src/font'
import { MalformedGlyphError } from '../src/shared/errors'
import { buildFont } from './helpers/font'
import { RecordingBuilder, pathsAreClosed } from './helpers/recorder'
import { encodeGlyph, type GlyphSpec, type TestPoint } from './helpers/tables'

const on = (x: number, y: number): TestPoint => ({ x, y, on: true })
const off = (x: number, y: number): TestPoint => ({ x, y, on: false })

const square: GlyphSpec = { contours: [[on(0, 0), on(0, 100), on(100, 100), on(100, 0)]] }

function outline(font: Font, glyphId: number) {
  const builder = new RecordingBuilder()
  const bbox = font.outlineGlyph(glyphId, builder)
  return { commands: builder.commands, bbox }
}

describe('glyf - simple glyphs', () => {
  it('emits lines for on-curve points and closes back to the start', () => {
    const font = Font.create(buildFont({ glyphs: [null, square] }))
    const { commands, bbox } = outline(font, 1)

    expect(commands).toEqual(['M 0 0', 'L 0 100', 'L 100 100', 'L 100 0', 'L 0 0', 'Z'])
    expect(bbox).toEqual({ xMin: 0, yMin: 0, xMax: 100, yMax: 100 })
  })

  it('synthesizes a midpoint between two off-curve points', () => {
    const glyph: GlyphSpec = { contours: [[on(0, 0), off(100, 100), off(200, 100), on(300, 0)]] }
    const font = Font.create(buildFont({ glyphs: [null, glyph] }))
    const { commands } = outline(font, 1)

    expect(commands).toEqual(['M 0 0', 'Q 100 100 150 100', 'Q 200 100 300 0', 'L 0 0', 'Z'])
    expect(commands.filter((c) => c.startsWith('Q'))).toHaveLength(2)
  })

  it('starts an all off-curve contour at the midpoint of its first two points', () => {
    const glyph: GlyphSpec = { contours: [[off(0, 0), off(100, 0), off(100, 100), off(0, 100)]] }
    const font = Font.create(buildFont({ glyphs: [null, glyph] }))

    expect(outline(font, 1).commands).toEqual([
      'M 50 0',
      'Q 100 0 100 50',
      'Q 100 100 50 100',
      'Q 0 100 0 50',
      'Q 0 0 50 0',
      'Z',
    ])
  })

  it('starts at the first on-curve point when the contour begins off-curve', () => {
    const glyph: GlyphSpec = { contours: [[off(0, 0), on(100, 0), on(100, 100)]] }
    const font = Font.create(buildFont({ glyphs: [null, glyph] }))

    expect(outline(font, 1).commands).toEqual(['M 100 0', 'L 100 100', 'Q 0 0 100 0', 'Z'])
  })

  it('skips contours with fewer than two points', () => {
    const glyph: GlyphSpec = {
      contours: [[on(5, 5)], [on(0, 0), on(0, 100), on(100, 100), on(100, 0)]],
    }
    const font = Font.create(buildFont({ glyphs: [null, glyph] }))

    expect(outline(font, 1).commands).toEqual(['M 0 0', 'L 0 100', 'L 100 100', 'L 100 0', 'L 0 0', 'Z'])
  })

  it('closes every contour of a multi-contour glyph', () => {
    const glyph: GlyphSpec = {
      contours: [
        [on(0, 0), on(0, 300), on(300, 300), on(300, 0)],
        [on(100, 100), off(200, 100), on(200, 200), off(100, 200)],
      ],
    }
    const font = Font.create(buildFont({ glyphs: [null, glyph] }))
    const { commands } = outline(font, 1)

    expect(pathsAreClosed(commands)).toBe(true)
    expect(commands.filter((c) => c === 'Z')).toHaveLength(2)
    expect(commands.slice(6)).toEqual(['M 100 100', 'Q 200 100 200 200', 'Q 100 200 100 100', 'Z'])
  })

  it('decodes large coordinate deltas and negative values', () => {
    const glyph: GlyphSpec = { contours: [[on(-500, -300), on(1200, -300), on(1200, 900)]] }
    const font = Font.create(buildFont({ glyphs: [null, glyph] }))
    const { commands, bbox } = outline(font, 1)

    expect(commands).toEqual(['M -500 -300', 'L 1200 -300', 'L 1200 900', 'L -500 -300', 'Z'])
    expect(bbox).toEqual({ xMin: -500, yMin: -300, xMax: 1200, yMax: 900 })
  })

  it('returns the stored bbox for simple glyphs at the default instance', () => {
    const glyph: GlyphSpec = {
      contours: [[on(0, 0), on(0, 100), on(100, 100)]],
      bbox: { xMin: -1, yMin: -2, xMax: 101, yMax: 102 },
    }
    const font = Font.create(buildFont({ glyphs: [null, glyph] }))

    expect(outline(font, 1).bbox).toEqual({ xMin: -1, yMin: -2, xMax: 101, yMax: 102 })
    expect(font.glyphBoundingBox(1)).toEqual({ xMin: -1, yMin: -2, xMax: 101, yMax: 102 })
  })

  it('skips hinting instructions', () => {
    const glyph: GlyphSpec = { ...square, instructions: [0xb0, 0x01, 0x2c] }
    const font = Font.create(buildFont({ glyphs: [null, glyph] }))

    expect(outline(font, 1).commands).toEqual(['M 0 0', 'L 0 100', 'L 100 100', 'L 100 0', 'L 0 0', 'Z'])
  })

  it('reads the short loca format', () => {
    const font = Font.create(buildFont({ glyphs: [null, square], indexToLocFormat: 0 }))
    expect(outline(font, 1).commands).toEqual(['M 0 0', 'L 0 100', 'L 100 100', 'L 100 0', 'L 0 0', 'Z'])
  })

  it('is idempotent', () => {
    const glyph: GlyphSpec = { contours: [[on(0, 0), off(100, 100), off(200, 100), on(300, 0)]] }
    const font = Font.create(buildFont({ glyphs: [null, glyph] }))

    expect(outline(font, 1)).toEqual(outline(font, 1))
  })
})

describe('glyf - empty glyphs', () => {
  it('returns null without emitting anything for a zero-length record', () => {
    const font = Font.create(buildFont({ glyphs: [null, square] }))
    const { commands, bbox } = outline(font, 0)

    expect(bbox).toBeNull()
    expect(commands).toEqual([])
    expect(font.glyphBoundingBox(0)).toBeNull()
  })

  it('returns null for glyph ids past the end of the font', () => {
    const font = Font.create(buildFont({ glyphs: [null, square] }))

    expect(outline(font, 2).bbox).toBeNull()
    expect(outline(font, -1).bbox).toBeNull()
    expect(outline(font, 1.5).bbox).toBeNull()
  })

  it('returns null for a glyph with zero contours', () => {
    const font = Font.create(buildFont({ glyphs: [null, { contours: [] }] }))
    expect(outline(font, 1).bbox).toBeNull()
  })
})

describe('glyf - composite glyphs', () => {
  it('places a component at its offset', () => {
    const font = Font.create(
      buildFont({ glyphs: [null, square, { components: [{ glyphId: 1, dx: 10, dy: 20 }] }] })
    )
    const { commands, bbox } = outline(font, 2)

    expect(commands).toEqual(['M 10 20', 'L 10 120', 'L 110 120', 'L 110 20', 'L 10 20', 'Z'])
    expect(bbox).toEqual({ xMin: 10, yMin: 20, xMax: 110, yMax: 120 })
  })

  it('uses word arguments for large offsets', () => {
    const font = Font.create(
      buildFont({ glyphs: [null, square, { components: [{ glyphId: 1, dx: 1000, dy: -500 }] }] })
    )
    expect(outline(font, 2).bbox).toEqual({ xMin: 1000, yMin: -500, xMax: 1100, yMax: -400 })
  })

  it('applies a uniform scale', () => {
    const font = Font.create(
      buildFont({ glyphs: [null, square, { components: [{ glyphId: 1, dx: 10, dy: 0, scale: 0.5 }] }] })
    )
    expect(outline(font, 2).commands).toEqual(['M 10 0', 'L 10 50', 'L 60 50', 'L 60 0', 'L 10 0', 'Z'])
  })

  it('applies separate x and y scales', () => {
    const font = Font.create(
      buildFont({ glyphs: [null, square, { components: [{ glyphId: 1, xyScale: [1.5, -1] }] }] })
    )
    expect(outline(font, 2).commands).toEqual([
      'M 0 0',
      'L 0 -100',
      'L 150 -100',
      'L 150 0',
      'L 0 0',
      'Z',
    ])
  })

  it('applies a 2x2 matrix', () => {
    // Swap x and y
    const font = Font.create(
      buildFont({
        glyphs: [
          null,
          { contours: [[on(0, 0), on(10, 0), on(10, 30)]] },
          { components: [{ glyphId: 1, matrix: [0, 1, 1, 0] }] },
        ],
      })
    )
    expect(outline(font, 2).commands).toEqual(['M 0 0', 'L 0 10', 'L 30 10', 'L 0 0', 'Z'])
  })

  it('scales the offset when SCALED_COMPONENT_OFFSET is set', () => {
    const font = Font.create(
      buildFont({
        glyphs: [
          null,
          square,
          { components: [{ glyphId: 1, dx: 100, dy: 40, scale: 0.5, scaledOffset: true }] },
        ],
      })
    )
    expect(outline(font, 2).bbox).toEqual({ xMin: 50, yMin: 20, xMax: 100, yMax: 70 })
  })

  it('aligns point-anchored components', () => {
    const font = Font.create(
      buildFont({
        glyphs: [
          null,
          square,
          {
            components: [
              { glyphId: 1, dx: 0, dy: 0 },
              { glyphId: 1, anchor: { parent: 2, child: 0 } },
            ],
          },
        ],
      })
    )
    const { commands, bbox } = outline(font, 2)

    expect(commands.slice(6)).toEqual(['M 100 100', 'L 100 200', 'L 200 200', 'L 200 100', 'L 100 100', 'Z'])
    expect(bbox).toEqual({ xMin: 0, yMin: 0, xMax: 200, yMax: 200 })
  })

  it('rejects anchor points that do not exist', () => {
    const font = Font.create(
      buildFont({
        glyphs: [
          null,
          square,
          {
            components: [
              { glyphId: 1, dx: 0, dy: 0 },
              { glyphId: 1, anchor: { parent: 9, child: 0 } },
            ],
          },
        ],
      })
    )
    expect(() => font.outlineGlyph(2, new RecordingBuilder())).toThrow(MalformedGlyphError)
  })

  it('resolves nested composites', () => {
    const font = Font.create(
      buildFont({
        glyphs: [
          null,
          square,
          { components: [{ glyphId: 1, dx: 10, dy: 0 }] },
          { components: [{ glyphId: 2, dx: 0, dy: 10 }] },
        ],
      })
    )
    expect(outline(font, 3).commands[0]).toBe('M 10 10')
  })

  it('ignores components that reference empty or missing glyphs', () => {
    const font = Font.create(
      buildFont({
        glyphs: [
          null,
          square,
          {
            components: [
              { glyphId: 0, dx: 0, dy: 0 },
              { glyphId: 1, dx: 5, dy: 5 },
              { glyphId: 300, dx: 0, dy: 0 },
            ],
          },
        ],
      })
    )
    expect(outline(font, 2).commands).toEqual(['M 5 5', 'L 5 105', 'L 105 105', 'L 105 5', 'L 5 5', 'Z'])
  })

  it('treats a composite of empty glyphs as empty', () => {
    const font = Font.create(
      buildFont({ glyphs: [null, { components: [{ glyphId: 0, dx: 0, dy: 0 }] }] })
    )
    expect(outline(font, 1).bbox).toBeNull()
  })

  it('fails on a cyclic component graph', () => {
    const font = Font.create(
      buildFont({
        glyphs: [
          null,
          { components: [{ glyphId: 2, dx: 0, dy: 0 }] },
          { components: [{ glyphId: 1, dx: 0, dy: 0 }] },
          square,
        ],
      })
    )

    expect(() => font.outlineGlyph(1, new RecordingBuilder())).toThrow(MalformedGlyphError)
    // The handle stays usable
    expect(outline(font, 3).bbox).toEqual({ xMin: 0, yMin: 0, xMax: 100, yMax: 100 })
  })

  it('honours maxComponentDepth', () => {
    const data = buildFont({
      glyphs: [
        null,
        square,
        { components: [{ glyphId: 1, dx: 0, dy: 0 }] },
        { components: [{ glyphId: 2, dx: 0, dy: 0 }] },
      ],
    })
    const shallow = Font.create(data, 0, { maxComponentDepth: 1 })

    expect(outline(shallow, 2).bbox).toEqual({ xMin: 0, yMin: 0, xMax: 100, yMax: 100 })
    expect(() => shallow.outlineGlyph(3, new RecordingBuilder())).toThrow(/nesting exceeds 1 levels/)
    expect(outline(Font.create(data), 3).bbox).toEqual({ xMin: 0, yMin: 0, xMax: 100, yMax: 100 })
  })

  it('caps the points a reused sub-glyph can expand to', () => {
    // Every level draws the level below it twice
    const ring = Array.from({ length: 64 }, (_, i) => on(i * 10, (i * 37) % 200))
    const levels: GlyphSpec[] = Array.from({ length: 14 }, (_, k) => ({
      components: [
        { glyphId: k + 1, dx: 0, dy: 0 },
        { glyphId: k + 1, dx: 5, dy: 0 },
      ],
    }))
    const font = Font.create(buildFont({ glyphs: [null, { contours: [ring] }, ...levels] }))

    // 8 levels: 16384 points
    expect(outline(font, 9).bbox).toEqual({ xMin: 0, yMin: 0, xMax: 670, yMax: 199 })

    try {
      font.outlineGlyph(15, new RecordingBuilder())
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedGlyphError)
      if (err instanceof MalformedGlyphError) {
        expect(err.glyphId).toBe(15)
        expect(err.message).toMatch(/composite expands to more than 262144 points/)
      }
    }
    expect(() => font.glyphBoundingBox(15)).toThrow(MalformedGlyphError)
    expect(outline(font, 2).bbox).toEqual({ xMin: 0, yMin: 0, xMax: 635, yMax: 199 })
  })

  it('agrees with outlineGlyph in glyphBoundingBox', () => {
    const font = Font.create(
      buildFont({
        glyphs: [
          null,
          square,
          {
            components: [{ glyphId: 1, dx: 10, dy: 20 }],
            bbox: { xMin: 0, yMin: 0, xMax: 999, yMax: 999 },
          },
          {
            contours: [[on(0, 0), on(0, 100), on(100, 100), on(100, 0)]],
            bbox: { xMin: -5, yMin: -5, xMax: 105, yMax: 105 },
          },
          { contours: [[on(50, 50)]] },
        ],
      })
    )

    expect(font.glyphBoundingBox(2)).toEqual({ xMin: 10, yMin: 20, xMax: 110, yMax: 120 })
    expect(font.glyphBoundingBox(2)).toEqual(outline(font, 2).bbox)
    expect(font.glyphBoundingBox(3)).toEqual({ xMin: -5, yMin: -5, xMax: 105, yMax: 105 })
    expect(font.glyphBoundingBox(3)).toEqual(outline(font, 3).bbox)
    expect(font.glyphBoundingBox(4)).toBeNull()
    expect(outline(font, 4).bbox).toBeNull()
  })
})

describe('glyf - malformed data', () => {
  it('rejects a truncated glyph header', () => {
    const font = Font.create(
      buildFont({ glyphRecords: [new Uint8Array(0), new Uint8Array([0, 1, 0, 0])] })
    )
    expect(() => font.outlineGlyph(1, new RecordingBuilder())).toThrow(MalformedGlyphError)
  })

  it('rejects contour data that ends early', () => {
    // One contour, bbox, then nothing
    const record = new Uint8Array([0, 1, 0, 0, 0, 0, 0, 10, 0, 10])
    const font = Font.create(buildFont({ glyphRecords: [new Uint8Array(0), record] }))

    expect(() => font.outlineGlyph(1, new RecordingBuilder())).toThrow(/contour end points truncated/)
  })

  it('rejects decreasing contour end points', () => {
    const record = new Uint8Array([0, 2, 0, 0, 0, 0, 0, 10, 0, 10, 0, 3, 0, 1, 0, 0])
    const font = Font.create(buildFont({ glyphRecords: [new Uint8Array(0), record] }))

    expect(() => font.outlineGlyph(1, new RecordingBuilder())).toThrow(/precedes/)
  })

  it('reports the failing glyph id', () => {
    const font = Font.create(
      buildFont({ glyphRecords: [new Uint8Array(0), new Uint8Array([0, 1])] })
    )
    try {
      font.outlineGlyph(1, new RecordingBuilder())
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedGlyphError)
      if (err instanceof MalformedGlyphError) expect(err.glyphId).toBe(1)
    }
  })

  it('keeps other glyphs usable after a failure', () => {
    const font = Font.create(
      buildFont({
        glyphRecords: [new Uint8Array(0), new Uint8Array([0, 1, 0, 0]), encodeGlyph(square)],
      })
    )
    expect(() => font.outlineGlyph(1, new RecordingBuilder())).toThrow(MalformedGlyphError)
    expect(outline(font, 2).commands).toEqual(['M 0 0', 'L 0 100', 'L 100 100', 'L 100 0', 'L 0 0', 'Z'])
    expect(() => font.glyphBoundingBox(1)).toThrow(MalformedGlyphError)
  })
})
