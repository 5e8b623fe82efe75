import { describe, it, expect } from 'vitest'
import { Font } from '../src/font'
import { MalformedGlyphError } from '../src/shared/errors'
import { subroutineBias } from '../src/cff/charstring'
import { DataIndex } from '../src/cff/data-index'
import { parseDict } from '../src/cff/dict'
import { charstring, encodeCff, encodeCidCff, encodeIndex, type CffSpec } from './helpers/cff'
import { buildFont } from './helpers/font'
import { RecordingBuilder } from './helpers/recorder'

const EMPTY = charstring('endchar')

function cffFont(desc: CffSpec): Font {
  return Font.create(buildFont({ cff: encodeCff(desc), numGlyphs: desc.charStrings.length }))
}

// Font with a single drawable glyph at id 1
function glyphFont(program: Uint8Array, extra: Omit<CffSpec, 'charStrings'> = {}): Font {
  return cffFont({ charStrings: [EMPTY, program], ...extra })
}

function commands(font: Font, glyphId: number = 1): string[] {
  const builder = new RecordingBuilder()
  font.outlineGlyph(glyphId, builder)
  return builder.commands
}

describe('CFF INDEX and DICT', () => {
  it('reads objects from an INDEX', () => {
    const data = encodeIndex([new Uint8Array([1, 2]), new Uint8Array([]), new Uint8Array([3])])
    const index = DataIndex.parse(data, 0)

    expect(index?.count).toBe(3)
    expect(Array.from(index?.get(0) ?? [])).toEqual([1, 2])
    expect(index?.get(1)?.byteLength).toBe(0)
    expect(Array.from(index?.get(2) ?? [])).toEqual([3])
    expect(index?.get(3)).toBeNull()
    expect(index?.end).toBe(data.byteLength)
  })

  it('reads an empty INDEX as two bytes', () => {
    const index = DataIndex.parse(new Uint8Array([0, 0, 9]), 0)

    expect(index?.count).toBe(0)
    expect(index?.end).toBe(2)
  })

  it('rejects decreasing offsets and overruns', () => {
    // count 2, offSize 1, offsets 1 3 2
    expect(DataIndex.parse(new Uint8Array([0, 2, 1, 1, 3, 2, 0, 0]), 0)).toBeNull()
    // Data shorter than the last offset claims
    expect(DataIndex.parse(new Uint8Array([0, 1, 1, 1, 5, 0]), 0)).toBeNull()
    expect(DataIndex.parse(new Uint8Array([0, 1, 5]), 0)).toBeNull()
  })

  it('decodes DICT operand encodings', () => {
    const dict = parseDict(
      new Uint8Array([
        139, 17, // 0 CharStrings
        247, 0, 28, 0x01, 0x00, 18, // 108 256 Private
        29, 0xff, 0xff, 0xff, 0xfe, 19, // -2 Subrs
        30, 0x1a, 0x25, 0xff, 12, 6, // 1.25 CharstringType
      ])
    )

    expect(dict?.get(17)).toEqual([0])
    expect(dict?.get(18)).toEqual([108, 256])
    expect(dict?.get(19)).toEqual([-2])
    expect(dict?.get(1206)).toEqual([1.25])
  })

  it('decodes negative reals with exponents', () => {
    // -2.5E-3
    const dict = parseDict(new Uint8Array([30, 0xe2, 0xa5, 0xc3, 0xff, 20]))
    expect(dict?.get(20)).toEqual([-0.0025])
  })

  it('rejects reserved operand bytes', () => {
    expect(parseDict(new Uint8Array([255, 17]))).toBeNull()
  })

  it('picks the subroutine bias from the count', () => {
    expect(subroutineBias(0)).toBe(107)
    expect(subroutineBias(1239)).toBe(107)
    expect(subroutineBias(1240)).toBe(1131)
    expect(subroutineBias(33899)).toBe(1131)
    expect(subroutineBias(33900)).toBe(32768)
  })
})

describe('CFF outlines', () => {
  it('emits nothing for an empty glyph', () => {
    const font = glyphFont(EMPTY)
    const builder = new RecordingBuilder()

    expect(font.outlineGlyph(0, builder)).toBeNull()
    expect(builder.commands).toEqual([])
  })

  it('draws lines and closes at endchar', () => {
    const font = glyphFont(charstring(500, 0, 0, 'rmoveto', 100, 0, 0, 100, 'rlineto', 'endchar'))
    const builder = new RecordingBuilder()

    expect(font.outlineGlyph(1, builder)).toEqual({ xMin: 0, yMin: 0, xMax: 100, yMax: 100 })
    expect(builder.commands).toEqual(['M 0 0', 'L 100 0', 'L 100 100', 'Z'])
    expect(font.glyphBoundingBox(1)).toEqual({ xMin: 0, yMin: 0, xMax: 100, yMax: 100 })
  })

  it('alternates horizontal and vertical lines', () => {
    expect(commands(glyphFont(charstring(0, 0, 'rmoveto', 100, 50, -100, 'hlineto', 'endchar')))).toEqual([
      'M 0 0',
      'L 100 0',
      'L 100 50',
      'L 0 50',
      'Z',
    ])
    expect(commands(glyphFont(charstring(0, 0, 'rmoveto', 50, 100, 'vlineto', 'endchar')))).toEqual([
      'M 0 0',
      'L 0 50',
      'L 100 50',
      'Z',
    ])
  })

  it('consumes a width operand before hmoveto and vmoveto', () => {
    expect(commands(glyphFont(charstring(300, 10, 'hmoveto', 5, 'hlineto', 'endchar')))).toEqual([
      'M 10 0',
      'L 15 0',
      'Z',
    ])
    expect(commands(glyphFont(charstring(20, 'vmoveto', 5, 'vlineto', 'endchar')))).toEqual([
      'M 0 20',
      'L 0 25',
      'Z',
    ])
  })

  it('closes the open contour on the next moveto', () => {
    const program = charstring(0, 0, 'rmoveto', 10, 0, 'rlineto', 0, 50, 'rmoveto', 10, 0, 'rlineto', 'endchar')
    expect(commands(glyphFont(program))).toEqual(['M 0 0', 'L 10 0', 'Z', 'M 10 50', 'L 20 50', 'Z'])
  })

  it('draws relative curves', () => {
    const program = charstring(0, 0, 'rmoveto', 10, 20, 30, 40, 50, 60, 'rrcurveto', 'endchar')
    expect(commands(glyphFont(program))).toEqual(['M 0 0', 'C 10 20 40 60 90 120', 'Z'])
  })

  it('draws hvcurveto with and without a final delta', () => {
    expect(commands(glyphFont(charstring(0, 0, 'rmoveto', 100, 50, 50, 100, 'hvcurveto', 'endchar')))).toEqual([
      'M 0 0',
      'C 100 0 150 50 150 150',
      'Z',
    ])
    expect(
      commands(glyphFont(charstring(0, 0, 'rmoveto', 100, 50, 50, 100, 30, 'hvcurveto', 'endchar')))
    ).toEqual(['M 0 0', 'C 100 0 150 50 180 150', 'Z'])
  })

  it('alternates tangents in vhcurveto', () => {
    const program = charstring(0, 0, 'rmoveto', 100, 50, 50, 100, 100, 50, 50, 100, 'vhcurveto', 'endchar')
    expect(commands(glyphFont(program))).toEqual([
      'M 0 0',
      'C 0 100 50 150 150 150',
      'C 250 150 300 200 300 300',
      'Z',
    ])
  })

  it('draws hhcurveto and vvcurveto with a leading delta', () => {
    expect(commands(glyphFont(charstring(0, 0, 'rmoveto', 5, 10, 20, 30, 40, 'hhcurveto', 'endchar')))).toEqual([
      'M 0 0',
      'C 10 5 30 35 70 35',
      'Z',
    ])
    expect(commands(glyphFont(charstring(0, 0, 'rmoveto', 5, 10, 20, 30, 40, 'vvcurveto', 'endchar')))).toEqual([
      'M 0 0',
      'C 5 10 25 40 25 80',
      'Z',
    ])
  })

  it('draws rcurveline and rlinecurve', () => {
    expect(
      commands(glyphFont(charstring(0, 0, 'rmoveto', 10, 0, 10, 10, 0, 10, 5, 5, 'rcurveline', 'endchar')))
    ).toEqual(['M 0 0', 'C 10 0 20 10 20 20', 'L 25 25', 'Z'])
    expect(
      commands(glyphFont(charstring(0, 0, 'rmoveto', 5, 5, 10, 0, 10, 10, 0, 10, 'rlinecurve', 'endchar')))
    ).toEqual(['M 0 0', 'L 5 5', 'C 15 5 25 15 25 25', 'Z'])
  })

  it('reads fixed-point and two-byte operands', () => {
    const font = glyphFont(charstring(0.5, 0.25, 'rmoveto', 2000, 0, 'rlineto', 'endchar'))
    const builder = new RecordingBuilder()

    expect(font.outlineGlyph(1, builder)).toEqual({ xMin: 0, yMin: 0, xMax: 2001, yMax: 1 })
    expect(builder.commands).toEqual(['M 0.5 0.25', 'L 2000.5 0.25', 'Z'])
  })

  it('skips hintmask bytes', () => {
    const program = charstring(
      10, 20, 30, 40, 'hstemhm',
      50, 60, 'hintmask', [0xc0],
      0, 0, 'rmoveto', 10, 10, 'rlineto',
      'endchar'
    )
    expect(commands(glyphFont(program))).toEqual(['M 0 0', 'L 10 10', 'Z'])
  })

  it('sizes the mask from all declared stems', () => {
    // 9 stems need two mask bytes
    const program = charstring(
      1, 2, 3, 4, 5, 6, 7, 8, 'hstemhm',
      1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 'vstemhm',
      'cntrmask', [0xff, 0x80],
      0, 0, 'rmoveto', 10, 0, 'rlineto',
      'endchar'
    )
    expect(commands(glyphFont(program))).toEqual(['M 0 0', 'L 10 0', 'Z'])
  })

  it('draws flex as two curves', () => {
    const program = charstring(0, 0, 'rmoveto', 10, 0, 10, 0, 10, 0, 10, 0, 10, 0, 10, 0, 50, 'flex', 'endchar')
    expect(commands(glyphFont(program))).toEqual(['M 0 0', 'C 10 0 20 0 30 0', 'C 40 0 50 0 60 0', 'Z'])
  })

  it('returns to the starting height after hflex', () => {
    const program = charstring(0, 0, 'rmoveto', 10, 10, 20, 10, 10, 10, 10, 'hflex', 'endchar')
    expect(commands(glyphFont(program))).toEqual(['M 0 0', 'C 10 0 20 20 30 20', 'C 40 20 50 0 60 0', 'Z'])
  })

  it('resolves hflex1 and flex1 endpoints', () => {
    const hflex1 = charstring(0, 0, 'rmoveto', 10, 5, 10, 5, 10, 10, 10, -5, 10, 'hflex1', 'endchar')
    expect(commands(glyphFont(hflex1))).toEqual(['M 0 0', 'C 10 5 20 10 30 10', 'C 40 10 50 5 60 0', 'Z'])

    const flex1 = charstring(0, 0, 'rmoveto', 10, 2, 10, 2, 10, 2, 10, -2, 10, -2, 10, 'flex1', 'endchar')
    expect(commands(glyphFont(flex1))).toEqual(['M 0 0', 'C 10 2 20 4 30 6', 'C 40 4 50 2 60 0', 'Z'])
  })
})

describe('CFF subroutines', () => {
  it('calls biased local subroutines', () => {
    const font = glyphFont(charstring(0, 0, 'rmoveto', -107, 'callsubr', 'endchar'), {
      localSubrs: [charstring(100, 0, 'rlineto', 'return')],
    })
    expect(commands(font)).toEqual(['M 0 0', 'L 100 0', 'Z'])
  })

  it('calls biased global subroutines', () => {
    const font = glyphFont(charstring(0, 0, 'rmoveto', -107, 'callgsubr', 'endchar'), {
      globalSubrs: [charstring(0, 100, 'rlineto', 'return')],
    })
    expect(commands(font)).toEqual(['M 0 0', 'L 0 100', 'Z'])
  })

  it('ends the glyph at an endchar inside a subroutine', () => {
    const font = glyphFont(charstring(0, 0, 'rmoveto', -107, 'callsubr'), {
      localSubrs: [charstring(100, 0, 'rlineto', 'endchar')],
    })
    expect(commands(font)).toEqual(['M 0 0', 'L 100 0', 'Z'])
  })

  it('rejects a missing subroutine', () => {
    const font = glyphFont(charstring(0, 0, 'rmoveto', -106, 'callsubr', 'endchar'), {
      localSubrs: [charstring('return')],
    })
    expect(() => commands(font)).toThrow('Glyph 1: local subroutine -106 not found')
  })

  it('rejects unbounded recursion', () => {
    const font = glyphFont(charstring(0, 0, 'rmoveto', -107, 'callsubr', 'endchar'), {
      localSubrs: [charstring(-107, 'callsubr', 'return')],
    })
    expect(() => commands(font)).toThrow(/subroutine nesting too deep/)
  })

  it('selects local subroutines per font dict in CID fonts', () => {
    const program = charstring(0, 0, 'rmoveto', -107, 'callsubr', 'endchar')
    const cff = encodeCidCff({
      charStrings: [EMPTY, program, program],
      fontDicts: [
        { localSubrs: [charstring(100, 0, 'rlineto', 'return')] },
        { localSubrs: [charstring(0, 100, 'rlineto', 'return')] },
      ],
      fdSelect: [0, 0, 1],
    })
    const font = Font.create(buildFont({ cff, numGlyphs: 3 }))

    expect(commands(font, 1)).toEqual(['M 0 0', 'L 100 0', 'Z'])
    expect(commands(font, 2)).toEqual(['M 0 0', 'L 0 100', 'Z'])
  })
})

describe('malformed CFF', () => {
  it('rejects argument stack overflow', () => {
    const operands = Array.from({ length: 49 }, () => 1)
    expect(() => commands(glyphFont(charstring(...operands, 'endchar')))).toThrow(/argument stack overflow/)
  })

  it('rejects unknown operators', () => {
    expect(() => commands(glyphFont(charstring(0, 0, 'rmoveto', [2], 'endchar')))).toThrow(
      'Glyph 1: unsupported charstring operator 2'
    )
  })

  it('requires endchar', () => {
    expect(() => commands(glyphFont(charstring(0, 0, 'rmoveto', 10, 10, 'rlineto')))).toThrow(
      /charstring has no endchar/
    )
  })

  it('rejects drawing before a moveto', () => {
    expect(() => commands(glyphFont(charstring(10, 10, 'rlineto', 'endchar')))).toThrow(MalformedGlyphError)
  })

  it('rejects missing operands', () => {
    expect(() => commands(glyphFont(charstring('rmoveto', 'endchar')))).toThrow(/rmoveto needs 2 arguments/)
  })

  it('keeps the font usable after a bad glyph', () => {
    const font = cffFont({
      charStrings: [EMPTY, charstring(10, 'rlineto'), charstring(0, 0, 'rmoveto', 5, 'hlineto', 'endchar')],
    })

    expect(() => commands(font, 1)).toThrow(MalformedGlyphError)
    expect(commands(font, 2)).toEqual(['M 0 0', 'L 5 0', 'Z'])
  })

  it('closes the open path before reporting a failure', () => {
    const font = glyphFont(charstring(0, 0, 'rmoveto', 5, 'hlineto', [2], 'endchar'))
    const builder = new RecordingBuilder()

    expect(() => font.outlineGlyph(1, builder)).toThrow(MalformedGlyphError)
    expect(builder.commands).toEqual(['M 0 0', 'L 5 0', 'Z'])
  })

  it('drops an unsupported CFF table with a warning', () => {
    const warnings: string[] = []
    const font = Font.create(buildFont({ cff: new Uint8Array([2, 0, 5, 3, 0]), numGlyphs: 2 }), 0, {
      logger: { warn: (message) => void warnings.push(message) },
    })

    expect(font.hasTable('CFF ')).toBe(true)
    expect(font.outlineGlyph(1, new RecordingBuilder())).toBeNull()
    expect(warnings).toEqual(['CFF table is not a supported CFF version 1 font; outlines are unavailable'])
  })
})
