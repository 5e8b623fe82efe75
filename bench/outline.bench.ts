import { bench, describe } from 'vitest'
import { Font } from '../src/font'
import type { OutlineBuilder } from '../src/types'
import { charstring, encodeCff } from '../test/helpers/cff'
import { buildFont } from '../test/helpers/font'
import { encodeFvar, encodeGvar, type GlyphSpec, type TestPoint } from '../test/helpers/tables'

const GLYPH_COUNT = 200

function sizeLabel(bytes: number): string {
  return bytes >= 1024 * 1024
    ? `${(bytes / 1024 / 1024).toFixed(1)} MB`
    : `${(bytes / 1024).toFixed(1)} KB`
}

// Ring of alternating on- and off-curve points
function ring(cx: number, cy: number, radius: number, count: number): TestPoint[] {
  return Array.from({ length: count }, (_, i) => {
    const angle = (i / count) * Math.PI * 2
    return {
      x: Math.round(cx + Math.cos(angle) * radius),
      y: Math.round(cy + Math.sin(angle) * radius),
      on: i % 2 === 0,
    }
  })
}

const simple: GlyphSpec = { contours: [ring(300, 300, 280, 48), ring(300, 300, 140, 24)] }
const glyphs: GlyphSpec[] = [
  null,
  ...Array.from({ length: GLYPH_COUNT - 1 }, (_, i): GlyphSpec =>
    i % 4 === 3
      ? {
          components: [
            { glyphId: 1, dx: 0, dy: 0 },
            { glyphId: 1, dx: 120, dy: -40, scale: 0.5 },
          ],
        }
      : simple
  ),
]

const pointCount = 72 + 4
const gvar = encodeGvar(
  1,
  glyphs.map((g) =>
    g && 'contours' in g
      ? {
          tuples: [
            {
              peak: [16384],
              x: Array.from({ length: pointCount }, (_, i) => (i % 3) - 1),
              y: Array.from({ length: pointCount }, (_, i) => (i % 5) - 2),
            },
          ],
        }
      : null
  )
)

const cffProgram = charstring(
  0, 0, 'rmoveto',
  100, 50, 50, 100, 100, 50, 50, 100, 'vhcurveto',
  200, 'hlineto',
  10, 20, 30, 40, 50, 60, 'rrcurveto',
  'endchar'
)

const fixtures = [
  { label: 'glyf', data: buildFont({ glyphs }) },
  {
    label: 'glyf + gvar',
    data: buildFont({
      glyphs,
      tables: { fvar: encodeFvar([{ tag: 'wght', min: 100, default: 400, max: 900 }]), gvar },
    }),
  },
  {
    label: 'CFF',
    data: buildFont({
      cff: encodeCff({ charStrings: Array.from({ length: GLYPH_COUNT }, () => cffProgram) }),
      numGlyphs: GLYPH_COUNT,
    }),
  },
]

class CountingBuilder implements OutlineBuilder {
  commands = 0
  moveTo(): void {
    this.commands++
  }
  lineTo(): void {
    this.commands++
  }
  quadTo(): void {
    this.commands++
  }
  curveTo(): void {
    this.commands++
  }
  close(): void {
    this.commands++
  }
}

console.log('\n[bench] outlines:')
for (const f of fixtures) {
  console.log(`  ${f.label}: ${sizeLabel(f.data.byteLength)}, ${GLYPH_COUNT} glyphs`)
}

describe('Font.create', () => {
  for (const f of fixtures) {
    bench(`${f.label} (${sizeLabel(f.data.byteLength)})`, () => {
      Font.create(f.data)
    })
  }
})

describe('outlineGlyph (all glyphs)', () => {
  for (const f of fixtures) {
    const font = Font.create(f.data)
    if (font.isVariable) font.setVariation('wght', 700)

    bench(f.label, () => {
      const builder = new CountingBuilder()
      for (let gid = 0; gid < font.numberOfGlyphs; gid++) {
        font.outlineGlyph(gid, builder)
      }
    })
  }
})
