// Type 2 charstring interpreter
// https://adobe-type-tools.github.io/font-tech-notes/pdfs/5177.Type2.pdf

import { Reader } from '../shared/reader'
import { MalformedGlyphError } from '../shared/errors'
import type { PathSink } from '../shared/path-sink'
import type { DataIndex } from './data-index'

const MAX_ARGUMENTS = 48
const MAX_CALL_DEPTH = 10

// One-byte operators
const HSTEM = 1
const VSTEM = 3
const VMOVETO = 4
const RLINETO = 5
const HLINETO = 6
const VLINETO = 7
const RRCURVETO = 8
const CALLSUBR = 10
const RETURN = 11
const ESCAPE = 12
const ENDCHAR = 14
const HSTEMHM = 18
const HINTMASK = 19
const CNTRMASK = 20
const RMOVETO = 21
const HMOVETO = 22
const VSTEMHM = 23
const RCURVELINE = 24
const RLINECURVE = 25
const VVCURVETO = 26
const HHCURVETO = 27
const SHORTINT = 28
const CALLGSUBR = 29
const VHCURVETO = 30
const HVCURVETO = 31

// Escaped operators
const HFLEX = 34
const FLEX = 35
const HFLEX1 = 36
const FLEX1 = 37

export function subroutineBias(count: number): number {
  if (count < 1240) return 107
  if (count < 33900) return 1131
  return 32768
}

export interface CharstringContext {
  glyphId: number
  globalSubrs: DataIndex
  localSubrs: DataIndex | null
}

/**
 * Run one glyph program, forwarding its path to `sink`.
 *
 * Hints are counted only to skip hintmask bytes, and the advance width
 * operand is consumed but not reported.
 */
export function interpretCharstring(ctx: CharstringContext, data: Uint8Array, sink: PathSink): void {
  const interpreter = new Interpreter(ctx, sink)
  interpreter.run(data, 0)
  if (!interpreter.ended) {
    throw new MalformedGlyphError(ctx.glyphId, 'charstring has no endchar')
  }
}

class Interpreter {
  private stack: number[] = []
  private x = 0
  private y = 0
  private stems = 0
  private widthParsed = false
  private hasMove = false
  ended = false

  private readonly globalBias: number
  private readonly localBias: number

  constructor(
    private readonly ctx: CharstringContext,
    private readonly sink: PathSink
  ) {
    this.globalBias = subroutineBias(ctx.globalSubrs.count)
    this.localBias = ctx.localSubrs ? subroutineBias(ctx.localSubrs.count) : 0
  }

  private fail(message: string): MalformedGlyphError {
    return new MalformedGlyphError(this.ctx.glyphId, message)
  }

  private push(value: number): void {
    if (this.stack.length >= MAX_ARGUMENTS) throw this.fail('argument stack overflow')
    this.stack.push(value)
  }

  // The first stack-clearing operator may carry the advance width as an extra leading operand
  private takeWidth(hasExtra: boolean): void {
    if (!this.widthParsed && hasExtra) this.stack.shift()
    this.widthParsed = true
  }

  private needArgs(count: number, op: string): void {
    if (this.stack.length < count) throw this.fail(`${op} needs ${count} arguments`)
  }

  private moveTo(dx: number, dy: number): void {
    this.x += dx
    this.y += dy
    this.sink.moveTo(this.x, this.y)
    this.hasMove = true
  }

  private lineTo(dx: number, dy: number): void {
    if (!this.hasMove) throw this.fail('lineto before moveto')
    this.x += dx
    this.y += dy
    this.sink.lineTo(this.x, this.y)
  }

  private curveTo(dx1: number, dy1: number, dx2: number, dy2: number, dx3: number, dy3: number): void {
    if (!this.hasMove) throw this.fail('curveto before moveto')
    const x1 = this.x + dx1
    const y1 = this.y + dy1
    const x2 = x1 + dx2
    const y2 = y1 + dy2
    this.x = x2 + dx3
    this.y = y2 + dy3
    this.sink.curveTo(x1, y1, x2, y2, this.x, this.y)
  }

  private countStems(): void {
    this.takeWidth(this.stack.length % 2 !== 0)
    this.stems += this.stack.length >> 1
    this.stack = []
  }

  run(data: Uint8Array, depth: number): void {
    if (depth > MAX_CALL_DEPTH) throw this.fail('subroutine nesting too deep')

    const buf = new Reader(data)
    while (!buf.atEnd && !this.ended) {
      const b0 = buf.readU8()
      if (b0 === null) break

      if (b0 >= 32 || b0 === SHORTINT) {
        this.push(this.readNumber(b0, buf))
        continue
      }

      const s = this.stack
      switch (b0) {
        case HSTEM:
        case VSTEM:
        case HSTEMHM:
        case VSTEMHM:
          this.countStems()
          break

        case HINTMASK:
        case CNTRMASK: {
          // Operands left on the stack are an implied vstemhm
          this.countStems()
          if (!buf.skip((this.stems + 7) >> 3)) throw this.fail('hintmask truncated')
          break
        }

        case RMOVETO:
          this.takeWidth(s.length > 2)
          this.needArgs(2, 'rmoveto')
          this.moveTo(this.stack[0], this.stack[1])
          this.stack = []
          break

        case HMOVETO:
          this.takeWidth(s.length > 1)
          this.needArgs(1, 'hmoveto')
          this.moveTo(this.stack[0], 0)
          this.stack = []
          break

        case VMOVETO:
          this.takeWidth(s.length > 1)
          this.needArgs(1, 'vmoveto')
          this.moveTo(0, this.stack[0])
          this.stack = []
          break

        case RLINETO:
          for (let i = 0; i + 1 < s.length; i += 2) this.lineTo(s[i], s[i + 1])
          this.stack = []
          break

        case HLINETO:
        case VLINETO: {
          let horizontal = b0 === HLINETO
          for (const d of s) {
            if (horizontal) this.lineTo(d, 0)
            else this.lineTo(0, d)
            horizontal = !horizontal
          }
          this.stack = []
          break
        }

        case RRCURVETO:
          for (let i = 0; i + 5 < s.length; i += 6) {
            this.curveTo(s[i], s[i + 1], s[i + 2], s[i + 3], s[i + 4], s[i + 5])
          }
          this.stack = []
          break

        case RCURVELINE: {
          this.needArgs(8, 'rcurveline')
          let i = 0
          for (; i + 6 < s.length - 1; i += 6) {
            this.curveTo(s[i], s[i + 1], s[i + 2], s[i + 3], s[i + 4], s[i + 5])
          }
          this.lineTo(s[i], s[i + 1])
          this.stack = []
          break
        }

        case RLINECURVE: {
          this.needArgs(8, 'rlinecurve')
          let i = 0
          for (; i < s.length - 6; i += 2) this.lineTo(s[i], s[i + 1])
          this.curveTo(s[i], s[i + 1], s[i + 2], s[i + 3], s[i + 4], s[i + 5])
          this.stack = []
          break
        }

        case HHCURVETO: {
          let i = 0
          let dy1 = 0
          if (s.length % 2 !== 0) dy1 = s[i++]
          for (; i + 3 < s.length; i += 4) {
            this.curveTo(s[i], dy1, s[i + 1], s[i + 2], s[i + 3], 0)
            dy1 = 0
          }
          this.stack = []
          break
        }

        case VVCURVETO: {
          let i = 0
          let dx1 = 0
          if (s.length % 2 !== 0) dx1 = s[i++]
          for (; i + 3 < s.length; i += 4) {
            this.curveTo(dx1, s[i], s[i + 1], s[i + 2], 0, s[i + 3])
            dx1 = 0
          }
          this.stack = []
          break
        }

        case HVCURVETO:
        case VHCURVETO: {
          let horizontal = b0 === HVCURVETO
          for (let i = 0; i + 3 < s.length; i += 4) {
            // A fifth operand after the last group is the final off-axis delta
            const last = s.length - i === 5 ? s[i + 4] : 0
            if (horizontal) {
              this.curveTo(s[i], 0, s[i + 1], s[i + 2], last, s[i + 3])
            } else {
              this.curveTo(0, s[i], s[i + 1], s[i + 2], s[i + 3], last)
            }
            horizontal = !horizontal
          }
          this.stack = []
          break
        }

        case CALLSUBR:
        case CALLGSUBR: {
          const index = this.stack.pop()
          if (index === undefined) throw this.fail('subroutine call without an index')
          const local = b0 === CALLSUBR
          const subrs = local ? this.ctx.localSubrs : this.ctx.globalSubrs
          const bias = local ? this.localBias : this.globalBias
          const subr = subrs ? subrs.get(index + bias) : null
          if (!subr) throw this.fail(`${local ? 'local' : 'global'} subroutine ${index} not found`)
          this.run(subr, depth + 1)
          break
        }

        case RETURN:
          return

        case ENDCHAR:
          // Four trailing operands are the accent arguments of seac, not supported
          this.takeWidth(s.length === 1 || s.length === 5)
          this.sink.close()
          this.stack = []
          this.ended = true
          return

        case ESCAPE: {
          const b1 = buf.readU8()
          if (b1 === null) throw this.fail('charstring truncated')
          this.flex(b1)
          this.stack = []
          break
        }

        default:
          throw this.fail(`unsupported charstring operator ${b0}`)
      }
    }
  }

  private flex(op: number): void {
    const s = this.stack
    switch (op) {
      case FLEX:
        this.needArgs(13, 'flex')
        this.curveTo(s[0], s[1], s[2], s[3], s[4], s[5])
        this.curveTo(s[6], s[7], s[8], s[9], s[10], s[11])
        break

      case HFLEX: {
        this.needArgs(7, 'hflex')
        const startY = this.y
        this.curveTo(s[0], 0, s[1], s[2], s[3], 0)
        this.curveTo(s[4], 0, s[5], startY - this.y, s[6], 0)
        break
      }

      case HFLEX1: {
        this.needArgs(9, 'hflex1')
        const startY = this.y
        this.curveTo(s[0], s[1], s[2], s[3], s[4], 0)
        const dy5 = s[7]
        const dy6 = startY - (this.y + dy5)
        this.curveTo(s[5], 0, s[6], dy5, s[8], dy6)
        break
      }

      case FLEX1: {
        this.needArgs(11, 'flex1')
        const startX = this.x
        const startY = this.y
        let dx = 0
        let dy = 0
        for (let i = 0; i < 10; i += 2) {
          dx += s[i]
          dy += s[i + 1]
        }
        this.curveTo(s[0], s[1], s[2], s[3], s[4], s[5])
        const x5 = this.x + s[6] + s[8]
        const y5 = this.y + s[7] + s[9]
        const horizontal = Math.abs(dx) > Math.abs(dy)
        const dx6 = horizontal ? s[10] : startX - x5
        const dy6 = horizontal ? startY - y5 : s[10]
        this.curveTo(s[6], s[7], s[8], s[9], dx6, dy6)
        break
      }

      default:
        throw this.fail(`unsupported charstring operator 12 ${op}`)
    }
  }

  private readNumber(b0: number, buf: Reader): number {
    let value: number | null
    if (b0 === SHORTINT) {
      value = buf.readS16()
    } else if (b0 <= 246) {
      value = b0 - 139
    } else if (b0 <= 250) {
      const b1 = buf.readU8()
      value = b1 === null ? null : (b0 - 247) * 256 + b1 + 108
    } else if (b0 <= 254) {
      const b1 = buf.readU8()
      value = b1 === null ? null : -(b0 - 251) * 256 - b1 - 108
    } else {
      value = buf.readFixed()
    }
    if (value === null) throw this.fail('charstring number truncated')
    return value
  }
}
