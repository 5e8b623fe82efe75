// Forwards path commands to an OutlineBuilder while tracking the open
// subpath and the bounding box of every emitted coordinate

import type { OutlineBuilder, Rect } from '../types'

const I16_MIN = -32768
const I16_MAX = 32767

function clampI16(n: number): number {
  return Math.min(I16_MAX, Math.max(I16_MIN, n))
}

// Builder for requests that only want the bbox
export const discardingBuilder: OutlineBuilder = {
  moveTo() {},
  lineTo() {},
  quadTo() {},
  curveTo() {},
  close() {},
}

export class PathSink {
  private readonly builder: OutlineBuilder
  private open = false
  private xMin = Infinity
  private yMin = Infinity
  private xMax = -Infinity
  private yMax = -Infinity

  constructor(builder: OutlineBuilder) {
    this.builder = builder
  }

  private extend(x: number, y: number): void {
    if (x < this.xMin) this.xMin = x
    if (x > this.xMax) this.xMax = x
    if (y < this.yMin) this.yMin = y
    if (y > this.yMax) this.yMax = y
  }

  moveTo(x: number, y: number): void {
    this.close()
    this.extend(x, y)
    this.builder.moveTo(x, y)
    this.open = true
  }

  lineTo(x: number, y: number): void {
    this.extend(x, y)
    this.builder.lineTo(x, y)
  }

  quadTo(x1: number, y1: number, x: number, y: number): void {
    this.extend(x1, y1)
    this.extend(x, y)
    this.builder.quadTo(x1, y1, x, y)
  }

  curveTo(x1: number, y1: number, x2: number, y2: number, x: number, y: number): void {
    this.extend(x1, y1)
    this.extend(x2, y2)
    this.extend(x, y)
    this.builder.curveTo(x1, y1, x2, y2, x, y)
  }

  close(): void {
    if (!this.open) return
    this.builder.close()
    this.open = false
  }

  // Closes the last subpath; null when nothing was emitted
  finish(): Rect | null {
    this.close()
    if (this.xMin > this.xMax) return null
    return {
      xMin: clampI16(Math.floor(this.xMin)),
      yMin: clampI16(Math.floor(this.yMin)),
      xMax: clampI16(Math.ceil(this.xMax)),
      yMax: clampI16(Math.ceil(this.yMax)),
    }
  }
}
