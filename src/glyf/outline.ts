// Quadratic outline extraction from glyf/loca, with composite resolution and
// optional gvar deltas

import { MalformedGlyphError } from '../shared/errors'
import { discardingBuilder, PathSink } from '../shared/path-sink'
import type { OutlineBuilder, Rect } from '../types'
import type { GlyphVariations, PointDeltas } from '../variations/gvar'
import {
  COMP_ARGS_ARE_XY_VALUES,
  COMP_SCALED_COMPONENT_OFFSET,
  COMP_UNSCALED_COMPONENT_OFFSET,
  parseGlyph,
  type CompositeGlyph,
  type GlyphPoint,
  type ParsedGlyph,
  type SimpleGlyph,
} from './glyph'
import type { GlyphLocations } from './loca'

// Upper bound on component records visited by one request
const MAX_COMPONENT_VISITS = 65536

// Upper bound on component points placed by one request. A sub-glyph reused
// at every nesting level doubles the flattened point set per level, well
// inside both the depth and the visit limits.
const MAX_COMPONENT_POINTS = 4 * 65536

export interface GlyfContext {
  glyf: Uint8Array
  loca: GlyphLocations
  numGlyphs: number
  maxDepth: number
  gvar: GlyphVariations | null
  // Normalized coordinates, or null for the default instance
  coordinates: Int16Array | null
}

interface RequestState {
  rootId: number
  visits: number
  points: number
}

// Raw glyph record, or null for an empty or nonexistent glyph
export function glyphData(ctx: GlyfContext, glyphId: number): Uint8Array | null {
  if (glyphId < 0 || glyphId >= ctx.numGlyphs) return null

  const range = ctx.loca.range(glyphId)
  if (!range) {
    throw new MalformedGlyphError(glyphId, 'missing loca entry')
  }
  if (range.start > range.end || range.end > ctx.glyf.byteLength) {
    throw new MalformedGlyphError(
      glyphId,
      `glyf range ${range.start}..${range.end} outside the ${ctx.glyf.byteLength} byte table`
    )
  }
  if (range.start === range.end) return null

  return ctx.glyf.subarray(range.start, range.end)
}

/**
 * Same bbox `outlineGlyf` returns, without emitting anything. Simple glyphs
 * at the default instance use the stored header bbox; composites and varied
 * glyphs are resolved, since their stored bbox may not match the outline.
 */
export function glyfBoundingBox(ctx: GlyfContext, glyphId: number): Rect | null {
  const data = glyphData(ctx, glyphId)
  if (!data) return null

  const glyph = parseGlyph(glyphId, data)
  if (glyph.kind === 'simple' && !isVaried(ctx)) {
    return hasDrawableContour(glyph) ? glyph.bbox : null
  }
  return outlineParsed(ctx, glyphId, glyph, discardingBuilder)
}

export function outlineGlyf(ctx: GlyfContext, glyphId: number, builder: OutlineBuilder): Rect | null {
  const data = glyphData(ctx, glyphId)
  if (!data) return null
  return outlineParsed(ctx, glyphId, parseGlyph(glyphId, data), builder)
}

function outlineParsed(
  ctx: GlyfContext,
  glyphId: number,
  glyph: ParsedGlyph,
  builder: OutlineBuilder
): Rect | null {
  const state: RequestState = { rootId: glyphId, visits: 0, points: 0 }
  const points = resolvePoints(ctx, glyphId, glyph, 0, state)

  const sink = new PathSink(builder)
  emitContours(points, sink)
  const bbox = sink.finish()

  if (bbox && glyph.kind === 'simple' && !isVaried(ctx)) {
    return glyph.bbox
  }
  return bbox
}

function hasDrawableContour(glyph: SimpleGlyph): boolean {
  return glyph.endPoints.some((end, i) => end - (i === 0 ? -1 : glyph.endPoints[i - 1]) >= 2)
}

function isVaried(ctx: GlyfContext): boolean {
  return ctx.gvar !== null && ctx.coordinates !== null
}

// Flattened points of a glyph in its own coordinate space, deltas applied
function resolvePoints(
  ctx: GlyfContext,
  glyphId: number,
  glyph: ParsedGlyph,
  depth: number,
  state: RequestState
): GlyphPoint[] {
  if (glyph.kind === 'simple') {
    return resolveSimple(ctx, glyphId, glyph)
  }
  return resolveComposite(ctx, glyphId, glyph, depth, state)
}

function resolveSimple(ctx: GlyfContext, glyphId: number, glyph: SimpleGlyph): GlyphPoint[] {
  if (!ctx.gvar || !ctx.coordinates || glyph.points.length === 0) {
    return glyph.points
  }

  const deltas = ctx.gvar.glyphDeltas(glyphId, ctx.coordinates, glyph.points, glyph.endPoints)
  if (!deltas) return glyph.points

  return glyph.points.map((p, i) => ({
    x: p.x + deltas.x[i],
    y: p.y + deltas.y[i],
    onCurve: p.onCurve,
    lastPoint: p.lastPoint,
  }))
}

function resolveComposite(
  ctx: GlyfContext,
  glyphId: number,
  glyph: CompositeGlyph,
  depth: number,
  state: RequestState
): GlyphPoint[] {
  if (depth >= ctx.maxDepth) {
    throw new MalformedGlyphError(
      state.rootId,
      `composite nesting exceeds ${ctx.maxDepth} levels (cyclic component graph?)`
    )
  }

  let deltas: PointDeltas | null = null
  if (ctx.gvar && ctx.coordinates) {
    // One point per component carries its offset delta
    const offsets = glyph.components.map((c) => ({ x: c.arg1, y: c.arg2 }))
    deltas = ctx.gvar.glyphDeltas(glyphId, ctx.coordinates, offsets, [])
  }

  const result: GlyphPoint[] = []

  glyph.components.forEach((component, i) => {
    if (++state.visits > MAX_COMPONENT_VISITS) {
      throw new MalformedGlyphError(state.rootId, 'too many composite components')
    }

    const data = glyphData(ctx, component.glyphId)
    if (!data) return

    const child = resolvePoints(
      ctx,
      component.glyphId,
      parseGlyph(component.glyphId, data),
      depth + 1,
      state
    )
    if (child.length === 0) return

    state.points += child.length
    if (state.points > MAX_COMPONENT_POINTS) {
      throw new MalformedGlyphError(
        state.rootId,
        `composite expands to more than ${MAX_COMPONENT_POINTS} points`
      )
    }

    const { a, b, c, d } = component.transform
    const placed = child.map((p) => ({
      x: a * p.x + c * p.y,
      y: b * p.x + d * p.y,
      onCurve: p.onCurve,
      lastPoint: p.lastPoint,
    }))

    let dx: number
    let dy: number
    if (component.flags & COMP_ARGS_ARE_XY_VALUES) {
      const ox = component.arg1 + (deltas ? deltas.x[i] : 0)
      const oy = component.arg2 + (deltas ? deltas.y[i] : 0)
      const scaled =
        (component.flags & COMP_SCALED_COMPONENT_OFFSET) !== 0 &&
        (component.flags & COMP_UNSCALED_COMPONENT_OFFSET) === 0
      dx = scaled ? a * ox + c * oy : ox
      dy = scaled ? b * ox + d * oy : oy
    } else {
      // Point matching: child point arg2 lands on parent point arg1
      const anchor = result[component.arg1]
      const matched = placed[component.arg2]
      if (!anchor || !matched) {
        throw new MalformedGlyphError(
          glyphId,
          `anchor points ${component.arg1}/${component.arg2} out of range`
        )
      }
      dx = anchor.x - matched.x
      dy = anchor.y - matched.y
    }

    for (const p of placed) {
      p.x += dx
      p.y += dy
      result.push(p)
    }
  })

  return result
}

// Contours with fewer than two points draw nothing and are skipped
function emitContours(points: GlyphPoint[], sink: PathSink): void {
  let start = 0
  for (let i = 0; i < points.length; i++) {
    if (!points[i].lastPoint) continue
    if (i - start + 1 >= 2) {
      emitContour(points, start, i, sink)
    }
    start = i + 1
  }
}

interface Point {
  x: number
  y: number
}

function midpoint(p1: Point, p2: Point): Point {
  return { x: (p1.x + p2.x) / 2, y: (p1.y + p2.y) / 2 }
}

/**
 * Quadratic B-spline to path commands.
 *
 * Two consecutive off-curve points imply an on-curve point halfway between
 * them. A contour that starts off-curve begins at its first on-curve point or,
 * failing that, at the midpoint of its first two off-curve points; the skipped
 * leading off-curve point is consumed when the contour wraps around.
 */
function emitContour(points: GlyphPoint[], start: number, end: number, sink: PathSink): void {
  let firstOnCurve: Point | null = null
  let firstOffCurve: Point | null = null
  let lastOffCurve: Point | null = null

  for (let i = start; i <= end; i++) {
    const p: Point = { x: points[i].x, y: points[i].y }
    const onCurve = points[i].onCurve

    if (!firstOnCurve) {
      if (onCurve) {
        firstOnCurve = p
        sink.moveTo(p.x, p.y)
      } else if (firstOffCurve) {
        const mid = midpoint(firstOffCurve, p)
        firstOnCurve = mid
        lastOffCurve = p
        sink.moveTo(mid.x, mid.y)
      } else {
        firstOffCurve = p
      }
      continue
    }

    if (lastOffCurve) {
      if (onCurve) {
        sink.quadTo(lastOffCurve.x, lastOffCurve.y, p.x, p.y)
        lastOffCurve = null
      } else {
        const mid = midpoint(lastOffCurve, p)
        sink.quadTo(lastOffCurve.x, lastOffCurve.y, mid.x, mid.y)
        lastOffCurve = p
      }
    } else if (onCurve) {
      sink.lineTo(p.x, p.y)
    } else {
      lastOffCurve = p
    }
  }

  if (!firstOnCurve) return

  // Close the contour back to its start
  if (firstOffCurve && lastOffCurve) {
    const mid = midpoint(lastOffCurve, firstOffCurve)
    sink.quadTo(lastOffCurve.x, lastOffCurve.y, mid.x, mid.y)
    lastOffCurve = null
  }

  if (firstOffCurve) {
    sink.quadTo(firstOffCurve.x, firstOffCurve.y, firstOnCurve.x, firstOnCurve.y)
  } else if (lastOffCurve) {
    sink.quadTo(lastOffCurve.x, lastOffCurve.y, firstOnCurve.x, firstOnCurve.y)
  } else {
    sink.lineTo(firstOnCurve.x, firstOnCurve.y)
  }

  sink.close()
}
