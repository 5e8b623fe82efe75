// Region scalars shared by gvar tuples and item variation stores
// https://learn.microsoft.com/en-us/typography/opentype/spec/otvaroverview#algorithm-for-interpolation-of-instance-values

/**
 * Contribution of one axis of a region at `coord`, all values in 2.14 units.
 *
 * A zero peak or an invalid region (start > peak, peak > end, or a region
 * straddling zero) leaves the axis out of the product.
 */
export function axisScalar(coord: number, start: number, peak: number, end: number): number {
  if (start > peak || peak > end) return 1
  if (start < 0 && end > 0 && peak !== 0) return 1
  if (peak === 0 || coord === peak) return 1
  if (coord <= start || end <= coord) return 0

  if (coord < peak) {
    return (coord - start) / (peak - start)
  }
  return (end - coord) / (end - peak)
}

/**
 * Scalar of a tuple against the current coordinates.
 *
 * Without explicit intermediate bounds the region spans from zero to the peak.
 */
export function tupleScalar(
  coordinates: ArrayLike<number>,
  peak: ArrayLike<number>,
  start: ArrayLike<number> | null,
  end: ArrayLike<number> | null
): number {
  let scalar = 1
  for (let i = 0; i < peak.length; i++) {
    const p = peak[i]
    if (p === 0) continue

    const coord = i < coordinates.length ? coordinates[i] : 0
    const s = start ? start[i] : Math.min(0, p)
    const e = end ? end[i] : Math.max(0, p)

    const factor = axisScalar(coord, s, p, e)
    if (factor === 0) return 0
    scalar *= factor
  }
  return scalar
}
