import { encodeCircleIndex, isValidCircleIndex, type Rgba } from '@/board/modules/IdCodec'
import type { AtlasIndexBase, OutOfRangePolicy } from '@/board/config'

export interface AtlasParameters {
  spacing: number;
  indexBase: AtlasIndexBase;
  outOfRangePolicy: OutOfRangePolicy;
  sentinelColor: Rgba;
}

export type AtlasFragment =
  | { kind: 'discard' }
  | { kind: 'circle'; index: number; color: Rgba }
  | { kind: 'sentinel'; color: Rgba }

/**
 * Returns the atlas slot whose circle center is nearest to `x`, rounding halves up.
 */
export function getAtlasSlot (x: number, spacing: number): number {
  return Math.floor(x / spacing + 0.5)
}

/**
 * Returns the atlas coordinate of the center of the circle carrying `index`.
 */
export function getCircleCenter (index: number, spacing: number, indexBase: AtlasIndexBase): [number, number] {
  return [(index + indexBase) * spacing, 0]
}

/**
 * Left edge of the blank part of the atlas. Coordinates further left are never inside a circle.
 */
export function getBlankAtlasLimit (spacing: number): number {
  return -spacing
}

/**
 * Largest atlas half-size a square centered on a circle can have and still stay inside that circle's slot.
 * Beyond it the square reaches a neighboring slot, which is either another circle or out of range.
 */
export function getMaxAtlasHalfSize (spacing: number): number {
  return (spacing - 1) / 2
}

/**
 * Whether a circle `sqrt(fill / maxFill)` of full size, for every fill level from 1 up, can be drawn
 * at its true size without its square leaving its atlas slot.
 */
export function isFillRangeDrawable (maxFill: number, spacing: number): boolean {
  return Math.sqrt(maxFill) <= getMaxAtlasHalfSize(spacing)
}

/**
 * Host-side equivalent of `circleAtlasColor` in `circle-atlas-module.ts`: the outcome of one fragment
 * of either atlas program, as a function of its interpolated atlas coordinate only.
 */
export function shadeAtlasFragment (coord: [number, number], params: AtlasParameters): AtlasFragment {
  const { spacing, indexBase, outOfRangePolicy, sentinelColor } = params
  if (coord[0] < getBlankAtlasLimit(spacing)) return { kind: 'discard' }

  const slot = getAtlasSlot(coord[0], spacing)
  const index = slot - indexBase
  if (!isValidCircleIndex(index)) {
    if (outOfRangePolicy === 'sentinel') {
      return { kind: 'sentinel', color: [sentinelColor[0], sentinelColor[1], sentinelColor[2], 1] }
    }
    return { kind: 'discard' }
  }

  const dx = coord[0] - slot * spacing
  const dy = coord[1]
  if (Math.hypot(dx, dy) > 1) return { kind: 'discard' }

  return { kind: 'circle', index, color: encodeCircleIndex(index) }
}

/**
 * Host-side equivalent of the identifier program. It never paints the sentinel:
 * out-of-range fragments are discarded whatever the policy, so they always read back as no cell.
 */
export function shadeIdFragment (coord: [number, number], params: AtlasParameters): AtlasFragment {
  return shadeAtlasFragment(coord, { ...params, outOfRangePolicy: 'discard' })
}
