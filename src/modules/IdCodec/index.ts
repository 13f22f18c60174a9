import { ATLAS_CAPACITY, CHANNEL_LEVELS } from '@/board/variables'

/**
 * RGBA color with channels in the 0..1 range.
 */
export type Rgba = [number, number, number, number]

const MAX_LEVEL = CHANNEL_LEVELS - 1

/**
 * Circle identifiers travel from the atlas programs to the pick reader as colors.
 *
 * A 12-bit identifier is split into three 4-bit fields, each stored as one of 16 exact levels (k / 15):
 *
 * ```
 * bits 8..11 -> red
 * bits 4..7  -> blue
 * bits 0..3  -> green
 * ```
 *
 * The red/blue/green order is a wire format shared with the GLSL in `@/board/modules/Atlas/circle-atlas-module`.
 * Alpha is always 1 and carries no bits.
 */
export function encodeCircleIndex (index: number): Rgba {
  const r = (index >> 8) & MAX_LEVEL
  const b = (index >> 4) & MAX_LEVEL
  const g = index & MAX_LEVEL
  return [r / MAX_LEVEL, g / MAX_LEVEL, b / MAX_LEVEL, 1]
}

function toLevel (channel: number): number {
  const level = Math.round(channel * MAX_LEVEL)
  if (Number.isNaN(level)) return 0
  return Math.min(Math.max(level, 0), MAX_LEVEL)
}

/**
 * Inverse of `encodeCircleIndex`. Channels that do not sit exactly on a level
 * are rounded to the nearest one and clamped, so this never fails;
 * use `getCircleColorError` to tell whether the color was a clean encoding.
 */
export function decodeCircleColor (color: ArrayLike<number>): number {
  const r = toLevel(color[0] ?? 0)
  const g = toLevel(color[1] ?? 0)
  const b = toLevel(color[2] ?? 0)
  return r * 256 + b * 16 + g
}

/**
 * Normalizes an 8-bit RGBA pixel to the 0..1 range.
 */
export function bytesToRgba (pixel: ArrayLike<number>): Rgba {
  return [
    (pixel[0] ?? 0) / 255,
    (pixel[1] ?? 0) / 255,
    (pixel[2] ?? 0) / 255,
    (pixel[3] ?? 0) / 255,
  ]
}

export function decodeCircleBytes (pixel: ArrayLike<number>): number {
  return decodeCircleColor(bytesToRgba(pixel))
}

/**
 * Largest per-channel distance between `color` and the exact encoding of the
 * identifier it decodes to. Zero for a color produced by `encodeCircleIndex`.
 */
export function getCircleColorError (color: ArrayLike<number>): number {
  const exact = encodeCircleIndex(decodeCircleColor(color))
  return Math.max(
    Math.abs((color[0] ?? 0) - exact[0]),
    Math.abs((color[1] ?? 0) - exact[1]),
    Math.abs((color[2] ?? 0) - exact[2])
  )
}

export function isValidCircleIndex (index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < ATLAS_CAPACITY
}

/**
 * Returns the identifier whose encoding is closest to `color`, keeping the top four bits of each 8-bit channel.
 * Drawing a cell's circle with this identifier shows it in (a quantized version of) its owner's color.
 */
export function colorToCircleIndex (color: Rgba): number {
  const r = toByte(color[0]) >> 4
  const g = toByte(color[1]) >> 4
  const b = toByte(color[2]) >> 4
  return (r << 8) | (b << 4) | g
}

function toByte (channel: number): number {
  return Math.min(Math.max(Math.round(channel * 255), 0), 255)
}
