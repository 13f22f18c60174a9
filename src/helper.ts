import { color as d3Color } from 'd3-color'
import type { Device, Framebuffer } from '@luma.gl/core'

export const isArray = <T>(a: unknown | T[]): a is T[] => Array.isArray(a)

export function getRgbaColor (value: string | [number, number, number, number]): [number, number, number, number] {
  let rgba: [number, number, number, number]
  if (isArray(value)) {
    rgba = value
  } else {
    const color = d3Color(value)
    const rgb = color?.rgb()
    rgba = [rgb?.r || 0, rgb?.g || 0, rgb?.b || 0, color?.opacity ?? 1]
  }

  return [
    rgba[0] / 255,
    rgba[1] / 255,
    rgba[2] / 255,
    rgba[3],
  ]
}

/**
 * Reads a block of pixels from a framebuffer.
 *
 * `readPixelsToArrayWebGL` wraps `gl.readPixels`, which does not return until every
 * command writing to the framebuffer has finished, so the result never holds a
 * partially rendered frame. The array type follows the attachment format:
 * `Uint8Array` for `rgba8unorm`, `Float32Array` for `rgba32float`.
 *
 * TODO: Move to the CommandEncoder `copyTextureToBuffer` path once picking can become asynchronous.
 * `readPixelsToArrayWebGL` is deprecated in luma.gl v9.
 */
export function readPixels (device: Device, fbo: Framebuffer, sourceX = 0, sourceY = 0, sourceWidth?: number, sourceHeight?: number): Uint8Array | Uint16Array | Float32Array {
  return device.readPixelsToArrayWebGL(fbo, {
    sourceX,
    sourceY,
    sourceWidth,
    sourceHeight,
  })
}

export function clamp (num: number, min: number, max: number): number {
  return Math.min(Math.max(num, min), max)
}
