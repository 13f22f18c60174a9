import type { Device, Framebuffer } from '@luma.gl/core'
import { readPixels } from '@/board/helper'
import { bytesToRgba, decodeCircleBytes, getCircleColorError } from '@/board/modules/IdCodec'
import { defaultConfigValues } from '@/board/variables'

/**
 * Reads circle identifiers back from an identifier framebuffer (`rgba8unorm`).
 */
export class PickReader {
  public readonly device: Device
  public tolerance: number

  public constructor (device: Device, tolerance = defaultConfigValues.pickColorTolerance) {
    this.device = device
    this.tolerance = tolerance
  }

  /**
   * Returns the identifier under device pixel `(x, y)`, counted from the upper left corner,
   * or `undefined` when the pixel is outside the framebuffer, was never drawn to,
   * or does not hold a clean encoding.
   *
   * Blocks until the GPU has finished every command submitted so far.
   */
  public read (framebuffer: Framebuffer, x: number, y: number): number | undefined {
    const { width, height } = framebuffer
    const column = Math.floor(x)
    const row = Math.floor(y)
    if (!(column >= 0 && column < width && row >= 0 && row < height)) return undefined

    this.device.submit()
    // Framebuffer rows start at the bottom
    const pixel = readPixels(this.device, framebuffer, column, height - 1 - row, 1, 1)
    return this.decode(pixel)
  }

  /**
   * Decodes one 8-bit RGBA sample.
   */
  public decode (pixel: ArrayLike<number>): number | undefined {
    if (pixel.length < 4 || (pixel[3] ?? 0) < 255) return undefined
    if (getCircleColorError(bytesToRgba(pixel)) > this.tolerance) return undefined
    return decodeCircleBytes(pixel)
  }
}
