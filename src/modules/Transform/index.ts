import { mat3, vec2 } from 'gl-matrix'

/**
 * Coordinate spaces, from the most concrete to the most abstract:
 *
 * - Window: CSS pixels of the canvas, origin at the upper left, y pointing down.
 * - Device (NDC): the canvas spans -1..1 on both axes, origin at the center, y pointing up.
 * - Graph: the board's own space. A grid of `rows x cols` cells spans `(0, 0)..(cols, rows)`.
 *
 * Transforms are gl-matrix `mat3` values (column-major) acting on homogeneous 2D points.
 */

export type Point = [number, number]

export interface ViewRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * A 4x4 matrix as 16 numbers in column-major order, the layout of a std140 `mat4` uniform.
 */
export type Mat4Array = [number, number, number, number, number, number, number, number, number, number, number, number, number, number, number, number]

export interface ZoomState {
  x: number;
  y: number;
  k: number;
}

/**
 * Returns `lhs * rhs`: the transform that applies `rhs` first, then `lhs`.
 */
export function composeTransforms (lhs: mat3, rhs: mat3): mat3 {
  return mat3.multiply(mat3.create(), lhs, rhs)
}

export function invertTransform (m: mat3): mat3 | undefined {
  return mat3.invert(mat3.create(), m) ?? undefined
}

export function applyTransform (m: mat3, point: Point): Point {
  const out = vec2.transformMat3(vec2.create(), point, m)
  return [out[0], out[1]]
}

/**
 * Maps `viewRect` into normalized device coordinates for a viewport of the given aspect ratio (width / height).
 *
 * The rectangle keeps its own aspect ratio: it fills the viewport's height and is centered horizontally
 * when the viewport is wider, and fills the width and is centered vertically otherwise.
 * `margin` shrinks the result towards the center of the viewport.
 */
export function createViewTransform (viewRect: ViewRect, viewportAspect: number, margin = 1): mat3 {
  const { x, y, width, height } = viewRect
  if (!(width > 0) || !(height > 0) || !isFinite(width) || !isFinite(height)) {
    throw new Error(`View rectangle must have a positive size, got ${width}x${height}`)
  }
  if (!(viewportAspect > 0) || !isFinite(viewportAspect)) {
    throw new Error(`Viewport aspect ratio must be positive, got ${viewportAspect}`)
  }

  // View rectangle to the square -1..1
  const rectToSquare = mat3.create()
  mat3.translate(rectToSquare, rectToSquare, [-1, -1])
  mat3.scale(rectToSquare, rectToSquare, [2 / width, 2 / height])
  mat3.translate(rectToSquare, rectToSquare, [-x, -y])

  const rectAspect = width / height
  const squareToDevice = viewportAspect > rectAspect
    ? mat3.fromScaling(mat3.create(), [margin * rectAspect / viewportAspect, margin])
    : mat3.fromScaling(mat3.create(), [margin, margin * viewportAspect / rectAspect])

  return composeTransforms(squareToDevice, rectToSquare)
}

/**
 * Maps window pixels of a `width x height` canvas to normalized device coordinates.
 */
export function createWindowToDevice (width: number, height: number): mat3 {
  const m = mat3.fromTranslation(mat3.create(), [-1, 1])
  return mat3.scale(m, m, [2 / width, -2 / height])
}

/**
 * Applies a d3-zoom pan/zoom, expressed in window pixels, on top of a graph-to-device transform.
 */
export function createZoomedTransform (graphToDevice: mat3, zoom: ZoomState, width: number, height: number): mat3 {
  const windowToDevice = createWindowToDevice(width, height)
  const deviceToWindow = invertTransform(windowToDevice)
  if (!deviceToWindow) return mat3.clone(graphToDevice)

  const zoomInWindow = mat3.fromTranslation(mat3.create(), [zoom.x, zoom.y])
  mat3.scale(zoomInWindow, zoomInWindow, [zoom.k, zoom.k])

  return composeTransforms(windowToDevice, composeTransforms(zoomInWindow, composeTransforms(deviceToWindow, graphToDevice)))
}

/**
 * Widens a 3x3 transform to the 4x4 layout of a std140 `mat4` uniform.
 * The shader takes the upper-left 3x3 back with `mat3(transformationMatrix)`.
 */
export function toMat4Array (m: mat3): Mat4Array {
  return [
    m[0], m[1], m[2], 0,
    m[3], m[4], m[5], 0,
    m[6], m[7], m[8], 0,
    0, 0, 0, 1,
  ]
}
