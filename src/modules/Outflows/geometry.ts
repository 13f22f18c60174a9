import { vec2 } from 'gl-matrix'
import type { CellPair, SquareGrid } from '@/board/modules/SquareGrid'
import type { Point } from '@/board/modules/Transform'

/** Two triangles per outflow. */
export const VERTICES_PER_OUTFLOW = 6

export type OutflowHighlightState = 'hover' | 'active'

export interface OutflowHighlight {
  outflow: CellPair;
  state: OutflowHighlightState;
}

/**
 * Mouse button held down over the board, with the boundary it went down on, if any.
 */
export interface BoundaryPress {
  boundary: CellPair | undefined;
}

export function isSameCellPair (a: CellPair | undefined, b: CellPair | undefined): boolean {
  if (!a || !b) return a === b
  return a[0] === b[0] && a[1] === b[1]
}

/**
 * An outflow runs from the center of its cell to the middle of the side it flows through.
 */
export function getOutflowSegment (grid: SquareGrid, outflow: CellPair): [Point, Point] {
  const start = grid.center(outflow[0])
  const end = grid.center(outflow[1])
  return [start, [(start[0] + end[0]) / 2, (start[1] + end[1]) / 2]]
}

/**
 * Writes the segment `start..end` as a rectangle `2 * halfWidth` wide, two triangles, starting at `vertexOffset`.
 */
export function pushSegmentQuad (points: Float32Array, vertexOffset: number, start: Point, end: Point, halfWidth: number): void {
  const direction = vec2.normalize(vec2.create(), vec2.subtract(vec2.create(), end, start))
  const nx = -direction[1] * halfWidth
  const ny = direction[0] * halfWidth
  const corners: Point[] = [
    [start[0] + nx, start[1] + ny],
    [start[0] - nx, start[1] - ny],
    [end[0] - nx, end[1] - ny],
    [start[0] + nx, start[1] + ny],
    [end[0] - nx, end[1] - ny],
    [end[0] + nx, end[1] + ny],
  ]
  corners.forEach(([x, y], i) => {
    points[(vertexOffset + i) * 2] = x
    points[(vertexOffset + i) * 2 + 1] = y
  })
}

/**
 * Returns a triangle list `[x0, y0, x1, y1, ...]` with one `width` wide rectangle per outflow.
 */
export function getOutflowGeometry (grid: SquareGrid, outflows: CellPair[], width: number): Float32Array {
  const points = new Float32Array(outflows.length * VERTICES_PER_OUTFLOW * 2)
  outflows.forEach((outflow, i) => {
    const [start, end] = getOutflowSegment(grid, outflow)
    pushSegmentQuad(points, i * VERTICES_PER_OUTFLOW, start, end, width / 2)
  })
  return points
}

/**
 * Decides which outflow to highlight from the boundary under the pointer and the current press.
 *
 * Without a press the hovered boundary is shown as clickable. A press on a boundary shows it active while the
 * pointer stays on it, and as clickable once the pointer has moved off. A press that started elsewhere shows nothing.
 */
export function getOutflowHighlight (hovered: CellPair | undefined, press: BoundaryPress | undefined): OutflowHighlight | undefined {
  if (!press) return hovered ? { outflow: hovered, state: 'hover' } : undefined
  if (!press.boundary) return undefined
  return {
    outflow: press.boundary,
    state: isSameCellPair(hovered, press.boundary) ? 'active' : 'hover',
  }
}
