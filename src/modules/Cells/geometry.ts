import { scaleSqrt } from 'd3-scale'
import type { AtlasIndexBase } from '@/board/config'
import { getCircleCenter, getMaxAtlasHalfSize } from '@/board/modules/Atlas'
import type { BoardData } from '@/board/modules/BoardData'
import type { Point } from '@/board/modules/Transform'
import { ATLAS_CAPACITY } from '@/board/variables'

/** Square corners, counterclockwise from the upper right. */
export const SQUARE_CORNERS: readonly Point[] = [[1, 1], [-1, 1], [-1, -1], [1, -1]]

/** Two triangles per square, as indices into `SQUARE_CORNERS`. */
const TRIANGLE_CORNERS = [0, 1, 2, 0, 2, 3]

export const VERTICES_PER_CELL = TRIANGLE_CORNERS.length

/** Atlas half-size of a pick square. Its corners land exactly on the unit circle. */
export const PICK_ATLAS_HALF_SIZE = Math.SQRT1_2

export interface CellGeometry {
  /** Graph space position of every vertex, `[x0, y0, x1, y1, ...]`. */
  points: Float32Array;
  /** Atlas coordinate of every vertex, in the same order. */
  atlasCoords: Float32Array;
  vertexCount: number;
}

export interface FillGeometryParameters {
  spacing: number;
  indexBase: AtlasIndexBase;
  maxFill: number;
  fillScale: number;
}

export interface PickGeometryParameters {
  spacing: number;
  indexBase: AtlasIndexBase;
}

/**
 * Atlas point every empty cell is sent to. It lies in the blank part of the atlas, so nothing is drawn there.
 */
export function getBlankAtlasCenter (spacing: number): Point {
  return [-2 * spacing, 0]
}

/**
 * Writes one square as two triangles: positions `halfSize` around `center`
 * and atlas coordinates `atlasHalfSize` around `atlasCenter`, corner for corner.
 */
export function pushSquare (
  geometry: CellGeometry,
  vertexOffset: number,
  center: Point,
  halfSize: number,
  atlasCenter: Point,
  atlasHalfSize: number
): void {
  for (let i = 0; i < TRIANGLE_CORNERS.length; i++) {
    const corner = SQUARE_CORNERS[TRIANGLE_CORNERS[i] ?? 0] ?? [0, 0]
    const v = (vertexOffset + i) * 2
    geometry.points[v] = center[0] + corner[0] * halfSize
    geometry.points[v + 1] = center[1] + corner[1] * halfSize
    geometry.atlasCoords[v] = atlasCenter[0] + corner[0] * atlasHalfSize
    geometry.atlasCoords[v + 1] = atlasCenter[1] + corner[1] * atlasHalfSize
  }
}

function createGeometry (cellsNumber: number): CellGeometry {
  const vertexCount = cellsNumber * VERTICES_PER_CELL
  return {
    points: new Float32Array(vertexCount * 2),
    atlasCoords: new Float32Array(vertexCount * 2),
    vertexCount,
  }
}

/**
 * Returns the atlas half-size that makes the drawn circle cover `fill / maxFill` of a full circle's area.
 * The unit atlas circle shrinks on screen as the atlas square around it grows.
 *
 * The half-size never exceeds `getMaxAtlasHalfSize(spacing)`, so very low fills are drawn
 * at the smallest size the atlas allows instead of showing a neighboring circle.
 */
export function getFillAtlasHalfSize (fill: number, maxFill: number, spacing: number): number | undefined {
  const radiusFraction = scaleSqrt().domain([0, maxFill]).range([0, 1]).clamp(true)(fill)
  if (!(radiusFraction > 0)) return undefined
  return Math.min(1 / radiusFraction, getMaxAtlasHalfSize(spacing))
}

/**
 * Builds the visible layer: for every cell, a square `fillScale` times the cell's size
 * that shows its owner's circle, scaled by the cell's fill level.
 */
export function buildFillGeometry (data: BoardData, params: FillGeometryParameters): CellGeometry {
  const { grid, owners, fills } = data
  const { spacing, indexBase, maxFill, fillScale } = params
  const geometry = createGeometry(grid.cellsNumber)
  const halfSize = grid.radius() * fillScale
  const blank = getBlankAtlasCenter(spacing)

  for (let cell = 0; cell < grid.cellsNumber; cell++) {
    const center = grid.center(cell)
    const circleIndex = data.getOwnerCircleIndex(owners[cell] ?? -1)
    const atlasHalfSize = getFillAtlasHalfSize(fills[cell] ?? 0, maxFill, spacing)

    if (circleIndex === undefined || atlasHalfSize === undefined) {
      pushSquare(geometry, cell * VERTICES_PER_CELL, center, halfSize, blank, 1)
    } else {
      pushSquare(geometry, cell * VERTICES_PER_CELL, center, halfSize, getCircleCenter(circleIndex, spacing, indexBase), atlasHalfSize)
    }
  }

  return geometry
}

/**
 * Builds the identifier layer: every cell fully covered by a square
 * that decodes to the cell's own index.
 */
export function buildPickGeometry (data: BoardData, params: PickGeometryParameters): CellGeometry {
  const { grid } = data
  const { spacing, indexBase } = params
  const geometry = createGeometry(grid.cellsNumber)
  const halfSize = grid.radius()
  const blank = getBlankAtlasCenter(spacing)

  for (let cell = 0; cell < grid.cellsNumber; cell++) {
    const center = grid.center(cell)
    if (cell < ATLAS_CAPACITY) {
      pushSquare(geometry, cell * VERTICES_PER_CELL, center, halfSize, getCircleCenter(cell, spacing, indexBase), PICK_ATLAS_HALF_SIZE)
    } else {
      pushSquare(geometry, cell * VERTICES_PER_CELL, center, halfSize, blank, 1)
    }
  }

  return geometry
}
