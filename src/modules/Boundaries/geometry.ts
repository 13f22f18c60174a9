import type { SquareGrid } from '@/board/modules/SquareGrid'

/**
 * Returns the grid's cell sides as a line list `[x0, y0, x1, y1, ...]`, two vertices per side.
 * A side shared by two cells is listed once, by the cell with the lower index.
 */
export function getBoundaryLineGeometry (grid: SquareGrid): Float32Array {
  const endpoints = grid.endpoints()
  const lines: number[] = []

  for (let cell = 0; cell < grid.cellsNumber; cell++) {
    for (const segment of grid.boundary(cell)) {
      if (segment.neighbor !== undefined && segment.neighbor < cell) continue
      const start = endpoints[segment.start]
      const end = endpoints[segment.end]
      if (!start || !end) continue
      lines.push(start[0], start[1], end[0], end[1])
    }
  }

  return new Float32Array(lines)
}
