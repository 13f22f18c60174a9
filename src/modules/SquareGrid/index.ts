export type Cell = number

/**
 * Two neighboring cells, in order: an outflow from the first to the second, or the boundary between them seen from the first.
 */
export type CellPair = [Cell, Cell]

/**
 * A side of a cell, as indices into `SquareGrid.endpoints()`, and the cell on the other side, if any.
 */
export interface IndexedSegment {
  start: number;
  end: number;
  neighbor: Cell | undefined;
}

/**
 * Boundary hits closer than this to a cell corner are ambiguous, and points further than this from a side are not hits.
 * Must stay below 0.5.
 */
export const BOUNDARY_HIT_TOLERANCE = 0.2

/**
 * A grid of 1x1 square cells. Neighbors are the cells above, below, left and right; diagonals are not neighbors.
 *
 * In graph space the grid spans `(0, 0)..(cols, rows)`. Cells are numbered in row-major order,
 * bottom row first, left to right.
 */
export class SquareGrid {
  public readonly rows: number
  public readonly cols: number

  public constructor (rows: number, cols: number) {
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows < 0 || cols < 0) {
      throw new Error(`Grid dimensions must be non-negative integers, got ${rows}x${cols}`)
    }
    this.rows = rows
    this.cols = cols
  }

  public get cellsNumber (): number {
    return this.rows * this.cols
  }

  public get edgesNumber (): number {
    if (!this.cellsNumber) return 0
    return this.rows * (this.cols - 1) + this.cols * (this.rows - 1)
  }

  public neighbors (cell: Cell): Cell[] {
    const [row, col] = this.cellRowCol(cell)
    const neighbors: Cell[] = []
    if (row + 1 < this.rows) neighbors.push(this.rowColCell(row + 1, col))
    if (col + 1 < this.cols) neighbors.push(this.rowColCell(row, col + 1))
    if (row >= 1) neighbors.push(this.rowColCell(row - 1, col))
    if (col >= 1) neighbors.push(this.rowColCell(row, col - 1))
    return neighbors
  }

  /**
   * Upper-right corner of the grid's bounding box. The lower-left corner is the origin.
   */
  public bounds (): [number, number] {
    return [this.cols, this.rows]
  }

  public center (cell: Cell): [number, number] {
    const [row, col] = this.cellRowCol(cell)
    return [col + 0.5, row + 0.5]
  }

  /**
   * Radius of the circle drawn for a full cell. The same for every cell, so fill levels compare visually.
   */
  public radius (): number {
    return 0.5
  }

  /**
   * Sides of `cell` in the order north, east, south, west, running counterclockwise.
   */
  public boundary (cell: Cell): IndexedSegment[] {
    const { rows, cols } = this
    const [row, col] = this.cellRowCol(cell)
    const pointCols = cols + 1
    const southWest = row * pointCols + col

    return [
      {
        start: southWest + pointCols + 1,
        end: southWest + pointCols,
        neighbor: row + 1 < rows ? cell + cols : undefined,
      },
      {
        start: southWest + 1,
        end: southWest + pointCols + 1,
        neighbor: col + 1 < cols ? cell + 1 : undefined,
      },
      {
        start: southWest,
        end: southWest + 1,
        neighbor: row > 0 ? cell - cols : undefined,
      },
      {
        start: southWest + pointCols,
        end: southWest,
        neighbor: col > 0 ? cell - 1 : undefined,
      },
    ]
  }

  /**
   * Coordinates of every cell corner, row by row from the bottom. `boundary` refers to them by index.
   */
  public endpoints (): [number, number][] {
    const points: [number, number][] = []
    for (let r = 0; r <= this.rows; r++) {
      for (let c = 0; c <= this.cols; c++) {
        points.push([c, r])
      }
    }
    return points
  }

  /**
   * Finds the interior boundary under `point`, as the directed pair `[from, to]`: `from` is the cell
   * the point lies in, `to` the cell across the boundary.
   * Points near corners, near the outer edge or far from every side give `undefined`.
   */
  public boundaryHit (point: [number, number]): CellPair | undefined {
    const [x, y] = point
    const [maxX, maxY] = this.bounds()
    if (x < BOUNDARY_HIT_TOLERANCE || x > maxX - BOUNDARY_HIT_TOLERANCE ||
      y < BOUNDARY_HIT_TOLERANCE || y > maxY - BOUNDARY_HIT_TOLERANCE) {
      return undefined
    }

    const nearX = isNearInteger(x)
    const nearY = isNearInteger(y)
    if (nearX && nearY) return undefined

    if (nearX) {
      const col = Math.round(x)
      const row = Math.floor(y)
      return x < col
        ? [this.rowColCell(row, col - 1), this.rowColCell(row, col)]
        : [this.rowColCell(row, col), this.rowColCell(row, col - 1)]
    }

    if (nearY) {
      const col = Math.floor(x)
      const row = Math.round(y)
      return y < row
        ? [this.rowColCell(row - 1, col), this.rowColCell(row, col)]
        : [this.rowColCell(row, col), this.rowColCell(row - 1, col)]
    }

    return undefined
  }

  public isCell (cell: Cell): boolean {
    return Number.isInteger(cell) && cell >= 0 && cell < this.cellsNumber
  }

  public areNeighbors (from: Cell, to: Cell): boolean {
    return this.isCell(from) && this.isCell(to) && this.neighbors(from).includes(to)
  }

  private cellRowCol (cell: Cell): [number, number] {
    if (!this.isCell(cell)) {
      throw new RangeError(`Cell ${cell} is outside a ${this.rows}x${this.cols} grid`)
    }
    return [Math.floor(cell / this.cols), cell % this.cols]
  }

  private rowColCell (row: number, col: number): Cell {
    return row * this.cols + col
  }
}

function isNearInteger (value: number): boolean {
  return Math.abs(value - Math.round(value)) <= BOUNDARY_HIT_TOLERANCE
}
