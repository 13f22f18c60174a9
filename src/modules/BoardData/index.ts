import { getRgbaColor } from '@/board/helper'
import type { BoardColor } from '@/board/config'
import { colorToCircleIndex, type Rgba } from '@/board/modules/IdCodec'
import { SquareGrid, type CellPair } from '@/board/modules/SquareGrid'
import { ATLAS_CAPACITY } from '@/board/variables'

/** Owner value of a cell nobody holds. */
export const NO_OWNER = -1

export class BoardData {
  public grid = new SquareGrid(0, 0)
  /** Owner of every cell, `NO_OWNER` for empty cells. */
  public owners = new Float32Array(0)
  /** Fill level of every cell. */
  public fills = new Float32Array(0)
  public ownerColors: Rgba[] = []
  /** Outflows of occupied cells, `[from, to]` with `to` a neighbor of `from`. */
  public outflows: CellPair[] = []

  private inputOwners: Float32Array | undefined
  private inputFills: Float32Array | undefined
  private inputOutflows: CellPair[] = []

  public get cellsNumber (): number {
    return this.grid.cellsNumber
  }

  /**
   * Number of cells that can be told apart by picking.
   */
  public get pickableCellsNumber (): number {
    return Math.min(this.cellsNumber, ATLAS_CAPACITY)
  }

  public setGrid (rows: number, cols: number): void {
    this.grid = new SquareGrid(rows, cols)
    if (this.grid.cellsNumber > ATLAS_CAPACITY) {
      console.warn(`The board has ${this.grid.cellsNumber} cells but only the first ${ATLAS_CAPACITY} can be picked`)
    }
  }

  public setOwnerColors (colors: BoardColor[]): void {
    this.ownerColors = colors.map(getRgbaColor)
  }

  public setCellStates (owners: Float32Array, fills: Float32Array): void {
    this.inputOwners = owners
    this.inputFills = fills
  }

  public setOutflows (outflows: CellPair[]): void {
    this.inputOutflows = outflows
  }

  /**
   * Fits the latest cell states and outflows to the current grid.
   * Cells missing from the input arrays are empty. Outflows from empty cells are dropped.
   */
  public update (): void {
    const { cellsNumber } = this
    const owners = new Float32Array(cellsNumber).fill(NO_OWNER)
    const fills = new Float32Array(cellsNumber)

    if (this.inputOwners && this.inputOwners.length !== cellsNumber) {
      console.warn(`Expected ${cellsNumber} cell owners, got ${this.inputOwners.length}. Missing cells are empty`)
    }
    if (this.inputFills && this.inputFills.length !== cellsNumber) {
      console.warn(`Expected ${cellsNumber} cell fill levels, got ${this.inputFills.length}. Missing cells are empty`)
    }

    if (this.inputOwners) owners.set(this.inputOwners.subarray(0, cellsNumber))
    if (this.inputFills) fills.set(this.inputFills.subarray(0, cellsNumber))

    this.owners = owners
    this.fills = fills

    const { grid } = this
    const invalidOutflows = this.inputOutflows.filter(([from, to]) => !grid.areNeighbors(from, to))
    if (invalidOutflows.length) {
      console.warn(`Ignoring ${invalidOutflows.length} outflows between cells that are not neighbors`)
    }
    this.outflows = this.inputOutflows
      .filter(([from, to]) => grid.areNeighbors(from, to) && owners[from] !== NO_OWNER)
      .map(([from, to]): CellPair => [from, to])
  }

  /**
   * Returns the circle identifier whose color stands for `owner`, or `undefined`
   * when the cell is empty or the owner has no color.
   */
  public getOwnerCircleIndex (owner: number): number | undefined {
    if (!Number.isInteger(owner) || owner < 0) return undefined
    const color = this.ownerColors[owner]
    if (!color) return undefined
    return colorToCircleIndex(color)
  }
}
