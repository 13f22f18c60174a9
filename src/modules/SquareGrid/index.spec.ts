import { describe, it, expect } from 'vitest'
import { SquareGrid } from '@/board/modules/SquareGrid'

// 3 rows x 4 columns, cells numbered from the bottom row:
//  8  9 10 11
//  4  5  6  7
//  0  1  2  3
const grid = new SquareGrid(3, 4)

describe('SquareGrid', () => {
  it('counts cells and interior edges', () => {
    expect(grid.cellsNumber).toBe(12)
    expect(grid.edgesNumber).toBe(3 * 3 + 4 * 2)
    expect(new SquareGrid(0, 0).edgesNumber).toBe(0)
  })

  it('lists neighbors above, right, below and left', () => {
    expect(grid.neighbors(0)).toEqual([4, 1])
    expect(grid.neighbors(5)).toEqual([9, 6, 1, 4])
    expect(grid.neighbors(11)).toEqual([7, 10])
  })

  it('places cells on a unit lattice', () => {
    expect(grid.bounds()).toEqual([4, 3])
    expect(grid.center(6)).toEqual([2.5, 1.5])
    expect(grid.radius()).toBe(0.5)
  })

  it('lists cell corners row by row from the bottom', () => {
    const endpoints = grid.endpoints()
    expect(endpoints).toHaveLength(20)
    expect(endpoints[6]).toEqual([1, 1])
    expect(endpoints[19]).toEqual([4, 3])
  })

  it('lists the sides of a cell counterclockwise, starting north', () => {
    expect(grid.boundary(5)).toEqual([
      { start: 12, end: 11, neighbor: 9 },
      { start: 7, end: 12, neighbor: 6 },
      { start: 6, end: 7, neighbor: 1 },
      { start: 11, end: 6, neighbor: 4 },
    ])
    expect(grid.boundary(0).map(segment => segment.neighbor)).toEqual([4, 1, undefined, undefined])
  })

  it('rejects cells outside the grid', () => {
    expect(() => grid.center(12)).toThrow(RangeError)
    expect(() => grid.neighbors(-1)).toThrow(RangeError)
  })

  it('rejects invalid dimensions', () => {
    expect(() => new SquareGrid(-1, 2)).toThrow()
    expect(() => new SquareGrid(1.5, 2)).toThrow()
  })
})

describe('SquareGrid.boundaryHit', () => {
  it('finds vertical boundaries, directed from the cell under the point', () => {
    expect(grid.boundaryHit([1.05, 1.5])).toEqual([5, 4])
    expect(grid.boundaryHit([0.95, 1.5])).toEqual([4, 5])
  })

  it('finds horizontal boundaries, directed from the cell under the point', () => {
    expect(grid.boundaryHit([2.5, 2.1])).toEqual([10, 6])
    expect(grid.boundaryHit([2.5, 1.9])).toEqual([6, 10])
  })

  it('ignores corners, cell interiors and the outer edge', () => {
    expect(grid.boundaryHit([1.05, 1.95])).toBeUndefined()
    expect(grid.boundaryHit([1.5, 1.5])).toBeUndefined()
    expect(grid.boundaryHit([0.1, 1.5])).toBeUndefined()
    expect(grid.boundaryHit([3.9, 1.5])).toBeUndefined()
  })

  it('tells neighbors from other pairs of cells', () => {
    const small = new SquareGrid(2, 2)
    expect(small.areNeighbors(0, 1)).toBe(true)
    expect(small.areNeighbors(3, 1)).toBe(true)
    expect(small.areNeighbors(0, 3)).toBe(false)
    expect(small.areNeighbors(0, 0)).toBe(false)
    expect(small.areNeighbors(1, 4)).toBe(false)
    expect(small.areNeighbors(-1, 0)).toBe(false)
    expect(small.isCell(3)).toBe(true)
    expect(small.isCell(1.5)).toBe(false)
  })
})
