import { describe, it, expect } from 'vitest'
import { getBoundaryLineGeometry } from '@/board/modules/Boundaries/geometry'
import { SquareGrid } from '@/board/modules/SquareGrid'

describe('getBoundaryLineGeometry', () => {
  it('lists every cell side once', () => {
    const lines = getBoundaryLineGeometry(new SquareGrid(1, 2))
    // 3 vertical and 4 horizontal sides, four numbers each
    expect(lines).toHaveLength(7 * 4)
    expect(Array.from(lines)).toEqual([
      // Cell 0: north, east, south, west
      1, 1, 0, 1,
      1, 0, 1, 1,
      0, 0, 1, 0,
      0, 1, 0, 0,
      // Cell 1: north, east, south. Its west side is cell 0's east side
      2, 1, 1, 1,
      2, 0, 2, 1,
      1, 0, 2, 0,
    ])
  })

  it('scales with the grid', () => {
    const lines = getBoundaryLineGeometry(new SquareGrid(3, 4))
    expect(lines).toHaveLength((3 * 5 + 4 * 4) * 4)
  })

  it('is empty for an empty grid', () => {
    expect(getBoundaryLineGeometry(new SquareGrid(0, 0))).toHaveLength(0)
  })
})
