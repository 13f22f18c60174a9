import { describe, it, expect } from 'vitest'
import {
  getAtlasSlot, getCircleCenter, getMaxAtlasHalfSize, isFillRangeDrawable, shadeAtlasFragment, shadeIdFragment,
  type AtlasParameters,
} from '@/board/modules/Atlas'
import { decodeCircleColor, encodeCircleIndex } from '@/board/modules/IdCodec'

const unitSpacing: AtlasParameters = {
  spacing: 1,
  indexBase: 0,
  outOfRangePolicy: 'discard',
  sentinelColor: [1, 0, 1, 1],
}

describe('shadeAtlasFragment', () => {
  it('discards coordinates left of the blank limit under either policy', () => {
    expect(shadeAtlasFragment([-1.5, 0], unitSpacing)).toEqual({ kind: 'discard' })
    expect(shadeAtlasFragment([-1.5, 0], { ...unitSpacing, outOfRangePolicy: 'sentinel' })).toEqual({ kind: 'discard' })
  })

  it('accepts the center of a circle and encodes its identifier', () => {
    const fragment = shadeAtlasFragment([7, 0], unitSpacing)
    expect(fragment).toEqual({ kind: 'circle', index: 7, color: encodeCircleIndex(7) })
    if (fragment.kind !== 'circle') throw new Error('Expected a circle fragment')
    expect(decodeCircleColor(fragment.color)).toBe(7)
  })

  it('discards fragments further than 1 from the nearest circle center', () => {
    expect(shadeAtlasFragment([7, 1.1], unitSpacing)).toEqual({ kind: 'discard' })
    expect(shadeAtlasFragment([3 * 7 + 1.1, 0], { ...unitSpacing, spacing: 3 })).toEqual({ kind: 'discard' })
  })

  it('accepts fragments on the circle edge', () => {
    expect(shadeAtlasFragment([3 * 7 + 1, 0], { ...unitSpacing, spacing: 3 })).toMatchObject({ kind: 'circle', index: 7 })
  })

  it('rounds half-way coordinates up to the next slot', () => {
    expect(shadeAtlasFragment([1.5, 0], unitSpacing)).toMatchObject({ kind: 'circle', index: 2 })
    expect(shadeAtlasFragment([1.49, 0], unitSpacing)).toMatchObject({ kind: 'circle', index: 1 })
  })

  it('discards identifiers past the atlas capacity by default', () => {
    expect(shadeAtlasFragment([5000, 0], unitSpacing)).toEqual({ kind: 'discard' })
  })

  it('paints identifiers past the atlas capacity with an opaque sentinel color', () => {
    const params: AtlasParameters = { ...unitSpacing, outOfRangePolicy: 'sentinel', sentinelColor: [0.2, 0.4, 0.6, 0.5] }
    expect(shadeAtlasFragment([5000, 0], params)).toEqual({ kind: 'sentinel', color: [0.2, 0.4, 0.6, 1] })
  })

  it('shifts identifiers by the index base', () => {
    const params: AtlasParameters = { ...unitSpacing, spacing: 15, indexBase: 1 }
    expect(shadeAtlasFragment([0, 0], params)).toEqual({ kind: 'discard' })
    expect(shadeAtlasFragment([15, 0], params)).toMatchObject({ kind: 'circle', index: 0 })
    expect(shadeAtlasFragment([4096 * 15, 0], params)).toMatchObject({ kind: 'circle', index: 4095 })
  })
})

describe('getAtlasSlot', () => {
  it('returns the slot of the nearest circle center', () => {
    expect(getAtlasSlot(44, 15)).toBe(3)
    expect(getAtlasSlot(-7, 15)).toBe(0)
    expect(getAtlasSlot(-8, 15)).toBe(-1)
  })
})

describe('getCircleCenter', () => {
  it('places identifier `index` at slot `index + indexBase`', () => {
    expect(getCircleCenter(7, 15, 0)).toEqual([105, 0])
    expect(getCircleCenter(7, 15, 1)).toEqual([120, 0])
  })
})

describe('shadeIdFragment', () => {
  it('discards out-of-range identifiers under the sentinel policy', () => {
    const sentinelParams: AtlasParameters = { ...unitSpacing, outOfRangePolicy: 'sentinel' }
    expect(shadeAtlasFragment([5000, 0], sentinelParams)).toEqual({ kind: 'sentinel', color: [1, 0, 1, 1] })
    expect(shadeIdFragment([5000, 0], sentinelParams)).toEqual({ kind: 'discard' })
  })

  it('shades valid circles like the visible program', () => {
    expect(shadeIdFragment([7, 0], { ...unitSpacing, outOfRangePolicy: 'sentinel' })).toEqual(shadeAtlasFragment([7, 0], unitSpacing))
  })
})

describe('getMaxAtlasHalfSize', () => {
  it('keeps a square around a circle inside its slot', () => {
    const spacing = 15
    const halfSize = getMaxAtlasHalfSize(spacing)
    expect(halfSize).toBe(7)
    expect(getAtlasSlot(4 * spacing + halfSize, spacing)).toBe(4)
    expect(getAtlasSlot(4 * spacing - halfSize, spacing)).toBe(4)
  })
})

describe('isFillRangeDrawable', () => {
  it('accepts fill levels whose smallest circle fits the slot', () => {
    expect(isFillRangeDrawable(15, 15)).toBe(true)
    expect(isFillRangeDrawable(49, 15)).toBe(true)
    expect(isFillRangeDrawable(50, 15)).toBe(false)
  })
})
