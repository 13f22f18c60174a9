import { describe, it, expect } from 'vitest'
import { mat3 } from 'gl-matrix'
import {
  applyTransform, composeTransforms, createViewTransform, createWindowToDevice, createZoomedTransform,
  invertTransform, toMat4Array, type Point,
} from '@/board/modules/Transform'

function expectPointCloseTo (actual: Point | undefined, expected: Point): void {
  expect(actual).toBeDefined()
  expect(actual?.[0]).toBeCloseTo(expected[0], 5)
  expect(actual?.[1]).toBeCloseTo(expected[1], 5)
}

describe('createViewTransform', () => {
  it('maps a rectangle with the viewport aspect ratio onto the whole viewport', () => {
    const m = createViewTransform({ x: 0, y: 0, width: 4, height: 2 }, 2)
    expectPointCloseTo(applyTransform(m, [0, 0]), [-1, -1])
    expectPointCloseTo(applyTransform(m, [4, 2]), [1, 1])
    expectPointCloseTo(applyTransform(m, [2, 1]), [0, 0])
  })

  it('letterboxes horizontally in a wider viewport', () => {
    const m = createViewTransform({ x: 0, y: 0, width: 2, height: 2 }, 2)
    expectPointCloseTo(applyTransform(m, [0, 0]), [-0.5, -1])
    expectPointCloseTo(applyTransform(m, [2, 2]), [0.5, 1])
  })

  it('letterboxes vertically in a taller viewport', () => {
    const m = createViewTransform({ x: 0, y: 0, width: 2, height: 2 }, 0.5)
    expectPointCloseTo(applyTransform(m, [2, 2]), [1, 0.5])
  })

  it('shrinks the result by the margin', () => {
    const m = createViewTransform({ x: 0, y: 0, width: 4, height: 2 }, 2, 0.95)
    expectPointCloseTo(applyTransform(m, [4, 2]), [0.95, 0.95])
  })

  it('is undone by its inverse', () => {
    const m = createViewTransform({ x: -3, y: 5, width: 10, height: 4 }, 1.6, 0.95)
    const inverse = invertTransform(m)
    expect(inverse).toBeDefined()
    if (!inverse) return
    const points: Point[] = [[-3, 5], [7, 9], [2, 7], [-2.5, 8.75]]
    for (const p of points) {
      expectPointCloseTo(applyTransform(inverse, applyTransform(m, p)), p)
    }
  })

  it('rejects a rectangle without area', () => {
    expect(() => createViewTransform({ x: 0, y: 0, width: 0, height: 2 }, 1)).toThrow()
    expect(() => createViewTransform({ x: 0, y: 0, width: 2, height: Infinity }, 1)).toThrow()
    expect(() => createViewTransform({ x: 0, y: 0, width: 2, height: 2 }, NaN)).toThrow()
  })
})

describe('createWindowToDevice', () => {
  it('maps the upper left pixel corner to (-1, 1) and flips y', () => {
    const m = createWindowToDevice(200, 100)
    expectPointCloseTo(applyTransform(m, [0, 0]), [-1, 1])
    expectPointCloseTo(applyTransform(m, [200, 100]), [1, -1])
    expectPointCloseTo(applyTransform(m, [100, 50]), [0, 0])
  })
})

describe('createZoomedTransform', () => {
  it('leaves the transform unchanged at the identity zoom', () => {
    const base = createViewTransform({ x: 0, y: 0, width: 4, height: 2 }, 2)
    const zoomed = createZoomedTransform(base, { x: 0, y: 0, k: 1 }, 200, 100)
    for (let i = 0; i < 9; i++) expect(zoomed[i]).toBeCloseTo(base[i] ?? NaN, 6)
  })

  it('applies pan and zoom in window pixels', () => {
    const zoomed = createZoomedTransform(mat3.create(), { x: 10, y: 20, k: 2 }, 200, 100)
    // Device (0, 0) is window (100, 50), which the zoom moves to (210, 120)
    expectPointCloseTo(applyTransform(zoomed, [0, 0]), [1.1, -1.4])
  })
})

describe('composeTransforms', () => {
  it('applies the right-hand transform first', () => {
    const translate = mat3.fromTranslation(mat3.create(), [1, 0])
    const scale = mat3.fromScaling(mat3.create(), [2, 2])
    expectPointCloseTo(applyTransform(composeTransforms(translate, scale), [1, 1]), [3, 2])
  })
})

describe('invertTransform', () => {
  it('returns undefined for a singular matrix', () => {
    expect(invertTransform(mat3.fromValues(0, 0, 0, 0, 0, 0, 0, 0, 0))).toBeUndefined()
  })
})

describe('toMat4Array', () => {
  it('widens a 3x3 transform to a std140 mat4 layout', () => {
    const m = mat3.fromTranslation(mat3.create(), [3, 4])
    expect(toMat4Array(m)).toEqual([
      1, 0, 0, 0,
      0, 1, 0, 0,
      3, 4, 1, 0,
      0, 0, 0, 1,
    ])
  })
})
