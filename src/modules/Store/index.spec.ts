import { describe, it, expect } from 'vitest'
import { Store } from '@/board/modules/Store'

function createStore (): Store {
  const store = new Store()
  store.setViewMargin(1)
  store.updateScreenSize(200, 100, 400, 200)
  store.setViewRect({ x: 0, y: 0, width: 4, height: 2 })
  return store
}

describe('Store', () => {
  it('maps graph space onto the canvas, y up', () => {
    const store = createStore()
    const bottomLeft = store.graphToScreen([0, 0])
    expect(bottomLeft?.[0]).toBeCloseTo(0, 5)
    expect(bottomLeft?.[1]).toBeCloseTo(100, 5)
    const topRight = store.graphToScreen([4, 2])
    expect(topRight?.[0]).toBeCloseTo(200, 5)
    expect(topRight?.[1]).toBeCloseTo(0, 5)
  })

  it('maps canvas pixels back to graph space', () => {
    const center = createStore().screenToGraph([100, 50])
    expect(center?.[0]).toBeCloseTo(2, 5)
    expect(center?.[1]).toBeCloseTo(1, 5)
  })

  it('applies the zoom on top of the view', () => {
    const store = createStore()
    store.updateZoom({ x: 0, y: 0, k: 2 })
    const center = store.graphToScreen([2, 1])
    expect(center?.[0]).toBeCloseTo(200, 5)
    expect(center?.[1]).toBeCloseTo(100, 5)
    const origin = store.screenToGraph([0, 0])
    expect(origin?.[0]).toBeCloseTo(0, 5)
    expect(origin?.[1]).toBeCloseTo(2, 5)
  })

  it('converts CSS pixels to drawing buffer pixels', () => {
    expect(createStore().screenToDrawingBuffer([50, 25])).toEqual([100, 50])
  })

  it('has no mapping before the canvas has a size', () => {
    const store = new Store()
    expect(store.screenToGraph([0, 0])).toBeUndefined()
    expect(store.graphToScreen([0, 0])).toBeUndefined()
  })

  it('exposes the transform as a std140 mat4', () => {
    const matrix = createStore().transformationMatrix4x4
    expect(matrix).toHaveLength(16)
    expect(matrix[15]).toBe(1)
  })
})
