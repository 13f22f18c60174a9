import { describe, it, expect, vi } from 'vitest'
import { zoomIdentity } from 'd3-zoom'
import { BoardConfig } from '@/board/config'
import { Store } from '@/board/modules/Store'
import { Zoom } from '@/board/modules/Zoom'

function createZoom (config = new BoardConfig()): Zoom {
  const store = new Store()
  store.updateScreenSize(200, 100)
  return new Zoom(store, config)
}

describe('Zoom', () => {
  it('fits the board at the identity transform', () => {
    const { x, y, k } = createZoom().getFitTransform()
    expect({ x, y, k }).toEqual({ x: 0, y: 0, k: 1 })
  })

  it('zooms around the center of the view', () => {
    const { x, y, k } = createZoom().getScaledTransform(4)
    expect({ x, y, k }).toEqual({ x: -300, y: -150, k: 4 })
  })

  it('keeps zoom levels within the configured range', () => {
    const config = new BoardConfig()
    config.init({ minZoomLevel: 1, maxZoomLevel: 8 })
    const zoom = createZoom(config)

    expect(zoom.behavior.scaleExtent()).toEqual([1, 8])
    expect(zoom.getScaledTransform(100).k).toBe(8)
    expect(zoom.getScaledTransform(0.1).k).toBe(1)
  })

  it('is running between the start and the end of a gesture', () => {
    const onZoomStart = vi.fn()
    const onZoomEnd = vi.fn()
    const config = new BoardConfig()
    config.init({ onZoomStart, onZoomEnd })
    const zoom = createZoom(config)
    const canvas = {} as HTMLCanvasElement
    const start = { type: 'start', transform: zoomIdentity, sourceEvent: null }

    zoom.behavior.on('start')?.call(canvas, start, undefined)
    expect(zoom.isRunning).toBe(true)
    expect(onZoomStart).toHaveBeenCalledWith(start, false)

    zoom.behavior.on('end')?.call(canvas, { ...start, type: 'end' }, undefined)
    expect(zoom.isRunning).toBe(false)
    expect(onZoomEnd).toHaveBeenCalledTimes(1)
  })
})
