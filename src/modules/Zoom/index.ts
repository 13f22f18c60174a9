import { zoom, zoomIdentity, type D3ZoomEvent, type ZoomTransform } from 'd3-zoom'
import type { Store } from '@/board/modules/Store'
import type { BoardConfigInterface } from '@/board/config'
import type { Point } from '@/board/modules/Transform'
import { clamp } from '@/board/helper'

export class Zoom {
  public readonly store: Store
  public readonly config: BoardConfigInterface
  public eventTransform = zoomIdentity
  public behavior = zoom<HTMLCanvasElement, undefined>()
    .on('start', (e: D3ZoomEvent<HTMLCanvasElement, undefined>) => {
      this.isRunning = true
      const userDriven = !!e.sourceEvent
      this.config.onZoomStart?.(e, userDriven)
    })
    .on('zoom', (e: D3ZoomEvent<HTMLCanvasElement, undefined>) => {
      this.eventTransform = e.transform
      const { x, y, k } = e.transform
      this.store.updateZoom({ x, y, k })

      const userDriven = !!e.sourceEvent
      this.config.onZoom?.(e, userDriven)
    })
    .on('end', (e: D3ZoomEvent<HTMLCanvasElement, undefined>) => {
      this.isRunning = false

      const userDriven = !!e.sourceEvent
      this.config.onZoomEnd?.(e, userDriven)
    })

  public isRunning = false

  public constructor (store: Store, config: BoardConfigInterface) {
    this.store = store
    this.config = config
    this.updateScaleExtent()
  }

  public updateScaleExtent (): void {
    const { minZoomLevel = 0, maxZoomLevel = Infinity } = this.config
    this.behavior.scaleExtent([minZoomLevel, maxZoomLevel])
  }

  /**
   * The whole board fits the viewport at the identity transform, so fitting the view means returning to it.
   */
  public getFitTransform (): ZoomTransform {
    return zoomIdentity
  }

  /**
   * Returns a transform at zoom level `scale` that keeps the graph point under the viewport center in place.
   */
  public getScaledTransform (scale: number): ZoomTransform {
    const [w, h] = this.store.screenSize
    const [minScale, maxScale] = this.behavior.scaleExtent()
    const k = clamp(scale, minScale, maxScale)
    const { x, y, k: currentK } = this.eventTransform
    const centerX = (w / 2 - x) / currentK
    const centerY = (h / 2 - y) / currentK
    return zoomIdentity
      .translate(w / 2 - centerX * k, h / 2 - centerY * k)
      .scale(k)
  }

  public convertScreenToGraphPosition (screenPosition: Point): Point | undefined {
    return this.store.screenToGraph(screenPosition)
  }

  public convertGraphToScreenPosition (graphPosition: Point): Point | undefined {
    return this.store.graphToScreen(graphPosition)
  }
}
