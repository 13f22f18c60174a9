import { select, type Selection } from 'd3-selection'
import 'd3-transition'
import { easeQuadInOut } from 'd3-ease'
import type { D3ZoomEvent } from 'd3-zoom'
import { luma, type Device } from '@luma.gl/core'
import { webgl2Adapter } from '@luma.gl/webgl'

import { BoardConfig, type BoardColor, type BoardConfigInterface } from '@/board/config'
import { getRgbaColor } from '@/board/helper'
import { BoardData } from '@/board/modules/BoardData'
import { Boundaries } from '@/board/modules/Boundaries'
import { Cells } from '@/board/modules/Cells'
import { Outflows } from '@/board/modules/Outflows'
import { getOutflowHighlight } from '@/board/modules/Outflows/geometry'
import { PickReader } from '@/board/modules/Picker'
import { Store, MAX_HOVER_DETECTION_DELAY } from '@/board/modules/Store'
import type { Point } from '@/board/modules/Transform'
import { Zoom } from '@/board/modules/Zoom'
import { defaultConfigValues } from '@/board/variables'

export class Board {
  public config = new BoardConfig()
  public data = new BoardData()
  private canvas: HTMLCanvasElement
  private canvasD3Selection: Selection<HTMLCanvasElement, undefined, null, undefined> | undefined
  private device: Device | undefined
  private deviceInitPromise: Promise<Device>
  private requestAnimationFrameId = 0
  private store = new Store()
  private cells: Cells | undefined
  private boundaries: Boundaries | undefined
  private outflows: Outflows | undefined
  private picker: PickReader | undefined
  private zoomInstance = new Zoom(this.store, this.config)
  private currentEvent: D3ZoomEvent<HTMLCanvasElement, undefined> | MouseEvent | undefined
  /**
   * Counts frames since the last hover detection.
   * When it reaches MAX_HOVER_DETECTION_DELAY, it is reset to 0 and `findHoveredCell` runs.
   */
  private _findHoveredItemExecutionCount = 0
  private _isMouseOnCanvas = false
  private _isFirstRenderAfterInit = true

  private isGridUpdateNeeded = false
  private isFillUpdateNeeded = false
  private isOutflowUpdateNeeded = false
  private _isDestroyed = false

  public constructor (
    div: HTMLDivElement,
    config?: BoardConfigInterface
  ) {
    if (config) this.config.init(config)

    this.store.div = div
    const canvas = document.createElement('canvas')
    canvas.style.width = '100%'
    canvas.style.height = '100%'
    this.store.div.appendChild(canvas)
    this.canvas = canvas

    this.deviceInitPromise = this.createDevice(canvas)
      .then(device => {
        if (this._isDestroyed) {
          device.destroy()
          return device
        }
        this.device = device

        const w = canvas.clientWidth
        const h = canvas.clientHeight
        canvas.width = w * this.config.pixelRatio
        canvas.height = h * this.config.pixelRatio
        this.store.setViewMargin(this.config.viewMargin)
        this.store.updateScreenSize(w, h, canvas.width, canvas.height)

        this.canvasD3Selection = select<HTMLCanvasElement, undefined>(this.canvas)
        this.canvasD3Selection
          .on('mouseenter.board', () => { this._isMouseOnCanvas = true })
          .on('mousemove.board', () => { this._isMouseOnCanvas = true })
          .on('mousedown.board', (event: MouseEvent) => {
            if (event.button === 0) this.pressBoundary(event)
          })
          .on('mouseup.board', () => { this.releaseBoundary() })
          .on('mouseleave.board', (event: MouseEvent) => {
            this._isMouseOnCanvas = false
            this.currentEvent = event
            this.store.hoveredBoundary = undefined
            if (this.store.hoveredCell !== undefined) this.config.onCellMouseOut?.(event)
            this.store.hoveredCell = undefined
            this.updateCanvasCursor()
          })
        this.zoomInstance.behavior
          .on('start.detect', (e: D3ZoomEvent<HTMLCanvasElement, undefined>) => { this.currentEvent = e })
          .on('zoom.detect', (e: D3ZoomEvent<HTMLCanvasElement, undefined>) => {
            if (e.sourceEvent instanceof MouseEvent) this.updateMousePosition(e.sourceEvent)
            this.currentEvent = e
          })
          .on('end.detect', (e: D3ZoomEvent<HTMLCanvasElement, undefined>) => {
            this.currentEvent = e
            // d3-zoom keeps the mouseup of a gesture from reaching the canvas
            if (e.sourceEvent) this.releaseBoundary()
          })
        this.canvasD3Selection
          .call(this.zoomInstance.behavior)
          .on('click', this.onClick.bind(this))
          .on('mousemove', this.onMouseMove.bind(this))
        if (!this.config.enableZoom) this.updateZoomBehavior()

        this.cells = new Cells(device, this.config, this.store, this.data)
        this.boundaries = new Boundaries(device, this.config, this.store, this.data)
        this.outflows = new Outflows(device, this.config, this.store, this.data)
        this.picker = new PickReader(device, this.config.pickColorTolerance)

        this.store.backgroundColor = getRgbaColor(this.config.backgroundColor)

        return device
      })
      .catch(error => {
        console.error('Device initialization failed:', error)
        throw error
      })
  }

  /**
   * Set or update the board configuration. The changes will be applied in real time.
   */
  public setConfig (config: Partial<BoardConfigInterface>): void {
    if (this._isDestroyed) return

    if (this.ensureDevice(() => this.setConfig(config))) return
    const prevConfig = { ...this.config }
    this.config.init(config)

    if (prevConfig.backgroundColor !== this.config.backgroundColor) {
      this.store.backgroundColor = getRgbaColor(this.config.backgroundColor)
    }
    if (prevConfig.atlasSpacing !== this.config.atlasSpacing ||
      prevConfig.atlasIndexBase !== this.config.atlasIndexBase) {
      this.isFillUpdateNeeded = true
      this.isGridUpdateNeeded = true
    }
    if (prevConfig.maxFill !== this.config.maxFill || prevConfig.fillScale !== this.config.fillScale) {
      this.isFillUpdateNeeded = true
    }
    if (prevConfig.outflowWidth !== this.config.outflowWidth) {
      this.isOutflowUpdateNeeded = true
    }
    if (prevConfig.viewMargin !== this.config.viewMargin) {
      this.store.setViewMargin(this.config.viewMargin)
    }
    if (prevConfig.pickColorTolerance !== this.config.pickColorTolerance && this.picker) {
      this.picker.tolerance = this.config.pickColorTolerance
    }
    if (prevConfig.pixelRatio !== this.config.pixelRatio) {
      this.device?.canvasContext?.setProps({ useDevicePixels: this.config.pixelRatio })
    }
    if (prevConfig.minZoomLevel !== this.config.minZoomLevel || prevConfig.maxZoomLevel !== this.config.maxZoomLevel) {
      this.zoomInstance.updateScaleExtent()
    }
    if (prevConfig.enableZoom !== this.config.enableZoom) {
      this.updateZoomBehavior()
    }
    if (this.isFillUpdateNeeded || this.isGridUpdateNeeded || this.isOutflowUpdateNeeded) this.create()
  }

  /**
   * Sets the board to a grid of `rows x cols` square cells.
   * Cell `i` sits at row `floor(i / cols)` from the bottom and column `i % cols` from the left.
   */
  public setGrid (rows: number, cols: number): void {
    if (this._isDestroyed) return
    if (this.ensureDevice(() => this.setGrid(rows, cols))) return
    this.data.setGrid(rows, cols)
    this.store.setViewRect({ x: 0, y: 0, width: cols, height: rows })
    this.isGridUpdateNeeded = true
    this.isFillUpdateNeeded = true
  }

  /**
   * Sets the color of every owner. A cell is drawn in the 12-bit quantized version of its owner's color.
   */
  public setOwnerColors (colors: BoardColor[]): void {
    if (this._isDestroyed) return
    if (this.ensureDevice(() => this.setOwnerColors(colors))) return
    this.data.setOwnerColors(colors)
    this.isFillUpdateNeeded = true
  }

  /**
   * Sets the state of every cell.
   * @param owners Owner of each cell, `-1` for an empty cell.
   * @param fills Fill level of each cell, from `0` to `maxFill`.
   */
  public setCellStates (owners: Float32Array, fills: Float32Array): void {
    if (this._isDestroyed) return
    if (this.ensureDevice(() => this.setCellStates(owners, fills))) return
    this.data.setCellStates(owners, fills)
    this.isFillUpdateNeeded = true
  }

  /**
   * Sets the outflows of the board: for each, the cell goop flows from and the neighbor it flows to.
   * Outflows between cells that are not neighbors are ignored, and so are outflows from empty cells.
   */
  public setOutflows (outflows: [number, number][]): void {
    if (this._isDestroyed) return
    if (this.ensureDevice(() => this.setOutflows(outflows))) return
    this.data.setOutflows(outflows)
    this.isOutflowUpdateNeeded = true
  }

  /**
   * Applies pending changes and starts drawing frames.
   */
  public render (): void {
    if (this._isDestroyed) return
    if (this.ensureDevice(() => this.render())) return
    this.create()
    this.initPrograms()

    if (!this.data.cellsNumber) {
      this.stopFrames()
      select(this.canvas).style('cursor', null)
      if (this.device) {
        const clearPass = this.device.beginRenderPass({
          clearColor: this.store.backgroundColor,
          clearDepth: 1,
          clearStencil: 0,
        })
        clearPass.end()
      }
      return
    }

    if (this._isFirstRenderAfterInit) this.fitView(0)
    this.startFrames()
    this._isFirstRenderAfterInit = false
  }

  /**
   * Returns the index of the cell under the CSS pixel `(x, y)` of the canvas,
   * or `undefined` when there is none. Renders the identifier layer and waits for the GPU.
   */
  public pickCell (x: number, y: number): number | undefined {
    if (this._isDestroyed || !this.cells || !this.picker) return undefined
    this.resizeCanvas()
    this.cells.drawIds()
    if (!this.cells.pickFbo) return undefined

    const [bufferX, bufferY] = this.store.screenToDrawingBuffer([x, y])
    const index = this.picker.read(this.cells.pickFbo, bufferX, bufferY)
    if (index === undefined || index >= this.data.pickableCellsNumber) return undefined
    return index
  }

  /**
   * Returns the boundary under the CSS pixel `(x, y)` as `[from, to]`,
   * where `from` is the cell the pixel is in and `to` the cell across the boundary.
   */
  public findBoundary (x: number, y: number): [number, number] | undefined {
    if (this._isDestroyed) return undefined
    const graphPosition = this.store.screenToGraph([x, y])
    if (!graphPosition) return undefined
    return this.data.grid.boundaryHit(graphPosition)
  }

  /**
   * Converts canvas CSS pixels to graph coordinates, where cell `(row, col)` spans `(col, row)..(col + 1, row + 1)`.
   */
  public screenToGraph (screenPosition: Point): Point | undefined {
    if (this._isDestroyed) return undefined
    return this.zoomInstance.convertScreenToGraphPosition(screenPosition)
  }

  public graphToScreen (graphPosition: Point): Point | undefined {
    if (this._isDestroyed) return undefined
    return this.zoomInstance.convertGraphToScreenPosition(graphPosition)
  }

  /**
   * Center and zoom the view to fit the whole board.
   * @param duration Duration of the animation in milliseconds (`fitViewDuration` by default).
   */
  public fitView (duration = this.config.fitViewDuration): void {
    if (this._isDestroyed) return
    if (this.ensureDevice(() => this.fitView(duration))) return
    if (!this.canvasD3Selection) return

    const transform = this.zoomInstance.getFitTransform()
    if (duration === 0) {
      this.canvasD3Selection.call(this.zoomInstance.behavior.transform, transform)
    } else {
      this.canvasD3Selection
        .transition()
        .ease(easeQuadInOut)
        .duration(duration)
        .call(this.zoomInstance.behavior.transform, transform)
    }
  }

  /**
   * Zoom the view in or out to the specified zoom level, keeping the center of the view in place.
   * @param value Zoom level
   * @param duration Duration of the zoom in/out transition.
   */
  public setZoomLevel (value: number, duration = 0): void {
    if (this._isDestroyed) return
    if (this.ensureDevice(() => this.setZoomLevel(value, duration))) return
    if (!this.canvasD3Selection) return

    const transform = this.zoomInstance.getScaledTransform(value)
    if (duration === 0) {
      this.canvasD3Selection.call(this.zoomInstance.behavior.transform, transform)
    } else {
      this.canvasD3Selection
        .transition()
        .duration(duration)
        .call(this.zoomInstance.behavior.transform, transform)
    }
  }

  public getZoomLevel (): number {
    if (this._isDestroyed) return 0
    return this.zoomInstance.eventTransform.k
  }

  public destroy (): void {
    if (this._isDestroyed) return
    this.stopFrames()

    if (this.canvasD3Selection) {
      this.canvasD3Selection
        .on('mouseenter.board', null)
        .on('mousemove.board', null)
        .on('mousedown.board', null)
        .on('mouseup.board', null)
        .on('mouseleave.board', null)
        .on('click', null)
        .on('mousemove', null)
        .on('.zoom', null)
    }

    this.zoomInstance.behavior
      .on('start.detect', null)
      .on('zoom.detect', null)
      .on('end.detect', null)

    this.cells?.destroy()
    this.boundaries?.destroy()
    this.outflows?.destroy()

    if (this.device) {
      const clearPass = this.device.beginRenderPass({
        clearColor: this.store.backgroundColor,
        clearDepth: 1,
        clearStencil: 0,
      })
      clearPass.end()
      this.device.destroy()
    }

    if (this.canvas.parentNode) {
      this.canvas.parentNode.removeChild(this.canvas)
    }

    this.canvasD3Selection = undefined
    this._isDestroyed = true
  }

  /**
   * Rebuilds the GPU geometry that pending changes made stale.
   */
  public create (): void {
    if (this._isDestroyed) return
    if (this.ensureDevice(() => this.create())) return
    this.data.update()
    if (this.isFillUpdateNeeded) this.cells?.updateFills()
    if (this.isGridUpdateNeeded) {
      this.cells?.updatePickGeometry()
      this.boundaries?.updateGeometry()
    }
    // Outflows from cells that became empty are dropped
    if (this.isGridUpdateNeeded || this.isFillUpdateNeeded || this.isOutflowUpdateNeeded) this.outflows?.updateGeometry()
    if (this.isGridUpdateNeeded || this.isFillUpdateNeeded) this.store.hoveredCell = undefined
    if (this.isGridUpdateNeeded) {
      this.store.hoveredBoundary = undefined
      this.store.boundaryPress = undefined
    }

    this.isFillUpdateNeeded = false
    this.isGridUpdateNeeded = false
    this.isOutflowUpdateNeeded = false
  }

  /**
   * Ensures device is initialized before executing a method.
   * If device is not ready, queues the method to run after initialization.
   * @returns true if device was not ready and operation was queued, false if device is ready
   */
  private ensureDevice (callback: () => void): boolean {
    if (!this.device) {
      this.deviceInitPromise
        .then(() => {
          callback()
        })
        .catch(error => {
          console.error('Device initialization failed', error)
        })
      return true
    }
    return false
  }

  private async createDevice (
    canvas: HTMLCanvasElement
  ): Promise<Device> {
    return await luma.createDevice({
      type: 'webgl',
      adapters: [webgl2Adapter],
      createCanvasContext: {
        canvas,
        useDevicePixels: this.config.pixelRatio,
        autoResize: true,
        width: undefined,
        height: undefined,
      },
    })
  }

  private initPrograms (): void {
    if (this._isDestroyed || !this.cells || !this.boundaries || !this.outflows) return
    this.cells.initPrograms()
    this.boundaries.initPrograms()
    this.outflows.initPrograms()
  }

  private frame (): void {
    if (this._isDestroyed) return
    this.requestAnimationFrameId = window.requestAnimationFrame(() => {
      this.renderFrame()
      if (!this._isDestroyed) this.frame()
    })
  }

  private renderFrame (): void {
    if (this._isDestroyed || !this.device) return

    this.resizeCanvas()
    this.findHoveredItem()
    this.updateHoveredBoundary()
    this.outflows?.setHighlight(getOutflowHighlight(this.store.hoveredBoundary, this.store.boundaryPress))

    const drawRenderPass = this.device.beginRenderPass({
      clearColor: this.store.backgroundColor,
      clearDepth: 1,
      clearStencil: 0,
    })
    this.cells?.draw(drawRenderPass)
    if (this.config.renderBoundaries) this.boundaries?.draw(drawRenderPass)
    this.outflows?.draw(drawRenderPass)
    drawRenderPass.end()
    this.device.submit()

    this.currentEvent = undefined
  }

  private stopFrames (): void {
    if (this.requestAnimationFrameId) {
      window.cancelAnimationFrame(this.requestAnimationFrameId)
      this.requestAnimationFrameId = 0
    }
  }

  private startFrames (): void {
    if (this._isDestroyed) return
    this.stopFrames()
    this.frame()
  }

  private onClick (event: MouseEvent): void {
    this.updateMousePosition(event)
    const [x, y] = this.store.mousePosition
    this.config.onCellClick?.(this.pickCell(x, y), event)

    const boundary = this.findBoundary(x, y)
    if (boundary) this.config.onBoundaryClick?.(boundary, event)
  }

  private pressBoundary (event: MouseEvent): void {
    this.updateMousePosition(event)
    const [x, y] = this.store.mousePosition
    this.store.boundaryPress = { boundary: this.findBoundary(x, y) }
  }

  private releaseBoundary (): void {
    this.store.boundaryPress = undefined
  }

  /**
   * The boundary under a still pointer changes while the view pans, so it is looked up every frame.
   */
  private updateHoveredBoundary (): void {
    const [x, y] = this.store.mousePosition
    this.store.hoveredBoundary = this._isMouseOnCanvas ? this.findBoundary(x, y) : undefined
  }

  private updateMousePosition (event: MouseEvent): void {
    this.store.mousePosition = [event.offsetX, event.offsetY]
  }

  private onMouseMove (event: MouseEvent): void {
    this.currentEvent = event
    this.updateMousePosition(event)
  }

  /**
   * Keeps the store and the identifier framebuffer in step with the canvas size.
   * The canvas drawing buffer itself is resized by luma.gl.
   */
  private resizeCanvas (): void {
    if (this._isDestroyed) return
    const w = this.canvas.clientWidth
    const h = this.canvas.clientHeight
    const bufferW = this.canvas.width
    const bufferH = this.canvas.height
    const [prevW, prevH] = this.store.screenSize
    const [prevBufferW, prevBufferH] = this.store.drawingBufferSize

    if (prevW !== w || prevH !== h || prevBufferW !== bufferW || prevBufferH !== bufferH) {
      this.store.updateScreenSize(w, h, bufferW, bufferH)
      this.cells?.updatePickFbo()
    }
  }

  private updateZoomBehavior (): void {
    if (this.config.enableZoom) {
      this.canvasD3Selection?.call(this.zoomInstance.behavior)
    } else {
      this.canvasD3Selection
        ?.call(this.zoomInstance.behavior)
        .on('.zoom', null)
    }
  }

  private findHoveredItem (): void {
    if (this._isDestroyed || !this._isMouseOnCanvas || this.zoomInstance.isRunning) return
    if (this._findHoveredItemExecutionCount < MAX_HOVER_DETECTION_DELAY) {
      this._findHoveredItemExecutionCount += 1
      return
    }
    this._findHoveredItemExecutionCount = 0
    this.findHoveredCell()
    this.updateCanvasCursor()
  }

  private findHoveredCell (): void {
    const event = this.currentEvent instanceof MouseEvent ? this.currentEvent : undefined
    const [x, y] = this.store.mousePosition
    const index = this.pickCell(x, y)
    const previous = this.store.hoveredCell

    if (index === previous?.index) return
    this.store.hoveredCell = index === undefined ? undefined : { index }

    if (previous !== undefined) this.config.onCellMouseOut?.(event)
    if (index !== undefined) this.config.onCellMouseOver?.(index, event)
  }

  private updateCanvasCursor (): void {
    const { hoveredCellCursor } = this.config
    if (this.store.hoveredCell) select(this.canvas).style('cursor', hoveredCellCursor ?? defaultConfigValues.hoveredCellCursor)
    else select(this.canvas).style('cursor', null)
  }
}

export type { BoardConfigInterface, BoardColor, OutOfRangePolicy, AtlasIndexBase } from './config'
export { SquareGrid, type CellPair } from './modules/SquareGrid'
export { getOutflowHighlight, type OutflowHighlight } from './modules/Outflows/geometry'
export { encodeCircleIndex, decodeCircleColor, colorToCircleIndex } from './modules/IdCodec'
export { shadeAtlasFragment, shadeIdFragment } from './modules/Atlas'
export {
  createViewTransform, createWindowToDevice, applyTransform, invertTransform, composeTransforms,
} from './modules/Transform'
export { PickReader } from './modules/Picker'
export { ATLAS_CAPACITY, MAX_FILL } from './variables'
