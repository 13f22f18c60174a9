import { mat3 } from 'gl-matrix'
import {
  applyTransform, composeTransforms, createViewTransform, createWindowToDevice, createZoomedTransform,
  invertTransform, toMat4Array, type Mat4Array, type Point, type ViewRect, type ZoomState,
} from '@/board/modules/Transform'
import type { BoundaryPress } from '@/board/modules/Outflows/geometry'
import type { CellPair } from '@/board/modules/SquareGrid'
import { defaultConfigValues } from '@/board/variables'

/**
 * Maximum number of executions to delay before performing hover detection.
 * The `findHoveredCell` method will skip actual detection until this count is reached.
 */
export const MAX_HOVER_DETECTION_DELAY = 4

export type Hovered = { index: number }

export class Store {
  /** Canvas size in CSS pixels. */
  public screenSize: [number, number] = [0, 0]
  /** Canvas drawing buffer size in device pixels. */
  public drawingBufferSize: [number, number] = [0, 0]
  /** Pointer position over the canvas in CSS pixels. */
  public mousePosition: [number, number] = [0, 0]
  public hoveredCell: Hovered | undefined = undefined
  /** Interior boundary under the pointer, seen from the cell the pointer is in. */
  public hoveredBoundary: CellPair | undefined = undefined
  /** Set while the main mouse button is down over the canvas. */
  public boundaryPress: BoundaryPress | undefined = undefined
  public div: HTMLDivElement | undefined
  /** Graph to device transform before pan and zoom. */
  public baseTransform = mat3.create()
  /** Graph to device transform the programs draw with. */
  public transform = mat3.create()

  private viewRect: ViewRect = { x: 0, y: 0, width: 1, height: 1 }
  private zoom: ZoomState = { x: 0, y: 0, k: 1 }
  private viewMargin = defaultConfigValues.viewMargin
  private _backgroundColor: [number, number, number, number] = [0, 0, 0, 0]

  public get backgroundColor (): [number, number, number, number] {
    return this._backgroundColor
  }

  public set backgroundColor (color: [number, number, number, number]) {
    this._backgroundColor = color
    if (this.div) this.div.style.backgroundColor = `rgba(${color[0] * 255}, ${color[1] * 255}, ${color[2] * 255}, ${color[3]})`
  }

  /**
   * `transform` widened to the std140 `mat4` the programs' uniform blocks expect.
   */
  public get transformationMatrix4x4 (): Mat4Array {
    return toMat4Array(this.transform)
  }

  /**
   * Sets the part of graph space that fills the viewport at zoom level 1.
   */
  public setViewRect (viewRect: ViewRect): void {
    this.viewRect = viewRect.width > 0 && viewRect.height > 0
      ? viewRect
      : { x: viewRect.x, y: viewRect.y, width: 1, height: 1 }
    this.updateTransform()
  }

  public setViewMargin (margin: number): void {
    this.viewMargin = margin
    this.updateTransform()
  }

  public updateScreenSize (width: number, height: number, drawingBufferWidth = width, drawingBufferHeight = height): void {
    this.screenSize = [width, height]
    this.drawingBufferSize = [drawingBufferWidth, drawingBufferHeight]
    this.updateTransform()
  }

  public updateZoom (zoom: ZoomState): void {
    this.zoom = { x: zoom.x, y: zoom.y, k: zoom.k }
    this.updateTransform()
  }

  public screenToGraph (screenPosition: Point): Point | undefined {
    const [w, h] = this.screenSize
    if (!w || !h) return undefined
    const deviceToGraph = invertTransform(this.transform)
    if (!deviceToGraph) return undefined
    return applyTransform(composeTransforms(deviceToGraph, createWindowToDevice(w, h)), screenPosition)
  }

  public graphToScreen (graphPosition: Point): Point | undefined {
    const [w, h] = this.screenSize
    if (!w || !h) return undefined
    const deviceToWindow = invertTransform(createWindowToDevice(w, h))
    if (!deviceToWindow) return undefined
    return applyTransform(composeTransforms(deviceToWindow, this.transform), graphPosition)
  }

  /**
   * Converts a position in CSS pixels to a drawing buffer pixel, both counted from the upper left corner.
   */
  public screenToDrawingBuffer (screenPosition: Point): Point {
    const [w, h] = this.screenSize
    const [bufferW, bufferH] = this.drawingBufferSize
    if (!w || !h) return [0, 0]
    return [screenPosition[0] * bufferW / w, screenPosition[1] * bufferH / h]
  }

  private updateTransform (): void {
    const [w, h] = this.screenSize
    if (!w || !h) return
    this.baseTransform = createViewTransform(this.viewRect, w / h, this.viewMargin)
    this.transform = createZoomedTransform(this.baseTransform, this.zoom, w, h)
  }
}
