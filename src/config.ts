import type { D3ZoomEvent } from 'd3-zoom'
import { defaultConfigValues } from '@/board/variables'
import { isFillRangeDrawable } from '@/board/modules/Atlas'

export type OutOfRangePolicy = 'discard' | 'sentinel'
export type AtlasIndexBase = 0 | 1
export type BoardColor = string | [number, number, number, number]

export interface BoardConfigInterface {
  /**
   * Canvas background color.
   * Default value: '#222222'
   */
  backgroundColor?: BoardColor;
  /**
   * Color of the lines separating cells.
   * Default value: '#5c5c5c'
   */
  boundaryColor?: BoardColor;
  /**
   * Whether to draw the lines separating cells.
   * Default value: `true`
   */
  renderBoundaries?: boolean;
  /**
   * Color of the lines showing where each cell's goop flows.
   * Default value: '#e8e8e8'
   */
  outflowColor?: BoardColor;
  /**
   * Color of the boundary under the pointer, drawn as the outflow a click would toggle.
   * Default value: 'rgba(0, 0, 0, 0.5)'
   */
  hoveredOutflowColor?: BoardColor;
  /**
   * Color of the boundary being clicked while the mouse button is down.
   * Default value: '#f0f500'
   */
  activeOutflowColor?: BoardColor;
  /**
   * Width of outflow lines, as a fraction of a cell's side.
   * Default value: `0.1`
   */
  outflowWidth?: number;
  /**
   * Distance between neighboring circle centers in the procedural atlas.
   * Should be at least `2 * sqrt(maxFill) + 1`: below that, cells with
   * little goop are drawn larger than their fill level.
   * Default value: `15`
   */
  atlasSpacing?: number;
  /**
   * Atlas slot that carries identifier 0. With `1`, slot 0 is left blank
   * and identifiers 0..4095 live in slots 1..4096.
   * The same value is used for drawing and for picking.
   * Default value: `0`
   */
  atlasIndexBase?: AtlasIndexBase;
  /**
   * What the atlas programs do with a fragment whose slot falls outside the
   * identifier range: `'discard'` leaves the pixel untouched, `'sentinel'`
   * paints it with `sentinelColor`. `'sentinel'` is meant for development only.
   * Default value: `'discard'`
   */
  outOfRangePolicy?: OutOfRangePolicy;
  /**
   * Color painted by the `'sentinel'` out-of-range policy. Alpha is forced to 1.
   * Default value: '#ff00ff'
   */
  sentinelColor?: BoardColor;
  /**
   * Fill level at which a cell's circle reaches its full size.
   * Default value: `15`
   */
  maxFill?: number;
  /**
   * Fraction of the cell occupied by a full circle.
   * Default value: `0.8`
   */
  fillScale?: number;
  /**
   * Fraction of the viewport taken by the board when the view is fitted.
   * Default value: `0.95`
   */
  viewMargin?: number;
  /**
   * Largest per-channel difference (in the 0..1 range) between a sampled
   * pixel and the exact encoding of its decoded identifier for a pick to be
   * accepted. Samples further away are treated as no cell.
   * Default value: `2 / 255`
   */
  pickColorTolerance?: number;
  /**
   * Canvas pixel ratio.
   * Default value: `2`
   */
  pixelRatio?: number;
  /**
   * Enables pan and zoom with the mouse.
   * Default value: `true`
   */
  enableZoom?: boolean;
  /**
   * Smallest zoom level.
   * Default value: `0.5`
   */
  minZoomLevel?: number;
  /**
   * Largest zoom level.
   * Default value: `32`
   */
  maxZoomLevel?: number;
  /**
   * Duration of the `fitView` animation in milliseconds.
   * Default value: `250`
   */
  fitViewDuration?: number;
  /**
   * Cursor shown while hovering a cell.
   * Default value: 'pointer'
   */
  hoveredCellCursor?: string;
  /**
   * Called on canvas click with the index of the clicked cell,
   * or `undefined` when the click landed outside every cell.
   */
  onCellClick?: (index: number | undefined, event: MouseEvent) => void;
  /**
   * Called on canvas click when the pointer is on an interior boundary,
   * with the directed pair `[from, to]` of cells it separates: the outflow the click would toggle.
   */
  onBoundaryClick?: (boundary: [number, number], event: MouseEvent) => void;
  /**
   * Called when the pointer moves onto a cell.
   */
  onCellMouseOver?: (index: number, event: MouseEvent | undefined) => void;
  /**
   * Called when the pointer leaves the hovered cell.
   */
  onCellMouseOut?: (event: MouseEvent | undefined) => void;
  onZoomStart?: (e: D3ZoomEvent<HTMLCanvasElement, undefined>, userDriven: boolean) => void;
  onZoom?: (e: D3ZoomEvent<HTMLCanvasElement, undefined>, userDriven: boolean) => void;
  onZoomEnd?: (e: D3ZoomEvent<HTMLCanvasElement, undefined>, userDriven: boolean) => void;
}

export class BoardConfig implements BoardConfigInterface {
  public backgroundColor: BoardColor = defaultConfigValues.backgroundColor
  public boundaryColor: BoardColor = defaultConfigValues.boundaryColor
  public renderBoundaries = defaultConfigValues.renderBoundaries
  public outflowColor: BoardColor = defaultConfigValues.outflowColor
  public hoveredOutflowColor: BoardColor = defaultConfigValues.hoveredOutflowColor
  public activeOutflowColor: BoardColor = defaultConfigValues.activeOutflowColor
  public outflowWidth = defaultConfigValues.outflowWidth
  public atlasSpacing = defaultConfigValues.atlasSpacing
  public atlasIndexBase: AtlasIndexBase = defaultConfigValues.atlasIndexBase
  public outOfRangePolicy: OutOfRangePolicy = defaultConfigValues.outOfRangePolicy
  public sentinelColor: BoardColor = defaultConfigValues.sentinelColor
  public maxFill = defaultConfigValues.maxFill
  public fillScale = defaultConfigValues.fillScale
  public viewMargin = defaultConfigValues.viewMargin
  public pickColorTolerance = defaultConfigValues.pickColorTolerance
  public pixelRatio = defaultConfigValues.pixelRatio
  public enableZoom = defaultConfigValues.enableZoom
  public minZoomLevel = defaultConfigValues.minZoomLevel
  public maxZoomLevel = defaultConfigValues.maxZoomLevel
  public fitViewDuration = defaultConfigValues.fitViewDuration
  public hoveredCellCursor = defaultConfigValues.hoveredCellCursor

  public onCellClick: BoardConfigInterface['onCellClick'] = undefined
  public onBoundaryClick: BoardConfigInterface['onBoundaryClick'] = undefined
  public onCellMouseOver: BoardConfigInterface['onCellMouseOver'] = undefined
  public onCellMouseOut: BoardConfigInterface['onCellMouseOut'] = undefined
  public onZoomStart: BoardConfigInterface['onZoomStart'] = undefined
  public onZoom: BoardConfigInterface['onZoom'] = undefined
  public onZoomEnd: BoardConfigInterface['onZoomEnd'] = undefined

  public init (config: Partial<BoardConfigInterface>): void {
    const {
      backgroundColor, boundaryColor, renderBoundaries, outflowColor, hoveredOutflowColor, activeOutflowColor,
      outflowWidth, atlasSpacing, atlasIndexBase, outOfRangePolicy,
      sentinelColor, maxFill, fillScale, viewMargin, pickColorTolerance, pixelRatio, enableZoom,
      minZoomLevel, maxZoomLevel, fitViewDuration, hoveredCellCursor,
    } = config

    if (backgroundColor !== undefined) this.backgroundColor = backgroundColor
    if (boundaryColor !== undefined) this.boundaryColor = boundaryColor
    if (renderBoundaries !== undefined) this.renderBoundaries = renderBoundaries
    if (outflowColor !== undefined) this.outflowColor = outflowColor
    if (hoveredOutflowColor !== undefined) this.hoveredOutflowColor = hoveredOutflowColor
    if (activeOutflowColor !== undefined) this.activeOutflowColor = activeOutflowColor
    if (outflowWidth !== undefined) {
      if (outflowWidth > 0 && outflowWidth <= 1) this.outflowWidth = outflowWidth
      else console.warn(`Invalid outflowWidth value: ${outflowWidth}. Keeping ${this.outflowWidth}`)
    }
    if (atlasSpacing !== undefined) {
      if (atlasSpacing > 0 && isFinite(atlasSpacing)) this.atlasSpacing = atlasSpacing
      else console.warn(`Invalid atlasSpacing value: ${atlasSpacing}. Keeping ${this.atlasSpacing}`)
    }
    if (atlasIndexBase !== undefined) {
      if (atlasIndexBase === 0 || atlasIndexBase === 1) this.atlasIndexBase = atlasIndexBase
      else console.warn(`Invalid atlasIndexBase value: ${String(atlasIndexBase)}. Keeping ${this.atlasIndexBase}`)
    }
    if (outOfRangePolicy !== undefined) this.outOfRangePolicy = outOfRangePolicy
    if (sentinelColor !== undefined) this.sentinelColor = sentinelColor
    if (maxFill !== undefined) {
      if (maxFill > 0 && isFinite(maxFill)) this.maxFill = maxFill
      else console.warn(`Invalid maxFill value: ${maxFill}. Keeping ${this.maxFill}`)
    }
    if (fillScale !== undefined) this.fillScale = fillScale
    if (viewMargin !== undefined) this.viewMargin = viewMargin
    if (pickColorTolerance !== undefined) this.pickColorTolerance = pickColorTolerance
    if (pixelRatio !== undefined) this.pixelRatio = pixelRatio
    if (enableZoom !== undefined) this.enableZoom = enableZoom
    if (minZoomLevel !== undefined) this.minZoomLevel = minZoomLevel
    if (maxZoomLevel !== undefined) this.maxZoomLevel = maxZoomLevel
    if (fitViewDuration !== undefined) this.fitViewDuration = fitViewDuration
    if (hoveredCellCursor !== undefined) this.hoveredCellCursor = hoveredCellCursor

    if ((atlasSpacing !== undefined || maxFill !== undefined) && !isFillRangeDrawable(this.maxFill, this.atlasSpacing)) {
      console.warn(`atlasSpacing ${this.atlasSpacing} is too small for maxFill ${this.maxFill}. Low fill levels will be drawn at the smallest size the atlas allows`)
    }

    if ('onCellClick' in config) this.onCellClick = config.onCellClick
    if ('onBoundaryClick' in config) this.onBoundaryClick = config.onBoundaryClick
    if ('onCellMouseOver' in config) this.onCellMouseOver = config.onCellMouseOver
    if ('onCellMouseOut' in config) this.onCellMouseOut = config.onCellMouseOut
    if ('onZoomStart' in config) this.onZoomStart = config.onZoomStart
    if ('onZoom' in config) this.onZoom = config.onZoom
    if ('onZoomEnd' in config) this.onZoomEnd = config.onZoomEnd
  }
}
