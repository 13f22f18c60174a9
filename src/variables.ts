import type { AtlasIndexBase, OutOfRangePolicy } from '@/board/config'

/** Number of distinct circles the procedural atlas can identify (12-bit identifiers). */
export const ATLAS_CAPACITY = 4096

/** Number of exact levels per color channel in the identifier encoding. */
export const CHANNEL_LEVELS = 16

/** Largest amount of goop a single cell can hold. */
export const MAX_FILL = 15

export const defaultBackgroundColor = '#222222'
export const defaultBoundaryColor = '#5c5c5c'
export const defaultSentinelColor = '#ff00ff'
export const defaultOutflowColor = '#e8e8e8'
export const defaultHoveredOutflowColor = 'rgba(0, 0, 0, 0.5)'
export const defaultActiveOutflowColor = '#f0f500'

const defaultAtlasIndexBase: AtlasIndexBase = 0
const defaultOutOfRangePolicy: OutOfRangePolicy = 'discard'

export const defaultConfigValues = {
  backgroundColor: defaultBackgroundColor,
  boundaryColor: defaultBoundaryColor,
  renderBoundaries: true,
  outflowColor: defaultOutflowColor,
  hoveredOutflowColor: defaultHoveredOutflowColor,
  activeOutflowColor: defaultActiveOutflowColor,
  outflowWidth: 0.1,
  // Wide enough for a fill of 1 out of `MAX_FILL` to keep its true size inside its atlas slot
  atlasSpacing: MAX_FILL,
  atlasIndexBase: defaultAtlasIndexBase,
  outOfRangePolicy: defaultOutOfRangePolicy,
  sentinelColor: defaultSentinelColor,
  maxFill: MAX_FILL,
  fillScale: 0.8,
  viewMargin: 0.95,
  pickColorTolerance: 2 / 255,
  pixelRatio: 2,
  enableZoom: true,
  minZoomLevel: 0.5,
  maxZoomLevel: 32,
  fitViewDuration: 250,
  hoveredCellCursor: 'pointer',
}
