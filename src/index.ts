/**
 * vue-exposure
 * Exposure (impression) tracking for elements in scrollable Vue views
 */

// Components
export { ScrollDetailProvider } from './components/ScrollDetailProvider'
export { Exposure } from './components/Exposure'

// Composables
export {
  provideScrollDetail,
  injectScrollDetail,
  SCROLL_DETAIL_KEY,
  type ScrollDetailContext
} from './composables/useScrollDetail'
export { useExposure } from './composables/useExposure'
export type { UseExposureOptions, UseExposureReturn } from './composables/useExposure'

// Core
export { ScrollEventChannel, type ScrollSubscription } from './channel/scrollEventChannel'
export { ExposureTracker } from './tracker/exposureTracker'
export { ExposureRegistry } from './registry'
export { ExposureConfigurationError } from './errors'

// Geometry
export {
  findScrollableAncestor,
  getOffsetToReveal,
  resolveExposureOffset,
  elementExtent,
  viewportExtent,
  scrollOffsetOf,
  maxScrollObstructionExtentBefore,
  createLayoutGeometry
} from './geometry/resolver'
export {
  createBox,
  createSliver,
  createViewport,
  detach,
  applyGrowthDirectionToAxisDirection
} from './geometry/layoutTree'
export type { BoxInit, SliverInit, ViewportInit } from './geometry/layoutTree'
export { createDomGeometry, type DomGeometryOptions, type ScrollContainer } from './geometry/domGeometry'

// Constants (user can override)
export {
  EXPOSE_FACTOR,
  START_POSITION_DELAY_MS,
  SETTLE_DELAY_MS
} from './constants/exposure'

export { clampExposeFactor } from './utils/optionDefaults'
export type { ScrollDetailOptions } from './utils/optionDefaults'

// Re-export all types from central types file
export type {
  Axis,
  AxisDirection,
  GrowthDirection,
  VisibilityState,
  ScrollEventKind,
  ScrollEvent,
  ScrollListener,
  ScrollDeliveryMode,
  ScrollEventChannelOptions,
  ExposureGeometry,
  OnExpose,
  OnHide,
  ExposureTrackerOptions,
  Recheckable,
  RecheckRegistry,
  Size,
  Offset,
  Rect,
  SliverConstraints,
  SliverGeometry,
  BoxNode,
  SliverNode,
  ViewportNode,
  LayoutNode
} from './types'
