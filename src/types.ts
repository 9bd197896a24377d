/**
 * Shared type definitions for exposure tracking
 * Re-exports from organized type modules
 */

// Re-export core types
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
  RecheckRegistry
} from './types/core'

// Re-export layout tree types
export type {
  Size,
  Offset,
  Rect,
  SliverConstraints,
  SliverGeometry,
  BoxNode,
  SliverNode,
  ViewportNode,
  LayoutNode
} from './types/layout'
