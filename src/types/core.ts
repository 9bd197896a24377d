/**
 * Core type definitions for exposure tracking
 * Scroll snapshots, tracker options and the geometry contract
 */

export type Axis = 'horizontal' | 'vertical'

export type AxisDirection = 'up' | 'down' | 'left' | 'right'

export type GrowthDirection = 'forward' | 'reverse'

/**
 * Visibility classification of a tracked element
 */
export type VisibilityState = 'invisible' | 'visible'

/**
 * 'start' is the synthetic initial-position event, 'end' marks a settled scroll
 */
export type ScrollEventKind = 'start' | 'update' | 'end'

/**
 * Snapshot carried by every channel event
 */
export interface ScrollEvent {
  kind: ScrollEventKind
  scrollOffset: number
  axis: Axis
}

export type ScrollListener = (event: ScrollEvent) => void

/**
 * everyUpdate: every scroll position change
 * onSettleOnly: only end-of-scroll events (plus the start event)
 */
export type ScrollDeliveryMode = 'everyUpdate' | 'onSettleOnly'

export interface ScrollEventChannelOptions {
  deliveryMode?: ScrollDeliveryMode
  /** Delay before the synthetic start event, in ms */
  startDelay?: number
}

/**
 * Geometry source consumed by the tracker on every evaluation.
 * Implementations must return defaults instead of throwing before layout.
 */
export interface ExposureGeometry {
  isMounted(): boolean
  exposureOffset(): number
  elementExtent(axis: Axis): number
  viewportExtent(axis: Axis): number
}

export type OnExpose = () => void

/** Receives the dwell duration in ms */
export type OnHide = (duration: number) => void

export interface ExposureTrackerOptions {
  onExpose: OnExpose
  onHide?: OnHide
  /** Fraction of the element's extent that must be inside the viewport, clamped to [0.1, 0.9] */
  exposeFactor?: number
  registry?: RecheckRegistry
  fireOnce?: boolean
  now?: () => number
  /** Called on every state change, including the silent reset of a recheck */
  onStateChange?: (state: VisibilityState) => void
}

/**
 * Anything that can be forced to recompute its state
 */
export interface Recheckable {
  recheckExposeState(): void
}

/**
 * Minimal registry surface a tracker needs; avoids an import cycle with registry.ts
 */
export interface RecheckRegistry {
  register(tracker: Recheckable): void
  unregister(tracker: Recheckable): void
}
