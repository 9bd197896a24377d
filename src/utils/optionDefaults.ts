import { EXPOSE_FACTOR, SETTLE_DELAY_MS, START_POSITION_DELAY_MS } from '../constants/exposure'
import type { Axis, ScrollDeliveryMode, ExposureTrackerOptions, OnHide, RecheckRegistry, VisibilityState } from '../types'

export const clampExposeFactor = (factor: number): number =>
  Math.min(Math.max(factor, EXPOSE_FACTOR.MIN), EXPOSE_FACTOR.MAX)

export interface NormalizedExposureOptions {
  onExpose: () => void
  onHide: OnHide | undefined
  exposeFactor: number
  registry: RecheckRegistry | undefined
  fireOnce: boolean
  now: () => number
  onStateChange: ((state: VisibilityState) => void) | undefined
}

/**
 * Centralized defaulting for tracker options.
 */
export function normalizeExposureOptions(options: ExposureTrackerOptions): NormalizedExposureOptions {
  const factor = options.exposeFactor ?? EXPOSE_FACTOR.DEFAULT
  return {
    onExpose: options.onExpose,
    onHide: options.onHide,
    exposeFactor: clampExposeFactor(Number.isNaN(factor) ? EXPOSE_FACTOR.DEFAULT : factor),
    registry: options.registry,
    fireOnce: options.fireOnce ?? false,
    now: options.now ?? Date.now,
    onStateChange: options.onStateChange
  }
}

export interface ScrollDetailOptions {
  axis?: Axis
  deliveryMode?: ScrollDeliveryMode
  /** Idle time in ms before a settle ('end') event */
  settleDelay?: number
  /** Delay in ms before the synthetic start event */
  startDelay?: number
  /** Leading space covered by pinned content (sticky headers), in px */
  pinnedExtent?: number
}

export function normalizeScrollDetailOptions(options: ScrollDetailOptions = {}): Required<ScrollDetailOptions> {
  return {
    axis: options.axis ?? 'vertical',
    deliveryMode: options.deliveryMode ?? 'everyUpdate',
    settleDelay: options.settleDelay ?? SETTLE_DELAY_MS,
    startDelay: options.startDelay ?? START_POSITION_DELAY_MS,
    pinnedExtent: Math.max(0, options.pinnedExtent ?? 0)
  }
}
