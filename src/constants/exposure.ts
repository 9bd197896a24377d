/**
 * Shared exposure constants
 *
 * - EXPOSE_FACTOR: fraction of an element's extent that has to be inside the viewport
 * - START_POSITION_DELAY_MS: wait before the synthetic start event so trackers mounted
 *   in the same tick can subscribe first
 * - SETTLE_DELAY_MS: idle time after the last scroll event before an 'end' event is posted
 */

export const EXPOSE_FACTOR = {
  MIN: 0.1,
  DEFAULT: 0.5,
  MAX: 0.9
} as const

export const START_POSITION_DELAY_MS = 0.5

export const SETTLE_DELAY_MS = 150

/** Stand-in viewport size when it cannot be resolved yet */
export const FALLBACK_VIEWPORT_SIZE = { width: 1, height: 1 } as const
