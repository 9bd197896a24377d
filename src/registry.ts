import type { Recheckable, RecheckRegistry } from './types'

const DEBUG = typeof process !== 'undefined' ? process.env.NODE_ENV !== 'production' : true

/**
 * Exposure Registry - lets host code force every live tracker to recompute.
 * Holds trackers for lookup only; trackers add and remove themselves over
 * their own lifecycle and never own the registry.
 */
export class ExposureRegistry implements RecheckRegistry {
  private trackers = new Set<Recheckable>()

  /** Register a tracker. Registering twice keeps a single entry. */
  register(tracker: Recheckable): void {
    if (this.trackers.has(tracker)) {
      console.warn('[ExposureRegistry] tracker already registered, skipping')
      return
    }
    this.trackers.add(tracker)
  }

  /** Safe for trackers that were never registered */
  unregister(tracker: Recheckable): void {
    this.trackers.delete(tracker)
  }

  /**
   * Recheck every registered tracker in registration order.
   * Each tracker is evaluated independently; a tracker that unregisters
   * or throws during the pass does not disturb the others. The first error
   * is rethrown once every tracker has been visited.
   */
  recheckAll(): void {
    const snapshot = Array.from(this.trackers)
    if (DEBUG) {
      console.debug('[ExposureRegistry] rechecking', snapshot.length, 'tracker(s)')
    }
    const errors: unknown[] = []
    snapshot.forEach(tracker => {
      if (!this.trackers.has(tracker)) return
      try {
        tracker.recheckExposeState()
      } catch (error) {
        errors.push(error)
      }
    })
    if (errors.length > 0) {
      if (errors.length > 1) {
        console.warn('[ExposureRegistry]', errors.length, 'trackers failed to recheck')
      }
      throw errors[0]
    }
  }

  has(tracker: Recheckable): boolean {
    return this.trackers.has(tracker)
  }

  get size(): number {
    return this.trackers.size
  }

  clear(): void {
    this.trackers.clear()
  }
}
