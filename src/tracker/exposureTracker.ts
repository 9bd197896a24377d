import type { ScrollEventChannel, ScrollSubscription } from '../channel/scrollEventChannel'
import { missingProviderError } from '../errors'
import { normalizeExposureOptions, type NormalizedExposureOptions } from '../utils/optionDefaults'
import type {
  Axis,
  ExposureGeometry,
  ExposureTrackerOptions,
  Recheckable,
  ScrollEvent,
  VisibilityState
} from '../types'

const DEBUG = typeof process !== 'undefined' ? process.env.NODE_ENV !== 'production' : true

/**
 * Exposure Tracker - one per tracked element.
 *
 * Evaluates the element against the viewport on every scroll event and fires
 * onExpose / onHide on state transitions only (edge-triggered).
 */
export class ExposureTracker implements Recheckable {
  private state: VisibilityState = 'invisible'
  private exposedAt: number | null = null
  private subscription: ScrollSubscription | null = null
  private scrollOffset = 0
  private axis: Axis = 'vertical'
  private completed = false
  private disposed = false
  private registered = false
  private readonly options: NormalizedExposureOptions

  constructor(
    private readonly channel: ScrollEventChannel | null | undefined,
    private readonly geometry: ExposureGeometry,
    options: ExposureTrackerOptions
  ) {
    this.options = normalizeExposureOptions(options)
  }

  get visibilityState(): VisibilityState {
    return this.state
  }

  /** Clamped factor actually used by the threshold test */
  get exposeFactor(): number {
    return this.options.exposeFactor
  }

  get subscribed(): boolean {
    return this.subscription !== null
  }

  /**
   * Start listening to the channel. Throws when the tracker was built
   * without one, since exposure would otherwise never fire.
   * Joins the registry on the first successful subscription only.
   */
  subscribe(): void {
    if (!this.channel) {
      throw missingProviderError()
    }
    if (this.subscription !== null || this.disposed || this.completed) return

    this.subscription = this.channel.subscribe(event => this.handleScroll(event))
    if (!this.registered) {
      this.registered = true
      this.options.registry?.register(this)
    }
  }

  handleScroll(event: ScrollEvent): void {
    if (this.disposed || this.completed) return
    this.scrollOffset = event.scrollOffset
    this.axis = event.axis
    this.trackPosition()
  }

  /**
   * Forget the current classification, resubscribe, and evaluate once
   * against the last seen scroll position.
   */
  recheckExposeState(): void {
    if (this.disposed || this.completed) return
    this.setState('invisible')
    this.exposedAt = null
    this.unsubscribe()
    this.subscribe()
    this.trackPosition()
  }

  dispose(): void {
    if (this.disposed) return
    this.disposed = true
    this.unsubscribe()
    if (this.registered) {
      this.registered = false
      this.options.registry?.unregister(this)
    }
  }

  private setState(next: VisibilityState): void {
    if (this.state === next) return
    this.state = next
    this.options.onStateChange?.(next)
  }

  private unsubscribe(): void {
    if (this.subscription === null) return
    this.channel?.unsubscribe(this.subscription)
    this.subscription = null
  }

  private trackPosition(): void {
    if (!this.geometry.isMounted()) return

    const exposureOffset = this.geometry.exposureOffset()
    const elementExtent = this.geometry.elementExtent(this.axis)
    const viewportExtent = this.geometry.viewportExtent(this.axis)
    this.checkExposure(exposureOffset, this.scrollOffset, elementExtent, viewportExtent)
  }

  private checkExposure(
    exposureOffset: number,
    scrollOffset: number,
    elementExtent: number,
    viewportExtent: number
  ): void {
    const factor = this.options.exposeFactor
    const viewportEnd = scrollOffset + viewportExtent
    const thresholdEdge = exposureOffset + elementExtent * factor

    if (this.state === 'invisible') {
      const becomesVisible =
        exposureOffset + elementExtent * (1 - factor) > scrollOffset &&
        thresholdEdge < viewportEnd
      if (becomesVisible) this.expose()
      return
    }

    const becomesInvisible = thresholdEdge < scrollOffset || thresholdEdge > viewportEnd
    if (becomesInvisible) this.hide()
  }

  private expose(): void {
    this.setState('visible')
    this.options.onExpose()
    this.exposedAt = this.options.now()

    if (this.options.fireOnce) {
      this.completed = true
      this.unsubscribe()
      if (DEBUG) {
        console.debug('[ExposureTracker] exposed once, unsubscribed')
      }
    }
  }

  private hide(): void {
    this.setState('invisible')
    const exposedAt = this.exposedAt ?? this.options.now()
    this.exposedAt = null
    this.options.onHide?.(this.options.now() - exposedAt)
  }
}
