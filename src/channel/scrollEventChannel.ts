import { START_POSITION_DELAY_MS } from '../constants/exposure'
import type {
  Axis,
  ScrollDeliveryMode,
  ScrollEvent,
  ScrollEventChannelOptions,
  ScrollListener
} from '../types'

const DEBUG = typeof process !== 'undefined' ? process.env.NODE_ENV !== 'production' : true

export type ScrollSubscription = symbol

/**
 * Broadcast channel for one scrollable region.
 * Delivers synchronously, in subscription order, and keeps no history:
 * a listener that subscribes late only sees later events.
 */
export class ScrollEventChannel {
  private listeners = new Map<ScrollSubscription, ScrollListener>()
  private startTimer: ReturnType<typeof setTimeout> | null = null
  private startScheduled = false
  private closed = false
  readonly deliveryMode: ScrollDeliveryMode
  private readonly startDelay: number

  constructor(options: ScrollEventChannelOptions = {}) {
    this.deliveryMode = options.deliveryMode ?? 'everyUpdate'
    this.startDelay = options.startDelay ?? START_POSITION_DELAY_MS
  }

  get listenerCount(): number {
    return this.listeners.size
  }

  get disposed(): boolean {
    return this.closed
  }

  publish(event: ScrollEvent): void {
    if (this.closed) return
    if (this.deliveryMode === 'onSettleOnly' && event.kind === 'update') return

    // Snapshot so listeners added mid-dispatch wait for the next event
    const entries = Array.from(this.listeners.entries())
    for (const [id, listener] of entries) {
      if (!this.listeners.has(id)) continue
      listener(event)
    }
  }

  subscribe(listener: ScrollListener): ScrollSubscription {
    const id = Symbol('scroll-subscriber')
    this.listeners.set(id, listener)
    return id
  }

  unsubscribe(id: ScrollSubscription): void {
    this.listeners.delete(id)
  }

  /**
   * Post the synthetic start event once, after a short delay, so elements
   * visible at first layout get classified before any real scroll.
   */
  scheduleStartPosition(axis: Axis): void {
    if (this.startScheduled || this.closed) return
    this.startScheduled = true

    this.startTimer = setTimeout(() => {
      this.startTimer = null
      if (this.closed) return
      if (DEBUG) {
        console.debug('[ScrollEventChannel] start position posted to', this.listeners.size, 'listener(s)')
      }
      this.publish({ kind: 'start', scrollOffset: 0, axis })
    }, this.startDelay)
  }

  dispose(): void {
    if (this.closed) return
    this.closed = true
    if (this.startTimer !== null) {
      clearTimeout(this.startTimer)
      this.startTimer = null
    }
    this.listeners.clear()
  }
}
