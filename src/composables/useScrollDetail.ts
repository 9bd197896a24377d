import { inject, onBeforeUnmount, onMounted, provide, toValue, type InjectionKey, type MaybeRefOrGetter } from 'vue'
import { useScroll } from '@vueuse/core'
import { ScrollEventChannel } from '../channel/scrollEventChannel'
import { readScrollOffset, type ScrollContainer } from '../geometry/domGeometry'
import { normalizeScrollDetailOptions, type ScrollDetailOptions } from '../utils/optionDefaults'
import type { Axis } from '../types'

/**
 * What a scroll region shares with the trackers below it
 */
export interface ScrollDetailContext {
  channel: ScrollEventChannel
  axis: Axis
  pinnedExtent: number
  container: () => ScrollContainer | undefined
}

export const SCROLL_DETAIL_KEY: InjectionKey<ScrollDetailContext> = Symbol('scroll-detail')

/**
 * Turn `container` into a scroll event publisher for its descendants.
 *
 * Every scroll publishes an 'update'; an 'end' follows once scrolling has been
 * idle for `settleDelay` ms. A synthetic 'start' at offset 0 is posted shortly after mount so
 * elements visible at first layout are classified without user interaction.
 *
 * Must run inside a component's setup().
 */
export function provideScrollDetail(
  container: MaybeRefOrGetter<ScrollContainer | null | undefined>,
  options: ScrollDetailOptions = {}
): ScrollDetailContext {
  const { axis, deliveryMode, settleDelay, startDelay, pinnedExtent } = normalizeScrollDetailOptions(options)
  const channel = new ScrollEventChannel({ deliveryMode, startDelay })
  const resolveContainer = () => toValue(container) ?? undefined

  const publishCurrent = (kind: 'update' | 'end') => {
    const scroller = resolveContainer()
    if (!scroller) return
    channel.publish({ kind, scrollOffset: readScrollOffset(scroller, axis), axis })
  }

  // Unthrottled so every position reaches the channel; onStop fires after `settleDelay` ms idle
  useScroll(resolveContainer, {
    throttle: 0,
    idle: settleDelay,
    onScroll: () => publishCurrent('update'),
    onStop: () => publishCurrent('end'),
    eventListenerOptions: { passive: true }
  })

  // Children mount first, so their trackers are subscribed by now
  onMounted(() => channel.scheduleStartPosition(axis))
  onBeforeUnmount(() => channel.dispose())

  const context: ScrollDetailContext = { channel, axis, pinnedExtent, container: resolveContainer }
  provide(SCROLL_DETAIL_KEY, context)
  return context
}

/** Nearest scroll detail context, or undefined outside any provider */
export function injectScrollDetail(): ScrollDetailContext | undefined {
  return inject(SCROLL_DETAIL_KEY, undefined)
}
