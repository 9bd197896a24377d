import { toValue, type MaybeRefOrGetter } from 'vue'
import { FALLBACK_VIEWPORT_SIZE } from '../constants/exposure'
import type { Axis, ExposureGeometry } from '../types'

export type ScrollContainer = HTMLElement | Window

export interface DomGeometryOptions {
  /** Scroll axis of the container */
  axis?: Axis
  /** Leading space covered by pinned content (sticky headers), in px */
  pinnedExtent?: number
}

const isWindow = (container: ScrollContainer): container is Window =>
  typeof window !== 'undefined' && container === window

function containerLeadingEdge(container: ScrollContainer, axis: Axis): number {
  if (isWindow(container)) return 0
  const rect = container.getBoundingClientRect()
  return axis === 'vertical' ? rect.top + container.clientTop : rect.left + container.clientLeft
}

export function readScrollOffset(container: ScrollContainer, axis: Axis): number {
  if (isWindow(container)) {
    return axis === 'vertical' ? container.scrollY : container.scrollX
  }
  return axis === 'vertical' ? container.scrollTop : container.scrollLeft
}

function containerExtent(container: ScrollContainer, axis: Axis): number {
  if (isWindow(container)) {
    return axis === 'vertical' ? container.innerHeight : container.innerWidth
  }
  return axis === 'vertical' ? container.clientHeight : container.clientWidth
}

/**
 * Geometry source backed by the DOM.
 * getBoundingClientRect() is viewport-relative, so the container's scroll
 * position is added back to land in scroll-offset space.
 */
export function createDomGeometry(
  target: MaybeRefOrGetter<HTMLElement | null | undefined>,
  container: MaybeRefOrGetter<ScrollContainer | null | undefined>,
  options: DomGeometryOptions = {}
): ExposureGeometry {
  const axis = options.axis ?? 'vertical'
  const pinnedExtent = options.pinnedExtent ?? 0

  const connectedTarget = (): HTMLElement | null => {
    const el = toValue(target)
    return el && el.isConnected ? el : null
  }

  return {
    isMounted: () => connectedTarget() !== null,

    exposureOffset: () => {
      const el = connectedTarget()
      const scroller = toValue(container)
      if (!el || !scroller) return 0

      const rect = el.getBoundingClientRect()
      const leading = axis === 'vertical' ? rect.top : rect.left
      return leading - containerLeadingEdge(scroller, axis) + readScrollOffset(scroller, axis) - pinnedExtent
    },

    elementExtent: (eventAxis) => {
      const el = connectedTarget()
      if (!el) return 0
      const rect = el.getBoundingClientRect()
      return eventAxis === 'vertical' ? rect.height : rect.width
    },

    viewportExtent: (eventAxis) => {
      const scroller = toValue(container)
      const extent = scroller ? containerExtent(scroller, eventAxis) : 0
      if (extent > 0) return extent
      return eventAxis === 'vertical' ? FALLBACK_VIEWPORT_SIZE.height : FALLBACK_VIEWPORT_SIZE.width
    }
  }
}
