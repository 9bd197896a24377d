import { onBeforeUnmount, onMounted, readonly, ref, type MaybeRefOrGetter, type Ref } from 'vue'
import { createDomGeometry } from '../geometry/domGeometry'
import { ExposureTracker } from '../tracker/exposureTracker'
import type { OnHide, RecheckRegistry } from '../types'
import { injectScrollDetail } from './useScrollDetail'

export interface UseExposureOptions {
  onExpose: () => void
  onHide?: OnHide
  exposeFactor?: number
  registry?: RecheckRegistry
  fireOnce?: boolean
}

export interface UseExposureReturn {
  visible: Readonly<Ref<boolean>>
  recheck: () => void
  tracker: ExposureTracker
}

/**
 * Track exposure of `target` inside the nearest ScrollDetailProvider.
 * Subscribes after mount and throws through Vue's error handling when no
 * provider is found.
 */
export function useExposure(
  target: MaybeRefOrGetter<HTMLElement | null | undefined>,
  options: UseExposureOptions
): UseExposureReturn {
  const visible = ref(false)
  const scrollDetail = injectScrollDetail()

  const geometry = createDomGeometry(target, () => scrollDetail?.container(), {
    axis: scrollDetail?.axis,
    pinnedExtent: scrollDetail?.pinnedExtent
  })

  const tracker = new ExposureTracker(scrollDetail?.channel, geometry, {
    exposeFactor: options.exposeFactor,
    registry: options.registry,
    fireOnce: options.fireOnce,
    onExpose: options.onExpose,
    onHide: options.onHide,
    onStateChange: (state) => {
      visible.value = state === 'visible'
    }
  })

  onMounted(() => tracker.subscribe())
  onBeforeUnmount(() => tracker.dispose())

  return {
    visible: readonly(visible),
    recheck: () => tracker.recheckExposeState(),
    tracker
  }
}
