import { defineComponent, h, ref, watch, type PropType } from 'vue'
import { useExposure } from '../composables/useExposure'
import { EXPOSE_FACTOR } from '../constants/exposure'
import type { ExposureRegistry } from '../registry'

/**
 * Wraps its slot and emits `expose` when it crosses the visibility threshold
 * and `hide` (with the dwell time in ms) when it leaves again.
 *
 * `exposeFactor`, `fireOnce` and `registry` configure the tracker at setup
 * and are not reactive; give the component a new `key` to change them.
 */
export const Exposure = defineComponent({
  name: 'Exposure',
  props: {
    tag: { type: String, default: 'div' },
    exposeFactor: { type: Number, default: EXPOSE_FACTOR.DEFAULT },
    registry: { type: Object as PropType<ExposureRegistry>, default: undefined },
    fireOnce: { type: Boolean, default: false }
  },
  emits: {
    expose: () => true,
    hide: (duration: number) => typeof duration === 'number'
  },
  setup(props, { slots, emit, expose }) {
    const root = ref<HTMLElement>()

    const { visible, recheck } = useExposure(root, {
      exposeFactor: props.exposeFactor,
      registry: props.registry,
      fireOnce: props.fireOnce,
      onExpose: () => emit('expose'),
      onHide: (duration) => emit('hide', duration)
    })

    // The tracker is built once in setup; later changes to these props are not applied
    watch(
      () => [props.exposeFactor, props.fireOnce, props.registry],
      () => console.warn('[Exposure] exposeFactor, fireOnce and registry are read once at setup; remount to apply changes')
    )

    expose({ visible, recheck })

    return () => h(props.tag, { ref: root }, slots.default?.({ visible: visible.value }))
  }
})
