import { defineComponent, h, ref, type PropType } from 'vue'
import { provideScrollDetail } from '../composables/useScrollDetail'
import { SETTLE_DELAY_MS, START_POSITION_DELAY_MS } from '../constants/exposure'
import type { Axis, ScrollDeliveryMode } from '../types'

/**
 * Scroll container that publishes its scroll events to every <Exposure>
 * rendered inside it.
 */
export const ScrollDetailProvider = defineComponent({
  name: 'ScrollDetailProvider',
  props: {
    tag: { type: String, default: 'div' },
    axis: { type: String as PropType<Axis>, default: 'vertical' },
    deliveryMode: { type: String as PropType<ScrollDeliveryMode>, default: 'everyUpdate' },
    settleDelay: { type: Number, default: SETTLE_DELAY_MS },
    startDelay: { type: Number, default: START_POSITION_DELAY_MS },
    pinnedExtent: { type: Number, default: 0 }
  },
  setup(props, { slots }) {
    const root = ref<HTMLElement>()

    // Read once: a region's channel keeps its configuration for its lifetime
    provideScrollDetail(root, {
      axis: props.axis,
      deliveryMode: props.deliveryMode,
      settleDelay: props.settleDelay,
      startDelay: props.startDelay,
      pinnedExtent: props.pinnedExtent
    })

    return () => h(props.tag, { ref: root }, slots.default?.())
  }
})
