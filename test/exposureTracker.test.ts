import { beforeEach, describe, expect, it, vi } from 'vitest'
import { ScrollEventChannel } from '../src/channel/scrollEventChannel'
import { ExposureConfigurationError } from '../src/errors'
import { createBox, createSliver, createViewport } from '../src/geometry/layoutTree'
import { createLayoutGeometry } from '../src/geometry/resolver'
import { ExposureRegistry } from '../src/registry'
import { ExposureTracker } from '../src/tracker/exposureTracker'
import type { ExposureGeometry, ExposureTrackerOptions } from '../src/types'

/** viewport 800, element 200 at offset 500 unless overridden */
function fixedGeometry(overrides: Partial<Record<'offset' | 'element' | 'viewport', number>> = {}): ExposureGeometry & { mounted: boolean } {
  return {
    mounted: true,
    isMounted() { return this.mounted },
    exposureOffset: () => overrides.offset ?? 500,
    elementExtent: () => overrides.element ?? 200,
    viewportExtent: () => overrides.viewport ?? 800
  }
}

function setup(options: Partial<ExposureTrackerOptions> = {}, geometry = fixedGeometry()) {
  const channel = new ScrollEventChannel()
  const onExpose = vi.fn()
  const onHide = vi.fn()
  let clock = 1_000
  const tracker = new ExposureTracker(channel, geometry, {
    onExpose,
    onHide,
    now: () => clock,
    ...options
  })
  tracker.subscribe()

  const scrollTo = (scrollOffset: number) =>
    channel.publish({ kind: 'update', scrollOffset, axis: 'vertical' })
  const advance = (ms: number) => { clock += ms }

  return { channel, tracker, onExpose, onHide, scrollTo, advance, geometry }
}

describe('ExposureTracker', () => {
  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {})
  })

  it('starts invisible with the default factor', () => {
    const { tracker } = setup()
    expect(tracker.visibilityState).toBe('invisible')
    expect(tracker.exposeFactor).toBe(0.5)
    expect(tracker.subscribed).toBe(true)
  })

  it('exposes when scrolled to 0 (600 > 0 and 600 < 800)', () => {
    const { tracker, onExpose, scrollTo } = setup()

    scrollTo(0)

    expect(onExpose).toHaveBeenCalledTimes(1)
    expect(onExpose).toHaveBeenCalledWith()
    expect(tracker.visibilityState).toBe('visible')
  })

  it('hides at 750 and reports the dwell time', () => {
    const { tracker, onHide, scrollTo, advance } = setup()

    scrollTo(0)
    advance(3_000)
    scrollTo(750)

    expect(onHide).toHaveBeenCalledTimes(1)
    expect(onHide).toHaveBeenCalledWith(3_000)
    expect(tracker.visibilityState).toBe('invisible')
  })

  it('fires once per contiguous visible run', () => {
    const { onExpose, onHide, scrollTo } = setup()

    scrollTo(0)
    scrollTo(100)
    scrollTo(200)
    expect(onExpose).toHaveBeenCalledTimes(1)

    scrollTo(750)
    scrollTo(900)
    expect(onHide).toHaveBeenCalledTimes(1)

    scrollTo(300)
    expect(onExpose).toHaveBeenCalledTimes(2)
  })

  it('hides when the threshold edge falls below the viewport', () => {
    const { onHide, scrollTo } = setup()

    scrollTo(0)
    // 500 + 100 > -300 + 800
    scrollTo(-300)

    expect(onHide).toHaveBeenCalledTimes(1)
  })

  it('stays hidden while the element is off screen', () => {
    const { onExpose, scrollTo } = setup()

    scrollTo(2_000)
    scrollTo(-1_000)

    expect(onExpose).not.toHaveBeenCalled()
  })

  it('clamps a factor below the range to 0.1', () => {
    // f = 0.1: 500 + 180 = 680 > 685 is false; unclamped 0.05 would expose
    const { tracker, onExpose, scrollTo } = setup({ exposeFactor: 0.05 })

    scrollTo(685)

    expect(tracker.exposeFactor).toBe(0.1)
    expect(onExpose).not.toHaveBeenCalled()
  })

  it('behaves like 0.9 when asked for 0.95', () => {
    // f = 0.9: 520 > 515 and 680 < 1315; unclamped 0.95 would need 510 > 515
    const clamped = setup({ exposeFactor: 0.95 })
    const explicit = setup({ exposeFactor: 0.9 })

    clamped.scrollTo(515)
    explicit.scrollTo(515)

    expect(clamped.tracker.exposeFactor).toBe(0.9)
    expect(clamped.onExpose).toHaveBeenCalledTimes(1)
    expect(explicit.onExpose).toHaveBeenCalledTimes(1)
  })

  it('stops for good after the first exposure when fireOnce is set', () => {
    const { channel, tracker, onExpose, onHide, scrollTo } = setup({ fireOnce: true })

    scrollTo(0)
    scrollTo(750)
    scrollTo(0)
    tracker.recheckExposeState()
    tracker.subscribe()
    scrollTo(750)

    expect(onExpose).toHaveBeenCalledTimes(1)
    expect(onHide).not.toHaveBeenCalled()
    expect(channel.listenerCount).toBe(0)
  })

  it('re-exposes after a recheck even though it was already visible', () => {
    const { tracker, onExpose, scrollTo } = setup()

    scrollTo(0)
    tracker.recheckExposeState()

    expect(onExpose).toHaveBeenCalledTimes(2)
    expect(tracker.visibilityState).toBe('visible')

    scrollTo(10)
    expect(onExpose).toHaveBeenCalledTimes(2)
  })

  it('keeps a single subscription across rechecks', () => {
    const { channel, tracker } = setup()

    tracker.recheckExposeState()
    tracker.recheckExposeState()

    expect(channel.listenerCount).toBe(1)
  })

  it('ignores events while the element is unmounted', () => {
    const { onExpose, scrollTo, geometry } = setup()
    geometry.mounted = false

    scrollTo(0)

    expect(onExpose).not.toHaveBeenCalled()
  })

  it('stops evaluating once disposed', () => {
    const { channel, tracker, onExpose, scrollTo } = setup()

    tracker.dispose()
    tracker.dispose()
    scrollTo(0)

    expect(onExpose).not.toHaveBeenCalled()
    expect(channel.listenerCount).toBe(0)
  })

  it('registers with a registry and leaves it on dispose', () => {
    const registry = new ExposureRegistry()
    const { tracker } = setup({ registry })

    expect(registry.has(tracker)).toBe(true)
    tracker.dispose()
    expect(registry.has(tracker)).toBe(false)
  })

  it('raises a configuration error without a channel and never fires', () => {
    const onExpose = vi.fn()
    const tracker = new ExposureTracker(undefined, fixedGeometry(), { onExpose })

    expect(() => tracker.subscribe()).toThrow(ExposureConfigurationError)
    expect(() => tracker.subscribe()).toThrow(/ScrollDetailProvider/)
    expect(onExpose).not.toHaveBeenCalled()
  })

  it('joins the registry only once subscribed to a channel', () => {
    const registry = new ExposureRegistry()
    const orphan = new ExposureTracker(undefined, fixedGeometry(), { onExpose: vi.fn(), registry })
    expect(registry.has(orphan)).toBe(false)

    expect(() => orphan.subscribe()).toThrow(ExposureConfigurationError)
    expect(registry.size).toBe(0)

    const { tracker } = setup({ registry })
    expect(() => registry.recheckAll()).not.toThrow()
    expect(registry.has(tracker)).toBe(true)
  })

  it('stays registered once across a recheck', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const registry = new ExposureRegistry()
    const { tracker } = setup({ registry })

    tracker.recheckExposeState()

    expect(registry.size).toBe(1)
    expect(console.warn).not.toHaveBeenCalled()
  })

  it('reports every state change, including the recheck reset', () => {
    const onStateChange = vi.fn()
    const geometry = fixedGeometry()
    const { tracker, onHide, scrollTo } = setup({ onStateChange }, geometry)

    scrollTo(0)
    geometry.mounted = false
    tracker.recheckExposeState()
    geometry.mounted = true
    scrollTo(750)

    expect(onStateChange.mock.calls).toEqual([['visible'], ['invisible']])
    expect(onHide).not.toHaveBeenCalled()
    expect(tracker.visibilityState).toBe('invisible')
  })

  it('tracks a node of a layout tree', () => {
    const target = createBox({ size: { width: 400, height: 200 }, layoutOffset: 500 })
    createViewport({ size: { width: 400, height: 800 } }, [createSliver({ scrollExtent: 2000 }, [target])])
    const { onExpose, onHide, scrollTo } = setup({}, Object.assign(createLayoutGeometry(target), { mounted: true }))

    scrollTo(0)
    scrollTo(750)

    expect(onExpose).toHaveBeenCalledTimes(1)
    expect(onHide).toHaveBeenCalledTimes(1)
  })
})
