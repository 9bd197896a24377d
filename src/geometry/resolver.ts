import { FALLBACK_VIEWPORT_SIZE } from '../constants/exposure'
import type { Axis, BoxNode, ExposureGeometry, GrowthDirection, LayoutNode, Rect, SliverNode, ViewportNode } from '../types'
import { applyGrowthDirectionToAxisDirection, axisOf, mainAxisSize } from './layoutTree'

/**
 * Geometry Resolver
 *
 * Answers the three questions the exposure tracker asks on every scroll event:
 * - at which scroll offset the element's leading edge meets the viewport's leading edge
 * - the element's extent along the scroll axis
 * - the viewport's extent along the scroll axis
 *
 * Every query returns a default instead of throwing when the tree is not laid
 * out or the element is detached; that is the normal state of a first frame.
 */

export function findScrollableAncestor(node: LayoutNode): ViewportNode | null {
  let current = node.parent
  while (current) {
    if (current.kind === 'viewport') return current
    current = current.parent
  }
  return null
}

/** Scroll offset of `offsetWithin` inside `sliver`, in the viewport's scroll space */
export function scrollOffsetOf(viewport: ViewportNode, sliver: SliverNode, offsetWithin: number): number {
  const index = viewport.slivers.indexOf(sliver)
  let offsetToChild = 0

  if (sliver.constraints?.growthDirection === 'reverse') {
    for (let i = viewport.center - 1; i > index; i--) {
      offsetToChild -= viewport.slivers[i].geometry?.scrollExtent ?? 0
    }
    return offsetToChild - offsetWithin
  }

  for (let i = viewport.center; i < index; i++) {
    offsetToChild += viewport.slivers[i].geometry?.scrollExtent ?? 0
  }
  return offsetToChild + offsetWithin
}

/** Total leading space pinned by slivers laid out before `sliver` in its growth direction */
export function maxScrollObstructionExtentBefore(viewport: ViewportNode, sliver: SliverNode): number {
  const index = viewport.slivers.indexOf(sliver)
  let pinnedExtent = 0

  if (sliver.constraints?.growthDirection === 'reverse') {
    for (let i = viewport.center - 1; i > index; i--) {
      pinnedExtent += viewport.slivers[i].geometry?.maxScrollObstructionExtent ?? 0
    }
    return pinnedExtent
  }

  for (let i = viewport.center; i < index; i++) {
    pinnedExtent += viewport.slivers[i].geometry?.maxScrollObstructionExtent ?? 0
  }
  return pinnedExtent
}

const paintBounds = (node: BoxNode | SliverNode): Rect | null => {
  if (node.kind === 'box') {
    return node.size ? { left: 0, top: 0, width: node.size.width, height: node.size.height } : null
  }
  if (!node.geometry || !node.constraints) return null
  const { scrollExtent } = node.geometry
  const { crossAxisExtent } = node.constraints
  return axisOf(node.constraints.axisDirection) === 'horizontal'
    ? { left: 0, top: 0, width: scrollExtent, height: crossAxisExtent }
    : { left: 0, top: 0, width: crossAxisExtent, height: scrollExtent }
}

/** Translate `rect` from `node`'s space into `ancestor`'s space; only boxes sit between them */
const transformRectTo = (node: LayoutNode, ancestor: BoxNode, rect: Rect): Rect => {
  let left = rect.left
  let top = rect.top
  let current: LayoutNode | null = node
  while (current && current !== ancestor) {
    if (current.kind === 'box') {
      left += current.offset.dx
      top += current.offset.dy
    }
    current = current.parent
  }
  return { left, top, width: rect.width, height: rect.height }
}

/**
 * Scroll offset that places `target` at `alignment` within its nearest viewport
 * (0 aligns the leading edges, 1 the trailing edges).
 *
 * Returns +Infinity / -Infinity when the target lives in pinned content that
 * can never leave the leading edge, and null when it cannot be resolved.
 */
export function getOffsetToReveal(target: LayoutNode, alignment: number): number | null {
  if (target.kind === 'viewport') return null
  const viewport = findScrollableAncestor(target)
  if (!viewport || !viewport.size) return null
  const axis = axisOf(viewport.axisDirection)

  // Walk to the viewport. `child` ends as the outermost sliver, `pivot` as the
  // outermost box; below a box, sliver offsets restart from zero.
  let leadingScrollOffset = 0
  let child: BoxNode | SliverNode = target
  let pivot: BoxNode | null = null
  let onlySlivers = target.kind === 'sliver'

  while (child.parent !== viewport) {
    const parent: LayoutNode | null = child.parent
    if (!parent || parent.kind === 'viewport') return null
    if (child.kind === 'box') {
      pivot = child
    }
    switch (parent.kind) {
      case 'sliver':
        leadingScrollOffset += child.layoutOffset ?? 0
        break
      case 'box':
        onlySlivers = false
        leadingScrollOffset = 0
        break
    }
    child = parent
  }

  let rectLocal: Rect
  let pivotExtent: number
  let growthDirection: GrowthDirection
  const bounds = paintBounds(target)
  if (!bounds) return null

  if (pivot) {
    const pivotParent = pivot.parent
    if (!pivotParent || pivotParent.kind !== 'sliver' || !pivotParent.constraints || !pivot.size) return null
    growthDirection = pivotParent.constraints.growthDirection
    pivotExtent = mainAxisSize(pivot.size, axis)
    rectLocal = transformRectTo(target, pivot, bounds)
  } else if (onlySlivers && target.kind === 'sliver' && target.constraints && target.geometry) {
    growthDirection = target.constraints.growthDirection
    pivotExtent = target.geometry.scrollExtent
    rectLocal = bounds
  } else {
    return viewport.pixels
  }

  if (child.kind !== 'sliver') return viewport.pixels
  const sliver = child
  const { geometry: sliverGeometry, constraints: sliverConstraints } = sliver
  if (!sliverGeometry || !sliverConstraints) return viewport.pixels

  // Scroll offset of the rect within the outermost sliver
  let targetMainAxisExtent: number
  switch (applyGrowthDirectionToAxisDirection(viewport.axisDirection, growthDirection)) {
    case 'up':
      leadingScrollOffset += pivotExtent - (rectLocal.top + rectLocal.height)
      targetMainAxisExtent = rectLocal.height
      break
    case 'right':
      leadingScrollOffset += rectLocal.left
      targetMainAxisExtent = rectLocal.width
      break
    case 'down':
      leadingScrollOffset += rectLocal.top
      targetMainAxisExtent = rectLocal.height
      break
    case 'left':
      leadingScrollOffset += pivotExtent - (rectLocal.left + rectLocal.width)
      targetMainAxisExtent = rectLocal.width
      break
  }

  // A non-protruding rect inside an obstructing sliver stays pinned to the leading edge
  const isPinned = sliverGeometry.maxScrollObstructionExtent > 0 && leadingScrollOffset >= 0

  leadingScrollOffset = scrollOffsetOf(viewport, sliver, leadingScrollOffset)
  const extentOfPinnedSlivers = maxScrollObstructionExtentBefore(viewport, sliver)

  switch (sliverConstraints.growthDirection) {
    case 'forward':
      if (isPinned && alignment <= 0) return Number.POSITIVE_INFINITY
      leadingScrollOffset -= extentOfPinnedSlivers
      break
    case 'reverse':
      if (isPinned && alignment >= 1) return Number.NEGATIVE_INFINITY
      // At `leadingScrollOffset` a reverse child sits just past the leading edge
      leadingScrollOffset -= axis === 'vertical' ? bounds.height : bounds.width
      break
  }

  const mainAxisExtent = mainAxisSize(viewport.size, axis) - extentOfPinnedSlivers
  return leadingScrollOffset - (mainAxisExtent - targetMainAxisExtent) * alignment
}

export function resolveExposureOffset(target: LayoutNode): number {
  return getOffsetToReveal(target, 0) ?? 0
}

export function elementExtent(node: LayoutNode, axis: Axis): number {
  switch (node.kind) {
    case 'box':
    case 'viewport':
      return node.size ? mainAxisSize(node.size, axis) : 0
    case 'sliver':
      if (!node.constraints) return 0
      return axisOf(node.constraints.axisDirection) === axis
        ? node.geometry?.scrollExtent ?? 0
        : node.constraints.crossAxisExtent
  }
}

export function viewportExtent(node: LayoutNode, axis: Axis): number {
  const size = findScrollableAncestor(node)?.size ?? FALLBACK_VIEWPORT_SIZE
  return mainAxisSize(size, axis)
}

/**
 * Adapt a layout tree node to the tracker's geometry contract.
 * A node with no viewport above it counts as unmounted.
 */
export function createLayoutGeometry(node: LayoutNode): ExposureGeometry {
  return {
    isMounted: () => findScrollableAncestor(node) !== null,
    exposureOffset: () => resolveExposureOffset(node),
    elementExtent: (axis) => elementExtent(node, axis),
    viewportExtent: (axis) => viewportExtent(node, axis)
  }
}
