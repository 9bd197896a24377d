import type {
  Axis,
  AxisDirection,
  BoxNode,
  GrowthDirection,
  LayoutNode,
  Offset,
  Size,
  SliverNode,
  ViewportNode
} from '../types'

export const axisOf = (direction: AxisDirection): Axis =>
  direction === 'up' || direction === 'down' ? 'vertical' : 'horizontal'

export const mainAxisSize = (size: Size, axis: Axis): number =>
  axis === 'vertical' ? size.height : size.width

export const crossAxisSize = (size: Size, axis: Axis): number =>
  axis === 'vertical' ? size.width : size.height

const flipAxisDirection = (direction: AxisDirection): AxisDirection => {
  switch (direction) {
    case 'up': return 'down'
    case 'down': return 'up'
    case 'left': return 'right'
    case 'right': return 'left'
  }
}

/** Direction in which content grows once the sliver's growth direction is applied */
export const applyGrowthDirectionToAxisDirection = (
  direction: AxisDirection,
  growth: GrowthDirection
): AxisDirection => growth === 'forward' ? direction : flipAxisDirection(direction)

type ChildNode = BoxNode | SliverNode | ViewportNode

const adopt = (parent: BoxNode | SliverNode, children: ChildNode[]): void => {
  children.forEach(child => {
    if (child.parent) detach(child)
    child.parent = parent
    parent.children.push(child)
  })
}

export interface BoxInit {
  size?: Size
  offset?: Offset
  layoutOffset?: number
}

export function createBox(init: BoxInit = {}, children: ChildNode[] = []): BoxNode {
  const node: BoxNode = {
    kind: 'box',
    parent: null,
    children: [],
    size: init.size,
    offset: init.offset ?? { dx: 0, dy: 0 },
    layoutOffset: init.layoutOffset
  }
  adopt(node, children)
  return node
}

export interface SliverInit {
  /** Omit to model a sliver that has not been laid out */
  scrollExtent?: number
  maxScrollObstructionExtent?: number
  layoutOffset?: number
}

export function createSliver(init: SliverInit = {}, children: ChildNode[] = []): SliverNode {
  const node: SliverNode = {
    kind: 'sliver',
    parent: null,
    children: [],
    geometry: init.scrollExtent === undefined
      ? undefined
      : { scrollExtent: init.scrollExtent, maxScrollObstructionExtent: init.maxScrollObstructionExtent ?? 0 },
    layoutOffset: init.layoutOffset
  }
  adopt(node, children)
  return node
}

export interface ViewportInit {
  axisDirection?: AxisDirection
  size?: Size
  pixels?: number
  /** Index of the first forward-growing sliver */
  center?: number
}

/**
 * Build a viewport and lay its slivers out: slivers before `center` grow in
 * reverse, the rest forward. Constraints propagate to nested slivers.
 */
export function createViewport(init: ViewportInit, slivers: SliverNode[]): ViewportNode {
  const axisDirection = init.axisDirection ?? 'down'
  const center = Math.min(Math.max(init.center ?? 0, 0), slivers.length)
  const node: ViewportNode = {
    kind: 'viewport',
    parent: null,
    axisDirection,
    size: init.size,
    pixels: init.pixels ?? 0,
    slivers: [],
    center
  }

  const crossAxisExtent = init.size ? crossAxisSize(init.size, axisOf(axisDirection)) : 0
  slivers.forEach((sliver, index) => {
    if (sliver.parent) detach(sliver)
    sliver.parent = node
    node.slivers.push(sliver)
    applyConstraints(sliver, {
      growthDirection: index < center ? 'reverse' : 'forward',
      axisDirection,
      crossAxisExtent
    })
  })

  return node
}

function applyConstraints(sliver: SliverNode, constraints: NonNullable<SliverNode['constraints']>): void {
  sliver.constraints = { ...constraints }
  sliver.children.forEach(child => {
    if (child.kind === 'sliver') applyConstraints(child, constraints)
  })
}

/** Remove a node from its parent; a detached subtree no longer resolves geometry */
export function detach(node: LayoutNode): void {
  const parent = node.parent
  if (!parent) return

  if (parent.kind === 'viewport') {
    if (node.kind === 'sliver') {
      const index = parent.slivers.indexOf(node)
      if (index !== -1) {
        parent.slivers.splice(index, 1)
        if (index < parent.center) parent.center -= 1
      }
    }
  } else {
    const index = parent.children.indexOf(node)
    if (index !== -1) parent.children.splice(index, 1)
  }

  node.parent = null
}
