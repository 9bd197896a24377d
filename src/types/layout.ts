import type { AxisDirection, GrowthDirection } from './core'

export interface Size {
  width: number
  height: number
}

export interface Offset {
  dx: number
  dy: number
}

export interface Rect {
  left: number
  top: number
  width: number
  height: number
}

export interface SliverConstraints {
  growthDirection: GrowthDirection
  axisDirection: AxisDirection
  crossAxisExtent: number
}

export interface SliverGeometry {
  scrollExtent: number
  /** Leading space this sliver keeps covering once scrolled (pinned headers) */
  maxScrollObstructionExtent: number
}

/**
 * Regular box-model node. `size` stays undefined until laid out.
 */
export interface BoxNode {
  kind: 'box'
  parent: LayoutNode | null
  children: LayoutNode[]
  size?: Size
  /** Paint offset within the parent box */
  offset: Offset
  /** Scroll offset within the parent sliver */
  layoutOffset?: number
}

/**
 * Lazily laid out node whose children are positioned by scroll offset
 * relative to it rather than by a paint transform.
 */
export interface SliverNode {
  kind: 'sliver'
  parent: LayoutNode | null
  children: LayoutNode[]
  constraints?: SliverConstraints
  geometry?: SliverGeometry
  layoutOffset?: number
}

/**
 * Scrollable boundary. Slivers before `center` grow in reverse.
 */
export interface ViewportNode {
  kind: 'viewport'
  parent: LayoutNode | null
  axisDirection: AxisDirection
  size?: Size
  /** Current scroll offset */
  pixels: number
  slivers: SliverNode[]
  center: number
}

export type LayoutNode = BoxNode | SliverNode | ViewportNode
