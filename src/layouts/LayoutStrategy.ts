/**
 * LayoutStrategy - pluggable spatial encodings of the coursework tree
 *
 * Every strategy maps the same normalized tree, container bounds and focus
 * to a LayoutResult. Results are plain data (no DOM), recomputed from
 * scratch whenever size or focus changes; identical inputs yield identical
 * output.
 */

import type { LayoutKind } from '../config'
import type { CourseTreeNode, TreeNodeKind, ViewState } from '../types'

export interface LayoutBounds {
  width: number
  height: number
}

export type LayoutFocus = Pick<ViewState, 'focusedSubject'>

export interface Rect {
  x0: number
  y0: number
  x1: number
  y1: number
}

/** View transform applied to the diagram group: translate(x,y) scale(k) rotate(rotate) */
export interface ViewTransform {
  x: number
  y: number
  k: number
  rotate: number  // radians, clockwise on screen
}

// ============================================
// Treemap
// ============================================

export interface SubjectRegion extends Rect {
  name: string
  headerHeight: number
  courseCount: number
}

export interface CourseTile extends Rect {
  id: string
  subject: string
}

export interface TreemapLayoutResult {
  kind: 'treemap'
  bounds: LayoutBounds
  subjects: SubjectRegion[]
  tiles: CourseTile[]
}

// ============================================
// Radial variants
// ============================================

/** Fields shared by every positioned node of the radial variants */
export interface RadialNodeBase {
  key: string
  name: string
  kind: TreeNodeKind
  depth: number
  courseId: string | null
  category: string | null
  leafCount: number
  dimmed: boolean
}

export interface SunburstArc extends RadialNodeBase {
  startAngle: number
  endAngle: number
  innerRadius: number
  outerRadius: number
}

export interface SunburstLayoutResult {
  kind: 'sunburst'
  bounds: LayoutBounds
  arcs: SunburstArc[]
  view: ViewTransform
}

export interface RadialTreeNode extends RadialNodeBase {
  angle: number   // radians, 0 = top, clockwise
  radius: number
  x: number
  y: number
}

export interface RadialTreeLink {
  source: string
  target: string
  dimmed: boolean
}

export interface RadialTreeLayoutResult {
  kind: 'radial-tree'
  bounds: LayoutBounds
  nodes: RadialTreeNode[]
  links: RadialTreeLink[]
  view: ViewTransform
}

export interface PackedCircle extends RadialNodeBase {
  x: number
  y: number
  r: number
}

export interface CirclePackLayoutResult {
  kind: 'circle-pack'
  bounds: LayoutBounds
  circles: PackedCircle[]
  view: ViewTransform
}

export type LayoutResult =
  | TreemapLayoutResult
  | SunburstLayoutResult
  | RadialTreeLayoutResult
  | CirclePackLayoutResult

export interface LayoutStrategy<R extends LayoutResult = LayoutResult> {
  readonly kind: LayoutKind
  computeLayout(tree: CourseTreeNode, bounds: LayoutBounds, focus: LayoutFocus): R
}
