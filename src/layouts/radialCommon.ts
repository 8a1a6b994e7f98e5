/**
 * Shared helpers for the radial layouts (sunburst, radial tree, circle pack)
 */

import { hierarchy, type HierarchyNode } from 'd3-hierarchy'
import type { CourseTreeNode } from '../types'
import type { LayoutFocus, RadialNodeBase, ViewTransform } from './LayoutStrategy'

/** Number of courses below (or at) a node */
export function countCourses(node: CourseTreeNode): number {
  if (node.kind === 'course') return 1
  return node.children.reduce((sum, child) => sum + countCourses(child), 0)
}

/**
 * Copy of the tree without subjects/groups that hold no courses; those
 * would get zero angular span or radius anyway.
 */
export function pruneEmpty(node: CourseTreeNode): CourseTreeNode {
  if (node.kind === 'course') return node
  return {
    ...node,
    children: node.children
      .filter(child => countCourses(child) > 0)
      .map(pruneEmpty)
  }
}

/** d3 hierarchy over the pruned tree, valued by course count */
export function courseHierarchy(tree: CourseTreeNode): HierarchyNode<CourseTreeNode> {
  return hierarchy(pruneEmpty(tree), d => d.children)
    .sum(d => (d.kind === 'course' ? 1 : 0))
}

/** The focused subject's node, or the root when nothing (matching) is focused */
export function findFocusNode<T extends HierarchyNode<CourseTreeNode>>(root: T, focus: LayoutFocus): T {
  const subject = focus.focusedSubject
  if (!subject) return root
  return root.find(node => node.depth === 1 && node.data.name === subject) ?? root
}

/** Keys on the focus node's ancestor and descendant paths; everything else is dimmed */
export function focusMembers(focusNode: HierarchyNode<CourseTreeNode>): Set<string> {
  const keys = new Set<string>()
  for (const node of focusNode.ancestors()) keys.add(node.data.key)
  for (const node of focusNode.descendants()) keys.add(node.data.key)
  return keys
}

export function radialBase(
  node: HierarchyNode<CourseTreeNode>,
  members: Set<string>
): RadialNodeBase {
  const subject = node.ancestors().find(a => a.depth === 1)
  return {
    key: node.data.key,
    name: node.data.name,
    kind: node.data.kind,
    depth: node.depth,
    courseId: node.data.courseId ?? null,
    category: subject ? subject.data.name : null,
    leafCount: node.value ?? 0,
    dimmed: !members.has(node.data.key)
  }
}

export const IDENTITY_VIEW: ViewTransform = { x: 0, y: 0, k: 1, rotate: 0 }

/** Rotates a point clockwise (screen coordinates, y down) by `angle` radians */
export function rotatePoint(x: number, y: number, angle: number): { x: number; y: number } {
  const cos = Math.cos(angle)
  const sin = Math.sin(angle)
  return { x: x * cos - y * sin, y: x * sin + y * cos }
}

export interface FitOptions {
  padding?: number   // fraction of the viewport kept as margin on each side
  maxScale?: number
  minExtent?: number // smallest bounding-box side considered, in layout units
  rotate?: number
}

/**
 * Transform that fits the given points (after rotation) into the
 * viewport, centred, with a margin and a zoom cap.
 */
export function fitTransform(
  points: Array<{ x: number; y: number }>,
  width: number,
  height: number,
  { padding = 0.05, maxScale = 3, minExtent = 50, rotate = 0 }: FitOptions = {}
): ViewTransform {
  if (points.length === 0) {
    return { x: width / 2, y: height / 2, k: 1, rotate }
  }

  const rotated = points.map(p => rotatePoint(p.x, p.y, rotate))
  const xs = rotated.map(p => p.x)
  const ys = rotated.map(p => p.y)
  const minX = Math.min(...xs)
  const maxX = Math.max(...xs)
  const minY = Math.min(...ys)
  const maxY = Math.max(...ys)

  const boundsWidth = Math.max(maxX - minX, minExtent)
  const boundsHeight = Math.max(maxY - minY, minExtent)
  const centerX = (minX + maxX) / 2
  const centerY = (minY + maxY) / 2

  const scaleX = width * (1 - 2 * padding) / boundsWidth
  const scaleY = height * (1 - 2 * padding) / boundsHeight
  const k = Math.min(scaleX, scaleY, maxScale)

  return {
    x: width / 2 - centerX * k,
    y: height / 2 - centerY * k,
    k,
    rotate
  }
}

/** SVG transform attribute for a view */
export function viewTransformAttr(view: ViewTransform): string {
  const degrees = (view.rotate * 180) / Math.PI
  return `translate(${view.x},${view.y}) scale(${view.k}) rotate(${degrees})`
}
