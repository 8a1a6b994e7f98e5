/**
 * SunburstLayout - d3 partition in polar coordinates
 *
 * Angular span is proportional to course count, ring index to depth.
 * Focusing a subject re-maps angles so the subject fills the full circle
 * and shifts every ring inward by the subject's depth; the subject itself
 * becomes the centre disc.
 */

import { partition } from 'd3-hierarchy'
import type { CourseTreeNode } from '../types'
import { debug } from '../utils/debug'
import type {
  LayoutBounds,
  LayoutFocus,
  LayoutStrategy,
  SunburstArc,
  SunburstLayoutResult
} from './LayoutStrategy'
import { courseHierarchy, findFocusNode, focusMembers, radialBase } from './radialCommon'

const TAU = 2 * Math.PI
const OUTER_MARGIN = 8

const clamp01 = (value: number) => Math.max(0, Math.min(1, value))

export function computeSunburstLayout(
  tree: CourseTreeNode,
  bounds: LayoutBounds,
  focus: LayoutFocus
): SunburstLayoutResult {
  const { width, height } = bounds
  const view = { x: width / 2, y: height / 2, k: 1, rotate: 0 }
  const root = courseHierarchy(tree)
  if (width <= 0 || height <= 0 || !root.value) {
    return { kind: 'sunburst', bounds, arcs: [], view }
  }

  // x in [0, 1] of the full turn, y in depth units
  const laidOut = partition<CourseTreeNode>().size([1, root.height + 1])(root)
  const focusNode = findFocusNode(laidOut, focus)
  const members = focusMembers(focusNode)

  const radius = Math.max(0, Math.min(width, height) / 2 - OUTER_MARGIN)
  const ring = radius / Math.max(1, root.height + 1 - focusNode.depth)
  const span = focusNode.x1 - focusNode.x0 || 1

  const arcs: SunburstArc[] = laidOut.descendants().map(node => ({
    ...radialBase(node, members),
    startAngle: clamp01((node.x0 - focusNode.x0) / span) * TAU,
    endAngle: clamp01((node.x1 - focusNode.x0) / span) * TAU,
    innerRadius: Math.max(0, node.y0 - focusNode.depth) * ring,
    outerRadius: Math.max(0, node.y1 - focusNode.depth) * ring
  }))

  debug.layout(`Sunburst r=${radius.toFixed(1)} focus=${focusNode.data.name}: ${arcs.length} arcs`)
  return { kind: 'sunburst', bounds, arcs, view }
}

/** Arcs with a non-empty sweep and thickness; the rest are hidden by zoom */
export function isArcVisible(arc: SunburstArc): boolean {
  return arc.endAngle > arc.startAngle && arc.outerRadius > arc.innerRadius
}

export const sunburstLayout: LayoutStrategy<SunburstLayoutResult> = {
  kind: 'sunburst',
  computeLayout: computeSunburstLayout
}
