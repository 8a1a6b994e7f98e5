/**
 * CirclePackLayout - nested circles, leaf area proportional to course count
 *
 * Focusing a subject centres the view on its circle and scales it to fill
 * the shorter side of the viewport.
 */

import { pack } from 'd3-hierarchy'
import type { CourseTreeNode } from '../types'
import { debug } from '../utils/debug'
import type {
  CirclePackLayoutResult,
  LayoutBounds,
  LayoutFocus,
  LayoutStrategy,
  PackedCircle
} from './LayoutStrategy'
import { courseHierarchy, findFocusNode, focusMembers, IDENTITY_VIEW, radialBase } from './radialCommon'

const PACK_PADDING = 3

export function computeCirclePackLayout(
  tree: CourseTreeNode,
  bounds: LayoutBounds,
  focus: LayoutFocus
): CirclePackLayoutResult {
  const { width, height } = bounds
  const root = courseHierarchy(tree)
  if (width <= 0 || height <= 0 || !root.value) {
    return { kind: 'circle-pack', bounds, circles: [], view: IDENTITY_VIEW }
  }

  const laidOut = pack<CourseTreeNode>()
    .size([width, height])
    .padding(PACK_PADDING)(root)

  const focusNode = findFocusNode(laidOut, focus)
  const members = focusMembers(focusNode)

  const circles: PackedCircle[] = laidOut.descendants().map(node => ({
    ...radialBase(node, members),
    x: node.x,
    y: node.y,
    r: node.r
  }))

  const k = focusNode.r > 0 ? Math.min(width, height) / (2 * focusNode.r) : 1
  const view = {
    x: width / 2 - focusNode.x * k,
    y: height / 2 - focusNode.y * k,
    k,
    rotate: 0
  }

  debug.layout(`Circle pack focus=${focusNode.data.name}: ${circles.length} circles, k=${k.toFixed(2)}`)
  return { kind: 'circle-pack', bounds, circles, view }
}

export const circlePackLayout: LayoutStrategy<CirclePackLayoutResult> = {
  kind: 'circle-pack',
  computeLayout: computeCirclePackLayout
}
