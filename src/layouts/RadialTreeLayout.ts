/**
 * RadialTreeLayout - D3 cluster-based radial tree
 *
 * Uses D3's cluster layout for angular positions (leaves evenly spread,
 * cousins separated more than siblings) and overrides the radius with a
 * fixed ring per depth. Focusing a subject rotates the view so the subject
 * points up, then fits its subtree to the viewport.
 */

import { cluster } from 'd3-hierarchy'
import type { CourseTreeNode } from '../types'
import { debug } from '../utils/debug'
import type {
  LayoutBounds,
  LayoutFocus,
  LayoutStrategy,
  RadialTreeLayoutResult,
  RadialTreeLink,
  RadialTreeNode
} from './LayoutStrategy'
import { courseHierarchy, findFocusNode, fitTransform, focusMembers, radialBase } from './radialCommon'

// Room kept outside the outermost ring for course labels
const LABEL_MARGIN = 72

export function computeRadialTreeLayout(
  tree: CourseTreeNode,
  bounds: LayoutBounds,
  focus: LayoutFocus
): RadialTreeLayoutResult {
  const { width, height } = bounds
  const root = courseHierarchy(tree)
  if (width <= 0 || height <= 0 || !root.value) {
    return { kind: 'radial-tree', bounds, nodes: [], links: [], view: fitTransform([], width, height) }
  }

  const half = Math.min(width, height) / 2
  const radius = Math.max(0, half > LABEL_MARGIN * 2 ? half - LABEL_MARGIN : half * 0.7)
  const ringGap = radius / Math.max(1, root.height)

  const laidOut = cluster<CourseTreeNode>()
    .size([2 * Math.PI, radius])
    .separation((a, b) => (a.parent === b.parent ? 1 : 2) / Math.max(1, a.depth))(root)

  const focusNode = findFocusNode(laidOut, focus)
  const members = focusMembers(focusNode)

  const nodes: RadialTreeNode[] = laidOut.descendants().map(node => {
    // D3's x is the angle (0 at top once rotated by -π/2); radius follows depth
    const nodeRadius = node.depth * ringGap
    const angle = node.x - Math.PI / 2
    return {
      ...radialBase(node, members),
      angle: node.x,
      radius: nodeRadius,
      x: nodeRadius * Math.cos(angle),
      y: nodeRadius * Math.sin(angle)
    }
  })

  const byKey = new Map(nodes.map(n => [n.key, n]))
  const links: RadialTreeLink[] = laidOut.links().map(link => {
    const source = byKey.get(link.source.data.key)
    const target = byKey.get(link.target.data.key)
    return {
      source: link.source.data.key,
      target: link.target.data.key,
      dimmed: Boolean(source?.dimmed || target?.dimmed)
    }
  })

  const focused = focusNode !== laidOut
  const rotate = focused ? -focusNode.x : 0
  const fitKeys = new Set(focusNode.descendants().map(n => n.data.key))
  const view = fitTransform(
    nodes.filter(n => fitKeys.has(n.key)),
    width,
    height,
    { rotate }
  )

  debug.layout(`Radial tree r=${radius.toFixed(1)} focus=${focusNode.data.name}: ${nodes.length} nodes`)
  return { kind: 'radial-tree', bounds, nodes, links, view }
}

export const radialTreeLayout: LayoutStrategy<RadialTreeLayoutResult> = {
  kind: 'radial-tree',
  computeLayout: computeRadialTreeLayout
}
