/**
 * TreemapLayout - subject regions with equal-tile course grids
 *
 * Two steps:
 * 1. Subjects get rectangles from a squarified d3 treemap valued by their
 *    course count (the group level is flattened away).
 * 2. Inside each subject, below a header band, courses are laid out as a
 *    rows × cols grid of equal tiles. Every column count 1..n is scored
 *    and the lowest penalty wins, so the search is linear in the number of
 *    courses.
 *
 * With a subject focused, only that subject is laid out.
 */

import { hierarchy, treemap, treemapSquarify } from 'd3-hierarchy'
import type { CourseTreeNode } from '../types'
import { debug } from '../utils/debug'
import type {
  CourseTile,
  LayoutBounds,
  LayoutFocus,
  LayoutStrategy,
  Rect,
  SubjectRegion,
  TreemapLayoutResult
} from './LayoutStrategy'

export interface TileSize {
  width: number
  height: number
}

export interface TreemapConfig {
  paddingOuter: number
  paddingInner: number
  headerHeight: number
  regionPadding: number   // inset of the tile grid from the region's sides and bottom
  tileGap: number
  targetTile: TileSize
  minTile: TileSize
  maxTile: TileSize
  weights: {
    target: number
    min: number
    max: number
  }
}

export const DEFAULT_TREEMAP_CONFIG: TreemapConfig = {
  paddingOuter: 14,
  paddingInner: 8,
  headerHeight: 28,
  regionPadding: 10,
  tileGap: 6,
  targetTile: { width: 120, height: 56 },
  minTile: { width: 48, height: 26 },
  maxTile: { width: 240, height: 120 },
  weights: { target: 1, min: 6, max: 2 }
}

// Penalties closer than this are ties
const PENALTY_EPSILON = 1e-9

interface FlatSubject {
  name: string
  courseIds: string[]
  children?: FlatSubject[]
}

/**
 * Removes the group level: every course becomes a direct child of its
 * subject. Subjects without courses, and all but the focused subject when
 * one is set, are left out.
 */
export function flattenToSubjects(tree: CourseTreeNode, focusedSubject: string | null): FlatSubject[] {
  const subjects: FlatSubject[] = []
  for (const subject of tree.children) {
    if (focusedSubject && subject.name !== focusedSubject) continue
    const courseIds: string[] = []
    for (const group of subject.children) {
      for (const course of group.children) {
        if (course.courseId) courseIds.push(course.courseId)
      }
    }
    if (courseIds.length > 0) subjects.push({ name: subject.name, courseIds })
  }
  return subjects
}

export interface GridCandidate {
  rows: number
  cols: number
  tileWidth: number
  tileHeight: number
  gapX: number
  gapY: number
  penalty: number
  withinBounds: boolean
}

/**
 * Scores one column count for `count` tiles in a body of the given size.
 * Gaps collapse to zero when the body cannot hold them.
 */
export function scoreGrid(
  count: number,
  cols: number,
  body: TileSize,
  config: TreemapConfig = DEFAULT_TREEMAP_CONFIG
): GridCandidate {
  const rows = Math.ceil(count / cols)
  const gapX = cols > 1 && (cols - 1) * config.tileGap <= body.width ? config.tileGap : 0
  const gapY = rows > 1 && (rows - 1) * config.tileGap <= body.height ? config.tileGap : 0
  const tileWidth = Math.max(0, (body.width - (cols - 1) * gapX) / cols)
  const tileHeight = Math.max(0, (body.height - (rows - 1) * gapY) / rows)

  const { targetTile, minTile, maxTile, weights } = config
  const proximity =
    Math.abs(tileWidth - targetTile.width) / targetTile.width +
    Math.abs(tileHeight - targetTile.height) / targetTile.height
  const underMin =
    Math.max(0, minTile.width - tileWidth) / minTile.width +
    Math.max(0, minTile.height - tileHeight) / minTile.height
  const overMax =
    Math.max(0, tileWidth - maxTile.width) / maxTile.width +
    Math.max(0, tileHeight - maxTile.height) / maxTile.height

  return {
    rows,
    cols,
    tileWidth,
    tileHeight,
    gapX,
    gapY,
    penalty: weights.target * proximity + weights.min * underMin + weights.max * overMax,
    withinBounds: underMin === 0 && overMax === 0
  }
}

/**
 * Picks the grid with the smallest penalty; on a tie the candidate that
 * meets both size bounds wins, then the one with fewer columns. When no
 * candidate meets the minimum size the least-bad one is still returned.
 */
export function chooseGrid(
  count: number,
  body: TileSize,
  config: TreemapConfig = DEFAULT_TREEMAP_CONFIG
): GridCandidate | null {
  let best: GridCandidate | null = null
  for (let cols = 1; cols <= count; cols++) {
    const candidate = scoreGrid(count, cols, body, config)
    if (
      !best ||
      candidate.penalty < best.penalty - PENALTY_EPSILON ||
      (Math.abs(candidate.penalty - best.penalty) <= PENALTY_EPSILON &&
        candidate.withinBounds && !best.withinBounds)
    ) {
      best = candidate
    }
  }
  return best
}

/** Area of a region left for tiles once the header band and insets are taken */
export function regionBody(region: Rect, config: TreemapConfig = DEFAULT_TREEMAP_CONFIG): Rect {
  const pad = config.regionPadding
  let x0 = region.x0 + pad
  let x1 = region.x1 - pad
  if (x1 < x0) x0 = x1 = (region.x0 + region.x1) / 2

  const y0 = Math.min(region.y0 + config.headerHeight, region.y1)
  const y1 = Math.max(region.y1 - pad, y0)
  return { x0, y0, x1, y1 }
}

function layoutTiles(
  subject: FlatSubject,
  region: Rect,
  config: TreemapConfig
): CourseTile[] {
  const body = regionBody(region, config)
  const bodySize = { width: body.x1 - body.x0, height: body.y1 - body.y0 }
  const grid = chooseGrid(subject.courseIds.length, bodySize, config)
  if (!grid) return []

  if (!grid.withinBounds) {
    debug.layoutWarn(`"${subject.name}": no grid meets tile bounds, using ${grid.rows}x${grid.cols}`)
  }

  return subject.courseIds.map((id, i) => {
    const row = Math.floor(i / grid.cols)
    const col = i % grid.cols
    const x0 = Math.min(body.x0 + col * (grid.tileWidth + grid.gapX), body.x1)
    const y0 = Math.min(body.y0 + row * (grid.tileHeight + grid.gapY), body.y1)
    return {
      id,
      subject: subject.name,
      x0,
      y0,
      x1: Math.min(x0 + grid.tileWidth, body.x1),
      y1: Math.min(y0 + grid.tileHeight, body.y1)
    }
  })
}

export function computeTreemapLayout(
  tree: CourseTreeNode,
  bounds: LayoutBounds,
  focus: LayoutFocus,
  config: TreemapConfig = DEFAULT_TREEMAP_CONFIG
): TreemapLayoutResult {
  const result: TreemapLayoutResult = { kind: 'treemap', bounds, subjects: [], tiles: [] }
  const subjects = flattenToSubjects(tree, focus.focusedSubject)
  if (bounds.width <= 0 || bounds.height <= 0 || subjects.length === 0) return result

  const root = hierarchy<FlatSubject>({ name: tree.name, courseIds: [], children: subjects })
    .sum(d => (d.children ? 0 : d.courseIds.length))
    .sort((a, b) => (b.value ?? 0) - (a.value ?? 0))

  const laidOut = treemap<FlatSubject>()
    .tile(treemapSquarify.ratio(1.15))
    .size([bounds.width, bounds.height])
    .paddingOuter(config.paddingOuter)
    .paddingInner(config.paddingInner)
    .round(true)(root)

  for (const node of laidOut.children ?? []) {
    const region: SubjectRegion = {
      name: node.data.name,
      x0: node.x0,
      y0: node.y0,
      x1: node.x1,
      y1: node.y1,
      headerHeight: Math.min(config.headerHeight, node.y1 - node.y0),
      courseCount: node.data.courseIds.length
    }
    result.subjects.push(region)
    result.tiles.push(...layoutTiles(node.data, region, config))
  }

  debug.layout(`Treemap ${bounds.width}x${bounds.height}: ${result.subjects.length} subjects, ${result.tiles.length} tiles`)
  return result
}

export const treemapLayout: LayoutStrategy<TreemapLayoutResult> = {
  kind: 'treemap',
  computeLayout: (tree, bounds, focus) => computeTreemapLayout(tree, bounds, focus)
}
