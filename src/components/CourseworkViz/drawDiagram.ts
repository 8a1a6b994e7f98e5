/**
 * drawDiagram - renders a LayoutResult into an SVG element with d3
 *
 * Each call redraws the whole diagram. Course marks in every variant share
 * the same contract: class `cw-tile`, `data-cw-id`, role=button, focusable,
 * hover/click/Enter/Space handlers. Radial variants animate the view from
 * the previous transform (and the sunburst its arcs) on re-layout.
 */

import * as d3 from 'd3'
import type { CourseworkModel, ThemeMode } from '../../types'
import type {
  CirclePackLayoutResult,
  CourseTile,
  LayoutResult,
  PackedCircle,
  RadialNodeBase,
  RadialTreeLayoutResult,
  RadialTreeNode,
  SubjectRegion,
  SunburstArc,
  SunburstLayoutResult,
  TreemapLayoutResult,
  ViewTransform
} from '../../layouts'
import { isArcVisible } from '../../layouts/SunburstLayout'
import { viewTransformAttr } from '../../layouts/radialCommon'
import { blendWithSurface, colorFor, FILL_WEIGHTS } from '../../utils/theme'
import { courseTileLabel, fitText } from '../../utils/fitText'
import { debug } from '../../utils/debug'

export interface DiagramHandlers {
  onSelect: (id: string) => void
  onClear: () => void
  onFocus: (subject: string | null) => void
  onHover: (id: string | null, anchor: Element | null) => void
}

export interface DrawContext {
  model: CourseworkModel
  theme: ThemeMode
  selectedId: string | null
  handlers: DiagramHandlers
}

type SvgSelection = d3.Selection<SVGSVGElement, unknown, null, undefined>

const TRANSITION_MS = 600
const NEUTRAL_FILL = '#94a3b8'

const ARIA_LABELS: Record<LayoutResult['kind'], string> = {
  'treemap': 'Coursework treemap',
  'sunburst': 'Coursework sunburst',
  'radial-tree': 'Coursework radial tree',
  'circle-pack': 'Coursework circle packing'
}

// Last view/arcs drawn per SVG, used as transition start points
const previousViews = new WeakMap<SVGSVGElement, { kind: LayoutResult['kind']; view: ViewTransform }>()
const previousArcs = new WeakMap<SVGSVGElement, Map<string, ArcGeometry>>()

type ArcGeometry = Pick<SunburstArc, 'startAngle' | 'endAngle' | 'innerRadius' | 'outerRadius'>

const toDegrees = (radians: number) => (radians * 180) / Math.PI

const isCourseNode = (node: RadialNodeBase) => node.kind === 'course' && node.courseId !== null

/**
 * Attaches the shared course-mark behaviour: selection on click and on
 * Enter/Space, tooltip on hover, keyboard focusability.
 * Dimmed marks (outside the focus) are inert and out of the tab order.
 */
function bindCourseMarks<D>(
  marks: d3.Selection<SVGGElement, D, SVGGElement, unknown>,
  idOf: (d: D) => string,
  ctx: DrawContext,
  isDimmed: (d: D) => boolean = () => false
) {
  const { handlers, model, selectedId } = ctx
  const select = (event: Event, d: D) => {
    event.stopPropagation()
    if (isDimmed(d)) return
    handlers.onHover(null, null)
    handlers.onSelect(idOf(d))
  }

  marks
    .classed('cw-tile', true)
    .attr('data-cw-id', idOf)
    .attr('role', 'button')
    .attr('tabindex', d => (isDimmed(d) ? '-1' : '0'))
    .attr('aria-hidden', d => (isDimmed(d) ? 'true' : null))
    .attr('aria-label', d => {
      const meta = model.courses.get(idOf(d))
      return meta ? meta.full : idOf(d)
    })
    .classed('is-selected', d => Boolean(selectedId) && idOf(d) === selectedId)
    .attr('aria-pressed', d => String(Boolean(selectedId) && idOf(d) === selectedId))
    .on('mouseenter', function (_event: MouseEvent, d: D) {
      if (isDimmed(d)) return
      handlers.onHover(idOf(d), this)
    })
    .on('mouseleave', () => handlers.onHover(null, null))
    .on('click', select)
    .on('keydown', (event: KeyboardEvent, d: D) => {
      if (event.key !== 'Enter' && event.key !== ' ') return
      event.preventDefault()
      select(event, d)
    })
}

/**
 * Subject marks in the radial variants toggle the legend focus.
 */
function bindSubjectMarks<D extends RadialNodeBase>(
  marks: d3.Selection<SVGGElement, D, SVGGElement, unknown>,
  ctx: DrawContext
) {
  marks
    .filter(d => d.kind === 'subject' || d.kind === 'root')
    .style('cursor', 'pointer')
    .on('click', (event: MouseEvent, d: D) => {
      event.stopPropagation()
      ctx.handlers.onFocus(d.kind === 'subject' ? d.name : null)
    })
}

function nodeFill(node: RadialNodeBase, theme: ThemeMode): string {
  if (!node.category) return blendWithSurface(NEUTRAL_FILL, 0.3, theme)
  const weights = FILL_WEIGHTS[theme]
  const weight = node.kind === 'course' ? weights.tile : node.kind === 'group' ? 0.35 : weights.region * 2
  return blendWithSurface(colorFor(node.category), weight, theme)
}

function transitionView(
  svgEl: SVGSVGElement,
  group: d3.Selection<SVGGElement, unknown, null, undefined>,
  kind: LayoutResult['kind'],
  next: ViewTransform
) {
  const last = previousViews.get(svgEl)
  const prev = last && last.kind === kind ? last.view : next
  previousViews.set(svgEl, { kind, view: next })
  group.attr('transform', viewTransformAttr(prev))
  if (prev === next) return
  const interpolate = d3.interpolateObject(prev, next)
  group
    .transition()
    .duration(TRANSITION_MS)
    .ease(d3.easeCubicOut)
    .attrTween('transform', () => t => viewTransformAttr(interpolate(t)))
}

// ============================================
// Treemap
// ============================================

function drawTreemap(svg: SvgSelection, layout: TreemapLayoutResult, ctx: DrawContext) {
  const { theme, model } = ctx
  const weights = FILL_WEIGHTS[theme]

  const subjects = svg
    .append('g')
    .attr('class', 'cw-subjects')
    .selectAll<SVGGElement, SubjectRegion>('g')
    .data(layout.subjects)
    .join('g')
    .attr('class', 'cw-subject')
    .attr('data-cw-subject', d => d.name)

  subjects
    .append('rect')
    .attr('class', 'cw-subject-bg')
    .attr('x', d => d.x0)
    .attr('y', d => d.y0)
    .attr('width', d => Math.max(0, d.x1 - d.x0))
    .attr('height', d => Math.max(0, d.y1 - d.y0))
    .attr('rx', 18)
    .attr('fill', d => blendWithSurface(colorFor(d.name), weights.region, theme))

  subjects
    .append('text')
    .attr('class', 'cw-subject-label')
    .attr('x', d => d.x0 + 14)
    .attr('y', d => d.y0 + 20)
    .text(d => fitText(d.name, d.x1 - d.x0 - 28, 13))

  const tiles = svg
    .append('g')
    .attr('class', 'cw-tiles')
    .selectAll<SVGGElement, CourseTile>('g')
    .data(layout.tiles, d => d.id)
    .join('g')

  bindCourseMarks(tiles, d => d.id, ctx)

  tiles
    .append('rect')
    .attr('class', 'cw-tile-rect')
    .attr('x', d => d.x0 + 3)
    .attr('y', d => d.y0 + 3)
    .attr('width', d => Math.max(0, d.x1 - d.x0 - 6))
    .attr('height', d => Math.max(0, d.y1 - d.y0 - 6))
    .attr('rx', 12)
    .attr('fill', d => blendWithSurface(colorFor(d.subject), weights.tile, theme))

  tiles
    .append('text')
    .attr('class', 'cw-tile-label')
    .attr('x', d => d.x0 + 12)
    .attr('y', d => {
      const h = d.y1 - d.y0
      if (h >= 26) return d.y0 + 20
      if (h >= 22) return d.y0 + 16
      return d.y0 + 14
    })
    .text(d => fitText(courseTileLabel(model.courses.get(d.id)), d.x1 - d.x0 - 18, 12))
    .attr('opacity', d => (d.x1 - d.x0 >= 38 && d.y1 - d.y0 >= 18 ? 1 : 0))
}

// ============================================
// Sunburst
// ============================================

function drawSunburst(svgEl: SVGSVGElement, svg: SvgSelection, layout: SunburstLayoutResult, ctx: DrawContext) {
  const { theme, model } = ctx
  const radius = Math.max(0, ...layout.arcs.map(a => a.outerRadius))
  const arcPath = d3.arc<ArcGeometry>()
    .startAngle(d => d.startAngle)
    .endAngle(d => d.endAngle)
    .padAngle(d => Math.min((d.endAngle - d.startAngle) / 2, 0.004))
    .padRadius(radius / 2)
    .innerRadius(d => d.innerRadius)
    .outerRadius(d => Math.max(d.innerRadius, d.outerRadius - 1))

  const prevArcs = previousArcs.get(svgEl)
  previousArcs.set(svgEl, new Map<string, ArcGeometry>(layout.arcs.map(a => [a.key, a])))

  const view = svg.append('g').attr('class', 'cw-view')
    .attr('transform', viewTransformAttr(layout.view))

  const arcs = view
    .selectAll<SVGGElement, SunburstArc>('g')
    .data(layout.arcs, d => d.key)
    .join('g')
    .attr('class', d => `cw-arc cw-arc-${d.kind}`)
    .classed('is-dimmed', d => d.dimmed)
    .attr('display', d => (isArcVisible(d) || (prevArcs?.has(d.key) ?? false) ? null : 'none'))

  const paths = arcs
    .append('path')
    .attr('fill', d => nodeFill(d, theme))
    .attr('fill-opacity', d => (d.dimmed ? 0.25 : 1))

  if (prevArcs) {
    paths
      .attr('d', d => arcPath(prevArcs.get(d.key) ?? d))
      .transition()
      .duration(TRANSITION_MS)
      .ease(d3.easeCubicOut)
      .attrTween('d', d => {
        const interpolate = d3.interpolateObject<ArcGeometry>(prevArcs.get(d.key) ?? d, d)
        return t => arcPath(interpolate(t)) ?? ''
      })
  } else {
    paths.attr('d', d => arcPath(d))
  }

  bindCourseMarks(arcs.filter(isCourseNode), d => d.courseId ?? '', ctx, d => d.dimmed)
  bindSubjectMarks(arcs, ctx)

  // Labels on arcs wide and deep enough to hold them
  arcs
    .filter(d => d.depth > 0 && isArcVisible(d))
    .append('text')
    .attr('class', 'cw-arc-label')
    .attr('pointer-events', 'none')
    .attr('text-anchor', 'middle')
    .attr('dy', '0.35em')
    .attr('transform', d => {
      const angle = toDegrees((d.startAngle + d.endAngle) / 2)
      const r = (d.innerRadius + d.outerRadius) / 2
      return `rotate(${angle - 90}) translate(${r},0) rotate(${angle < 180 ? 0 : 180})`
    })
    .text(d => {
      const arcLength = (d.endAngle - d.startAngle) * (d.innerRadius + d.outerRadius) / 2
      if (arcLength < 12) return ''
      const label = d.courseId ? courseTileLabel(model.courses.get(d.courseId)) : d.name
      return fitText(label, d.outerRadius - d.innerRadius - 6, 10)
    })
}

// ============================================
// Radial tree
// ============================================

interface ResolvedLink {
  source: RadialTreeNode
  target: RadialTreeNode
  dimmed: boolean
}

function drawRadialTree(svgEl: SVGSVGElement, svg: SvgSelection, layout: RadialTreeLayoutResult, ctx: DrawContext) {
  const { theme, model } = ctx
  const byKey = new Map(layout.nodes.map(n => [n.key, n]))
  const links: ResolvedLink[] = layout.links.flatMap(link => {
    const source = byKey.get(link.source)
    const target = byKey.get(link.target)
    return source && target ? [{ source, target, dimmed: link.dimmed }] : []
  })

  const view = svg.append('g').attr('class', 'cw-view')
  transitionView(svgEl, view, layout.kind, layout.view)

  const linkPath = d3.linkRadial<ResolvedLink, RadialTreeNode>()
    .angle(n => n.angle)
    .radius(n => n.radius)

  view
    .append('g')
    .attr('class', 'cw-links')
    .attr('fill', 'none')
    .attr('stroke', NEUTRAL_FILL)
    .selectAll('path')
    .data(links)
    .join('path')
    .attr('d', d => linkPath(d))
    .attr('stroke-opacity', d => (d.dimmed ? 0.15 : 0.6))

  const nodes = view
    .append('g')
    .attr('class', 'cw-nodes')
    .selectAll<SVGGElement, RadialTreeNode>('g')
    .data(layout.nodes, d => d.key)
    .join('g')
    .attr('class', d => `cw-node cw-node-${d.kind}`)
    .classed('is-dimmed', d => d.dimmed)
    .attr('opacity', d => (d.dimmed ? 0.25 : 1))
    .attr('transform', d => `rotate(${toDegrees(d.angle) - 90}) translate(${d.radius},0)`)

  nodes
    .append('circle')
    .attr('r', d => (d.kind === 'course' ? 4 : d.kind === 'group' ? 5 : 7))
    .attr('fill', d => nodeFill(d, theme))
    .attr('stroke', d => (d.category ? colorFor(d.category) : NEUTRAL_FILL))

  nodes
    .filter(d => d.kind === 'course' || d.kind === 'subject')
    .append('text')
    .attr('class', 'cw-node-label')
    .attr('dy', '0.31em')
    .attr('x', d => (d.angle < Math.PI ? 8 : -8))
    .attr('text-anchor', d => (d.angle < Math.PI ? 'start' : 'end'))
    .attr('transform', d => (d.angle >= Math.PI ? 'rotate(180)' : null))
    .text(d => {
      const label = d.courseId ? courseTileLabel(model.courses.get(d.courseId)) : d.name
      return fitText(label, 64, 10)
    })

  bindCourseMarks(nodes.filter(isCourseNode), d => d.courseId ?? '', ctx, d => d.dimmed)
  bindSubjectMarks(nodes, ctx)
}

// ============================================
// Circle pack
// ============================================

function drawCirclePack(svgEl: SVGSVGElement, svg: SvgSelection, layout: CirclePackLayoutResult, ctx: DrawContext) {
  const { theme, model } = ctx

  const view = svg.append('g').attr('class', 'cw-view')
  transitionView(svgEl, view, layout.kind, layout.view)

  const circles = view
    .selectAll<SVGGElement, PackedCircle>('g')
    .data(layout.circles, d => d.key)
    .join('g')
    .attr('class', d => `cw-circle cw-circle-${d.kind}`)
    .classed('is-dimmed', d => d.dimmed)
    .attr('opacity', d => (d.dimmed ? 0.25 : 1))
    .attr('transform', d => `translate(${d.x},${d.y})`)

  circles
    .append('circle')
    .attr('r', d => d.r)
    .attr('fill', d => (d.depth === 0 ? 'none' : nodeFill(d, theme)))
    .attr('stroke', d => (d.category ? colorFor(d.category) : NEUTRAL_FILL))
    .attr('stroke-opacity', 0.5)

  circles
    .filter(d => d.kind === 'course' && d.r >= 14)
    .append('text')
    .attr('class', 'cw-circle-label')
    .attr('pointer-events', 'none')
    .attr('text-anchor', 'middle')
    .attr('dy', '0.35em')
    .text(d => fitText(courseTileLabel(d.courseId ? model.courses.get(d.courseId) : undefined), d.r * 2 - 6, 10))

  bindCourseMarks(circles.filter(isCourseNode), d => d.courseId ?? '', ctx, d => d.dimmed)
  bindSubjectMarks(circles, ctx)
}

/**
 * Clears the SVG and draws `layout`. A click on empty canvas clears the
 * selection.
 */
export function drawDiagram(svgEl: SVGSVGElement, layout: LayoutResult, ctx: DrawContext): void {
  const svg = d3.select(svgEl)
  svg.selectAll('*').interrupt().remove()

  const { width, height } = layout.bounds
  svg
    .attr('viewBox', `0 0 ${width} ${height}`)
    .attr('preserveAspectRatio', 'xMidYMid meet')
    .attr('role', 'img')
    .attr('aria-label', ARIA_LABELS[layout.kind])
    .on('click', () => {
      ctx.handlers.onHover(null, null)
      ctx.handlers.onClear()
    })

  if (layout.kind !== 'sunburst') previousArcs.delete(svgEl)

  switch (layout.kind) {
    case 'treemap':
      drawTreemap(svg, layout, ctx)
      break
    case 'sunburst':
      drawSunburst(svgEl, svg, layout, ctx)
      break
    case 'radial-tree':
      drawRadialTree(svgEl, svg, layout, ctx)
      break
    case 'circle-pack':
      drawCirclePack(svgEl, svg, layout, ctx)
      break
  }

  debug.render(`Drew ${layout.kind} ${width}x${height}`)
}

/**
 * Toggles the selected styling on exactly the mark for `selectedId`.
 */
export function updateSelection(svgEl: SVGSVGElement, selectedId: string | null): void {
  d3.select(svgEl)
    .selectAll<SVGGElement, unknown>('.cw-tile')
    .each(function () {
      const selected = Boolean(selectedId) && this.getAttribute('data-cw-id') === selectedId
      this.classList.toggle('is-selected', selected)
      this.setAttribute('aria-pressed', String(selected))
    })
}
