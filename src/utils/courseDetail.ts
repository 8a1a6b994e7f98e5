/**
 * Projections of a selected course for the detail panel and tooltip
 */

import type { CourseMeta, CourseworkModel, PlanStage } from '../types'

export interface LinkedCourse {
  id: string
  label: string
  category: string
}

export interface CourseDetail {
  id: string
  title: string
  category: string
  group: string | null
  year: string | null
  description: string | null
  stages: PlanStage[]
  prerequisites: LinkedCourse[]
  unlocks: LinkedCourse[]
}

export const DETAIL_PLACEHOLDER =
  'Select a course tile to see its description, plan stages, and prerequisite links.'

/** Human label for a course id; the raw id when it is not in the index */
export function courseLabel(id: string, courses: Map<string, CourseMeta>): string {
  const entry = courses.get(id)
  return entry ? entry.full : id
}

function resolveLinks(ids: string[] | undefined, courses: Map<string, CourseMeta>): LinkedCourse[] {
  return (ids ?? []).flatMap(id => {
    const meta = courses.get(id)
    return meta ? [{ id, label: courseLabel(id, courses), category: meta.category }] : []
  })
}

export function describeCourse(id: string | null, model: CourseworkModel): CourseDetail | null {
  if (!id) return null
  const meta = model.courses.get(id)
  if (!meta) return null

  return {
    id: meta.id,
    title: meta.full,
    category: meta.category,
    group: meta.group,
    year: meta.year,
    description: meta.description,
    stages: meta.stages,
    prerequisites: resolveLinks(model.links.incoming.get(meta.id), model.courses),
    unlocks: resolveLinks(model.links.outgoing.get(meta.id), model.courses)
  }
}

export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`
}

// ============================================
// Tooltip
// ============================================

export const TOOLTIP_STAGE_LIMIT = 2

export interface TooltipSummary {
  title: string
  chips: string[]
  stages: PlanStage[]
  moreStages: string | null
}

export function summarizeForTooltip(meta: CourseMeta): TooltipSummary {
  const chips: string[] = []
  if (meta.code) chips.push(meta.code)
  chips.push(meta.category)
  if (meta.year) chips.push(meta.year)

  const stages = meta.stages.slice(0, TOOLTIP_STAGE_LIMIT)
  const remaining = meta.stages.length - stages.length

  return {
    title: meta.full,
    chips,
    stages,
    moreStages: remaining > 0 ? `${pluralize(remaining, 'more stage')} in plan` : null
  }
}

export type TooltipAlign = 'left' | 'right'

export interface RectLike {
  left: number
  top: number
  width: number
  height: number
}

const clamp = (value: number, min: number, max: number) => Math.max(min, Math.min(max, value))

/**
 * Tooltip goes on the side of the anchor away from the diagram centre.
 */
export function tooltipAlignment(anchor: RectLike, container: RectLike): TooltipAlign {
  const center = container.left + container.width / 2
  return anchor.left >= center ? 'left' : 'right'
}

/**
 * Places the tooltip beside the anchor, vertically centred on it and
 * clamped `margin` px inside the container. Coordinates are relative to
 * the container.
 */
export function positionTooltip(
  anchor: RectLike,
  container: RectLike,
  tip: { width: number; height: number },
  align: TooltipAlign,
  gap: number = 14,
  margin: number = 8
): { left: number; top: number } {
  const baseTop = anchor.top + anchor.height / 2 - container.top - tip.height / 2
  const top = clamp(baseTop, margin, container.height - tip.height - margin)
  const rawLeft = align === 'left'
    ? anchor.left - container.left - tip.width - gap
    : anchor.left + anchor.width - container.left + gap
  const left = clamp(rawLeft, margin, container.width - tip.width - margin)
  return { left, top }
}
