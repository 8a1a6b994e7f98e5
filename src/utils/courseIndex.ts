/**
 * Coursework data model
 *
 * Turns the raw courses.json document into the normalized tree and the
 * lookup indexes used by the layouts, the detail panel and the tooltip:
 * - course id → CourseMeta (category resolved from the depth-1 ancestor)
 * - course id → prerequisites (incoming) / unlocks (outgoing)
 * - course id or code → plan stages
 *
 * Malformed input degrades to empty collections. The one hard failure is
 * a duplicate course id, since every other index is joined on it.
 */

import { hierarchy } from 'd3-hierarchy'
import type {
  CourseMeta,
  CourseTreeNode,
  CourseworkModel,
  LinkIndex,
  PlanStage
} from '../types'
import { debug } from './debug'

export const UNKNOWN_CATEGORY = 'Other'

export class DuplicateCourseIdError extends Error {
  readonly courseId: string

  constructor(courseId: string) {
    super(`Duplicate course id "${courseId}" in coursework hierarchy`)
    this.name = 'DuplicateCourseIdError'
    this.courseId = courseId
  }
}

type UnknownRecord = Record<string, unknown>

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readString(value: unknown): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim()
    return trimmed ? trimmed : null
  }
  if (typeof value === 'number' && Number.isFinite(value)) return String(value)
  return null
}

function readArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : []
}

/**
 * Year label from a course code: the leading digit of the first 3-digit
 * run, e.g. "PHYS301" → "Year 3". Best-effort display heuristic only.
 */
export function inferYear(code: string | null | undefined): string | null {
  if (!code) return null
  const match = /\d{3}/.exec(code)
  return match ? `Year ${match[0][0]}` : null
}

/**
 * Explicit year wins over the inferred one. Bare numbers become "Year n",
 * anything else is shown as written.
 */
export function resolveYear(explicit: unknown, code: string | null): string | null {
  const value = readString(explicit)
  if (value) return /^\d+$/.test(value) ? `Year ${value}` : value
  return inferYear(code)
}

/** Course id: explicit id, else code, else name */
export function deriveCourseId(course: UnknownRecord): string | null {
  return readString(course.id) ?? readString(course.code) ?? readString(course.name)
}

/**
 * Normalizes the raw hierarchy to a fixed-depth tree:
 * root(0) → subject(1) → group(2) → course(3).
 * Absent arrays are treated as empty, non-object entries are skipped and
 * anything below course level is ignored.
 */
export function normalizeHierarchy(raw: unknown): CourseTreeNode {
  const rootRecord = isRecord(raw) ? raw : {}
  const root: CourseTreeNode = {
    key: 'root',
    name: readString(rootRecord.name) ?? 'Coursework',
    kind: 'root',
    children: []
  }

  readArray(rootRecord.children).forEach((subject, si) => {
    if (!isRecord(subject)) return
    const subjectNode: CourseTreeNode = {
      key: `s${si}`,
      name: readString(subject.name) ?? UNKNOWN_CATEGORY,
      kind: 'subject',
      children: []
    }

    readArray(subject.children).forEach((group, gi) => {
      if (!isRecord(group)) return
      const groupNode: CourseTreeNode = {
        key: `${subjectNode.key}.g${gi}`,
        name: readString(group.name) ?? '',
        kind: 'group',
        children: []
      }

      readArray(group.children).forEach((course, ci) => {
        if (!isRecord(course)) return
        const courseId = deriveCourseId(course)
        if (!courseId) {
          debug.dataWarn('Skipping course without id, code or name in', groupNode.name)
          return
        }
        const leaf: CourseTreeNode = {
          key: `${groupNode.key}.c${ci}`,
          name: readString(course.name) ?? courseId,
          kind: 'course',
          courseId,
          course: {
            code: readString(course.code),
            year: readString(course.year),
            description: readString(course.description)
          },
          children: []
        }
        groupNode.children.push(leaf)
      })

      subjectNode.children.push(groupNode)
    })

    root.children.push(subjectNode)
  })

  return root
}

/**
 * Index of plan stages by the ids (or codes) they list.
 * A course may sit in any number of stages.
 */
export function buildStageIndex(stages: unknown): Map<string, PlanStage[]> {
  const index = new Map<string, PlanStage[]>()
  for (const stage of readArray(stages)) {
    if (!isRecord(stage)) continue
    const name = readString(stage.name)
    if (!name) continue
    const entry: PlanStage = {
      name,
      description: readString(stage.description) ?? ''
    }
    for (const member of readArray(stage.courses)) {
      const id = readString(member)
      if (!id) continue
      const list = index.get(id)
      if (list) {
        if (!list.includes(entry)) list.push(entry)
      } else {
        index.set(id, [entry])
      }
    }
  }
  return index
}

/**
 * Builds course id → CourseMeta. Category is the name of the depth-1
 * ancestor, group the depth-2 ancestor.
 *
 * @throws DuplicateCourseIdError when two courses resolve to the same id
 */
export function buildCourseIndex(
  tree: CourseTreeNode,
  stageIndex: Map<string, PlanStage[]> = new Map()
): Map<string, CourseMeta> {
  const courses = new Map<string, CourseMeta>()
  const root = hierarchy(tree, d => d.children)

  root.each(node => {
    const { courseId } = node.data
    if (node.data.kind !== 'course' || !courseId) return

    if (courses.has(courseId)) {
      throw new DuplicateCourseIdError(courseId)
    }

    const ancestors = node.ancestors()
    const subject = ancestors.find(a => a.depth === 1)
    const group = ancestors.find(a => a.depth === 2)
    const fields = node.data.course
    const code = fields?.code ?? null
    const { name } = node.data

    courses.set(courseId, {
      id: courseId,
      code,
      name,
      full: code ? `${code} · ${name}` : name,
      category: subject ? subject.data.name : UNKNOWN_CATEGORY,
      group: group && group.data.name ? group.data.name : null,
      year: resolveYear(fields?.year, code),
      description: fields?.description ?? null,
      stages: stageIndex.get(courseId) ?? (code ? stageIndex.get(code) : undefined) ?? []
    })
  })

  return courses
}

/**
 * Bidirectional prerequisite index. Endpoints resolve by course id, then
 * by course code; edges touching an unknown course are dropped.
 */
export function buildLinkIndex(links: unknown, courses: Map<string, CourseMeta>): LinkIndex {
  const incoming = new Map<string, string[]>()
  const outgoing = new Map<string, string[]>()

  const byCode = new Map<string, string>()
  for (const meta of courses.values()) {
    if (meta.code && !byCode.has(meta.code)) byCode.set(meta.code, meta.id)
  }
  const resolve = (ref: string | null): string | null => {
    if (!ref) return null
    if (courses.has(ref)) return ref
    return byCode.get(ref) ?? null
  }

  const push = (map: Map<string, string[]>, key: string, value: string) => {
    const list = map.get(key)
    if (!list) {
      map.set(key, [value])
    } else if (!list.includes(value)) {
      list.push(value)
    }
  }

  let dropped = 0
  for (const link of readArray(links)) {
    if (!isRecord(link)) continue
    const source = resolve(readString(link.source))
    const target = resolve(readString(link.target))
    if (!source || !target) {
      dropped++
      continue
    }
    push(outgoing, source, target)
    push(incoming, target, source)
  }

  if (dropped > 0) {
    debug.dataWarn(`Dropped ${dropped} prerequisite link(s) with unknown endpoints`)
  }

  return { incoming, outgoing }
}

/**
 * Builds the full in-memory model from the fetched document.
 */
export function buildCourseworkModel(data: unknown): CourseworkModel {
  debug.perf('Coursework model')
  const doc = isRecord(data) ? data : {}
  const tree = normalizeHierarchy(doc.hierarchy)
  const stageIndex = buildStageIndex(doc.stages)
  const courses = buildCourseIndex(tree, stageIndex)
  const links = buildLinkIndex(doc.links, courses)

  const subjects: string[] = []
  for (const subject of tree.children) {
    if (!subjects.includes(subject.name)) subjects.push(subject.name)
  }
  debug.perfEnd('Coursework model')
  debug.data(`${courses.size} courses across ${subjects.length} subjects`)

  return { tree, courses, links, subjects }
}
