/**
 * Fuzzy course search
 *
 * Matches against code, name and group. Results honour the subject focus,
 * so a search never selects a course that is hidden by the legend filter.
 */

import Fuse from 'fuse.js'
import type { CourseMeta } from '../types'

export interface CourseSearchIndex {
  search: (query: string, focusedSubject: string | null, limit?: number) => CourseMeta[]
}

export function createCourseSearch(courses: Map<string, CourseMeta>): CourseSearchIndex {
  const fuse = new Fuse(Array.from(courses.values()), {
    keys: [
      { name: 'code', weight: 2 },
      { name: 'name', weight: 1.5 },
      { name: 'group', weight: 0.5 }
    ],
    threshold: 0.35,
    ignoreLocation: true
  })

  return {
    search(query, focusedSubject, limit = 8) {
      const trimmed = query.trim()
      if (!trimmed) return []
      return fuse
        .search(trimmed)
        .map(result => result.item)
        .filter(meta => !focusedSubject || meta.category === focusedSubject)
        .slice(0, limit)
    }
  }
}
