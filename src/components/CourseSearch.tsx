/**
 * CourseSearch - fuzzy lookup; picking a result selects the course
 */

import { useMemo, useState } from 'react'
import type { CourseMeta } from '../types'
import { createCourseSearch } from '../utils/courseSearch'

interface CourseSearchProps {
  courses: Map<string, CourseMeta>
  focusedSubject: string | null
  onSelect: (id: string) => void
}

export function CourseSearch({ courses, focusedSubject, onSelect }: CourseSearchProps) {
  const index = useMemo(() => createCourseSearch(courses), [courses])
  const [query, setQuery] = useState('')
  const results = useMemo(
    () => index.search(query, focusedSubject),
    [index, query, focusedSubject]
  )

  return (
    <div className="cw-search">
      <input
        type="search"
        value={query}
        placeholder="Search courses"
        aria-label="Search courses"
        onChange={e => setQuery(e.target.value)}
        style={{ padding: '4px 8px', fontSize: 12, borderRadius: 4, border: '1px solid #cbd5e1' }}
      />
      {results.length > 0 && (
        <ul className="cw-search-results" role="listbox" aria-label="Matching courses">
          {results.map(meta => (
            <li key={meta.id} role="option" aria-selected={false}>
              <button
                type="button"
                onClick={() => {
                  onSelect(meta.id)
                  setQuery('')
                }}
              >
                {meta.full}
              </button>
            </li>
          ))}
        </ul>
      )}
    </div>
  )
}

export default CourseSearch
