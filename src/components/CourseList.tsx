/**
 * CourseList - the hierarchy as a nested list, for keyboard and screen
 * reader users
 */

import { memo } from 'react'
import type { CourseTreeNode } from '../types'

interface CourseListProps {
  tree: CourseTreeNode
  focusedSubject: string | null
  selectedId: string | null
  onSelect: (id: string) => void
}

function CourseList({ tree, focusedSubject, selectedId, onSelect }: CourseListProps) {
  const subjects = tree.children.filter(s => !focusedSubject || s.name === focusedSubject)

  return (
    <nav className="cw-course-list" aria-label="Course list">
      <ul>
        {subjects.map(subject => (
          <li key={subject.key}>
            <span className="cw-list-subject">{subject.name}</span>
            <ul>
              {subject.children.map(group => (
                <li key={group.key}>
                  {group.name && <span className="cw-list-group">{group.name}</span>}
                  <ul>
                    {group.children.map(course => {
                      const id = course.courseId
                      if (!id) return null
                      return (
                        <li key={course.key}>
                          <button
                            type="button"
                            aria-pressed={selectedId === id}
                            onClick={() => onSelect(id)}
                          >
                            {course.course?.code ? `${course.course.code} · ${course.name}` : course.name}
                          </button>
                        </li>
                      )
                    })}
                  </ul>
                </li>
              ))}
            </ul>
          </li>
        ))}
      </ul>
    </nav>
  )
}

export default memo(CourseList)
