/**
 * DetailPanel - description, plan stages and prerequisite links of the
 * selected course
 */

import { DETAIL_PLACEHOLDER, pluralize, type CourseDetail, type LinkedCourse } from '../utils/courseDetail'

interface DetailPanelProps {
  detail: CourseDetail | null
  focusedSubject?: string | null
  onSelect: (id: string) => void
}

/** Links to courses outside the focused subject are listed but not selectable */
function LinkList({ items, emptyText, focusedSubject, onSelect }: {
  items: LinkedCourse[]
  emptyText: string
  focusedSubject: string | null
  onSelect: (id: string) => void
}) {
  if (items.length === 0) return <p className="cw-empty">{emptyText}</p>
  return (
    <ul className="cw-link-list">
      {items.map(item => (
        <li key={item.id}>
          {focusedSubject && item.category !== focusedSubject ? (
            <span className="cw-link-hidden">{item.label}</span>
          ) : (
            <button type="button" className="cw-link" onClick={() => onSelect(item.id)}>
              {item.label}
            </button>
          )}
        </li>
      ))}
    </ul>
  )
}

export function DetailPanel({ detail, focusedSubject = null, onSelect }: DetailPanelProps) {
  if (!detail) {
    return (
      <aside className="cw-detail" data-cw-detail="" aria-live="polite">
        <p className="cw-placeholder">{DETAIL_PLACEHOLDER}</p>
      </aside>
    )
  }

  const subtitle = [detail.category, detail.group, detail.year].filter(Boolean).join(' · ')

  return (
    <aside className="cw-detail" data-cw-detail="" aria-live="polite">
      <h3 className="cw-detail-title">{detail.title}</h3>
      <p className="cw-detail-subtitle">{subtitle}</p>
      <div className="cw-chips">
        <span className="cw-chip">{pluralize(detail.stages.length, 'stage')}</span>
        <span className="cw-chip">{pluralize(detail.prerequisites.length, 'prereq')}</span>
        <span className="cw-chip">{pluralize(detail.unlocks.length, 'unlock')}</span>
      </div>
      {detail.description && <p className="cw-detail-description">{detail.description}</p>}

      <section aria-label="Plan stages">
        <h4>Plan stages</h4>
        {detail.stages.length === 0 ? (
          <p className="cw-empty">No plan stage tagged for this module.</p>
        ) : (
          <ul className="cw-stage-list">
            {detail.stages.map(stage => (
              <li key={stage.name}>
                <strong>{stage.name}</strong>
                {stage.description && <span> {stage.description}</span>}
              </li>
            ))}
          </ul>
        )}
      </section>

      <section aria-label="Prerequisites">
        <h4>Prerequisites</h4>
        <LinkList
          items={detail.prerequisites}
          emptyText="No prerequisites recorded."
          focusedSubject={focusedSubject}
          onSelect={onSelect}
        />
      </section>

      <section aria-label="Unlocks">
        <h4>Unlocks</h4>
        <LinkList
          items={detail.unlocks}
          emptyText="No downstream links recorded."
          focusedSubject={focusedSubject}
          onSelect={onSelect}
        />
      </section>
    </aside>
  )
}

export default DetailPanel
