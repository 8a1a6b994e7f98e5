/**
 * Legend - subject filter buttons
 *
 * "All" clears the focus; a subject button focuses it, or clears the focus
 * when it is already the active one.
 */

import { memo } from 'react'
import { colorFor } from '../utils/theme'

interface LegendProps {
  subjects: string[]
  focusedSubject: string | null
  onToggleFocus: (subject: string | null) => void
}

function Legend({ subjects, focusedSubject, onToggleFocus }: LegendProps) {
  const entries: Array<{ label: string; subject: string | null }> = [
    { label: 'All', subject: null },
    ...subjects.map(subject => ({ label: subject, subject }))
  ]

  return (
    <div className="cw-legend" data-cw-legend="" role="group" aria-label="Filter by subject">
      {entries.map(({ label, subject }) => {
        const active = focusedSubject === subject
        return (
          <button
            key={subject ?? '__all__'}
            type="button"
            className="cw-legend-btn"
            aria-pressed={active}
            data-cw-subject={subject ?? ''}
            onClick={() => onToggleFocus(subject)}
            style={{
              display: 'inline-flex',
              alignItems: 'center',
              gap: 6,
              padding: '4px 10px',
              fontSize: 12,
              fontWeight: active ? 600 : 400,
              borderRadius: 999,
              border: '1px solid #cbd5e1',
              background: active ? '#e2e8f0' : 'transparent',
              cursor: 'pointer'
            }}
          >
            {subject && (
              <span
                className="cw-legend-swatch"
                style={{ width: 10, height: 10, borderRadius: '50%', background: colorFor(subject) }}
              />
            )}
            {label}
          </button>
        )
      })}
    </div>
  )
}

export default memo(Legend)
