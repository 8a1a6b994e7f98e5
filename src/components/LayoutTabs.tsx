/**
 * LayoutTabs - switcher between the diagram encodings
 */

import { LAYOUT_KINDS, LAYOUT_LABELS, type LayoutKind } from '../config'

interface LayoutTabsProps {
  activeLayout: LayoutKind
  onLayoutChange: (layout: LayoutKind) => void
}

export function LayoutTabs({ activeLayout, onLayoutChange }: LayoutTabsProps) {
  return (
    <div
      role="tablist"
      aria-label="Diagram type"
      style={{
        display: 'inline-flex',
        background: 'white',
        borderRadius: 6,
        boxShadow: '0 2px 4px rgba(0,0,0,0.1)',
        border: '1px solid #ddd',
        overflow: 'hidden'
      }}
    >
      {LAYOUT_KINDS.map((kind, i) => {
        const active = kind === activeLayout
        return (
          <button
            key={kind}
            type="button"
            role="tab"
            aria-selected={active}
            onClick={() => onLayoutChange(kind)}
            style={{
              padding: '6px 12px',
              fontSize: 12,
              fontWeight: active ? 600 : 400,
              cursor: 'pointer',
              border: 'none',
              borderLeft: i > 0 ? '1px solid #ddd' : 'none',
              background: active ? '#3B82F6' : 'white',
              color: active ? 'white' : '#555',
              transition: 'all 0.15s ease'
            }}
          >
            {LAYOUT_LABELS[kind]}
          </button>
        )
      })}
    </div>
  )
}

export default LayoutTabs
