/**
 * CourseTooltip - hover summary placed beside the hovered mark
 */

import { useLayoutEffect, useRef, useState, type RefObject } from 'react'
import type { CourseMeta } from '../types'
import { positionTooltip, summarizeForTooltip, tooltipAlignment } from '../utils/courseDetail'

interface CourseTooltipProps {
  meta: CourseMeta
  anchor: Element
  containerRef: RefObject<HTMLElement>
}

export function CourseTooltip({ meta, anchor, containerRef }: CourseTooltipProps) {
  const tipRef = useRef<HTMLDivElement>(null)
  const [position, setPosition] = useState<{ left: number; top: number } | null>(null)
  const summary = summarizeForTooltip(meta)

  useLayoutEffect(() => {
    const container = containerRef.current
    const tip = tipRef.current
    if (!container || !tip) return
    const anchorRect = anchor.getBoundingClientRect()
    const containerRect = container.getBoundingClientRect()
    const align = tooltipAlignment(anchorRect, containerRect)
    setPosition(positionTooltip(
      anchorRect,
      containerRect,
      { width: tip.offsetWidth, height: tip.offsetHeight },
      align
    ))
  }, [anchor, containerRef, meta.id])

  return (
    <div
      ref={tipRef}
      className="cw-tooltip"
      role="tooltip"
      style={{
        position: 'absolute',
        left: position?.left ?? 0,
        top: position?.top ?? 0,
        visibility: position ? 'visible' : 'hidden',
        pointerEvents: 'none'
      }}
    >
      <div className="cw-tooltip-title">{summary.title}</div>
      <div className="cw-chips">
        {summary.chips.map(chip => <span key={chip} className="cw-chip">{chip}</span>)}
      </div>
      {summary.stages.length > 0 ? (
        <ul className="cw-tooltip-stages">
          {summary.stages.map(stage => (
            <li key={stage.name}>
              <strong>{stage.name}</strong>
              {stage.description && <span> {stage.description}</span>}
            </li>
          ))}
          {summary.moreStages && <li className="cw-more">{summary.moreStages}</li>}
        </ul>
      ) : (
        <p className="cw-empty">Independent elective without a stage grouping.</p>
      )}
      <div className="cw-tooltip-hint">Click to pin details →</div>
    </div>
  )
}

export default CourseTooltip
