/**
 * CourseworkViz - loads the coursework document and mounts the explorer
 *
 * Loading and build failures end in a terminal error text; the explorer is
 * only mounted once a model exists.
 */

import { useCallback, useEffect, useMemo, useReducer, useRef, useState } from 'react'
import { DATA_FILE, DEFAULT_LAYOUT, LOAD_FAILURE_TEXT, type LayoutKind } from '../../config'
import { getLayoutStrategy } from '../../layouts'
import { createViewReducer, INITIAL_VIEW_STATE, interactionPhase } from '../../state/viewState'
import type { CourseworkModel } from '../../types'
import { describeCourse } from '../../utils/courseDetail'
import { debug } from '../../utils/debug'
import { loadCoursework, type FetchLike } from '../../utils/loadCoursework'
import { useContainerSize } from '../../hooks/useContainerSize'
import { useThemeMode } from '../../hooks/useThemeMode'
import CourseList from '../CourseList'
import CourseSearch from '../CourseSearch'
import CourseTooltip from '../CourseTooltip'
import DetailPanel from '../DetailPanel'
import LayoutTabs from '../LayoutTabs'
import Legend from '../Legend'
import { drawDiagram, updateSelection, type DiagramHandlers } from './drawDiagram'

interface CourseworkVizProps {
  dataUrl?: string
  initialLayout?: LayoutKind
  fetchImpl?: FetchLike
}

interface HoverState {
  id: string
  anchor: Element
}

// ============================================
// Explorer (model loaded)
// ============================================

interface CourseworkExplorerProps {
  model: CourseworkModel
  initialLayout: LayoutKind
}

function CourseworkExplorer({ model, initialLayout }: CourseworkExplorerProps) {
  const reducer = useMemo(() => createViewReducer(model.courses), [model])
  const [viewState, dispatch] = useReducer(reducer, INITIAL_VIEW_STATE)
  const [layoutKind, setLayoutKind] = useState<LayoutKind>(initialLayout)
  const [hover, setHover] = useState<HoverState | null>(null)

  const containerRef = useRef<HTMLDivElement>(null)
  const svgRef = useRef<SVGSVGElement>(null)
  const size = useContainerSize(containerRef)
  const theme = useThemeMode()

  const { selectedId, focusedSubject } = viewState
  // Read by the draw effect so selection changes don't force a redraw
  const selectedRef = useRef(selectedId)
  selectedRef.current = selectedId

  const layout = useMemo(() => {
    if (!size) return null
    debug.perf('layout')
    const result = getLayoutStrategy(layoutKind).computeLayout(model.tree, size, { focusedSubject })
    debug.perfEnd('layout')
    return result
  }, [model, size, layoutKind, focusedSubject])

  const handlers = useMemo<DiagramHandlers>(() => ({
    onSelect: id => dispatch({ type: 'select', id }),
    onClear: () => dispatch({ type: 'clearSelection' }),
    onFocus: subject => dispatch({ type: 'toggleFocus', subject }),
    onHover: (id, anchor) => setHover(id && anchor ? { id, anchor } : null)
  }), [])

  useEffect(() => {
    const svgEl = svgRef.current
    if (!svgEl || !layout) return
    setHover(null)
    drawDiagram(svgEl, layout, { model, theme, selectedId: selectedRef.current, handlers })
  }, [layout, model, theme, handlers])

  useEffect(() => {
    const svgEl = svgRef.current
    if (svgEl) updateSelection(svgEl, selectedId)
  }, [selectedId, layout])

  useEffect(() => {
    const onKeyDown = (e: KeyboardEvent) => {
      if (e.key === 'Escape') dispatch({ type: 'clearSelection' })
    }
    window.addEventListener('keydown', onKeyDown)
    return () => window.removeEventListener('keydown', onKeyDown)
  }, [])

  const selectCourse = useCallback((id: string) => dispatch({ type: 'select', id }), [])
  const toggleFocus = useCallback(
    (subject: string | null) => dispatch({ type: 'toggleFocus', subject }),
    []
  )

  const detail = useMemo(() => describeCourse(selectedId, model), [selectedId, model])
  const hoveredMeta = hover ? model.courses.get(hover.id) : undefined

  return (
    <div className="cw-viz" data-cw-theme={theme} data-cw-phase={interactionPhase(viewState)}>
      <div className="cw-toolbar">
        <Legend subjects={model.subjects} focusedSubject={focusedSubject} onToggleFocus={toggleFocus} />
        <LayoutTabs activeLayout={layoutKind} onLayoutChange={setLayoutKind} />
        <CourseSearch courses={model.courses} focusedSubject={focusedSubject} onSelect={selectCourse} />
        <button
          type="button"
          className="cw-clear"
          hidden={!selectedId}
          onClick={() => dispatch({ type: 'clearSelection' })}
        >
          Clear selection
        </button>
      </div>

      <div className="cw-body">
        <div ref={containerRef} className="cw-canvas" style={{ position: 'relative' }}>
          <svg ref={svgRef} className="cw-svg" width="100%" height="100%" />
          {hover && hoveredMeta && (
            <CourseTooltip meta={hoveredMeta} anchor={hover.anchor} containerRef={containerRef} />
          )}
        </div>
        <DetailPanel detail={detail} focusedSubject={focusedSubject} onSelect={selectCourse} />
      </div>

      <CourseList
        tree={model.tree}
        focusedSubject={focusedSubject}
        selectedId={selectedId}
        onSelect={selectCourse}
      />
    </div>
  )
}

// ============================================
// Mount
// ============================================

export function CourseworkViz({
  dataUrl = DATA_FILE,
  initialLayout = DEFAULT_LAYOUT,
  fetchImpl
}: CourseworkVizProps) {
  const [model, setModel] = useState<CourseworkModel | null>(null)
  const [loading, setLoading] = useState(true)
  const [error, setError] = useState<string | null>(null)

  const fetchData = useCallback(async () => {
    try {
      setLoading(true)
      const loaded = await loadCoursework(dataUrl, fetchImpl)
      debug.data(`Loaded ${loaded.courses.size} courses in ${loaded.subjects.length} subjects`)
      setModel(loaded)
    } catch (err) {
      console.error('Failed to load coursework data', err)
      setError(LOAD_FAILURE_TEXT)
    } finally {
      setLoading(false)
    }
  }, [dataUrl, fetchImpl])

  // StrictMode replays mount effects in development; request each URL once
  const requestedUrl = useRef<string | null>(null)

  useEffect(() => {
    if (requestedUrl.current === dataUrl) return
    requestedUrl.current = dataUrl
    void fetchData()
  }, [dataUrl, fetchData])

  if (error) {
    return <div className="cw-status cw-error" role="alert">{error}</div>
  }

  if (loading || !model) {
    return <div className="cw-status">Loading coursework...</div>
  }

  return <CourseworkExplorer model={model} initialLayout={initialLayout} />
}

export default CourseworkViz
