/**
 * Runtime configuration for the coursework visualization
 *
 * Values that depend on the build come from Vite's env; the rest are
 * layout and interaction constants shared by the layouts and components.
 */

export type LayoutKind = 'treemap' | 'sunburst' | 'radial-tree' | 'circle-pack'

export const LAYOUT_KINDS: readonly LayoutKind[] = ['treemap', 'sunburst', 'radial-tree', 'circle-pack']

export const LAYOUT_LABELS: Record<LayoutKind, string> = {
  'treemap': 'Treemap',
  'sunburst': 'Sunburst',
  'radial-tree': 'Radial tree',
  'circle-pack': 'Circle pack'
}

export function isLayoutKind(value: unknown): value is LayoutKind {
  return typeof value === 'string' && (LAYOUT_KINDS as readonly string[]).includes(value)
}

/**
 * Resolves the configured layout, falling back to the treemap for
 * missing or unknown values.
 */
export function resolveLayoutKind(value: string | undefined): LayoutKind {
  return isLayoutKind(value) ? value : 'treemap'
}

// Use Vite's base URL so the resource resolves under any mount path
export const DATA_FILE = `${import.meta.env.BASE_URL}data/courses.json`

export const DEFAULT_LAYOUT: LayoutKind = resolveLayoutKind(import.meta.env.VITE_COURSEWORK_LAYOUT)

/** Size changes below this many pixels are treated as reflow jitter */
export const RESIZE_THRESHOLD_PX = 4

/** Debounce for the window-resize fallback when ResizeObserver is missing */
export const RESIZE_DEBOUNCE_MS = 160

export const LOAD_FAILURE_TEXT = 'Failed to load visualization.'

export const SUBJECT_COLORS: Record<string, string> = {
  'Physics': '#2563eb',
  'Electronics': '#f97316',
  'Mathematics': '#16a34a',
  'Computer Science': '#8b5cf6',
  'Economics': '#b45309',
  'Other': '#64748b'
}

export const FALLBACK_SUBJECT_COLOR = '#475569'

export const SURFACE_COLORS = {
  light: '#f8fafc',
  dark: '#0f172a'
} as const
