/**
 * Theme signal and colour helpers
 *
 * The host page sets `data-theme` on <html>; when it doesn't, the OS
 * colour-scheme preference decides.
 */

import * as d3 from 'd3'
import type { ThemeMode } from '../types'
import { FALLBACK_SUBJECT_COLOR, SUBJECT_COLORS, SURFACE_COLORS } from '../config'

export function readThemeMode(
  root: HTMLElement | null = typeof document !== 'undefined' ? document.documentElement : null,
  matchMedia: ((query: string) => Pick<MediaQueryList, 'matches'>) | undefined =
    typeof window !== 'undefined' && typeof window.matchMedia === 'function'
      ? window.matchMedia.bind(window)
      : undefined
): ThemeMode {
  const explicit = root?.dataset.theme
  if (explicit === 'dark' || explicit === 'light') return explicit
  const prefersDark = matchMedia ? matchMedia('(prefers-color-scheme: dark)').matches : false
  return prefersDark ? 'dark' : 'light'
}

export function surfaceColor(theme: ThemeMode): string {
  return SURFACE_COLORS[theme]
}

export function colorFor(subject: string): string {
  return SUBJECT_COLORS[subject] || FALLBACK_SUBJECT_COLOR
}

/**
 * Mixes a subject colour into the page surface in Lab space.
 * weight 0 → surface, 1 → the colour itself.
 */
export function blendWithSurface(color: string, weight: number, theme: ThemeMode): string {
  return d3.interpolateLab(surfaceColor(theme), color)(weight)
}

/** Fill weights per theme: subject backgrounds stay faint, tiles strong */
export const FILL_WEIGHTS: Record<ThemeMode, { region: number; tile: number }> = {
  light: { region: 0.12, tile: 0.74 },
  dark: { region: 0.18, tile: 0.62 }
}
