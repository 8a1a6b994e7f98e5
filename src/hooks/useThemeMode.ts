import { useEffect, useState } from 'react'
import type { ThemeMode } from '../types'
import { readThemeMode } from '../utils/theme'

/**
 * Current theme, following `data-theme` on <html> and the OS colour-scheme
 * preference as either changes.
 */
export function useThemeMode(): ThemeMode {
  const [theme, setTheme] = useState<ThemeMode>(() => readThemeMode())

  useEffect(() => {
    const update = () => setTheme(readThemeMode())

    const observer = new MutationObserver(update)
    observer.observe(document.documentElement, { attributes: true, attributeFilter: ['data-theme'] })

    const media = typeof window.matchMedia === 'function'
      ? window.matchMedia('(prefers-color-scheme: dark)')
      : null
    media?.addEventListener('change', update)

    return () => {
      observer.disconnect()
      media?.removeEventListener('change', update)
    }
  }, [])

  return theme
}
