import { useEffect, useState, type RefObject } from 'react'
import type { Size } from '../types'
import { observeContainerSize, type ObserveOptions } from '../utils/resize'

/**
 * Tracks the size of `ref`'s element, updating only on changes that pass
 * the resize threshold. Null until the element has a non-zero size.
 */
export function useContainerSize(
  ref: RefObject<Element>,
  { threshold, debounceMs }: ObserveOptions = {}
): Size | null {
  const [size, setSize] = useState<Size | null>(null)

  useEffect(() => {
    const el = ref.current
    if (!el) return
    return observeContainerSize(el, setSize, { threshold, debounceMs })
  }, [ref, threshold, debounceMs])

  return size
}
