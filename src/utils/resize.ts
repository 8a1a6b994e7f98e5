/**
 * Container size observation
 *
 * ResizeObserver notifications are coalesced into one measurement per
 * animation frame; without ResizeObserver a debounced window `resize`
 * listener is used. Measurements only reach the caller when they pass the
 * size gate, so sub-threshold reflow jitter never triggers a re-layout.
 */

import type { Size } from '../types'
import { RESIZE_DEBOUNCE_MS, RESIZE_THRESHOLD_PX } from '../config'
import { debug } from './debug'

export interface SizeGate {
  /** True when `size` should trigger a re-layout; records it as the last accepted size */
  accept: (size: Size) => boolean
  readonly last: Size | null
}

export function createSizeGate(threshold: number = RESIZE_THRESHOLD_PX): SizeGate {
  let last: Size | null = null
  return {
    accept(size) {
      if (!size.width || !size.height) return false
      if (
        last &&
        Math.abs(size.width - last.width) < threshold &&
        Math.abs(size.height - last.height) < threshold
      ) {
        return false
      }
      last = { width: size.width, height: size.height }
      return true
    },
    get last() {
      return last
    }
  }
}

export function measureElement(el: Element): Size {
  const rect = el.getBoundingClientRect()
  return {
    width: Math.round(rect.width || el.clientWidth || 0),
    height: Math.round(rect.height || el.clientHeight || 0)
  }
}

export function debounce(fn: () => void, wait: number): { (): void; cancel: () => void } {
  let timer: ReturnType<typeof setTimeout> | undefined
  const debounced = () => {
    if (timer !== undefined) clearTimeout(timer)
    timer = setTimeout(() => {
      timer = undefined
      fn()
    }, wait)
  }
  debounced.cancel = () => {
    if (timer !== undefined) clearTimeout(timer)
    timer = undefined
  }
  return debounced
}

export interface ObserveOptions {
  threshold?: number
  debounceMs?: number
}

/**
 * Calls `onResize` with the element's size now (when non-zero) and after
 * every change of at least `threshold` px. Returns a disposer.
 */
export function observeContainerSize(
  el: Element,
  onResize: (size: Size) => void,
  { threshold = RESIZE_THRESHOLD_PX, debounceMs = RESIZE_DEBOUNCE_MS }: ObserveOptions = {}
): () => void {
  const gate = createSizeGate(threshold)

  const check = () => {
    const size = measureElement(el)
    if (gate.accept(size)) {
      debug.resize(`Container ${size.width}x${size.height}`)
      onResize(size)
    }
  }

  check()

  if (typeof ResizeObserver !== 'undefined') {
    let frame: number | null = null
    const observer = new ResizeObserver(() => {
      if (frame !== null) cancelAnimationFrame(frame)
      frame = requestAnimationFrame(() => {
        frame = null
        check()
      })
    })
    observer.observe(el)
    return () => {
      if (frame !== null) cancelAnimationFrame(frame)
      observer.disconnect()
    }
  }

  const onWindowResize = debounce(check, debounceMs)
  window.addEventListener('resize', onWindowResize)
  return () => {
    onWindowResize.cancel()
    window.removeEventListener('resize', onWindowResize)
  }
}
