/**
 * DEBUG SYSTEM
 *
 * Development: Shows detailed logs with category prefixes
 * Production and test runs: functions are no-ops
 *
 * Usage:
 *   import { debug } from './utils/debug'
 *   debug.layout('Treemap grid:', rows, cols)
 *   debug.perf('Layout calculation')
 *   // ... code ...
 *   debug.perfEnd('Layout calculation')
 */

const IS_DEV = import.meta.env.DEV && import.meta.env.MODE !== 'test'

const noop = (..._args: unknown[]): void => {}

const createLogger = (prefix: string) =>
  IS_DEV ? console.log.bind(console, `[${prefix}]`) : noop

const createWarn = (prefix: string) =>
  IS_DEV ? console.warn.bind(console, `[${prefix}]`) : noop

export const debug = {
  // Dataset loading and indexing (courseIndex.ts, loadCoursework.ts)
  data: createLogger('Data'),
  dataWarn: createWarn('Data'),

  // Layout strategies (layouts/*)
  layout: createLogger('Layout'),
  layoutWarn: createWarn('Layout'),

  // Drawing (drawDiagram.ts)
  render: createLogger('Render'),

  // Container observation
  resize: createLogger('Resize'),

  perf: IS_DEV ? console.time.bind(console) : noop,
  perfEnd: IS_DEV ? console.timeEnd.bind(console) : noop,
}

export default debug
