import type { LayoutKind } from '../config'
import { circlePackLayout } from './CirclePackLayout'
import type { LayoutStrategy } from './LayoutStrategy'
import { radialTreeLayout } from './RadialTreeLayout'
import { sunburstLayout } from './SunburstLayout'
import { treemapLayout } from './TreemapLayout'

export type * from './LayoutStrategy'

const STRATEGIES: Record<LayoutKind, LayoutStrategy> = {
  'treemap': treemapLayout,
  'sunburst': sunburstLayout,
  'radial-tree': radialTreeLayout,
  'circle-pack': circlePackLayout
}

export function getLayoutStrategy(kind: LayoutKind): LayoutStrategy {
  return STRATEGIES[kind]
}
