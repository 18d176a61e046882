import merge from 'lodash/merge'

import type { DeepRequired } from '../types/utils'
import type { HierarchyConfig } from './types'

export const DEFAULT_HIERARCHY_CONFIG: DeepRequired<HierarchyConfig> = {
  directed: true,
  debug: {
    log: false,
    timing: false,
    timingThreshold: 50,
  },
}

/** Merge a partial user config over the defaults. */
export const resolveConfig = (
  config: HierarchyConfig = {},
): DeepRequired<HierarchyConfig> =>
  merge({}, DEFAULT_HIERARCHY_CONFIG, config)
