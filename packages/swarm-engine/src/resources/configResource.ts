/**
 * Config Resource
 *
 * The parameter store as a braided resource. No dependencies; everything
 * else in the system reads and writes parameters through it.
 */

import { defineResource } from 'braided'
import { createConfigStore } from '../config'
import type { ConfigStore, ConfigStoreOptions } from '../config'

export type ConfigResource = ConfigStore

export const createConfigResource = (options: ConfigStoreOptions = {}) =>
  defineResource({
    start: () => {
      const config = createConfigStore(options)
      console.log(`[Config] Loaded ${config.definitions().length} parameters`)
      return config
    },
    halt: () => {
      console.log('[Config] Halted')
    },
  })
