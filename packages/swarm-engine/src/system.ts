/**
 * Swarm System Configuration
 *
 * Dependency Graph:
 *   config (no deps)
 *       ↓
 *   simulation ← config
 *       ↓
 *   loop ← simulation, config
 */

import { haltSystem, startSystem } from 'braided'
import type { StartedSystem } from 'braided'
import type { ConfigStoreOptions } from './config'
import {
  createConfigResource,
  createLoopResource,
  createSimulationResource,
} from './resources'
import type { LoopResourceOptions, SimulationResourceOptions } from './resources'

export type SwarmSystemOptions = {
  config?: ConfigStoreOptions
  simulation?: SimulationResourceOptions
  loop?: LoopResourceOptions
}

export function createSwarmSystemConfig(options: SwarmSystemOptions = {}) {
  return {
    config: createConfigResource(options.config),
    simulation: createSimulationResource(options.simulation),
    loop: createLoopResource(options.loop),
  }
}

export const swarmSystemConfig = createSwarmSystemConfig()

export type SwarmSystemConfig = ReturnType<typeof createSwarmSystemConfig>
export type SwarmSystem = StartedSystem<SwarmSystemConfig>

/**
 * Start a swarm system, failing when any resource failed to start
 */
export async function startSwarmSystem(
  systemConfig: SwarmSystemConfig = swarmSystemConfig,
): Promise<SwarmSystem> {
  const result = await startSystem(systemConfig)

  if (result.errors.size > 0) {
    console.error('[SwarmSystem] System started with errors:', result.errors)
    await haltSystem(systemConfig, result.system)
    throw new Error(
      `[SwarmSystem] Start failed: ${Array.from(result.errors.entries())
        .map(([key, error]) => `${key}: ${error.message}`)
        .join(', ')}`,
    )
  }

  console.log('[SwarmSystem] Started')
  return result.system
}

export async function haltSwarmSystem(
  system: SwarmSystem,
  systemConfig: SwarmSystemConfig = swarmSystemConfig,
): Promise<void> {
  await haltSystem(systemConfig, system)
  console.log('[SwarmSystem] Halted')
}
