/**
 * Simulation Resource
 *
 * Dependency Graph:
 *   config
 *     ↓
 *   simulation ← config
 */

import { defineResource } from 'braided'
import { createSimulation } from '../simulation'
import type { Simulation, SimulationOptions } from '../simulation'
import type { ConfigResource } from './configResource'

export type SimulationResource = Simulation

export type SimulationResourceOptions = Omit<SimulationOptions, 'config'>

export const createSimulationResource = (options: SimulationResourceOptions = {}) =>
  defineResource({
    dependencies: ['config'],
    start: ({ config }: { config: ConfigResource }) => {
      const simulation = createSimulation({ ...options, config })
      console.log('[Simulation] Ready')
      return simulation
    },
    halt: (simulation: SimulationResource) => {
      simulation.pause()
      simulation.events.clear()
      simulation.step$.clear()
    },
  })
