/**
 * Swarm Events
 *
 * Event map of the simulation's event bus. Names come from swarmKeywords.events.
 */

import type { EventBus } from '@liks/system'
import { swarmKeywords } from '../vocabulary'

export type PopulationEvent = {
  frame: number
  count: number
  /** Population after the change */
  total: number
}

export type FrameEvent = {
  frame: number
}

export type SwarmEvents = {
  [swarmKeywords.events.spawned]: PopulationEvent
  [swarmKeywords.events.culled]: PopulationEvent
  [swarmKeywords.events.truncated]: PopulationEvent
  [swarmKeywords.events.paused]: FrameEvent
  [swarmKeywords.events.resumed]: FrameEvent
  [swarmKeywords.events.randomized]: FrameEvent & { keys: Array<string> }
}

export type SwarmEventBus = EventBus<SwarmEvents>
