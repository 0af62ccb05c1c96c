export { createConfigResource } from './configResource'
export type { ConfigResource } from './configResource'
export { createSimulationResource } from './simulationResource'
export type { SimulationResource, SimulationResourceOptions } from './simulationResource'
export { createLoopResource } from './loopResource'
export type { LoopResource, LoopResourceOptions, SwarmFrameContext } from './loopResource'
