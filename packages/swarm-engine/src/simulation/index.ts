export { MAX_FRAME_STEP, REFERENCE_FPS, createSimulation, toReferenceFrames } from './simulation'
export type { Simulation, SimulationOptions, StepInfo } from './simulation'
export type { FrameEvent, PopulationEvent, SwarmEventBus, SwarmEvents } from './events'
