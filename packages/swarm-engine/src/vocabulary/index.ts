/**
 * Swarm Vocabulary
 *
 * Keywords and schemas shared by every module of the engine.
 */

export * from './keywords'
export * from './schemas'
