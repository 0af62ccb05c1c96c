export * from './random'
export * from './vector'
