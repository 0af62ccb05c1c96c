export * from './configStore'
export * from './normalize'
