export * from './types'
export * from './emitter'
export * from './cli-adapter'
