// Types
export * from './types/contracts'
export * from './types/artifacts'
export * from './errors'

// Address cache and orchestration
export * from './contracts/cache'
export * from './deployer'

// Linking
export * from './linking/linker'
export * from './parsers/bytecode'
export * from './artifacts'

// Backends
export * from './backend/types'
export * from './backend/ethers'

// Light client procedures
export * from './light-client'
export * from './run'
export * from './config'

// Events
export * from './events'
