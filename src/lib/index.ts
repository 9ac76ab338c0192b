// Types
export * from './types'

// Errors
export * from './errors'

// Path identity
export * from './naming/filename'

// Compilation model
export * from './compilation/compiler-version'
export * from './compilation/libraries'
export * from './compilation/natspec'
export * from './compilation/unit'
export * from './compilation/session'

// Platforms
export * from './platforms/types'
export * from './platforms/registry'
export * from './platforms/process'
export * from './platforms/guess-tests'
export * from './platforms/dapp'
export * from './platforms/waffle'
export * from './platforms/hardhat'
export * from './platforms/foundry'
export * from './platforms/standard'

// Export / import
export * from './export/standard'

// Events
export * from './events'

// Configuration
export * from './config/loader'

// Parsers
export * from './parsers/buildinfo'
export * from './parsers/solc-output'
