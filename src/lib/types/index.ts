export * from './events'
export * from './json'
export * from './options'
export * from './platform'
export * from './solc'
export * from './standard'
