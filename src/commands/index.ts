export * from './compile'
export * from './list'
export * from './platforms'
