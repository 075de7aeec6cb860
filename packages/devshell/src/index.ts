export * from './catalog'
export * from './check'
export * from './config'
export * from './config-validation'
export * from './descriptor'
export * from './errors'
export * from './flake-ref'
export * from './logging'
export * from './package-set'
export * from './platform'
export * from './render'
export type * from './types'
