export * from './mask'
export * from './specs'
export * from './types'
