export * from './errors'
export * from './format'
export * from './stream'
export * from './struct'
export * from './types'
