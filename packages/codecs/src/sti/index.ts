export * from './canvas'
export * from './codec'
export * from './decoder'
export * from './encoder'
export * from './etrle'
export * from './header'
export * from './palette'
export * from './quantize'
export * from './types'
