export * from './decoder'
export * from './types'
