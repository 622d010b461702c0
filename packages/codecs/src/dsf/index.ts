export * from './decoder'
export * from './encoder'
export * from './extract'
export * from './id3'
export * from './types'
