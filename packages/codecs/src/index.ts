export * from './cue/index'
export * from './dsf/index'
