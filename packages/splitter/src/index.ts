export * from './boundaries'
export * from './config'
export * from './fileSource'
export * from './logger'
export * from './naming'
export * from './split'
