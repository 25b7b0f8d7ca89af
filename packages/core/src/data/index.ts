export * from './deepCopy'
export * from './value'
export * from './registry'
