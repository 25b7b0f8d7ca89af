export * from './context'
export * from './api'
