export * from './phase'
export * from './hooks'
export * from './lifecycle'
