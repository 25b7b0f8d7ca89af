export * from './registrar'
