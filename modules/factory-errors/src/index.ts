export * from './factory-errors'
