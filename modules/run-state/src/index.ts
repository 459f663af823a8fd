export * from './log-classifier'
export * from './run-state-schema'
export * from './run-state-store'
export * from './run-summary'
