export * from './factory-layout'
export * from './fake-command-runner'
export * from './fake-registry'
export * from './recording-logger'
