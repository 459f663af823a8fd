export * from './batch-driver'
export * from './config-template'
export * from './crate-runner'
export * from './factory'
export * from './factory-config'
export * from './single-build'
