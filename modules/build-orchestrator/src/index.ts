export * from './architectures'
export * from './build-orchestrator'
export * from './build-sink'
export * from './command-runner'
export * from './toolchain'
