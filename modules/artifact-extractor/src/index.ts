export * from './artifact-extractor'
export * from './artifact-names'
export * from './lockfile'
export * from './rlib-collector'
export * from './release-packer'
