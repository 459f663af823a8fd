export * from './crate-set'
export * from './registry-client'
export * from './version-order'
export * from './version-resolver'
