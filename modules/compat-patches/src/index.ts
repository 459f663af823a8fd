export * from './patch-engine'
export * from './patches'
export * from './signatures'
