export * from './arrays'
export * from './atomic-write'
export * from './camelize-record'
export * from './constructs'
export * from './file-tree'
export * from './line-lists'
export * from './misc'
