export * from './types.js'
export * from './records.js'
export * from './errors.js'
export * from './status.js'
export * from './workspace/guard.js'
export * from './findings/relocate.js'
export * from './findings/filter.js'
export * from './graph/neighborhood.js'
