export * from './ports/index.js'
export * from './errors.js'
export * from './fileIdentity.js'
export { ChangeTracker } from './changeTracker.js'
