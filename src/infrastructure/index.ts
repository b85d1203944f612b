/**
 * Infrastructure Layer Index
 *
 * Re-exports the adapters behind the core ports.
 */

// Serialization
export * from './serialization/index.js'

// Filesystem
export * from './filesystem/index.js'

// Watching
export * from './watch/index.js'
