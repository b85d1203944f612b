export type { Subscribable, Subscription } from './subscribable.js'
export type { Serializer } from './serializer.js'
export type { FileStore } from './fileStore.js'
export type { WatchEvent, WatchOptions, WatchSource, WatchSubscription } from './watchSource.js'
export { watchEventPath } from './watchSource.js'
