export { ChokidarWatchSource, DEFAULT_MOVE_WINDOW_MS, type ChokidarWatchSourceOptions } from './chokidarWatchSource.js'
export { InMemoryWatchSource } from './inMemoryWatchSource.js'
export { RenameCoalescer, type RenameCoalescerOptions } from './renameCoalescer.js'
