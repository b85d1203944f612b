import { resolve } from 'node:path'
import { FileHandle } from '../application/fileHandle.js'
import type { FileStore, Serializer, WatchSource } from '../core/ports/index.js'
import { loadAppConfig, type AppConfig } from '../config/appConfig.js'
import { FsFileStore } from '../infrastructure/filesystem/fsFileStore.js'
import { createSerializer, initialDataFor, type SerializerFormat } from '../infrastructure/serialization/createSerializer.js'
import { ChokidarWatchSource } from '../infrastructure/watch/chokidarWatchSource.js'

export type App = {
  baseDir: string
  config: AppConfig
  serializer: Serializer<unknown>
  store: FileStore
  watchSource: WatchSource
  /** Open `path` (relative to `baseDir`), creating it when it does not exist yet. */
  openHandle(path: string): Promise<FileHandle<unknown>>
  /** Release every watch subscription still open on a watch source the app created. */
  dispose(): void
}

export function createApp(opts: {
  baseDir: string
  env?: NodeJS.ProcessEnv
  format?: SerializerFormat
  store?: FileStore
  /** Injected sources stay open on `dispose()`; their owner closes them. */
  watchSource?: WatchSource
  onWarn?: (message: string) => void
}): App {
  const config = loadAppConfig({ baseDir: opts.baseDir, env: opts.env })
  const format = opts.format ?? config.serializer
  const serializer = createSerializer(format, { space: 2 })
  const store = opts.store ?? new FsFileStore()
  let ownedWatchSource: ChokidarWatchSource | null = null
  let watchSource: WatchSource
  if (opts.watchSource) {
    watchSource = opts.watchSource
  } else {
    ownedWatchSource = new ChokidarWatchSource({
      moveWindowMs: config.watch.moveWindowMs,
      usePolling: config.watch.usePolling,
      pollIntervalMs: config.watch.pollIntervalMs,
      onWarn: opts.onWarn,
    })
    watchSource = ownedWatchSource
  }

  return {
    baseDir: opts.baseDir,
    config: { ...config, serializer: format },
    serializer,
    store,
    watchSource,
    openHandle: (path) =>
      FileHandle.create(
        { serializer, store, watchSource, initialData: initialDataFor(format) },
        resolve(opts.baseDir, path)
      ),
    dispose: () => ownedWatchSource?.close(),
  }
}
