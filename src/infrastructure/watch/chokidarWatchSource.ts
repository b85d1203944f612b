/**
 * Infrastructure Layer - chokidar Watch Source
 *
 * One chokidar watcher per subscription, limited to the entries of the
 * subscribed directory (depth 0). Raw add/unlink/change notifications go
 * through a RenameCoalescer before reaching the listener. The initial scan
 * only records each file's `dev:ino` key so renames can be recognised.
 */

import type { Stats } from 'node:fs'
import { resolve } from 'node:path'
import { watch } from 'chokidar'
import type { WatchEvent, WatchOptions, WatchSource, WatchSubscription } from '../../core/ports/watchSource.js'
import { toError } from '../../core/errors.js'
import { RenameCoalescer } from './renameCoalescer.js'

export type ChokidarWatchSourceOptions = {
  /** How long an unlink waits for a matching add before it counts as a delete. */
  moveWindowMs?: number
  usePolling?: boolean
  pollIntervalMs?: number
  onWarn?: (message: string) => void
}

export const DEFAULT_MOVE_WINDOW_MS = 300

function fileKey(stats: Stats | undefined): string | undefined {
  return stats ? `${stats.dev}:${stats.ino}` : undefined
}

export class ChokidarWatchSource implements WatchSource {
  readonly #moveWindowMs: number
  readonly #usePolling: boolean
  readonly #pollIntervalMs: number
  readonly #warn: (message: string) => void
  readonly #open = new Set<WatchSubscription>()

  constructor(opts: ChokidarWatchSourceOptions = {}) {
    this.#moveWindowMs = opts.moveWindowMs ?? DEFAULT_MOVE_WINDOW_MS
    this.#usePolling = opts.usePolling ?? false
    this.#pollIntervalMs = opts.pollIntervalMs ?? 100
    this.#warn = opts.onWarn ?? ((message: string) => console.warn(message))
  }

  subscribe(
    directory: string,
    _options: WatchOptions,
    listener: (event: WatchEvent) => void,
    onError?: (error: Error) => void
  ): WatchSubscription {
    let active = true
    const coalescer = new RenameCoalescer({
      windowMs: this.#moveWindowMs,
      emit: (event) => {
        if (active) listener(event)
      }
    })

    const watcher = watch(directory, {
      depth: 0,
      ignoreInitial: false,
      alwaysStat: true,
      persistent: true,
      usePolling: this.#usePolling,
      interval: this.#pollIntervalMs
    })

    let scanning = true
    watcher.on('add', (path: string, stats?: Stats) => {
      if (scanning) coalescer.track(resolve(path), fileKey(stats))
      else coalescer.added(resolve(path), fileKey(stats))
    })
    watcher.on('unlink', (path: string) => coalescer.unlinked(resolve(path)))
    watcher.on('change', (path: string, stats?: Stats) => coalescer.changed(resolve(path), fileKey(stats)))
    watcher.on('error', (error: unknown) => {
      if (!active) return
      if (onError) onError(toError(error))
      else this.#warn(`[ChokidarWatchSource] watcher error for ${directory}: ${toError(error).message}`)
    })

    const ready = new Promise<void>((resolveReady) => {
      watcher.once('ready', () => {
        scanning = false
        resolveReady()
      })
    })

    const subscription: WatchSubscription = {
      ready,
      unsubscribe: () => {
        if (!active) return
        active = false
        this.#open.delete(subscription)
        coalescer.dispose()
        watcher.close().catch((error: unknown) => {
          this.#warn(`[ChokidarWatchSource] failed to close watcher for ${directory}: ${toError(error).message}`)
        })
      }
    }
    this.#open.add(subscription)
    return subscription
  }

  get activeSubscriptionCount(): number {
    return this.#open.size
  }

  /** Unsubscribe everything still open. */
  close(): void {
    for (const subscription of [...this.#open]) subscription.unsubscribe()
  }
}
