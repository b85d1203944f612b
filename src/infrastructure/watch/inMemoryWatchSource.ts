/**
 * Infrastructure Layer - In-Memory Watch Source
 *
 * Events are pushed by the owner through `emit()` and delivered to every
 * subscriber whose directory contains the event's (source) path.
 * Non-recursive: a subscriber on `/a` does not see `/a/b/file`.
 */

import { dirname, resolve } from 'node:path'
import { Subject, filter } from 'rxjs'
import {
  watchEventPath,
  type WatchEvent,
  type WatchOptions,
  type WatchSource,
  type WatchSubscription,
} from '../../core/ports/watchSource.js'

export class InMemoryWatchSource implements WatchSource {
  readonly #subject = new Subject<WatchEvent>()
  readonly #directories = new Map<string, number>()

  subscribe(directory: string, _options: WatchOptions, listener: (event: WatchEvent) => void): WatchSubscription {
    const watched = resolve(directory)
    const inner = this.#subject
      .pipe(filter((event) => dirname(resolve(watchEventPath(event))) === watched))
      .subscribe(listener)
    this.#directories.set(watched, (this.#directories.get(watched) ?? 0) + 1)

    let closed = false
    return {
      unsubscribe: () => {
        if (closed) return
        closed = true
        inner.unsubscribe()
        const remaining = (this.#directories.get(watched) ?? 1) - 1
        if (remaining > 0) this.#directories.set(watched, remaining)
        else this.#directories.delete(watched)
      }
    }
  }

  emit(event: WatchEvent): void {
    this.#subject.next(event)
  }

  activeSubscriptionCount(directory?: string): number {
    if (directory !== undefined) return this.#directories.get(resolve(directory)) ?? 0
    let total = 0
    for (const count of this.#directories.values()) total += count
    return total
  }

  /** Directories with at least one live subscription. */
  watchedDirectories(): string[] {
    return [...this.#directories.keys()].sort()
  }

  close(): void {
    this.#subject.complete()
    this.#directories.clear()
  }
}
