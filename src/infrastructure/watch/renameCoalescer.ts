/**
 * Infrastructure Layer - Rename Coalescer
 *
 * chokidar reports a rename inside a directory as an `unlink` of the old
 * name and an `add` of the new one, in either order. The coalescer holds
 * each half for `windowMs` waiting for its partner:
 *
 * - unlink + add of another path with the same file key -> moved
 * - unlink + add of the same path                        -> modified (delete-and-replace saves)
 * - unlink alone                                         -> deleted, once the window expires
 * - add alone                                            -> dropped; creation is not a watch event
 *
 * A file key (`dev:ino`) is remembered per path from `track`, `added` and
 * `changed`. An unlink whose key is unknown never pairs with an add of
 * another path, so a sibling created while the file is deleted is not
 * mistaken for its new name.
 */

import type { WatchEvent } from '../../core/ports/watchSource.js'

type Pending = {
  path: string
  key: string | undefined
  timer: ReturnType<typeof setTimeout>
}

export type RenameCoalescerOptions = {
  windowMs: number
  emit: (event: WatchEvent) => void
}

export class RenameCoalescer {
  readonly #windowMs: number
  readonly #emit: (event: WatchEvent) => void
  readonly #keys = new Map<string, string>()
  #unlinks: Pending[] = []
  #adds: Pending[] = []

  constructor(opts: RenameCoalescerOptions) {
    this.#windowMs = opts.windowMs
    this.#emit = opts.emit
  }

  /** Remember the key of a file that already existed when watching started. */
  track(path: string, key: string | undefined): void {
    if (key !== undefined) this.#keys.set(path, key)
  }

  unlinked(path: string): void {
    const key = this.#keys.get(path)
    this.#keys.delete(path)
    const add = key === undefined
      ? undefined
      : this.#take(this.#adds, (candidate) => candidate.path !== path && candidate.key === key)
    if (add) {
      this.#emit({ type: 'moved', srcPath: path, destPath: add.path })
      return
    }
    this.#hold(this.#unlinks, path, key, () => this.#emit({ type: 'deleted', path }))
  }

  added(path: string, key?: string): void {
    this.track(path, key)
    if (this.#take(this.#unlinks, (candidate) => candidate.path === path)) {
      this.#emit({ type: 'modified', path })
      return
    }
    const unlink = key === undefined
      ? undefined
      : this.#take(this.#unlinks, (candidate) => candidate.key === key)
    if (unlink) {
      this.#emit({ type: 'moved', srcPath: unlink.path, destPath: path })
      return
    }
    this.#hold(this.#adds, path, key, () => undefined)
  }

  changed(path: string, key?: string): void {
    this.track(path, key)
    this.#emit({ type: 'modified', path })
  }

  get pendingCount(): number {
    return this.#unlinks.length + this.#adds.length
  }

  /** Drop everything still held without emitting it. */
  dispose(): void {
    for (const pending of [...this.#unlinks, ...this.#adds]) clearTimeout(pending.timer)
    this.#unlinks = []
    this.#adds = []
    this.#keys.clear()
  }

  #hold(queue: Pending[], path: string, key: string | undefined, onExpire: () => void): void {
    const pending: Pending = {
      path,
      key,
      timer: setTimeout(() => {
        const index = queue.indexOf(pending)
        if (index === -1) return
        queue.splice(index, 1)
        onExpire()
      }, this.#windowMs)
    }
    queue.push(pending)
  }

  #take(queue: Pending[], match: (pending: Pending) => boolean): Pending | undefined {
    const index = queue.findIndex(match)
    if (index === -1) return undefined
    const [pending] = queue.splice(index, 1)
    if (pending) clearTimeout(pending.timer)
    return pending
  }
}
