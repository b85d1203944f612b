/**
 * Application Layer - File Handle
 *
 * Owns one data value, the identity of the file it is persisted to, a
 * change tracker and at most one watch subscription on the file's
 * directory. Filesystem events for the file are reconciled against the
 * identity: moves and modifications re-derive it, deletions are reported on
 * `events$` and change nothing.
 *
 * Every step that awaits runs under one mutex, so reconciliation never
 * interleaves with an open or a save.
 */

import { resolve } from 'node:path'
import { Subject } from 'rxjs'
import { ChangeTracker } from '../core/changeTracker.js'
import { FileDeletedError, HandleDisposedError, toError } from '../core/errors.js'
import {
  UNSET_IDENTITY,
  assertComplete,
  deriveFromPath,
  isComplete,
  sameIdentity,
  toAbsolutePath,
  type FileIdentity,
} from '../core/fileIdentity.js'
import {
  watchEventPath,
  type FileStore,
  type Serializer,
  type Subscribable,
  type WatchEvent,
  type WatchSource,
  type WatchSubscription,
} from '../core/ports/index.js'
import { AsyncMutex } from '../shared/asyncMutex.js'

// ============================================================================
// Types
// ============================================================================

export type RelocationReason = 'moved' | 'recovered' | 'saveAs'

export type FileHandleEvent =
  | { type: 'saved'; path: string }
  | { type: 'modified'; path: string }
  | { type: 'relocated'; from: string | null; to: string; reason: RelocationReason }
  | { type: 'deleted'; error: FileDeletedError }
  | { type: 'error'; error: Error }

export type FileHandleDeps<T> = {
  serializer: Serializer<T>
  store: FileStore
  watchSource: WatchSource
  /** Value held before anything is opened or set. */
  initialData: T
}

// ============================================================================
// Implementation
// ============================================================================

export class FileHandle<T> {
  readonly #serializer: Serializer<T>
  readonly #store: FileStore
  readonly #watchSource: WatchSource
  readonly #tracker = new ChangeTracker()
  readonly #mutex = new AsyncMutex()
  readonly #events = new Subject<FileHandleEvent>()

  #identity: FileIdentity = UNSET_IDENTITY
  #data: T
  #subscription: WatchSubscription | null = null
  #disposed = false

  constructor(deps: FileHandleDeps<T>) {
    this.#serializer = deps.serializer
    this.#store = deps.store
    this.#watchSource = deps.watchSource
    this.#data = deps.initialData
  }

  /**
   * Build a handle and, when a path is given, open it (creating the file
   * when nothing exists there yet).
   */
  static async create<T>(deps: FileHandleDeps<T>, path?: string): Promise<FileHandle<T>> {
    const handle = new FileHandle(deps)
    if (path === undefined) return handle
    try {
      await handle.open(path)
    } catch (error) {
      handle.dispose()
      throw error
    }
    return handle
  }

  get events$(): Subscribable<FileHandleEvent> {
    return this.#events.asObservable()
  }

  // ======================== Data ========================

  getData(): T {
    return this.#data
  }

  setData(value: T): void {
    this.#data = value
    this.markDirty()
  }

  /** Replace the data with the result of `recipe` applied to the current value. */
  update(recipe: (current: T) => T): void {
    this.setData(recipe(this.#data))
  }

  hasUnsavedChanges(): boolean {
    return this.#tracker.isDirty()
  }

  /** For subclasses whose own mutators change state the serializer persists. */
  protected markDirty(): void {
    this.#tracker.markDirty()
  }

  // ======================== Identity ========================

  getIdentity(): FileIdentity {
    return { ...this.#identity }
  }

  /**
   * @throws IncompleteIdentityError when the handle has never been given a path
   */
  getAbsolutePath(): string {
    return toAbsolutePath(this.#identity, 'path')
  }

  isWatching(): boolean {
    return this.#subscription !== null
  }

  isDisposed(): boolean {
    return this.#disposed
  }

  // ======================== Persistence ========================

  /**
   * Load the value stored at `path`. When nothing exists there, behaves as
   * `saveAs(path)`.
   */
  async open(path: string): Promise<void> {
    await this.#exclusive('open', async () => {
      const absolutePath = resolve(path)
      if (!(await this.#store.exists(absolutePath))) {
        await this.#saveAsLocked(absolutePath)
        return
      }

      const identity = deriveFromPath(absolutePath)
      assertComplete(identity, 'watch')
      const data = this.#serializer.decode(await this.#store.readBytes(absolutePath))

      this.#identity = identity
      this.#data = data
      this.#tracker.markClean()
      await this.#watch()
    })
  }

  /**
   * @throws IncompleteIdentityError before any I/O when the identity is incomplete
   */
  async save(): Promise<void> {
    await this.#exclusive('save', async () => {
      const path = toAbsolutePath(this.#identity, 'save')
      await this.#write(path)
      this.#emit({ type: 'saved', path })
    })
  }

  async saveAs(path: string): Promise<void> {
    await this.#exclusive('save as', () => this.#saveAsLocked(resolve(path)))
  }

  /**
   * Point the handle at `newPath` after the original file went away. Nothing
   * is written until the next `save()`.
   */
  async recoverFromDelete(newPath: string): Promise<void> {
    await this.#exclusive('recover from delete', async () => {
      const from = this.#currentPath()
      await this.#relocate(resolve(newPath))
      this.#emit({ type: 'relocated', from, to: toAbsolutePath(this.#identity), reason: 'recovered' })
    })
  }

  /** Resolves once every queued operation and pending reconciliation has run. */
  async whenIdle(): Promise<void> {
    await this.#mutex.idle()
  }

  /**
   * Stop watching and close `events$`. The subscription is released before
   * this returns; later persistence calls reject with HandleDisposedError.
   */
  dispose(): void {
    if (this.#disposed) return
    this.#disposed = true
    this.#unwatch()
    this.#events.complete()
  }

  // ======================== Internals ========================

  async #exclusive<R>(operation: string, fn: () => Promise<R>): Promise<R> {
    this.#assertUsable(operation)
    return this.#mutex.runExclusive(async () => {
      this.#assertUsable(operation)
      return fn()
    })
  }

  #assertUsable(operation: string): void {
    if (this.#disposed) throw new HandleDisposedError(operation)
  }

  #currentPath(): string | null {
    return isComplete(this.#identity) ? toAbsolutePath(this.#identity) : null
  }

  async #write(path: string): Promise<void> {
    const checkpoint = this.#tracker.checkpoint()
    const bytes = this.#serializer.encode(this.#data)
    await this.#store.writeBytes(path, bytes)
    this.#tracker.markClean(checkpoint)
  }

  async #saveAsLocked(absolutePath: string): Promise<void> {
    const identity = deriveFromPath(absolutePath)
    const target = toAbsolutePath(identity, 'save')
    const from = this.#currentPath()

    await this.#write(target)
    this.#identity = identity
    this.#emit({ type: 'saved', path: target })

    await this.#watch()
    if (from !== target) {
      this.#emit({ type: 'relocated', from, to: target, reason: 'saveAs' })
    }
  }

  /**
   * Take on the identity of `absolutePath` and re-root the subscription
   * there. A live subscription for the same identity is kept.
   */
  async #relocate(absolutePath: string): Promise<void> {
    const identity = deriveFromPath(absolutePath)
    assertComplete(identity, 'watch')
    if (this.#subscription !== null && sameIdentity(identity, this.#identity)) return
    this.#identity = identity
    await this.#watch()
  }

  async #watch(): Promise<void> {
    assertComplete(this.#identity, 'watch')
    this.#unwatch()
    if (this.#disposed) return

    const subscription = this.#watchSource.subscribe(
      this.#identity.directory,
      { recursive: false },
      (event) => this.#onWatchEvent(event),
      (error) => this.#emit({ type: 'error', error })
    )
    this.#subscription = subscription

    try {
      await subscription.ready
    } catch (error) {
      if (this.#subscription === subscription) this.#unwatch()
      throw error
    }
  }

  #unwatch(): void {
    const subscription = this.#subscription
    this.#subscription = null
    subscription?.unsubscribe()
  }

  #onWatchEvent(event: WatchEvent): void {
    if (this.#disposed) return
    this.#mutex
      .runExclusive(() => this.#reconcile(event))
      .catch((error: unknown) => this.#emit({ type: 'error', error: toError(error) }))
  }

  async #reconcile(event: WatchEvent): Promise<void> {
    const current = this.#currentPath()
    if (this.#disposed || current === null) return
    if (resolve(watchEventPath(event)) !== current) return

    switch (event.type) {
      case 'modified': {
        await this.#relocate(resolve(event.path))
        this.#emit({ type: 'modified', path: toAbsolutePath(this.#identity) })
        return
      }
      case 'moved': {
        await this.#relocate(resolve(event.destPath))
        this.#emit({ type: 'relocated', from: current, to: toAbsolutePath(this.#identity), reason: 'moved' })
        return
      }
      case 'deleted': {
        this.#emit({ type: 'deleted', error: new FileDeletedError(this.#identity) })
        return
      }
    }
  }

  #emit(event: FileHandleEvent): void {
    this.#events.next(event)
  }
}
