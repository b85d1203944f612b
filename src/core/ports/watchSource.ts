/**
 * Core Layer - Ports
 *
 * WatchSource is the external facility that reports filesystem changes for
 * the entries of one directory. The core only subscribes and unsubscribes.
 */

import type { Subscription } from './subscribable.js'

// ============================================================================
// Events
// ============================================================================

export type WatchEvent =
  | { type: 'moved'; srcPath: string; destPath: string }
  | { type: 'deleted'; path: string }
  | { type: 'modified'; path: string }

/** The path an event is reported against (the source path for moves). */
export function watchEventPath(event: WatchEvent): string {
  return event.type === 'moved' ? event.srcPath : event.path
}

// ============================================================================
// Subscription
// ============================================================================

export type WatchOptions = {
  /** Only non-recursive watching is supported by the core. */
  recursive: false
}

export interface WatchSubscription extends Subscription {
  /**
   * Resolves once the source is actually observing the directory.
   * Sources that are live immediately may omit it.
   */
  readonly ready?: Promise<void>
}

export interface WatchSource {
  /**
   * Start delivering events for entries of `directory`.
   *
   * `unsubscribe()` on the returned handle is synchronous: no event is
   * delivered to `listener` after it returns.
   */
  subscribe(
    directory: string,
    options: WatchOptions,
    listener: (event: WatchEvent) => void,
    onError?: (error: Error) => void
  ): WatchSubscription
}
