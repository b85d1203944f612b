/**
 * Core Layer - Ports
 *
 * Minimal typed pub/sub abstraction.
 *
 * Core ports depend on this interface instead of any concrete library
 * (e.g. RxJS). Infrastructure implementations are free to use an RxJS
 * Subject internally; an Observable returned by `Subject.asObservable()`
 * satisfies `Subscribable<T>` structurally.
 */

// ============================================================================
// Subscription Handle
// ============================================================================

/**
 * Returned by `Subscribable.subscribe()`.
 * Call `unsubscribe()` to stop receiving values.
 */
export interface Subscription {
  unsubscribe(): void
}

// ============================================================================
// Subscribable Interface
// ============================================================================

export interface Subscribable<T> {
  subscribe(callback: (value: T) => void): Subscription
}
