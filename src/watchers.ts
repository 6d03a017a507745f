/**
 * Watcher registry: per-key ordered sets of callbacks with isolated delivery.
 */

import type { Diagnostics } from './diagnostics'
import { WatcherError } from './errors'

// =============================================================================
// TYPES
// =============================================================================

/**
 * Callback invoked with a key's current value after a flush.
 * Declared through a method so that a `Watcher<number>` can be registered
 * where `Watcher<unknown>` is stored.
 */
export type Watcher<T = unknown> = {
  bivarianceHack(value: T, key: string): void
}['bivarianceHack']

export type Unsubscribe = () => void

/** Called when a watcher throws. Defaults to reporting a `WatcherError`. */
export type WatcherFailureHandler = (key: string, error: unknown) => void

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export class WatcherRegistry {
  private readonly watchers = new Map<string, Set<Watcher>>()
  private readonly onFailure: WatcherFailureHandler

  constructor(diagnostics: Diagnostics, onFailure?: WatcherFailureHandler) {
    this.onFailure = onFailure ?? ((key, error) => diagnostics.report(new WatcherError(key, error)))
  }

  /**
   * Registers a callback. Registering the same callback twice for a key has
   * no further effect.
   */
  watch(key: string, watcher: Watcher): Unsubscribe {
    let set = this.watchers.get(key)
    if (!set) {
      set = new Set()
      this.watchers.set(key, set)
    }
    set.add(watcher)
    return () => {
      this.unwatch(key, watcher)
    }
  }

  /** @returns `true` when the callback was registered. */
  unwatch(key: string, watcher: Watcher): boolean {
    const set = this.watchers.get(key)
    if (!set) return false
    const removed = set.delete(watcher)
    if (set.size === 0) this.watchers.delete(key)
    return removed
  }

  /**
   * Calls every watcher of `key` in registration order. A throwing watcher is
   * reported and the remaining watchers still run.
   */
  notify(key: string, value: unknown): void {
    const set = this.watchers.get(key)
    if (!set) return
    for (const watcher of Array.from(set)) {
      try {
        watcher(value, key)
      } catch (error) {
        this.onFailure(key, error)
      }
    }
  }

  has(key: string): boolean {
    return this.watchers.has(key)
  }

  /** Number of registrations for one key, or across all keys. */
  count(key?: string): number {
    if (key !== undefined) return this.watchers.get(key)?.size ?? 0
    let total = 0
    for (const set of this.watchers.values()) total += set.size
    return total
  }

  clear(): void {
    this.watchers.clear()
  }
}
