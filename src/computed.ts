/**
 * Tendril Computed-Value Engine
 * =============================
 *
 * A computed value is an ordinary store key whose value is produced by a
 * derivation over other keys. The engine evaluates the derivation on
 * registration and again whenever one of its dependencies is delivered.
 *
 * Dependencies are declared, not tracked: the dependency graph is known at
 * registration time, which is where cycles are rejected.
 */

import type { Diagnostics } from './diagnostics'
import { ComputeError, CycleError } from './errors'
import type { ReactiveStore } from './store'
import type { Unsubscribe, WatcherRegistry } from './watchers'

// =============================================================================
// TYPES
// =============================================================================

/**
 * @template T The derived value type.
 */
export interface ComputedDescriptor<T = unknown> {
  readonly key: string
  readonly compute: () => T
  readonly dependencies: readonly string[]
}

interface ComputedEntry extends ComputedDescriptor {
  readonly recompute: () => void
}

export interface ComputedEngineOptions {
  store: ReactiveStore
  watchers: WatcherRegistry
  diagnostics: Diagnostics
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export class ComputedEngine {
  private readonly entries = new Map<string, ComputedEntry>()

  constructor(private readonly options: ComputedEngineOptions) {}

  /**
   * Registers a computed key, evaluates it, and keeps it in sync with its
   * dependencies.
   *
   * @throws CycleError when `dependencies` contains `key`, or reaches it
   *   through other computed keys. Nothing is registered in that case.
   * @returns A function that unregisters the computed key.
   */
  register<T>(key: string, compute: () => T, dependencies: readonly string[]): Unsubscribe {
    const deps = Array.from(new Set(dependencies))
    for (const dependency of deps) {
      const path = this.findPath(dependency, key, new Set())
      if (path) throw new CycleError([key, ...path])
    }

    if (this.entries.has(key)) {
      this.options.diagnostics.log('warn', `[tendril] Computed "${key}" is already registered. Replacing it.`)
      this.remove(key)
    }

    const entry: ComputedEntry = {
      key,
      compute,
      dependencies: deps,
      recompute: () => this.evaluate(entry)
    }
    this.entries.set(key, entry)
    this.evaluate(entry)

    for (const dependency of deps) {
      this.options.watchers.watch(dependency, entry.recompute)
    }

    return () => {
      if (this.entries.get(key) === entry) this.remove(key)
    }
  }

  /** @returns `true` when `key` was a computed key. */
  remove(key: string): boolean {
    const entry = this.entries.get(key)
    if (!entry) return false
    for (const dependency of entry.dependencies) {
      this.options.watchers.unwatch(dependency, entry.recompute)
    }
    this.entries.delete(key)
    return true
  }

  has(key: string): boolean {
    return this.entries.has(key)
  }

  dependenciesOf(key: string): readonly string[] | undefined {
    return this.entries.get(key)?.dependencies
  }

  get size(): number {
    return this.entries.size
  }

  clear(): void {
    for (const key of Array.from(this.entries.keys())) this.remove(key)
  }

  private evaluate(entry: ComputedEntry): void {
    try {
      this.options.store.set(entry.key, entry.compute())
    } catch (error) {
      this.options.diagnostics.report(new ComputeError(entry.key, error))
    }
  }

  /**
   * Depth-first search from `from` to `target` along computed dependencies.
   * Returns the path including both ends, or `null`.
   */
  private findPath(from: string, target: string, seen: Set<string>): string[] | null {
    if (from === target) return [from]
    if (seen.has(from)) return null
    seen.add(from)

    const entry = this.entries.get(from)
    if (!entry) return null
    for (const dependency of entry.dependencies) {
      const path = this.findPath(dependency, target, seen)
      if (path) return [from, ...path]
    }
    return null
  }
}
