/**
 * Tendril Reactive Store
 * ======================
 *
 * Keyed mapping from identifier to an immutable `ReactiveValue` record. The
 * store only detects changes and reports them to its write listener; batching
 * and delivery belong to the scheduler.
 */

import { TypeMismatchError } from './errors'
import { deepEqual, valueKind } from './equality'
import type { EqualityFn, ValueKind } from './equality'

// =============================================================================
// TYPES
// =============================================================================

/**
 * A stored value plus the time of its last effective change.
 * @template T The value type.
 */
export interface ReactiveValue<T> {
  readonly value: T
  readonly lastUpdated: number
}

/** Serializable `{ key: value }` view of the whole store. */
export type StoreSnapshot = Record<string, unknown>

/**
 * Called after every effective write, with the record that was replaced
 * (`undefined` when the key is new).
 */
export type WriteListener = (key: string, previous: ReactiveValue<unknown> | undefined) => void

export interface StoreOptions {
  equals?: EqualityFn
  now?: () => number
  onWrite?: WriteListener
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export class ReactiveStore {
  private readonly values = new Map<string, ReactiveValue<unknown>>()
  private readonly kinds = new Map<string, ValueKind>()
  private readonly equals: EqualityFn
  private readonly now: () => number
  private readonly onWrite: WriteListener | undefined
  private closed = false

  constructor(options: StoreOptions = {}) {
    this.equals = options.equals ?? deepEqual
    this.now = options.now ?? Date.now
    this.onWrite = options.onWrite
  }

  /**
   * Reads a key, creating it with `defaultValue` on first access. Creating a
   * key declares its kind but never notifies.
   */
  get<T>(key: string, defaultValue: T): T {
    const existing = this.values.get(key)
    if (existing) return existing.value as T
    if (this.closed) return defaultValue

    this.values.set(key, { value: defaultValue, lastUpdated: this.now() })
    this.declare(key, defaultValue)
    return defaultValue
  }

  /** Returns the current record of a key without creating it. */
  peek(key: string): ReactiveValue<unknown> | undefined {
    return this.values.get(key)
  }

  has(key: string): boolean {
    return this.values.has(key)
  }

  /**
   * Writes a value. Equal values are ignored.
   * @returns `true` when the write changed the store.
   * @throws TypeMismatchError when the value's kind differs from the key's declared kind.
   */
  set<T>(key: string, value: T): boolean {
    if (this.closed) return false

    const previous = this.values.get(key)
    if (previous && this.equals(previous.value, value)) return false

    this.check(key, value)
    this.values.set(key, { value, lastUpdated: this.now() })
    this.declare(key, value)
    this.onWrite?.(key, previous)
    return true
  }

  /**
   * Puts a record back as it was, or removes the key when `record` is
   * `undefined`. Used to roll back transactions; does not notify.
   */
  restore(key: string, record: ReactiveValue<unknown> | undefined): void {
    if (record === undefined) {
      this.values.delete(key)
      this.kinds.delete(key)
      return
    }
    this.values.set(key, record)
    this.declare(key, record.value)
  }

  /** The declared kind of a key, if it has one. */
  kindOf(key: string): ValueKind | undefined {
    return this.kinds.get(key)
  }

  keys(): string[] {
    return Array.from(this.values.keys())
  }

  get size(): number {
    return this.values.size
  }

  snapshot(): StoreSnapshot {
    const snapshot: StoreSnapshot = {}
    for (const [key, record] of this.values) {
      snapshot[key] = structuredClone(record.value)
    }
    return snapshot
  }

  clear(): void {
    this.values.clear()
    this.kinds.clear()
  }

  /** Makes every further write a no-op. */
  close(): void {
    this.closed = true
  }

  get isClosed(): boolean {
    return this.closed
  }

  private check(key: string, value: unknown): void {
    const declared = this.kinds.get(key)
    const received = valueKind(value)
    if (declared !== undefined && received !== null && received !== declared) {
      throw new TypeMismatchError(key, declared, received)
    }
  }

  private declare(key: string, value: unknown): void {
    const kind = valueKind(value)
    if (kind !== null && !this.kinds.has(key)) this.kinds.set(key, kind)
  }
}
