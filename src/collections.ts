/**
 * Tendril Collection Adapters
 * ===========================
 *
 * `ReactiveList` and `ReactiveMap` present a single store key as a mutable
 * collection. Every mutation builds a new frozen collection and writes it
 * with one `set`, so watchers of the key see one notification per batch and
 * never a half-applied change. Mutations that leave the collection as it was
 * are dropped by the store's equality check.
 */

import type { Unsubscribe, Watcher } from './watchers'

/** The runtime surface the adapters write through. */
export interface CollectionHost {
  getValue<T>(key: string, defaultValue: T): T
  setValue<T>(key: string, value: T): boolean
  watch<T = unknown>(key: string, watcher: Watcher<T>): Unsubscribe
}

type Entries<K, V> = ReadonlyArray<readonly [K, V]>

// =============================================================================
// REACTIVE LIST
// =============================================================================

/**
 * An ordered list stored under one key as a frozen array.
 * @template T The element type.
 *
 * @example
 * ```ts
 * const todos = runtime.list<string>('todos')
 * todos.add('write docs', 'ship')
 * todos.watch(items => console.log(items.length))
 * ```
 */
export class ReactiveList<T> {
  private readonly empty: readonly T[] = Object.freeze([])

  constructor(
    private readonly host: CollectionHost,
    readonly key: string,
    initial: readonly T[] = []
  ) {
    host.getValue<readonly T[]>(key, Object.freeze([...initial]))
  }

  /** The current items. The array is frozen. */
  get items(): readonly T[] {
    return this.host.getValue(this.key, this.empty)
  }

  get length(): number {
    return this.items.length
  }

  at(index: number): T | undefined {
    return this.items.at(index)
  }

  indexOf(value: T): number {
    return this.items.indexOf(value)
  }

  includes(value: T): boolean {
    return this.items.includes(value)
  }

  add(...values: T[]): boolean {
    if (values.length === 0) return false
    return this.commit([...this.items, ...values])
  }

  /** @throws RangeError when `index` is outside `0..length`. */
  insert(index: number, value: T): boolean {
    const items = this.items
    if (!Number.isInteger(index) || index < 0 || index > items.length) {
      throw new RangeError(`[tendril] List "${this.key}" cannot insert at ${index} (length ${items.length})`)
    }
    return this.commit([...items.slice(0, index), value, ...items.slice(index)])
  }

  /** @throws RangeError when `index` is outside `0..length - 1`. */
  set(index: number, value: T): boolean {
    const items = this.items
    if (!Number.isInteger(index) || index < 0 || index >= items.length) {
      throw new RangeError(`[tendril] List "${this.key}" has no index ${index} (length ${items.length})`)
    }
    const next = [...items]
    next[index] = value
    return this.commit(next)
  }

  /** Removes the first occurrence of `value`. */
  remove(value: T): boolean {
    const index = this.items.indexOf(value)
    if (index === -1) return false
    this.removeAt(index)
    return true
  }

  /** @returns The removed item, or `undefined` when `index` is out of range. */
  removeAt(index: number): T | undefined {
    const items = this.items
    if (!Number.isInteger(index) || index < 0 || index >= items.length) return undefined
    const removed = items[index]
    this.commit([...items.slice(0, index), ...items.slice(index + 1)])
    return removed
  }

  clear(): boolean {
    return this.commit([])
  }

  replace(values: readonly T[]): boolean {
    return this.commit([...values])
  }

  watch(watcher: (items: readonly T[]) => void): Unsubscribe {
    return this.host.watch<readonly T[]>(this.key, items => watcher(items))
  }

  /** A mutable copy of the items. */
  toArray(): T[] {
    return [...this.items]
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]()
  }

  private commit(next: T[]): boolean {
    return this.host.setValue<readonly T[]>(this.key, Object.freeze(next))
  }
}

// =============================================================================
// REACTIVE MAP
// =============================================================================

/**
 * A keyed collection stored under one key as a frozen array of frozen
 * `[key, value]` entries, in insertion order.
 * @template K The entry key type.
 * @template V The entry value type.
 */
export class ReactiveMap<K, V> {
  private readonly empty: Entries<K, V> = Object.freeze([])

  constructor(
    private readonly host: CollectionHost,
    readonly key: string,
    initial?: Iterable<readonly [K, V]>
  ) {
    host.getValue<Entries<K, V>>(key, freezeEntries(new Map(initial)))
  }

  get size(): number {
    return this.entriesArray().length
  }

  get(key: K): V | undefined {
    return this.toMap().get(key)
  }

  has(key: K): boolean {
    return this.toMap().has(key)
  }

  keys(): K[] {
    return this.entriesArray().map(([key]) => key)
  }

  values(): V[] {
    return this.entriesArray().map(([, value]) => value)
  }

  entries(): Array<readonly [K, V]> {
    return [...this.entriesArray()]
  }

  set(key: K, value: V): boolean {
    const map = this.toMap()
    map.set(key, value)
    return this.commit(map)
  }

  delete(key: K): boolean {
    const map = this.toMap()
    if (!map.delete(key)) return false
    return this.commit(map)
  }

  clear(): boolean {
    return this.commit(new Map())
  }

  /** Watchers receive a read-only copy of the map. */
  watch(watcher: (map: ReadonlyMap<K, V>) => void): Unsubscribe {
    return this.host.watch<Entries<K, V>>(this.key, entries => watcher(new Map(entries)))
  }

  /** A mutable copy of the entries as a `Map`. */
  toMap(): Map<K, V> {
    return new Map(this.entriesArray())
  }

  private entriesArray(): Entries<K, V> {
    return this.host.getValue(this.key, this.empty)
  }

  private commit(map: Map<K, V>): boolean {
    return this.host.setValue(this.key, freezeEntries(map))
  }
}

function freezeEntries<K, V>(map: ReadonlyMap<K, V>): Entries<K, V> {
  return Object.freeze(Array.from(map, ([key, value]) => Object.freeze([key, value] as const)))
}
