/**
 * Tendril Runtime
 * ===============
 *
 * One runtime per loaded module. It owns the store, the watcher registry,
 * the batch scheduler, the computed engine, the transaction coordinator and
 * the execution bridge, and is the single surface the view layer talks to.
 *
 * --- FEATURES ---
 * - Keyed reactive values with deep-equality change detection.
 * - Batched delivery: one notification per key per tick.
 * - Computed values with declared dependencies and cycle rejection.
 * - Transactions that flush once, with opt-in rollback.
 * - Two-way binding between store keys and WebAssembly memory.
 * - Collection adapters over single keys.
 *
 * @example
 * ```ts
 * const runtime = createRuntime({ bindings: [{ key: 'count', offset: 0, width: 4 }] })
 * await runtime.load(bytes, { count: 1 })
 *
 * runtime.watch('count', value => render(value))
 * runtime.computed('double', () => runtime.getValue('count', 0) * 2, ['count'])
 * runtime.callFunction('increment')
 * ```
 */

import { ExecutionBridge } from './bridge'
import type { BridgeState, CallOutcome } from './bridge'
import { ReactiveList, ReactiveMap } from './collections'
import { ComputedEngine } from './computed'
import { resolveRuntimeOptions } from './config'
import type { ResolvedRuntimeOptions, RuntimeOptions } from './config'
import type { Diagnostics } from './diagnostics'
import { LoadError } from './errors'
import type { SandboxValue } from './sandbox'
import { BatchScheduler } from './scheduler'
import { ReactiveStore } from './store'
import type { ReactiveValue, StoreSnapshot } from './store'
import { TransactionCoordinator } from './transaction'
import type { TransactionOptions } from './transaction'
import { WatcherRegistry } from './watchers'
import type { Unsubscribe, Watcher } from './watchers'

// =============================================================================
// TYPES
// =============================================================================

export interface RuntimeStats {
  valueCount: number
  /** Every registration, including the engine's own computed and bridge watchers. */
  watcherCount: number
  pendingUpdates: number
  disposed: boolean
  computedCount: number
  tickCount: number
  bridgeState: BridgeState
}

const noop: Unsubscribe = () => {}

// =============================================================================
// RUNTIME
// =============================================================================

export class Runtime {
  readonly diagnostics: Diagnostics

  private readonly options: ResolvedRuntimeOptions
  private readonly store: ReactiveStore
  private readonly watchers: WatcherRegistry
  private readonly scheduler: BatchScheduler
  private readonly computeds: ComputedEngine
  private readonly transactions: TransactionCoordinator
  private bridge: ExecutionBridge
  private disposed = false

  constructor(options: RuntimeOptions = {}) {
    this.options = resolveRuntimeOptions(options)
    this.diagnostics = this.options.diagnostics

    this.watchers = new WatcherRegistry(this.diagnostics)
    this.scheduler = new BatchScheduler({
      tickInterval: this.options.tickInterval,
      maxFlushRounds: this.options.maxFlushRounds,
      diagnostics: this.diagnostics,
      deliver: key => this.watchers.notify(key, this.store.peek(key)?.value)
    })
    this.store = new ReactiveStore({
      equals: this.options.equals,
      now: this.options.now,
      onWrite: (key, previous) => {
        this.transactions.record(key, previous)
        this.scheduler.mark(key)
      }
    })
    this.transactions = new TransactionCoordinator(this.scheduler, this.store, this.diagnostics)
    this.computeds = new ComputedEngine({ store: this.store, watchers: this.watchers, diagnostics: this.diagnostics })
    this.bridge = this.createBridge()
  }

  get isDisposed(): boolean {
    return this.disposed
  }

  // ---------------------------------------------------------------------------
  // Module
  // ---------------------------------------------------------------------------

  /**
   * Loads a compiled module and binds its memory. A failed load leaves the
   * runtime without a module; calling `load` again starts over.
   *
   * @throws LoadError when the runtime is disposed, a module is already
   *   loaded or loading, or the module cannot be instantiated.
   * @throws BindingError when the bindings or layout table are invalid.
   */
  async load(bytecode: BufferSource, initialState: Readonly<Record<string, unknown>> = {}): Promise<void> {
    if (this.disposed) throw new LoadError('runtime has been disposed')
    const state = this.bridge.state
    if (state === 'ready' || state === 'loading') {
      throw new LoadError(state === 'ready' ? 'a module is already loaded' : 'a module is already loading')
    }
    if (state === 'failed') this.bridge = this.createBridge()
    await this.bridge.load(bytecode, initialState)
  }

  callFunction(name: string, args: readonly SandboxValue[] = []): CallOutcome {
    return this.bridge.callFunction(name, args)
  }

  /** Names of the loaded module's exported functions. */
  functionNames(): string[] {
    return this.bridge.functionNames()
  }

  /** Pulls every bound key from memory now. */
  poll(): number {
    return this.bridge.poll()
  }

  /** Pushes every bound key into memory now. */
  pushAll(): number {
    return this.bridge.pushAll()
  }

  // ---------------------------------------------------------------------------
  // Values
  // ---------------------------------------------------------------------------

  /**
   * Reads a key, creating it with `defaultValue` on first access.
   */
  getValue<T>(key: string, defaultValue: T): T {
    return this.store.get(key, defaultValue)
  }

  /**
   * Writes a key. Watchers see the value on the next tick.
   * @returns `false` when the value was equal to the current one.
   * @throws TypeMismatchError
   */
  setValue<T>(key: string, value: T): boolean {
    return this.store.set(key, value)
  }

  peek(key: string): ReactiveValue<unknown> | undefined {
    return this.store.peek(key)
  }

  has(key: string): boolean {
    return this.store.has(key)
  }

  keys(): string[] {
    return this.store.keys()
  }

  // ---------------------------------------------------------------------------
  // Watchers & scheduling
  // ---------------------------------------------------------------------------

  watch<T = unknown>(key: string, watcher: Watcher<T>): Unsubscribe {
    if (this.disposed) return noop
    return this.watchers.watch(key, watcher)
  }

  unwatch<T = unknown>(key: string, watcher: Watcher<T>): boolean {
    return this.watchers.unwatch(key, watcher)
  }

  /** Delivers every pending update now instead of on the next tick. */
  flush(): void {
    this.scheduler.flush()
  }

  /** Discards pending updates without delivering them. */
  clear(): void {
    this.scheduler.clear()
  }

  /**
   * Runs `work` as one batch: its writes are delivered in a single flush when
   * the outermost transaction ends.
   */
  transaction<TResult>(work: () => TResult, options?: TransactionOptions): TResult {
    return this.transactions.run(work, options)
  }

  /**
   * Registers a computed key.
   * @throws CycleError
   */
  computed<T>(key: string, compute: () => T, dependencies: readonly string[]): Unsubscribe {
    if (this.disposed) return noop
    return this.computeds.register(key, compute, dependencies)
  }

  // ---------------------------------------------------------------------------
  // Collections
  // ---------------------------------------------------------------------------

  list<T>(key: string, initial: readonly T[] = []): ReactiveList<T> {
    return new ReactiveList(this, key, initial)
  }

  map<K, V>(key: string, initial?: Iterable<readonly [K, V]>): ReactiveMap<K, V> {
    return new ReactiveMap(this, key, initial)
  }

  // ---------------------------------------------------------------------------
  // Persistence & lifecycle
  // ---------------------------------------------------------------------------

  /** Structured clone of every value, for storage collaborators. */
  snapshot(): StoreSnapshot {
    return this.store.snapshot()
  }

  /**
   * Writes every entry of a snapshot in one transaction. A write that fails
   * rolls back the whole restore.
   */
  restore(snapshot: StoreSnapshot): void {
    this.transaction(
      () => {
        for (const [key, value] of Object.entries(snapshot)) this.store.set(key, value)
      },
      { rollback: true }
    )
  }

  getStats(): RuntimeStats {
    return {
      valueCount: this.store.size,
      watcherCount: this.watchers.count(),
      pendingUpdates: this.scheduler.pendingCount,
      disposed: this.disposed,
      computedCount: this.computeds.size,
      tickCount: this.scheduler.tickCount,
      bridgeState: this.bridge.state
    }
  }

  /**
   * Stops every timer, drops every registration and releases the module.
   * Later writes, watches, polls and flushes have no effect.
   */
  dispose(): void {
    if (this.disposed) return
    this.disposed = true
    this.bridge.dispose()
    this.computeds.clear()
    this.scheduler.dispose()
    this.watchers.clear()
    this.store.close()
    this.diagnostics.log('debug', '[tendril] Runtime disposed')
  }

  private createBridge(): ExecutionBridge {
    return new ExecutionBridge({
      host: {
        peek: key => this.store.peek(key),
        write: (key, value) => this.store.set(key, value),
        watch: (key, watcher) => this.watchers.watch(key, watcher),
        transaction: (work, options) => this.transactions.run(work, options)
      },
      sandbox: this.options.sandbox,
      diagnostics: this.diagnostics,
      equals: this.options.equals,
      syncMode: this.options.syncMode,
      pollInterval: this.options.pollInterval,
      bindings: this.options.bindings
    })
  }
}

/**
 * Creates a runtime. Options are resolved once; see `RuntimeOptions` for
 * defaults.
 * @throws RangeError for invalid numeric options.
 */
export function createRuntime(options: RuntimeOptions = {}): Runtime {
  return new Runtime(options)
}
