/**
 * Tendril Execution Bridge
 * ========================
 *
 * Mirrors the bound subset of the store into a sandboxed module's linear
 * memory and back. The bridge owns one sandbox instance for its whole life.
 *
 * --- LIFECYCLE ---
 * A robot3 machine drives the bridge:
 *
 *   unloaded --load--> loading --loaded--> ready --dispose--> disposed
 *                          \--fail--> failed
 *
 * `failed` is terminal for the bridge; the runtime builds a fresh bridge to
 * retry a load. Every state accepts `dispose`.
 *
 * --- SYNC ---
 * Module to store: pulled on the module's notify hook, on the poll timer, or
 * on demand through `poll()`.
 * Store to module: a watcher on every bound key pushes the delivered value
 * into memory.
 */

import { createMachine, interpret, state, transition } from 'robot3'
import type { Service } from 'robot3'
import { decodeBinding, encodeBinding } from './codec'
import type { SyncMode } from './config'
import type { Diagnostics } from './diagnostics'
import type { EqualityFn } from './equality'
import { BindingError, CallError, LoadError, TendrilError, TypeMismatchError, toError } from './errors'
import type { BindingInit, MemoryBinding } from './layout'
import { bindingsInRange, parseLayoutTable, validateBindings } from './layout'
import type { Sandbox, SandboxInstance, SandboxValue } from './sandbox'
import type { ReactiveValue } from './store'
import type { TransactionOptions } from './transaction'
import type { Unsubscribe, Watcher } from './watchers'

// =============================================================================
// LIFECYCLE MACHINE
// =============================================================================

export type BridgeState = 'unloaded' | 'loading' | 'ready' | 'failed' | 'disposed'

const BRIDGE_STATES: readonly BridgeState[] = ['unloaded', 'loading', 'ready', 'failed', 'disposed']

const lifecycle = createMachine({
  unloaded: state(transition('load', 'loading'), transition('dispose', 'disposed')),
  loading: state(
    transition('loaded', 'ready'),
    transition('fail', 'failed'),
    transition('dispose', 'disposed')
  ),
  ready: state(transition('dispose', 'disposed')),
  failed: state(transition('dispose', 'disposed')),
  disposed: state()
})

function isBridgeState(value: unknown): value is BridgeState {
  return BRIDGE_STATES.some(name => name === value)
}

// =============================================================================
// TYPES
// =============================================================================

/** The parts of the runtime the bridge reads and writes. */
export interface BridgeHost {
  peek(key: string): ReactiveValue<unknown> | undefined
  /** @throws TypeMismatchError */
  write(key: string, value: unknown): boolean
  watch(key: string, watcher: Watcher): Unsubscribe
  transaction<TResult>(work: () => TResult, options?: TransactionOptions): TResult
}

export interface BridgeOptions {
  host: BridgeHost
  sandbox: Sandbox
  diagnostics: Diagnostics
  equals: EqualityFn
  syncMode: SyncMode
  pollInterval: number
  /** Explicit bindings. When omitted the module's layout table is used. */
  bindings?: readonly BindingInit[]
}

export type CallOutcome =
  | { readonly ok: true; readonly value: unknown }
  | { readonly ok: false; readonly error: CallError }

export interface BridgeStats {
  state: BridgeState
  bindingCount: number
  polling: boolean
  pollCount: number
  pushCount: number
  notifyCount: number
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export class ExecutionBridge {
  private readonly service: Service<typeof lifecycle>
  private instance: SandboxInstance | null = null
  private active: MemoryBinding[] = []
  private unwatchers: Unsubscribe[] = []
  /** Last value known to be in memory, per bound key. */
  private readonly mirrored = new Map<string, unknown>()
  private pollTimer: ReturnType<typeof setInterval> | null = null
  private pollCount = 0
  private pushCount = 0
  private notifyCount = 0

  constructor(private readonly options: BridgeOptions) {
    this.service = interpret(lifecycle, service => {
      options.diagnostics.log('debug', `[tendril] Bridge entered "${String(service.machine.current)}"`)
    })
  }

  get state(): BridgeState {
    const current: unknown = this.service.machine.current
    if (!isBridgeState(current)) throw new Error(`[tendril] Unknown bridge state "${String(current)}"`)
    return current
  }

  get bindings(): readonly MemoryBinding[] {
    return this.active
  }

  get isPolling(): boolean {
    return this.pollTimer !== null
  }

  /**
   * Instantiates the module, binds memory, runs `_initialize`, seeds the
   * store and starts syncing.
   *
   * On failure the sandbox instance is released, nothing stays bound and the
   * bridge is `failed`.
   *
   * @throws LoadError or BindingError (as a rejection).
   */
  async load(bytecode: BufferSource, initialState: Readonly<Record<string, unknown>> = {}): Promise<void> {
    const initial = this.state
    if (initial !== 'unloaded') throw new LoadError(`bridge is ${initial}`)
    this.service.send('load')

    let instance: SandboxInstance | null = null
    try {
      instance = await this.options.sandbox.instantiate(bytecode, {
        notifyWrite: (offset, length) => this.handleNotify(offset, length)
      })
      if (this.state !== 'loading') {
        throw new LoadError('bridge was disposed while loading')
      }

      const bindings = validateBindings(this.resolveBindings(instance), instance.buffer().byteLength)

      const view = new DataView(instance.buffer())
      for (const binding of bindings) {
        if (Object.hasOwn(initialState, binding.key)) {
          encodeBinding(view, binding, initialState[binding.key])
        }
      }

      if (instance.hasFunction('_initialize')) {
        try {
          instance.call('_initialize', [])
        } catch (error) {
          throw new LoadError(`_initialize trapped: ${toError(error).message}`, { cause: error })
        }
      }

      this.seed(instance, bindings, initialState)

      this.instance = instance
      this.active = bindings
      for (const binding of bindings) {
        this.unwatchers.push(this.options.host.watch(binding.key, value => this.push(binding, value)))
      }
      this.service.send('loaded')

      if (this.shouldPoll(instance)) this.startPolling()
      this.options.diagnostics.log(
        'info',
        `[tendril] Module loaded with ${bindings.length} binding(s), ${this.isPolling ? 'polling' : 'notify'} sync`
      )
    } catch (error) {
      this.release()
      instance?.dispose()
      if (this.state === 'loading') this.service.send('fail')
      if (error instanceof LoadError || error instanceof BindingError) throw error
      throw new LoadError(toError(error).message, { cause: error })
    }
  }

  /**
   * Pulls every binding from memory into the store.
   * @returns The number of keys that changed.
   */
  poll(): number {
    const instance = this.readyInstance()
    if (!instance) return 0
    this.pollCount++
    return this.pull(instance, this.active)
  }

  /**
   * Writes the current store value of every bound key into memory.
   * @returns The number of bindings whose bytes changed.
   */
  pushAll(): number {
    if (!this.readyInstance()) return 0
    let pushed = 0
    for (const binding of this.active) {
      const record = this.options.host.peek(binding.key)
      if (record && this.push(binding, record.value, true)) pushed++
    }
    return pushed
  }

  /**
   * Calls an exported function. Failures are reported and returned, never
   * thrown, and leave the bridge's state unchanged.
   */
  callFunction(name: string, args: readonly SandboxValue[] = []): CallOutcome {
    const instance = this.readyInstance()
    let error: CallError
    if (!instance) {
      error = new CallError(name, `bridge is ${this.state}`)
    } else if (!instance.hasFunction(name)) {
      error = new CallError(name, 'module has no such exported function')
    } else {
      try {
        return { ok: true, value: instance.call(name, args) }
      } catch (cause) {
        error = new CallError(name, `trapped: ${toError(cause).message}`, { cause })
      }
    }
    this.options.diagnostics.report(error)
    return { ok: false, error }
  }

  /** Names of the module's exported functions, or `[]` when not ready. */
  functionNames(): string[] {
    return this.readyInstance()?.functionNames() ?? []
  }

  getStats(): BridgeStats {
    return {
      state: this.state,
      bindingCount: this.active.length,
      polling: this.isPolling,
      pollCount: this.pollCount,
      pushCount: this.pushCount,
      notifyCount: this.notifyCount
    }
  }

  dispose(): void {
    if (this.state === 'disposed') return
    this.release()
    this.instance?.dispose()
    this.instance = null
    this.service.send('dispose')
  }

  // ---------------------------------------------------------------------------

  private resolveBindings(instance: SandboxInstance): readonly BindingInit[] {
    if (this.options.bindings) return this.options.bindings
    return instance.layout === null ? [] : parseLayoutTable(instance.layout)
  }

  /** Writes the initial state, then every bound key read back from memory, as one batch. */
  private seed(
    instance: SandboxInstance,
    bindings: readonly MemoryBinding[],
    initialState: Readonly<Record<string, unknown>>
  ): void {
    const { host } = this.options
    host.transaction(
      () => {
        for (const [key, value] of Object.entries(initialState)) host.write(key, value)
        const view = new DataView(instance.buffer())
        for (const binding of bindings) {
          const value = decodeBinding(view, binding)
          this.mirrored.set(binding.key, value)
          try {
            host.write(binding.key, value)
          } catch (error) {
            if (!(error instanceof TypeMismatchError)) throw error
            throw new BindingError(binding.key, `memory holds a ${error.received}, key holds a ${error.expected}`, {
              cause: error
            })
          }
        }
      },
      { rollback: true }
    )
  }

  private shouldPoll(instance: SandboxInstance): boolean {
    switch (this.options.syncMode) {
      case 'poll':
        return true
      case 'notify':
        return false
      case 'auto':
        return !instance.notifies
    }
  }

  private startPolling(): void {
    this.pollTimer = setInterval(() => {
      if (this.state !== 'ready') return
      this.poll()
    }, this.options.pollInterval)
  }

  private handleNotify(offset: number, length: number): void {
    const instance = this.readyInstance()
    if (!instance) return
    this.notifyCount++
    this.pull(instance, bindingsInRange(this.active, offset, length))
  }

  /**
   * Bindings whose memory still matches the last mirrored value are skipped,
   * so a store write that has not been pushed yet is never replaced by the
   * stale bytes.
   */
  private pull(instance: SandboxInstance, bindings: readonly MemoryBinding[]): number {
    let changed = 0
    const { equals } = this.options
    const view = new DataView(instance.buffer())
    for (const binding of bindings) {
      try {
        const value = decodeBinding(view, binding)
        if (this.mirrored.has(binding.key) && equals(this.mirrored.get(binding.key), value)) continue
        this.mirrored.set(binding.key, value)
        if (this.options.host.write(binding.key, value)) changed++
      } catch (error) {
        this.options.diagnostics.report(asBindingError(binding.key, error))
      }
    }
    return changed
  }

  /**
   * Delivered values that match the last value mirrored from memory are
   * skipped, so a pull never echoes back over a newer module write. `force`
   * compares against memory itself.
   *
   * @returns `true` when memory was written.
   */
  private push(binding: MemoryBinding, value: unknown, force = false): boolean {
    const instance = this.readyInstance()
    if (!instance) return false
    const { equals } = this.options
    if (!force && this.mirrored.has(binding.key) && equals(this.mirrored.get(binding.key), value)) return false
    try {
      const view = new DataView(instance.buffer())
      if (force && equals(decodeBinding(view, binding), value)) {
        this.mirrored.set(binding.key, value)
        return false
      }
      encodeBinding(view, binding, value)
      this.mirrored.set(binding.key, value)
      this.pushCount++
      return true
    } catch (error) {
      this.options.diagnostics.report(asBindingError(binding.key, error))
      return false
    }
  }

  private readyInstance(): SandboxInstance | null {
    return this.state === 'ready' ? this.instance : null
  }

  private release(): void {
    if (this.pollTimer !== null) {
      clearInterval(this.pollTimer)
      this.pollTimer = null
    }
    for (const unwatch of this.unwatchers) unwatch()
    this.unwatchers = []
    this.active = []
    this.mirrored.clear()
  }
}

function asBindingError(key: string, error: unknown): TendrilError {
  if (error instanceof BindingError) return error
  if (error instanceof TendrilError) return new BindingError(key, error.message, { cause: error })
  return new BindingError(key, toError(error).message, { cause: error })
}
