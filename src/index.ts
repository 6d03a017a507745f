/**
 * Tendril: Reactive State Synchronization Core
 * ============================================
 *
 * A reactive keyed store with batched change delivery, computed values,
 * transactions and collection adapters, bound two-way to the linear memory
 * of a sandboxed WebAssembly module.
 *
 * @license MIT
 */

export { Runtime, createRuntime } from './runtime'
export type { RuntimeStats } from './runtime'

export {
  DEFAULT_MAX_FLUSH_ROUNDS,
  DEFAULT_POLL_INTERVAL,
  DEFAULT_TICK_INTERVAL,
  resolveRuntimeOptions
} from './config'
export type { ResolvedRuntimeOptions, RuntimeOptions, SyncMode } from './config'

export { ReactiveStore } from './store'
export type { ReactiveValue, StoreOptions, StoreSnapshot, WriteListener } from './store'

export { WatcherRegistry } from './watchers'
export type { Unsubscribe, Watcher, WatcherFailureHandler } from './watchers'

export { BatchScheduler } from './scheduler'
export type { SchedulerOptions } from './scheduler'

export { ComputedEngine } from './computed'
export type { ComputedDescriptor, ComputedEngineOptions } from './computed'

export { TransactionCoordinator } from './transaction'
export type { TransactionOptions } from './transaction'

export { ExecutionBridge } from './bridge'
export type { BridgeHost, BridgeOptions, BridgeState, BridgeStats, CallOutcome } from './bridge'

export { WasmSandbox } from './sandbox'
export type { Sandbox, SandboxHooks, SandboxInstance, SandboxValue, WasmSandboxOptions } from './sandbox'

export { LAYOUT_SECTION, bindingsInRange, customBinding, parseLayoutTable, validateBindings } from './layout'
export type { BindingInit, MemoryBinding } from './layout'

export { decodeBinding, encodeBinding } from './codec'
export type { BindingCodec, BindingEncoding, BindingWidth, BuiltinEncoding } from './codec'

export { ReactiveList, ReactiveMap } from './collections'
export type { CollectionHost } from './collections'

export { tryUseRuntime, useList, useMap, useRuntime, useValue, useWatch, withRuntime } from './context'

export { deepEqual, valueKind } from './equality'
export type { EqualityFn, ValueKind } from './equality'

export { createConsoleDiagnostics, createRecordingDiagnostics } from './diagnostics'
export type {
  ConsoleDiagnosticsOptions,
  Diagnostics,
  LogEntry,
  LogLevel,
  RecordingDiagnostics,
  RecordingDiagnosticsOptions
} from './diagnostics'

export {
  BindingError,
  CallError,
  ComputeError,
  CycleError,
  LoadError,
  TendrilError,
  TypeMismatchError,
  WatcherError,
  toError
} from './errors'
export type { TendrilErrorCode } from './errors'
