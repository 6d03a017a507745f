/**
 * Runtime configuration. Options are plain objects passed to `createRuntime`;
 * anything omitted falls back to the defaults below.
 */

import { createConsoleDiagnostics } from './diagnostics'
import type { Diagnostics } from './diagnostics'
import type { EqualityFn } from './equality'
import { deepEqual } from './equality'
import type { BindingInit } from './layout'
import type { Sandbox } from './sandbox'
import { WasmSandbox } from './sandbox'

// =============================================================================
// DEFAULTS
// =============================================================================

/** Scheduler tick delay: one frame at 60 Hz. */
export const DEFAULT_TICK_INTERVAL = 16

/** Bridge polling interval when the module has no notify hook. */
export const DEFAULT_POLL_INTERVAL = 100

/** Rounds a single flush may drain before it is treated as an update loop. */
export const DEFAULT_MAX_FLUSH_ROUNDS = 100

// =============================================================================
// TYPES
// =============================================================================

/**
 * How the bridge learns about writes made by the module.
 * - `auto`: use the notify hook when the module imports it, otherwise poll.
 * - `poll`: always poll, even if the hook is present.
 * - `notify`: never poll.
 */
export type SyncMode = 'auto' | 'poll' | 'notify'

export interface RuntimeOptions {
  /** Delay in milliseconds between the first pending write and its flush. */
  tickInterval?: number
  /** Interval in milliseconds of the bridge's polling loop. */
  pollInterval?: number
  maxFlushRounds?: number
  syncMode?: SyncMode
  /** Explicit memory bindings. When omitted the module's layout table is used. */
  bindings?: readonly BindingInit[]
  sandbox?: Sandbox
  diagnostics?: Diagnostics
  /** Equality used to detect no-op writes. */
  equals?: EqualityFn
  /** Clock used to stamp `lastUpdated`. */
  now?: () => number
}

export interface ResolvedRuntimeOptions {
  readonly tickInterval: number
  readonly pollInterval: number
  readonly maxFlushRounds: number
  readonly syncMode: SyncMode
  readonly bindings: readonly BindingInit[] | undefined
  readonly sandbox: Sandbox
  readonly diagnostics: Diagnostics
  readonly equals: EqualityFn
  readonly now: () => number
}

// =============================================================================
// RESOLUTION
// =============================================================================

/**
 * Fills in defaults and validates numeric options.
 * @throws RangeError when an interval is negative or not finite, or
 *   `maxFlushRounds` is not a positive integer.
 */
export function resolveRuntimeOptions(options: RuntimeOptions = {}): ResolvedRuntimeOptions {
  const tickInterval = options.tickInterval ?? DEFAULT_TICK_INTERVAL
  const pollInterval = options.pollInterval ?? DEFAULT_POLL_INTERVAL
  const maxFlushRounds = options.maxFlushRounds ?? DEFAULT_MAX_FLUSH_ROUNDS

  assertInterval('tickInterval', tickInterval)
  assertInterval('pollInterval', pollInterval)
  if (!Number.isInteger(maxFlushRounds) || maxFlushRounds < 1) {
    throw new RangeError(`[tendril] maxFlushRounds must be a positive integer, got ${maxFlushRounds}`)
  }

  return {
    tickInterval,
    pollInterval,
    maxFlushRounds,
    syncMode: options.syncMode ?? 'auto',
    bindings: options.bindings,
    sandbox: options.sandbox ?? new WasmSandbox(),
    diagnostics: options.diagnostics ?? createConsoleDiagnostics(),
    equals: options.equals ?? deepEqual,
    now: options.now ?? Date.now
  }
}

function assertInterval(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(`[tendril] ${name} must be a non-negative number, got ${value}`)
  }
}
