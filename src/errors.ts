/**
 * Tendril Error Taxonomy
 * ======================
 *
 * Structural errors (`LoadError`, `BindingError`, `CycleError`,
 * `TypeMismatchError`) are thrown to the caller of the operation that caused
 * them. Behavioural errors (`ComputeError`, `WatcherError`, `CallError`) are
 * raised while the scheduler or the bridge is working on the caller's behalf;
 * they are reported to the runtime's diagnostics sink and never escape it.
 */

// =============================================================================
// ERROR CODES
// =============================================================================

export type TendrilErrorCode =
  | 'LOAD'
  | 'BINDING'
  | 'COMPUTE'
  | 'WATCHER'
  | 'CYCLE'
  | 'TYPE_MISMATCH'
  | 'CALL'

// =============================================================================
// BASE CLASS
// =============================================================================

/**
 * Base class of every error raised by Tendril. `code` lets diagnostics sinks
 * group errors without `instanceof` chains.
 */
export class TendrilError extends Error {
  readonly code: TendrilErrorCode

  constructor(code: TendrilErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

// =============================================================================
// STRUCTURAL ERRORS
// =============================================================================

/** The module is malformed, failed to link, trapped on start, or the bridge cannot load. */
export class LoadError extends TendrilError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('LOAD', `[tendril] Load failed: ${message}`, options)
  }
}

/** A memory binding is malformed, out of bounds, overlapping, or cannot be encoded. */
export class BindingError extends TendrilError {
  readonly key: string | null

  constructor(key: string | null, message: string, options?: { cause?: unknown }) {
    super('BINDING', key === null ? `[tendril] ${message}` : `[tendril] Binding "${key}": ${message}`, options)
    this.key = key
  }
}

/** Registering a computed value would close a dependency cycle. */
export class CycleError extends TendrilError {
  readonly path: readonly string[]

  constructor(path: readonly string[]) {
    super('CYCLE', `[tendril] Computed dependency cycle: ${path.join(' -> ')}`)
    this.path = path
  }
}

/** A write changed the kind of value a key was declared with. */
export class TypeMismatchError extends TendrilError {
  readonly key: string
  readonly expected: string
  readonly received: string

  constructor(key: string, expected: string, received: string) {
    super('TYPE_MISMATCH', `[tendril] Key "${key}" holds a ${expected}, cannot write a ${received}`)
    this.key = key
    this.expected = expected
    this.received = received
  }
}

// =============================================================================
// BEHAVIOURAL ERRORS
// =============================================================================

/** A computed derivation threw; the key keeps its last good value. */
export class ComputeError extends TendrilError {
  readonly key: string

  constructor(key: string, cause: unknown) {
    super('COMPUTE', `[tendril] Computed "${key}" failed: ${describe(cause)}`, { cause })
    this.key = key
  }
}

/** A watcher callback threw during delivery. */
export class WatcherError extends TendrilError {
  readonly key: string

  constructor(key: string, cause: unknown) {
    super('WATCHER', `[tendril] Watcher of "${key}" failed: ${describe(cause)}`, { cause })
    this.key = key
  }
}

/** Calling into the sandbox failed. */
export class CallError extends TendrilError {
  readonly functionName: string

  constructor(functionName: string, message: string, options?: { cause?: unknown }) {
    super('CALL', `[tendril] Call to "${functionName}" failed: ${message}`, options)
    this.functionName = functionName
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Normalises any thrown value into an `Error`.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}

function describe(cause: unknown): string {
  return toError(cause).message
}
