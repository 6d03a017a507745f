/**
 * Tendril Diagnostics
 * ===================
 *
 * Every runtime receives a `Diagnostics` sink through its options instead of
 * writing to a process-wide logger. The console sink keeps the familiar
 * `[tendril] ...` prefixed output; the recording sink keeps bounded queues of
 * entries and errors for debug consoles and tests.
 */

import type { TendrilError } from './errors'

// =============================================================================
// TYPES
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/** A single message written to a diagnostics sink. */
export interface LogEntry {
  readonly level: LogLevel
  readonly message: string
  readonly timestamp: number
  /** Set when the entry was produced by `report`. */
  readonly error?: TendrilError
}

/**
 * Destination for runtime messages and isolated errors.
 */
export interface Diagnostics {
  log(level: LogLevel, message: string): void
  /** Receives errors caught during scheduled work (watchers, computeds, bridge). */
  report(error: TendrilError): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
}

// =============================================================================
// CONSOLE SINK
// =============================================================================

export interface ConsoleDiagnosticsOptions {
  /** Messages below this level are dropped. Defaults to `'info'`. */
  minLevel?: LogLevel
}

/**
 * Creates the default sink, which writes to `console`.
 */
export function createConsoleDiagnostics(options: ConsoleDiagnosticsOptions = {}): Diagnostics {
  const minLevel = LEVEL_ORDER[options.minLevel ?? 'info']

  const write = (level: LogLevel, message: string, error?: TendrilError) => {
    if (LEVEL_ORDER[level] < minLevel) return
    const line = message.startsWith('[tendril]') ? message : `[tendril] ${message}`
    const extra = error?.cause === undefined ? [] : [error.cause]
    switch (level) {
      case 'debug':
        console.debug(line, ...extra)
        break
      case 'info':
        console.info(line, ...extra)
        break
      case 'warn':
        console.warn(line, ...extra)
        break
      case 'error':
        console.error(line, ...extra)
        break
    }
  }

  return {
    log: (level, message) => write(level, message),
    report: (error) => write('error', error.message, error)
  }
}

// =============================================================================
// RECORDING SINK
// =============================================================================

export interface RecordingDiagnostics extends Diagnostics {
  readonly entries: readonly LogEntry[]
  readonly errors: readonly TendrilError[]
  clear(): void
}

export interface RecordingDiagnosticsOptions {
  /** Oldest entries are discarded past this size. Defaults to 1000. */
  maxEntries?: number
  now?: () => number
}

/**
 * Creates a sink that keeps the most recent entries and errors in memory.
 *
 * @example
 * ```ts
 * const diagnostics = createRecordingDiagnostics()
 * const runtime = createRuntime({ diagnostics })
 * // ...
 * diagnostics.errors.filter(e => e.code === 'WATCHER')
 * ```
 */
export function createRecordingDiagnostics(options: RecordingDiagnosticsOptions = {}): RecordingDiagnostics {
  const maxEntries = options.maxEntries ?? 1000
  const now = options.now ?? Date.now
  const entries: LogEntry[] = []
  const errors: TendrilError[] = []

  const push = <T>(queue: T[], item: T) => {
    queue.push(item)
    while (queue.length > maxEntries) queue.shift()
  }

  return {
    entries,
    errors,
    log(level, message) {
      push(entries, { level, message, timestamp: now() })
    },
    report(error) {
      push(errors, error)
      push(entries, { level: 'error', message: error.message, timestamp: now(), error })
    },
    clear() {
      entries.length = 0
      errors.length = 0
    }
  }
}
