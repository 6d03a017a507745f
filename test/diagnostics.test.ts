import { describe, it, expect, vi } from 'vitest'
import { createConsoleDiagnostics, createRecordingDiagnostics } from '../src/diagnostics'
import {
  DEFAULT_MAX_FLUSH_ROUNDS,
  DEFAULT_POLL_INTERVAL,
  DEFAULT_TICK_INTERVAL,
  resolveRuntimeOptions
} from '../src/config'
import { BindingError, ComputeError, LoadError, TendrilError, toError } from '../src/errors'
import { deepEqual, valueKind } from '../src/equality'

describe('Diagnostics', () => {
  it('prefixes console output and drops levels below the minimum', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    const diagnostics = createConsoleDiagnostics()

    diagnostics.log('info', 'ready')
    diagnostics.log('debug', 'noise')

    expect(info).toHaveBeenCalledWith('[tendril] ready')
    expect(debug).not.toHaveBeenCalled()
  })

  it('writes reported errors with their cause', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const cause = new Error('bad value')

    createConsoleDiagnostics({ minLevel: 'warn' }).report(new ComputeError('total', cause))

    expect(error).toHaveBeenCalledWith('[tendril] Computed "total" failed: bad value', cause)
  })

  it('records a bounded history', () => {
    const diagnostics = createRecordingDiagnostics({ maxEntries: 2, now: () => 5 })

    diagnostics.log('info', 'one')
    diagnostics.log('warn', 'two')
    diagnostics.report(new LoadError('three'))

    expect(diagnostics.entries.map(entry => entry.message)).toEqual(['two', '[tendril] Load failed: three'])
    expect(diagnostics.entries[1]).toMatchObject({ level: 'error', timestamp: 5 })
    expect(diagnostics.errors).toHaveLength(1)

    diagnostics.clear()
    expect(diagnostics.entries).toHaveLength(0)
    expect(diagnostics.errors).toHaveLength(0)
  })
})

describe('Configuration', () => {
  it('fills in defaults', () => {
    const options = resolveRuntimeOptions()
    expect(options).toMatchObject({
      tickInterval: DEFAULT_TICK_INTERVAL,
      pollInterval: DEFAULT_POLL_INTERVAL,
      maxFlushRounds: DEFAULT_MAX_FLUSH_ROUNDS,
      syncMode: 'auto',
      bindings: undefined
    })
    expect([DEFAULT_TICK_INTERVAL, DEFAULT_POLL_INTERVAL, DEFAULT_MAX_FLUSH_ROUNDS]).toEqual([16, 100, 100])
  })

  it('rejects invalid intervals', () => {
    expect(() => resolveRuntimeOptions({ pollInterval: Number.NaN })).toThrow(
      '[tendril] pollInterval must be a non-negative number, got NaN'
    )
    expect(() => resolveRuntimeOptions({ maxFlushRounds: 1.5 })).toThrow(
      '[tendril] maxFlushRounds must be a positive integer, got 1.5'
    )
  })
})

describe('Errors', () => {
  it('carry a code, a name and a cause', () => {
    const cause = new Error('inner')
    const error = new BindingError('count', 'out of range', { cause })

    expect(error).toBeInstanceOf(TendrilError)
    expect(error.name).toBe('BindingError')
    expect(error.code).toBe('BINDING')
    expect(error.key).toBe('count')
    expect(error.cause).toBe(cause)
    expect(error.message).toBe('[tendril] Binding "count": out of range')
  })

  it('normalises thrown values', () => {
    expect(toError('text').message).toBe('text')
    const original = new TypeError('x')
    expect(toError(original)).toBe(original)
    expect(new ComputeError('k', 42).message).toBe('[tendril] Computed "k" failed: 42')
  })
})

describe('Equality', () => {
  it('compares structurally', () => {
    expect(deepEqual(Number.NaN, Number.NaN)).toBe(true)
    expect(deepEqual({ a: [1, { b: 2 }] }, { a: [1, { b: 2 }] })).toBe(true)
    expect(deepEqual({ a: 1 }, { a: 1, b: undefined })).toBe(false)
    expect(deepEqual(new Date(1), new Date(1))).toBe(true)
    expect(deepEqual(new Map([['a', 1]]), new Map([['a', 2]]))).toBe(false)
    expect(deepEqual(new Set([1, 2]), new Set([2, 1]))).toBe(true)
    expect(deepEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true)
    expect(deepEqual([1], { 0: 1, length: 1 })).toBe(false)
  })

  it('classifies value kinds', () => {
    expect(valueKind(null)).toBeNull()
    expect(valueKind([])).toBe('array')
    expect(valueKind({})).toBe('object')
    expect(valueKind(1n)).toBe('bigint')
  })
})
