import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { createRuntime } from '../src/runtime'
import type { Runtime } from '../src/runtime'
import { createRecordingDiagnostics } from '../src/diagnostics'
import type { RecordingDiagnostics } from '../src/diagnostics'
import { ComputeError, CycleError } from '../src/errors'

describe('Computed values', () => {
  let diagnostics: RecordingDiagnostics
  let runtime: Runtime

  beforeEach(() => {
    vi.useFakeTimers()
    diagnostics = createRecordingDiagnostics()
    runtime = createRuntime({ diagnostics })
  })

  afterEach(() => {
    runtime.dispose()
    vi.useRealTimers()
  })

  const sumOf = () => runtime.getValue('x', 0) + runtime.getValue('y', 0)

  it('evaluates on registration and again after a dependency changes', () => {
    runtime.setValue('x', 5)
    runtime.setValue('y', 3)
    runtime.computed('sum', sumOf, ['x', 'y'])
    expect(runtime.getValue('sum', 0)).toBe(8)

    const watcher = vi.fn()
    runtime.watch('sum', watcher)
    runtime.setValue('x', 10)
    expect(runtime.getValue('sum', 0)).toBe(8)

    vi.advanceTimersByTime(16)

    expect(runtime.getValue('sum', 0)).toBe(13)
    expect(watcher).toHaveBeenCalledTimes(1)
    expect(watcher).toHaveBeenCalledWith(13, 'sum')
  })

  it('settles a chain of computeds within one tick', () => {
    runtime.setValue('base', 1)
    runtime.computed('double', () => runtime.getValue('base', 0) * 2, ['base'])
    runtime.computed('quad', () => runtime.getValue('double', 0) * 2, ['double'])
    runtime.computed('label', () => `value ${runtime.getValue('quad', 0)}`, ['quad'])
    runtime.flush()
    const ticks = runtime.getStats().tickCount

    const labels: string[] = []
    runtime.watch('label', (label: string) => labels.push(label))
    runtime.setValue('base', 2)
    vi.advanceTimersByTime(16)

    expect(labels).toEqual(['value 8'])
    expect(runtime.getStats().tickCount).toBe(ticks + 1)
  })

  it('does not notify when the derived value is unchanged', () => {
    runtime.setValue('n', 2)
    runtime.computed('even', () => runtime.getValue('n', 0) % 2 === 0, ['n'])
    runtime.flush()

    const watcher = vi.fn()
    runtime.watch('even', watcher)
    runtime.setValue('n', 4)
    vi.advanceTimersByTime(16)

    expect(watcher).not.toHaveBeenCalled()
  })

  it('rejects a two-key cycle at registration', () => {
    runtime.computed('a', () => runtime.getValue('b', 0) + 1, ['b'])

    expect(() => runtime.computed('b', () => runtime.getValue('a', 0) + 1, ['a'])).toThrow(CycleError)
    expect(() => runtime.computed('b', () => runtime.getValue('a', 0) + 1, ['a'])).toThrow(
      '[tendril] Computed dependency cycle: b -> a -> b'
    )
    expect(runtime.getStats().computedCount).toBe(1)
  })

  it('rejects a cycle through several computed keys', () => {
    runtime.computed('b', () => runtime.getValue('a', 0) + 1, ['a'])
    runtime.computed('c', () => runtime.getValue('b', 0) + 1, ['b'])

    expect(() => runtime.computed('a', () => runtime.getValue('c', 0) + 1, ['c'])).toThrow(
      '[tendril] Computed dependency cycle: a -> c -> b -> a'
    )
    expect(runtime.getStats().computedCount).toBe(2)
  })

  it('rejects a self dependency', () => {
    let error: unknown
    try {
      runtime.computed('a', () => 1, ['a'])
    } catch (caught) {
      error = caught
    }
    expect(error).toBeInstanceOf(CycleError)
    expect(error instanceof CycleError && error.path).toEqual(['a', 'a'])
    expect(runtime.has('a')).toBe(false)
  })

  it('leaves the key absent when the first evaluation throws', () => {
    runtime.computed(
      'broken',
      () => {
        throw new Error('no data')
      },
      ['source']
    )

    expect(runtime.has('broken')).toBe(false)
    expect(diagnostics.errors).toHaveLength(1)
    expect(diagnostics.errors[0]).toBeInstanceOf(ComputeError)
    expect(diagnostics.errors[0].message).toBe('[tendril] Computed "broken" failed: no data')
  })

  it('keeps the last good value when a later evaluation throws', () => {
    runtime.setValue('divisor', 2)
    runtime.computed(
      'half',
      () => {
        const divisor = runtime.getValue<number>('divisor', 1)
        if (divisor === 0) throw new Error('division by zero')
        return 10 / divisor
      },
      ['divisor']
    )

    runtime.setValue('divisor', 0)
    vi.advanceTimersByTime(16)

    expect(runtime.getValue('half', 0)).toBe(5)
    expect(diagnostics.errors.map(error => error.code)).toEqual(['COMPUTE'])
  })

  it('replaces a computed registered twice under the same key', () => {
    runtime.setValue('x', 1)
    runtime.computed('derived', () => runtime.getValue('x', 0) + 1, ['x'])
    runtime.computed('derived', () => runtime.getValue('x', 0) + 100, ['x'])

    expect(runtime.getValue('derived', 0)).toBe(101)
    expect(runtime.getStats().computedCount).toBe(1)
    expect(diagnostics.entries.map(entry => entry.message)).toContain(
      '[tendril] Computed "derived" is already registered. Replacing it.'
    )

    runtime.setValue('x', 2)
    vi.advanceTimersByTime(16)
    expect(runtime.getValue('derived', 0)).toBe(102)
  })

  it('stops recomputing once unregistered', () => {
    runtime.setValue('x', 1)
    const stop = runtime.computed('copy', () => runtime.getValue('x', 0), ['x'])
    stop()

    runtime.setValue('x', 2)
    vi.advanceTimersByTime(16)

    expect(runtime.getValue('copy', 0)).toBe(1)
    expect(runtime.getStats().computedCount).toBe(0)
    expect(runtime.getStats().watcherCount).toBe(0)
  })
})
