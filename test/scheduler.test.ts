import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { BatchScheduler } from '../src/scheduler'
import { WatcherRegistry } from '../src/watchers'
import { createRecordingDiagnostics } from '../src/diagnostics'
import type { RecordingDiagnostics } from '../src/diagnostics'
import { WatcherError } from '../src/errors'

describe('WatcherRegistry', () => {
  let diagnostics: RecordingDiagnostics
  let registry: WatcherRegistry

  beforeEach(() => {
    diagnostics = createRecordingDiagnostics()
    registry = new WatcherRegistry(diagnostics)
  })

  it('calls watchers in registration order with value and key', () => {
    const calls: string[] = []
    registry.watch('count', (value: number, key) => calls.push(`first ${key}=${value}`))
    registry.watch('count', (value: number, key) => calls.push(`second ${key}=${value}`))

    registry.notify('count', 3)

    expect(calls).toEqual(['first count=3', 'second count=3'])
  })

  it('registers the same callback once per key', () => {
    const watcher = vi.fn()
    registry.watch('count', watcher)
    registry.watch('count', watcher)

    registry.notify('count', 1)

    expect(watcher).toHaveBeenCalledTimes(1)
    expect(registry.count('count')).toBe(1)
  })

  it('removes watchers idempotently', () => {
    const watcher = vi.fn()
    const unsubscribe = registry.watch('count', watcher)

    unsubscribe()
    expect(registry.unwatch('count', watcher)).toBe(false)
    expect(registry.has('count')).toBe(false)

    registry.notify('count', 1)
    expect(watcher).not.toHaveBeenCalled()
  })

  it('isolates a throwing watcher and reports it', () => {
    const after = vi.fn()
    registry.watch('count', () => {
      throw new Error('boom')
    })
    registry.watch('count', after)

    registry.notify('count', 1)

    expect(after).toHaveBeenCalledWith(1, 'count')
    expect(diagnostics.errors).toHaveLength(1)
    expect(diagnostics.errors[0]).toBeInstanceOf(WatcherError)
    expect(diagnostics.errors[0].message).toBe('[tendril] Watcher of "count" failed: boom')
  })

  it('counts registrations across keys', () => {
    registry.watch('a', () => {})
    registry.watch('a', () => {})
    registry.watch('b', () => {})
    expect(registry.count()).toBe(3)
    registry.clear()
    expect(registry.count()).toBe(0)
  })
})

describe('BatchScheduler', () => {
  let diagnostics: RecordingDiagnostics
  let delivered: string[]
  let onDeliver: (key: string) => void

  const createScheduler = (maxFlushRounds = 100) =>
    new BatchScheduler({
      tickInterval: 16,
      maxFlushRounds,
      diagnostics,
      deliver: key => {
        delivered.push(key)
        onDeliver(key)
      }
    })

  beforeEach(() => {
    vi.useFakeTimers()
    diagnostics = createRecordingDiagnostics()
    delivered = []
    onDeliver = () => {}
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('delivers each marked key once, one tick after the first mark', () => {
    const scheduler = createScheduler()
    scheduler.mark('a')
    scheduler.mark('a')
    scheduler.mark('b')

    vi.advanceTimersByTime(15)
    expect(delivered).toEqual([])
    expect(scheduler.isScheduled).toBe(true)

    vi.advanceTimersByTime(1)
    expect(delivered).toEqual(['a', 'b'])
    expect(scheduler.tickCount).toBe(1)
    expect(scheduler.isScheduled).toBe(false)
  })

  it('does not rearm the timer for later marks in the same tick', () => {
    const scheduler = createScheduler()
    scheduler.mark('a')
    vi.advanceTimersByTime(10)
    scheduler.mark('b')
    vi.advanceTimersByTime(6)
    expect(delivered).toEqual(['a', 'b'])
  })

  it('drains keys marked during delivery in the same flush', () => {
    const scheduler = createScheduler()
    onDeliver = key => {
      if (key === 'a') scheduler.mark('b')
      if (key === 'b') scheduler.mark('c')
    }

    scheduler.mark('a')
    vi.advanceTimersByTime(16)

    expect(delivered).toEqual(['a', 'b', 'c'])
    expect(scheduler.tickCount).toBe(1)
    expect(vi.getTimerCount()).toBe(0)
  })

  it('stops a runaway update loop after maxFlushRounds', () => {
    const scheduler = createScheduler(5)
    onDeliver = key => scheduler.mark(key)

    scheduler.mark('loop')
    vi.advanceTimersByTime(16)

    expect(delivered).toHaveLength(5)
    expect(scheduler.pendingCount).toBe(0)
    expect(diagnostics.entries).toHaveLength(1)
    expect(diagnostics.entries[0].level).toBe('error')
    expect(diagnostics.entries[0].message).toBe('[tendril] Flush exceeded 5 rounds; dropping updates for: loop')
  })

  it('holds delivery while suspended and flushes on the outermost resume', () => {
    const scheduler = createScheduler()
    scheduler.suspend()
    scheduler.suspend()
    scheduler.mark('a')
    expect(scheduler.isScheduled).toBe(false)

    scheduler.resume()
    expect(delivered).toEqual([])

    scheduler.resume()
    expect(delivered).toEqual(['a'])
    expect(scheduler.isSuspended).toBe(false)
  })

  it('cancels an armed tick when suspended', () => {
    const scheduler = createScheduler()
    scheduler.mark('a')
    scheduler.suspend()
    vi.advanceTimersByTime(100)
    expect(delivered).toEqual([])
    scheduler.resume()
    expect(delivered).toEqual(['a'])
  })

  it('flushes on demand', () => {
    const scheduler = createScheduler()
    scheduler.mark('a')
    scheduler.flush()
    expect(delivered).toEqual(['a'])
    expect(vi.getTimerCount()).toBe(0)
  })

  it('does not count empty flushes as ticks', () => {
    const scheduler = createScheduler()
    scheduler.flush()
    expect(scheduler.tickCount).toBe(0)
  })

  it('discards pending keys on clear', () => {
    const scheduler = createScheduler()
    scheduler.mark('a')
    scheduler.clear()
    vi.advanceTimersByTime(16)
    expect(delivered).toEqual([])
  })

  it('withdraws a single key', () => {
    const scheduler = createScheduler()
    scheduler.mark('a')
    scheduler.mark('b')
    scheduler.unmark('a')
    vi.advanceTimersByTime(16)
    expect(delivered).toEqual(['b'])
  })

  it('ignores everything after dispose', () => {
    const scheduler = createScheduler()
    scheduler.mark('a')
    scheduler.dispose()
    scheduler.mark('b')
    scheduler.flush()
    vi.advanceTimersByTime(100)

    expect(delivered).toEqual([])
    expect(vi.getTimerCount()).toBe(0)
  })
})
