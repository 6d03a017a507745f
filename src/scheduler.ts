/**
 * Tendril Batch Scheduler
 * =======================
 *
 * Collects the keys written since the last flush and delivers each of them
 * once per tick. The first mark arms a timer; later marks in the same
 * interval only join the pending set.
 *
 * --- DRAINING ---
 * A flush runs in rounds. Each round swaps out the pending set and delivers
 * every key in it. Keys marked while a round runs (a computed writing its
 * result, a watcher writing another key) are picked up by the next round of
 * the same flush, so derived chains settle within one tick.
 *
 * --- SUSPENSION ---
 * `suspend`/`resume` bracket transactions. While suspended no timer is armed;
 * leaving the outermost suspension flushes immediately.
 */

import type { Diagnostics } from './diagnostics'

// =============================================================================
// TYPES
// =============================================================================

export interface SchedulerOptions {
  /** Delay between the first mark and the flush, in milliseconds. */
  tickInterval: number
  maxFlushRounds: number
  /** Delivers one pending key. Must not throw. */
  deliver: (key: string) => void
  diagnostics: Diagnostics
}

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export class BatchScheduler {
  private pending = new Set<string>()
  private timer: ReturnType<typeof setTimeout> | null = null
  private suspendDepth = 0
  private flushing = false
  private disposed = false
  private ticks = 0

  constructor(private readonly options: SchedulerOptions) {}

  /**
   * Adds a key to the pending set and arms the tick timer if needed.
   */
  mark(key: string): void {
    if (this.disposed) return
    this.pending.add(key)
    this.arm()
  }

  /** Withdraws a key from the pending set. */
  unmark(key: string): void {
    this.pending.delete(key)
  }

  isPending(key: string): boolean {
    return this.pending.has(key)
  }

  get pendingCount(): number {
    return this.pending.size
  }

  /** Number of flushes that delivered at least one key. */
  get tickCount(): number {
    return this.ticks
  }

  get isSuspended(): boolean {
    return this.suspendDepth > 0
  }

  get isScheduled(): boolean {
    return this.timer !== null
  }

  suspend(): void {
    if (this.disposed) return
    this.suspendDepth++
    this.cancel()
  }

  /**
   * Leaves one level of suspension. Leaving the outermost level flushes
   * everything accumulated, bypassing the tick delay.
   */
  resume(): void {
    if (this.disposed || this.suspendDepth === 0) return
    this.suspendDepth--
    if (this.suspendDepth === 0) this.flush()
  }

  /**
   * Delivers every pending key now. Re-entrant calls (from inside a watcher)
   * return immediately; the running flush picks up their keys.
   */
  flush(): void {
    this.cancel()
    if (this.disposed || this.flushing || this.pending.size === 0) return

    this.flushing = true
    try {
      let rounds = 0
      while (this.pending.size > 0) {
        if (++rounds > this.options.maxFlushRounds) {
          this.options.diagnostics.log(
            'error',
            `[tendril] Flush exceeded ${this.options.maxFlushRounds} rounds; dropping updates for: ${Array.from(this.pending).join(', ')}`
          )
          this.pending.clear()
          break
        }

        const batch = this.pending
        this.pending = new Set()
        for (const key of batch) {
          if (this.disposed) return
          this.options.deliver(key)
        }
      }
      this.ticks++
    } finally {
      this.flushing = false
    }
  }

  /** Cancels the armed tick and forgets every pending key. */
  clear(): void {
    this.cancel()
    this.pending.clear()
  }

  dispose(): void {
    if (this.disposed) return
    this.clear()
    this.disposed = true
    this.suspendDepth = 0
  }

  private arm(): void {
    if (this.timer !== null || this.flushing || this.suspendDepth > 0) return
    this.timer = setTimeout(() => {
      this.timer = null
      if (this.disposed) return
      this.flush()
    }, this.options.tickInterval)
  }

  private cancel(): void {
    if (this.timer === null) return
    clearTimeout(this.timer)
    this.timer = null
  }
}
