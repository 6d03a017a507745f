/**
 * Transaction coordinator: groups writes so they produce a single flush, and
 * optionally restores the previous values when the body throws.
 */

import type { Diagnostics } from './diagnostics'
import type { BatchScheduler } from './scheduler'
import type { ReactiveStore, ReactiveValue } from './store'

// =============================================================================
// TYPES
// =============================================================================

export interface TransactionOptions {
  /**
   * Restore every key written inside the transaction when the body throws.
   * Defaults to `false`: partial writes are kept and flushed.
   */
  rollback?: boolean
}

interface JournalEntry {
  readonly previous: ReactiveValue<unknown> | undefined
  readonly wasPending: boolean
}

type Journal = Map<string, JournalEntry>

// =============================================================================
// IMPLEMENTATION
// =============================================================================

export class TransactionCoordinator {
  private readonly journals: Journal[] = []
  private depth = 0

  constructor(
    private readonly scheduler: BatchScheduler,
    private readonly store: ReactiveStore,
    private readonly diagnostics: Diagnostics
  ) {}

  get isActive(): boolean {
    return this.depth > 0
  }

  /**
   * Runs `work` with the scheduler suspended. Leaving the outermost
   * transaction flushes every accumulated write at once, whether `work`
   * returned or threw.
   */
  run<TResult>(work: () => TResult, options: TransactionOptions = {}): TResult {
    const journal: Journal | null = options.rollback ? new Map() : null
    if (journal) this.journals.push(journal)

    this.depth++
    this.scheduler.suspend()
    try {
      const result = work()
      if (isThenable(result)) {
        this.diagnostics.log(
          'warn',
          '[tendril] transaction() received an async function; writes after its first await are not batched.'
        )
      }
      return result
    } catch (error) {
      if (journal) this.rollback(journal)
      throw error
    } finally {
      if (journal) this.journals.splice(this.journals.indexOf(journal), 1)
      this.depth--
      this.scheduler.resume()
    }
  }

  /**
   * Records the first write to `key` in every open rollback journal. Must be
   * called before the key is marked pending.
   */
  record(key: string, previous: ReactiveValue<unknown> | undefined): void {
    if (this.journals.length === 0) return
    const wasPending = this.scheduler.isPending(key)
    for (const journal of this.journals) {
      if (!journal.has(key)) journal.set(key, { previous, wasPending })
    }
  }

  private rollback(journal: Journal): void {
    for (const [key, entry] of journal) {
      this.store.restore(key, entry.previous)
      if (!entry.wasPending) this.scheduler.unmark(key)
    }
  }
}

function isThenable(value: unknown): boolean {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, 'then') === 'function'
}
