/**
 * Tendril Context API (with unctx)
 * ================================
 *
 * Lets code running on a runtime's behalf reach it without threading it
 * through every call. `withRuntime` makes a runtime the active context for
 * the duration of a synchronous callback; the `use*` hooks resolve it.
 *
 * As with all `unctx` contexts, the runtime is only available synchronously:
 * after the first `await` inside the callback it is gone. No process-wide
 * runtime is ever set.
 *
 * @dependency unctx
 */

import { getContext } from 'unctx';
import type { ReactiveList, ReactiveMap } from './collections';
import type { Runtime } from './runtime';
import type { Unsubscribe, Watcher } from './watchers';

// --- UNCTX SETUP ---

/**
 * Namespaced so several copies of the library never share a context.
 */
const runtimeContext = getContext<Runtime>('tendril-runtime');


// --- CORE API ---

/**
 * Runs `fn` with `runtime` as the active context.
 *
 * @param runtime The runtime the hooks inside `fn` resolve to.
 * @param fn The callback. Its return value is passed through.
 * @throws Error ("Context conflict") when a different runtime is already active.
 *
 * @example
 * const total = withRuntime(runtime, () => {
 *   const items = useList<number>('items');
 *   return items.toArray().reduce((a, b) => a + b, 0);
 * });
 */
export function withRuntime<T>(runtime: Runtime, fn: () => T): T {
  return runtimeContext.call(runtime, fn);
}

/**
 * Hook to get the active runtime.
 *
 * @throws Error when called outside `withRuntime`.
 */
export function useRuntime(): Runtime {
  const runtime = runtimeContext.tryUse();
  if (!runtime) {
    throw new Error('[tendril] No active runtime. Call this inside withRuntime().');
  }
  return runtime;
}

/**
 * Hook to get the active runtime, or `null` outside `withRuntime`.
 */
export function tryUseRuntime(): Runtime | null {
  return runtimeContext.tryUse() ?? null;
}


// --- CONTEXT-AWARE HELPERS ---

/** Reads a key of the active runtime, creating it with `defaultValue` on first access. */
export function useValue<T>(key: string, defaultValue: T): T {
  return useRuntime().getValue(key, defaultValue);
}

/** Watches a key of the active runtime. */
export function useWatch<T = unknown>(key: string, watcher: Watcher<T>): Unsubscribe {
  return useRuntime().watch(key, watcher);
}

export function useList<T>(key: string, initial?: readonly T[]): ReactiveList<T> {
  return useRuntime().list(key, initial);
}

export function useMap<K, V>(key: string, initial?: Iterable<readonly [K, V]>): ReactiveMap<K, V> {
  return useRuntime().map(key, initial);
}
