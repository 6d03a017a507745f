/**
 * Value equality and value-kind classification for the store.
 */

// =============================================================================
// EQUALITY CHECKING
// =============================================================================

export type EqualityFn = (a: unknown, b: unknown) => boolean

/**
 * A deep equality check used to detect no-op writes.
 * Primitives compare with `Object.is` (so `NaN` equals `NaN`); arrays, plain
 * objects, dates, maps, sets and typed arrays compare structurally.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false
    for (let i = 0; i < a.length; i++) {
      if (!deepEqual(a[i], b[i])) return false
    }
    return true
  }

  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && a.getTime() === b.getTime()
  }

  if (ArrayBuffer.isView(a) || ArrayBuffer.isView(b)) {
    if (!ArrayBuffer.isView(a) || !ArrayBuffer.isView(b) || a.byteLength !== b.byteLength) return false
    const left = new Uint8Array(a.buffer, a.byteOffset, a.byteLength)
    const right = new Uint8Array(b.buffer, b.byteOffset, b.byteLength)
    for (let i = 0; i < left.length; i++) {
      if (left[i] !== right[i]) return false
    }
    return true
  }

  if (a instanceof Map || b instanceof Map) {
    if (!(a instanceof Map) || !(b instanceof Map) || a.size !== b.size) return false
    for (const [key, value] of a) {
      if (!b.has(key) || !deepEqual(value, b.get(key))) return false
    }
    return true
  }

  if (a instanceof Set || b instanceof Set) {
    if (!(a instanceof Set) || !(b instanceof Set) || a.size !== b.size) return false
    for (const value of a) {
      if (!b.has(value)) return false
    }
    return true
  }

  if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) return false

  const keysA = Object.keys(a)
  const keysB = Object.keys(b)
  if (keysA.length !== keysB.length) return false
  for (const key of keysA) {
    if (!Object.prototype.hasOwnProperty.call(b, key)) return false
    if (!deepEqual(Reflect.get(a, key), Reflect.get(b, key))) return false
  }
  return true
}

// =============================================================================
// VALUE KINDS
// =============================================================================

/**
 * The declared kind of a store key. Fixed by the first non-nullish write.
 */
export type ValueKind =
  | 'boolean'
  | 'number'
  | 'bigint'
  | 'string'
  | 'symbol'
  | 'function'
  | 'array'
  | 'object'

/**
 * Classifies a value, or returns `null` for `null` and `undefined`, which
 * neither declare nor violate a key's kind.
 */
export function valueKind(value: unknown): ValueKind | null {
  if (value === null || value === undefined) return null
  if (Array.isArray(value)) return 'array'
  const kind = typeof value
  return kind === 'undefined' ? null : kind
}
