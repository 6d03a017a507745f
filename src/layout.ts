/**
 * Tendril Memory Layout
 * =====================
 *
 * A memory binding maps a store key onto a fixed byte range of the module's
 * exported memory. Bindings come either from the runtime options or from a
 * layout table the compiler embeds in the module as the custom section
 * `tendril.layout`: a UTF-8 JSON array of binding records.
 *
 * @example
 * ```json
 * [
 *   { "key": "count", "offset": 0, "width": 4 },
 *   { "key": "ratio", "offset": 8, "width": 8, "encoding": "float" }
 * ]
 * ```
 */

import type { BindingCodec, BindingEncoding, BindingWidth } from './codec'
import { checkEncodingWidth, isBindingWidth, isBuiltinEncoding } from './codec'
import { BindingError } from './errors'

// =============================================================================
// TYPES
// =============================================================================

/** Name of the custom section holding a module's layout table. */
export const LAYOUT_SECTION = 'tendril.layout'

export interface MemoryBinding {
  readonly key: string
  readonly offset: number
  readonly width: BindingWidth
  readonly encoding: BindingEncoding
}

/** A binding as supplied by callers; `encoding` defaults to `'uint'`. */
export interface BindingInit {
  key: string
  offset: number
  width: BindingWidth
  encoding?: BindingEncoding
}

// =============================================================================
// LAYOUT TABLES
// =============================================================================

/**
 * Parses the JSON text of a layout section into binding records. Records are
 * shape-checked here; ranges are checked by `validateBindings`.
 *
 * @throws BindingError when the text is not JSON or a record is malformed.
 */
export function parseLayoutTable(text: string): BindingInit[] {
  let table: unknown
  try {
    table = JSON.parse(text)
  } catch (error) {
    throw new BindingError(null, `Layout table is not valid JSON`, { cause: error })
  }
  if (!Array.isArray(table)) {
    throw new BindingError(null, 'Layout table must be a JSON array')
  }

  return table.map((record: unknown, index) => {
    if (typeof record !== 'object' || record === null) {
      throw new BindingError(null, `Layout entry ${index} must be an object`)
    }
    const key: unknown = Reflect.get(record, 'key')
    const offset: unknown = Reflect.get(record, 'offset')
    const width: unknown = Reflect.get(record, 'width')
    const encoding: unknown = Reflect.get(record, 'encoding') ?? 'uint'

    if (typeof key !== 'string' || key.length === 0) {
      throw new BindingError(null, `Layout entry ${index} has no key`)
    }
    if (typeof offset !== 'number') {
      throw new BindingError(key, `offset must be a number`)
    }
    if (!isBindingWidth(width)) {
      throw new BindingError(key, `width must be 1, 2, 4 or 8, got ${String(width)}`)
    }
    if (!isBuiltinEncoding(encoding)) {
      throw new BindingError(key, `unknown encoding ${JSON.stringify(encoding)}`)
    }
    return { key, offset, width, encoding }
  })
}

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Normalises bindings and checks them against a memory of `memorySize` bytes.
 * The result is sorted by offset.
 *
 * @throws BindingError for a bad offset or width, a range outside memory, a
 *   repeated key, or two overlapping ranges.
 */
export function validateBindings(bindings: readonly BindingInit[], memorySize: number): MemoryBinding[] {
  const keys = new Set<string>()
  const normalised = bindings.map((init): MemoryBinding => {
    const encoding = init.encoding ?? 'uint'
    const { key, offset, width } = init

    if (!Number.isInteger(offset) || offset < 0) {
      throw new BindingError(key, `offset must be a non-negative integer, got ${offset}`)
    }
    if (!isBindingWidth(width)) {
      throw new BindingError(key, `width must be 1, 2, 4 or 8, got ${String(width)}`)
    }
    const widthProblem = checkEncodingWidth(encoding, width)
    if (widthProblem) throw new BindingError(key, widthProblem)
    if (offset + width > memorySize) {
      throw new BindingError(key, `range ${offset}..${offset + width} lies outside memory of ${memorySize} bytes`)
    }
    if (keys.has(key)) {
      throw new BindingError(key, 'key is bound more than once')
    }
    keys.add(key)
    return { key, offset, width, encoding }
  })

  normalised.sort((a, b) => a.offset - b.offset)
  for (let i = 1; i < normalised.length; i++) {
    const previous = normalised[i - 1]
    const current = normalised[i]
    if (overlaps(previous, current)) {
      throw new BindingError(
        current.key,
        `range ${current.offset}..${current.offset + current.width} overlaps "${previous.key}" at ${previous.offset}..${previous.offset + previous.width}`
      )
    }
  }
  return normalised
}

export function overlaps(a: MemoryBinding, b: MemoryBinding): boolean {
  return a.offset < b.offset + b.width && b.offset < a.offset + a.width
}

/** Bindings that share at least one byte with `[offset, offset + length)`. */
export function bindingsInRange(bindings: readonly MemoryBinding[], offset: number, length: number): MemoryBinding[] {
  return bindings.filter(binding => binding.offset < offset + length && offset < binding.offset + binding.width)
}

/** Builds a binding with a custom codec. */
export function customBinding<T>(key: string, offset: number, width: BindingWidth, codec: BindingCodec<T>): BindingInit {
  return { key, offset, width, encoding: codec }
}
