/**
 * Binding encodings: how a store value is laid out in module memory.
 * All built-in encodings are little-endian.
 */

import { BindingError } from './errors'
import type { MemoryBinding } from './layout'

// =============================================================================
// TYPES
// =============================================================================

export type BindingWidth = 1 | 2 | 4 | 8

/**
 * A user-supplied encoding. `encode` must return exactly `width` bytes.
 * @template T The store value type.
 */
export interface BindingCodec<T = unknown> {
  readonly name?: string
  encode(value: T): Uint8Array
  decode(bytes: Uint8Array): T
}

export type BuiltinEncoding = 'uint' | 'int' | 'float' | 'bool'

export type BindingEncoding = BuiltinEncoding | BindingCodec

const BUILTIN_ENCODINGS: readonly BuiltinEncoding[] = ['uint', 'int', 'float', 'bool']

export function isBuiltinEncoding(value: unknown): value is BuiltinEncoding {
  return typeof value === 'string' && BUILTIN_ENCODINGS.some(encoding => encoding === value)
}

export function isBindingWidth(value: unknown): value is BindingWidth {
  return value === 1 || value === 2 || value === 4 || value === 8
}

/** Returns a reason the width cannot carry the encoding, or `null`. */
export function checkEncodingWidth(encoding: BindingEncoding, width: BindingWidth): string | null {
  if (encoding === 'float' && width !== 4 && width !== 8) {
    return `float encoding needs a width of 4 or 8, got ${width}`
  }
  return null
}

// =============================================================================
// DECODING
// =============================================================================

/**
 * Reads a binding's bytes. Width-8 integers decode to `bigint`.
 */
export function decodeBinding(view: DataView, binding: MemoryBinding): unknown {
  const { offset, width, encoding } = binding

  if (typeof encoding !== 'string') {
    return encoding.decode(new Uint8Array(view.buffer, view.byteOffset + offset, width).slice())
  }

  switch (encoding) {
    case 'uint':
      return readUint(view, offset, width)
    case 'int':
      return readInt(view, offset, width)
    case 'float':
      return width === 4 ? view.getFloat32(offset, true) : view.getFloat64(offset, true)
    case 'bool':
      return Boolean(readUint(view, offset, width))
  }
}

function readUint(view: DataView, offset: number, width: BindingWidth): number | bigint {
  switch (width) {
    case 1:
      return view.getUint8(offset)
    case 2:
      return view.getUint16(offset, true)
    case 4:
      return view.getUint32(offset, true)
    case 8:
      return view.getBigUint64(offset, true)
  }
}

function readInt(view: DataView, offset: number, width: BindingWidth): number | bigint {
  switch (width) {
    case 1:
      return view.getInt8(offset)
    case 2:
      return view.getInt16(offset, true)
    case 4:
      return view.getInt32(offset, true)
    case 8:
      return view.getBigInt64(offset, true)
  }
}

// =============================================================================
// ENCODING
// =============================================================================

/**
 * Writes `value` into a binding's bytes. Integers must fit the binding's
 * width and signedness; width-8 integers must be `bigint`.
 * @throws BindingError when the value cannot be represented by the encoding.
 */
export function encodeBinding(view: DataView, binding: MemoryBinding, value: unknown): void {
  const { key, offset, width, encoding } = binding

  if (typeof encoding !== 'string') {
    const bytes = encoding.encode(value)
    if (bytes.length !== width) {
      const name = encoding.name ? ` "${encoding.name}"` : ''
      throw new BindingError(key, `codec${name} produced ${bytes.length} bytes, expected ${width}`)
    }
    new Uint8Array(view.buffer, view.byteOffset + offset, width).set(bytes)
    return
  }

  switch (encoding) {
    case 'uint':
    case 'int':
      writeInteger(view, offset, width, encoding, toInteger(value, width, encoding, key))
      return
    case 'float':
      if (typeof value !== 'number') throw new BindingError(key, `float encoding needs a number, got ${typeof value}`)
      if (width === 4) view.setFloat32(offset, value, true)
      else view.setFloat64(offset, value, true)
      return
    case 'bool':
      if (typeof value !== 'boolean') throw new BindingError(key, `bool encoding needs a boolean, got ${typeof value}`)
      writeInteger(view, offset, width, 'uint', width === 8 ? BigInt(Number(value)) : Number(value))
      return
  }
}

function toInteger(value: unknown, width: BindingWidth, encoding: 'uint' | 'int', key: string): number | bigint {
  let integer: number | bigint
  if (width === 8) {
    if (typeof value !== 'bigint') {
      throw new BindingError(key, `8-byte integer encoding needs a bigint, got ${String(value)}`)
    }
    integer = value
  } else {
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new BindingError(key, `integer encoding needs an integer number, got ${String(value)}`)
    }
    integer = value
  }

  const [min, max] = integerRange(width, encoding)
  const wide = BigInt(integer)
  if (wide < min || wide > max) {
    throw new BindingError(key, `${String(value)} is outside the ${width}-byte ${encoding} range ${min}..${max}`)
  }
  return integer
}

function integerRange(width: BindingWidth, encoding: 'uint' | 'int'): [bigint, bigint] {
  const bits = BigInt(width * 8)
  if (encoding === 'uint') return [0n, (1n << bits) - 1n]
  return [-(1n << (bits - 1n)), (1n << (bits - 1n)) - 1n]
}

function writeInteger(
  view: DataView,
  offset: number,
  width: BindingWidth,
  encoding: 'uint' | 'int',
  value: number | bigint
): void {
  if (typeof value === 'bigint') {
    if (encoding === 'uint') view.setBigUint64(offset, value, true)
    else view.setBigInt64(offset, value, true)
    return
  }
  switch (width) {
    case 1:
      if (encoding === 'uint') view.setUint8(offset, value)
      else view.setInt8(offset, value)
      return
    case 2:
      if (encoding === 'uint') view.setUint16(offset, value, true)
      else view.setInt16(offset, value, true)
      return
    default:
      if (encoding === 'uint') view.setUint32(offset, value, true)
      else view.setInt32(offset, value, true)
  }
}
