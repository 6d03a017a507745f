/**
 * Tendril Sandbox
 * ===============
 *
 * The bridge talks to the execution target only through the `Sandbox` and
 * `SandboxInstance` interfaces. `WasmSandbox` implements them on the
 * platform's WebAssembly engine.
 *
 * --- MODULE CONTRACT ---
 * - The module exports its linear memory (default export name `memory`).
 * - It may import `env.tendril_notify(offset: i32, length: i32)` and call it
 *   after writing bound memory; the bridge then syncs without polling.
 * - It may export `_initialize`, called once after bound values are seeded.
 * - It may embed a layout table in the custom section `tendril.layout`.
 */

import { LoadError } from './errors'
import { LAYOUT_SECTION } from './layout'

// =============================================================================
// TYPES
// =============================================================================

export type SandboxValue = number | bigint

/** Host functions handed to the module at instantiation. */
export interface SandboxHooks {
  /** The module wrote `length` bytes at `offset`. */
  notifyWrite(offset: number, length: number): void
}

export interface SandboxInstance {
  /**
   * The current memory buffer. Growing memory detaches old buffers, so
   * callers fetch it again for every access.
   */
  buffer(): ArrayBuffer
  /** Whether the module imports the write-notification hook. */
  readonly notifies: boolean
  /** Raw text of the module's layout table, if it has one. */
  readonly layout: string | null
  hasFunction(name: string): boolean
  functionNames(): string[]
  /** @throws when the export is missing or the call traps. */
  call(name: string, args: readonly SandboxValue[]): unknown
  dispose(): void
}

export interface Sandbox {
  /** @throws LoadError (as a rejection) when the module cannot be compiled or instantiated. */
  instantiate(bytecode: BufferSource, hooks: SandboxHooks): Promise<SandboxInstance>
}

export interface WasmSandboxOptions {
  /** Name of the exported memory. Defaults to `memory`. */
  memoryExport?: string
  /** Import module of the notify hook. Defaults to `env`. */
  importModule?: string
  /** Import name of the notify hook. Defaults to `tendril_notify`. */
  notifyImport?: string
  /** Additional host functions, merged into the import object. */
  imports?: WebAssembly.Imports
}

// =============================================================================
// WEBASSEMBLY IMPLEMENTATION
// =============================================================================

export class WasmSandbox implements Sandbox {
  private readonly memoryExport: string
  private readonly importModule: string
  private readonly notifyImport: string
  private readonly extraImports: WebAssembly.Imports

  constructor(options: WasmSandboxOptions = {}) {
    this.memoryExport = options.memoryExport ?? 'memory'
    this.importModule = options.importModule ?? 'env'
    this.notifyImport = options.notifyImport ?? 'tendril_notify'
    this.extraImports = options.imports ?? {}
  }

  async instantiate(bytecode: BufferSource, hooks: SandboxHooks): Promise<SandboxInstance> {
    let module: WebAssembly.Module
    try {
      module = await WebAssembly.compile(bytecode)
    } catch (error) {
      throw new LoadError('module is not valid WebAssembly', { cause: error })
    }

    const notifies = WebAssembly.Module.imports(module).some(
      entry => entry.kind === 'function' && entry.module === this.importModule && entry.name === this.notifyImport
    )

    const imports: WebAssembly.Imports = {
      ...this.extraImports,
      [this.importModule]: {
        ...this.extraImports[this.importModule],
        [this.notifyImport]: (offset: number, length: number) => hooks.notifyWrite(offset >>> 0, length >>> 0)
      }
    }

    let instance: WebAssembly.Instance
    try {
      instance = await WebAssembly.instantiate(module, imports)
    } catch (error) {
      throw new LoadError('module could not be instantiated', { cause: error })
    }

    const memory = instance.exports[this.memoryExport]
    if (!(memory instanceof WebAssembly.Memory)) {
      throw new LoadError(`module does not export a memory named "${this.memoryExport}"`)
    }

    return new WasmInstance(instance, memory, notifies, readLayoutSection(module))
  }
}

class WasmInstance implements SandboxInstance {
  private exports: WebAssembly.Exports | null

  constructor(
    instance: WebAssembly.Instance,
    private readonly memory: WebAssembly.Memory,
    readonly notifies: boolean,
    readonly layout: string | null
  ) {
    this.exports = instance.exports
  }

  buffer(): ArrayBuffer {
    return this.memory.buffer
  }

  hasFunction(name: string): boolean {
    return typeof this.exports?.[name] === 'function'
  }

  functionNames(): string[] {
    const exports = this.exports
    if (!exports) return []
    return Object.keys(exports).filter(name => typeof exports[name] === 'function')
  }

  call(name: string, args: readonly SandboxValue[]): unknown {
    if (!this.exports) throw new Error('instance has been disposed')
    const fn = this.exports[name]
    if (typeof fn !== 'function') throw new Error(`module has no exported function "${name}"`)
    const result: unknown = fn(...args)
    return result
  }

  dispose(): void {
    this.exports = null
  }
}

function readLayoutSection(module: WebAssembly.Module): string | null {
  const [section] = WebAssembly.Module.customSections(module, LAYOUT_SECTION)
  return section ? new TextDecoder().decode(section) : null
}
