// ═══════════════════════════════════════════════════════════════════════════
// Variable Stores - Two storage strategies behind one interface
// ═══════════════════════════════════════════════════════════════════════════

import type { TypedValue, VariableType } from '../model/variables'
import type { VariableReader } from './conditions'

export type VariableStoreKind = 'map' | 'columnar'

export interface VariableStore extends VariableReader {
  readonly kind: VariableStoreKind
  readonly size: number
  set(name: string, slot: TypedValue): void
  has(name: string): boolean
  delete(name: string): boolean
  clear(): void
  names(): string[]
}

// ─────────────────────────────────────────────────────────────────────────────
// Map Store
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One key space of tagged slots.
 */
export class MapVariableStore implements VariableStore {
  readonly kind = 'map'
  private slots: Map<string, TypedValue> = new Map()

  get size(): number {
    return this.slots.size
  }

  getTyped(name: string): TypedValue | undefined {
    return this.slots.get(name)
  }

  set(name: string, slot: TypedValue): void {
    this.slots.set(name, slot)
  }

  has(name: string): boolean {
    return this.slots.has(name)
  }

  delete(name: string): boolean {
    return this.slots.delete(name)
  }

  clear(): void {
    this.slots.clear()
  }

  names(): string[] {
    return Array.from(this.slots.keys())
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Columnar Store
// ─────────────────────────────────────────────────────────────────────────────

/** 32-bit FNV-1a over UTF-16 code units */
export function hashName(name: string): number {
  let hash = 0x811c9dc5
  for (let i = 0; i < name.length; i++) {
    hash ^= name.charCodeAt(i)
    hash = Math.imul(hash, 0x01000193)
  }
  return hash >>> 0
}

/**
 * Storage partitioned by type and keyed by name hash. Two names with the
 * same hash share a slot; the last write wins.
 */
export class ColumnarVariableStore implements VariableStore {
  readonly kind = 'columnar'

  private floats: Map<number, number> = new Map()
  private ints: Map<number, number> = new Map()
  private bools: Map<number, boolean> = new Map()
  private strings: Map<number, string> = new Map()

  private slotTypes: Map<number, VariableType> = new Map()
  private slotNames: Map<number, string> = new Map()

  get size(): number {
    return this.slotTypes.size
  }

  getTyped(name: string): TypedValue | undefined {
    return this.getByHash(hashName(name))
  }

  getByHash(hash: number): TypedValue | undefined {
    switch (this.slotTypes.get(hash)) {
      case 'float': {
        const value = this.floats.get(hash)
        return value === undefined ? undefined : { type: 'float', value }
      }
      case 'int': {
        const value = this.ints.get(hash)
        return value === undefined ? undefined : { type: 'int', value }
      }
      case 'bool': {
        const value = this.bools.get(hash)
        return value === undefined ? undefined : { type: 'bool', value }
      }
      case 'string': {
        const value = this.strings.get(hash)
        return value === undefined ? undefined : { type: 'string', value }
      }
      default:
        return undefined
    }
  }

  set(name: string, slot: TypedValue): void {
    const hash = hashName(name)
    const previous = this.slotTypes.get(hash)
    if (previous !== undefined && previous !== slot.type) {
      this.column(previous).delete(hash)
    }

    switch (slot.type) {
      case 'float': this.floats.set(hash, slot.value); break
      case 'int': this.ints.set(hash, slot.value); break
      case 'bool': this.bools.set(hash, slot.value); break
      case 'string': this.strings.set(hash, slot.value); break
    }
    this.slotTypes.set(hash, slot.type)
    this.slotNames.set(hash, name)
  }

  has(name: string): boolean {
    return this.slotTypes.has(hashName(name))
  }

  delete(name: string): boolean {
    const hash = hashName(name)
    const type = this.slotTypes.get(hash)
    if (type === undefined) return false
    this.column(type).delete(hash)
    this.slotTypes.delete(hash)
    this.slotNames.delete(hash)
    return true
  }

  clear(): void {
    this.floats.clear()
    this.ints.clear()
    this.bools.clear()
    this.strings.clear()
    this.slotTypes.clear()
    this.slotNames.clear()
  }

  names(): string[] {
    return Array.from(this.slotNames.values())
  }

  /** Number of slots held in each column */
  getColumnSizes(): Record<VariableType, number> {
    return {
      float: this.floats.size,
      int: this.ints.size,
      bool: this.bools.size,
      string: this.strings.size,
    }
  }

  private column(type: VariableType): Map<number, unknown> {
    switch (type) {
      case 'float': return this.floats
      case 'int': return this.ints
      case 'bool': return this.bools
      case 'string': return this.strings
    }
  }
}

export function createVariableStore(kind: VariableStoreKind): VariableStore {
  return kind === 'columnar' ? new ColumnarVariableStore() : new MapVariableStore()
}
