import { describe, it, expect, beforeEach } from 'vitest'
import type { TypedValue } from '../model/variables'
import {
  ColumnarVariableStore,
  MapVariableStore,
  createVariableStore,
  hashName,
  type VariableStore,
  type VariableStoreKind,
} from './variableStores'

describe('hashName', () => {
  it('should produce the FNV-1a hash', () => {
    expect(hashName('')).toBe(0x811c9dc5)
    expect(hashName('a')).toBe(0xe40c292c)
  })

  it('should be stable and unsigned', () => {
    expect(hashName('gold')).toBe(hashName('gold'))
    expect(hashName('reputation')).toBeGreaterThanOrEqual(0)
  })
})

describe.each<VariableStoreKind>(['map', 'columnar'])('%s store', kind => {
  let store: VariableStore

  beforeEach(() => {
    store = createVariableStore(kind)
  })

  it('should report its kind', () => {
    expect(store.kind).toBe(kind)
  })

  it('should store and read typed slots', () => {
    store.set('gold', { type: 'int', value: 10 })
    store.set('name', { type: 'string', value: 'Ada' })
    expect(store.getTyped('gold')).toEqual({ type: 'int', value: 10 })
    expect(store.getTyped('name')).toEqual({ type: 'string', value: 'Ada' })
    expect(store.size).toBe(2)
  })

  it('should replace a slot when the type changes', () => {
    store.set('mood', { type: 'int', value: 1 })
    store.set('mood', { type: 'string', value: 'happy' })
    expect(store.getTyped('mood')).toEqual({ type: 'string', value: 'happy' })
    expect(store.size).toBe(1)
  })

  it('should delete and clear', () => {
    store.set('a', { type: 'bool', value: true })
    store.set('b', { type: 'float', value: 1.5 })
    expect(store.delete('a')).toBe(true)
    expect(store.delete('a')).toBe(false)
    expect(store.has('a')).toBe(false)
    expect(store.names()).toEqual(['b'])

    store.clear()
    expect(store.size).toBe(0)
    expect(store.getTyped('b')).toBeUndefined()
  })
})

describe('store parity', () => {
  it('should read back the same slots from both stores', () => {
    const writes: [string, TypedValue][] = [
      ['gold', { type: 'int', value: 3 }],
      ['speed', { type: 'float', value: 2.5 }],
      ['gold', { type: 'int', value: 7 }],
      ['flag', { type: 'bool', value: false }],
      ['speed', { type: 'string', value: 'fast' }],
    ]
    const map = new MapVariableStore()
    const columnar = new ColumnarVariableStore()
    for (const [name, slot] of writes) {
      map.set(name, slot)
      columnar.set(name, slot)
    }
    for (const name of ['gold', 'speed', 'flag', 'missing']) {
      expect(columnar.getTyped(name)).toEqual(map.getTyped(name))
    }
    expect(columnar.names().sort()).toEqual(map.names().sort())
  })
})

describe('ColumnarVariableStore', () => {
  it('should keep each slot in exactly one column', () => {
    const store = new ColumnarVariableStore()
    store.set('x', { type: 'float', value: 1 })
    store.set('x', { type: 'bool', value: true })
    store.set('y', { type: 'string', value: 'hi' })
    expect(store.getColumnSizes()).toEqual({ float: 0, int: 0, bool: 1, string: 1 })
  })

  it('should look slots up by hash', () => {
    const store = new ColumnarVariableStore()
    store.set('gold', { type: 'int', value: 99 })
    expect(store.getByHash(hashName('gold'))).toEqual({ type: 'int', value: 99 })
  })
})
