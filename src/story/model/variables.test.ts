// ═══════════════════════════════════════════════════════════════════════════
// Story Variables Tests
// ═══════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest'
import {
  coerceTyped,
  createVariableDeclaration,
  inferType,
  isVariableType,
  toBoolean,
  toNumber,
} from './variables'

describe('toNumber', () => {
  it('should read numeric strings', () => {
    expect(toNumber('42')).toBe(42)
    expect(toNumber(' 2.5 ')).toBe(2.5)
  })

  it('should map booleans to 1 and 0', () => {
    expect(toNumber(true)).toBe(1)
    expect(toNumber(false)).toBe(0)
  })

  it('should reject text and empty strings', () => {
    expect(toNumber('abc')).toBeUndefined()
    expect(toNumber('')).toBeUndefined()
    expect(toNumber(NaN)).toBeUndefined()
  })
})

describe('toBoolean', () => {
  it('should treat non-zero numbers as true', () => {
    expect(toBoolean(3)).toBe(true)
    expect(toBoolean(0)).toBe(false)
  })

  it('should read true/false text case-insensitively', () => {
    expect(toBoolean('TRUE')).toBe(true)
    expect(toBoolean('False')).toBe(false)
    expect(toBoolean('yes')).toBeUndefined()
  })
})

describe('coerceTyped', () => {
  it('should truncate ints', () => {
    expect(coerceTyped(3.9, 'int')).toEqual({ type: 'int', value: 3 })
    expect(coerceTyped('-2.5', 'int')).toEqual({ type: 'int', value: -2 })
  })

  it('should stringify anything for string slots', () => {
    expect(coerceTyped(false, 'string')).toEqual({ type: 'string', value: 'false' })
  })

  it('should fail on values with no reading for the type', () => {
    expect(coerceTyped('gold', 'float')).toBeUndefined()
    expect(coerceTyped('maybe', 'bool')).toBeUndefined()
  })
})

describe('inferType', () => {
  it('should keep an int slot for integral numbers', () => {
    expect(inferType(4, 'int')).toBe('int')
    expect(inferType(4.5, 'int')).toBe('float')
    expect(inferType(4)).toBe('float')
  })

  it('should follow the JS type for text and booleans', () => {
    expect(inferType('x', 'int')).toBe('string')
    expect(inferType(true)).toBe('bool')
  })
})

describe('createVariableDeclaration', () => {
  it('should coerce the default to the declared type', () => {
    expect(createVariableDeclaration('gold', 'int', '12')).toEqual({ name: 'gold', type: 'int', defaultValue: 12 })
  })

  it('should fall back to the type default', () => {
    expect(createVariableDeclaration('met', 'bool', 'perhaps').defaultValue).toBe(false)
    expect(createVariableDeclaration('name', 'string').defaultValue).toBe('')
  })

  it('should recognise variable types', () => {
    expect(isVariableType('float')).toBe(true)
    expect(isVariableType('double')).toBe(false)
  })
})
