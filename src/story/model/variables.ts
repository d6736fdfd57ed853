// ═══════════════════════════════════════════════════════════════════════════
// Story Variables - Typed variable slots, declarations and coercion
// ═══════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type VariableType = 'string' | 'float' | 'int' | 'bool'

export type VariableValue = string | number | boolean

/** One variable slot: a type tag plus its payload */
export type TypedValue =
  | { type: 'string'; value: string }
  | { type: 'float'; value: number }
  | { type: 'int'; value: number }
  | { type: 'bool'; value: boolean }

export interface VariableDeclaration {
  name: string
  type: VariableType
  defaultValue: VariableValue
}

/** Flat name -> value snapshot of a variable store */
export type VariableSnapshot = Record<string, VariableValue>

export const VARIABLE_TYPES: readonly VariableType[] = ['string', 'float', 'int', 'bool']

// ─────────────────────────────────────────────────────────────────────────────
// Coercion
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Convert a value to a number. Returns undefined when the value has no
 * numeric reading (e.g. "abc" or an empty string).
 */
export function toNumber(value: VariableValue): number | undefined {
  if (typeof value === 'number') return Number.isNaN(value) ? undefined : value
  if (typeof value === 'boolean') return value ? 1 : 0
  const trimmed = value.trim()
  if (trimmed === '') return undefined
  const parsed = Number(trimmed)
  return Number.isNaN(parsed) ? undefined : parsed
}

/** Boolean reading: numbers are true when non-zero, strings must be "true"/"false" */
export function toBoolean(value: VariableValue): boolean | undefined {
  if (typeof value === 'boolean') return value
  if (typeof value === 'number') return value !== 0
  const lower = value.trim().toLowerCase()
  if (lower === 'true') return true
  if (lower === 'false') return false
  return undefined
}

export function toText(value: VariableValue): string {
  return String(value)
}

/**
 * Build a typed slot from a raw value, or undefined when the value cannot be
 * read as the requested type.
 */
export function coerceTyped(value: VariableValue, type: VariableType): TypedValue | undefined {
  switch (type) {
    case 'string':
      return { type, value: toText(value) }
    case 'float': {
      const num = toNumber(value)
      return num === undefined ? undefined : { type, value: num }
    }
    case 'int': {
      const num = toNumber(value)
      return num === undefined ? undefined : { type, value: Math.trunc(num) }
    }
    case 'bool': {
      const bool = toBoolean(value)
      return bool === undefined ? undefined : { type, value: bool }
    }
  }
}

/**
 * Pick a slot type for an untyped value. Numbers keep an existing int slot
 * when they are integral, otherwise they become floats.
 */
export function inferType(value: VariableValue, existing?: VariableType): VariableType {
  if (typeof value === 'boolean') return 'bool'
  if (typeof value === 'string') return 'string'
  if (existing === 'int' && Number.isInteger(value)) return 'int'
  return 'float'
}

export function getTypeDefault(type: VariableType): VariableValue {
  switch (type) {
    case 'string': return ''
    case 'float': return 0
    case 'int': return 0
    case 'bool': return false
  }
}

export function isVariableType(value: unknown): value is VariableType {
  return typeof value === 'string' && (VARIABLE_TYPES as readonly string[]).includes(value)
}

export function isVariableValue(value: unknown): value is VariableValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
}

/**
 * Create a declaration, coercing the default to the declared type. A default
 * that cannot be coerced falls back to the type default.
 */
export function createVariableDeclaration(
  name: string,
  type: VariableType,
  defaultValue?: VariableValue
): VariableDeclaration {
  const typed = defaultValue === undefined ? undefined : coerceTyped(defaultValue, type)
  return {
    name,
    type,
    defaultValue: typed ? typed.value : getTypeDefault(type),
  }
}
