// ═══════════════════════════════════════════════════════════════════════════
// Conditions - Comparison operators over named variables
// ═══════════════════════════════════════════════════════════════════════════

import { toBoolean, toNumber, type VariableType, type VariableValue } from './variables'

export type ConditionOperator =
  | 'equals'
  | 'notEquals'
  | 'greaterThan'
  | 'lessThan'
  | 'greaterOrEqual'
  | 'lessOrEqual'
  | 'contains'
  | 'isTrue'
  | 'isFalse'

export const CONDITION_OPERATORS: readonly ConditionOperator[] = [
  'equals',
  'notEquals',
  'greaterThan',
  'lessThan',
  'greaterOrEqual',
  'lessOrEqual',
  'contains',
  'isTrue',
  'isFalse',
]

export type ConditionLogic = 'and' | 'or'

export interface Condition {
  variableName: string
  operator: ConditionOperator
  compareValue: VariableValue | null
}

/** A condition as written by a node, used by the authoring checks */
export interface ConditionReference {
  nodeId: string
  variableName: string
  operator: ConditionOperator
  compareValue: VariableValue | null
}

export function isConditionOperator(value: unknown): value is ConditionOperator {
  return typeof value === 'string' && (CONDITION_OPERATORS as readonly string[]).includes(value)
}

const NUMERIC_OPERATORS: ReadonlySet<ConditionOperator> = new Set([
  'greaterThan',
  'lessThan',
  'greaterOrEqual',
  'lessOrEqual',
])

/**
 * Parse an authored compare value the way designers type it: booleans first,
 * then integers, then floats, otherwise the raw string.
 */
export function parseCompareValue(raw: string): VariableValue {
  const trimmed = raw.trim()
  const lower = trimmed.toLowerCase()
  if (lower === 'true') return true
  if (lower === 'false') return false
  if (/^[-+]?\d+$/.test(trimmed)) return parseInt(trimmed, 10)
  if (trimmed !== '' && !Number.isNaN(Number(trimmed))) return Number(trimmed)
  return raw
}

/**
 * Describe why a condition can never match a variable of the given type,
 * or return null when the comparison is well-typed.
 *
 * Runtime evaluation fails closed on these mismatches; this check lets
 * authoring tools report them before a run.
 */
export function describeConditionMismatch(
  type: VariableType,
  operator: ConditionOperator,
  compareValue: VariableValue | null
): string | null {
  if (operator === 'isTrue' || operator === 'isFalse') {
    if (type === 'string') return `operator '${operator}' on string variable only matches "true"/"false" text`
    return null
  }
  if (compareValue === null) return `operator '${operator}' needs a compare value`
  if (operator === 'contains') return null

  if (NUMERIC_OPERATORS.has(operator)) {
    if (toNumber(compareValue) === undefined) return `compare value '${String(compareValue)}' is not numeric`
    if (type === 'string') return `operator '${operator}' compares a string variable numerically`
    return null
  }

  // equals / notEquals
  if ((type === 'float' || type === 'int') && toNumber(compareValue) === undefined) {
    return `compare value '${String(compareValue)}' is not numeric`
  }
  if (type === 'bool' && toBoolean(compareValue) === undefined) {
    return `compare value '${String(compareValue)}' is not a boolean`
  }
  return null
}
