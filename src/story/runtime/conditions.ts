// ═══════════════════════════════════════════════════════════════════════════
// Condition Evaluation - Shared by both variable stores and batch evaluation
// ═══════════════════════════════════════════════════════════════════════════

import type { Condition, ConditionLogic, ConditionOperator } from '../model/conditions'
import {
  toBoolean,
  toNumber,
  toText,
  type TypedValue,
  type VariableValue,
} from '../model/variables'

export const FLOAT_EPSILON = 0.0001

/** Read-only view of a variable store */
export interface VariableReader {
  getTyped(name: string): TypedValue | undefined
}

// ─────────────────────────────────────────────────────────────────────────────
// Single Condition
// ─────────────────────────────────────────────────────────────────────────────

function compareNumbers(left: number, right: number, operator: ConditionOperator, epsilon: number): boolean {
  switch (operator) {
    case 'equals': return Math.abs(left - right) < epsilon || left === right
    case 'notEquals': return !(Math.abs(left - right) < epsilon || left === right)
    case 'greaterThan': return left > right
    case 'lessThan': return left < right
    case 'greaterOrEqual': return left >= right
    case 'lessOrEqual': return left <= right
    default: return false
  }
}

/**
 * Evaluate one operator against a typed slot. Coercion failures and missing
 * compare values evaluate to false.
 */
export function evaluateTypedCondition(
  slot: TypedValue,
  operator: ConditionOperator,
  compareValue: VariableValue | null
): boolean {
  if (operator === 'isTrue' || operator === 'isFalse') {
    const truth = toBoolean(slot.value)
    if (truth === undefined) return false
    return operator === 'isTrue' ? truth : !truth
  }

  if (compareValue === null) return false

  if (operator === 'contains') {
    return toText(slot.value).includes(toText(compareValue))
  }

  switch (slot.type) {
    case 'float':
    case 'int': {
      const right = toNumber(compareValue)
      if (right === undefined) return false
      return compareNumbers(slot.value, right, operator, slot.type === 'float' ? FLOAT_EPSILON : 0)
    }
    case 'bool': {
      if (operator === 'equals' || operator === 'notEquals') {
        const right = toBoolean(compareValue)
        if (right === undefined) return false
        return operator === 'equals' ? slot.value === right : slot.value !== right
      }
      const right = toNumber(compareValue)
      if (right === undefined) return false
      return compareNumbers(slot.value ? 1 : 0, right, operator, 0)
    }
    case 'string': {
      if (operator === 'equals') return slot.value === toText(compareValue)
      if (operator === 'notEquals') return slot.value !== toText(compareValue)
      const left = toNumber(slot.value)
      const right = toNumber(compareValue)
      if (left === undefined || right === undefined) return false
      return compareNumbers(left, right, operator, 0)
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Condition Lists
// ─────────────────────────────────────────────────────────────────────────────

export function evaluateCondition(reader: VariableReader, condition: Condition): boolean {
  const slot = reader.getTyped(condition.variableName)
  if (!slot) return false
  return evaluateTypedCondition(slot, condition.operator, condition.compareValue)
}

/**
 * Combine a list of conditions. An empty list is true.
 */
export function evaluateConditions(
  reader: VariableReader,
  conditions: readonly Condition[],
  logic: ConditionLogic = 'and'
): boolean {
  if (conditions.length === 0) return true
  if (logic === 'and') {
    return conditions.every(c => evaluateCondition(reader, c))
  }
  return conditions.some(c => evaluateCondition(reader, c))
}

// ─────────────────────────────────────────────────────────────────────────────
// Batch Evaluation
// ─────────────────────────────────────────────────────────────────────────────

export interface ConditionBatchItem {
  variables: VariableReader
  conditions: readonly Condition[]
  logic: ConditionLogic
}

/**
 * Evaluate independent condition sets, one per run. Each item reads only its
 * own variables, so items never observe each other.
 */
export function evaluateConditionBatch(items: readonly ConditionBatchItem[]): boolean[] {
  const results = new Array<boolean>(items.length)
  for (let i = 0; i < items.length; i++) {
    const item = items[i]
    results[i] = evaluateConditions(item.variables, item.conditions, item.logic)
  }
  return results
}
