// ═══════════════════════════════════════════════════════════════════════════
// Condition Evaluation Tests
// ═══════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest'
import type { Condition } from '../model/conditions'
import type { TypedValue } from '../model/variables'
import {
  evaluateCondition,
  evaluateConditionBatch,
  evaluateConditions,
  evaluateTypedCondition,
  type VariableReader,
} from './conditions'

function reader(slots: Record<string, TypedValue>): VariableReader {
  return { getTyped: name => slots[name] }
}

describe('evaluateTypedCondition', () => {
  it('should compare floats with an epsilon', () => {
    const slot: TypedValue = { type: 'float', value: 0.1 + 0.2 }
    expect(evaluateTypedCondition(slot, 'equals', 0.3)).toBe(true)
    expect(evaluateTypedCondition(slot, 'notEquals', 0.3)).toBe(false)
  })

  it('should compare ints exactly', () => {
    const slot: TypedValue = { type: 'int', value: 10 }
    expect(evaluateTypedCondition(slot, 'greaterOrEqual', 10)).toBe(true)
    expect(evaluateTypedCondition(slot, 'greaterThan', '10')).toBe(false)
    expect(evaluateTypedCondition(slot, 'lessThan', 10.5)).toBe(true)
  })

  it('should fail closed when the compare value is not numeric', () => {
    const slot: TypedValue = { type: 'int', value: 10 }
    expect(evaluateTypedCondition(slot, 'equals', 'ten')).toBe(false)
    expect(evaluateTypedCondition(slot, 'notEquals', 'ten')).toBe(false)
  })

  it('should read bool equality through boolean coercion', () => {
    const slot: TypedValue = { type: 'bool', value: true }
    expect(evaluateTypedCondition(slot, 'equals', 'true')).toBe(true)
    expect(evaluateTypedCondition(slot, 'equals', 1)).toBe(true)
    expect(evaluateTypedCondition(slot, 'notEquals', false)).toBe(true)
    expect(evaluateTypedCondition(slot, 'equals', 'open')).toBe(false)
  })

  it('should order bools as 1 and 0', () => {
    const slot: TypedValue = { type: 'bool', value: true }
    expect(evaluateTypedCondition(slot, 'greaterThan', 0)).toBe(true)
    expect(evaluateTypedCondition(slot, 'lessThan', 1)).toBe(false)
  })

  it('should compare strings as text and order them numerically when possible', () => {
    const slot: TypedValue = { type: 'string', value: '42' }
    expect(evaluateTypedCondition(slot, 'equals', '42')).toBe(true)
    expect(evaluateTypedCondition(slot, 'greaterThan', 40)).toBe(true)
    expect(evaluateTypedCondition({ type: 'string', value: 'abc' }, 'greaterThan', 1)).toBe(false)
  })

  it('should test contains on the text form', () => {
    expect(evaluateTypedCondition({ type: 'string', value: 'rusty sword' }, 'contains', 'sword')).toBe(true)
    expect(evaluateTypedCondition({ type: 'int', value: 1234 }, 'contains', 23)).toBe(true)
  })

  it('should handle isTrue and isFalse', () => {
    expect(evaluateTypedCondition({ type: 'int', value: 0 }, 'isFalse', null)).toBe(true)
    expect(evaluateTypedCondition({ type: 'string', value: 'TRUE' }, 'isTrue', null)).toBe(true)
    expect(evaluateTypedCondition({ type: 'string', value: 'maybe' }, 'isTrue', null)).toBe(false)
    expect(evaluateTypedCondition({ type: 'string', value: 'maybe' }, 'isFalse', null)).toBe(false)
  })

  it('should give false for a missing compare value', () => {
    expect(evaluateTypedCondition({ type: 'int', value: 1 }, 'equals', null)).toBe(false)
  })
})

describe('evaluateConditions', () => {
  const vars = reader({
    gold: { type: 'int', value: 50 },
    metKing: { type: 'bool', value: false },
  })
  const richEnough: Condition = { variableName: 'gold', operator: 'greaterOrEqual', compareValue: 30 }
  const metKing: Condition = { variableName: 'metKing', operator: 'isTrue', compareValue: null }

  it('should treat a missing variable as false', () => {
    expect(evaluateCondition(vars, { variableName: 'ghost', operator: 'isFalse', compareValue: null })).toBe(false)
  })

  it('should combine with and/or', () => {
    expect(evaluateConditions(vars, [richEnough, metKing], 'and')).toBe(false)
    expect(evaluateConditions(vars, [richEnough, metKing], 'or')).toBe(true)
  })

  it('should pass an empty list', () => {
    expect(evaluateConditions(vars, [], 'and')).toBe(true)
    expect(evaluateConditions(vars, [], 'or')).toBe(true)
  })
})

describe('evaluateConditionBatch', () => {
  it('should evaluate each item against its own variables', () => {
    const condition: Condition = { variableName: 'gold', operator: 'greaterThan', compareValue: 10 }
    const results = evaluateConditionBatch([
      { variables: reader({ gold: { type: 'int', value: 5 } }), conditions: [condition], logic: 'and' },
      { variables: reader({ gold: { type: 'int', value: 15 } }), conditions: [condition], logic: 'and' },
      { variables: reader({}), conditions: [condition], logic: 'and' },
    ])
    expect(results).toEqual([false, true, false])
  })
})
