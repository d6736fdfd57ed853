// ─────────────────────────────────────────────────────────────────────────────
// Set Variable Node - Mutates one variable, then continues
// ─────────────────────────────────────────────────────────────────────────────

import { readEnum, readString, type NodeData } from '../model/nodeData'
import { NodeResult } from '../model/results'
import { StoryNode, type NodeCategory } from '../model/StoryNode'
import { toNumber, toText } from '../model/variables'
import type { StoryContext } from '../runtime/context'
import { resolveOperand } from './text'

export type VariableOperation =
  | 'set'
  | 'add'
  | 'subtract'
  | 'multiply'
  | 'divide'
  | 'toggle'
  | 'append'
  | 'random'

export const VARIABLE_OPERATIONS: readonly VariableOperation[] = [
  'set',
  'add',
  'subtract',
  'multiply',
  'divide',
  'toggle',
  'append',
  'random',
]

export class SetVariableNode extends StoryNode {
  variableName = ''
  operation: VariableOperation = 'set'
  /** Literal, `$otherVariable`, or "min,max" for random */
  value = ''

  get type(): string {
    return 'setVariable'
  }

  get displayName(): string {
    return 'Set Variable'
  }

  get category(): NodeCategory {
    return 'logic'
  }

  execute(context: StoryContext): NodeResult {
    if (this.variableName) {
      this.apply(context)
    }
    return NodeResult.continue()
  }

  private apply(context: StoryContext): void {
    const name = this.variableName

    switch (this.operation) {
      case 'set': {
        const operand = resolveOperand(this.value, context)
        if (operand !== null) context.setVariable(name, operand)
        return
      }

      case 'add':
      case 'subtract':
      case 'multiply':
      case 'divide': {
        const operand = resolveOperand(this.value, context)
        const amount = operand === null ? undefined : toNumber(operand)
        if (amount === undefined) {
          console.warn(`[SetVariableNode] '${this.value}' is not a number at '${this.id}'`)
          return
        }
        const current = context.getVariable(name, 0)
        const result = this.arithmetic(current, amount)
        if (result !== null) context.setVariable(name, result)
        return
      }

      case 'toggle':
        context.setVariable(name, !context.getVariable(name, false), 'bool')
        return

      case 'append': {
        const operand = resolveOperand(this.value, context)
        context.setVariable(name, context.getVariable(name, '') + (operand === null ? '' : toText(operand)), 'string')
        return
      }

      case 'random': {
        const [min, max] = this.value.split(',').map(part => toNumber(part))
        if (min === undefined || max === undefined) {
          console.warn(`[SetVariableNode] Random range '${this.value}' should be "min,max" at '${this.id}'`)
          return
        }
        if (Number.isInteger(min) && Number.isInteger(max)) {
          context.setVariable(name, context.random.int(min, max + 1), 'int')
        } else {
          context.setVariable(name, context.random.float(min, max), 'float')
        }
        return
      }
    }
  }

  private arithmetic(current: number, amount: number): number | null {
    switch (this.operation) {
      case 'add': return current + amount
      case 'subtract': return current - amount
      case 'multiply': return current * amount
      case 'divide':
        if (amount === 0) {
          console.warn(`[SetVariableNode] Division by zero at '${this.id}'`)
          return null
        }
        return current / amount
      default: return null
    }
  }

  validate(): string[] {
    if (!this.variableName) {
      return [`Set variable node '${this.id}' has no variable name`]
    }
    return []
  }

  toData(): NodeData {
    return { variableName: this.variableName, operation: this.operation, value: this.value }
  }

  applyData(data: NodeData): void {
    this.variableName = readString(data, 'variableName', this.variableName)
    this.operation = readEnum(data, 'operation', VARIABLE_OPERATIONS, this.operation)
    this.value = readString(data, 'value', this.value)
  }
}
