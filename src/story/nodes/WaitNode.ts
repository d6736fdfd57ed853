// ─────────────────────────────────────────────────────────────────────────────
// Wait Node - Pauses traversal on time, input, a condition or one tick
// ─────────────────────────────────────────────────────────────────────────────

import {
  isConditionOperator,
  parseCompareValue,
  type ConditionOperator,
  type ConditionReference,
} from '../model/conditions'
import { readEnum, readNumber, readString, type NodeData } from '../model/nodeData'
import { NodeResult } from '../model/results'
import { StoryNode, type NodeCategory } from '../model/StoryNode'
import type { StoryContext } from '../runtime/context'

export type WaitType = 'time' | 'input' | 'condition' | 'frame'

export const WAIT_TYPES: readonly WaitType[] = ['time', 'input', 'condition', 'frame']

export class WaitNode extends StoryNode {
  waitType: WaitType = 'time'
  /** Seconds, for 'time' */
  duration = 1
  conditionVariable = ''
  operator: ConditionOperator = 'isTrue'
  compareValue = ''

  get type(): string {
    return 'wait'
  }

  get displayName(): string {
    return 'Wait'
  }

  get category(): NodeCategory {
    return 'flow'
  }

  execute(context: StoryContext): NodeResult {
    switch (this.waitType) {
      case 'time':
        return NodeResult.wait(this.duration)
      case 'input':
        return NodeResult.waitForInput()
      case 'condition': {
        const compareValue = parseCompareValue(this.compareValue)
        return NodeResult.waitForCondition(() =>
          context.evaluateCondition(this.conditionVariable, this.operator, compareValue)
        )
      }
      case 'frame':
        return NodeResult.wait(0)
    }
  }

  validate(): string[] {
    if (this.waitType === 'condition' && !this.conditionVariable) {
      return [`Wait node '${this.id}' waits on a condition with no variable`]
    }
    if (this.waitType === 'time' && this.duration < 0) {
      return [`Wait node '${this.id}' has a negative duration`]
    }
    return []
  }

  getConditionReferences(): ConditionReference[] {
    if (this.waitType !== 'condition' || !this.conditionVariable) return []
    return [{
      nodeId: this.id,
      variableName: this.conditionVariable,
      operator: this.operator,
      compareValue: parseCompareValue(this.compareValue),
    }]
  }

  toData(): NodeData {
    return {
      waitType: this.waitType,
      duration: this.duration,
      conditionVariable: this.conditionVariable,
      operator: this.operator,
      compareValue: this.compareValue,
    }
  }

  applyData(data: NodeData): void {
    this.waitType = readEnum(data, 'waitType', WAIT_TYPES, this.waitType)
    this.duration = readNumber(data, 'duration', this.duration)
    this.conditionVariable = readString(data, 'conditionVariable', this.conditionVariable)
    if (isConditionOperator(data.operator)) this.operator = data.operator
    this.compareValue = readString(data, 'compareValue', this.compareValue)
  }
}
