// ─────────────────────────────────────────────────────────────────────────────
// Branch Node - Routes through 'true' or 'false' based on variable conditions
// ─────────────────────────────────────────────────────────────────────────────

import {
  isConditionOperator,
  parseCompareValue,
  type Condition,
  type ConditionLogic,
  type ConditionOperator,
  type ConditionReference,
} from '../model/conditions'
import { readEnum, readRecords, readString, type NodeData } from '../model/nodeData'
import { DEFAULT_INPUT_PORT, NodeResult } from '../model/results'
import { StoryNode, type NodeCategory } from '../model/StoryNode'
import type { StoryContext } from '../runtime/context'

export const TRUE_PORT = 'true'
export const FALSE_PORT = 'false'

export interface BranchCondition {
  variableName: string
  operator: ConditionOperator
  /** Authored text, parsed as bool, then int, then float, else kept as text */
  compareValue: string
}

export class BranchNode extends StoryNode {
  readonly conditions: BranchCondition[] = []
  logic: ConditionLogic = 'and'

  get type(): string {
    return 'branch'
  }

  get displayName(): string {
    return 'Branch'
  }

  get category(): NodeCategory {
    return 'logic'
  }

  protected setupPorts(): void {
    this.addInputPort(DEFAULT_INPUT_PORT, 'In')
    this.addOutputPort(TRUE_PORT, 'True')
    this.addOutputPort(FALSE_PORT, 'False')
  }

  addCondition(variableName: string, operator: ConditionOperator, compareValue: string = ''): BranchCondition {
    const condition = { variableName, operator, compareValue }
    this.conditions.push(condition)
    return condition
  }

  /** Conditions with their compare values parsed */
  getConditions(): Condition[] {
    return this.conditions.map(c => ({
      variableName: c.variableName,
      operator: c.operator,
      compareValue: parseCompareValue(c.compareValue),
    }))
  }

  execute(context: StoryContext): NodeResult {
    const passed = context.evaluateConditions(this.getConditions(), this.logic)
    return NodeResult.branch(passed ? TRUE_PORT : FALSE_PORT)
  }

  validate(): string[] {
    return this.conditions
      .filter(c => !c.variableName)
      .map(() => `Branch node '${this.id}' has a condition with no variable`)
  }

  getConditionReferences(): ConditionReference[] {
    return this.getConditions().map(c => ({ nodeId: this.id, ...c }))
  }

  toData(): NodeData {
    return {
      logic: this.logic,
      conditions: this.conditions.map(c => ({ ...c })),
    }
  }

  applyData(data: NodeData): void {
    this.logic = readEnum(data, 'logic', ['and', 'or'], this.logic)
    if (!Array.isArray(data.conditions)) return

    this.conditions.length = 0
    for (const raw of readRecords(data, 'conditions')) {
      const operator = raw.operator
      if (!isConditionOperator(operator)) {
        console.warn(`[BranchNode] Skipping condition with unknown operator on '${this.id}'`)
        continue
      }
      this.addCondition(readString(raw, 'variableName', ''), operator, readString(raw, 'compareValue', ''))
    }
  }
}
