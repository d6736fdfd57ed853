// ─────────────────────────────────────────────────────────────────────────────
// End Node - Marks the run complete and stops traversal
// ─────────────────────────────────────────────────────────────────────────────

import { readEnum, readString, type NodeData } from '../model/nodeData'
import { DEFAULT_INPUT_PORT, NodeResult } from '../model/results'
import { StoryNode, type NodeCategory } from '../model/StoryNode'
import type { StoryContext } from '../runtime/context'

export type EndType = 'complete' | 'failed' | 'checkpoint' | 'transition'

export const END_TYPES: readonly EndType[] = ['complete', 'failed', 'checkpoint', 'transition']

export class EndNode extends StoryNode {
  endLabel = 'End'
  endType: EndType = 'complete'

  get type(): string {
    return 'end'
  }

  get displayName(): string {
    return 'End'
  }

  get category(): NodeCategory {
    return 'flow'
  }

  protected setupPorts(): void {
    this.addInputPort(DEFAULT_INPUT_PORT, 'In')
  }

  execute(context: StoryContext): NodeResult {
    context.markComplete()
    return NodeResult.end()
  }

  toData(): NodeData {
    return { endLabel: this.endLabel, endType: this.endType }
  }

  applyData(data: NodeData): void {
    this.endLabel = readString(data, 'endLabel', this.endLabel)
    this.endType = readEnum(data, 'endType', END_TYPES, this.endType)
  }
}
