// ─────────────────────────────────────────────────────────────────────────────
// Start Node - Entry point of a story
// ─────────────────────────────────────────────────────────────────────────────

import { readBoolean, readString, type NodeData } from '../model/nodeData'
import { DEFAULT_OUTPUT_PORT, NodeResult } from '../model/results'
import { StoryNode, type NodeCategory } from '../model/StoryNode'
import type { StoryContext } from '../runtime/context'

export class StartNode extends StoryNode {
  startLabel = 'Start'
  isDefaultStart = true

  get type(): string {
    return 'start'
  }

  get displayName(): string {
    return 'Start'
  }

  get category(): NodeCategory {
    return 'flow'
  }

  protected setupPorts(): void {
    this.addOutputPort(DEFAULT_OUTPUT_PORT, 'Out')
  }

  execute(_context: StoryContext): NodeResult {
    return NodeResult.continue()
  }

  toData(): NodeData {
    return { startLabel: this.startLabel, isDefaultStart: this.isDefaultStart }
  }

  applyData(data: NodeData): void {
    this.startLabel = readString(data, 'startLabel', this.startLabel)
    this.isDefaultStart = readBoolean(data, 'isDefaultStart', this.isDefaultStart)
  }
}
