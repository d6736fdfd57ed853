// ═══════════════════════════════════════════════════════════════════════════
// Node Registry - Maps node type names to constructors
// ═══════════════════════════════════════════════════════════════════════════

import type { Vec2 } from '../model/ports'
import type { StoryNode } from '../model/StoryNode'
import { AudioNode } from './AudioNode'
import { BranchNode } from './BranchNode'
import { ChoiceNode } from './ChoiceNode'
import { CutsceneNode } from './CutsceneNode'
import { DialogueNode } from './DialogueNode'
import { EndNode } from './EndNode'
import { EventNode } from './EventNode'
import { SetVariableNode } from './SetVariableNode'
import { StartNode } from './StartNode'
import { WaitNode } from './WaitNode'

export type NodeFactory = (id?: string, position?: Vec2) => StoryNode

export class NodeRegistry {
  private factories: Map<string, NodeFactory> = new Map()

  /**
   * Register a node type. Replacing an existing type logs a warning.
   */
  register(type: string, factory: NodeFactory): void {
    if (this.factories.has(type)) {
      console.warn(`[NodeRegistry] Replacing node type '${type}'`)
    }
    this.factories.set(type, factory)
  }

  unregister(type: string): boolean {
    return this.factories.delete(type)
  }

  has(type: string): boolean {
    return this.factories.has(type)
  }

  /**
   * Create a node of the given type, or null for an unknown type.
   */
  create(type: string, id?: string, position?: Vec2): StoryNode | null {
    const factory = this.factories.get(type)
    if (!factory) {
      console.warn(`[NodeRegistry] Unknown node type '${type}'`)
      return null
    }
    const node = factory(id, position)
    if (node.type !== type) {
      console.warn(`[NodeRegistry] Factory for '${type}' built a '${node.type}' node`)
    }
    return node
  }

  getTypes(): string[] {
    return Array.from(this.factories.keys())
  }
}

/** Registry holding every built-in node type */
export function createDefaultNodeRegistry(): NodeRegistry {
  const registry = new NodeRegistry()
  registry.register('start', (id, position) => new StartNode(id, position))
  registry.register('end', (id, position) => new EndNode(id, position))
  registry.register('dialogue', (id, position) => new DialogueNode(id, position))
  registry.register('choice', (id, position) => new ChoiceNode(id, position))
  registry.register('branch', (id, position) => new BranchNode(id, position))
  registry.register('setVariable', (id, position) => new SetVariableNode(id, position))
  registry.register('wait', (id, position) => new WaitNode(id, position))
  registry.register('cutscene', (id, position) => new CutsceneNode(id, position))
  registry.register('audio', (id, position) => new AudioNode(id, position))
  registry.register('event', (id, position) => new EventNode(id, position))
  return registry
}
