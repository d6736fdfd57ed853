// ═══════════════════════════════════════════════════════════════════════════
// Story Node - Base class for every node variant
// ═══════════════════════════════════════════════════════════════════════════

import type { StoryContext } from '../runtime/context'
import type { ConditionReference } from './conditions'
import type { NodeData } from './nodeData'
import { createPort, type PortCapacity, type StoryPort, type Vec2 } from './ports'
import { DEFAULT_INPUT_PORT, DEFAULT_OUTPUT_PORT, type NodeResult } from './results'

export type NodeCategory = 'flow' | 'narrative' | 'logic' | 'media' | 'events'

export abstract class StoryNode {
  readonly id: string
  name = ''
  description = ''
  position: Vec2
  /** Pauses a run in debug mode when the node is entered */
  breakpoint = false

  readonly inputPorts: StoryPort[] = []
  readonly outputPorts: StoryPort[] = []

  /** Registry key, e.g. 'dialogue' */
  abstract get type(): string
  abstract get displayName(): string
  abstract get category(): NodeCategory

  constructor(id: string = crypto.randomUUID(), position: Vec2 = { x: 0, y: 0 }) {
    this.id = id
    this.position = { ...position }
    this.setupPorts()
  }

  /**
   * Declare the node's ports. Runs from the base constructor, so overrides
   * must not read subclass fields.
   */
  protected setupPorts(): void {
    this.addInputPort(DEFAULT_INPUT_PORT, 'In')
    this.addOutputPort(DEFAULT_OUTPUT_PORT, 'Out')
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Ports
  // ─────────────────────────────────────────────────────────────────────────

  addInputPort(id: string, name: string, capacity: PortCapacity = 'multi'): StoryPort {
    const existing = this.getInputPort(id)
    if (existing) return existing
    const port = createPort(id, name, 'input', capacity)
    this.inputPorts.push(port)
    return port
  }

  addOutputPort(id: string, name: string, capacity: PortCapacity = 'single'): StoryPort {
    const existing = this.getOutputPort(id)
    if (existing) return existing
    const port = createPort(id, name, 'output', capacity)
    this.outputPorts.push(port)
    return port
  }

  removeOutputPort(id: string): boolean {
    const index = this.outputPorts.findIndex(p => p.id === id)
    if (index === -1) return false
    this.outputPorts.splice(index, 1)
    return true
  }

  getInputPort(id: string): StoryPort | undefined {
    return this.inputPorts.find(p => p.id === id)
  }

  getOutputPort(id: string): StoryPort | undefined {
    return this.outputPorts.find(p => p.id === id)
  }

  get label(): string {
    return this.name || this.displayName
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /** Called when traversal enters the node, before execute */
  onEnter(_context: StoryContext): void {}

  abstract execute(context: StoryContext): NodeResult

  /** Called when traversal leaves the node */
  onExit(_context: StoryContext): void {}

  /**
   * Called when a waitForInput suspension with a timeout expires.
   * Return the port to leave through, or null for the result's default port.
   */
  onInputTimeout(_context: StoryContext): string | null {
    return null
  }

  /**
   * Resolve an indexed selection made while the node waits for input.
   * Return the port to leave through, or null to reject the selection.
   */
  onSelectChoice(_context: StoryContext, _index: number): string | null {
    return null
  }

  /** Authoring checks; an empty list means the node is valid */
  validate(): string[] {
    return []
  }

  /** Conditions the node evaluates, for the graph's type checks */
  getConditionReferences(): ConditionReference[] {
    return []
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Interchange
  // ─────────────────────────────────────────────────────────────────────────

  /** Variant-specific fields */
  toData(): NodeData {
    return {}
  }

  applyData(_data: NodeData): void {}
}
