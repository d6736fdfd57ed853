// ═══════════════════════════════════════════════════════════════════════════
// Story Graph - Nodes, connections and variable declarations of one story
// ═══════════════════════════════════════════════════════════════════════════

import type { NodeRegistry } from '../nodes/registry'
import { describeConditionMismatch } from './conditions'
import { isSameLink, type StoryConnection, type Vec2 } from './ports'
import type { StoryNode } from './StoryNode'
import {
  createVariableDeclaration,
  type VariableDeclaration,
  type VariableType,
  type VariableValue,
} from './variables'

export const START_NODE_TYPE = 'start'

export interface StoryGraphInfo {
  id?: string
  name?: string
  description?: string
}

// ─────────────────────────────────────────────────────────────────────────────
// Story Graph
// ─────────────────────────────────────────────────────────────────────────────

export class StoryGraph {
  readonly id: string
  name: string
  description: string
  viewOffset: Vec2 = { x: 0, y: 0 }
  viewScale = 1

  private _nodes: StoryNode[] = []
  private _connections: StoryConnection[] = []
  private _variables: VariableDeclaration[] = []
  private _revision = 0

  constructor(info: StoryGraphInfo = {}) {
    this.id = info.id ?? crypto.randomUUID()
    this.name = info.name ?? 'New Story'
    this.description = info.description ?? ''
  }

  get nodes(): readonly StoryNode[] {
    return this._nodes
  }

  get connections(): readonly StoryConnection[] {
    return this._connections
  }

  get variables(): readonly VariableDeclaration[] {
    return this._variables
  }

  /** Bumped on every structural change; lookup caches compare it to detect staleness */
  get revision(): number {
    return this._revision
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Nodes
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Add a node. Rejects a node whose id is already in the graph.
   */
  addNode(node: StoryNode): boolean {
    if (this._nodes.some(n => n.id === node.id)) {
      console.warn(`[StoryGraph] Node '${node.id}' already exists in graph '${this.name}'`)
      return false
    }
    this._nodes.push(node)
    this._revision++
    return true
  }

  /**
   * Build a node through the registry and add it.
   */
  createNode(type: string, registry: NodeRegistry, position: Vec2 = { x: 0, y: 0 }): StoryNode | null {
    const node = registry.create(type, undefined, position)
    if (!node) return null
    this.addNode(node)
    return node
  }

  /**
   * Remove a node and every connection that touches it.
   */
  removeNode(nodeId: string): boolean {
    const index = this._nodes.findIndex(n => n.id === nodeId)
    if (index === -1) return false

    this._connections = this._connections.filter(
      c => c.outputNodeId !== nodeId && c.inputNodeId !== nodeId
    )
    this._nodes.splice(index, 1)
    this._revision++
    return true
  }

  getNode(nodeId: string): StoryNode | undefined {
    return this._nodes.find(n => n.id === nodeId)
  }

  getNodesOfType(type: string): StoryNode[] {
    return this._nodes.filter(n => n.type === type)
  }

  /** First Start node in authoring order */
  getStartNode(): StoryNode | undefined {
    return this._nodes.find(n => n.type === START_NODE_TYPE)
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Connections
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Connect an output port to an input port. Returns null when an endpoint
   * does not exist or the same link is already present.
   */
  addConnection(
    outputNodeId: string,
    outputPortId: string,
    inputNodeId: string,
    inputPortId: string
  ): StoryConnection | null {
    const outNode = this.getNode(outputNodeId)
    const inNode = this.getNode(inputNodeId)
    if (!outNode || !inNode) {
      console.warn(`[StoryGraph] Cannot connect ${outputNodeId} -> ${inputNodeId}: node not found`)
      return null
    }
    if (!outNode.getOutputPort(outputPortId)) {
      console.warn(`[StoryGraph] Node '${outputNodeId}' has no output port '${outputPortId}'`)
      return null
    }
    if (!inNode.getInputPort(inputPortId)) {
      console.warn(`[StoryGraph] Node '${inputNodeId}' has no input port '${inputPortId}'`)
      return null
    }

    const link = { outputNodeId, outputPortId, inputNodeId, inputPortId }
    if (this._connections.some(c => isSameLink(c, link))) {
      return null
    }

    const connection: StoryConnection = { id: crypto.randomUUID(), ...link }
    this._connections.push(connection)
    this._revision++
    return connection
  }

  /**
   * Insert an already-identified connection (used when loading a graph).
   * Applies the same endpoint and duplicate checks as addConnection.
   */
  restoreConnection(connection: StoryConnection): boolean {
    if (this._connections.some(c => c.id === connection.id || isSameLink(c, connection))) {
      return false
    }
    const outNode = this.getNode(connection.outputNodeId)
    const inNode = this.getNode(connection.inputNodeId)
    if (!outNode?.getOutputPort(connection.outputPortId) || !inNode?.getInputPort(connection.inputPortId)) {
      return false
    }
    this._connections.push({ ...connection })
    this._revision++
    return true
  }

  removeConnection(connectionId: string): boolean {
    const index = this._connections.findIndex(c => c.id === connectionId)
    if (index === -1) return false
    this._connections.splice(index, 1)
    this._revision++
    return true
  }

  getConnection(connectionId: string): StoryConnection | undefined {
    return this._connections.find(c => c.id === connectionId)
  }

  getConnectionsFromNode(nodeId: string): StoryConnection[] {
    return this._connections.filter(c => c.outputNodeId === nodeId)
  }

  getConnectionsToNode(nodeId: string): StoryConnection[] {
    return this._connections.filter(c => c.inputNodeId === nodeId)
  }

  /** First connection leaving the given output port */
  getConnectionFromPort(nodeId: string, portId: string): StoryConnection | undefined {
    return this._connections.find(c => c.outputNodeId === nodeId && c.outputPortId === portId)
  }

  getConnectedNode(nodeId: string, portId: string): StoryNode | undefined {
    const connection = this.getConnectionFromPort(nodeId, portId)
    return connection ? this.getNode(connection.inputNodeId) : undefined
  }

  /**
   * Drop connections leaving a port that no longer exists on its node.
   * Nodes with dynamic ports (choices) call this after removing one.
   */
  pruneConnections(): number {
    const before = this._connections.length
    this._connections = this._connections.filter(c => {
      const out = this.getNode(c.outputNodeId)
      const input = this.getNode(c.inputNodeId)
      return out?.getOutputPort(c.outputPortId) !== undefined && input?.getInputPort(c.inputPortId) !== undefined
    })
    const removed = before - this._connections.length
    if (removed > 0) this._revision++
    return removed
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Variables
  // ─────────────────────────────────────────────────────────────────────────

  addVariable(name: string, type: VariableType, defaultValue?: VariableValue): boolean {
    if (this._variables.some(v => v.name === name)) {
      console.warn(`[StoryGraph] Variable '${name}' already declared`)
      return false
    }
    this._variables.push(createVariableDeclaration(name, type, defaultValue))
    this._revision++
    return true
  }

  removeVariable(name: string): boolean {
    const index = this._variables.findIndex(v => v.name === name)
    if (index === -1) return false
    this._variables.splice(index, 1)
    this._revision++
    return true
  }

  getVariable(name: string): VariableDeclaration | undefined {
    return this._variables.find(v => v.name === name)
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Validation
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Structural validation. Returns human-readable errors; empty when valid.
   */
  validate(): string[] {
    const errors: string[] = []

    const startCount = this.getNodesOfType(START_NODE_TYPE).length
    if (startCount === 0) {
      errors.push('Graph must have at least one Start node')
    } else if (startCount > 1) {
      errors.push(`Graph has ${startCount} Start nodes; expected exactly one`)
    }

    const seenIds = new Set<string>()
    for (const node of this._nodes) {
      if (seenIds.has(node.id)) errors.push(`Duplicate node id '${node.id}'`)
      seenIds.add(node.id)
    }

    const outgoingPerPort = new Map<string, number>()
    for (const connection of this._connections) {
      const outNode = this.getNode(connection.outputNodeId)
      const inNode = this.getNode(connection.inputNodeId)

      if (!outNode) {
        errors.push(`Connection ${connection.id} has invalid output node`)
      } else if (!outNode.getOutputPort(connection.outputPortId)) {
        errors.push(`Connection ${connection.id} has invalid output port '${connection.outputPortId}'`)
      }
      if (!inNode) {
        errors.push(`Connection ${connection.id} has invalid input node`)
      } else if (!inNode.getInputPort(connection.inputPortId)) {
        errors.push(`Connection ${connection.id} has invalid input port '${connection.inputPortId}'`)
      }

      const key = `${connection.outputNodeId}:${connection.outputPortId}`
      outgoingPerPort.set(key, (outgoingPerPort.get(key) ?? 0) + 1)
    }

    for (const node of this._nodes) {
      for (const port of node.outputPorts) {
        const count = outgoingPerPort.get(`${node.id}:${port.id}`) ?? 0
        if (port.capacity === 'single' && count > 1) {
          errors.push(`Port '${port.id}' on node '${node.id}' allows one connection but has ${count}`)
        }
      }
    }

    const seenVariables = new Set<string>()
    for (const variable of this._variables) {
      if (seenVariables.has(variable.name)) {
        errors.push(`Duplicate variable name '${variable.name}'`)
      }
      seenVariables.add(variable.name)
    }

    for (const node of this._nodes) {
      errors.push(...node.validate())
    }

    return errors
  }

  /**
   * Stricter authoring pass over node conditions: flags undeclared variables
   * and compare values the declared type can never match.
   */
  validateConditions(): string[] {
    const warnings: string[] = []
    for (const node of this._nodes) {
      for (const ref of node.getConditionReferences()) {
        const declaration = this.getVariable(ref.variableName)
        if (!declaration) {
          warnings.push(`Node '${ref.nodeId}' tests undeclared variable '${ref.variableName}'`)
          continue
        }
        const mismatch = describeConditionMismatch(declaration.type, ref.operator, ref.compareValue)
        if (mismatch) {
          warnings.push(`Node '${ref.nodeId}' condition on '${ref.variableName}' (${declaration.type}): ${mismatch}`)
        }
      }
    }
    return warnings
  }

  clear(): void {
    this._nodes = []
    this._connections = []
    this._variables = []
    this._revision++
  }
}
