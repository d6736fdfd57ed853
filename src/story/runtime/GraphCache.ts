// ═══════════════════════════════════════════════════════════════════════════
// Graph Cache - Constant-time lookups over a story graph
// Built from a snapshot; call rebuild() after structural edits
// ═══════════════════════════════════════════════════════════════════════════

import { START_NODE_TYPE, type StoryGraph } from '../model/graph'
import type { StoryConnection } from '../model/ports'
import type { StoryNode } from '../model/StoryNode'

const EMPTY: readonly StoryConnection[] = []

/** Combined (nodeId, portId) key; the separator cannot occur in either id */
function portKey(nodeId: string, portId: string): string {
  return `${nodeId}\u0000${portId}`
}

export class GraphCache {
  readonly graph: StoryGraph

  private nodeMap: Map<string, StoryNode> = new Map()
  private connectionMap: Map<string, StoryConnection> = new Map()
  private portMap: Map<string, StoryConnection> = new Map()
  private outgoing: Map<string, StoryConnection[]> = new Map()
  private incoming: Map<string, StoryConnection[]> = new Map()
  private typeMap: Map<string, StoryNode[]> = new Map()
  private startNode: StoryNode | undefined = undefined

  private built = false
  private builtRevision = -1

  constructor(graph: StoryGraph) {
    this.graph = graph
  }

  get isBuilt(): boolean {
    return this.built
  }

  /** True when the graph changed since the last build */
  isStale(): boolean {
    return !this.built || this.builtRevision !== this.graph.revision
  }

  /**
   * Build indices. Later queries reuse them until rebuild() or dispose().
   */
  build(): void {
    this.clearIndices()

    for (const node of this.graph.nodes) {
      this.nodeMap.set(node.id, node)

      const ofType = this.typeMap.get(node.type)
      if (ofType) ofType.push(node)
      else this.typeMap.set(node.type, [node])

      if (!this.startNode && node.type === START_NODE_TYPE) {
        this.startNode = node
      }
    }

    for (const connection of this.graph.connections) {
      this.connectionMap.set(connection.id, connection)

      // First connection on a port wins, matching the graph's own lookup order
      const key = portKey(connection.outputNodeId, connection.outputPortId)
      if (!this.portMap.has(key)) {
        this.portMap.set(key, connection)
      }

      this.pushTo(this.outgoing, connection.outputNodeId, connection)
      this.pushTo(this.incoming, connection.inputNodeId, connection)
    }

    this.built = true
    this.builtRevision = this.graph.revision
  }

  rebuild(): void {
    this.build()
  }

  dispose(): void {
    this.clearIndices()
    this.built = false
    this.builtRevision = -1
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Queries
  // ─────────────────────────────────────────────────────────────────────────

  getNode(nodeId: string): StoryNode | undefined {
    this.ensureBuilt()
    return this.nodeMap.get(nodeId)
  }

  hasNode(nodeId: string): boolean {
    this.ensureBuilt()
    return this.nodeMap.has(nodeId)
  }

  getConnection(connectionId: string): StoryConnection | undefined {
    this.ensureBuilt()
    return this.connectionMap.get(connectionId)
  }

  getConnectionFromPort(nodeId: string, portId: string): StoryConnection | undefined {
    this.ensureBuilt()
    return this.portMap.get(portKey(nodeId, portId))
  }

  getConnectedNode(nodeId: string, portId: string): StoryNode | undefined {
    const connection = this.getConnectionFromPort(nodeId, portId)
    return connection ? this.nodeMap.get(connection.inputNodeId) : undefined
  }

  getConnectionsFromNode(nodeId: string): readonly StoryConnection[] {
    this.ensureBuilt()
    return this.outgoing.get(nodeId) ?? EMPTY
  }

  getConnectionsToNode(nodeId: string): readonly StoryConnection[] {
    this.ensureBuilt()
    return this.incoming.get(nodeId) ?? EMPTY
  }

  getNodesOfType(type: string): readonly StoryNode[] {
    this.ensureBuilt()
    return this.typeMap.get(type) ?? []
  }

  getStartNode(): StoryNode | undefined {
    this.ensureBuilt()
    return this.startNode
  }

  getStats(): { nodes: number; connections: number; ports: number } {
    this.ensureBuilt()
    return {
      nodes: this.nodeMap.size,
      connections: this.connectionMap.size,
      ports: this.portMap.size,
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────

  private ensureBuilt(): void {
    if (!this.built) this.build()
  }

  private pushTo(index: Map<string, StoryConnection[]>, nodeId: string, connection: StoryConnection): void {
    const list = index.get(nodeId)
    if (list) list.push(connection)
    else index.set(nodeId, [connection])
  }

  private clearIndices(): void {
    this.nodeMap.clear()
    this.connectionMap.clear()
    this.portMap.clear()
    this.outgoing.clear()
    this.incoming.clear()
    this.typeMap.clear()
    this.startNode = undefined
  }
}
