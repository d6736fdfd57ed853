// ═══════════════════════════════════════════════════════════════════════════
// Story Graph Serialization - Plain-object interchange format
// ═══════════════════════════════════════════════════════════════════════════

import { StoryGraph } from '../model/graph'
import { isRecord, readBoolean, readNumber, readString, type NodeData } from '../model/nodeData'
import type { StoryConnection, Vec2 } from '../model/ports'
import { isVariableType, isVariableValue, type VariableType, type VariableValue } from '../model/variables'
import type { NodeRegistry } from '../nodes/registry'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export const STORY_FORMAT_VERSION = 1

export interface SerializedStoryNode {
  id: string
  type: string
  name: string
  description: string
  position: Vec2
  breakpoint: boolean
  data: NodeData
}

export interface SerializedStoryVariable {
  name: string
  type: VariableType
  defaultValue: VariableValue
}

export interface SerializedStoryGraph {
  formatVersion: number
  id: string
  name: string
  description: string
  nodes: SerializedStoryNode[]
  connections: StoryConnection[]
  variables: SerializedStoryVariable[]
  view: {
    offset: Vec2
    scale: number
  }
}

export interface DeserializeResult {
  graph: StoryGraph | null
  errors: string[]
  warnings: string[]
}

// ─────────────────────────────────────────────────────────────────────────────
// Serialize
// ─────────────────────────────────────────────────────────────────────────────

export function serializeGraph(graph: StoryGraph): SerializedStoryGraph {
  return {
    formatVersion: STORY_FORMAT_VERSION,
    id: graph.id,
    name: graph.name,
    description: graph.description,
    nodes: graph.nodes.map(node => ({
      id: node.id,
      type: node.type,
      name: node.name,
      description: node.description,
      position: { ...node.position },
      breakpoint: node.breakpoint,
      data: node.toData(),
    })),
    connections: graph.connections.map(c => ({ ...c })),
    variables: graph.variables.map(v => ({ ...v })),
    view: {
      offset: { ...graph.viewOffset },
      scale: graph.viewScale,
    },
  }
}

export function graphToJSON(graph: StoryGraph, pretty: boolean = true): string {
  return JSON.stringify(serializeGraph(graph), null, pretty ? 2 : undefined)
}

// ─────────────────────────────────────────────────────────────────────────────
// Deserialize
// ─────────────────────────────────────────────────────────────────────────────

function readVec2(value: unknown, fallback: Vec2): Vec2 {
  if (!isRecord(value)) return { ...fallback }
  return { x: readNumber(value, 'x', fallback.x), y: readNumber(value, 'y', fallback.y) }
}

function readConnection(value: Record<string, unknown>): StoryConnection | null {
  const { id, outputNodeId, outputPortId, inputNodeId, inputPortId } = value
  if (
    typeof id !== 'string' ||
    typeof outputNodeId !== 'string' ||
    typeof outputPortId !== 'string' ||
    typeof inputNodeId !== 'string' ||
    typeof inputPortId !== 'string'
  ) {
    return null
  }
  return { id, outputNodeId, outputPortId, inputNodeId, inputPortId }
}

/**
 * Rebuild a graph from its interchange form. Problems that lose the whole
 * graph are errors; skipped nodes, connections or variables are warnings.
 */
export function deserializeGraph(input: unknown, registry: NodeRegistry): DeserializeResult {
  const errors: string[] = []
  const warnings: string[] = []

  if (!isRecord(input)) {
    return { graph: null, errors: ['Graph data must be an object'], warnings }
  }

  const version = input.formatVersion
  if (typeof version !== 'number') {
    errors.push('Missing formatVersion')
  } else if (version > STORY_FORMAT_VERSION) {
    errors.push(`Unsupported formatVersion ${version}; newest supported is ${STORY_FORMAT_VERSION}`)
  }
  if (typeof input.id !== 'string' || input.id === '') {
    errors.push('Graph id must be a non-empty string')
  }
  if (!Array.isArray(input.nodes)) {
    errors.push('Graph nodes must be an array')
  }
  if (errors.length > 0 || typeof input.id !== 'string' || !Array.isArray(input.nodes)) {
    return { graph: null, errors, warnings }
  }

  const graph = new StoryGraph({
    id: input.id,
    name: readString(input, 'name', 'Untitled Story'),
    description: readString(input, 'description', ''),
  })

  if (isRecord(input.view)) {
    graph.viewOffset = readVec2(input.view.offset, graph.viewOffset)
    graph.viewScale = readNumber(input.view, 'scale', graph.viewScale)
  }

  // Variables
  const variables: unknown[] = Array.isArray(input.variables) ? input.variables : []
  for (const raw of variables) {
    if (!isRecord(raw) || typeof raw.name !== 'string' || !isVariableType(raw.type)) {
      warnings.push('Skipping malformed variable declaration')
      continue
    }
    const defaultValue = isVariableValue(raw.defaultValue) ? raw.defaultValue : undefined
    if (!graph.addVariable(raw.name, raw.type, defaultValue)) {
      warnings.push(`Skipping duplicate variable '${raw.name}'`)
    }
  }

  // Nodes
  for (const raw of input.nodes) {
    if (!isRecord(raw) || typeof raw.id !== 'string' || typeof raw.type !== 'string') {
      warnings.push('Skipping node without id or type')
      continue
    }
    const node = registry.create(raw.type, raw.id, readVec2(raw.position, { x: 0, y: 0 }))
    if (!node) {
      warnings.push(`Skipping node '${raw.id}' of unknown type '${raw.type}'`)
      continue
    }
    node.name = readString(raw, 'name', '')
    node.description = readString(raw, 'description', '')
    node.breakpoint = readBoolean(raw, 'breakpoint', false)
    if (isRecord(raw.data)) node.applyData(raw.data)

    if (!graph.addNode(node)) {
      warnings.push(`Skipping duplicate node '${raw.id}'`)
    }
  }

  // Connections
  const connections: unknown[] = Array.isArray(input.connections) ? input.connections : []
  for (const raw of connections) {
    const connection = isRecord(raw) ? readConnection(raw) : null
    if (!connection) {
      warnings.push('Skipping malformed connection')
      continue
    }
    if (!graph.restoreConnection(connection)) {
      warnings.push(`Skipping connection '${connection.id}': endpoint missing or link duplicated`)
    }
  }

  if (warnings.length > 0) {
    console.warn(`[Serialization] Loaded '${graph.name}' with ${warnings.length} warning(s)`)
  }

  return { graph, errors, warnings }
}

export function graphFromJSON(json: string, registry: NodeRegistry): DeserializeResult {
  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    return { graph: null, errors: [`Invalid JSON: ${message}`], warnings: [] }
  }
  return deserializeGraph(parsed, registry)
}
