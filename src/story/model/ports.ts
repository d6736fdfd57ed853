// ═══════════════════════════════════════════════════════════════════════════
// Story Ports & Connections
// ═══════════════════════════════════════════════════════════════════════════

export type PortDirection = 'input' | 'output'
export type PortCapacity = 'single' | 'multi'

export interface StoryPort {
  id: string
  name: string
  direction: PortDirection
  capacity: PortCapacity
}

export interface StoryConnection {
  id: string
  outputNodeId: string
  outputPortId: string
  inputNodeId: string
  inputPortId: string
}

export interface Vec2 {
  x: number
  y: number
}

export function createPort(
  id: string,
  name: string,
  direction: PortDirection,
  capacity: PortCapacity = direction === 'input' ? 'multi' : 'single'
): StoryPort {
  return { id, name, direction, capacity }
}

/** True when both connections link the same output port to the same input port */
export function isSameLink(a: StoryConnection, b: Omit<StoryConnection, 'id'>): boolean {
  return (
    a.outputNodeId === b.outputNodeId &&
    a.outputPortId === b.outputPortId &&
    a.inputNodeId === b.inputNodeId &&
    a.inputPortId === b.inputPortId
  )
}
