// ═══════════════════════════════════════════════════════════════════════════
// Story Context - Per-run variables, scratch data and navigation history
// ═══════════════════════════════════════════════════════════════════════════

import type { Condition, ConditionLogic, ConditionOperator } from '../model/conditions'
import type { StoryGraph } from '../model/graph'
import type { StoryNode } from '../model/StoryNode'
import {
  coerceTyped,
  inferType,
  toBoolean,
  toNumber,
  toText,
  type TypedValue,
  type VariableSnapshot,
  type VariableType,
  type VariableValue,
} from '../model/variables'
import {
  evaluateConditions,
  evaluateTypedCondition,
  type VariableReader,
} from './conditions'
import { StoryEventBus } from './events'
import { SeededRandom } from './random'
import { createVariableStore, type VariableStore, type VariableStoreKind } from './variableStores'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface VariableChangeEvent {
  name: string
  oldValue: VariableValue | null
  newValue: VariableValue
}

export interface NodeChangeEvent {
  previousNodeId: string | null
  nodeId: string | null
}

export interface StoryContextEvents {
  variableChanged: VariableChangeEvent
  nodeChanged: NodeChangeEvent
}

/** A named event raised by a node (audio cue, custom trigger) for the host to handle */
export interface StoryEventRequest {
  name: string
  category: string
  nodeId: string
  parameters: Record<string, VariableValue>
}

export type StoryEventDispatcher = (request: StoryEventRequest) => void

export interface StoryContextOptions {
  store?: VariableStoreKind
  seed?: number
  /** Id used as the source of context events */
  ownerId?: string
}

// ─────────────────────────────────────────────────────────────────────────────
// Story Context
// ─────────────────────────────────────────────────────────────────────────────

export class StoryContext implements VariableReader {
  readonly graph: StoryGraph
  readonly events: StoryEventBus<StoryContextEvents> = new StoryEventBus('StoryContext')
  readonly random: SeededRandom

  /** Set by the owning player; receives requests from audio/event nodes */
  dispatcher: StoryEventDispatcher | null = null

  private store: VariableStore
  private tempData: Map<string, unknown> = new Map()
  private history: string[] = []
  private _currentNode: StoryNode | null = null
  private _isPaused = false
  private _isComplete = false
  private readonly source: { id: string }

  constructor(graph: StoryGraph, options: StoryContextOptions = {}) {
    this.graph = graph
    this.store = createVariableStore(options.store ?? 'map')
    this.random = new SeededRandom(options.seed)
    this.source = { id: options.ownerId ?? graph.id }
    this.seedVariables()
  }

  get storeKind(): VariableStoreKind {
    return this.store.kind
  }

  get currentNode(): StoryNode | null {
    return this._currentNode
  }

  get isPaused(): boolean {
    return this._isPaused
  }

  get isComplete(): boolean {
    return this._isComplete
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Variables
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Overwrite a variable and notify listeners. With an explicit type the
   * value is coerced first; a value that cannot be coerced is rejected.
   */
  setVariable(name: string, value: VariableValue, type?: VariableType): boolean {
    const previous = this.store.getTyped(name)
    const slotType = type ?? inferType(value, previous?.type)
    const slot = coerceTyped(value, slotType)
    if (!slot) {
      console.warn(`[StoryContext] Cannot store ${JSON.stringify(value)} in ${slotType} variable '${name}'`)
      return false
    }

    this.store.set(name, slot)
    this.events.emit('variableChanged', this.source, {
      name,
      oldValue: previous ? previous.value : null,
      newValue: slot.value,
    })
    return true
  }

  /**
   * Read a variable coerced to the type of the default. Missing variables
   * and failed coercions return the default.
   */
  getVariable(name: string, defaultValue: string): string
  getVariable(name: string, defaultValue: number): number
  getVariable(name: string, defaultValue: boolean): boolean
  getVariable(name: string, defaultValue: VariableValue): VariableValue {
    const slot = this.store.getTyped(name)
    if (!slot) return defaultValue

    if (typeof defaultValue === 'string') return toText(slot.value)
    if (typeof defaultValue === 'number') return toNumber(slot.value) ?? defaultValue
    return toBoolean(slot.value) ?? defaultValue
  }

  /** Raw stored value, or null when absent */
  getValue(name: string): VariableValue | null {
    return this.store.getTyped(name)?.value ?? null
  }

  getTyped(name: string): TypedValue | undefined {
    return this.store.getTyped(name)
  }

  hasVariable(name: string): boolean {
    return this.store.has(name)
  }

  /**
   * Add to a numeric variable. A missing variable starts from zero.
   */
  incrementVariable(name: string, amount: number = 1): void {
    const slot = this.store.getTyped(name)
    const current = slot ? toNumber(slot.value) ?? 0 : 0
    const type = slot && (slot.type === 'int' || slot.type === 'float') ? slot.type : undefined
    this.setVariable(name, current + amount, type)
  }

  deleteVariable(name: string): boolean {
    return this.store.delete(name)
  }

  getVariableNames(): string[] {
    return this.store.names()
  }

  onVariableChanged(listener: (change: VariableChangeEvent) => void): () => void {
    return this.events.on('variableChanged', event => listener(event.data))
  }

  onNodeChanged(listener: (change: NodeChangeEvent) => void): () => void {
    return this.events.on('nodeChanged', event => listener(event.data))
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Conditions
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Compare a variable against a value. Absent variables and values that
   * cannot be compared give false.
   */
  evaluateCondition(name: string, operator: ConditionOperator, compareValue: VariableValue | null = null): boolean {
    const slot = this.store.getTyped(name)
    if (!slot) return false
    return evaluateTypedCondition(slot, operator, compareValue)
  }

  evaluateConditions(conditions: readonly Condition[], logic: ConditionLogic = 'and'): boolean {
    return evaluateConditions(this.store, conditions, logic)
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Temp Data
  // ─────────────────────────────────────────────────────────────────────────

  setTempData(key: string, value: unknown): void {
    this.tempData.set(key, value)
  }

  getTempData(key: string): unknown {
    return this.tempData.get(key)
  }

  /** True only when the stored value is exactly `true` */
  getTempFlag(key: string): boolean {
    return this.tempData.get(key) === true
  }

  hasTempData(key: string): boolean {
    return this.tempData.has(key)
  }

  removeTempData(key: string): boolean {
    return this.tempData.delete(key)
  }

  clearTempData(): void {
    this.tempData.clear()
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Navigation
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Make a node current, pushing the previous node's id onto history.
   */
  setCurrentNode(node: StoryNode | null): void {
    const previous = this._currentNode
    if (previous) {
      this.history.push(previous.id)
    }
    this._currentNode = node
    this.events.emit('nodeChanged', this.source, {
      previousNodeId: previous?.id ?? null,
      nodeId: node?.id ?? null,
    })
  }

  pushHistory(nodeId: string): void {
    this.history.push(nodeId)
  }

  popHistory(): string | null {
    return this.history.pop() ?? null
  }

  peekHistory(): string | null {
    return this.history.length > 0 ? this.history[this.history.length - 1] : null
  }

  clearHistory(): void {
    this.history = []
  }

  getHistory(): readonly string[] {
    return this.history
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Flags
  // ─────────────────────────────────────────────────────────────────────────

  markComplete(): void {
    this._isComplete = true
  }

  setPaused(paused: boolean): void {
    this._isPaused = paused
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Events from nodes
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Forward a node's event request to the owning player. Returns false when
   * nothing is listening.
   */
  dispatchEvent(request: StoryEventRequest): boolean {
    if (!this.dispatcher) return false
    this.dispatcher(request)
    return true
  }

  // ─────────────────────────────────────────────────────────────────────────
  // State
  // ─────────────────────────────────────────────────────────────────────────

  /** Flat copy of the variable store. Temp data and history are not included. */
  saveState(): VariableSnapshot {
    const snapshot: VariableSnapshot = {}
    for (const name of this.store.names()) {
      const slot = this.store.getTyped(name)
      if (slot) snapshot[name] = slot.value
    }
    return snapshot
  }

  /**
   * Replace the variable store with a snapshot. Declared variables keep their
   * declared type; others are typed from the value, whole numbers as int.
   */
  loadState(snapshot: VariableSnapshot): void {
    this.store.clear()
    for (const [name, value] of Object.entries(snapshot)) {
      const declared = this.graph.getVariable(name)
      const slot = coerceTyped(value, declared?.type ?? inferType(value, 'int'))
        ?? coerceTyped(value, inferType(value, 'int'))
      if (slot) this.store.set(name, slot)
    }
  }

  /**
   * Clear all run state and re-seed variables from the graph.
   */
  reset(): void {
    this.store.clear()
    this.tempData.clear()
    this.history = []
    this._currentNode = null
    this._isPaused = false
    this._isComplete = false
    this.seedVariables()
  }

  private seedVariables(): void {
    for (const declaration of this.graph.variables) {
      const slot = coerceTyped(declaration.defaultValue, declaration.type)
      if (slot) this.store.set(declaration.name, slot)
    }
  }
}
