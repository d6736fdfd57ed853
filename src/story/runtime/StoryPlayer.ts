// ═══════════════════════════════════════════════════════════════════════════
// Story Player - Tick-driven traversal of a story graph
// One player drives one run; suspensions are explicit records, not coroutines
// ═══════════════════════════════════════════════════════════════════════════

import type { StoryGraph } from '../model/graph'
import { DEFAULT_OUTPUT_PORT, type NodeResult } from '../model/results'
import type { StoryNode } from '../model/StoryNode'
import type { VariableSnapshot } from '../model/variables'
import { StoryContext, type StoryEventRequest } from './context'
import { StoryEventBus, type StoryEventHandler } from './events'
import { GraphCache } from './GraphCache'
import { SuspensionTimers } from './SuspensionTimers'
import type { VariableStoreKind } from './variableStores'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type StoryPlayerState =
  | 'idle'
  | 'running'
  | 'paused'
  | 'waiting'
  | 'waitingForCondition'
  | 'waitingForInput'
  | 'complete'

export type SuspensionKind = 'wait' | 'waitForCondition' | 'waitForInput'

export type StoryEndReason = 'end' | 'deadEnd' | 'stopped' | 'error'

export interface StoryPlayerConfig {
  /** Verbose logging and breakpoint handling */
  debug: boolean
  variableStore: VariableStoreKind
  /** Seed for shuffles and random variable operations; null seeds from the clock */
  seed: number | null
  /** Steps one advance may take without suspending before the run is paused; 0 disables the guard */
  maxStepsPerAdvance: number
}

export const DEFAULT_STORY_PLAYER_CONFIG: StoryPlayerConfig = {
  debug: false,
  variableStore: 'map',
  seed: null,
  maxStepsPerAdvance: 10000,
}

export interface NodeEventData {
  nodeId: string
  node: StoryNode
}

export interface StoryStartData {
  graph: StoryGraph
  startNodeId: string
}

export interface StoryEndData {
  graph: StoryGraph
  success: boolean
  reason: StoryEndReason
}

export interface StateChangeData {
  from: StoryPlayerState
  to: StoryPlayerState
}

export interface StoryErrorData {
  message: string
  nodeId?: string
}

export interface JumpData {
  fromNodeId: string | null
  toNodeId: string
}

export interface InputTimeoutData {
  nodeId: string
  portId: string
}

export interface StoryPlayerEvents {
  storyStart: StoryStartData
  storyEnd: StoryEndData
  nodeEnter: NodeEventData
  nodeExit: NodeEventData
  stateChange: StateChangeData
  breakpoint: NodeEventData
  jump: JumpData
  inputTimeout: InputTimeoutData
  storyEvent: StoryEventRequest
  error: StoryErrorData
}

export interface StorySaveState {
  graphId: string
  currentNodeId: string | null
  variables: VariableSnapshot
}

export interface SuspensionInfo {
  kind: SuspensionKind
  nodeId: string
  /** Seconds left on a timed wait or timeout, if any */
  remainingSeconds: number | null
}

export interface PlayOptions {
  /** Shared lookup cache; a private one is built when omitted */
  cache?: GraphCache
  /** Existing context to continue with */
  context?: StoryContext
}

export interface PlayerStats {
  startTime: number
  endTime?: number
  nodesVisited: number
  errors: string[]
}

type CursorStage = 'enter' | 'execute' | 'exit' | 'exited'

interface Cursor {
  node: StoryNode
  stage: CursorStage
  portId: string
  /** The node suspended at least once; its scratch data is dropped on exit */
  suspended: boolean
  ending: boolean
}

type Suspension =
  | { kind: 'wait'; token: number }
  | {
      kind: 'waitForCondition'
      token: number
      condition: () => boolean
      resolvePort?: () => string | null
    }
  | { kind: 'waitForInput'; token: number }

const SUSPENSION_STATES: Record<SuspensionKind, StoryPlayerState> = {
  wait: 'waiting',
  waitForCondition: 'waitingForCondition',
  waitForInput: 'waitingForInput',
}

let playerCounter = 0

// ─────────────────────────────────────────────────────────────────────────────
// Story Player
// ─────────────────────────────────────────────────────────────────────────────

export class StoryPlayer {
  readonly id: string
  readonly config: StoryPlayerConfig
  readonly events: StoryEventBus<StoryPlayerEvents> = new StoryEventBus('StoryPlayer')

  private timers = new SuspensionTimers()
  private _graph: StoryGraph | null = null
  private _cache: GraphCache | null = null
  private _context: StoryContext | null = null
  private cursor: Cursor | null = null
  private suspension: Suspension | null = null

  private _state: StoryPlayerState = 'idle'
  private active = false
  private finished = false
  private paused = false
  private advancing = false
  private suspensionCounter = 0

  private stats: PlayerStats = { startTime: 0, nodesVisited: 0, errors: [] }

  constructor(config: Partial<StoryPlayerConfig> = {}, id?: string) {
    this.config = { ...DEFAULT_STORY_PLAYER_CONFIG, ...config }
    this.id = id ?? `run_${++playerCounter}`
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Accessors
  // ─────────────────────────────────────────────────────────────────────────

  get state(): StoryPlayerState {
    return this._state
  }

  get graph(): StoryGraph | null {
    return this._graph
  }

  get cache(): GraphCache | null {
    return this._cache
  }

  get context(): StoryContext | null {
    return this._context
  }

  get currentNode(): StoryNode | null {
    return this.cursor?.node ?? null
  }

  get isPlaying(): boolean {
    return this.active
  }

  get isPaused(): boolean {
    return this.paused
  }

  get isComplete(): boolean {
    return this._state === 'complete'
  }

  getSuspension(): SuspensionInfo | null {
    const suspension = this.suspension
    const cursor = this.cursor
    if (!suspension || !cursor) return null
    return {
      kind: suspension.kind,
      nodeId: cursor.node.id,
      remainingSeconds: this.timers.getRemaining(suspension.token),
    }
  }

  getStats(): PlayerStats {
    return { ...this.stats, errors: [...this.stats.errors] }
  }

  on<K extends keyof StoryPlayerEvents>(type: K, handler: StoryEventHandler<StoryPlayerEvents[K]>): () => void {
    return this.events.on(type, handler)
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Run Control
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Start a run at the graph's Start node, or at startNodeId when given.
   * A run already in progress is stopped first.
   */
  play(graph: StoryGraph, startNodeId?: string, options: PlayOptions = {}): boolean {
    if (this.active) this.stop()

    const cache = options.cache ?? new GraphCache(graph)
    if (cache.graph !== graph) {
      this.reportError(`Lookup cache belongs to graph '${cache.graph.id}', not '${graph.id}'`)
      return false
    }
    if (cache.isBuilt && cache.isStale()) {
      console.warn(`[StoryPlayer] Lookup cache for '${graph.name}' is stale; rebuild it after editing the graph`)
    }

    const start = startNodeId !== undefined ? cache.getNode(startNodeId) : cache.getStartNode()
    if (!start) {
      this.reportError(
        startNodeId !== undefined ? `Node with ID '${startNodeId}' not found` : 'No start node found in graph'
      )
      return false
    }

    const context = options.context ?? this.createContext(graph)
    this.begin(graph, cache, context, start)
    return true
  }

  /**
   * End the run. The current node's exit hook runs once and storyEnd fires
   * with success=false. Does nothing when no run is active.
   */
  stop(): void {
    if (!this.active) return

    const cursor = this.cursor
    const context = this._context
    this.clearRun()

    if (cursor && context && (cursor.stage === 'execute' || cursor.stage === 'exit')) {
      cursor.stage = 'exited'
      try {
        cursor.node.onExit(context)
      } catch (err) {
        console.error(`[StoryPlayer] Node '${cursor.node.id}' threw in onExit during stop:`, err)
      }
    }

    this.finish(false, 'stopped')
  }

  pause(): boolean {
    if (!this.active || this.paused) return false
    this.paused = true
    this._context?.setPaused(true)
    this.log('Paused')
    this.updateState()
    return true
  }

  resume(): boolean {
    if (!this.active || !this.paused) return false
    this.paused = false
    this._context?.setPaused(false)
    this.log('Resumed')
    this.updateState()
    this.advance()
    return true
  }

  /**
   * Reset the context and play again from the Start node.
   */
  restart(): boolean {
    const graph = this._graph
    const cache = this._cache
    const context = this._context
    if (!graph || !cache || !context) return false

    if (this.active) this.stop()
    context.reset()
    return this.play(graph, undefined, { cache, context })
  }

  /**
   * Abandon the current node and continue at another one with the same
   * context. No storyEnd fires for the abandoned position.
   */
  jumpToNode(nodeId: string): boolean {
    const cache = this._cache
    const context = this._context
    const target = cache?.getNode(nodeId)
    if (!cache || !context || !target) {
      this.reportError(`Cannot jump to node: ${nodeId} not found`)
      return false
    }

    const cursor = this.cursor
    this.suspension = null
    this.timers.clear()

    if (cursor && (cursor.stage === 'execute' || cursor.stage === 'exit')) {
      cursor.stage = 'exited'
      try {
        cursor.node.onExit(context)
      } catch (err) {
        console.error(`[StoryPlayer] Node '${cursor.node.id}' threw in onExit during jump:`, err)
      }
    }
    context.clearTempData()

    this.active = true
    this.finished = false
    this.paused = false
    context.setPaused(false)
    this.cursor = this.createCursor(target)

    this.log(`Jump ${cursor?.node.id ?? '(none)'} -> ${target.id}`)
    this.events.emit('jump', this.source, { fromNodeId: cursor?.node.id ?? null, toNodeId: target.id })
    this.updateState()
    this.advance()
    return true
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Host Tick
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Advance timers and poll condition suspensions. Paused runs do not tick.
   */
  tick(deltaSeconds: number): void {
    if (!this.active || this.paused) return

    this.timers.update(deltaSeconds)

    const suspension = this.suspension
    if (!this.active || this.paused || suspension?.kind !== 'waitForCondition') return

    let met = false
    try {
      met = suspension.condition()
    } catch (err) {
      console.error(`[StoryPlayer] Wait condition threw at node '${this.cursor?.node.id}':`, err)
    }
    if (!met) return

    let port: string | null = null
    try {
      port = suspension.resolvePort?.() ?? null
    } catch (err) {
      console.error(`[StoryPlayer] Port resolver threw at node '${this.cursor?.node.id}':`, err)
    }
    this.resolveSuspension(suspension.token, port)
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Input
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Resume a run waiting for input, optionally through a specific port.
   * Returns false when the run is not waiting for input.
   */
  sendInput(portId?: string): boolean {
    const suspension = this.inputSuspension('sendInput')
    if (!suspension) return false
    return this.resolveSuspension(suspension.token, portId ?? null)
  }

  /**
   * Select a choice by its position in the presented list.
   */
  selectChoice(index: number): boolean {
    const suspension = this.inputSuspension('selectChoice')
    const cursor = this.cursor
    const context = this._context
    if (!suspension || !cursor || !context) return false

    let port: string | null
    try {
      port = cursor.node.onSelectChoice(context, index)
    } catch (err) {
      this.failRun(cursor.node, 'onSelectChoice', err)
      return false
    }
    if (port === null) {
      console.warn(`[StoryPlayer] Choice ${index} rejected by node '${cursor.node.id}'`)
      return false
    }
    return this.resolveSuspension(suspension.token, port)
  }

  /**
   * Leave the waiting node through a named output port.
   */
  selectPort(portId: string): boolean {
    const suspension = this.inputSuspension('selectPort')
    const cursor = this.cursor
    if (!suspension || !cursor) return false
    if (!cursor.node.getOutputPort(portId)) {
      console.warn(`[StoryPlayer] Node '${cursor.node.id}' has no output port '${portId}'`)
      return false
    }
    return this.resolveSuspension(suspension.token, portId)
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Save / Load
  // ─────────────────────────────────────────────────────────────────────────

  saveState(): StorySaveState | null {
    const graph = this._graph
    const context = this._context
    if (!graph || !context) return null
    return {
      graphId: graph.id,
      currentNodeId: this.active ? this.cursor?.node.id ?? null : null,
      variables: context.saveState(),
    }
  }

  /**
   * Restore variables and resume at the saved node. Without a saved node the
   * variables are restored and the run stays stopped.
   */
  loadState(state: StorySaveState, graph: StoryGraph, options: Pick<PlayOptions, 'cache'> = {}): boolean {
    if (state.graphId !== graph.id) {
      console.warn(`[StoryPlayer] Save state is for graph '${state.graphId}', loading into '${graph.id}'`)
    }
    if (this.active) this.stop()

    const cache = options.cache ?? new GraphCache(graph)
    const context = this.createContext(graph)
    context.loadState(state.variables)

    if (state.currentNodeId === null) {
      this._graph = graph
      this._cache = cache
      this._context = context
      return true
    }

    const node = cache.getNode(state.currentNodeId)
    if (!node) {
      this.reportError(`Node with ID '${state.currentNodeId}' not found`)
      return false
    }
    this.begin(graph, cache, context, node)
    return true
  }

  /** Stop the run and drop every listener */
  dispose(): void {
    this.stop()
    this.events.clear()
    this.timers.clear()
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Traversal
  // ─────────────────────────────────────────────────────────────────────────

  private begin(graph: StoryGraph, cache: GraphCache, context: StoryContext, start: StoryNode): void {
    this._graph = graph
    this._cache = cache
    this._context = context
    context.dispatcher = request => {
      this.events.emit('storyEvent', this.source, request)
    }

    this.timers.clear()
    this.suspension = null
    this.active = true
    this.finished = false
    this.paused = false
    context.setPaused(false)
    this.cursor = this.createCursor(start)
    this.stats = { startTime: Date.now(), nodesVisited: 0, errors: [] }

    this.log(`Starting '${graph.name}' at ${start.id}`)
    this.events.emit('storyStart', this.source, { graph, startNodeId: start.id })
    this.updateState()
    this.advance()
  }

  /**
   * Step until the run suspends, pauses or finishes. Re-entrant calls from
   * listeners return immediately; the outer loop picks up their changes.
   */
  private advance(): void {
    if (this.advancing) return
    this.advancing = true
    let steps = 0
    try {
      while (this.active && !this.paused && !this.suspension && this.cursor) {
        const limit = this.config.maxStepsPerAdvance
        if (limit > 0 && ++steps > limit) {
          this.paused = true
          this._context?.setPaused(true)
          this.reportError(
            `Run took ${limit} steps without suspending; paused at node '${this.cursor.node.id}'`,
            this.cursor.node.id
          )
          break
        }
        this.step(this.cursor)
      }
    } finally {
      this.advancing = false
    }
    this.updateState()
  }

  private step(cursor: Cursor): void {
    switch (cursor.stage) {
      case 'enter':
        this.enterNode(cursor)
        break
      case 'execute':
        this.executeNode(cursor)
        break
      case 'exit':
        this.exitNode(cursor)
        break
      case 'exited':
        // Exited but not yet replaced; only reachable if a listener interfered
        this.cursor = null
        break
    }
  }

  private enterNode(cursor: Cursor): void {
    const context = this.requireContext()
    const node = cursor.node

    context.setCurrentNode(node)
    this.stats.nodesVisited++
    if (!this.runHook(node, 'onEnter', () => node.onEnter(context))) return

    cursor.stage = 'execute'
    this.log(`Enter ${node.type} '${node.id}'`)
    this.events.emit('nodeEnter', this.source, { nodeId: node.id, node })
    if (!this.isCurrent(cursor)) return

    if (this.config.debug && node.breakpoint) {
      this.paused = true
      context.setPaused(true)
      console.log(`[StoryPlayer] Breakpoint hit at '${node.id}'`)
      this.events.emit('breakpoint', this.source, { nodeId: node.id, node })
    }
  }

  private executeNode(cursor: Cursor): void {
    const context = this.requireContext()
    const node = cursor.node

    let result: NodeResult
    try {
      result = node.execute(context)
    } catch (err) {
      this.failRun(node, 'execute', err)
      return
    }
    if (!this.isCurrent(cursor)) return

    cursor.stage = 'exit'
    switch (result.kind) {
      case 'continue':
        cursor.portId = result.portId
        break

      case 'end':
        cursor.ending = true
        break

      case 'wait': {
        cursor.portId = result.portId
        const token = this.suspend(cursor, { kind: 'wait', token: this.nextToken() })
        this.timers.start(token, result.seconds, () => {
          this.resolveSuspension(token, null)
        })
        break
      }

      case 'waitForCondition': {
        cursor.portId = result.portId
        const token = this.suspend(cursor, {
          kind: 'waitForCondition',
          token: this.nextToken(),
          condition: result.condition,
          resolvePort: result.resolvePort,
        })
        if (result.timeoutSeconds !== undefined && result.timeoutSeconds > 0) {
          const timeoutPort = result.timeoutPortId ?? result.portId
          this.timers.start(token, result.timeoutSeconds, () => {
            this.resolveSuspension(token, timeoutPort)
          })
        }
        break
      }

      case 'waitForInput': {
        cursor.portId = result.portId
        const token = this.suspend(cursor, { kind: 'waitForInput', token: this.nextToken() })
        if (result.timeoutSeconds !== undefined && result.timeoutSeconds > 0) {
          this.timers.start(token, result.timeoutSeconds, () => {
            this.handleInputTimeout(token)
          })
        }
        break
      }
    }
  }

  private exitNode(cursor: Cursor): void {
    const context = this.requireContext()
    const cache = this.requireCache()
    const node = cursor.node

    cursor.stage = 'exited'
    if (!this.runHook(node, 'onExit', () => node.onExit(context))) return
    // The hook may have stopped the run or jumped elsewhere
    if (!this.isCurrent(cursor)) return
    this.log(`Exit '${node.id}' via '${cursor.portId}'`)
    this.events.emit('nodeExit', this.source, { nodeId: node.id, node })
    if (cursor.suspended) context.clearTempData()
    if (!this.isCurrent(cursor)) return

    if (cursor.ending) {
      this.endRun(true, 'end')
      return
    }

    const next = cache.getConnectedNode(node.id, cursor.portId)
    if (!next) {
      this.log(`No connection from '${node.id}' port '${cursor.portId}'`)
      this.endRun(context.isComplete, 'deadEnd')
      return
    }
    this.cursor = this.createCursor(next)
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Suspensions
  // ─────────────────────────────────────────────────────────────────────────

  private nextToken(): number {
    return ++this.suspensionCounter
  }

  private suspend(cursor: Cursor, suspension: Suspension): number {
    cursor.suspended = true
    this.suspension = suspension
    this.log(`Suspended at '${cursor.node.id}' (${suspension.kind})`)
    return suspension.token
  }

  /**
   * Clear the suspension with the given token and carry on. Stale tokens
   * (a suspension already resolved or abandoned) do nothing.
   */
  private resolveSuspension(token: number, portOverride: string | null): boolean {
    const suspension = this.suspension
    const cursor = this.cursor
    if (!this.active || !suspension || suspension.token !== token || !cursor) return false

    this.timers.cancel(token)
    this.suspension = null
    if (portOverride !== null) cursor.portId = portOverride

    this.log(`Resumed '${cursor.node.id}' via '${cursor.portId}'`)
    this.updateState()
    if (!this.paused) this.advance()
    return true
  }

  private handleInputTimeout(token: number): void {
    const suspension = this.suspension
    const cursor = this.cursor
    const context = this._context
    if (!suspension || suspension.token !== token || !cursor || !context) return

    let port: string | null
    try {
      port = cursor.node.onInputTimeout(context)
    } catch (err) {
      this.failRun(cursor.node, 'onInputTimeout', err)
      return
    }

    this.log(`Input timeout at '${cursor.node.id}'`)
    this.events.emit('inputTimeout', this.source, { nodeId: cursor.node.id, portId: port ?? cursor.portId })
    this.resolveSuspension(token, port)
  }

  private inputSuspension(action: string): Suspension | null {
    const suspension = this.suspension
    if (!this.active || suspension?.kind !== 'waitForInput') {
      this.log(`${action} ignored in state '${this._state}'`)
      return null
    }
    return suspension
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Helpers
  // ─────────────────────────────────────────────────────────────────────────

  private get source(): { id: string } {
    return { id: this.id }
  }

  private createContext(graph: StoryGraph): StoryContext {
    return new StoryContext(graph, {
      store: this.config.variableStore,
      seed: this.config.seed ?? undefined,
      ownerId: this.id,
    })
  }

  private createCursor(node: StoryNode): Cursor {
    return { node, stage: 'enter', portId: DEFAULT_OUTPUT_PORT, suspended: false, ending: false }
  }

  private isCurrent(cursor: Cursor): boolean {
    return this.active && this.cursor === cursor
  }

  private requireContext(): StoryContext {
    if (!this._context) throw new Error('StoryPlayer has no context')
    return this._context
  }

  private requireCache(): GraphCache {
    if (!this._cache) throw new Error('StoryPlayer has no lookup cache')
    return this._cache
  }

  private runHook(node: StoryNode, hook: string, fn: () => void): boolean {
    try {
      fn()
      return true
    } catch (err) {
      this.failRun(node, hook, err)
      return false
    }
  }

  private failRun(node: StoryNode, hook: string, err: unknown): void {
    const message = err instanceof Error ? err.message : String(err)
    this.reportError(`Node '${node.id}' threw in ${hook}: ${message}`, node.id)
    if (this.active) {
      this.clearRun()
      this.finish(false, 'error')
    }
  }

  private endRun(success: boolean, reason: StoryEndReason): void {
    this.clearRun()
    this.finish(success, reason)
  }

  private clearRun(): void {
    this.active = false
    this.cursor = null
    this.suspension = null
    this.paused = false
    this.timers.clear()
    this._context?.setPaused(false)
  }

  private finish(success: boolean, reason: StoryEndReason): void {
    this.finished = true
    this.stats.endTime = Date.now()
    this.updateState()

    const graph = this._graph
    this.log(`Story ended (${reason}, success=${success})`)
    if (graph) {
      this.events.emit('storyEnd', this.source, { graph, success, reason })
    }
  }

  private reportError(message: string, nodeId?: string): void {
    console.error(`[StoryPlayer] ${message}`)
    this.stats.errors.push(message)
    this.events.emit('error', this.source, nodeId !== undefined ? { message, nodeId } : { message })
  }

  private updateState(): void {
    let next: StoryPlayerState
    if (this.active) {
      if (this.paused) next = 'paused'
      else next = this.suspension ? SUSPENSION_STATES[this.suspension.kind] : 'running'
    } else {
      next = this.finished ? 'complete' : 'idle'
    }

    if (next === this._state) return
    const from = this._state
    this._state = next
    this.events.emit('stateChange', this.source, { from, to: next })
  }

  private log(message: string): void {
    if (this.config.debug) {
      console.log(`[StoryPlayer:${this.id}] ${message}`)
    }
  }
}
