// ═══════════════════════════════════════════════════════════════════════════
// Story Session - Host-owned registry of graphs, caches and active runs
// Create one per host session and dispose() it when the session ends
// ═══════════════════════════════════════════════════════════════════════════

import type { Condition, ConditionLogic } from '../model/conditions'
import type { StoryGraph } from '../model/graph'
import { createStorySessionStore, type RunSummary, type StorySessionStore } from '../../stores/storySessionStore'
import { evaluateConditionBatch } from './conditions'
import type { StoryEventRequest } from './context'
import { StoryEventBus, type StoryEventHandler as BusHandler } from './events'
import { GraphCache } from './GraphCache'
import {
  StoryPlayer,
  type StoryPlayerConfig,
  type StoryPlayerEvents,
  type StorySaveState,
} from './StoryPlayer'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** Host handler for events raised by event, audio and cutscene nodes */
export interface StoryEventHandler {
  canHandle(request: StoryEventRequest): boolean
  handle(request: StoryEventRequest, player: StoryPlayer | null): void
}

/** Resolves graphs the session has not seen yet */
export type GraphSource = (graphId: string) => StoryGraph | undefined

export interface StorySessionConfig {
  player: Partial<StoryPlayerConfig>
  graphSource: GraphSource | null
  /** Interval for startLoop() when none is given */
  tickIntervalMs: number
}

export const DEFAULT_STORY_SESSION_CONFIG: StorySessionConfig = {
  player: {},
  graphSource: null,
  tickIntervalMs: 16,
}

export interface StorySessionEvents {
  runStart: { runId: string; graphId: string }
  runEnd: { runId: string; graphId: string; success: boolean }
  error: { message: string; runId?: string }
}

export interface GameSaveState {
  /** Index into runs of the run that had input focus */
  currentRunIndex: number | null
  runs: StorySaveState[]
}

// ─────────────────────────────────────────────────────────────────────────────
// Story Session
// ─────────────────────────────────────────────────────────────────────────────

export class StorySession {
  readonly config: StorySessionConfig
  readonly store: StorySessionStore = createStorySessionStore()
  readonly events: StoryEventBus<StorySessionEvents> = new StoryEventBus('StorySession')

  private graphs: Map<string, StoryGraph> = new Map()
  private caches: Map<string, GraphCache> = new Map()
  private players: Map<string, StoryPlayer> = new Map()
  private playerSubscriptions: Map<string, (() => void)[]> = new Map()
  private handlers: StoryEventHandler[] = []

  private loopHandle: ReturnType<typeof setInterval> | null = null
  private lastTickTime = 0
  private disposed = false

  constructor(config: Partial<StorySessionConfig> = {}) {
    this.config = { ...DEFAULT_STORY_SESSION_CONFIG, ...config }
  }

  get isDisposed(): boolean {
    return this.disposed
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Graph Library
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Add a graph to the library and build its shared lookup cache.
   */
  registerGraph(graph: StoryGraph): void {
    this.graphs.set(graph.id, graph)
    const cache = new GraphCache(graph)
    cache.build()
    this.caches.get(graph.id)?.dispose()
    this.caches.set(graph.id, cache)
  }

  unregisterGraph(graphId: string): boolean {
    this.caches.get(graphId)?.dispose()
    this.caches.delete(graphId)
    return this.graphs.delete(graphId)
  }

  /**
   * Look a graph up in the library, falling back to the configured source.
   */
  getGraph(graphId: string): StoryGraph | undefined {
    const known = this.graphs.get(graphId)
    if (known) return known

    const source = this.config.graphSource
    if (!source) return undefined

    let resolved: StoryGraph | undefined
    try {
      resolved = source(graphId)
    } catch (err) {
      console.error(`[StorySession] Graph source failed for '${graphId}':`, err)
      return undefined
    }
    if (resolved) this.registerGraph(resolved)
    return resolved
  }

  getGraphIds(): string[] {
    return Array.from(this.graphs.keys())
  }

  /**
   * Shared cache for a graph. Runs already in progress keep the cache they
   * started with.
   */
  getCache(graph: StoryGraph): GraphCache {
    const cache = this.caches.get(graph.id)
    if (cache && cache.graph === graph) return cache
    this.registerGraph(graph)
    return this.requireCache(graph.id)
  }

  /** Rebuild a graph's cache after structural edits */
  refreshGraph(graphId: string): boolean {
    const cache = this.caches.get(graphId)
    if (!cache) return false
    cache.rebuild()
    return true
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Runs
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Start a new run. Returns null when the graph or start node cannot be
   * resolved; the reason is reported through the error event.
   */
  play(graphOrId: StoryGraph | string, startNodeId?: string): StoryPlayer | null {
    if (this.disposed) {
      console.warn('[StorySession] play() called on a disposed session')
      return null
    }

    const graph = typeof graphOrId === 'string' ? this.getGraph(graphOrId) : graphOrId
    if (!graph) {
      const graphId = typeof graphOrId === 'string' ? graphOrId : graphOrId.id
      this.reportError(`Story graph '${graphId}' could not be resolved`)
      return null
    }

    const player = new StoryPlayer(this.config.player)
    this.attach(player)
    if (!player.play(graph, startNodeId, { cache: this.getCache(graph) })) {
      this.detach(player.id)
      return null
    }

    if (this.players.has(player.id)) {
      this.store.getState().setCurrentRun(player.id)
    }
    return player
  }

  getPlayer(runId: string): StoryPlayer | undefined {
    return this.players.get(runId)
  }

  getActivePlayers(): StoryPlayer[] {
    return Array.from(this.players.values())
  }

  get currentPlayer(): StoryPlayer | null {
    const runId = this.store.getState().currentRunId
    return runId ? this.players.get(runId) ?? null : null
  }

  setCurrentRun(runId: string): boolean {
    if (!this.players.has(runId)) return false
    this.store.getState().setCurrentRun(runId)
    return true
  }

  stopRun(runId: string): boolean {
    const player = this.players.get(runId)
    if (!player) return false
    player.stop()
    return true
  }

  stopAll(): void {
    for (const player of Array.from(this.players.values())) {
      player.stop()
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Ticking
  // ─────────────────────────────────────────────────────────────────────────

  /** Advance every run by the same delta */
  tick(deltaSeconds: number): void {
    for (const player of Array.from(this.players.values())) {
      player.tick(deltaSeconds)
    }
  }

  /**
   * Tick on a timer with measured deltas. Hosts with their own frame loop
   * call tick() instead.
   */
  startLoop(intervalMs: number = this.config.tickIntervalMs): void {
    if (this.loopHandle) return
    this.lastTickTime = performance.now()
    this.loopHandle = setInterval(() => {
      const now = performance.now()
      const deltaSeconds = (now - this.lastTickTime) / 1000
      this.lastTickTime = now
      this.tick(deltaSeconds)
    }, intervalMs)
  }

  stopLoop(): void {
    if (!this.loopHandle) return
    clearInterval(this.loopHandle)
    this.loopHandle = null
  }

  get isLooping(): boolean {
    return this.loopHandle !== null
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Input (forwarded to the current run)
  // ─────────────────────────────────────────────────────────────────────────

  sendInput(portId?: string): boolean {
    return this.currentPlayer?.sendInput(portId) ?? false
  }

  selectChoice(index: number): boolean {
    return this.currentPlayer?.selectChoice(index) ?? false
  }

  selectPort(portId: string): boolean {
    return this.currentPlayer?.selectPort(portId) ?? false
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Story Events
  // ─────────────────────────────────────────────────────────────────────────

  addEventHandler(handler: StoryEventHandler): () => void {
    this.handlers.push(handler)
    return () => this.removeEventHandler(handler)
  }

  removeEventHandler(handler: StoryEventHandler): boolean {
    const index = this.handlers.indexOf(handler)
    if (index === -1) return false
    this.handlers.splice(index, 1)
    return true
  }

  /**
   * Offer an event to every handler that accepts it. Returns true when at
   * least one handler ran.
   */
  triggerEvent(request: StoryEventRequest, player: StoryPlayer | null = null): boolean {
    let handled = false
    for (const handler of [...this.handlers]) {
      try {
        if (!handler.canHandle(request)) continue
        handler.handle(request, player)
        handled = true
      } catch (err) {
        console.error(`[StorySession] Handler failed for event '${request.name}':`, err)
      }
    }
    return handled
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Batch Conditions
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Evaluate one condition set against every active run's variables.
   */
  evaluateAcrossRuns(conditions: readonly Condition[], logic: ConditionLogic = 'and'): Map<string, boolean> {
    const entries = Array.from(this.players.values()).flatMap(player => {
      const context = player.context
      return context ? [{ runId: player.id, context }] : []
    })
    const results = evaluateConditionBatch(
      entries.map(entry => ({ variables: entry.context, conditions, logic }))
    )
    return new Map(entries.map((entry, i) => [entry.runId, results[i]]))
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Save / Load
  // ─────────────────────────────────────────────────────────────────────────

  saveGameState(): GameSaveState {
    const runs: StorySaveState[] = []
    let currentRunIndex: number | null = null
    const currentRunId = this.store.getState().currentRunId

    for (const player of this.players.values()) {
      const state = player.saveState()
      if (!state) continue
      if (player.id === currentRunId) currentRunIndex = runs.length
      runs.push(state)
    }
    return { currentRunIndex, runs }
  }

  /**
   * Stop every run and resume the saved ones. Returns how many runs resumed.
   */
  loadGameState(state: GameSaveState): number {
    this.stopAll()

    let restored = 0
    state.runs.forEach((saved, index) => {
      const graph = this.getGraph(saved.graphId)
      if (!graph) {
        this.reportError(`Story graph '${saved.graphId}' could not be resolved`)
        return
      }
      if (saved.currentNodeId === null) return

      const player = new StoryPlayer(this.config.player)
      this.attach(player)
      if (!player.loadState(saved, graph, { cache: this.getCache(graph) })) {
        this.detach(player.id)
        return
      }
      restored++
      if (state.currentRunIndex === index && this.players.has(player.id)) {
        this.store.getState().setCurrentRun(player.id)
      }
    })
    return restored
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Stop all runs and release everything the session holds.
   */
  dispose(): void {
    if (this.disposed) return
    this.stopLoop()
    this.stopAll()
    for (const runId of Array.from(this.players.keys())) {
      this.detach(runId)
    }
    for (const cache of this.caches.values()) {
      cache.dispose()
    }
    this.caches.clear()
    this.graphs.clear()
    this.handlers = []
    this.store.getState().reset()
    this.events.clear()
    this.disposed = true
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────

  private attach(player: StoryPlayer): void {
    this.players.set(player.id, player)

    const on = <K extends keyof StoryPlayerEvents>(type: K, handler: BusHandler<StoryPlayerEvents[K]>) =>
      player.on(type, handler)

    this.playerSubscriptions.set(player.id, [
      on('storyStart', event => {
        this.publish(player)
        this.events.emit('runStart', { id: player.id }, { runId: player.id, graphId: event.data.graph.id })
      }),
      on('stateChange', () => this.publish(player)),
      on('nodeEnter', () => this.publish(player)),
      on('storyEvent', event => {
        this.triggerEvent(event.data, player)
      }),
      on('error', event => {
        this.events.emit('error', { id: player.id }, { message: event.data.message, runId: player.id })
      }),
      on('storyEnd', event => {
        const { graph, success } = event.data
        this.detach(player.id)
        this.events.emit('runEnd', { id: player.id }, { runId: player.id, graphId: graph.id, success })
      }),
    ])
  }

  private detach(runId: string): void {
    for (const unsubscribe of this.playerSubscriptions.get(runId) ?? []) {
      unsubscribe()
    }
    this.playerSubscriptions.delete(runId)
    this.players.delete(runId)
    this.store.getState().removeRun(runId)
  }

  private publish(player: StoryPlayer): void {
    const graph = player.graph
    if (!graph || !this.players.has(player.id)) return

    const existing = this.store.getState().runs[player.id]
    const summary: RunSummary = {
      runId: player.id,
      graphId: graph.id,
      graphName: graph.name,
      state: player.state,
      currentNodeId: player.currentNode?.id ?? null,
      startedAt: existing?.startedAt ?? player.getStats().startTime,
    }
    this.store.getState().upsertRun(summary)
  }

  private requireCache(graphId: string): GraphCache {
    const cache = this.caches.get(graphId)
    if (!cache) throw new Error(`No cache registered for graph '${graphId}'`)
    return cache
  }

  private reportError(message: string): void {
    console.error(`[StorySession] ${message}`)
    this.events.emit('error', { id: 'session' }, { message })
  }
}
