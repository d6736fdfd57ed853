// ═══════════════════════════════════════════════════════════════════════════
// Story Events - Typed synchronous pub/sub for runs and contexts
// Handlers run in priority order; a throwing handler is logged and skipped
// ═══════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface EventSource {
  /** Run id, or the graph id for context-level events */
  id: string
}

export interface StoryEvent<T = unknown> {
  readonly type: string
  readonly timestamp: number
  readonly id: string
  readonly source: EventSource
  readonly data: T
}

let eventIdCounter = 0

export function createStoryEvent<T>(type: string, source: EventSource, data: T): StoryEvent<T> {
  return {
    type,
    timestamp: Date.now(),
    id: `evt_${++eventIdCounter}_${type}`,
    source,
    data,
  }
}

export type StoryEventHandler<T> = (event: StoryEvent<T>) => void

interface HandlerRegistration<T> {
  handler: StoryEventHandler<T>
  priority: number
  once: boolean
}

type HandlerTable<Events> = {
  [K in keyof Events]?: HandlerRegistration<Events[K]>[]
}

// ─────────────────────────────────────────────────────────────────────────────
// Event Bus
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Event bus keyed by an event map, e.g. `StoryEventBus<{ nodeEnter: NodeEventData }>`.
 */
export class StoryEventBus<Events extends object> {
  private handlers: HandlerTable<Events> = {}

  constructor(private readonly name: string = 'StoryEvents') {}

  /**
   * Subscribe to an event type. Returns an unsubscribe function.
   */
  on<K extends keyof Events>(
    type: K,
    handler: StoryEventHandler<Events[K]>,
    options?: { priority?: number }
  ): () => void {
    return this.register(type, { handler, priority: options?.priority ?? 0, once: false })
  }

  /**
   * Subscribe for a single delivery.
   */
  once<K extends keyof Events>(type: K, handler: StoryEventHandler<Events[K]>): () => void {
    return this.register(type, { handler, priority: 0, once: true })
  }

  /**
   * Deliver an event to every handler of its type.
   */
  emit<K extends keyof Events>(type: K, source: EventSource, data: Events[K]): StoryEvent<Events[K]> {
    const event = createStoryEvent(String(type), source, data)
    const registrations = this.handlers[type]
    if (!registrations || registrations.length === 0) return event

    // Copy so handlers can unsubscribe during delivery
    for (const registration of [...registrations]) {
      if (registration.once) {
        this.remove(type, registration)
      }
      try {
        registration.handler(event)
      } catch (err) {
        console.error(`[${this.name}] Error in ${String(type)} handler:`, err)
      }
    }
    return event
  }

  getHandlerCount<K extends keyof Events>(type: K): number {
    return this.handlers[type]?.length ?? 0
  }

  off<K extends keyof Events>(type: K): void {
    delete this.handlers[type]
  }

  clear(): void {
    this.handlers = {}
  }

  private register<K extends keyof Events>(type: K, registration: HandlerRegistration<Events[K]>): () => void {
    const list = this.handlers[type] ?? []
    list.push(registration)
    // Higher priority first; stable for equal priorities
    list.sort((a, b) => b.priority - a.priority)
    this.handlers[type] = list

    return () => this.remove(type, registration)
  }

  private remove<K extends keyof Events>(type: K, registration: HandlerRegistration<Events[K]>): void {
    const list = this.handlers[type]
    if (!list) return
    const index = list.indexOf(registration)
    if (index !== -1) list.splice(index, 1)
  }
}
