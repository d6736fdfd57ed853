// ─────────────────────────────────────────────────────────────────────────────
// Event Node - Raises a named story event for host handlers
// ─────────────────────────────────────────────────────────────────────────────

import { readBoolean, readNumber, readRecords, readString, type NodeData } from '../model/nodeData'
import { DEFAULT_INPUT_PORT, DEFAULT_OUTPUT_PORT, NodeResult } from '../model/results'
import { StoryNode, type NodeCategory } from '../model/StoryNode'
import type { VariableValue } from '../model/variables'
import type { StoryContext } from '../runtime/context'
import { resolveOperand } from './text'

export const TIMEOUT_PORT = 'timeout'

/** Temp data key set by EventNode.complete() */
export const EVENT_COMPLETE_KEY = 'eventComplete'

export interface EventParameter {
  key: string
  /** Literal or `$variable` */
  value: string
}

export class EventNode extends StoryNode {
  eventName = ''
  eventCategory = 'story'
  readonly parameters: EventParameter[] = []
  /** Hold the run until a handler calls EventNode.complete() */
  waitForCompletion = false
  /** Seconds before leaving through 'timeout'; 0 waits forever */
  timeoutSeconds = 0

  get type(): string {
    return 'event'
  }

  get displayName(): string {
    return 'Event'
  }

  get category(): NodeCategory {
    return 'events'
  }

  protected setupPorts(): void {
    this.addInputPort(DEFAULT_INPUT_PORT, 'In')
    this.addOutputPort(DEFAULT_OUTPUT_PORT, 'Out')
    this.addOutputPort(TIMEOUT_PORT, 'Timeout')
  }

  /** Mark the waiting event as handled */
  static complete(context: StoryContext): void {
    context.setTempData(EVENT_COMPLETE_KEY, true)
  }

  onEnter(context: StoryContext): void {
    context.removeTempData(EVENT_COMPLETE_KEY)
  }

  execute(context: StoryContext): NodeResult {
    context.dispatchEvent({
      name: this.eventName,
      category: this.eventCategory,
      nodeId: this.id,
      parameters: this.resolveParameters(context),
    })

    if (!this.waitForCompletion) {
      return NodeResult.continue()
    }
    return NodeResult.waitForCondition(
      () => context.getTempFlag(EVENT_COMPLETE_KEY),
      DEFAULT_OUTPUT_PORT,
      this.timeoutSeconds > 0 ? { timeoutSeconds: this.timeoutSeconds, timeoutPortId: TIMEOUT_PORT } : {}
    )
  }

  /** Parameters with `$variable` references replaced; missing variables are left out */
  resolveParameters(context: StoryContext): Record<string, VariableValue> {
    const resolved: Record<string, VariableValue> = {}
    for (const parameter of this.parameters) {
      const value = resolveOperand(parameter.value, context)
      if (value !== null) resolved[parameter.key] = value
    }
    return resolved
  }

  validate(): string[] {
    if (!this.eventName) {
      return [`Event node '${this.id}' has no event name`]
    }
    return []
  }

  toData(): NodeData {
    return {
      eventName: this.eventName,
      eventCategory: this.eventCategory,
      parameters: this.parameters.map(p => ({ ...p })),
      waitForCompletion: this.waitForCompletion,
      timeoutSeconds: this.timeoutSeconds,
    }
  }

  applyData(data: NodeData): void {
    this.eventName = readString(data, 'eventName', this.eventName)
    this.eventCategory = readString(data, 'eventCategory', this.eventCategory)
    this.waitForCompletion = readBoolean(data, 'waitForCompletion', this.waitForCompletion)
    this.timeoutSeconds = readNumber(data, 'timeoutSeconds', this.timeoutSeconds)
    if (Array.isArray(data.parameters)) {
      this.parameters.length = 0
      for (const raw of readRecords(data, 'parameters')) {
        this.parameters.push({ key: readString(raw, 'key', ''), value: readString(raw, 'value', '') })
      }
    }
  }
}
