// ═══════════════════════════════════════════════════════════════════════════
// Node Results - What a node asks the traversal engine to do next
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_OUTPUT_PORT = 'output'
export const DEFAULT_INPUT_PORT = 'input'

export type NodeResultKind = 'continue' | 'wait' | 'waitForCondition' | 'waitForInput' | 'end'

export interface ContinueResult {
  kind: 'continue'
  portId: string
}

export interface WaitResult {
  kind: 'wait'
  seconds: number
  portId: string
}

export interface WaitForConditionResult {
  kind: 'waitForCondition'
  /** Polled once per tick until it returns true */
  condition: () => boolean
  portId: string
  /** Picks the port once the condition holds; falls back to portId when it returns null */
  resolvePort?: () => string | null
  /** Give up after this many seconds and leave through timeoutPortId */
  timeoutSeconds?: number
  timeoutPortId?: string
}

export interface WaitForInputResult {
  kind: 'waitForInput'
  portId: string
  /** Seconds before the node's onInputTimeout hook picks a port */
  timeoutSeconds?: number
}

export interface EndResult {
  kind: 'end'
}

export type NodeResult =
  | ContinueResult
  | WaitResult
  | WaitForConditionResult
  | WaitForInputResult
  | EndResult

export const NodeResult = {
  continue(portId: string = DEFAULT_OUTPUT_PORT): ContinueResult {
    return { kind: 'continue', portId }
  },

  /** Same as continue, named for nodes that pick between several ports */
  branch(portId: string): ContinueResult {
    return { kind: 'continue', portId }
  },

  wait(seconds: number, portId: string = DEFAULT_OUTPUT_PORT): WaitResult {
    return { kind: 'wait', seconds: Math.max(0, seconds), portId }
  },

  waitForCondition(
    condition: () => boolean,
    portId: string = DEFAULT_OUTPUT_PORT,
    options: Omit<WaitForConditionResult, 'kind' | 'condition' | 'portId'> = {}
  ): WaitForConditionResult {
    return { kind: 'waitForCondition', condition, portId, ...options }
  },

  waitForInput(portId: string = DEFAULT_OUTPUT_PORT, timeoutSeconds?: number): WaitForInputResult {
    return timeoutSeconds !== undefined && timeoutSeconds > 0
      ? { kind: 'waitForInput', portId, timeoutSeconds }
      : { kind: 'waitForInput', portId }
  },

  end(): EndResult {
    return { kind: 'end' }
  },
}
