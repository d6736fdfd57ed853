// ═══════════════════════════════════════════════════════════════════════════
// Story Model - Graph data, ports, variables and node results
// ═══════════════════════════════════════════════════════════════════════════

// Variables
export {
  VARIABLE_TYPES,
  toNumber,
  toBoolean,
  toText,
  coerceTyped,
  inferType,
  getTypeDefault,
  isVariableType,
  isVariableValue,
  createVariableDeclaration,
} from './variables'
export type {
  VariableType,
  VariableValue,
  TypedValue,
  VariableDeclaration,
  VariableSnapshot,
} from './variables'

// Conditions
export {
  CONDITION_OPERATORS,
  isConditionOperator,
  parseCompareValue,
  describeConditionMismatch,
} from './conditions'
export type {
  ConditionOperator,
  ConditionLogic,
  Condition,
  ConditionReference,
} from './conditions'

// Ports and Connections
export { createPort, isSameLink } from './ports'
export type { PortDirection, PortCapacity, StoryPort, StoryConnection, Vec2 } from './ports'

// Node Results
export { NodeResult, DEFAULT_INPUT_PORT, DEFAULT_OUTPUT_PORT } from './results'
export type {
  NodeResultKind,
  ContinueResult,
  WaitResult,
  WaitForConditionResult,
  WaitForInputResult,
  EndResult,
} from './results'

// Nodes and Graphs
export { StoryNode } from './StoryNode'
export type { NodeCategory } from './StoryNode'
export { StoryGraph, START_NODE_TYPE } from './graph'
export type { StoryGraphInfo } from './graph'
export { isRecord, readString, readNumber, readBoolean, readEnum, readRecords } from './nodeData'
export type { NodeData } from './nodeData'
