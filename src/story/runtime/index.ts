// ═══════════════════════════════════════════════════════════════════════════
// Story Runtime - Traversal, variable state and session management
// ═══════════════════════════════════════════════════════════════════════════

// Event Bus
export { StoryEventBus, createStoryEvent } from './events'
export type { EventSource, StoryEvent, StoryEventHandler as StoryEventListener } from './events'

// Conditions
export {
  FLOAT_EPSILON,
  evaluateTypedCondition,
  evaluateCondition,
  evaluateConditions,
  evaluateConditionBatch,
} from './conditions'
export type { VariableReader, ConditionBatchItem } from './conditions'

// Variable Stores
export { MapVariableStore, ColumnarVariableStore, createVariableStore, hashName } from './variableStores'
export type { VariableStore, VariableStoreKind } from './variableStores'

// Context
export { StoryContext } from './context'
export type {
  VariableChangeEvent,
  NodeChangeEvent,
  StoryContextEvents,
  StoryEventRequest,
  StoryEventDispatcher,
  StoryContextOptions,
} from './context'

// Random
export { SeededRandom } from './random'

// Timers
export { SuspensionTimers } from './SuspensionTimers'

// Lookup Cache
export { GraphCache } from './GraphCache'

// Player
export { StoryPlayer, DEFAULT_STORY_PLAYER_CONFIG } from './StoryPlayer'
export type {
  StoryPlayerState,
  SuspensionKind,
  StoryEndReason,
  StoryPlayerConfig,
  StoryPlayerEvents,
  StorySaveState,
  SuspensionInfo,
  PlayOptions,
  PlayerStats,
  NodeEventData,
  StoryStartData,
  StoryEndData,
  StateChangeData,
  StoryErrorData,
  JumpData,
  InputTimeoutData,
} from './StoryPlayer'

// Session
export { StorySession, DEFAULT_STORY_SESSION_CONFIG } from './StorySession'
export type {
  StoryEventHandler,
  GraphSource,
  StorySessionConfig,
  StorySessionEvents,
  GameSaveState,
} from './StorySession'

// Serialization
export {
  STORY_FORMAT_VERSION,
  serializeGraph,
  graphToJSON,
  deserializeGraph,
  graphFromJSON,
} from './serialization'
export type {
  SerializedStoryNode,
  SerializedStoryVariable,
  SerializedStoryGraph,
  DeserializeResult,
} from './serialization'
