export { StartNode } from './StartNode'
export { EndNode, END_TYPES, type EndType } from './EndNode'
export { DialogueNode, CURRENT_DIALOGUE_KEY, DIALOGUE_TEXT_KEY } from './DialogueNode'
export { ChoiceNode, PRESENTED_CHOICES_KEY, type StoryChoice } from './ChoiceNode'
export { BranchNode, TRUE_PORT, FALSE_PORT, type BranchCondition } from './BranchNode'
export { SetVariableNode, VARIABLE_OPERATIONS, type VariableOperation } from './SetVariableNode'
export { WaitNode, WAIT_TYPES, type WaitType } from './WaitNode'
export {
  CutsceneNode,
  COMPLETE_PORT,
  SKIPPED_PORT,
  CUTSCENE_COMPLETE_KEY,
  CUTSCENE_SKIPPED_KEY,
} from './CutsceneNode'
export { AudioNode, AUDIO_ACTIONS, AUDIO_TYPES, type AudioAction, type AudioType } from './AudioNode'
export { EventNode, EVENT_COMPLETE_KEY, TIMEOUT_PORT, type EventParameter } from './EventNode'
export { NodeRegistry, createDefaultNodeRegistry, type NodeFactory } from './registry'
export { interpolateVariables, resolveOperand } from './text'
