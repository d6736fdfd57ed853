// ─────────────────────────────────────────────────────────────────────────────
// Dialogue Node - A line spoken by a character
// ─────────────────────────────────────────────────────────────────────────────

import { readBoolean, readNumber, readString, type NodeData } from '../model/nodeData'
import { NodeResult } from '../model/results'
import { StoryNode, type NodeCategory } from '../model/StoryNode'
import type { StoryContext } from '../runtime/context'
import { interpolateVariables } from './text'

/** Temp data: id of the dialogue node being shown */
export const CURRENT_DIALOGUE_KEY = 'currentDialogue'
/** Temp data: dialogue text with variables substituted */
export const DIALOGUE_TEXT_KEY = 'processedDialogueText'

export class DialogueNode extends StoryNode {
  speakerName = ''
  speakerId = ''
  emotion = 'neutral'
  text = ''
  localizationKey = ''
  /** Characters per second for typewriter presentation; 0 shows the line at once */
  textSpeed = 30
  waitForInput = true
  /** Seconds before advancing when not waiting for input */
  autoAdvanceDelay = 0

  get type(): string {
    return 'dialogue'
  }

  get displayName(): string {
    return 'Dialogue'
  }

  get category(): NodeCategory {
    return 'narrative'
  }

  onEnter(context: StoryContext): void {
    context.setTempData(CURRENT_DIALOGUE_KEY, this.id)
  }

  execute(context: StoryContext): NodeResult {
    context.setTempData(DIALOGUE_TEXT_KEY, this.getProcessedText(context))

    if (this.waitForInput) return NodeResult.waitForInput()
    if (this.autoAdvanceDelay > 0) return NodeResult.wait(this.autoAdvanceDelay)
    return NodeResult.continue()
  }

  getProcessedText(context: StoryContext): string {
    return interpolateVariables(this.text, context)
  }

  validate(): string[] {
    if (!this.text && !this.localizationKey) {
      return [`Dialogue node '${this.id}' has no text content`]
    }
    return []
  }

  toData(): NodeData {
    return {
      speakerName: this.speakerName,
      speakerId: this.speakerId,
      emotion: this.emotion,
      text: this.text,
      localizationKey: this.localizationKey,
      textSpeed: this.textSpeed,
      waitForInput: this.waitForInput,
      autoAdvanceDelay: this.autoAdvanceDelay,
    }
  }

  applyData(data: NodeData): void {
    this.speakerName = readString(data, 'speakerName', this.speakerName)
    this.speakerId = readString(data, 'speakerId', this.speakerId)
    this.emotion = readString(data, 'emotion', this.emotion)
    this.text = readString(data, 'text', this.text)
    this.localizationKey = readString(data, 'localizationKey', this.localizationKey)
    this.textSpeed = readNumber(data, 'textSpeed', this.textSpeed)
    this.waitForInput = readBoolean(data, 'waitForInput', this.waitForInput)
    this.autoAdvanceDelay = readNumber(data, 'autoAdvanceDelay', this.autoAdvanceDelay)
  }
}
