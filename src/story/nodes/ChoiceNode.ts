// ═══════════════════════════════════════════════════════════════════════════
// Choice Node - Player picks one of several options, each with its own port
// ═══════════════════════════════════════════════════════════════════════════

import { parseCompareValue, type ConditionReference } from '../model/conditions'
import { readBoolean, readNumber, readRecords, readString, type NodeData } from '../model/nodeData'
import { DEFAULT_INPUT_PORT, DEFAULT_OUTPUT_PORT, NodeResult } from '../model/results'
import { StoryNode, type NodeCategory } from '../model/StoryNode'
import type { StoryContext } from '../runtime/context'

export interface StoryChoice {
  /** Also the id of the choice's output port */
  id: string
  text: string
  localizationKey: string
  /** Bool variable that must be true for the choice to be offered; empty for always */
  conditionVariable: string
  /** Variable assigned when the choice is taken; empty for none */
  setVariable: string
  setValue: string
}

/** Temp data: declared indices of the offered choices, in presented order */
export const PRESENTED_CHOICES_KEY = 'presentedChoices'

function isIndexList(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(v => typeof v === 'number')
}

export class ChoiceNode extends StoryNode {
  prompt = ''
  readonly choices: StoryChoice[] = []
  /** Seconds before a fallback choice is taken; 0 waits forever */
  timeoutSeconds = 0
  /** Declared index taken on timeout; -1 takes the first available choice */
  defaultChoiceIndex = -1
  shuffleChoices = false

  private choiceCounter = 0

  get type(): string {
    return 'choice'
  }

  get displayName(): string {
    return 'Choice'
  }

  get category(): NodeCategory {
    return 'narrative'
  }

  protected setupPorts(): void {
    this.addInputPort(DEFAULT_INPUT_PORT, 'In')
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Authoring
  // ─────────────────────────────────────────────────────────────────────────

  addChoice(text: string, options: Partial<Omit<StoryChoice, 'text'>> = {}): StoryChoice {
    let id = options.id
    while (id === undefined || this.getOutputPort(id)) {
      id = `choice_${++this.choiceCounter}`
    }

    const choice: StoryChoice = {
      id,
      text,
      localizationKey: options.localizationKey ?? '',
      conditionVariable: options.conditionVariable ?? '',
      setVariable: options.setVariable ?? '',
      setValue: options.setValue ?? '',
    }
    this.choices.push(choice)
    this.addOutputPort(id, text || id)
    return choice
  }

  /**
   * Remove a choice and its port. Call graph.pruneConnections() afterwards.
   */
  removeChoice(choiceId: string): boolean {
    const index = this.choices.findIndex(c => c.id === choiceId)
    if (index === -1) return false
    this.choices.splice(index, 1)
    this.removeOutputPort(choiceId)
    return true
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Runtime
  // ─────────────────────────────────────────────────────────────────────────

  onEnter(context: StoryContext): void {
    const available: number[] = []
    this.choices.forEach((choice, index) => {
      if (!choice.conditionVariable || context.getVariable(choice.conditionVariable, true)) {
        available.push(index)
      }
    })
    if (this.shuffleChoices) {
      context.random.shuffle(available)
    }
    context.setTempData(PRESENTED_CHOICES_KEY, available)
  }

  execute(context: StoryContext): NodeResult {
    if (this.getPresentedIndices(context).length === 0) {
      console.warn(`[ChoiceNode] No choices available at '${this.id}'`)
      return NodeResult.continue(DEFAULT_OUTPUT_PORT)
    }
    return NodeResult.waitForInput(DEFAULT_OUTPUT_PORT, this.timeoutSeconds)
  }

  /** Declared indices of the offered choices, in the order shown */
  getPresentedIndices(context: StoryContext): number[] {
    const value = context.getTempData(PRESENTED_CHOICES_KEY)
    return isIndexList(value) ? [...value] : []
  }

  /** The offered choices, in the order shown */
  getPresentedChoices(context: StoryContext): StoryChoice[] {
    return this.getPresentedIndices(context).map(index => this.choices[index])
  }

  onSelectChoice(context: StoryContext, presentedIndex: number): string | null {
    const presented = this.getPresentedIndices(context)
    if (!Number.isInteger(presentedIndex) || presentedIndex < 0 || presentedIndex >= presented.length) {
      return null
    }
    return this.applyChoice(context, presented[presentedIndex])
  }

  onInputTimeout(context: StoryContext): string | null {
    const presented = this.getPresentedIndices(context)
    if (presented.length === 0) return null

    const fallback = presented.includes(this.defaultChoiceIndex)
      ? this.defaultChoiceIndex
      : Math.min(...presented)
    return this.applyChoice(context, fallback)
  }

  /**
   * Apply a choice by declared index and return its port.
   */
  private applyChoice(context: StoryContext, declaredIndex: number): string {
    const choice = this.choices[declaredIndex]
    if (choice.setVariable) {
      context.setVariable(choice.setVariable, parseCompareValue(choice.setValue))
    }
    context.setVariable(`choice_${this.id}`, declaredIndex, 'int')
    return choice.id
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Validation & Interchange
  // ─────────────────────────────────────────────────────────────────────────

  validate(): string[] {
    const errors: string[] = []
    if (this.choices.length === 0) {
      errors.push(`Choice node '${this.id}' has no choices`)
    }
    if (this.defaultChoiceIndex >= this.choices.length) {
      errors.push(`Choice node '${this.id}' default index ${this.defaultChoiceIndex} is out of range`)
    }
    return errors
  }

  getConditionReferences(): ConditionReference[] {
    return this.choices
      .filter(c => c.conditionVariable)
      .map((c): ConditionReference => ({
        nodeId: this.id,
        variableName: c.conditionVariable,
        operator: 'isTrue',
        compareValue: null,
      }))
  }

  toData(): NodeData {
    return {
      prompt: this.prompt,
      choices: this.choices.map(c => ({ ...c })),
      timeoutSeconds: this.timeoutSeconds,
      defaultChoiceIndex: this.defaultChoiceIndex,
      shuffleChoices: this.shuffleChoices,
    }
  }

  applyData(data: NodeData): void {
    this.prompt = readString(data, 'prompt', this.prompt)
    this.timeoutSeconds = readNumber(data, 'timeoutSeconds', this.timeoutSeconds)
    this.defaultChoiceIndex = readNumber(data, 'defaultChoiceIndex', this.defaultChoiceIndex)
    this.shuffleChoices = readBoolean(data, 'shuffleChoices', this.shuffleChoices)

    if (Array.isArray(data.choices)) {
      for (const choice of [...this.choices]) {
        this.removeChoice(choice.id)
      }
      for (const raw of readRecords(data, 'choices')) {
        this.addChoice(readString(raw, 'text', ''), {
          id: readString(raw, 'id', '') || undefined,
          localizationKey: readString(raw, 'localizationKey', ''),
          conditionVariable: readString(raw, 'conditionVariable', ''),
          setVariable: readString(raw, 'setVariable', ''),
          setValue: readString(raw, 'setValue', ''),
        })
      }
    }
  }
}
