// ─────────────────────────────────────────────────────────────────────────────
// Cutscene Node - Hands control to a cutscene and waits for it to finish
// ─────────────────────────────────────────────────────────────────────────────

import { readBoolean, readString, type NodeData } from '../model/nodeData'
import { DEFAULT_INPUT_PORT, NodeResult } from '../model/results'
import { StoryNode, type NodeCategory } from '../model/StoryNode'
import type { StoryContext } from '../runtime/context'

export const COMPLETE_PORT = 'complete'
export const SKIPPED_PORT = 'skipped'

/** Temp data keys set by finish() */
export const CUTSCENE_COMPLETE_KEY = 'cutsceneComplete'
export const CUTSCENE_SKIPPED_KEY = 'cutsceneSkipped'

export class CutsceneNode extends StoryNode {
  cutsceneId = ''
  skippable = true
  pauseGameplay = true
  hideUI = true

  get type(): string {
    return 'cutscene'
  }

  get displayName(): string {
    return 'Cutscene'
  }

  get category(): NodeCategory {
    return 'media'
  }

  protected setupPorts(): void {
    this.addInputPort(DEFAULT_INPUT_PORT, 'In')
    this.addOutputPort(COMPLETE_PORT, 'Complete')
    this.addOutputPort(SKIPPED_PORT, 'Skipped')
  }

  onEnter(context: StoryContext): void {
    context.removeTempData(CUTSCENE_COMPLETE_KEY)
    context.removeTempData(CUTSCENE_SKIPPED_KEY)
  }

  execute(context: StoryContext): NodeResult {
    context.dispatchEvent({
      name: 'playCutscene',
      category: 'cutscene',
      nodeId: this.id,
      parameters: {
        cutsceneId: this.cutsceneId,
        skippable: this.skippable,
        pauseGameplay: this.pauseGameplay,
        hideUI: this.hideUI,
      },
    })

    return NodeResult.waitForCondition(
      () => context.getTempFlag(CUTSCENE_COMPLETE_KEY),
      COMPLETE_PORT,
      { resolvePort: () => (context.getTempFlag(CUTSCENE_SKIPPED_KEY) ? SKIPPED_PORT : COMPLETE_PORT) }
    )
  }

  /**
   * Called by the presentation layer when the cutscene ends. The run moves
   * on at its next tick. Returns false for a skip on an unskippable cutscene.
   */
  finish(context: StoryContext, skipped: boolean = false): boolean {
    if (skipped && !this.skippable) return false
    context.setTempData(CUTSCENE_SKIPPED_KEY, skipped)
    context.setTempData(CUTSCENE_COMPLETE_KEY, true)
    return true
  }

  onExit(context: StoryContext): void {
    context.removeTempData(CUTSCENE_COMPLETE_KEY)
    context.removeTempData(CUTSCENE_SKIPPED_KEY)
  }

  validate(): string[] {
    if (!this.cutsceneId) {
      return [`Cutscene node '${this.id}' has no cutscene assigned`]
    }
    return []
  }

  toData(): NodeData {
    return {
      cutsceneId: this.cutsceneId,
      skippable: this.skippable,
      pauseGameplay: this.pauseGameplay,
      hideUI: this.hideUI,
    }
  }

  applyData(data: NodeData): void {
    this.cutsceneId = readString(data, 'cutsceneId', this.cutsceneId)
    this.skippable = readBoolean(data, 'skippable', this.skippable)
    this.pauseGameplay = readBoolean(data, 'pauseGameplay', this.pauseGameplay)
    this.hideUI = readBoolean(data, 'hideUI', this.hideUI)
  }
}
