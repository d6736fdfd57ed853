// ─────────────────────────────────────────────────────────────────────────────
// Audio Node - Asks the host to play, stop or fade a sound
// ─────────────────────────────────────────────────────────────────────────────

import { readBoolean, readEnum, readNumber, readString, type NodeData } from '../model/nodeData'
import { NodeResult } from '../model/results'
import { StoryNode, type NodeCategory } from '../model/StoryNode'
import type { StoryContext } from '../runtime/context'

export type AudioType = 'music' | 'sfx' | 'voice' | 'ambient'
export type AudioAction = 'play' | 'stop' | 'pause' | 'resume' | 'fadeIn' | 'fadeOut'

export const AUDIO_TYPES: readonly AudioType[] = ['music', 'sfx', 'voice', 'ambient']
export const AUDIO_ACTIONS: readonly AudioAction[] = ['play', 'stop', 'pause', 'resume', 'fadeIn', 'fadeOut']

export class AudioNode extends StoryNode {
  clip = ''
  audioType: AudioType = 'sfx'
  action: AudioAction = 'play'
  volume = 1
  fadeTime = 0
  loop = false
  /** Hold the run for `duration` seconds after starting playback */
  waitForCompletion = false
  duration = 0

  get type(): string {
    return 'audio'
  }

  get displayName(): string {
    return 'Audio'
  }

  get category(): NodeCategory {
    return 'media'
  }

  execute(context: StoryContext): NodeResult {
    context.dispatchEvent({
      name: 'audio',
      category: this.audioType,
      nodeId: this.id,
      parameters: {
        clip: this.clip,
        action: this.action,
        volume: this.volume,
        fadeTime: this.fadeTime,
        loop: this.loop,
      },
    })

    const starts = this.action === 'play' || this.action === 'fadeIn'
    if (this.waitForCompletion && starts && this.duration > 0) {
      return NodeResult.wait(this.duration)
    }
    return NodeResult.continue()
  }

  validate(): string[] {
    if ((this.action === 'play' || this.action === 'fadeIn') && !this.clip) {
      return [`Audio node '${this.id}' has no audio clip`]
    }
    return []
  }

  toData(): NodeData {
    return {
      clip: this.clip,
      audioType: this.audioType,
      action: this.action,
      volume: this.volume,
      fadeTime: this.fadeTime,
      loop: this.loop,
      waitForCompletion: this.waitForCompletion,
      duration: this.duration,
    }
  }

  applyData(data: NodeData): void {
    this.clip = readString(data, 'clip', this.clip)
    this.audioType = readEnum(data, 'audioType', AUDIO_TYPES, this.audioType)
    this.action = readEnum(data, 'action', AUDIO_ACTIONS, this.action)
    this.volume = readNumber(data, 'volume', this.volume)
    this.fadeTime = readNumber(data, 'fadeTime', this.fadeTime)
    this.loop = readBoolean(data, 'loop', this.loop)
    this.waitForCompletion = readBoolean(data, 'waitForCompletion', this.waitForCompletion)
    this.duration = readNumber(data, 'duration', this.duration)
  }
}
