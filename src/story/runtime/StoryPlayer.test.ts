// ═══════════════════════════════════════════════════════════════════════════
// Story Player Tests - Traversal, suspensions and run control
// ═══════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { StoryGraph } from '../model/graph'
import { NodeResult } from '../model/results'
import { StoryNode, type NodeCategory } from '../model/StoryNode'
import { ChoiceNode } from '../nodes/ChoiceNode'
import { DialogueNode } from '../nodes/DialogueNode'
import { EndNode } from '../nodes/EndNode'
import { SetVariableNode } from '../nodes/SetVariableNode'
import { StartNode } from '../nodes/StartNode'
import { WaitNode } from '../nodes/WaitNode'
import type { StoryContext } from './context'
import { GraphCache } from './GraphCache'
import { StoryPlayer } from './StoryPlayer'

// ─────────────────────────────────────────────────────────────────────────────
// Fixtures
// ─────────────────────────────────────────────────────────────────────────────

class ExplodingNode extends StoryNode {
  get type(): string {
    return 'exploding'
  }

  get displayName(): string {
    return 'Exploding'
  }

  get category(): NodeCategory {
    return 'logic'
  }

  execute(_context: StoryContext): NodeResult {
    throw new Error('kaboom')
  }
}

function linearGraph(waitForInput: boolean): StoryGraph {
  const graph = new StoryGraph({ id: 'linear', name: 'Linear' })
  const line = new DialogueNode('line')
  line.text = 'Hello there'
  line.waitForInput = waitForInput
  graph.addNode(new StartNode('start'))
  graph.addNode(line)
  graph.addNode(new EndNode('end'))
  graph.addConnection('start', 'output', 'line', 'input')
  graph.addConnection('line', 'output', 'end', 'input')
  return graph
}

function choiceGraph(): StoryGraph {
  const graph = new StoryGraph({ id: 'fork', name: 'Fork' })
  const choice = new ChoiceNode('choice')
  choice.timeoutSeconds = 2
  choice.defaultChoiceIndex = 1
  choice.addChoice('Left', { setVariable: 'picked', setValue: 'left' })
  choice.addChoice('Middle', { setVariable: 'picked', setValue: 'middle' })
  choice.addChoice('Right', { setVariable: 'picked', setValue: 'right' })

  graph.addNode(new StartNode('start'))
  graph.addNode(choice)
  graph.addNode(new EndNode('endLeft'))
  graph.addNode(new EndNode('endMiddle'))
  graph.addNode(new EndNode('endRight'))
  graph.addConnection('start', 'output', 'choice', 'input')
  graph.addConnection('choice', 'choice_1', 'endLeft', 'input')
  graph.addConnection('choice', 'choice_2', 'endMiddle', 'input')
  graph.addConnection('choice', 'choice_3', 'endRight', 'input')
  return graph
}

/** Five lettered choices, each setting 'picked' and leading to its own End */
function shuffledChoiceGraph(): { graph: StoryGraph; choice: ChoiceNode } {
  const graph = new StoryGraph({ id: 'shuffled', name: 'Shuffled' })
  const choice = new ChoiceNode('choice')
  choice.shuffleChoices = true
  choice.timeoutSeconds = 1
  graph.addNode(new StartNode('start'))
  graph.addNode(choice)
  graph.addConnection('start', 'output', 'choice', 'input')
  for (const letter of ['A', 'B', 'C', 'D', 'E']) {
    const option = choice.addChoice(letter, { setVariable: 'picked', setValue: letter })
    graph.addNode(new EndNode(`end${letter}`))
    graph.addConnection('choice', option.id, `end${letter}`, 'input')
  }
  return { graph, choice }
}

function waitGraph(wait: WaitNode): StoryGraph {
  const graph = new StoryGraph({ id: 'waiting', name: 'Waiting' })
  graph.addVariable('door', 'bool', false)
  graph.addNode(new StartNode('start'))
  graph.addNode(wait)
  graph.addNode(new EndNode('end'))
  graph.addConnection('start', 'output', wait.id, 'input')
  graph.addConnection(wait.id, 'output', 'end', 'input')
  return graph
}

/** Records node and lifecycle events as short strings */
function record(player: StoryPlayer): string[] {
  const log: string[] = []
  player.on('storyStart', () => log.push('start'))
  player.on('nodeEnter', e => log.push(`enter:${e.data.nodeId}`))
  player.on('nodeExit', e => log.push(`exit:${e.data.nodeId}`))
  player.on('storyEnd', e => log.push(`end:${e.data.reason}:${e.data.success}`))
  return log
}

describe('StoryPlayer', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('traversal', () => {
    it('should run Start -> Dialogue -> End straight through', () => {
      const player = new StoryPlayer()
      const log = record(player)

      expect(player.play(linearGraph(false))).toBe(true)

      expect(log).toEqual([
        'start',
        'enter:start',
        'exit:start',
        'enter:line',
        'exit:line',
        'enter:end',
        'exit:end',
        'end:end:true',
      ])
      expect(player.state).toBe('complete')
      expect(player.isPlaying).toBe(false)
      expect(player.context?.isComplete).toBe(true)
    })

    it('should report state transitions in order', () => {
      const player = new StoryPlayer()
      const states: string[] = []
      player.on('stateChange', e => states.push(`${e.data.from}->${e.data.to}`))

      player.play(linearGraph(true))
      player.sendInput()

      expect(states).toEqual([
        'idle->running',
        'running->waitingForInput',
        'waitingForInput->running',
        'running->complete',
      ])
    })

    it('should suspend at a dialogue until input arrives', () => {
      const player = new StoryPlayer()
      const log = record(player)
      player.play(linearGraph(true))

      expect(player.state).toBe('waitingForInput')
      expect(player.currentNode?.id).toBe('line')
      expect(log[log.length - 1]).toBe('enter:line')

      expect(player.sendInput()).toBe(true)
      expect(log.slice(-4)).toEqual(['exit:line', 'enter:end', 'exit:end', 'end:end:true'])
    })

    it('should ignore input when not waiting for it', () => {
      const player = new StoryPlayer()
      expect(player.sendInput()).toBe(false)
      player.play(linearGraph(false))
      expect(player.sendInput()).toBe(false)
      expect(player.selectChoice(0)).toBe(false)
    })

    it('should end with success=false at a dead end', () => {
      const graph = linearGraph(false)
      graph.removeNode('end')
      const player = new StoryPlayer()
      const log = record(player)

      player.play(graph)

      expect(log[log.length - 1]).toBe('end:deadEnd:false')
      expect(player.state).toBe('complete')
    })

    it('should start at a given node', () => {
      const player = new StoryPlayer()
      const log = record(player)
      player.play(linearGraph(true), 'line')
      expect(log).toEqual(['start', 'enter:line'])
    })

    it('should report a missing start node', () => {
      const graph = new StoryGraph({ id: 'empty' })
      const player = new StoryPlayer()
      const errors: string[] = []
      player.on('error', e => errors.push(e.data.message))

      expect(player.play(graph)).toBe(false)
      expect(player.play(linearGraph(true), 'ghost')).toBe(false)
      expect(errors).toEqual(['No start node found in graph', "Node with ID 'ghost' not found"])
      expect(player.state).toBe('idle')
    })

    it('should reject a cache built for another graph', () => {
      const player = new StoryPlayer()
      const cache = new GraphCache(linearGraph(true))
      expect(player.play(choiceGraph(), undefined, { cache })).toBe(false)
      expect(player.getStats().errors).toEqual(["Lookup cache belongs to graph 'linear', not 'fork'"])
    })

    it('should end the run with an error when a node throws', () => {
      const graph = linearGraph(false)
      graph.addNode(new ExplodingNode('boom'))
      graph.removeNode('end')
      graph.addConnection('line', 'output', 'boom', 'input')

      const player = new StoryPlayer()
      const log = record(player)
      const errors: string[] = []
      player.on('error', e => errors.push(e.data.message))

      player.play(graph)

      expect(errors).toEqual(["Node 'boom' threw in execute: kaboom"])
      expect(log[log.length - 1]).toBe('end:error:false')
      expect(player.state).toBe('complete')
    })

    it('should pause a run that never suspends', () => {
      const graph = new StoryGraph({ id: 'loop' })
      const a = new SetVariableNode('a')
      a.variableName = 'spins'
      a.operation = 'add'
      a.value = '1'
      const b = new SetVariableNode('b')
      graph.addNode(new StartNode('start'))
      graph.addNode(a)
      graph.addNode(b)
      graph.addConnection('start', 'output', 'a', 'input')
      graph.addConnection('a', 'output', 'b', 'input')
      graph.addConnection('b', 'output', 'a', 'input')

      const player = new StoryPlayer({ maxStepsPerAdvance: 100 })
      const errors: string[] = []
      player.on('error', e => errors.push(e.data.message))
      player.play(graph)

      expect(player.state).toBe('paused')
      expect(errors).toEqual(["Run took 100 steps without suspending; paused at node 'a'"])
      expect(player.context?.getValue('spins')).toBe(16)
    })
  })

  describe('choices', () => {
    it('should follow the selected choice port', () => {
      const player = new StoryPlayer()
      const log = record(player)
      player.play(choiceGraph())

      expect(player.state).toBe('waitingForInput')
      expect(player.selectChoice(2)).toBe(true)

      expect(log.slice(-3)).toEqual(['enter:endRight', 'exit:endRight', 'end:end:true'])
      expect(player.context?.getValue('picked')).toBe('right')
    })

    it('should take the default choice when the timeout expires', () => {
      const player = new StoryPlayer()
      const log = record(player)
      const timeouts: string[] = []
      player.on('inputTimeout', e => timeouts.push(`${e.data.nodeId}:${e.data.portId}`))
      player.play(choiceGraph())

      player.tick(1)
      expect(player.state).toBe('waitingForInput')
      expect(player.getSuspension()).toEqual({ kind: 'waitForInput', nodeId: 'choice', remainingSeconds: 1 })

      player.tick(1)
      expect(timeouts).toEqual(['choice:choice_2'])
      expect(log).toContain('enter:endMiddle')
      expect(player.context?.getValue('picked')).toBe('middle')
      expect(player.context?.getValue('choice_choice')).toBe(1)
    })

    it('should let a selection win over a later timeout', () => {
      const player = new StoryPlayer()
      const onTimeout = vi.fn()
      player.on('inputTimeout', onTimeout)
      player.play(choiceGraph())

      player.tick(1.5)
      player.selectChoice(0)
      player.tick(5)

      expect(onTimeout).not.toHaveBeenCalled()
      expect(player.context?.getValue('picked')).toBe('left')
    })

    it('should leave through a port chosen directly', () => {
      const player = new StoryPlayer()
      const log = record(player)
      player.play(choiceGraph())

      expect(player.selectPort('missing')).toBe(false)
      expect(player.selectPort('choice_3')).toBe(true)
      expect(log).toContain('enter:endRight')
      expect(player.context?.hasVariable('picked')).toBe(false)
    })

    it('should map a presented index to its declared choice when shuffled', () => {
      const { graph, choice } = shuffledChoiceGraph()
      const player = new StoryPlayer({ seed: 7 })
      const log = record(player)
      player.play(graph)

      const context = player.context
      if (!context) throw new Error('run has no context')
      const presented = choice.getPresentedChoices(context)
      expect(presented.map(c => c.text)).toEqual(['E', 'D', 'A', 'B', 'C'])

      expect(player.selectChoice(1)).toBe(true)
      expect(context.getValue('picked')).toBe(presented[1].text)
      expect(log).toContain(`enter:end${presented[1].text}`)
      expect(context.getValue('choice_choice')).toBe(3)
    })

    it('should time out to the lowest declared choice when shuffled', () => {
      const { graph } = shuffledChoiceGraph()
      const player = new StoryPlayer({ seed: 7 })
      const log = record(player)
      player.play(graph)

      player.tick(1)

      expect(player.context?.getValue('picked')).toBe('A')
      expect(player.context?.getValue('choice_choice')).toBe(0)
      expect(log.slice(-3)).toEqual(['enter:endA', 'exit:endA', 'end:end:true'])
    })

    it('should time out to the default choice wherever it was shuffled to', () => {
      const { graph, choice } = shuffledChoiceGraph()
      choice.defaultChoiceIndex = 2
      const player = new StoryPlayer({ seed: 7 })
      const timeouts: string[] = []
      player.on('inputTimeout', e => timeouts.push(e.data.portId))
      player.play(graph)

      player.tick(1)

      expect(timeouts).toEqual(['choice_3'])
      expect(player.context?.getValue('picked')).toBe('C')
    })

    it('should keep concurrent runs on one cache isolated', () => {
      const graph = choiceGraph()
      const cache = new GraphCache(graph)
      cache.build()
      const first = new StoryPlayer()
      const second = new StoryPlayer()

      first.play(graph, undefined, { cache })
      second.play(graph, undefined, { cache })
      expect(first.context).not.toBe(second.context)

      first.selectChoice(0)
      expect(second.state).toBe('waitingForInput')
      expect(second.context?.hasVariable('picked')).toBe(false)

      second.selectChoice(2)
      expect(first.context?.getValue('picked')).toBe('left')
      expect(first.context?.getValue('choice_choice')).toBe(0)
      expect(second.context?.getValue('picked')).toBe('right')
      expect(second.context?.getValue('choice_choice')).toBe(2)
    })
  })

  describe('stop', () => {
    it('should not exit again when a node stops the run from its exit hook', () => {
      const graph = linearGraph(true)
      const line = graph.getNode('line')
      if (!line) throw new Error('fixture missing line node')

      const player = new StoryPlayer()
      const log = record(player)
      const onExit = vi.spyOn(line, 'onExit').mockImplementation(() => {
        player.stop()
      })
      player.play(graph)
      player.sendInput()

      expect(onExit).toHaveBeenCalledTimes(1)
      expect(log.filter(entry => entry.startsWith('end:'))).toEqual(['end:stopped:false'])
      expect(log).not.toContain('exit:line')
      expect(log).not.toContain('enter:end')
      expect(player.state).toBe('complete')
    })

    it('should exit the suspended node once and end unsuccessfully', () => {
      const graph = linearGraph(true)
      const line = graph.getNode('line')
      if (!line) throw new Error('fixture missing line node')
      const onExit = vi.spyOn(line, 'onExit')

      const player = new StoryPlayer()
      const log = record(player)
      player.play(graph)
      player.stop()
      player.stop()
      player.tick(10)

      expect(onExit).toHaveBeenCalledTimes(1)
      expect(log.filter(entry => entry.startsWith('end:'))).toEqual(['end:stopped:false'])
      expect(log[log.length - 1]).toBe('end:stopped:false')
      expect(player.sendInput()).toBe(false)
    })

    it('should cancel pending timeouts', () => {
      const player = new StoryPlayer()
      const onTimeout = vi.fn()
      player.on('inputTimeout', onTimeout)
      player.play(choiceGraph())
      player.stop()
      player.tick(5)
      expect(onTimeout).not.toHaveBeenCalled()
    })
  })

  describe('waits', () => {
    it('should resume a timed wait after its duration', () => {
      const wait = new WaitNode('wait')
      wait.duration = 1.5
      const player = new StoryPlayer()
      player.play(waitGraph(wait))

      expect(player.state).toBe('waiting')
      player.tick(1)
      expect(player.state).toBe('waiting')
      player.tick(0.5)
      expect(player.state).toBe('complete')
    })

    it('should resume a frame wait on the next tick', () => {
      const wait = new WaitNode('wait')
      wait.waitType = 'frame'
      const player = new StoryPlayer()
      player.play(waitGraph(wait))

      expect(player.state).toBe('waiting')
      player.tick(0)
      expect(player.state).toBe('complete')
    })

    it('should poll a condition each tick', () => {
      const wait = new WaitNode('wait')
      wait.waitType = 'condition'
      wait.conditionVariable = 'door'
      const player = new StoryPlayer()
      player.play(waitGraph(wait))

      player.tick(0.1)
      expect(player.state).toBe('waitingForCondition')

      player.context?.setVariable('door', true)
      expect(player.state).toBe('waitingForCondition')
      player.tick(0.1)
      expect(player.state).toBe('complete')
    })

    it('should freeze timers while paused', () => {
      const wait = new WaitNode('wait')
      wait.duration = 1
      const player = new StoryPlayer()
      player.play(waitGraph(wait))

      expect(player.pause()).toBe(true)
      expect(player.state).toBe('paused')
      player.tick(5)
      expect(player.resume()).toBe(true)
      expect(player.state).toBe('waiting')
      player.tick(1)
      expect(player.state).toBe('complete')
    })
  })

  describe('debugging', () => {
    it('should pause at a breakpoint in debug mode', () => {
      const graph = linearGraph(false)
      const line = graph.getNode('line')
      if (line) line.breakpoint = true

      const player = new StoryPlayer({ debug: true })
      const log = record(player)
      const hits: string[] = []
      player.on('breakpoint', e => hits.push(e.data.nodeId))
      player.play(graph)

      expect(hits).toEqual(['line'])
      expect(player.state).toBe('paused')
      expect(log[log.length - 1]).toBe('enter:line')

      player.resume()
      expect(player.state).toBe('complete')
    })

    it('should ignore breakpoints outside debug mode', () => {
      const graph = linearGraph(false)
      const line = graph.getNode('line')
      if (line) line.breakpoint = true
      const player = new StoryPlayer()
      player.play(graph)
      expect(player.state).toBe('complete')
    })
  })

  describe('jump', () => {
    it('should abandon the current node without ending the story', () => {
      const graph = linearGraph(true)
      const aside = new DialogueNode('aside')
      aside.text = 'Meanwhile...'
      graph.addNode(aside)

      const player = new StoryPlayer()
      const log = record(player)
      const jumps: string[] = []
      player.on('jump', e => jumps.push(`${e.data.fromNodeId}->${e.data.toNodeId}`))
      player.play(graph)

      expect(player.jumpToNode('aside')).toBe(true)

      expect(jumps).toEqual(['line->aside'])
      expect(log.some(entry => entry.startsWith('end:'))).toBe(false)
      expect(player.currentNode?.id).toBe('aside')
      expect(player.state).toBe('waitingForInput')
      expect(player.context?.getHistory()).toEqual(['start', 'line'])
    })

    it('should report a missing jump target', () => {
      const player = new StoryPlayer()
      const errors: string[] = []
      player.on('error', e => errors.push(e.data.message))
      player.play(linearGraph(true))

      expect(player.jumpToNode('ghost')).toBe(false)
      expect(errors).toEqual(['Cannot jump to node: ghost not found'])
      expect(player.state).toBe('waitingForInput')
    })
  })

  describe('save and restart', () => {
    it('should resume a saved run at its node with its variables', () => {
      const graph = linearGraph(true)
      const player = new StoryPlayer()
      player.play(graph)
      player.context?.setVariable('gold', 30)

      const saved = player.saveState()
      expect(saved).toEqual({ graphId: 'linear', currentNodeId: 'line', variables: { gold: 30 } })
      if (!saved) return

      const restored = new StoryPlayer()
      expect(restored.loadState(saved, graph)).toBe(true)
      expect(restored.currentNode?.id).toBe('line')
      expect(restored.state).toBe('waitingForInput')
      expect(restored.context?.getValue('gold')).toBe(30)
    })

    it('should restore only variables for a finished run', () => {
      const graph = linearGraph(false)
      const player = new StoryPlayer()
      const restored = new StoryPlayer()

      expect(restored.loadState({ graphId: 'linear', currentNodeId: null, variables: { gold: 3 } }, graph)).toBe(true)
      expect(restored.state).toBe('idle')
      expect(restored.context?.getValue('gold')).toBe(3)
      expect(player.saveState()).toBeNull()
    })

    it('should restart with fresh variables', () => {
      const graph = linearGraph(true)
      graph.addVariable('gold', 'int', 1)
      const player = new StoryPlayer()
      player.play(graph)
      player.context?.setVariable('gold', 50)

      expect(player.restart()).toBe(true)
      expect(player.context?.getValue('gold')).toBe(1)
      expect(player.currentNode?.id).toBe('line')
    })
  })
})
