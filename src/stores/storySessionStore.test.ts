import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createStorySessionStore, type RunSummary, type StorySessionStore } from './storySessionStore';

function summary(runId: string, overrides: Partial<RunSummary> = {}): RunSummary {
  return {
    runId,
    graphId: 'g',
    graphName: 'Graph',
    state: 'running',
    currentNodeId: null,
    startedAt: 1000,
    ...overrides,
  };
}

describe('storySessionStore', () => {
  let store: StorySessionStore;

  beforeEach(() => {
    store = createStorySessionStore();
  });

  it('should start empty', () => {
    expect(store.getState().runs).toEqual({});
    expect(store.getState().currentRunId).toBeNull();
  });

  it('should upsert runs by id', () => {
    store.getState().upsertRun(summary('run_a'));
    store.getState().upsertRun(summary('run_a', { state: 'waitingForInput', currentNodeId: 'n1' }));

    expect(Object.keys(store.getState().runs)).toEqual(['run_a']);
    expect(store.getState().runs.run_a.state).toBe('waitingForInput');
  });

  it('should clear the current run when it is removed', () => {
    store.getState().upsertRun(summary('run_a'));
    store.getState().upsertRun(summary('run_b'));
    store.getState().setCurrentRun('run_b');

    store.getState().removeRun('run_a');
    expect(store.getState().currentRunId).toBe('run_b');

    store.getState().removeRun('run_b');
    expect(store.getState().currentRunId).toBeNull();
    expect(store.getState().runs).toEqual({});
  });

  it('should notify selector subscribers only when their slice changes', () => {
    const listener = vi.fn();
    store.subscribe((state) => state.currentRunId, listener);

    store.getState().upsertRun(summary('run_a'));
    expect(listener).not.toHaveBeenCalled();

    store.getState().setCurrentRun('run_a');
    expect(listener).toHaveBeenCalledWith('run_a', null);
  });

  it('should leave state untouched when removing an unknown run', () => {
    store.getState().upsertRun(summary('run_a'));
    const before = store.getState().runs;
    store.getState().removeRun('missing');
    expect(store.getState().runs).toBe(before);
  });

  it('should reset', () => {
    store.getState().upsertRun(summary('run_a'));
    store.getState().setCurrentRun('run_a');
    store.getState().reset();
    expect(store.getState()).toMatchObject({ runs: {}, currentRunId: null });
  });
});
