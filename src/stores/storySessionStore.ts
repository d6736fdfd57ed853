// ═══════════════════════════════════════════════════════════════════════════
// Story Session Store - Observable summary of the runs in a session
// Hosts subscribe to render run lists without polling players
// ═══════════════════════════════════════════════════════════════════════════

import { subscribeWithSelector } from 'zustand/middleware';
import { createStore } from 'zustand/vanilla';
import type { StoryPlayerState } from '../story/runtime/StoryPlayer';

// ─────────────────────────────────────────────────────────────────────────────
// Store Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface RunSummary {
  runId: string;
  graphId: string;
  graphName: string;
  state: StoryPlayerState;
  currentNodeId: string | null;
  startedAt: number;
}

export interface StorySessionState {
  runs: Record<string, RunSummary>;
  currentRunId: string | null;

  // Actions
  upsertRun: (summary: RunSummary) => void;
  removeRun: (runId: string) => void;
  setCurrentRun: (runId: string | null) => void;
  reset: () => void;
}

// ─────────────────────────────────────────────────────────────────────────────
// Store
// ─────────────────────────────────────────────────────────────────────────────

export function createStorySessionStore() {
  return createStore<StorySessionState>()(
    subscribeWithSelector((set) => ({
      runs: {},
      currentRunId: null,

      upsertRun: (summary) => {
        set((state) => ({
          runs: { ...state.runs, [summary.runId]: summary },
        }));
      },

      removeRun: (runId) => {
        set((state) => {
          // Unknown run? Skip
          if (!(runId in state.runs)) return state;

          const { [runId]: _removed, ...rest } = state.runs;
          return {
            runs: rest,
            currentRunId: state.currentRunId === runId ? null : state.currentRunId,
          };
        });
      },

      setCurrentRun: (runId) => {
        set({ currentRunId: runId });
      },

      reset: () => {
        set({ runs: {}, currentRunId: null });
      },
    }))
  );
}

export type StorySessionStore = ReturnType<typeof createStorySessionStore>;
