export * from './story/model'
export * from './story/nodes'
export * from './story/runtime'
export { createStorySessionStore } from './stores/storySessionStore'
export type { RunSummary, StorySessionState, StorySessionStore } from './stores/storySessionStore'
