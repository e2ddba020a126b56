export { createQuestEngine } from "./engine.js";
export type { EngineDeps, QuestEngine } from "./engine.js";
export { createQuestServer } from "./app.js";
export { FixedClock, SystemClock } from "./clock.js";
export type { Clock } from "./clock.js";
export { defaultCoachingAdvisor } from "./coaching.js";
export type { CoachingAdvisor } from "./coaching.js";
export { defaultProgressionPolicy, calculateLevel } from "./progression.js";
export type { FocusBlockEvent, IntentionSetEvent, ProgressionPolicy, ResolutionEvent } from "./progression.js";
export { applyResolution, replayStreak } from "./streak.js";
export { MemoryQuestStore } from "./store/memory.js";
export { MongoQuestStore } from "./store/mongo.js";
export type { QuestStore, StoreTransaction, StoreView } from "./store/types.js";
export * from "./errors.js";
export type * from "./types.js";
