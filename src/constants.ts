import type { ResolutionPath, StatKey } from "./types.js";

// Streak lengths that trigger a celebration in the resolution result
export const STREAK_MILESTONES = [7, 14, 30, 45, 60, 75, 90];

// Reward table for each way a day can be resolved
export const PATH_REWARDS: Record<ResolutionPath, { xp: number; stat: StatKey }> = {
  perfect: { xp: 20, stat: "discipline" },
  active_recovery: { xp: 15, stat: "resilience" },
  passive_recovery: { xp: 15, stat: "resilience" },
};

// Rewards for progress made during the day, outside any resolution
export const ACTIVITY_REWARDS: Record<"intention_set" | "focus_block_completed", { xp: number; stat: StatKey }> = {
  intention_set: { xp: 0, stat: "clarity" },
  focus_block_completed: { xp: 10, stat: "commitment" },
};

// XP needed per level grows quadratically: level n starts at 100 * (n - 1)^2
export const XP_PER_LEVEL_BASE = 100;

// Max attempts for a store transaction that hits a transient conflict
export const MAX_TRANSACTION_ATTEMPTS = 3;

export const DESCRIPTION_MAX_LENGTH = 500;
export const TARGET_QUANTITY_MAX = 1000;
export const FOCUS_BLOCK_MAX_MINUTES = 240;
