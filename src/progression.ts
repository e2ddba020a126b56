import { ACTIVITY_REWARDS, PATH_REWARDS, XP_PER_LEVEL_BASE } from "./constants.js";
import type { CalendarDate, CharacterStats, ProgressionDelta, ResolutionPath, StatKey } from "./types.js";

export interface ResolutionEvent {
  userId: string;
  date: CalendarDate;
  path: ResolutionPath;
  /** Current streak after the resolution was applied. */
  streak: number;
}

export interface IntentionSetEvent {
  userId: string;
  date: CalendarDate;
  targetQuantity: number;
}

export interface FocusBlockEvent {
  userId: string;
  date: CalendarDate;
  durationMinutes: number;
}

/** Converts what the user did into XP and stat changes. The engine applies the result. */
export interface ProgressionPolicy {
  /** Called once per resolved day. */
  evaluate(event: ResolutionEvent): ProgressionDelta;
  intentionSet(event: IntentionSetEvent): ProgressionDelta;
  focusBlockCompleted(event: FocusBlockEvent): ProgressionDelta;
}

export const EMPTY_STATS: CharacterStats = {
  xp: 0,
  resilience: 0,
  clarity: 0,
  discipline: 0,
  commitment: 0,
};

function reward({ xp, stat }: { xp: number; stat: StatKey }): ProgressionDelta {
  const stats: ProgressionDelta["stats"] = {};
  stats[stat] = 1;
  return { xp, stats };
}

export const defaultProgressionPolicy: ProgressionPolicy = {
  evaluate({ path }) {
    return reward(PATH_REWARDS[path]);
  },
  intentionSet() {
    return reward(ACTIVITY_REWARDS.intention_set);
  },
  focusBlockCompleted() {
    return reward(ACTIVITY_REWARDS.focus_block_completed);
  },
};

const STAT_KEYS: StatKey[] = ["resilience", "clarity", "discipline", "commitment"];

// Values never go below zero, whatever a policy returns.
export function applyDelta(stats: CharacterStats, delta: ProgressionDelta): CharacterStats {
  const next: CharacterStats = { ...stats, xp: Math.max(0, stats.xp + delta.xp) };
  for (const key of STAT_KEYS) {
    const change = delta.stats[key];
    if (change) next[key] = Math.max(0, stats[key] + change);
  }
  return next;
}

export function calculateLevel(xp: number): number {
  if (xp < 0) return 1;
  return Math.floor(Math.sqrt(xp / XP_PER_LEVEL_BASE)) + 1;
}
