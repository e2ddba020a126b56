import { STREAK_MILESTONES } from "./constants.js";
import { daysBetween } from "./dates.js";
import type { CalendarDate, StreakState } from "./types.js";

export const EMPTY_STREAK: StreakState = {
  current_streak: 0,
  longest_streak: 0,
  last_resolved_date: null,
};

export function streakOf(state: StreakState): StreakState {
  return {
    current_streak: state.current_streak,
    longest_streak: state.longest_streak,
    last_resolved_date: state.last_resolved_date,
  };
}

/**
 * Folds one newly resolved day into the streak.
 *
 * The gap is counted between resolved days, not between calls: a recovery
 * quest finished the morning after still resolves the day it belongs to, one
 * day after the previous resolution. Any wider gap means a whole day went
 * unresolved and the chain starts over.
 *
 * Returns `state` itself when `date` is not after the last resolved day.
 */
export function applyResolution(state: StreakState, date: CalendarDate): StreakState {
  if (state.last_resolved_date === null) {
    return {
      current_streak: 1,
      longest_streak: Math.max(1, state.longest_streak),
      last_resolved_date: date,
    };
  }

  const gap = daysBetween(state.last_resolved_date, date);
  if (gap <= 0) return state;

  const current = gap === 1 ? state.current_streak + 1 : 1;
  return {
    current_streak: current,
    longest_streak: Math.max(state.longest_streak, current),
    last_resolved_date: date,
  };
}

/** Rebuilds streak state from the full list of resolved days. */
export function replayStreak(resolvedDates: CalendarDate[]): StreakState {
  return [...resolvedDates]
    .sort((a, b) => a.localeCompare(b))
    .reduce(applyResolution, EMPTY_STREAK);
}

export function milestoneFor(streak: number): number | null {
  return STREAK_MILESTONES.includes(streak) ? streak : null;
}

export function sameStreak(a: StreakState, b: StreakState): boolean {
  return a.current_streak === b.current_streak
    && a.longest_streak === b.longest_streak
    && a.last_resolved_date === b.last_resolved_date;
}
