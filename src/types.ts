import type { ObjectId } from "mongodb";

// --- Calendar ---

/** Date-only value in the user's reckoning, formatted YYYY-MM-DD. */
export type CalendarDate = string;

// --- Character stats ---

export type StatKey = "resilience" | "clarity" | "discipline" | "commitment";

export interface CharacterStats {
  xp: number;
  resilience: number;
  clarity: number;
  discipline: number;
  commitment: number;
}

// --- Players ---

export interface StreakState {
  current_streak: number;
  longest_streak: number;
  last_resolved_date: CalendarDate | null;
}

export interface PlayerDocument extends StreakState {
  _id?: ObjectId;
  user_id: string;
  stats: CharacterStats;
  /** Bumped at the start of every transaction so concurrent writers for one user conflict. */
  lock_version: number;
  created_at: Date;
  updated_at: Date;
}

// --- Daily Intentions ---

export type IntentionStatus = "pending" | "completed" | "failed";

export interface DailyIntentionDocument {
  _id: ObjectId;
  user_id: string;
  date: CalendarDate;
  description: string;
  status: IntentionStatus;
  /** Units the user commits to, such as pages or emails. 1 for a plain yes/no intention. */
  target_quantity: number;
  /** Only ever moves forward, and never past target_quantity. */
  completed_quantity: number;
  /** Set when the intention leaves "pending". */
  concluded_at?: Date;
  /** True when the failure was discovered at the next day's check-in rather than declared. */
  lapsed?: boolean;
  created_at: Date;
  updated_at: Date;
}

// --- Recovery Quests ---

export type RecoveryQuestStatus = "pending" | "completed";

export interface RecoveryQuestDocument {
  _id: ObjectId;
  user_id: string;
  source_intention_id: ObjectId;
  source_date: CalendarDate;
  prompt: string;
  response?: string;
  status: RecoveryQuestStatus;
  created_at: Date;
  completed_at?: Date;
}

// --- Focus Blocks ---

export type FocusBlockStatus = "active" | "completed" | "abandoned";

export interface FocusBlockDocument {
  _id: ObjectId;
  user_id: string;
  intention_id: ObjectId;
  date: CalendarDate;
  description: string;
  duration_minutes: number;
  status: FocusBlockStatus;
  created_at: Date;
  concluded_at?: Date;
}

// --- Resolutions ---

export type ResolutionPath = "perfect" | "active_recovery" | "passive_recovery";

export interface ProgressionDelta {
  xp: number;
  stats: Partial<Record<StatKey, number>>;
}

export interface ResolutionDocument {
  _id?: ObjectId;
  user_id: string;
  date: CalendarDate;
  path: ResolutionPath;
  intention_id: ObjectId;
  quest_id?: ObjectId;
  delta: ProgressionDelta;
  streak_after: number;
  resolved_at: Date;
}

// --- Engine results ---

export type CheckInResult =
  | { state: "blocked"; quest: RecoveryQuestDocument }
  | { state: "ready" }
  | { state: "already_resolved"; intention: DailyIntentionDocument; quest?: RecoveryQuestDocument };

export interface Resolution {
  date: CalendarDate;
  path: ResolutionPath;
  streak: { current: number; longest: number };
  /** Set when the new streak lands on one of STREAK_MILESTONES. */
  milestone: number | null;
  delta: ProgressionDelta;
  feedback?: string;
}

export interface ProgressUpdate {
  intention: DailyIntentionDocument;
  completion_percentage: number;
  /** Present when this update reached the target and resolved the day. */
  resolution?: Resolution;
}

export interface FocusBlockOutcome {
  block: FocusBlockDocument;
  delta: ProgressionDelta;
}

export interface FailureOutcome {
  intention: DailyIntentionDocument;
  quest: RecoveryQuestDocument;
}

export interface GameState {
  user_id: string;
  today: CalendarDate;
  current_streak: number;
  longest_streak: number;
  last_resolved_date: CalendarDate | null;
  /** Yesterday's intention is still pending; the next check-in will turn it into a recovery quest. */
  awaiting_check_in: boolean;
  pending_block?: RecoveryQuestDocument;
  today_intention?: DailyIntentionDocument;
  today_quest?: RecoveryQuestDocument;
  active_focus_block?: FocusBlockDocument;
  stats: CharacterStats;
  level: number;
}

export interface StreakAudit {
  cached: StreakState;
  derived: StreakState;
  consistent: boolean;
}
