/**
 * Resolution engine: the daily check-in decision and the only place a day
 * becomes resolved.
 *
 * Every operation runs inside one store transaction for the acting user, so
 * the ledger write, streak update, progression delta and resolution record
 * of a call commit together or not at all.
 */

import type { Clock } from "./clock.js";
import { defaultCoachingAdvisor, type CoachingAdvisor } from "./coaching.js";
import { daysBetween, previousDay } from "./dates.js";
import { BlockedByRecoveryError, DuplicateIntentionError, InvalidTransitionError } from "./errors.js";
import {
  completeRecoveryQuest as completeQuestInLedger,
  completionPercentage,
  concludeFocusBlock,
  createIntention,
  createRecoveryQuest,
  getIntention,
  getQuestForIntention,
  markCompleted,
  markFailed,
  markLapsed,
  recordProgress,
  requireFocusBlock,
  requireIntention,
  requireQuest,
  resolvedDates,
  startFocusBlock,
} from "./ledger.js";
import { stderrLogger, type Logger } from "./logger.js";
import { applyDelta, calculateLevel, defaultProgressionPolicy, EMPTY_STATS, type ProgressionPolicy } from "./progression.js";
import { applyResolution, EMPTY_STREAK, milestoneFor, replayStreak, sameStreak, streakOf } from "./streak.js";
import type { QuestStore, StoreTransaction, StoreView } from "./store/types.js";
import type {
  CalendarDate, CheckInResult, DailyIntentionDocument, FailureOutcome, FocusBlockDocument, FocusBlockOutcome,
  GameState, ProgressionDelta, ProgressUpdate, RecoveryQuestDocument, Resolution, ResolutionPath, StreakAudit,
  StreakState,
} from "./types.js";

export interface EngineDeps {
  store: QuestStore;
  clock: Clock;
  policy?: ProgressionPolicy;
  advisor?: CoachingAdvisor;
  log?: Logger;
}

export interface QuestEngine {
  checkIn(userId: string): Promise<CheckInResult>;
  setIntention(userId: string, description: string, targetQuantity?: number): Promise<DailyIntentionDocument>;
  updateProgress(userId: string, intentionId: string, completedQuantity: number): Promise<ProgressUpdate>;
  completeIntention(userId: string, intentionId: string): Promise<Resolution>;
  failIntention(userId: string, intentionId: string): Promise<FailureOutcome>;
  completeRecoveryQuest(userId: string, questId: string, response?: string): Promise<Resolution>;
  startFocusBlock(userId: string, description: string, durationMinutes: number): Promise<FocusBlockDocument>;
  completeFocusBlock(userId: string, blockId: string): Promise<FocusBlockOutcome>;
  abandonFocusBlock(userId: string, blockId: string): Promise<FocusBlockDocument>;
  getGameState(userId: string): Promise<GameState>;
  auditStreak(userId: string): Promise<StreakAudit>;
}

export function createQuestEngine(deps: EngineDeps): QuestEngine {
  const { store, clock } = deps;
  const policy = deps.policy ?? defaultProgressionPolicy;
  const advisor = deps.advisor ?? defaultCoachingAdvisor;
  const log = deps.log ?? stderrLogger;

  async function openRecoveryQuest(
    tx: StoreTransaction,
    failed: DailyIntentionDocument,
    now: Date,
  ): Promise<RecoveryQuestDocument> {
    return createRecoveryQuest(tx, failed, advisor.recoveryPrompt(failed), now);
  }

  /**
   * Works out where the user stands today. Yesterday's intention, if still
   * pending, is failed here and its recovery quest opened, which turns it into
   * a block.
   */
  async function assess(tx: StoreTransaction, today: CalendarDate): Promise<CheckInResult> {
    const now = clock.now();
    let prior = await getIntention(tx, previousDay(today));

    if (prior?.status === "pending") {
      prior = await markLapsed(tx, prior, today, now);
      await openRecoveryQuest(tx, prior, now);
      log(`[engine] ${tx.userId}: intention for ${prior.date} lapsed, recovery quest opened`);
    }

    if (prior?.status === "failed") {
      const quest = await getQuestForIntention(tx, prior);
      if (quest?.status === "pending") return { state: "blocked", quest };
    }

    const intention = await getIntention(tx, today);
    if (!intention) return { state: "ready" };

    const quest = intention.status === "failed" ? await getQuestForIntention(tx, intention) : null;
    return quest
      ? { state: "already_resolved", intention, quest }
      : { state: "already_resolved", intention };
  }

  function requireReady(state: CheckInResult, today: CalendarDate): void {
    if (state.state === "blocked") {
      throw new BlockedByRecoveryError(state.quest._id.toHexString(), state.quest.source_date);
    }
    if (state.state === "already_resolved") throw new DuplicateIntentionError(today);
  }

  /** Applies a progression delta that does not touch the streak. */
  async function award(tx: StoreTransaction, delta: ProgressionDelta): Promise<void> {
    const player = await tx.getPlayer();
    await tx.savePlayer(streakOf(player), applyDelta(player.stats, delta));
  }

  async function resolve(
    tx: StoreTransaction,
    date: CalendarDate,
    path: ResolutionPath,
    intention: DailyIntentionDocument,
    quest?: RecoveryQuestDocument,
  ): Promise<Resolution> {
    const player = await tx.getPlayer();
    const before = streakOf(player);
    const after = applyResolution(before, date);
    if (after === before) {
      throw new InvalidTransitionError(`${date} cannot be resolved after ${before.last_resolved_date ?? "itself"}.`);
    }

    const delta = policy.evaluate({ userId: tx.userId, date, path, streak: after.current_streak });
    await tx.savePlayer(after, applyDelta(player.stats, delta));
    await tx.insertResolution({
      user_id: tx.userId,
      date,
      path,
      intention_id: intention._id,
      ...(quest ? { quest_id: quest._id } : {}),
      delta,
      streak_after: after.current_streak,
      resolved_at: clock.now(),
    });

    const milestone = milestoneFor(after.current_streak);
    log(`[engine] ${tx.userId}: ${date} resolved via ${path}, streak ${before.current_streak} -> ${after.current_streak}`);
    return {
      date,
      path,
      streak: { current: after.current_streak, longest: after.longest_streak },
      milestone,
      delta,
    };
  }

  // A Mongo session serves one operation at a time, so view reads are awaited in turn.
  async function deriveStreak(view: StoreView): Promise<StreakState> {
    const intentions = await view.listIntentions();
    const quests = await view.listQuests();
    return replayStreak(resolvedDates(intentions, quests));
  }

  return {
    async checkIn(userId) {
      return store.runExclusive(userId, tx => assess(tx, clock.today()));
    },

    async setIntention(userId, description, targetQuantity = 1) {
      // The check-in commits on its own first, so a lapse it discovers survives
      // the refusal and the quest id in the error can be acted on.
      const day = clock.today();
      requireReady(await store.runExclusive(userId, tx => assess(tx, day)), day);

      return store.runExclusive(userId, async tx => {
        const today = clock.today();
        requireReady(await assess(tx, today), today);
        const intention = await createIntention(tx, today, description.trim(), clock.now(), targetQuantity);
        await award(tx, policy.intentionSet({ userId, date: today, targetQuantity }));
        log(`[engine] ${userId}: intention set for ${today}`);
        return intention;
      });
    },

    async updateProgress(userId, intentionId, completedQuantity) {
      return store.runExclusive(userId, async tx => {
        const today = clock.today();
        const now = clock.now();
        const intention = await recordProgress(tx, await requireIntention(tx, intentionId), completedQuantity, today, now);
        const percentage = completionPercentage(intention);
        if (intention.completed_quantity < intention.target_quantity) {
          return { intention, completion_percentage: percentage };
        }

        const completed = await markCompleted(tx, intention, today, now);
        const resolution = await resolve(tx, completed.date, "perfect", completed);
        return { intention: completed, completion_percentage: percentage, resolution };
      });
    },

    async completeIntention(userId, intentionId) {
      return store.runExclusive(userId, async tx => {
        const today = clock.today();
        const intention = await requireIntention(tx, intentionId);
        const completed = await markCompleted(tx, intention, today, clock.now());
        return resolve(tx, completed.date, "perfect", completed);
      });
    },

    async failIntention(userId, intentionId) {
      return store.runExclusive(userId, async tx => {
        const today = clock.today();
        const now = clock.now();
        const intention = await requireIntention(tx, intentionId);
        const failed = await markFailed(tx, intention, today, now);
        const quest = await openRecoveryQuest(tx, failed, now);
        log(`[engine] ${userId}: intention for ${today} failed, recovery quest opened`);
        return { intention: failed, quest };
      });
    },

    async completeRecoveryQuest(userId, questId, response) {
      return store.runExclusive(userId, async tx => {
        const today = clock.today();
        const quest = await requireQuest(tx, questId);
        if (quest.status !== "pending") {
          throw new InvalidTransitionError(`The recovery quest for ${quest.source_date} is already ${quest.status}.`);
        }

        // Same day: active recovery. The day after: passive recovery inside the grace day. Later: gone.
        const age = daysBetween(quest.source_date, today);
        if (age < 0 || age > 1) {
          throw new InvalidTransitionError(
            `The grace window for ${quest.source_date} has passed; its recovery quest can no longer be completed.`,
          );
        }
        const path: ResolutionPath = age === 0 ? "active_recovery" : "passive_recovery";

        const intention = await tx.findIntentionById(quest.source_intention_id);
        if (!intention) {
          throw new Error(`Recovery quest ${questId} points at missing intention ${quest.source_intention_id.toHexString()}`);
        }
        const completed = await completeQuestInLedger(tx, quest, response?.trim() || undefined, clock.now());
        const resolution = await resolve(tx, quest.source_date, path, intention, completed);
        return { ...resolution, feedback: advisor.recoveryFeedback(completed, path) };
      });
    },

    async startFocusBlock(userId, description, durationMinutes) {
      return store.runExclusive(userId, async tx => {
        const today = clock.today();
        const intention = await getIntention(tx, today);
        if (!intention) throw new InvalidTransitionError(`Set an intention for ${today} before starting a focus block.`);
        const block = await startFocusBlock(tx, intention, description.trim(), durationMinutes, clock.now());
        log(`[engine] ${userId}: focus block started for ${today} (${durationMinutes} min)`);
        return block;
      });
    },

    async completeFocusBlock(userId, blockId) {
      return store.runExclusive(userId, async tx => {
        const today = clock.today();
        const block = await concludeFocusBlock(tx, await requireFocusBlock(tx, blockId), "completed", today, clock.now());
        const delta = policy.focusBlockCompleted({ userId, date: block.date, durationMinutes: block.duration_minutes });
        await award(tx, delta);
        log(`[engine] ${userId}: focus block completed for ${block.date}, +${delta.xp} XP`);
        return { block, delta };
      });
    },

    async abandonFocusBlock(userId, blockId) {
      return store.runExclusive(userId, async tx =>
        concludeFocusBlock(tx, await requireFocusBlock(tx, blockId), "abandoned", clock.today(), clock.now()));
    },

    async getGameState(userId) {
      return store.read(userId, async view => {
        const today = clock.today();
        const player = await view.findPlayer();
        const prior = await getIntention(view, previousDay(today));
        const intention = await getIntention(view, today);

        const priorQuest = prior?.status === "failed" ? await getQuestForIntention(view, prior) : null;
        const todayQuest = intention?.status === "failed" ? await getQuestForIntention(view, intention) : null;
        const focusBlock = intention ? await view.findActiveFocusBlock(intention._id) : null;
        const streak = player ? streakOf(player) : EMPTY_STREAK;
        const stats = player?.stats ?? EMPTY_STATS;

        const state: GameState = {
          user_id: userId,
          today,
          current_streak: streak.current_streak,
          longest_streak: streak.longest_streak,
          last_resolved_date: streak.last_resolved_date,
          awaiting_check_in: prior?.status === "pending",
          stats,
          level: calculateLevel(stats.xp),
        };
        if (priorQuest?.status === "pending") state.pending_block = priorQuest;
        if (intention) state.today_intention = intention;
        if (todayQuest) state.today_quest = todayQuest;
        if (focusBlock) state.active_focus_block = focusBlock;
        return state;
      });
    },

    async auditStreak(userId) {
      return store.read(userId, async view => {
        const player = await view.findPlayer();
        const cached = player ? streakOf(player) : EMPTY_STREAK;
        const derived = await deriveStreak(view);
        const consistent = sameStreak(cached, derived);
        if (!consistent) {
          log(`[engine] ${userId}: cached streak ${cached.current_streak} disagrees with ledger replay ${derived.current_streak}`);
        }
        return { cached, derived, consistent };
      });
    },
  };
}
