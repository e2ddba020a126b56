import { ObjectId } from "mongodb";
import { previousDay } from "./dates.js";
import { ActiveFocusBlockError, DuplicateIntentionError, InvalidTransitionError, NotFoundError } from "./errors.js";
import type { IntentionUpdate, StoreTransaction, StoreView } from "./store/types.js";
import type { CalendarDate, DailyIntentionDocument, FocusBlockDocument, RecoveryQuestDocument } from "./types.js";

// Day Ledger: storage rules for intentions and recovery quests. Streak and
// progression consequences live in engine.ts.

function parseId(id: string): ObjectId | null {
  return ObjectId.isValid(id) && /^[0-9a-f]{24}$/i.test(id) ? new ObjectId(id) : null;
}

export async function getIntention(view: StoreView, date: CalendarDate): Promise<DailyIntentionDocument | null> {
  return view.findIntentionByDate(date);
}

export async function requireIntention(view: StoreView, id: string): Promise<DailyIntentionDocument> {
  const objectId = parseId(id);
  const intention = objectId ? await view.findIntentionById(objectId) : null;
  if (!intention) throw new NotFoundError("intention", id);
  return intention;
}

export async function getRecoveryQuest(view: StoreView, id: ObjectId): Promise<RecoveryQuestDocument | null> {
  return view.findQuestById(id);
}

export async function getQuestForIntention(
  view: StoreView,
  intention: DailyIntentionDocument,
): Promise<RecoveryQuestDocument | null> {
  return view.findQuestByIntention(intention._id);
}

export async function requireQuest(view: StoreView, id: string): Promise<RecoveryQuestDocument> {
  const objectId = parseId(id);
  const quest = objectId ? await getRecoveryQuest(view, objectId) : null;
  if (!quest) throw new NotFoundError("recovery quest", id);
  return quest;
}

export async function requireFocusBlock(view: StoreView, id: string): Promise<FocusBlockDocument> {
  const objectId = parseId(id);
  const block = objectId ? await view.findFocusBlockById(objectId) : null;
  if (!block) throw new NotFoundError("focus block", id);
  return block;
}

function requireWholeNumber(value: number, min: number, label: string): void {
  if (!Number.isInteger(value) || value < min) {
    throw new RangeError(`${label} must be a whole number of at least ${min}, got ${value}.`);
  }
}

export async function createIntention(
  tx: StoreTransaction,
  date: CalendarDate,
  description: string,
  now: Date,
  targetQuantity = 1,
): Promise<DailyIntentionDocument> {
  requireWholeNumber(targetQuantity, 1, "target_quantity");
  if (await getIntention(tx, date)) throw new DuplicateIntentionError(date);
  const intention: DailyIntentionDocument = {
    _id: new ObjectId(),
    user_id: tx.userId,
    date,
    description,
    status: "pending",
    target_quantity: targetQuantity,
    completed_quantity: 0,
    created_at: now,
    updated_at: now,
  };
  await tx.insertIntention(intention);
  return intention;
}

async function updatePending(
  tx: StoreTransaction,
  intention: DailyIntentionDocument,
  set: IntentionUpdate,
): Promise<DailyIntentionDocument> {
  const applied = await tx.updateIntention(intention._id, "pending", set);
  if (!applied) {
    throw new InvalidTransitionError(`Intention for ${intention.date} is no longer pending.`);
  }
  return { ...intention, ...set };
}

function requirePendingOn(intention: DailyIntentionDocument, day: CalendarDate, action: string): void {
  if (intention.status !== "pending") {
    throw new InvalidTransitionError(`Cannot ${action}: the intention for ${intention.date} is already ${intention.status}.`);
  }
  if (intention.date !== day) {
    throw new InvalidTransitionError(`Cannot ${action}: the intention belongs to ${intention.date}, not ${day}.`);
  }
}

export async function markCompleted(
  tx: StoreTransaction,
  intention: DailyIntentionDocument,
  today: CalendarDate,
  now: Date,
): Promise<DailyIntentionDocument> {
  requirePendingOn(intention, today, "complete it");
  return updatePending(tx, intention, {
    status: "completed",
    completed_quantity: intention.target_quantity,
    concluded_at: now,
    updated_at: now,
  });
}

export async function markFailed(
  tx: StoreTransaction,
  intention: DailyIntentionDocument,
  today: CalendarDate,
  now: Date,
): Promise<DailyIntentionDocument> {
  requirePendingOn(intention, today, "fail it");
  return updatePending(tx, intention, { status: "failed", concluded_at: now, updated_at: now });
}

/** Fails yesterday's intention that was left pending; discovered at today's check-in. */
export async function markLapsed(
  tx: StoreTransaction,
  intention: DailyIntentionDocument,
  today: CalendarDate,
  now: Date,
): Promise<DailyIntentionDocument> {
  requirePendingOn(intention, previousDay(today), "mark it lapsed");
  return updatePending(tx, intention, { status: "failed", concluded_at: now, updated_at: now, lapsed: true });
}

/**
 * Records absolute progress on today's intention, capped at the target.
 * Progress never goes backwards. Reaching the target does not complete the
 * intention here; the caller resolves the day.
 */
export async function recordProgress(
  tx: StoreTransaction,
  intention: DailyIntentionDocument,
  completedQuantity: number,
  today: CalendarDate,
  now: Date,
): Promise<DailyIntentionDocument> {
  requirePendingOn(intention, today, "record progress");
  requireWholeNumber(completedQuantity, 0, "completed_quantity");
  if (completedQuantity < intention.completed_quantity) {
    throw new InvalidTransitionError(
      `You cannot report less progress than you have already recorded (${intention.completed_quantity}/${intention.target_quantity}).`,
    );
  }
  return updatePending(tx, intention, {
    completed_quantity: Math.min(completedQuantity, intention.target_quantity),
    updated_at: now,
  });
}

export function completionPercentage(intention: DailyIntentionDocument): number {
  if (intention.target_quantity <= 0) return 0;
  return (intention.completed_quantity / intention.target_quantity) * 100;
}

export async function createRecoveryQuest(
  tx: StoreTransaction,
  intention: DailyIntentionDocument,
  prompt: string,
  now: Date,
): Promise<RecoveryQuestDocument> {
  if (intention.status !== "failed") {
    throw new InvalidTransitionError(`Recovery quests open only for failed intentions; ${intention.date} is ${intention.status}.`);
  }
  if (await getQuestForIntention(tx, intention)) {
    throw new InvalidTransitionError(`A recovery quest already exists for ${intention.date}.`);
  }
  const quest: RecoveryQuestDocument = {
    _id: new ObjectId(),
    user_id: tx.userId,
    source_intention_id: intention._id,
    source_date: intention.date,
    prompt,
    status: "pending",
    created_at: now,
  };
  await tx.insertQuest(quest);
  return quest;
}

export async function completeRecoveryQuest(
  tx: StoreTransaction,
  quest: RecoveryQuestDocument,
  response: string | undefined,
  now: Date,
): Promise<RecoveryQuestDocument> {
  if (quest.status !== "pending") {
    throw new InvalidTransitionError(`The recovery quest for ${quest.source_date} is already ${quest.status}.`);
  }
  const set = response === undefined
    ? { status: "completed" as const, completed_at: now }
    : { status: "completed" as const, completed_at: now, response };
  const applied = await tx.updateQuest(quest._id, "pending", set);
  if (!applied) {
    throw new InvalidTransitionError(`The recovery quest for ${quest.source_date} is no longer pending.`);
  }
  return { ...quest, ...set };
}

export async function startFocusBlock(
  tx: StoreTransaction,
  intention: DailyIntentionDocument,
  description: string,
  durationMinutes: number,
  now: Date,
): Promise<FocusBlockDocument> {
  requireWholeNumber(durationMinutes, 1, "duration_minutes");
  if (intention.status !== "pending") {
    throw new InvalidTransitionError(
      `The intention for ${intention.date} is already ${intention.status}; focus blocks only run while it is pending.`,
    );
  }
  const active = await tx.findActiveFocusBlock(intention._id);
  if (active) throw new ActiveFocusBlockError(active._id.toHexString());

  const block: FocusBlockDocument = {
    _id: new ObjectId(),
    user_id: tx.userId,
    intention_id: intention._id,
    date: intention.date,
    description,
    duration_minutes: durationMinutes,
    status: "active",
    created_at: now,
  };
  await tx.insertFocusBlock(block);
  return block;
}

/** Completing is only possible on the block's own day. Abandoning is always possible. */
export async function concludeFocusBlock(
  tx: StoreTransaction,
  block: FocusBlockDocument,
  status: "completed" | "abandoned",
  today: CalendarDate,
  now: Date,
): Promise<FocusBlockDocument> {
  if (block.status !== "active") {
    throw new InvalidTransitionError(`The focus block ${block._id.toHexString()} is already ${block.status}.`);
  }
  if (status === "completed" && block.date !== today) {
    throw new InvalidTransitionError(`This focus block is from ${block.date} and can no longer be completed.`);
  }
  const set = { status, concluded_at: now };
  const applied = await tx.updateFocusBlock(block._id, "active", set);
  if (!applied) {
    throw new InvalidTransitionError(`The focus block ${block._id.toHexString()} is no longer active.`);
  }
  return { ...block, ...set };
}

/** Days that count as resolved, ascending: completed intentions plus failed ones whose quest is completed. */
export function resolvedDates(
  intentions: DailyIntentionDocument[],
  quests: RecoveryQuestDocument[],
): CalendarDate[] {
  const redeemed = new Set(
    quests.filter(q => q.status === "completed").map(q => q.source_intention_id.toHexString()),
  );
  return intentions
    .filter(i => i.status === "completed" || (i.status === "failed" && redeemed.has(i._id.toHexString())))
    .map(i => i.date)
    .sort((a, b) => a.localeCompare(b));
}
