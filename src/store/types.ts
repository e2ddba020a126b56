import type { ObjectId } from "mongodb";
import type {
  CalendarDate, CharacterStats, DailyIntentionDocument, FocusBlockDocument, FocusBlockStatus, IntentionStatus,
  PlayerDocument, RecoveryQuestDocument, RecoveryQuestStatus, ResolutionDocument, StreakState,
} from "../types.js";

export type IntentionUpdate = Partial<Pick<
  DailyIntentionDocument,
  "status" | "completed_quantity" | "concluded_at" | "lapsed" | "updated_at"
>>;
export type QuestUpdate = Partial<Pick<RecoveryQuestDocument, "status" | "response" | "completed_at">>;
export type FocusBlockUpdate = Partial<Pick<FocusBlockDocument, "status" | "concluded_at">>;

/** Read access to one user's ledger. Every lookup is scoped to `userId`. */
export interface StoreView {
  readonly userId: string;
  findPlayer(): Promise<PlayerDocument | null>;
  findIntentionByDate(date: CalendarDate): Promise<DailyIntentionDocument | null>;
  findIntentionById(id: ObjectId): Promise<DailyIntentionDocument | null>;
  listIntentions(): Promise<DailyIntentionDocument[]>;
  findQuestById(id: ObjectId): Promise<RecoveryQuestDocument | null>;
  findQuestByIntention(intentionId: ObjectId): Promise<RecoveryQuestDocument | null>;
  listQuests(): Promise<RecoveryQuestDocument[]>;
  findFocusBlockById(id: ObjectId): Promise<FocusBlockDocument | null>;
  findActiveFocusBlock(intentionId: ObjectId): Promise<FocusBlockDocument | null>;
}

export interface StoreTransaction extends StoreView {
  /** The user's player document, created with zeroed streak and stats on first use. */
  getPlayer(): Promise<PlayerDocument>;
  savePlayer(streak: StreakState, stats: CharacterStats): Promise<void>;
  insertIntention(doc: DailyIntentionDocument): Promise<void>;
  /** Applies `set` only while the intention still has status `expected`; false when it did not. */
  updateIntention(id: ObjectId, expected: IntentionStatus, set: IntentionUpdate): Promise<boolean>;
  insertQuest(doc: RecoveryQuestDocument): Promise<void>;
  updateQuest(id: ObjectId, expected: RecoveryQuestStatus, set: QuestUpdate): Promise<boolean>;
  insertResolution(doc: ResolutionDocument): Promise<void>;
  insertFocusBlock(doc: FocusBlockDocument): Promise<void>;
  updateFocusBlock(id: ObjectId, expected: FocusBlockStatus, set: FocusBlockUpdate): Promise<boolean>;
}

/**
 * Persistence boundary of the engine.
 *
 * `runExclusive` serializes all work for one user and commits everything `fn`
 * wrote as a single unit. If `fn` throws, nothing it wrote is kept and the
 * error is rethrown unchanged.
 */
export interface QuestStore {
  runExclusive<T>(userId: string, fn: (tx: StoreTransaction) => Promise<T>): Promise<T>;
  read<T>(userId: string, fn: (view: StoreView) => Promise<T>): Promise<T>;
}
