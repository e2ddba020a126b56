import { MongoError } from "mongodb";
import type { ClientSession, Db, MongoClient, ObjectId } from "mongodb";
import { players, dailyIntentions, focusBlocks, recoveryQuests, resolutions } from "../db.js";
import { MAX_TRANSACTION_ATTEMPTS } from "../constants.js";
import { EMPTY_STATS } from "../progression.js";
import type { Logger } from "../logger.js";
import type {
  CalendarDate, CharacterStats, DailyIntentionDocument, FocusBlockDocument, FocusBlockStatus, IntentionStatus, PlayerDocument,
  RecoveryQuestDocument, RecoveryQuestStatus, ResolutionDocument, StreakState,
} from "../types.js";
import type {
  FocusBlockUpdate, IntentionUpdate, QuestStore, QuestUpdate, StoreTransaction, StoreView,
} from "./types.js";

class MongoView implements StoreView {
  constructor(
    readonly userId: string,
    protected readonly db: Db,
    protected readonly session: ClientSession,
  ) {}

  async findPlayer(): Promise<PlayerDocument | null> {
    return players(this.db).findOne({ user_id: this.userId }, { session: this.session });
  }

  async findIntentionByDate(date: CalendarDate): Promise<DailyIntentionDocument | null> {
    return dailyIntentions(this.db).findOne({ user_id: this.userId, date }, { session: this.session });
  }

  async findIntentionById(id: ObjectId): Promise<DailyIntentionDocument | null> {
    return dailyIntentions(this.db).findOne({ _id: id, user_id: this.userId }, { session: this.session });
  }

  async listIntentions(): Promise<DailyIntentionDocument[]> {
    return dailyIntentions(this.db)
      .find({ user_id: this.userId }, { session: this.session })
      .sort({ date: 1 })
      .toArray();
  }

  async findQuestById(id: ObjectId): Promise<RecoveryQuestDocument | null> {
    return recoveryQuests(this.db).findOne({ _id: id, user_id: this.userId }, { session: this.session });
  }

  async findQuestByIntention(intentionId: ObjectId): Promise<RecoveryQuestDocument | null> {
    return recoveryQuests(this.db).findOne(
      { source_intention_id: intentionId, user_id: this.userId },
      { session: this.session },
    );
  }

  async listQuests(): Promise<RecoveryQuestDocument[]> {
    return recoveryQuests(this.db)
      .find({ user_id: this.userId }, { session: this.session })
      .sort({ source_date: 1 })
      .toArray();
  }

  async findFocusBlockById(id: ObjectId): Promise<FocusBlockDocument | null> {
    return focusBlocks(this.db).findOne({ _id: id, user_id: this.userId }, { session: this.session });
  }

  async findActiveFocusBlock(intentionId: ObjectId): Promise<FocusBlockDocument | null> {
    return focusBlocks(this.db).findOne(
      { intention_id: intentionId, user_id: this.userId, status: "active" },
      { session: this.session },
    );
  }
}

class MongoTransaction extends MongoView implements StoreTransaction {
  /**
   * Upserts the player and bumps its lock_version. Any other transaction for
   * the same user now hits a write conflict and is retried after this one.
   */
  async getPlayer(): Promise<PlayerDocument> {
    const now = new Date();
    const player = await players(this.db).findOneAndUpdate(
      { user_id: this.userId },
      {
        $inc: { lock_version: 1 },
        $setOnInsert: {
          current_streak: 0,
          longest_streak: 0,
          last_resolved_date: null,
          stats: { ...EMPTY_STATS },
          created_at: now,
          updated_at: now,
        },
      },
      { upsert: true, returnDocument: "after", session: this.session },
    );
    if (!player) throw new Error(`Player upsert returned no document for ${this.userId}`);
    return player;
  }

  async savePlayer(streak: StreakState, stats: CharacterStats): Promise<void> {
    await players(this.db).updateOne(
      { user_id: this.userId },
      {
        $set: {
          current_streak: streak.current_streak,
          longest_streak: streak.longest_streak,
          last_resolved_date: streak.last_resolved_date,
          stats,
          updated_at: new Date(),
        },
      },
      { session: this.session },
    );
  }

  async insertIntention(doc: DailyIntentionDocument): Promise<void> {
    await dailyIntentions(this.db).insertOne(doc, { session: this.session });
  }

  async updateIntention(id: ObjectId, expected: IntentionStatus, set: IntentionUpdate): Promise<boolean> {
    const result = await dailyIntentions(this.db).updateOne(
      { _id: id, user_id: this.userId, status: expected },
      { $set: set },
      { session: this.session },
    );
    return result.matchedCount === 1;
  }

  async insertQuest(doc: RecoveryQuestDocument): Promise<void> {
    await recoveryQuests(this.db).insertOne(doc, { session: this.session });
  }

  async updateQuest(id: ObjectId, expected: RecoveryQuestStatus, set: QuestUpdate): Promise<boolean> {
    const result = await recoveryQuests(this.db).updateOne(
      { _id: id, user_id: this.userId, status: expected },
      { $set: set },
      { session: this.session },
    );
    return result.matchedCount === 1;
  }

  async insertResolution(doc: ResolutionDocument): Promise<void> {
    await resolutions(this.db).insertOne(doc, { session: this.session });
  }

  async insertFocusBlock(doc: FocusBlockDocument): Promise<void> {
    await focusBlocks(this.db).insertOne(doc, { session: this.session });
  }

  async updateFocusBlock(id: ObjectId, expected: FocusBlockStatus, set: FocusBlockUpdate): Promise<boolean> {
    const result = await focusBlocks(this.db).updateOne(
      { _id: id, user_id: this.userId, status: expected },
      { $set: set },
      { session: this.session },
    );
    return result.matchedCount === 1;
  }
}

function hasLabel(err: unknown, label: string): boolean {
  return err instanceof MongoError && err.hasErrorLabel(label);
}

/** Requires a replica set or sharded cluster: every call runs in a multi-document transaction. */
export class MongoQuestStore implements QuestStore {
  constructor(
    private readonly client: MongoClient,
    private readonly db: Db,
    private readonly log: Logger,
  ) {}

  async runExclusive<T>(userId: string, fn: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      const session = this.client.startSession();
      try {
        session.startTransaction({
          readConcern: { level: "snapshot" },
          writeConcern: { w: "majority" },
        });
        const tx = new MongoTransaction(userId, this.db, session);
        await tx.getPlayer();
        const value = await fn(tx);
        await this.commit(session);
        return value;
      } catch (err) {
        if (session.inTransaction()) await session.abortTransaction();
        if (attempt < MAX_TRANSACTION_ATTEMPTS && hasLabel(err, "TransientTransactionError")) {
          this.log(`[store] transient conflict for ${userId}, retrying (attempt ${attempt + 1})`);
          continue;
        }
        throw err;
      } finally {
        await session.endSession();
      }
    }
  }

  async read<T>(userId: string, fn: (view: StoreView) => Promise<T>): Promise<T> {
    const session = this.client.startSession({ snapshot: true });
    try {
      return await fn(new MongoView(userId, this.db, session));
    } finally {
      await session.endSession();
    }
  }

  // Only the commit is retried here: re-running the work after an unknown commit result could apply it twice.
  private async commit(session: ClientSession): Promise<void> {
    for (let attempt = 1; ; attempt++) {
      try {
        await session.commitTransaction();
        return;
      } catch (err) {
        if (attempt < MAX_TRANSACTION_ATTEMPTS && hasLabel(err, "UnknownTransactionCommitResult")) continue;
        throw err;
      }
    }
  }
}
