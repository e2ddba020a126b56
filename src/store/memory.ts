import type { ObjectId } from "mongodb";
import type {
  CalendarDate, CharacterStats, DailyIntentionDocument, FocusBlockDocument, FocusBlockStatus, IntentionStatus, PlayerDocument,
  RecoveryQuestDocument, RecoveryQuestStatus, ResolutionDocument, StreakState,
} from "../types.js";
import { EMPTY_STATS } from "../progression.js";
import type {
  FocusBlockUpdate, IntentionUpdate, QuestStore, QuestUpdate, StoreTransaction, StoreView,
} from "./types.js";

interface UserLedger {
  player: PlayerDocument | null;
  intentions: DailyIntentionDocument[];
  quests: RecoveryQuestDocument[];
  resolutions: ResolutionDocument[];
  focusBlocks: FocusBlockDocument[];
}

function emptyLedger(): UserLedger {
  return { player: null, intentions: [], quests: [], resolutions: [], focusBlocks: [] };
}

// Documents are replaced on update, never mutated, so a shallow copy of each list isolates a transaction.
function cloneLedger(ledger: UserLedger): UserLedger {
  return {
    player: ledger.player ? { ...ledger.player, stats: { ...ledger.player.stats } } : null,
    intentions: [...ledger.intentions],
    quests: [...ledger.quests],
    resolutions: [...ledger.resolutions],
    focusBlocks: [...ledger.focusBlocks],
  };
}

class MemoryView implements StoreView {
  constructor(readonly userId: string, protected ledger: UserLedger) {}

  async findPlayer(): Promise<PlayerDocument | null> {
    return this.ledger.player;
  }

  async findIntentionByDate(date: CalendarDate): Promise<DailyIntentionDocument | null> {
    return this.ledger.intentions.find(i => i.date === date) ?? null;
  }

  async findIntentionById(id: ObjectId): Promise<DailyIntentionDocument | null> {
    return this.ledger.intentions.find(i => i._id.equals(id)) ?? null;
  }

  async listIntentions(): Promise<DailyIntentionDocument[]> {
    return [...this.ledger.intentions].sort((a, b) => a.date.localeCompare(b.date));
  }

  async findQuestById(id: ObjectId): Promise<RecoveryQuestDocument | null> {
    return this.ledger.quests.find(q => q._id.equals(id)) ?? null;
  }

  async findQuestByIntention(intentionId: ObjectId): Promise<RecoveryQuestDocument | null> {
    return this.ledger.quests.find(q => q.source_intention_id.equals(intentionId)) ?? null;
  }

  async listQuests(): Promise<RecoveryQuestDocument[]> {
    return [...this.ledger.quests].sort((a, b) => a.source_date.localeCompare(b.source_date));
  }

  async findFocusBlockById(id: ObjectId): Promise<FocusBlockDocument | null> {
    return this.ledger.focusBlocks.find(b => b._id.equals(id)) ?? null;
  }

  async findActiveFocusBlock(intentionId: ObjectId): Promise<FocusBlockDocument | null> {
    return this.ledger.focusBlocks.find(b => b.intention_id.equals(intentionId) && b.status === "active") ?? null;
  }
}

class MemoryTransaction extends MemoryView implements StoreTransaction {
  async getPlayer(): Promise<PlayerDocument> {
    if (!this.ledger.player) {
      const now = new Date();
      this.ledger.player = {
        user_id: this.userId,
        current_streak: 0,
        longest_streak: 0,
        last_resolved_date: null,
        stats: { ...EMPTY_STATS },
        lock_version: 0,
        created_at: now,
        updated_at: now,
      };
    }
    return this.ledger.player;
  }

  async savePlayer(streak: StreakState, stats: CharacterStats): Promise<void> {
    const player = await this.getPlayer();
    this.ledger.player = {
      ...player,
      current_streak: streak.current_streak,
      longest_streak: streak.longest_streak,
      last_resolved_date: streak.last_resolved_date,
      stats: { ...stats },
      updated_at: new Date(),
    };
  }

  async insertIntention(doc: DailyIntentionDocument): Promise<void> {
    if (this.ledger.intentions.some(i => i.date === doc.date)) {
      throw new Error(`duplicate key: daily_intentions { user_id: "${this.userId}", date: "${doc.date}" }`);
    }
    this.ledger.intentions.push(doc);
  }

  async updateIntention(id: ObjectId, expected: IntentionStatus, set: IntentionUpdate): Promise<boolean> {
    const index = this.ledger.intentions.findIndex(i => i._id.equals(id) && i.status === expected);
    if (index === -1) return false;
    this.ledger.intentions[index] = { ...this.ledger.intentions[index], ...set };
    return true;
  }

  async insertQuest(doc: RecoveryQuestDocument): Promise<void> {
    if (this.ledger.quests.some(q => q.source_intention_id.equals(doc.source_intention_id))) {
      throw new Error(`duplicate key: recovery_quests { source_intention_id: "${doc.source_intention_id.toHexString()}" }`);
    }
    this.ledger.quests.push(doc);
  }

  async updateQuest(id: ObjectId, expected: RecoveryQuestStatus, set: QuestUpdate): Promise<boolean> {
    const index = this.ledger.quests.findIndex(q => q._id.equals(id) && q.status === expected);
    if (index === -1) return false;
    this.ledger.quests[index] = { ...this.ledger.quests[index], ...set };
    return true;
  }

  async insertResolution(doc: ResolutionDocument): Promise<void> {
    if (this.ledger.resolutions.some(r => r.date === doc.date)) {
      throw new Error(`duplicate key: resolutions { user_id: "${this.userId}", date: "${doc.date}" }`);
    }
    this.ledger.resolutions.push(doc);
  }

  async insertFocusBlock(doc: FocusBlockDocument): Promise<void> {
    this.ledger.focusBlocks.push(doc);
  }

  async updateFocusBlock(id: ObjectId, expected: FocusBlockStatus, set: FocusBlockUpdate): Promise<boolean> {
    const index = this.ledger.focusBlocks.findIndex(b => b._id.equals(id) && b.status === expected);
    if (index === -1) return false;
    this.ledger.focusBlocks[index] = { ...this.ledger.focusBlocks[index], ...set };
    return true;
  }
}

/**
 * In-process store with the same contract as the mongo store: work for one
 * user is queued, runs against a private copy of the user's ledger, and the
 * copy replaces the committed ledger only if the work succeeds.
 */
export class MemoryQuestStore implements QuestStore {
  private readonly ledgers = new Map<string, UserLedger>();
  private readonly queues = new Map<string, Promise<unknown>>();

  async runExclusive<T>(userId: string, fn: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    return this.enqueue(userId, async () => {
      const working = cloneLedger(this.ledgers.get(userId) ?? emptyLedger());
      const tx = new MemoryTransaction(userId, working);
      await tx.getPlayer();
      const value = await fn(tx);
      if (working.player) working.player = { ...working.player, lock_version: working.player.lock_version + 1 };
      this.ledgers.set(userId, working);
      return value;
    });
  }

  async read<T>(userId: string, fn: (view: StoreView) => Promise<T>): Promise<T> {
    return this.enqueue(userId, () => fn(new MemoryView(userId, this.ledgers.get(userId) ?? emptyLedger())));
  }

  /** Committed resolution rows for a user, oldest first. */
  resolutions(userId: string): ResolutionDocument[] {
    return [...(this.ledgers.get(userId)?.resolutions ?? [])];
  }

  private enqueue<T>(userId: string, work: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(userId) ?? Promise.resolve();
    const next = previous.then(work, work);
    // The queue only tracks ordering; callers observe failures through `next`.
    this.queues.set(userId, next.then(() => undefined, () => undefined));
    return next;
  }
}
