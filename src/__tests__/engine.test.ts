import { describe, it, expect, vi, beforeEach } from "vitest";
import { ObjectId } from "mongodb";
import { FixedClock } from "../clock.js";
import { createQuestEngine, type QuestEngine } from "../engine.js";
import {
  BlockedByRecoveryError, DuplicateIntentionError, InvalidTransitionError, NotFoundError,
} from "../errors.js";
import { defaultProgressionPolicy, EMPTY_STATS, type ProgressionPolicy } from "../progression.js";
import { MemoryQuestStore } from "../store/memory.js";
import type { QuestStore, StoreTransaction, StoreView } from "../store/types.js";
import type { Resolution } from "../types.js";

const USER = "player-one";

let clock: FixedClock;
let store: MemoryQuestStore;
let engine: QuestEngine;

// 2025-09-01 is a Monday
beforeEach(() => {
  clock = new FixedClock("2025-09-01");
  store = new MemoryQuestStore();
  engine = createQuestEngine({ store, clock, log: () => {} });
});

async function perfectDay(userId = USER): Promise<Resolution> {
  const intention = await engine.setIntention(userId, "Daily walk");
  return engine.completeIntention(userId, intention._id.toHexString());
}

async function failToday(userId = USER) {
  const intention = await engine.setIntention(userId, "Daily walk");
  return engine.failIntention(userId, intention._id.toHexString());
}

describe("check-in", () => {
  it("is ready for a new user, and stays ready when repeated", async () => {
    expect(await engine.checkIn(USER)).toEqual({ state: "ready" });
    expect(await engine.checkIn(USER)).toEqual({ state: "ready" });
  });

  it("reports today's intention once set", async () => {
    const intention = await engine.setIntention(USER, "  Read 20 pages  ");
    expect(intention.description).toBe("Read 20 pages");

    const result = await engine.checkIn(USER);
    expect(result).toEqual({ state: "already_resolved", intention });
  });

  it("turns yesterday's forgotten intention into a blocking recovery quest", async () => {
    await engine.setIntention(USER, "Daily walk");
    clock.advance();

    const first = await engine.checkIn(USER);
    if (first.state !== "blocked") throw new Error(`expected blocked, got ${first.state}`);
    expect(first.quest.source_date).toBe("2025-09-01");
    expect(first.quest.prompt).toBe(
      "\"Daily walk\" slipped by on 2025-09-01. What got in the way, and what would make tomorrow easier?",
    );

    const again = await engine.checkIn(USER);
    expect(again).toEqual(first);

    const intentions = await store.read(USER, view => view.listIntentions());
    expect(intentions).toHaveLength(1);
    expect(intentions[0]).toMatchObject({ status: "failed", lapsed: true });
  });

  it("does not block on a day with no intention", async () => {
    await perfectDay();
    clock.advance(2);
    expect(await engine.checkIn(USER)).toEqual({ state: "ready" });
  });
});

describe("setIntention", () => {
  it("allows one intention per day", async () => {
    await engine.setIntention(USER, "Daily walk");
    await expect(engine.setIntention(USER, "Something else"))
      .rejects.toThrow("An intention is already set for 2025-09-01. One intention per day.");
  });

  it("counts a failed intention as today's one intention", async () => {
    await failToday();
    await expect(engine.setIntention(USER, "Try again")).rejects.toBeInstanceOf(DuplicateIntentionError);
  });

  it("is blocked while yesterday's recovery quest is open", async () => {
    await failToday();
    clock.advance();

    await expect(engine.setIntention(USER, "New day")).rejects.toBeInstanceOf(BlockedByRecoveryError);
    expect((await engine.getGameState(USER)).today_intention).toBeUndefined();
  });

  it("keeps the lapse it discovers, so the quest it names can be finished", async () => {
    await engine.setIntention(USER, "Daily walk");
    clock.advance();

    const refusal = await engine.setIntention(USER, "New day").catch((err: unknown) => err);
    if (!(refusal instanceof BlockedByRecoveryError)) throw new Error("expected a BlockedByRecoveryError");

    const state = await engine.getGameState(USER);
    expect(state.awaiting_check_in).toBe(false);
    expect(state.pending_block?._id.toHexString()).toBe(refusal.questId);

    const resolution = await engine.completeRecoveryQuest(USER, refusal.questId, "Forgot");
    expect(resolution).toMatchObject({ date: "2025-09-01", path: "passive_recovery", streak: { current: 1, longest: 1 } });
    expect(await engine.checkIn(USER)).toEqual({ state: "ready" });
  });
});

describe("Perfect Path", () => {
  it("resolves today and starts the streak", async () => {
    const resolution = await perfectDay();
    expect(resolution).toEqual({
      date: "2025-09-01",
      path: "perfect",
      streak: { current: 1, longest: 1 },
      milestone: null,
      delta: { xp: 20, stats: { discipline: 1 } },
    });
    expect(store.resolutions(USER).map(r => r.path)).toEqual(["perfect"]);
  });

  it("rejects completing an intention from another day", async () => {
    const intention = await engine.setIntention(USER, "Daily walk");
    clock.advance();
    await expect(engine.completeIntention(USER, intention._id.toHexString()))
      .rejects.toThrow("Cannot complete it: the intention belongs to 2025-09-01, not 2025-09-02.");
  });

  it("never resolves the same day twice", async () => {
    const intention = await engine.setIntention(USER, "Daily walk");
    const id = intention._id.toHexString();
    await engine.completeIntention(USER, id);

    await expect(engine.completeIntention(USER, id))
      .rejects.toThrow("Cannot complete it: the intention for 2025-09-01 is already completed.");
    await expect(engine.failIntention(USER, id)).rejects.toBeInstanceOf(InvalidTransitionError);
    expect(store.resolutions(USER)).toHaveLength(1);
  });

  it("celebrates the seventh day in a row", async () => {
    const resolutions: Resolution[] = [];
    for (let day = 0; day < 7; day++) {
      resolutions.push(await perfectDay());
      clock.advance();
    }
    expect(resolutions.map(r => r.milestone)).toEqual([null, null, null, null, null, null, 7]);
    expect(resolutions[6].streak).toEqual({ current: 7, longest: 7 });
  });
});

describe("recovery", () => {
  it("resolves the day through active recovery the same day", async () => {
    const { intention, quest } = await failToday();
    expect(intention.status).toBe("failed");
    expect(quest.prompt).toBe("What was the main obstacle between you and \"Daily walk\" today?");

    const checkIn = await engine.checkIn(USER);
    expect(checkIn).toEqual({ state: "already_resolved", intention, quest });

    const resolution = await engine.completeRecoveryQuest(USER, quest._id.toHexString(), "  Too tired  ");
    expect(resolution).toEqual({
      date: "2025-09-01",
      path: "active_recovery",
      streak: { current: 1, longest: 1 },
      milestone: null,
      delta: { xp: 15, stats: { resilience: 1 } },
      feedback: "Naming the obstacle is the first step to getting past it. Today still counts.",
    });

    const stored = await store.read(USER, view => view.findQuestById(quest._id));
    expect(stored).toMatchObject({ status: "completed", response: "Too tired" });

    clock.advance();
    expect(await engine.checkIn(USER)).toEqual({ state: "ready" });
  });

  it("keeps the chain through passive recovery on the grace day", async () => {
    await perfectDay();
    clock.advance();
    const { quest } = await failToday();
    clock.advance();

    expect((await engine.checkIn(USER)).state).toBe("blocked");

    const resolution = await engine.completeRecoveryQuest(USER, quest._id.toHexString());
    expect(resolution.date).toBe("2025-09-02");
    expect(resolution.path).toBe("passive_recovery");
    expect(resolution.streak).toEqual({ current: 2, longest: 2 });
    expect(resolution.feedback).toBe("Yesterday counts. Naming the obstacle is how you get past it.");

    expect(await engine.checkIn(USER)).toEqual({ state: "ready" });
    expect((await perfectDay()).streak).toEqual({ current: 3, longest: 3 });
  });

  it("resolves a lapsed day when its quest is finished the next day", async () => {
    await engine.setIntention(USER, "Daily walk");
    clock.advance();

    const blocked = await engine.checkIn(USER);
    if (blocked.state !== "blocked") throw new Error(`expected blocked, got ${blocked.state}`);

    const resolution = await engine.completeRecoveryQuest(USER, blocked.quest._id.toHexString(), "Forgot");
    expect(resolution).toMatchObject({ date: "2025-09-01", path: "passive_recovery", streak: { current: 1, longest: 1 } });
  });

  it("refuses a quest once its grace day is over, and the streak restarts", async () => {
    for (let day = 0; day < 3; day++) {
      await perfectDay();
      clock.advance();
    }
    const { quest } = await failToday();
    clock.advance(2);

    expect(await engine.checkIn(USER)).toEqual({ state: "ready" });
    await expect(engine.completeRecoveryQuest(USER, quest._id.toHexString())).rejects.toThrow(
      "The grace window for 2025-09-04 has passed; its recovery quest can no longer be completed.",
    );

    expect((await perfectDay()).streak).toEqual({ current: 1, longest: 3 });
  });

  it("does not finish a recovery quest twice", async () => {
    const { quest } = await failToday();
    const id = quest._id.toHexString();
    await engine.completeRecoveryQuest(USER, id);

    await expect(engine.completeRecoveryQuest(USER, id))
      .rejects.toThrow("The recovery quest for 2025-09-01 is already completed.");
    expect(store.resolutions(USER)).toHaveLength(1);
  });
});

describe("a week with a missed weekend", () => {
  it("extends Friday's streak on Saturday", async () => {
    for (let day = 0; day < 5; day++) {
      await perfectDay();
      clock.advance();
    }
    expect(clock.today()).toBe("2025-09-06");
    expect((await perfectDay()).streak).toEqual({ current: 6, longest: 6 });
  });

  it("starts over on Monday after an unrecovered Saturday and a silent Sunday", async () => {
    for (let day = 0; day < 5; day++) {
      await perfectDay();
      clock.advance();
    }
    await failToday();
    clock.advance(2);
    expect(clock.today()).toBe("2025-09-08");

    expect(await engine.checkIn(USER)).toEqual({ state: "ready" });
    expect((await perfectDay()).streak).toEqual({ current: 1, longest: 5 });
  });
});

describe("lookups", () => {
  it("reports unknown, malformed and foreign ids as not found", async () => {
    const theirs = await engine.setIntention("player-two", "Their walk");

    await expect(engine.completeIntention(USER, "nope")).rejects.toThrow("No intention found with id nope.");
    await expect(engine.completeIntention(USER, theirs._id.toHexString())).rejects.toBeInstanceOf(NotFoundError);
    await expect(engine.failIntention(USER, new ObjectId().toHexString())).rejects.toBeInstanceOf(NotFoundError);
    await expect(engine.completeRecoveryQuest(USER, new ObjectId().toHexString()))
      .rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("atomicity", () => {
  it("rolls back the completion when the progression policy throws", async () => {
    const failing: ProgressionPolicy = {
      ...defaultProgressionPolicy,
      evaluate() {
        throw new Error("policy unavailable");
      },
    };
    engine = createQuestEngine({ store, clock, policy: failing, log: () => {} });

    const intention = await engine.setIntention(USER, "Daily walk");
    await expect(engine.completeIntention(USER, intention._id.toHexString())).rejects.toThrow("policy unavailable");

    const state = await engine.getGameState(USER);
    expect(state.today_intention?.status).toBe("pending");
    expect(state.current_streak).toBe(0);
    expect(store.resolutions(USER)).toEqual([]);
  });

  it("lets only one of two simultaneous completions through", async () => {
    const intention = await engine.setIntention(USER, "Daily walk");
    const id = intention._id.toHexString();

    const [first, second] = await Promise.allSettled([
      engine.completeIntention(USER, id),
      engine.completeIntention(USER, id),
    ]);

    expect(first.status).toBe("fulfilled");
    expect(second.status).toBe("rejected");
    if (second.status === "rejected") expect(second.reason).toBeInstanceOf(InvalidTransitionError);
    expect(store.resolutions(USER)).toHaveLength(1);
    expect((await engine.getGameState(USER)).current_streak).toBe(1);
  });

  it("lets either completion or failure win a race, never both", async () => {
    const intention = await engine.setIntention(USER, "Daily walk");
    const id = intention._id.toHexString();

    const outcomes = await Promise.allSettled([
      engine.failIntention(USER, id),
      engine.completeIntention(USER, id),
    ]);

    expect(outcomes.map(o => o.status)).toEqual(["fulfilled", "rejected"]);
    expect((await store.read(USER, view => view.listQuests()))).toHaveLength(1);
    expect(store.resolutions(USER)).toEqual([]);
  });
});

describe("getGameState", () => {
  it("describes a new day with an intention set", async () => {
    const intention = await engine.setIntention(USER, "Daily walk");
    const state = await engine.getGameState(USER);

    expect(state).toEqual({
      user_id: USER,
      today: "2025-09-01",
      current_streak: 0,
      longest_streak: 0,
      last_resolved_date: null,
      awaiting_check_in: false,
      stats: { ...EMPTY_STATS, clarity: 1 },
      level: 1,
      today_intention: intention,
    });
  });

  it("tracks stats and level across resolution paths", async () => {
    await perfectDay();
    clock.advance();
    const { quest } = await failToday();
    await engine.completeRecoveryQuest(USER, quest._id.toHexString());

    const state = await engine.getGameState(USER);
    expect(state.stats).toEqual({ xp: 35, resilience: 1, clarity: 2, discipline: 1, commitment: 0 });
    expect(state.level).toBe(1);
    expect(state.today_quest?.status).toBe("completed");
  });

  it("shows the blocking quest", async () => {
    const { quest } = await failToday();
    clock.advance();

    const state = await engine.getGameState(USER);
    expect(state.pending_block?._id.equals(quest._id)).toBe(true);
    expect(state.today_intention).toBeUndefined();
  });

  it("keeps players apart", async () => {
    await perfectDay();

    expect(await engine.checkIn("player-two")).toEqual({ state: "ready" });
    const other = await engine.getGameState("player-two");
    expect(other.current_streak).toBe(0);
    expect(other.stats.xp).toBe(0);
  });
});

describe("auditStreak", () => {
  it("agrees with the ledger after normal play", async () => {
    await perfectDay();
    clock.advance();
    const { quest } = await failToday();
    await engine.completeRecoveryQuest(USER, quest._id.toHexString());
    clock.advance();
    await perfectDay();

    const audit = await engine.auditStreak(USER);
    expect(audit.consistent).toBe(true);
    expect(audit.cached).toEqual({ current_streak: 3, longest_streak: 3, last_resolved_date: "2025-09-03" });
    expect(audit.derived).toEqual(audit.cached);
  });

  it("flags and logs a stored streak that drifted from the ledger", async () => {
    const log = vi.fn();
    engine = createQuestEngine({ store, clock, log });
    await perfectDay();
    await store.runExclusive(USER, tx => tx.savePlayer(
      { current_streak: 9, longest_streak: 9, last_resolved_date: "2025-09-01" },
      EMPTY_STATS,
    ));

    const audit = await engine.auditStreak(USER);
    expect(audit.consistent).toBe(false);
    expect(audit.derived).toEqual({ current_streak: 1, longest_streak: 1, last_resolved_date: "2025-09-01" });
    expect(log).toHaveBeenCalledWith("[engine] player-one: cached streak 9 disagrees with ledger replay 1");
  });
});

describe("progress", () => {
  it("moves forward only and completes the day at the target", async () => {
    const intention = await engine.setIntention(USER, "Read pages", 5);
    expect(intention).toMatchObject({ target_quantity: 5, completed_quantity: 0 });
    const id = intention._id.toHexString();

    const partial = await engine.updateProgress(USER, id, 2);
    expect(partial.intention).toMatchObject({ status: "pending", completed_quantity: 2 });
    expect(partial.completion_percentage).toBe(40);
    expect(partial.resolution).toBeUndefined();

    await expect(engine.updateProgress(USER, id, 1))
      .rejects.toThrow("You cannot report less progress than you have already recorded (2/5).");

    const done = await engine.updateProgress(USER, id, 7);
    expect(done.intention).toMatchObject({ status: "completed", completed_quantity: 5 });
    expect(done.completion_percentage).toBe(100);
    expect(done.resolution).toMatchObject({ date: "2025-09-01", path: "perfect", streak: { current: 1, longest: 1 } });
    expect(store.resolutions(USER)).toHaveLength(1);

    await expect(engine.updateProgress(USER, id, 5)).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it("accepts the same progress reported twice", async () => {
    const id = (await engine.setIntention(USER, "Send emails", 3))._id.toHexString();
    await engine.updateProgress(USER, id, 2);
    expect((await engine.updateProgress(USER, id, 2)).intention.completed_quantity).toBe(2);
  });

  it("fills the progress when the intention is completed directly", async () => {
    const intention = await engine.setIntention(USER, "Send emails", 3);
    await engine.completeIntention(USER, intention._id.toHexString());

    expect((await engine.getGameState(USER)).today_intention).toMatchObject({ status: "completed", completed_quantity: 3 });
  });

  it("refuses a target below one", async () => {
    await expect(engine.setIntention(USER, "Nothing", 0)).rejects.toBeInstanceOf(RangeError);
    expect((await engine.getGameState(USER)).today_intention).toBeUndefined();
  });

  it("grows clarity each time an intention is set", async () => {
    await perfectDay();
    clock.advance();
    await engine.setIntention(USER, "Second day");

    const { stats } = await engine.getGameState(USER);
    expect(stats.clarity).toBe(2);
    expect(stats.xp).toBe(20);
  });
});

describe("focus blocks", () => {
  it("needs an intention for today", async () => {
    await expect(engine.startFocusBlock(USER, "Outline", 25))
      .rejects.toThrow("Set an intention for 2025-09-01 before starting a focus block.");
  });

  it("runs one at a time and pays XP and commitment when completed", async () => {
    await engine.setIntention(USER, "Write report");
    const block = await engine.startFocusBlock(USER, "  Outline  ", 25);
    const id = block._id.toHexString();
    expect(block).toMatchObject({ description: "Outline", duration_minutes: 25, status: "active", date: "2025-09-01" });
    expect((await engine.getGameState(USER)).active_focus_block?._id.equals(block._id)).toBe(true);

    await expect(engine.startFocusBlock(USER, "Draft", 25)).rejects.toThrow(
      `You already have an active focus block (${id}). Complete or abandon it before starting a new one.`,
    );

    const outcome = await engine.completeFocusBlock(USER, id);
    expect(outcome.block.status).toBe("completed");
    expect(outcome.delta).toEqual({ xp: 10, stats: { commitment: 1 } });
    await expect(engine.completeFocusBlock(USER, id)).rejects.toThrow(`The focus block ${id} is already completed.`);

    expect((await engine.startFocusBlock(USER, "Draft", 50)).status).toBe("active");
    const state = await engine.getGameState(USER);
    expect(state.stats).toEqual({ xp: 10, resilience: 0, clarity: 1, discipline: 0, commitment: 1 });
    expect(state.current_streak).toBe(0);
  });

  it("frees the slot without reward when a block is abandoned", async () => {
    await engine.setIntention(USER, "Write report");
    const block = await engine.startFocusBlock(USER, "Outline", 25);

    expect((await engine.abandonFocusBlock(USER, block._id.toHexString())).status).toBe("abandoned");
    expect((await engine.startFocusBlock(USER, "Outline again", 25)).status).toBe("active");
    expect((await engine.getGameState(USER)).stats.xp).toBe(0);
  });

  it("cannot complete a block on a later day, but can abandon it", async () => {
    await engine.setIntention(USER, "Write report");
    const id = (await engine.startFocusBlock(USER, "Outline", 25))._id.toHexString();
    clock.advance();

    await expect(engine.completeFocusBlock(USER, id))
      .rejects.toThrow("This focus block is from 2025-09-01 and can no longer be completed.");
    expect((await engine.abandonFocusBlock(USER, id)).status).toBe("abandoned");
  });

  it("stops once the intention is resolved", async () => {
    await perfectDay();
    await expect(engine.startFocusBlock(USER, "Extra", 25)).rejects.toThrow(
      "The intention for 2025-09-01 is already completed; focus blocks only run while it is pending.",
    );
  });

  it("reports unknown blocks as not found", async () => {
    await expect(engine.completeFocusBlock(USER, "nope")).rejects.toThrow("No focus block found with id nope.");
  });
});

// Serves one read at a time, the way a Mongo session does.
class OneAtATimeView implements StoreView {
  private busy = false;

  constructor(private readonly inner: StoreView) {}

  get userId(): string {
    return this.inner.userId;
  }

  private async guard<T>(op: () => Promise<T>): Promise<T> {
    if (this.busy) throw new Error("overlapping reads on one session");
    this.busy = true;
    try {
      return await op();
    } finally {
      this.busy = false;
    }
  }

  findPlayer() { return this.guard(() => this.inner.findPlayer()); }
  findIntentionByDate(date: string) { return this.guard(() => this.inner.findIntentionByDate(date)); }
  findIntentionById(id: ObjectId) { return this.guard(() => this.inner.findIntentionById(id)); }
  listIntentions() { return this.guard(() => this.inner.listIntentions()); }
  findQuestById(id: ObjectId) { return this.guard(() => this.inner.findQuestById(id)); }
  findQuestByIntention(id: ObjectId) { return this.guard(() => this.inner.findQuestByIntention(id)); }
  listQuests() { return this.guard(() => this.inner.listQuests()); }
  findFocusBlockById(id: ObjectId) { return this.guard(() => this.inner.findFocusBlockById(id)); }
  findActiveFocusBlock(id: ObjectId) { return this.guard(() => this.inner.findActiveFocusBlock(id)); }
}

describe("reads", () => {
  it("never overlap on one view", async () => {
    const inner = new MemoryQuestStore();
    const serial: QuestStore = {
      runExclusive: <T>(userId: string, fn: (tx: StoreTransaction) => Promise<T>) => inner.runExclusive(userId, fn),
      read: <T>(userId: string, fn: (view: StoreView) => Promise<T>) =>
        inner.read(userId, view => fn(new OneAtATimeView(view))),
    };
    engine = createQuestEngine({ store: serial, clock, log: () => {} });

    await perfectDay();
    clock.advance();
    await failToday();

    const state = await engine.getGameState(USER);
    expect(state.today_quest?.status).toBe("pending");
    expect((await engine.auditStreak(USER)).consistent).toBe(true);
  });
});
