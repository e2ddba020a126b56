import { describe, it, expect } from "vitest";
import { ObjectId } from "mongodb";
import { MemoryQuestStore } from "../store/memory.js";
import type { DailyIntentionDocument } from "../types.js";

const NOW = new Date("2025-09-01T12:00:00Z");

function intention(userId: string, date: string): DailyIntentionDocument {
  return {
    _id: new ObjectId(),
    user_id: userId,
    date,
    description: "Walk",
    status: "pending",
    target_quantity: 1,
    completed_quantity: 0,
    created_at: NOW,
    updated_at: NOW,
  };
}

const pause = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe("MemoryQuestStore", () => {
  it("creates the player on first use", async () => {
    const store = new MemoryQuestStore();
    expect(await store.read("u1", view => view.findPlayer())).toBeNull();

    const player = await store.runExclusive("u1", tx => tx.getPlayer());
    expect(player.current_streak).toBe(0);
    expect(player.last_resolved_date).toBeNull();
    expect(player.stats.xp).toBe(0);
  });

  it("discards every write of a transaction that throws", async () => {
    const store = new MemoryQuestStore();

    await expect(store.runExclusive("u1", async tx => {
      await tx.insertIntention(intention("u1", "2025-09-01"));
      await tx.savePlayer(
        { current_streak: 4, longest_streak: 4, last_resolved_date: "2025-09-01" },
        { xp: 80, resilience: 0, clarity: 0, discipline: 4, commitment: 0 },
      );
      throw new Error("boom");
    })).rejects.toThrow("boom");

    expect(await store.read("u1", view => view.listIntentions())).toEqual([]);
    expect(await store.read("u1", view => view.findPlayer())).toBeNull();
  });

  it("runs work for one user one at a time", async () => {
    const store = new MemoryQuestStore();

    const first = store.runExclusive("u1", async tx => {
      await pause(20);
      await tx.insertIntention(intention("u1", "2025-09-01"));
    });
    const second = store.runExclusive("u1", tx => tx.findIntentionByDate("2025-09-01"));

    await first;
    expect((await second)?.date).toBe("2025-09-01");
  });

  it("keeps going after a failed transaction", async () => {
    const store = new MemoryQuestStore();
    const failing = store.runExclusive("u1", async () => {
      throw new Error("first fails");
    });
    const next = store.runExclusive("u1", async tx => {
      await tx.insertIntention(intention("u1", "2025-09-02"));
      return "ok";
    });

    await expect(failing).rejects.toThrow("first fails");
    await expect(next).resolves.toBe("ok");
  });

  it("enforces one intention per day like the unique index", async () => {
    const store = new MemoryQuestStore();
    await store.runExclusive("u1", tx => tx.insertIntention(intention("u1", "2025-09-01")));

    await expect(store.runExclusive("u1", tx => tx.insertIntention(intention("u1", "2025-09-01"))))
      .rejects.toThrow(/duplicate key/);
  });

  it("keeps users apart", async () => {
    const store = new MemoryQuestStore();
    await store.runExclusive("u1", tx => tx.insertIntention(intention("u1", "2025-09-01")));

    expect(await store.read("u2", view => view.findIntentionByDate("2025-09-01"))).toBeNull();
  });

  it("applies a conditional update only from the expected status", async () => {
    const store = new MemoryQuestStore();
    const doc = intention("u1", "2025-09-01");
    await store.runExclusive("u1", tx => tx.insertIntention(doc));

    expect(await store.runExclusive("u1", tx => tx.updateIntention(doc._id, "failed", { status: "completed" }))).toBe(false);
    expect(await store.runExclusive("u1", tx => tx.updateIntention(doc._id, "pending", { status: "completed" }))).toBe(true);
    expect((await store.read("u1", view => view.findIntentionById(doc._id)))?.status).toBe("completed");
  });
});
