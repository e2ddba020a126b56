import { MongoClient, Db, Collection } from "mongodb";
import type {
  PlayerDocument, DailyIntentionDocument, FocusBlockDocument, RecoveryQuestDocument, ResolutionDocument,
} from "./types.js";

let client: MongoClient | null = null;
let db: Db | null = null;

export async function getClient(uri: string): Promise<MongoClient> {
  if (client) return client;
  client = new MongoClient(uri);
  await client.connect();
  return client;
}

export async function getDb(uri: string): Promise<Db> {
  if (db) return db;
  db = (await getClient(uri)).db();
  return db;
}

export async function closeDb(): Promise<void> {
  if (client) await client.close();
  client = null;
  db = null;
}

export function players(database: Db): Collection<PlayerDocument> {
  return database.collection("players");
}
export function dailyIntentions(database: Db): Collection<DailyIntentionDocument> {
  return database.collection("daily_intentions");
}
export function recoveryQuests(database: Db): Collection<RecoveryQuestDocument> {
  return database.collection("recovery_quests");
}
export function resolutions(database: Db): Collection<ResolutionDocument> {
  return database.collection("resolutions");
}
export function focusBlocks(database: Db): Collection<FocusBlockDocument> {
  return database.collection("focus_blocks");
}

/** Unique indexes back the one-per-day and one-per-intention rules at the storage level. */
export async function ensureIndexes(database: Db): Promise<void> {
  await players(database).createIndex({ user_id: 1 }, { unique: true });
  await dailyIntentions(database).createIndex({ user_id: 1, date: 1 }, { unique: true });
  await recoveryQuests(database).createIndex({ source_intention_id: 1 }, { unique: true });
  await recoveryQuests(database).createIndex({ user_id: 1, source_date: 1 });
  await resolutions(database).createIndex({ user_id: 1, date: 1 }, { unique: true });
  await focusBlocks(database).createIndex({ user_id: 1, intention_id: 1, status: 1 });
}
