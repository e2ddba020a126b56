#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createQuestServer } from "./app.js";
import { SystemClock } from "./clock.js";
import { loadConfig, type Config } from "./config.js";
import { ensureIndexes, getClient, getDb } from "./db.js";
import { createQuestEngine } from "./engine.js";
import { stderrLogger } from "./logger.js";
import { MongoQuestStore } from "./store/mongo.js";

function configOrExit(): Config {
  try {
    return loadConfig();
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  }
}

const config = configOrExit();

const client = await getClient(config.mongoUri);
const db = await getDb(config.mongoUri);
await ensureIndexes(db);

const engine = createQuestEngine({
  store: new MongoQuestStore(client, db, stderrLogger),
  clock: new SystemClock(config.timeZone),
  log: stderrLogger,
});

const server = createQuestServer(engine, config.userId);
const transport = new StdioServerTransport();
await server.connect(transport);

stderrLogger(`[server] quest-ledger ready for ${config.userId} (${config.timeZone})`);
