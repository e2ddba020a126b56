import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { QuestEngine } from "../engine.js";
import { registerGameState } from "./gameState.js";
import { registerStreak } from "./streak.js";

export function registerQuestResources(server: McpServer, engine: QuestEngine, userId: string): void {
  registerGameState(server, engine, userId);
  registerStreak(server, engine, userId);
}
