import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { QuestEngine } from "../engine.js";
import { registerCheckIn } from "./checkIn.js";
import { registerSetIntention } from "./setIntention.js";
import { registerCompleteIntention } from "./completeIntention.js";
import { registerFailIntention } from "./failIntention.js";
import { registerCompleteRecoveryQuest } from "./completeRecoveryQuest.js";
import { registerAuditStreak } from "./auditStreak.js";
import { registerUpdateProgress } from "./updateProgress.js";
import { registerFocusBlockTools } from "./focusBlocks.js";

export function registerQuestTools(server: McpServer, engine: QuestEngine, userId: string): void {
  registerCheckIn(server, engine, userId);
  registerSetIntention(server, engine, userId);
  registerUpdateProgress(server, engine, userId);
  registerCompleteIntention(server, engine, userId);
  registerFailIntention(server, engine, userId);
  registerCompleteRecoveryQuest(server, engine, userId);
  registerFocusBlockTools(server, engine, userId);
  registerAuditStreak(server, engine, userId);
}
