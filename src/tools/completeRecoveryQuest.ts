import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DESCRIPTION_MAX_LENGTH } from "../constants.js";
import type { QuestEngine } from "../engine.js";
import { describeResolution } from "./format.js";
import { respond } from "./respond.js";

export function registerCompleteRecoveryQuest(server: McpServer, engine: QuestEngine, userId: string): void {
  server.registerTool(
    "complete_recovery_quest",
    {
      title: "Complete Recovery Quest",
      description: "Record the user's reflection for an open recovery quest. Resolves the failed day if done the same day or the day after.",
      inputSchema: {
        quest_id: z.string().describe("ID of the recovery quest"),
        response: z.string().max(DESCRIPTION_MAX_LENGTH * 4).optional().describe("The user's answer to the quest prompt"),
      },
    },
    async ({ quest_id, response }) => respond(async () =>
      describeResolution(await engine.completeRecoveryQuest(userId, quest_id, response))),
  );
}
