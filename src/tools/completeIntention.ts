import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { QuestEngine } from "../engine.js";
import { describeResolution } from "./format.js";
import { respond } from "./respond.js";

export function registerCompleteIntention(server: McpServer, engine: QuestEngine, userId: string): void {
  server.registerTool(
    "complete_intention",
    {
      title: "Complete Intention",
      description: "Mark today's intention as done. Resolves today on the Perfect Path and updates the streak.",
      inputSchema: {
        intention_id: z.string().describe("ID of today's intention"),
      },
    },
    async ({ intention_id }) => respond(async () =>
      describeResolution(await engine.completeIntention(userId, intention_id))),
  );
}
