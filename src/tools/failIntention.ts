import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { QuestEngine } from "../engine.js";
import { respond } from "./respond.js";

export function registerFailIntention(server: McpServer, engine: QuestEngine, userId: string): void {
  server.registerTool(
    "fail_intention",
    {
      title: "Fail Intention",
      description: "The user can't finish today's intention. Marks it failed and opens a recovery quest that can still save the day.",
      inputSchema: {
        intention_id: z.string().describe("ID of today's intention"),
      },
    },
    async ({ intention_id }) => respond(async () => {
      const { intention, quest } = await engine.failIntention(userId, intention_id);
      return [
        `Intention for ${intention.date} marked failed.`,
        `Recovery quest ${quest._id.toHexString()}: ${quest.prompt}`,
        "Complete it today or tomorrow to keep the streak.",
      ].join("\n");
    }),
  );
}
