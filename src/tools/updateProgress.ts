import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { TARGET_QUANTITY_MAX } from "../constants.js";
import type { QuestEngine } from "../engine.js";
import { describeProgress, describeResolution } from "./format.js";
import { respond } from "./respond.js";

export function registerUpdateProgress(server: McpServer, engine: QuestEngine, userId: string): void {
  server.registerTool(
    "update_progress",
    {
      title: "Update Intention Progress",
      description: "Report how many units of today's intention are done so far (absolute, not incremental). Reaching the target completes the day on the Perfect Path.",
      inputSchema: {
        intention_id: z.string().describe("ID of today's intention"),
        completed_quantity: z.number().int().min(0).max(TARGET_QUANTITY_MAX).describe("Total units done so far today"),
      },
    },
    async ({ intention_id, completed_quantity }) => respond(async () => {
      const { intention, resolution } = await engine.updateProgress(userId, intention_id, completed_quantity);
      const line = `Progress for ${intention.date}: ${describeProgress(intention)}.`;
      return resolution ? `${line}\n${describeResolution(resolution)}` : line;
    }),
  );
}
