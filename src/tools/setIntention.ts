import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DESCRIPTION_MAX_LENGTH, TARGET_QUANTITY_MAX } from "../constants.js";
import type { QuestEngine } from "../engine.js";
import { respond } from "./respond.js";

export function registerSetIntention(server: McpServer, engine: QuestEngine, userId: string): void {
  server.registerTool(
    "set_intention",
    {
      title: "Set Daily Intention",
      description: "Commit to today's single intention. Fails if one is already set or yesterday's recovery quest is still open.",
      inputSchema: {
        description: z.string().trim().min(1).max(DESCRIPTION_MAX_LENGTH).describe("What the user commits to finishing today"),
        target_quantity: z.number().int().min(1).max(TARGET_QUANTITY_MAX).optional()
          .describe("How many units make the intention done (pages, emails, reps). Defaults to 1"),
      },
    },
    async ({ description, target_quantity }) => respond(async () => {
      const intention = await engine.setIntention(userId, description, target_quantity);
      const target = intention.target_quantity > 1 ? ` Target: ${intention.target_quantity}.` : "";
      return `Intention set for ${intention.date} (${intention._id.toHexString()}): "${intention.description}".${target}`;
    }),
  );
}
