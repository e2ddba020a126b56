import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DESCRIPTION_MAX_LENGTH, FOCUS_BLOCK_MAX_MINUTES } from "../constants.js";
import type { QuestEngine } from "../engine.js";
import { describeDelta } from "./format.js";
import { respond } from "./respond.js";

export function registerFocusBlockTools(server: McpServer, engine: QuestEngine, userId: string): void {
  server.registerTool(
    "start_focus_block",
    {
      title: "Start Focus Block",
      description: "Start a timed work sprint toward today's intention. Only one focus block can be active at a time.",
      inputSchema: {
        description: z.string().trim().min(1).max(DESCRIPTION_MAX_LENGTH).describe("The slice of today's intention this block is for"),
        duration_minutes: z.number().int().min(1).max(FOCUS_BLOCK_MAX_MINUTES).describe("Planned length of the block"),
      },
    },
    async ({ description, duration_minutes }) => respond(async () => {
      const block = await engine.startFocusBlock(userId, description, duration_minutes);
      return `Focus block ${block._id.toHexString()} started: "${block.description}" for ${block.duration_minutes} min.`;
    }),
  );

  server.registerTool(
    "complete_focus_block",
    {
      title: "Complete Focus Block",
      description: "Mark today's active focus block done and award its XP.",
      inputSchema: {
        block_id: z.string().describe("ID of the focus block"),
      },
    },
    async ({ block_id }) => respond(async () => {
      const { block, delta } = await engine.completeFocusBlock(userId, block_id);
      return `Focus block "${block.description}" completed. ${describeDelta(delta)}`;
    }),
  );

  server.registerTool(
    "abandon_focus_block",
    {
      title: "Abandon Focus Block",
      description: "Stop an active focus block without reward, freeing the slot for a new one.",
      inputSchema: {
        block_id: z.string().describe("ID of the focus block"),
      },
    },
    async ({ block_id }) => respond(async () => {
      const block = await engine.abandonFocusBlock(userId, block_id);
      return `Focus block "${block.description}" abandoned.`;
    }),
  );
}
