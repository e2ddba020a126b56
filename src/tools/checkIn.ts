import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { QuestEngine } from "../engine.js";
import type { CheckInResult } from "../types.js";
import { describeProgress } from "./format.js";
import { respond } from "./respond.js";

export function describeCheckIn(result: CheckInResult): string {
  switch (result.state) {
    case "blocked":
      return [
        `Blocked: the recovery quest for ${result.quest.source_date} is still open (quest ${result.quest._id.toHexString()}).`,
        `Prompt: ${result.quest.prompt}`,
        "Complete it today to keep the streak; no new intention until then.",
      ].join("\n");
    case "ready":
      return "Ready: no intention set for today yet. Use set_intention to commit to one.";
    case "already_resolved": {
      const { intention, quest } = result;
      const parts = [`Today's intention (${intention._id.toHexString()}): "${intention.description}" is ${intention.status}.`];
      if (intention.status === "pending" && intention.target_quantity > 1) {
        parts.push(`Progress: ${describeProgress(intention)}.`);
      }
      if (intention.status === "pending") parts.push("Finish it with complete_intention, or use fail_intention to open a recovery quest.");
      if (quest?.status === "pending") parts.push(`Recovery quest ${quest._id.toHexString()} is open: ${quest.prompt}`);
      if (quest?.status === "completed") parts.push("Recovery quest completed, so today counts.");
      return parts.join("\n");
    }
  }
}

export function registerCheckIn(server: McpServer, engine: QuestEngine, userId: string): void {
  server.registerTool(
    "check_in",
    {
      title: "Daily Check-In",
      description: "Start-of-session check. Reports whether the user is blocked on a recovery quest, ready to set today's intention, or already has one.",
      inputSchema: {},
    },
    async () => respond(async () => describeCheckIn(await engine.checkIn(userId))),
  );
}
