import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { QuestEngine } from "../engine.js";
import { respond } from "./respond.js";

export function registerAuditStreak(server: McpServer, engine: QuestEngine, userId: string): void {
  server.registerTool(
    "audit_streak",
    {
      title: "Audit Streak",
      description: "Recompute the streak from the intention ledger and compare it with the stored value.",
      inputSchema: {},
    },
    async () => respond(async () => {
      const { cached, derived, consistent } = await engine.auditStreak(userId);
      if (consistent) return `Streak consistent: ${cached.current_streak} (longest ${cached.longest_streak}).`;
      return `Streak mismatch: stored ${cached.current_streak} (longest ${cached.longest_streak}), ledger replay ${derived.current_streak} (longest ${derived.longest_streak}).`;
    }),
  );
}
