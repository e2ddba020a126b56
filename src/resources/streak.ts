import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { STREAK_MILESTONES } from "../constants.js";
import type { QuestEngine } from "../engine.js";

export function registerStreak(server: McpServer, engine: QuestEngine, userId: string): void {
  server.registerResource(
    "streak",
    "quest://streak",
    {
      title: "Streak",
      description: "Current and longest streak, last resolved day, and the next milestone.",
      mimeType: "application/json",
    },
    async (uri) => {
      const state = await engine.getGameState(userId);
      const nextMilestone = STREAK_MILESTONES.find(m => m > state.current_streak) ?? null;

      return {
        contents: [{
          uri: uri.href,
          text: JSON.stringify({
            current_streak: state.current_streak,
            longest_streak: state.longest_streak,
            last_resolved_date: state.last_resolved_date,
            resolved_today: state.last_resolved_date === state.today,
            blocked: state.pending_block !== undefined,
            next_milestone: nextMilestone,
            days_to_next_milestone: nextMilestone === null ? null : nextMilestone - state.current_streak,
          }),
        }],
      };
    },
  );
}
