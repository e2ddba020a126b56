import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { QuestEngine } from "../engine.js";

export function registerGameState(server: McpServer, engine: QuestEngine, userId: string): void {
  server.registerResource(
    "game_state",
    "quest://game-state",
    {
      title: "Game State",
      description: "Streak, character stats and level, today's intention, and any recovery quest blocking the day.",
      mimeType: "application/json",
    },
    async (uri) => {
      const state = await engine.getGameState(userId);
      return {
        contents: [{
          uri: uri.href,
          text: JSON.stringify(state),
        }],
      };
    },
  );
}
