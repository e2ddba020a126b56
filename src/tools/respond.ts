import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { isQuestError } from "../errors.js";

export function text(message: string): CallToolResult {
  return { content: [{ type: "text", text: message }] };
}

/**
 * Runs a tool action. Engine precondition failures become an "Error: ..."
 * message for the model to relay; anything else (a store fault) propagates.
 */
export async function respond(action: () => Promise<string>): Promise<CallToolResult> {
  try {
    return text(await action());
  } catch (err) {
    if (isQuestError(err)) return text(`Error: ${err.message}`);
    throw err;
  }
}
