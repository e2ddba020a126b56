export type Logger = (message: string) => void;

// stdout carries the MCP protocol, so everything diagnostic goes to stderr.
export const stderrLogger: Logger = (message) => {
  console.error(message);
};
