import { z } from "zod";

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const ConfigSchema = z.object({
  MONGO_URI: z.string().min(1).default("mongodb://mongodb:27017/questledger"),
  QUEST_USER_ID: z.string().trim().min(1, "QUEST_USER_ID not set — cannot identify the acting user"),
  QUEST_TIME_ZONE: z.string().default("UTC").refine(isTimeZone, { message: "QUEST_TIME_ZONE is not a valid IANA time zone" }),
});

export interface Config {
  mongoUri: string;
  userId: string;
  timeZone: string;
}

/** Reads configuration from the environment; throws with every problem listed when it is invalid. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n${problems.join("\n")}`);
  }
  return {
    mongoUri: parsed.data.MONGO_URI,
    userId: parsed.data.QUEST_USER_ID,
    timeZone: parsed.data.QUEST_TIME_ZONE,
  };
}
