export type QuestErrorCode =
  | "DUPLICATE_INTENTION"
  | "INVALID_TRANSITION"
  | "BLOCKED_BY_RECOVERY"
  | "NOT_FOUND"
  | "FOCUS_BLOCK_ACTIVE";

/** Base class for every precondition failure the engine reports to its caller. */
export class QuestError extends Error {
  readonly code: QuestErrorCode;

  constructor(code: QuestErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class DuplicateIntentionError extends QuestError {
  readonly date: string;

  constructor(date: string) {
    super("DUPLICATE_INTENTION", `An intention is already set for ${date}. One intention per day.`);
    this.date = date;
  }
}

export class InvalidTransitionError extends QuestError {
  constructor(message: string) {
    super("INVALID_TRANSITION", message);
  }
}

/** Not a failure as such: the user has an outstanding recovery quest to finish first. */
export class BlockedByRecoveryError extends QuestError {
  readonly questId: string;

  constructor(questId: string, sourceDate: string) {
    super(
      "BLOCKED_BY_RECOVERY",
      `Finish the recovery quest for ${sourceDate} (quest ${questId}) before setting a new intention.`,
    );
    this.questId = questId;
  }
}

export class NotFoundError extends QuestError {
  constructor(kind: "intention" | "recovery quest" | "focus block", id: string) {
    super("NOT_FOUND", `No ${kind} found with id ${id}.`);
  }
}

/** One focus block at a time: the running one has to be completed or abandoned first. */
export class ActiveFocusBlockError extends QuestError {
  readonly blockId: string;

  constructor(blockId: string) {
    super(
      "FOCUS_BLOCK_ACTIVE",
      `You already have an active focus block (${blockId}). Complete or abandon it before starting a new one.`,
    );
    this.blockId = blockId;
  }
}

export function isQuestError(err: unknown): err is QuestError {
  return err instanceof QuestError;
}
