import type { DailyIntentionDocument, RecoveryQuestDocument, ResolutionPath } from "./types.js";

/**
 * Supplies the words around a failed day: the reflection asked of the user
 * when a recovery quest opens, and the reply once they finish it.
 */
export interface CoachingAdvisor {
  recoveryPrompt(intention: DailyIntentionDocument): string;
  recoveryFeedback(quest: RecoveryQuestDocument, path: ResolutionPath): string;
}

export const defaultCoachingAdvisor: CoachingAdvisor = {
  recoveryPrompt(intention) {
    if (intention.lapsed) {
      return `"${intention.description}" slipped by on ${intention.date}. What got in the way, and what would make tomorrow easier?`;
    }
    return `What was the main obstacle between you and "${intention.description}" today?`;
  },
  recoveryFeedback(_quest, path) {
    if (path === "passive_recovery") {
      return "Yesterday counts. Naming the obstacle is how you get past it.";
    }
    return "Naming the obstacle is the first step to getting past it. Today still counts.";
  },
};
