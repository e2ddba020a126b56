import { completionPercentage } from "../ledger.js";
import type { DailyIntentionDocument, ProgressionDelta, Resolution } from "../types.js";

const PATH_LABELS: Record<Resolution["path"], string> = {
  perfect: "Perfect Path",
  active_recovery: "Active Recovery",
  passive_recovery: "Passive Recovery",
};

export function describeDelta(delta: ProgressionDelta): string {
  const gains = Object.entries(delta.stats)
    .filter(([, amount]) => amount)
    .map(([stat, amount]) => `${stat} +${amount}`);
  return `+${delta.xp} XP${gains.length > 0 ? `, ${gains.join(", ")}` : ""}.`;
}

export function describeProgress(intention: DailyIntentionDocument): string {
  const percent = Math.round(completionPercentage(intention));
  return `${intention.completed_quantity}/${intention.target_quantity} (${percent}%)`;
}

export function describeResolution(resolution: Resolution): string {
  const { streak } = resolution;
  const parts = [
    `${resolution.date} resolved (${PATH_LABELS[resolution.path]}).`,
    `Streak: ${streak.current} day${streak.current !== 1 ? "s" : ""} (longest ${streak.longest}).`,
    describeDelta(resolution.delta),
  ];
  if (resolution.milestone) parts.push(`** ${resolution.milestone}-DAY STREAK MILESTONE! **`);
  if (resolution.feedback) parts.push(resolution.feedback);
  return parts.join(" ");
}
