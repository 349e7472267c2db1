import { scaffoldNumberedEntry, type NumberedEntryKind } from "../project/numbered-entry.js";
import { GOAL_FILE_NAME } from "../project/paths.js";
import type { ScaffoldOptions, ScaffoldOutcome } from "../types.js";

export const goalKind: NumberedEntryKind = {
  label: "goal",
  parentDir: (config) => config.goalsDir,
  fileName: GOAL_FILE_NAME,
  template: "goal",
  jsonKeys: { dir: "GOAL_DIR", file: "GOAL_FILE", description: "GOAL_DESCRIPTION" },
  tokens: (ctx) => ({
    "GOAL DESCRIPTION": ctx.description,
    "###-goal-name": ctx.name,
    DATE: ctx.timestamp,
  }),
  commitMessage: (ctx) =>
    `Add goal: ${ctx.description}\n\n- Created goal definition in ${ctx.relFile}\n- Branch: ${ctx.branch}`,
};

/**
 * Create `<goalsDir>/NNN-slug/goal.md` on a new `NNN-slug` branch.
 *
 * "Improve user onboarding" in a fresh project becomes
 * `.goalkit/goals/001-improve-user-onboarding/goal.md`.
 */
export function createGoal(
  description: string,
  options: ScaffoldOptions = {},
): Promise<ScaffoldOutcome> {
  return scaffoldNumberedEntry(goalKind, description, options);
}
