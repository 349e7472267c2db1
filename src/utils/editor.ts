import { spawnSync } from "node:child_process";
import { GoalKitError } from "./errors.js";

export function resolveEditor(env: NodeJS.ProcessEnv = process.env): string {
  return env.VISUAL || env.EDITOR || "vi";
}

/** Open a file in the user's editor and wait for it to close. */
export function openInEditor(filePath: string, env: NodeJS.ProcessEnv = process.env): void {
  const editor = resolveEditor(env);
  const result = spawnSync(editor, [filePath], { stdio: "inherit" });
  if (result.error) {
    throw new GoalKitError(`Could not launch editor "${editor}": ${result.error.message}`, {
      hint: "Set $EDITOR to an installed editor",
    });
  }
}
