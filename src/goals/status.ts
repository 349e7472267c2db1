import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { commitPaths } from "../git/repo.js";
import { GOAL_FILE_NAME, openProject } from "../project/paths.js";
import { GoalKitError, isErrnoCode } from "../utils/errors.js";
import { silentLogger } from "../utils/log.js";
import { toProjectPath } from "../utils/platform.js";
import { resolveGoalRef } from "./reader.js";
import type { GoalStatus, ScaffoldOptions, ScaffoldOutcome } from "../types.js";

export const GOAL_STATUS_LABELS: Record<GoalStatus, string> = {
  draft: "Draft",
  planned: "Planned",
  in_progress: "In Progress",
  completed: "Completed",
  blocked: "Blocked",
};

function isGoalStatus(value: string): value is GoalStatus {
  return Object.prototype.hasOwnProperty.call(GOAL_STATUS_LABELS, value);
}

/** Accepts `in_progress`, `in-progress`, `In Progress`, ... */
export function parseGoalStatus(input: string): GoalStatus {
  const normalized = input.trim().toLowerCase().replace(/[\s-]+/g, "_");
  if (isGoalStatus(normalized)) return normalized;
  throw new GoalKitError(`Invalid status: ${input}`, {
    hint: `Valid statuses: ${Object.keys(GOAL_STATUS_LABELS).join(", ")}`,
  });
}

/**
 * Set the `**Status**:` line of a goal.md body, inserting it after the
 * `**Created**:` line (or the title) when the document has none.
 */
export function applyGoalStatus(content: string, label: string): string {
  const line = `**Status**: ${label}`;
  if (/^\*\*Status\*\*:.*$/m.test(content)) {
    return content.replace(/^\*\*Status\*\*:.*$/m, () => line);
  }
  if (/^\*\*Created\*\*:.*$/m.test(content)) {
    return content.replace(/^\*\*Created\*\*:.*$/m, (created) => `${created}\n${line}`);
  }
  const lines = content.split("\n");
  if (lines[0]?.startsWith("#")) {
    return [lines[0], "", line, ...lines.slice(1)].join("\n");
  }
  return `${line}\n\n${content}`;
}

export async function updateGoalStatus(
  ref: string,
  statusInput: string,
  options: ScaffoldOptions = {},
): Promise<ScaffoldOutcome> {
  const logger = options.logger ?? silentLogger;
  const status = parseGoalStatus(statusInput);
  const label = GOAL_STATUS_LABELS[status];

  const project = await openProject(options.cwd);
  const goal = await resolveGoalRef(project, ref, options.cwd);
  const goalFile = join(goal.dir, GOAL_FILE_NAME);
  const relFile = toProjectPath(project.root, goalFile);
  const payload = { GOAL_FILE: relFile, STATUS: status };

  if (options.json) return { status: "planned", payload };

  let content: string;
  try {
    content = await readFile(goalFile, "utf-8");
  } catch (err: unknown) {
    if (isErrnoCode(err, "ENOENT")) {
      throw new GoalKitError(`Missing required file: ${relFile}`);
    }
    throw err;
  }

  if (options.dryRun) {
    return { status: "dry-run", payload, actions: [`Would set status of ${goal.name} to ${label}`] };
  }

  await writeFile(goalFile, applyGoalStatus(content, label), "utf-8");
  logger.success(`Updated ${goal.name} status to ${label}`);

  let committed = false;
  if (project.config.autoCommit) {
    committed = commitPaths([relFile], `Update goal ${goal.name} status to ${label}`, project.root);
  }

  return { status: "created", payload, files: [relFile], committed };
}
