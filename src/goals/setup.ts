import { join } from "node:path";
import { findGoalDocumentKind, type GoalDocumentKind } from "../documents/registry.js";
import { writeGoalDocument } from "../documents/writer.js";
import { GOAL_FILE_NAME, openProject } from "../project/paths.js";
import { GoalKitError } from "../utils/errors.js";
import { silentLogger } from "../utils/log.js";
import { pathExists, toProjectPath } from "../utils/platform.js";
import { resolveGoalRef } from "./reader.js";
import type { JsonPayload, ScaffoldOptions, ScaffoldOutcome } from "../types.js";

/** Planning documents every goal gets from `goalkit setup`. */
export const SETUP_COMMANDS = ["strategies", "milestones", "execution"] as const;

function setupKinds(): GoalDocumentKind[] {
  return SETUP_COMMANDS.map((command) => {
    const kind = findGoalDocumentKind(command);
    if (!kind) throw new Error(`Unknown goal document: ${command}`);
    return kind;
  });
}

/**
 * Fill in the missing core planning documents of an existing goal (the goal
 * containing `cwd` when no reference is given). `force` recreates them all.
 */
export async function setupGoal(
  goalRef: string | undefined,
  options: ScaffoldOptions = {},
): Promise<ScaffoldOutcome> {
  const logger = options.logger ?? silentLogger;
  const project = await openProject(options.cwd);
  const goal = await resolveGoalRef(project, goalRef, options.cwd);
  const relDir = toProjectPath(project.root, goal.dir);
  const goalFile = join(goal.dir, GOAL_FILE_NAME);

  if (!(await pathExists(goalFile))) {
    throw new GoalKitError(`${GOAL_FILE_NAME} not found in goal directory: ${relDir}`, {
      hint: "Create the goal first with `goalkit goal`",
    });
  }

  const kinds = setupKinds();
  const payload: JsonPayload = {
    GOAL_DIR: relDir,
    GOAL_FILE: toProjectPath(project.root, goalFile),
    BRANCH_NAME: goal.name,
  };
  for (const kind of kinds) {
    payload[kind.jsonKey] = toProjectPath(project.root, join(goal.dir, kind.fileName));
  }
  if (options.json) return { status: "planned", payload };

  const pending: GoalDocumentKind[] = [];
  for (const kind of kinds) {
    if (options.force || !(await pathExists(join(goal.dir, kind.fileName)))) {
      pending.push(kind);
    } else {
      logger.debug(`${kind.fileName} already exists`);
    }
  }
  if (pending.length === 0) {
    return { status: "skipped", payload, reason: `All planning documents already exist in ${relDir}` };
  }

  const actions: string[] = [];
  const files: string[] = [];
  let committed = false;
  for (const kind of pending) {
    logger.step(`${options.force ? "Recreating" : "Creating"} ${kind.fileName}`);
    const outcome = await writeGoalDocument(kind, goal.dir, { ...options, force: true });
    if (outcome.status === "dry-run") actions.push(...outcome.actions);
    if (outcome.status === "created") {
      files.push(...outcome.files);
      committed = committed || outcome.committed;
    }
  }

  if (options.dryRun) return { status: "dry-run", payload, actions };
  return { status: "created", payload, files, committed };
}
