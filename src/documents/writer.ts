import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { commitPaths } from "../git/repo.js";
import { parseGoalMarkdown, resolveGoalRef } from "../goals/reader.js";
import { GOAL_FILE_NAME, openProject } from "../project/paths.js";
import { loadTemplate, renderTemplate } from "../templates/render.js";
import { GoalKitError } from "../utils/errors.js";
import { silentLogger } from "../utils/log.js";
import { pathExists, toProjectPath } from "../utils/platform.js";
import { capitalize } from "../utils/text.js";
import { isoTimestamp } from "../utils/time.js";
import { confirmOverwrite } from "./overwrite.js";
import type { GoalDocumentKind } from "./registry.js";
import type { JsonPayload, ScaffoldOptions, ScaffoldOutcome } from "../types.js";

/**
 * Write one planning document (strategies.md, milestones.md, ...) into an
 * existing goal directory and commit it.
 */
export async function writeGoalDocument(
  kind: GoalDocumentKind,
  goalRef: string | undefined,
  options: ScaffoldOptions = {},
): Promise<ScaffoldOutcome> {
  const logger = options.logger ?? silentLogger;
  const project = await openProject(options.cwd);
  const goal = await resolveGoalRef(project, goalRef, options.cwd);

  const goalFile = join(goal.dir, GOAL_FILE_NAME);
  const target = join(goal.dir, kind.fileName);
  const relDir = toProjectPath(project.root, goal.dir);
  const relTarget = toProjectPath(project.root, target);
  const hasGoalFile = await pathExists(goalFile);

  if (kind.requiresGoalFile && !hasGoalFile) {
    throw new GoalKitError(`${GOAL_FILE_NAME} not found in goal directory: ${relDir}`, {
      hint: "Create the goal first with `goalkit goal`",
    });
  }

  const payload: JsonPayload = { GOAL_DIR: relDir, [kind.jsonKey]: relTarget };
  if (kind.includeBranch) payload.BRANCH_NAME = goal.name;
  if (kind.requiresGoalFile) payload.GOAL_FILE = toProjectPath(project.root, goalFile);

  if (options.json) return { status: "planned", payload };

  if (!options.dryRun && (await pathExists(target))) {
    logger.warn(`${capitalize(kind.label)} file already exists: ${relTarget}`);
    const proceed = await confirmOverwrite(relTarget, options);
    if (!proceed) {
      logger.info("Operation cancelled");
      return { status: "cancelled", payload };
    }
  }

  if (options.dryRun) {
    return { status: "dry-run", payload, actions: [`Would create ${kind.label} file: ${relTarget}`] };
  }

  const title = hasGoalFile
    ? parseGoalMarkdown(await readFile(goalFile, "utf-8")).title
    : undefined;
  const template = await loadTemplate(project.root, project.config.templatesDir, kind.template);
  logger.debug(`Using ${template.source} template: ${template.path}`);

  const content = renderTemplate(template.content, {
    GOAL: goal.name,
    "GOAL DESCRIPTION": title ?? goal.name,
    DATE: isoTimestamp(options.now),
  });
  await writeFile(target, content, "utf-8");
  logger.success(`Created ${kind.label} file: ${relTarget}`);

  let committed = false;
  if (project.config.autoCommit) {
    committed = commitPaths([relTarget], `Add ${kind.label} for goal: ${goal.name}`, project.root);
  }

  return { status: "created", payload, files: [relTarget], committed };
}
