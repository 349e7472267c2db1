import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { GOAL_FILE_NAME, openProject } from "../project/paths.js";
import { loadTemplate } from "../templates/render.js";
import { GoalKitError, isErrnoCode } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/log.js";
import { toProjectPath } from "../utils/platform.js";
import { listGoals, parseGoalMarkdown, resolveGoalRef } from "./reader.js";
import type { NumberedEntry, ProjectContext } from "../types.js";

// Filled in by `goalkit goal`, so never left behind in a created goal.md.
const CREATION_TOKENS = new Set(["GOAL DESCRIPTION", "###-goal-name", "DATE"]);

export interface GoalRequirements {
  /** `## ` headings every goal.md must keep. */
  sections: string[];
  /** Bracketed prompts the author is expected to replace. */
  placeholders: string[];
}

export interface GoalValidation {
  /** Goal directory name, or the reference as given when it did not resolve. */
  goal: string;
  file: string;
  valid: boolean;
  errors: string[];
}

export interface ValidateResult {
  results: GoalValidation[];
  ok: boolean;
}

export interface ValidateOptions {
  cwd?: string;
  logger?: Logger;
}

/** Derive the required headings and placeholders from a goal template. */
export function goalRequirements(template: string): GoalRequirements {
  const sections = template
    .split("\n")
    .filter((line) => line.startsWith("## "))
    .map((line) => line.trim());

  const placeholders: string[] = [];
  for (const match of template.matchAll(/\[([^\]\n]+)\]/g)) {
    const token = match[1] ?? "";
    if (CREATION_TOKENS.has(token) || placeholders.includes(match[0])) continue;
    placeholders.push(match[0]);
  }
  return { sections, placeholders };
}

/** Problems found in one goal.md body; empty when it is complete. */
export function validateGoalContent(content: string, requirements: GoalRequirements): string[] {
  const errors: string[] = [];
  const title = parseGoalMarkdown(content).title;
  if (!title || title === "[GOAL DESCRIPTION]") {
    errors.push("Missing goal statement title");
  }

  const headings = new Set(content.split("\n").map((line) => line.trim()));
  for (const section of requirements.sections) {
    if (!headings.has(section)) errors.push(`Missing required section: ${section}`);
  }
  for (const placeholder of requirements.placeholders) {
    if (content.includes(placeholder)) errors.push(`Unfilled placeholder: ${placeholder}`);
  }
  return errors;
}

async function validateEntry(
  project: ProjectContext,
  entry: NumberedEntry,
  requirements: GoalRequirements,
): Promise<GoalValidation> {
  const file = toProjectPath(project.root, join(entry.dir, GOAL_FILE_NAME));
  try {
    const content = await readFile(join(entry.dir, GOAL_FILE_NAME), "utf-8");
    const errors = validateGoalContent(content, requirements);
    return { goal: entry.name, file, valid: errors.length === 0, errors };
  } catch (err: unknown) {
    if (!isErrnoCode(err, "ENOENT")) throw err;
    return { goal: entry.name, file, valid: false, errors: [`${GOAL_FILE_NAME} not found`] };
  }
}

/**
 * Check goal.md of the given goals (every goal when `refs` is empty) for the
 * template's sections and for placeholders that were never filled in.
 */
export async function validateGoals(
  refs: string[],
  options: ValidateOptions = {},
): Promise<ValidateResult> {
  const logger = options.logger ?? silentLogger;
  const project = await openProject(options.cwd, { requireGit: false });
  const template = await loadTemplate(project.root, project.config.templatesDir, "goal");
  const requirements = goalRequirements(template.content);
  logger.debug(
    `Checking ${requirements.sections.length} sections and ${requirements.placeholders.length} placeholders from ${template.path}`,
  );

  const results: GoalValidation[] = [];
  if (refs.length === 0) {
    for (const goal of await listGoals(project)) {
      results.push(await validateEntry(project, goal, requirements));
    }
  }
  for (const ref of refs) {
    let entry: NumberedEntry;
    try {
      entry = await resolveGoalRef(project, ref, options.cwd);
    } catch (err: unknown) {
      if (!(err instanceof GoalKitError)) throw err;
      results.push({ goal: ref, file: ref, valid: false, errors: [err.message] });
      continue;
    }
    results.push(await validateEntry(project, entry, requirements));
  }

  return { results, ok: results.every((r) => r.valid) };
}
