import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { commitPaths, ensureBranch } from "../git/repo.js";
import { updateAgentContext } from "../context/updater.js";
import { loadTemplate, renderTemplate, type TemplateValues } from "../templates/render.js";
import { GoalKitError, errorMessage } from "../utils/errors.js";
import { silentLogger } from "../utils/log.js";
import { toProjectPath } from "../utils/platform.js";
import { capitalize } from "../utils/text.js";
import { isoTimestamp } from "../utils/time.js";
import { formatId, listNumberedEntries, nextSequentialId, slugify } from "./ids.js";
import { openProject, projectPath } from "./paths.js";
import type { GoalKitConfig, JsonPayload, ProjectContext, ScaffoldOptions, ScaffoldOutcome } from "../types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface EntryContext {
  description: string;
  /** `<id>-<slug>`, also the branch name. */
  name: string;
  relDir: string;
  relFile: string;
  timestamp: string;
  /** Values contributed by the kind's `extras` hook. */
  extras: TemplateValues;
}

/** What differs between goals and collaborations. */
export interface NumberedEntryKind {
  /** Human label: "goal", "collaboration". */
  label: string;
  parentDir(config: GoalKitConfig): string;
  fileName: string;
  template: string;
  jsonKeys: { dir: string; file: string; description: string };
  extras?(project: ProjectContext): Promise<TemplateValues>;
  tokens(ctx: EntryContext): TemplateValues;
  commitMessage(ctx: EntryContext & { branch: string }): string;
}

export interface NumberedEntryPlan {
  id: number;
  slug: string;
  name: string;
  dir: string;
  file: string;
  relDir: string;
  relFile: string;
  /** A directory with the same slug already exists (and is reused). */
  existing: boolean;
}

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

/**
 * Decide where a new entry for `description` goes. An existing directory
 * with the same slug is reported via `existing` instead of allocating a new
 * number.
 */
export async function planNumberedEntry(
  project: ProjectContext,
  kind: NumberedEntryKind,
  description: string,
): Promise<NumberedEntryPlan> {
  const slug = slugify(description);
  if (!slug) {
    throw new GoalKitError(
      `${capitalize(kind.label)} description must contain at least one letter or digit`,
    );
  }

  const parent = projectPath(project.root, kind.parentDir(project.config));
  const entries = await listNumberedEntries(parent);
  const match = entries.find((e) => e.slug === slug);

  const id = match ? match.id : await nextSequentialId(parent);
  const name = match ? match.name : `${formatId(id, project.config.idWidth)}-${slug}`;
  const dir = join(parent, name);
  const file = join(dir, kind.fileName);

  return {
    id,
    slug,
    name,
    dir,
    file,
    relDir: toProjectPath(project.root, dir),
    relFile: toProjectPath(project.root, file),
    existing: match !== undefined,
  };
}

function payloadFor(kind: NumberedEntryKind, plan: NumberedEntryPlan, description: string): JsonPayload {
  return {
    [kind.jsonKeys.dir]: plan.relDir,
    [kind.jsonKeys.file]: plan.relFile,
    [kind.jsonKeys.description]: description,
    BRANCH_NAME: plan.name,
  };
}

// ---------------------------------------------------------------------------
// Scaffolding
// ---------------------------------------------------------------------------

/**
 * Create `<parent>/<NNN-slug>/<file>` from the kind's template, switch to a
 * branch named after the directory and commit it.
 */
export async function scaffoldNumberedEntry(
  kind: NumberedEntryKind,
  rawDescription: string,
  options: ScaffoldOptions = {},
): Promise<ScaffoldOutcome> {
  const logger = options.logger ?? silentLogger;
  const description = rawDescription.trim();
  if (!description) {
    throw new GoalKitError(`${capitalize(kind.label)} description is required`);
  }

  const project = await openProject(options.cwd);
  const plan = await planNumberedEntry(project, kind, description);
  const payload = payloadFor(kind, plan, description);

  if (options.json) {
    return { status: "planned", payload };
  }

  if (plan.existing && !options.force) {
    throw new GoalKitError(`${capitalize(kind.label)} directory already exists: ${plan.relDir}`, {
      hint: "Use a different description or pass --force to overwrite it",
    });
  }
  if (plan.existing) {
    logger.debug(`Overwriting existing ${kind.label} directory: ${plan.relDir}`);
  }

  if (options.dryRun) {
    return {
      status: "dry-run",
      payload,
      actions: [
        `Would create ${kind.label} directory: ${plan.relDir}`,
        `Would create ${kind.fileName} with description: ${description}`,
        `Would create branch: ${plan.name}`,
      ],
    };
  }

  const timestamp = isoTimestamp(options.now);
  const extras = kind.extras ? await kind.extras(project) : {};
  const ctx: EntryContext = {
    description,
    name: plan.name,
    relDir: plan.relDir,
    relFile: plan.relFile,
    timestamp,
    extras,
  };

  await mkdir(plan.dir, { recursive: true });
  logger.success(`Created ${kind.label} directory: ${plan.relDir}`);

  const template = await loadTemplate(project.root, project.config.templatesDir, kind.template);
  logger.debug(`Using ${template.source} template: ${template.path}`);
  await writeFile(plan.file, renderTemplate(template.content, kind.tokens(ctx)), "utf-8");
  logger.success(`Created ${kind.fileName} with description: ${description}`);

  logger.debug(`Setting up git branch ${plan.name}`);
  const { branch, created } = ensureBranch(plan.name, project.root);
  logger.info(created ? `Created new branch: ${branch}` : `Branch ${branch} already exists, switched to it`);

  let committed = false;
  if (project.config.autoCommit) {
    committed = commitPaths([plan.relDir], kind.commitMessage({ ...ctx, branch }), project.root);
    if (committed) logger.success(`${capitalize(kind.label)} committed to branch: ${branch}`);
  }

  try {
    await updateAgentContext(project, { now: options.now });
  } catch (err: unknown) {
    logger.warn(`Could not update agent context: ${errorMessage(err)}`);
  }

  return { status: "created", payload, files: [plan.relFile], branch, committed };
}
