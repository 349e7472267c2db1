import { readFile } from "node:fs/promises";
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from "node:path";
import { GOAL_DOCUMENT_KINDS } from "../documents/registry.js";
import { listNumberedEntries, parseEntryName } from "../project/ids.js";
import { GOAL_FILE_NAME, projectPath } from "../project/paths.js";
import { GoalKitError, isErrnoCode } from "../utils/errors.js";
import { isDirectory, pathExists, toProjectPath } from "../utils/platform.js";
import type { GoalSummary, NumberedEntry, ProjectContext } from "../types.js";

export interface GoalMarkdownFields {
  title?: string;
  status?: string;
  created?: string;
}

/** Pull the title, status and creation stamp out of a goal.md body. */
export function parseGoalMarkdown(content: string): GoalMarkdownFields {
  const fields: GoalMarkdownFields = {};
  const title = /^#\s*Goal Statement:\s*(.+?)\s*$/m.exec(content);
  if (title) fields.title = title[1];
  const status = /^\*\*Status\*\*:\s*(.+?)\s*$/m.exec(content);
  if (status) fields.status = status[1];
  const created = /^\*\*Created\*\*:\s*(.+?)\s*$/m.exec(content);
  if (created) fields.created = created[1];
  return fields;
}

export function goalsDirectory(project: ProjectContext): string {
  return projectPath(project.root, project.config.goalsDir);
}

export async function readGoalSummary(
  project: ProjectContext,
  entry: NumberedEntry,
): Promise<GoalSummary> {
  let content: string | null = null;
  try {
    content = await readFile(join(entry.dir, GOAL_FILE_NAME), "utf-8");
  } catch (err: unknown) {
    if (!isErrnoCode(err, "ENOENT")) throw err;
  }

  const fields = content ? parseGoalMarkdown(content) : {};
  const documents: string[] = [];
  for (const kind of GOAL_DOCUMENT_KINDS) {
    if (await pathExists(join(entry.dir, kind.fileName))) documents.push(kind.fileName);
  }

  return {
    ...entry,
    path: toProjectPath(project.root, entry.dir),
    title: fields.title ?? "Goal definition in progress",
    status: fields.status,
    created: fields.created,
    hasGoalFile: content !== null,
    documents,
  };
}

/** Every numbered goal directory, ordered by id. */
export async function listGoals(project: ProjectContext): Promise<GoalSummary[]> {
  const entries = await listNumberedEntries(goalsDirectory(project));
  const goals: GoalSummary[] = [];
  for (const entry of entries) {
    goals.push(await readGoalSummary(project, entry));
  }
  return goals;
}

function toEntry(dir: string): NumberedEntry {
  const name = basename(dir);
  const parsed = parseEntryName(name);
  return { id: parsed?.id ?? 0, slug: parsed?.slug ?? name, name, dir };
}

/**
 * Resolve a goal reference from the command line: a bare number (`1`,
 * `001`), a directory name, or a path relative to the cwd or project root.
 * Without a reference, the goal directory containing `cwd` is used.
 */
export async function resolveGoalRef(
  project: ProjectContext,
  ref: string | undefined,
  cwd: string = process.cwd(),
): Promise<NumberedEntry> {
  const goalsDir = goalsDirectory(project);

  if (ref === undefined || ref.trim() === "") {
    const rel = relative(goalsDir, resolve(cwd));
    const first = rel.split(sep)[0];
    if (rel && !rel.startsWith("..") && !isAbsolute(rel) && first) {
      return toEntry(join(goalsDir, first));
    }
    throw new GoalKitError("Goal directory not specified and not in a goal directory", {
      hint: "Pass a goal (e.g. 001-user-authentication) or run from inside a goal directory",
    });
  }

  const trimmed = ref.trim();
  if (/^\d+$/.test(trimmed)) {
    const id = Number.parseInt(trimmed, 10);
    const match = (await listNumberedEntries(goalsDir)).find((e) => e.id === id);
    if (match) return match;
    throw new GoalKitError(`No goal with number ${trimmed}`, {
      hint: "Run `goalkit list` to see existing goals",
    });
  }

  const candidates = isAbsolute(trimmed)
    ? [trimmed]
    : [resolve(cwd, trimmed), join(project.root, trimmed), join(goalsDir, trimmed)];
  // Only direct children of the goals directory count as goals.
  for (const candidate of candidates.map((c) => resolve(c))) {
    if (dirname(candidate) !== resolve(goalsDir)) continue;
    if (await isDirectory(candidate)) return toEntry(candidate);
  }

  throw new GoalKitError(`Goal directory does not exist: ${trimmed}`, {
    hint: "Run `goalkit list` to see existing goals",
  });
}
