import { dirname, isAbsolute, join, resolve } from "node:path";
import { loadConfig } from "../config/loader.js";
import { getRepoRoot, isGitRepo } from "../git/repo.js";
import { GoalKitError } from "../utils/errors.js";
import { isDirectory, pathExists } from "../utils/platform.js";
import type { ProjectContext } from "../types.js";

export const GOALKIT_DIR = ".goalkit";
export const VISION_FILE = `${GOALKIT_DIR}/vision.md`;
export const PERSONA_STATE_FILE = `${GOALKIT_DIR}/personas/current_persona.txt`;
export const REPORTS_DIR = `${GOALKIT_DIR}/reports`;
export const REVIEWS_DIR = `${GOALKIT_DIR}/reviews`;
export const GOAL_FILE_NAME = "goal.md";

export function projectPath(root: string, relPath: string): string {
  return isAbsolute(relPath) ? relPath : join(root, relPath);
}

/**
 * Walk up from `cwd` looking for a `.goalkit` directory. Used where a
 * command can run without git (persona and read-only commands).
 */
export async function findGoalKitRoot(cwd: string): Promise<string | null> {
  let current = resolve(cwd);
  for (;;) {
    if (await isDirectory(join(current, GOALKIT_DIR))) return current;
    const parent = dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export interface OpenProjectOptions {
  /** Fail unless `.goalkit/vision.md` exists. Default: true. */
  requireVision?: boolean;
  /** Fail outside a git repository. Default: true. */
  requireGit?: boolean;
}

/**
 * Resolve the project root for `cwd` and load its configuration, enforcing
 * the environment preconditions every command shares.
 */
export async function openProject(
  cwd: string = process.cwd(),
  options: OpenProjectOptions = {},
): Promise<ProjectContext> {
  const requireVision = options.requireVision ?? true;
  const requireGit = options.requireGit ?? true;

  let root: string | null = null;
  if (isGitRepo(cwd)) {
    root = getRepoRoot(cwd);
  } else if (requireGit) {
    throw new GoalKitError("Not in a git repository", {
      hint: "Please run this from the root of a Goal Kit project",
    });
  } else {
    root = await findGoalKitRoot(cwd);
    if (!root) {
      throw new GoalKitError("Not in a git repository or Goal Kit project", {
        hint: "Run `goalkit vision` inside a git repository to set up the project",
      });
    }
  }

  if (requireVision && !(await pathExists(join(root, VISION_FILE)))) {
    throw new GoalKitError("Not a Goal Kit project", {
      hint: "Run `goalkit vision` first to set up the project",
    });
  }

  const config = await loadConfig(root);
  return { root, config };
}
