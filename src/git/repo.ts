import { execFileSync } from "node:child_process";
import { normalizePath } from "../utils/platform.js";
import { errorMessage } from "../utils/errors.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Run a git command and return trimmed stdout. */
function git(args: string[], cwd?: string): string {
  try {
    return execFileSync("git", args, {
      cwd,
      encoding: "utf-8",
      stdio: "pipe",
    }).trim();
  } catch (err: unknown) {
    throw new Error(`git ${args[0]} failed: ${describeGitError(err)}`);
  }
}

function describeGitError(err: unknown): string {
  if (typeof err === "object" && err !== null && "stderr" in err) {
    const stderr = String(err.stderr ?? "").trim();
    if (stderr) return stderr;
  }
  return errorMessage(err);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function isGitRepo(cwd?: string): boolean {
  try {
    git(["rev-parse", "--git-dir"], cwd);
    return true;
  } catch {
    return false;
  }
}

/**
 * Get the root directory of the current git repository.
 */
export function getRepoRoot(cwd?: string): string {
  const raw = git(["rev-parse", "--show-toplevel"], cwd);
  return normalizePath(raw);
}

/** Current branch name, or "unknown" when detached or outside a repo. */
export function getCurrentBranch(cwd?: string): string {
  try {
    return git(["branch", "--show-current"], cwd) || "unknown";
  } catch {
    return "unknown";
  }
}

export function branchExists(branch: string, cwd?: string): boolean {
  try {
    git(["rev-parse", "--verify", "--quiet", `refs/heads/${branch}`], cwd);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check out `branch`, creating it from HEAD when it does not exist yet.
 */
export function ensureBranch(
  branch: string,
  cwd?: string,
): { branch: string; created: boolean } {
  if (branchExists(branch, cwd)) {
    git(["checkout", branch], cwd);
    return { branch, created: false };
  }
  git(["checkout", "-b", branch], cwd);
  return { branch, created: true };
}

/**
 * Stage `paths` and commit them with `message`.
 * Returns false when there was nothing to commit.
 */
export function commitPaths(paths: string[], message: string, cwd?: string): boolean {
  git(["add", "--", ...paths], cwd);
  const staged = git(["diff", "--cached", "--name-only", "--", ...paths], cwd);
  if (!staged) return false;
  git(["commit", "-m", message, "--", ...paths], cwd);
  return true;
}
