import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { readdir } from "node:fs/promises";
import { join } from "node:path";

vi.mock("../../src/git/repo.js", () => ({
  isGitRepo: vi.fn(),
  getRepoRoot: vi.fn(),
  getCurrentBranch: vi.fn(),
  ensureBranch: vi.fn(),
  commitPaths: vi.fn(),
}));

import { commitPaths, ensureBranch, getCurrentBranch, getRepoRoot, isGitRepo } from "../../src/git/repo.js";
import { createGoal } from "../../src/goals/create.js";
import { isoTimestamp } from "../../src/utils/time.js";
import { FIXED_NOW, createSpyLogger, createTempProject, type TempProject } from "../helpers/project.js";

const GOAL_DIR = ".goalkit/goals/001-improve-user-onboarding";

describe("createGoal", () => {
  let project: TempProject;

  beforeEach(async () => {
    vi.clearAllMocks();
    project = await createTempProject();
    vi.mocked(isGitRepo).mockReturnValue(true);
    vi.mocked(getRepoRoot).mockReturnValue(project.root);
    vi.mocked(getCurrentBranch).mockReturnValue("main");
    vi.mocked(ensureBranch).mockImplementation((branch) => ({ branch, created: true }));
    vi.mocked(commitPaths).mockReturnValue(true);
  });

  afterEach(async () => {
    await project.cleanup();
  });

  it("creates the first goal, its branch and one commit", async () => {
    const outcome = await createGoal("Improve user onboarding", {
      cwd: project.root,
      now: FIXED_NOW,
    });

    expect(outcome).toEqual({
      status: "created",
      payload: {
        GOAL_DIR,
        GOAL_FILE: `${GOAL_DIR}/goal.md`,
        GOAL_DESCRIPTION: "Improve user onboarding",
        BRANCH_NAME: "001-improve-user-onboarding",
      },
      files: [`${GOAL_DIR}/goal.md`],
      branch: "001-improve-user-onboarding",
      committed: true,
    });

    const lines = (await project.read(`${GOAL_DIR}/goal.md`)).split("\n");
    expect(lines[0]).toBe("# Goal Statement: Improve user onboarding");
    expect(lines).toContain("**Goal Branch**: `001-improve-user-onboarding`");
    expect(lines).toContain(`**Created**: ${isoTimestamp(FIXED_NOW)}`);
    expect(lines).toContain("**Status**: Draft");

    expect(ensureBranch).toHaveBeenCalledWith("001-improve-user-onboarding", project.root);
    expect(commitPaths).toHaveBeenCalledTimes(1);
    expect(commitPaths).toHaveBeenCalledWith(
      [GOAL_DIR],
      `Add goal: Improve user onboarding\n\n- Created goal definition in ${GOAL_DIR}/goal.md\n- Branch: 001-improve-user-onboarding`,
      project.root,
    );
  });

  it("numbers goals after the highest existing prefix", async () => {
    await project.write(".goalkit/goals/004-older/goal.md", "# Goal Statement: Older\n");

    const outcome = await createGoal("Reduce churn", { cwd: project.root });

    expect(outcome.payload.GOAL_DIR).toBe(".goalkit/goals/005-reduce-churn");
  });

  it("prints paths in JSON mode without writing anything", async () => {
    const outcome = await createGoal("Improve user onboarding", { cwd: project.root, json: true });

    expect(outcome.status).toBe("planned");
    expect(outcome.payload.GOAL_FILE).toBe(`${GOAL_DIR}/goal.md`);
    await expect(readdir(join(project.root, ".goalkit"))).resolves.toEqual(["vision.md"]);
    expect(ensureBranch).not.toHaveBeenCalled();
    expect(commitPaths).not.toHaveBeenCalled();
  });

  it("never writes or commits in dry-run mode", async () => {
    const outcome = await createGoal("Improve user onboarding", { cwd: project.root, dryRun: true });

    expect(outcome).toEqual({
      status: "dry-run",
      payload: expect.objectContaining({ GOAL_DIR }),
      actions: [
        `Would create goal directory: ${GOAL_DIR}`,
        "Would create goal.md with description: Improve user onboarding",
        "Would create branch: 001-improve-user-onboarding",
      ],
    });
    await expect(readdir(join(project.root, ".goalkit"))).resolves.toEqual(["vision.md"]);
    expect(commitPaths).not.toHaveBeenCalled();
  });

  it("refuses a duplicate goal and leaves the first untouched", async () => {
    await createGoal("Improve user onboarding", { cwd: project.root });
    await project.write(`${GOAL_DIR}/goal.md`, "edited by hand\n");

    await expect(createGoal("Improve user onboarding", { cwd: project.root })).rejects.toThrow(
      `Goal directory already exists: ${GOAL_DIR}`,
    );
    expect(await project.read(`${GOAL_DIR}/goal.md`)).toBe("edited by hand\n");
    await expect(readdir(join(project.root, ".goalkit/goals"))).resolves.toEqual([
      "001-improve-user-onboarding",
    ]);
  });

  it("rewrites goal.md in place with --force", async () => {
    await createGoal("Improve user onboarding", { cwd: project.root });
    await project.write(`${GOAL_DIR}/goal.md`, "edited by hand\n");

    const outcome = await createGoal("Improve user onboarding", { cwd: project.root, force: true });

    expect(outcome.payload.GOAL_DIR).toBe(GOAL_DIR);
    const content = await project.read(`${GOAL_DIR}/goal.md`);
    expect(content.startsWith("# Goal Statement: Improve user onboarding\n")).toBe(true);
  });

  it("rejects descriptions without letters or digits", async () => {
    await expect(createGoal("!!!", { cwd: project.root })).rejects.toThrow(
      "Goal description must contain at least one letter or digit",
    );
    await expect(createGoal("   ", { cwd: project.root })).rejects.toThrow("Goal description is required");
  });

  it("requires a git repository", async () => {
    vi.mocked(isGitRepo).mockReturnValue(false);

    await expect(createGoal("Anything", { cwd: project.root })).rejects.toThrow("Not in a git repository");
  });

  it("requires the vision file", async () => {
    const bare = await createTempProject({ vision: false });
    vi.mocked(getRepoRoot).mockReturnValue(bare.root);
    try {
      await expect(createGoal("Anything", { cwd: bare.root })).rejects.toThrow("Not a Goal Kit project");
    } finally {
      await bare.cleanup();
    }
  });

  it("refreshes existing agent context files", async () => {
    await project.write("CLAUDE.md", "old\n");
    const logger = createSpyLogger();

    await createGoal("Improve user onboarding", { cwd: project.root, logger });

    const context = await project.read("CLAUDE.md");
    expect(context.split("\n")).toContain("- **001-improve-user-onboarding**: Improve user onboarding");
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("skips the commit when autoCommit is off", async () => {
    await project.write(".goalkit/config.json", JSON.stringify({ autoCommit: false }));

    const outcome = await createGoal("Improve user onboarding", { cwd: project.root });

    expect(outcome).toMatchObject({ status: "created", committed: false });
    expect(commitPaths).not.toHaveBeenCalled();
  });
});
