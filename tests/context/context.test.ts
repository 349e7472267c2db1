import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../../src/git/repo.js", () => ({
  isGitRepo: vi.fn(),
  getRepoRoot: vi.fn(),
  getCurrentBranch: vi.fn(),
  ensureBranch: vi.fn(),
  commitPaths: vi.fn(),
}));

import { getCurrentBranch } from "../../src/git/repo.js";
import { loadConfig } from "../../src/config/loader.js";
import { renderContext } from "../../src/context/generator.js";
import { updateAgentContext } from "../../src/context/updater.js";
import { loadPersonaCatalog } from "../../src/personas/catalog.js";
import { readProjectState, visionExcerpt, type ProjectState } from "../../src/state/reader.js";
import { isoTimestamp } from "../../src/utils/time.js";
import { FIXED_NOW, createTempProject, type TempProject } from "../helpers/project.js";
import type { ProjectContext } from "../../src/types.js";

async function baseState(overrides: Partial<ProjectState> = {}): Promise<ProjectState> {
  const catalog = await loadPersonaCatalog();
  const persona = catalog.personas.general;
  if (!persona) throw new Error("general persona missing");
  return {
    name: "atlas",
    branch: "main",
    goalCount: 0,
    recentGoals: [],
    persona: { id: "general", persona, invalid: false },
    visionExcerpt: null,
    ...overrides,
  };
}

describe("visionExcerpt", () => {
  it("drops headings and keeps at most ten lines from the top twenty", () => {
    const lines = ["# Vision", ...Array.from({ length: 30 }, (_, i) => `line ${i + 1}`)];
    const excerpt = visionExcerpt(lines.join("\n")).split("\n");

    expect(excerpt).toHaveLength(10);
    expect(excerpt[0]).toBe("line 1");
    expect(excerpt[9]).toBe("line 10");
  });
});

describe("renderContext", () => {
  it("renders the header and an empty-project next step", async () => {
    const lines = renderContext(await baseState(), FIXED_NOW).split("\n");

    expect(lines.slice(0, 6)).toEqual([
      "# Goal Kit Project Context",
      "",
      "**Project**: atlas",
      "**Branch**: main",
      "**Active Goals**: 0",
      `**Updated**: ${isoTimestamp(FIXED_NOW)}`,
    ]);
    expect(lines).toContain("Vision document not yet created");
    expect(lines).toContain("No active goals yet. Use `goalkit goal` to create your first goal.");
    expect(lines).toContain("1. Use `goalkit vision` to establish project vision");
  });

  it("lists recent goals and the active persona", async () => {
    const state = await baseState({
      goalCount: 1,
      recentGoals: [{ name: "001-ship", title: "Ship it" }],
      visionExcerpt: "Ship useful things.",
    });
    const lines = renderContext(state, FIXED_NOW).split("\n");

    expect(lines).toContain("- **001-ship**: Ship it");
    expect(lines).toContain("Ship useful things.");
    expect(lines).toContain("**General Agent** (`general`): General goal-driven development agent");
    expect(lines).toContain("1. Review active goals with `goalkit list`");
  });
});

describe("updateAgentContext", () => {
  let tmp: TempProject;
  let project: ProjectContext;

  beforeEach(async () => {
    vi.clearAllMocks();
    vi.mocked(getCurrentBranch).mockReturnValue("001-ship");
    tmp = await createTempProject();
    await tmp.write(".goalkit/config.json", JSON.stringify({ contextFiles: ["CLAUDE.md", ".cursor/context.md"], recentGoals: 2 }));
    for (const [i, name] of ["001-a", "002-b", "003-c"].entries()) {
      await tmp.write(`.goalkit/goals/${name}/goal.md`, `# Goal Statement: Goal ${i + 1}\n`);
    }
    project = { root: tmp.root, config: await loadConfig(tmp.root) };
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  it("reads the project state", async () => {
    const state = await readProjectState(project);

    expect(state.branch).toBe("001-ship");
    expect(state.goalCount).toBe(3);
    expect(state.recentGoals).toEqual([
      { name: "002-b", title: "Goal 2" },
      { name: "003-c", title: "Goal 3" },
    ]);
    expect(state.visionExcerpt).toBe("Ship useful things.");
  });

  it("only writes files that already exist", async () => {
    await tmp.write("CLAUDE.md", "old\n");

    const result = await updateAgentContext(project, { now: FIXED_NOW });

    expect(result.updated).toEqual(["CLAUDE.md"]);
    expect(await tmp.read("CLAUDE.md")).toBe(result.content);
    await expect(tmp.read(".cursor/context.md")).rejects.toThrow();
  });

  it("creates every configured file with force", async () => {
    const result = await updateAgentContext(project, { force: true, now: FIXED_NOW });

    expect(result.updated).toEqual(["CLAUDE.md", ".cursor/context.md"]);
    expect(await tmp.read(".cursor/context.md")).toBe(result.content);
  });

  it("writes nothing when no context file exists", async () => {
    const result = await updateAgentContext(project, { now: FIXED_NOW });

    expect(result.updated).toEqual([]);
  });
});
