import { describe, it, expect } from "vitest";
import {
  formatDoctorReport,
  formatGoalDetail,
  formatGoalList,
  formatPersonaList,
  formatPersonaStatus,
  formatPersonaSummary,
  formatValidation,
} from "../../src/reporter/human.js";
import { formatJson } from "../../src/reporter/json.js";
import { parsePersonaCatalog } from "../../src/personas/catalog.js";
import type { DoctorResult } from "../../src/doctor.js";
import type { GoalSummary } from "../../src/types.js";

const goal: GoalSummary = {
  id: 1,
  slug: "ship",
  name: "001-ship",
  dir: "/p/.goalkit/goals/001-ship",
  path: ".goalkit/goals/001-ship",
  title: "Ship it",
  status: "Draft",
  created: "2025-01-01T00:00:00Z",
  hasGoalFile: true,
  documents: ["strategies.md"],
};

const catalog = parsePersonaCatalog(
  [
    "defaultPersona: a",
    "personas:",
    "  a:",
    "    name: Alpha",
    "    description: First",
    "    defaultContext: ctx",
    "    color: blue",
    "    capabilities: [x, y]",
    "    specializations: [s1, s2, s3, s4]",
    "  b:",
    "    name: Beta",
    "    description: Second",
    "    defaultContext: ctx",
    "    color: red",
  ].join("\n"),
);

describe("goal formatting", () => {
  it("prints a table row per goal", () => {
    const lines = formatGoalList([goal, { ...goal, name: "002-next", status: undefined, documents: [] }]).split("\n");

    expect(lines[0]).toBe("### Goals");
    expect(lines[3]).toBe("| 001-ship | Draft | 1/10 | Ship it |");
    expect(lines[4]).toBe("| 002-next | — | 0/10 | Ship it |");
  });

  it("hints when there are no goals", () => {
    expect(formatGoalList([])).toBe("No goals yet. Use `goalkit goal <description>` to create one.");
  });

  it("marks present documents in the detail view", () => {
    const lines = formatGoalDetail(goal).split("\n");

    expect(lines[0]).toBe("## 001-ship");
    expect(lines).toContain("- [x] goal.md");
    expect(lines).toContain("- [x] strategies.md (`goalkit strategies`)");
    expect(lines).toContain("- [ ] tasks.md (`goalkit tasks`)");
  });
});

describe("formatValidation", () => {
  it("lists each goal with its problems and a verdict", () => {
    const text = formatValidation({
      ok: false,
      results: [
        { goal: "001-ship", file: ".goalkit/goals/001-ship/goal.md", valid: true, errors: [] },
        {
          goal: "002-grow",
          file: ".goalkit/goals/002-grow/goal.md",
          valid: false,
          errors: ["Missing required section: ## Hypotheses"],
        },
      ],
    });

    expect(text.split("\n")).toEqual([
      "[x] 001-ship - Valid",
      "[ ] 002-grow - Invalid",
      "   - Missing required section: ## Hypotheses",
      "",
      "Some goal files need attention.",
    ]);
  });
});

describe("persona formatting", () => {
  it("lists personas and marks the current one", () => {
    expect(formatPersonaList(catalog, "b")).toBe("  a: Alpha - First\n* b: Beta - Second");
  });

  it("truncates specializations after three", () => {
    const alpha = catalog.personas.a;
    if (!alpha) throw new Error("missing");
    expect(formatPersonaSummary({ persona: alpha })).toEqual([
      "Capabilities: x, y",
      "Specializations: s1, s2, s3...",
    ]);
  });

  it("shows N/A without specializations", () => {
    const beta = catalog.personas.b;
    if (!beta) throw new Error("missing");
    const lines = formatPersonaStatus({ id: "b", persona: beta, invalid: false }).split("\n");

    expect(lines[0]).toBe("Current Persona: b (Beta)");
    expect(lines).toContain("  Capabilities: none");
    expect(lines[lines.length - 1]).toBe("    N/A");
  });
});

describe("doctor formatting", () => {
  const result: DoctorResult = {
    ok: false,
    agentFound: true,
    checks: [
      { name: "git", category: "required", status: "error", message: "not found", url: "https://git-scm.com/downloads" },
      { name: "Node.js", category: "required", status: "ok", message: "v20.11.1" },
      { name: "docker", category: "optional", status: "warn", message: "not found (Docker containerization)" },
      { name: "claude", category: "agent", status: "ok", message: "1.0.0" },
      { name: "cursor", category: "agent", status: "warn", message: "not found (Cursor IDE)" },
    ],
  };

  it("hides missing agents unless verbose", () => {
    const lines = formatDoctorReport(result).split("\n");

    expect(lines).toContain("- [ ] git: not found (install: https://git-scm.com/downloads)");
    expect(lines).toContain("- [~] docker: not found (Docker containerization)");
    expect(lines).toContain("- [x] claude: 1.0.0");
    expect(lines).not.toContain("- [~] cursor: not found (Cursor IDE)");
    expect(lines[lines.length - 1]).toBe("Please install missing required tools before using Goal Kit.");
  });

  it("lists every agent in verbose mode", () => {
    expect(formatDoctorReport(result, true).split("\n")).toContain("- [~] cursor: not found (Cursor IDE)");
  });
});

describe("formatJson", () => {
  it("prints one escaped line", () => {
    expect(formatJson({ GOAL_DESCRIPTION: 'say "hi"\nnow' })).toBe('{"GOAL_DESCRIPTION":"say \\"hi\\"\\nnow"}');
  });
});
