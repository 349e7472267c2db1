import type { DoctorCheck, DoctorResult } from "../doctor.js";
import type { ValidateResult } from "../goals/validate.js";
import type { CurrentPersona } from "../personas/state.js";
import type { PersonaCatalog } from "../personas/catalog.js";
import { GOAL_DOCUMENT_KINDS } from "../documents/registry.js";
import type { GoalSummary } from "../types.js";

/** Markdown table of goals, or a hint when there are none. */
export function formatGoalList(goals: GoalSummary[]): string {
  if (goals.length === 0) {
    return "No goals yet. Use `goalkit goal <description>` to create one.";
  }

  const lines: string[] = [];
  lines.push("### Goals");
  lines.push("| Goal | Status | Documents | Title |");
  lines.push("|------|--------|-----------|-------|");
  for (const g of goals) {
    const docs = `${g.documents.length}/${GOAL_DOCUMENT_KINDS.length}`;
    lines.push(`| ${g.name} | ${g.status ?? "—"} | ${docs} | ${g.title} |`);
  }
  return lines.join("\n");
}

export function formatGoalDetail(goal: GoalSummary): string {
  const lines: string[] = [];
  lines.push(`## ${goal.name}`);
  lines.push(`**Title:** ${goal.title}`);
  lines.push(`**Status:** ${goal.status ?? "Unknown"}`);
  if (goal.created) lines.push(`**Created:** ${goal.created}`);
  lines.push(`**Path:** ${goal.path}`);
  lines.push("");
  lines.push("### Documents");
  lines.push(`- ${goal.hasGoalFile ? "[x]" : "[ ]"} goal.md`);
  for (const kind of GOAL_DOCUMENT_KINDS) {
    const icon = goal.documents.includes(kind.fileName) ? "[x]" : "[ ]";
    lines.push(`- ${icon} ${kind.fileName} (\`goalkit ${kind.command}\`)`);
  }
  return lines.join("\n");
}

/** One line per goal, its problems indented below, then a verdict. */
export function formatValidation(result: ValidateResult): string {
  const lines: string[] = [];
  for (const r of result.results) {
    lines.push(`${r.valid ? "[x]" : "[ ]"} ${r.goal} - ${r.valid ? "Valid" : "Invalid"}`);
    for (const error of r.errors) lines.push(`   - ${error}`);
  }
  lines.push("");
  lines.push(result.ok ? "All goal files passed validation." : "Some goal files need attention.");
  return lines.join("\n");
}

// ── Personas ────────────────────────────────────────────────────────

export function formatPersonaList(catalog: PersonaCatalog, currentId?: string): string {
  return Object.entries(catalog.personas)
    .map(([id, p]) => `${id === currentId ? "*" : " "} ${id}: ${p.name} - ${p.description}`)
    .join("\n");
}

/** Capabilities, then at most three specializations with an ellipsis. */
export function formatPersonaSummary(current: Pick<CurrentPersona, "persona">): string[] {
  const { persona } = current;
  const specs = persona.specializations;
  const shown = specs.slice(0, 3).join(", ") + (specs.length > 3 ? "..." : "");
  return [
    `Capabilities: ${persona.capabilities.join(", ") || "none"}`,
    `Specializations: ${shown || "N/A"}`,
  ];
}

export function formatPersonaStatus(current: CurrentPersona): string {
  const { id, persona } = current;
  const lines: string[] = [];
  lines.push(`Current Persona: ${id} (${persona.name})`);
  lines.push(`Description: ${persona.description}`);
  lines.push("");
  lines.push("Persona Details:");
  lines.push(`  Name: ${persona.name}`);
  lines.push(`  Capabilities: ${persona.capabilities.join(", ") || "none"}`);
  lines.push("  Specializations:");
  if (persona.specializations.length === 0) {
    lines.push("    N/A");
  } else {
    for (const spec of persona.specializations) lines.push(`    - ${spec}`);
  }
  return lines.join("\n");
}

// ── Doctor ──────────────────────────────────────────────────────────

const SECTION_TITLES: Record<DoctorCheck["category"], string> = {
  required: "Required tools",
  optional: "Optional tools",
  agent: "AI agent tools",
};

function formatCheck(check: DoctorCheck): string {
  const icon = check.status === "ok" ? "[x]" : check.status === "warn" ? "[~]" : "[ ]";
  const install = check.status !== "ok" && check.url ? ` (install: ${check.url})` : "";
  return `- ${icon} ${check.name}: ${check.message}${install}`;
}

/**
 * Tool report. Missing agent CLIs are only listed in verbose mode or when
 * none was found at all.
 */
export function formatDoctorReport(result: DoctorResult, verbose = false): string {
  const lines: string[] = [];
  lines.push("## Goal Kit Prerequisites");

  for (const category of ["required", "optional", "agent"] as const) {
    const checks = result.checks.filter((c) => c.category === category);
    const shown =
      category === "agent" && !verbose && result.agentFound
        ? checks.filter((c) => c.status === "ok")
        : checks;
    lines.push("");
    lines.push(`### ${SECTION_TITLES[category]}`);
    for (const check of shown) lines.push(formatCheck(check));
  }

  lines.push("");
  if (!result.agentFound) {
    lines.push("No AI agent tools found. For best experience, install at least one.");
  }
  lines.push(
    result.ok
      ? "All required tools are installed."
      : "Please install missing required tools before using Goal Kit.",
  );
  return lines.join("\n");
}
