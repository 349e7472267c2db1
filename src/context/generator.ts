import { isoTimestamp } from "../utils/time.js";
import type { ProjectState } from "../state/reader.js";

const PRINCIPLES = [
  "**Outcome-First**: Prioritize user and business outcomes",
  "**Strategy Flexibility**: Multiple valid approaches exist for any goal",
  "**Measurement-Driven**: Progress must be measured and validated",
  "**Learning Integration**: Treat implementation as hypothesis testing",
  "**Adaptive Planning**: Change course based on evidence",
];

const COMMANDS: Array<[string, string]> = [
  ["goalkit vision", "Establish project vision and principles"],
  ["goalkit goal", "Define goals and success criteria"],
  ["goalkit strategies", "Explore implementation strategies"],
  ["goalkit milestones", "Create measurable milestones"],
  ["goalkit execution", "Execute with learning and adaptation"],
  ["goalkit report", "Summarize progress across goals"],
];

/**
 * Markdown written to every agent context file (CLAUDE.md, GEMINI.md, ...).
 * Pure: everything it shows comes from `state`.
 */
export function renderContext(state: ProjectState, now: Date = new Date()): string {
  const lines: string[] = [];
  const updated = isoTimestamp(now);

  lines.push("# Goal Kit Project Context");
  lines.push("");
  lines.push(`**Project**: ${state.name}`);
  lines.push(`**Branch**: ${state.branch}`);
  lines.push(`**Active Goals**: ${state.goalCount}`);
  lines.push(`**Updated**: ${updated}`);
  lines.push("");

  lines.push("## Goal-Driven Development Status");
  lines.push("");
  lines.push("This project uses Goal-Driven Development methodology. Focus on:");
  lines.push("- Measurable outcomes over feature specifications");
  lines.push("- Multiple strategy exploration before implementation");
  lines.push("- Learning and adaptation during execution");
  lines.push("- Success metrics validation");
  lines.push("");

  lines.push("## Available Commands");
  lines.push("");
  for (const [command, purpose] of COMMANDS) {
    lines.push(`- **${command}** - ${purpose}`);
  }
  lines.push("");

  const { id, persona } = state.persona;
  lines.push("## Active Persona");
  lines.push("");
  lines.push(`**${persona.name}** (\`${id}\`): ${persona.defaultContext}`);
  lines.push("");

  lines.push("## Project Vision");
  lines.push("");
  lines.push(state.visionExcerpt || "Vision document not yet created");
  lines.push("");

  lines.push("## Active Goals");
  lines.push("");
  if (state.recentGoals.length > 0) {
    lines.push("Recent goals:");
    for (const goal of state.recentGoals) {
      lines.push(`- **${goal.name}**: ${goal.title}`);
    }
  } else {
    lines.push("No active goals yet. Use `goalkit goal` to create your first goal.");
  }
  lines.push("");

  lines.push("## Development Principles");
  lines.push("");
  PRINCIPLES.forEach((p, i) => lines.push(`${i + 1}. ${p}`));
  lines.push("");

  lines.push("## Next Recommended Actions");
  lines.push("");
  if (state.goalCount === 0) {
    lines.push("1. Use `goalkit vision` to establish project vision");
    lines.push("2. Use `goalkit goal` to define first goal");
  } else {
    lines.push("1. Review active goals with `goalkit list`");
    lines.push("2. Use `goalkit strategies` to explore implementation approaches");
    lines.push("3. Use `goalkit milestones` to plan measurable progress steps");
  }
  lines.push("");
  lines.push("---");
  lines.push("");
  lines.push(`*This context is updated by \`goalkit context\`. Last updated: ${updated}*`);

  return `${lines.join("\n")}\n`;
}
