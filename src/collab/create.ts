import { scaffoldNumberedEntry, type NumberedEntryKind } from "../project/numbered-entry.js";
import { readCurrentPersona } from "../personas/state.js";
import type { ScaffoldOptions, ScaffoldOutcome } from "../types.js";

export const collaborationKind: NumberedEntryKind = {
  label: "collaboration",
  parentDir: (config) => config.collaborationsDir,
  fileName: "collaboration.md",
  template: "collaboration",
  jsonKeys: { dir: "COLLAB_DIR", file: "COLLAB_FILE", description: "COLLAB_DESCRIPTION" },
  extras: async (project) => {
    const current = await readCurrentPersona(project.root);
    return { PERSONA: current.id };
  },
  tokens: (ctx) => ({
    "COLLABORATION DESCRIPTION": ctx.description,
    "###-collaboration-name": ctx.name,
    DATE: ctx.timestamp,
    PERSONA: ctx.extras.PERSONA ?? "general",
  }),
  commitMessage: (ctx) =>
    [
      `Add collaboration: ${ctx.description}`,
      "",
      `- Created collaboration definition in ${ctx.relFile}`,
      `- Branch: ${ctx.branch}`,
      `- Active persona: ${ctx.extras.PERSONA ?? "general"}`,
    ].join("\n"),
};

/** Numbered collaboration plan, branched and committed like a goal. */
export function createCollaboration(
  description: string,
  options: ScaffoldOptions = {},
): Promise<ScaffoldOutcome> {
  return scaffoldNumberedEntry(collaborationKind, description, options);
}
