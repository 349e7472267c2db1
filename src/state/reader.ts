import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { getCurrentBranch } from "../git/repo.js";
import { listGoals } from "../goals/reader.js";
import { readCurrentPersona, type CurrentPersona } from "../personas/state.js";
import { VISION_FILE, projectPath } from "../project/paths.js";
import type { ProjectContext } from "../types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RecentGoal {
  name: string;
  title: string;
}

/** Snapshot of a project used to render agent context files. */
export interface ProjectState {
  name: string;
  branch: string;
  goalCount: number;
  recentGoals: RecentGoal[];
  persona: CurrentPersona;
  /** Up to ten non-heading lines from the top of the vision, or null. */
  visionExcerpt: string | null;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function safeRead(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, "utf-8");
  } catch {
    return null;
  }
}

/** First 20 lines of the vision, minus headings, capped at 10. */
export function visionExcerpt(content: string): string {
  return content
    .split("\n")
    .slice(0, 20)
    .filter((line) => !line.startsWith("#"))
    .slice(0, 10)
    .join("\n")
    .trim();
}

// ---------------------------------------------------------------------------
// readProjectState
// ---------------------------------------------------------------------------

export async function readProjectState(project: ProjectContext): Promise<ProjectState> {
  const goals = await listGoals(project);
  const vision = await safeRead(projectPath(project.root, VISION_FILE));

  return {
    name: basename(project.root),
    branch: getCurrentBranch(project.root),
    goalCount: goals.length,
    recentGoals: goals
      .slice(-project.config.recentGoals)
      .map((g) => ({ name: g.name, title: g.title })),
    persona: await readCurrentPersona(project.root),
    visionExcerpt: vision === null ? null : visionExcerpt(vision),
  };
}
