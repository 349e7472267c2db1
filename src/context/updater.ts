import { projectPath } from "../project/paths.js";
import { readProjectState, type ProjectState } from "../state/reader.js";
import { atomicWriteFile, pathExists } from "../utils/platform.js";
import { renderContext } from "./generator.js";
import type { ProjectContext } from "../types.js";

export interface UpdateContextOptions {
  /** Write every configured file, creating the missing ones. */
  force?: boolean;
  now?: Date;
}

export interface UpdateContextResult {
  /** Project-relative paths that were written. */
  updated: string[];
  content: string;
  state: ProjectState;
}

/**
 * Regenerate the agent context and write it to each configured context file
 * that already exists (all of them with `force`).
 */
export async function updateAgentContext(
  project: ProjectContext,
  options: UpdateContextOptions = {},
): Promise<UpdateContextResult> {
  const state = await readProjectState(project);
  const content = renderContext(state, options.now);
  const updated: string[] = [];

  for (const rel of project.config.contextFiles) {
    const target = projectPath(project.root, rel);
    if (!options.force && !(await pathExists(target))) continue;
    await atomicWriteFile(target, content);
    updated.push(rel);
  }

  return { updated, content, state };
}
