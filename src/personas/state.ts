import { readFile } from "node:fs/promises";
import { updateAgentContext } from "../context/updater.js";
import { PERSONA_STATE_FILE, openProject, projectPath } from "../project/paths.js";
import { GoalKitError, errorMessage, isErrnoCode } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/log.js";
import { atomicWriteFile } from "../utils/platform.js";
import { findPersona, loadPersonaCatalog, personaIds, type Persona } from "./catalog.js";

export interface CurrentPersona {
  id: string;
  persona: Persona;
  /** Raw content of the state file, when there is one. */
  stored?: string;
  /** The state file names a persona the catalog does not know. */
  invalid: boolean;
}

/**
 * Active persona from `.goalkit/personas/current_persona.txt`. Missing or
 * unknown values fall back to the catalog default.
 */
export async function readCurrentPersona(root: string): Promise<CurrentPersona> {
  const catalog = await loadPersonaCatalog();
  let stored: string | undefined;
  try {
    stored = (await readFile(projectPath(root, PERSONA_STATE_FILE), "utf-8")).trim();
  } catch (err: unknown) {
    if (!isErrnoCode(err, "ENOENT")) throw err;
  }

  const known = stored ? findPersona(catalog, stored) : undefined;
  if (stored && known) {
    return { id: stored, persona: known, stored, invalid: false };
  }

  const id = catalog.defaultPersona;
  const fallback = findPersona(catalog, id);
  if (!fallback) {
    throw new GoalKitError(`Default persona is missing from the catalog: ${id}`);
  }
  return { id, persona: fallback, stored, invalid: Boolean(stored) };
}

export interface SwitchPersonaOptions {
  cwd?: string;
  logger?: Logger;
  now?: Date;
}

export async function switchPersona(
  target: string,
  options: SwitchPersonaOptions = {},
): Promise<{ id: string; persona: Persona; contextFiles: string[] }> {
  const logger = options.logger ?? silentLogger;
  const id = target.trim();
  const catalog = await loadPersonaCatalog();
  const persona = findPersona(catalog, id);
  if (!persona) {
    throw new GoalKitError(`Invalid persona: ${id}`, {
      hint: `Valid personas: ${personaIds(catalog).join(" ")}`,
    });
  }

  const project = await openProject(options.cwd);
  await atomicWriteFile(projectPath(project.root, PERSONA_STATE_FILE), `${id}\n`);

  let contextFiles: string[] = [];
  try {
    contextFiles = (await updateAgentContext(project, { now: options.now })).updated;
  } catch (err: unknown) {
    logger.warn(`Could not update agent context: ${errorMessage(err)}`);
  }

  return { id, persona, contextFiles };
}
