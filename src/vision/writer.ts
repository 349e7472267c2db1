import { mkdir, writeFile } from "node:fs/promises";
import { basename, dirname } from "node:path";
import { updateAgentContext } from "../context/updater.js";
import { commitPaths } from "../git/repo.js";
import { GOALKIT_DIR, VISION_FILE, openProject, projectPath } from "../project/paths.js";
import { loadTemplate, renderTemplate } from "../templates/render.js";
import { openInEditor } from "../utils/editor.js";
import { errorMessage } from "../utils/errors.js";
import { silentLogger } from "../utils/log.js";
import { pathExists } from "../utils/platform.js";
import { isoTimestamp } from "../utils/time.js";
import type { ScaffoldOptions, ScaffoldOutcome } from "../types.js";

export interface VisionOptions extends ScaffoldOptions {
  /** Open an existing vision in $EDITOR. */
  edit?: boolean;
  openEditor?: (filePath: string) => void;
}

/**
 * Create `.goalkit/vision.md`, the file that marks a directory as a Goal Kit
 * project. Only needs a git repository.
 */
export async function createVision(
  projectName: string | undefined,
  options: VisionOptions = {},
): Promise<ScaffoldOutcome> {
  const logger = options.logger ?? silentLogger;
  const project = await openProject(options.cwd, { requireVision: false });
  const file = projectPath(project.root, VISION_FILE);
  const payload = { VISION_FILE, VISION_DIR: GOALKIT_DIR };

  if (options.json) return { status: "planned", payload };

  if (await pathExists(file)) {
    if (options.edit) {
      logger.debug("Opening vision file for editing");
      (options.openEditor ?? openInEditor)(file);
      return { status: "opened", payload, file: VISION_FILE };
    }
    if (!options.force) {
      return {
        status: "skipped",
        payload,
        reason: `Vision file already exists: ${VISION_FILE} (use --edit to open it or --force to overwrite)`,
      };
    }
  }

  if (options.dryRun) {
    return { status: "dry-run", payload, actions: [`Would create vision file: ${VISION_FILE}`] };
  }

  const name = projectName?.trim() || basename(project.root);
  const template = await loadTemplate(project.root, project.config.templatesDir, "vision");
  logger.debug(`Using ${template.source} template: ${template.path}`);
  await mkdir(dirname(file), { recursive: true });
  await writeFile(
    file,
    renderTemplate(template.content, { "PROJECT NAME": name, DATE: isoTimestamp(options.now) }),
    "utf-8",
  );
  logger.success(`Created vision.md: ${VISION_FILE}`);

  let committed = false;
  if (project.config.autoCommit) {
    try {
      committed = commitPaths([VISION_FILE], "Add project vision", project.root);
      if (committed) logger.success("Vision committed to repository");
    } catch (err: unknown) {
      logger.warn(`Failed to commit vision file: ${errorMessage(err)}`);
    }
  }

  try {
    await updateAgentContext(project, { now: options.now });
  } catch (err: unknown) {
    logger.warn(`Could not update agent context: ${errorMessage(err)}`);
  }

  return { status: "created", payload, files: [VISION_FILE], committed };
}
