import { GoalKitError } from "../utils/errors.js";
import type { ScaffoldOptions } from "../types.js";

/**
 * Decide whether an existing file may be replaced: --force always wins,
 * otherwise the user is asked. Without a terminal to ask on, refuse.
 */
export async function confirmOverwrite(
  relPath: string,
  options: Pick<ScaffoldOptions, "force" | "confirm" | "logger">,
): Promise<boolean> {
  if (options.force) {
    options.logger?.info("Overwriting due to --force option");
    return true;
  }
  if (!options.confirm) {
    throw new GoalKitError(`Refusing to overwrite ${relPath}: non-interactive mode and --force not set`, {
      hint: "Re-run with --force to overwrite",
    });
  }
  return options.confirm(`Overwrite existing ${relPath}? (y/N): `);
}
