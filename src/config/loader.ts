import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { ZodError } from "zod";
import { goalkitConfigSchema } from "./schema.js";
import { GoalKitError, isErrnoCode } from "../utils/errors.js";
import type { GoalKitConfig } from "../types.js";

export const CONFIG_FILE = join(".goalkit", "config.json");

export async function loadConfig(
  projectDir: string = process.cwd(),
): Promise<GoalKitConfig> {
  let raw: unknown;

  try {
    const content = await readFile(join(projectDir, CONFIG_FILE), "utf-8");
    raw = JSON.parse(content);
  } catch (err: unknown) {
    if (isErrnoCode(err, "ENOENT")) {
      // No config file: defaults
      raw = {};
    } else if (err instanceof SyntaxError) {
      throw new GoalKitError(`Invalid JSON in ${CONFIG_FILE}: ${err.message}`);
    } else {
      throw err;
    }
  }

  try {
    return goalkitConfigSchema.parse(raw);
  } catch (err: unknown) {
    if (err instanceof ZodError) {
      const issues = err.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ");
      throw new GoalKitError(`Invalid ${CONFIG_FILE}: ${issues}`);
    }
    throw err;
  }
}
