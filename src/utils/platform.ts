import { randomBytes } from "node:crypto";
import { mkdir, rename, stat, unlink, writeFile } from "node:fs/promises";
import { dirname, join, relative, resolve, sep } from "node:path";
import { fileURLToPath } from "node:url";
import { isErrnoCode } from "./errors.js";

/**
 * Write content to a file atomically using temp+rename, creating the parent
 * directory first. On Windows, rename can fail while another process holds
 * the file open -- retry with backoff (50ms, 100ms, 200ms).
 */
export async function atomicWriteFile(filePath: string, content: string): Promise<void> {
  const resolved = resolve(filePath);
  await mkdir(dirname(resolved), { recursive: true });

  const tmpFile = `${resolved}.tmp.${randomBytes(4).toString("hex")}`;
  await writeFile(tmpFile, content, "utf-8");

  const delays = [50, 100, 200];
  for (let attempt = 0; attempt < delays.length; attempt++) {
    try {
      await rename(tmpFile, resolved);
      return;
    } catch (err: unknown) {
      if (attempt === delays.length - 1) {
        await unlink(tmpFile).catch(() => undefined);
        throw err;
      }
      await new Promise((r) => setTimeout(r, delays[attempt]));
    }
  }
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err: unknown) {
    if (isErrnoCode(err, "ENOENT") || isErrnoCode(err, "ENOTDIR")) return false;
    throw err;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (err: unknown) {
    if (isErrnoCode(err, "ENOENT") || isErrnoCode(err, "ENOTDIR")) return false;
    throw err;
  }
}

/**
 * Normalize a path using path.resolve and path.join.
 * Ensures consistent separators on all platforms.
 */
export function normalizePath(...segments: string[]): string {
  return resolve(join(...segments));
}

/** Path of `target` relative to `root`, always with `/` separators. */
export function toProjectPath(root: string, target: string): string {
  return relative(resolve(root), resolve(target)).split(sep).join("/");
}

/** Directory holding package.json, templates/ and data/ (from src/ or dist/). */
export function getPackageRoot(): string {
  return resolve(dirname(fileURLToPath(import.meta.url)), "..", "..");
}
