import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { isErrnoCode } from "../utils/errors.js";
import type { NumberedEntry } from "../types.js";

const ENTRY_PATTERN = /^(\d+)-/;

/**
 * Lowercase a free-text description into a branch/directory-safe slug:
 * drop everything outside [a-zA-Z0-9 -], turn each run of spaces into a
 * single hyphen, strip trailing hyphens.
 */
export function slugify(text: string): string {
  return text
    .replace(/[^a-zA-Z0-9 -]/g, "")
    .replace(/ +/g, "-")
    .replace(/-+$/, "")
    .toLowerCase();
}

export function formatId(id: number, width = 3): string {
  return String(id).padStart(width, "0");
}

/** Split `001-some-slug` into its number and slug, or null if unnumbered. */
export function parseEntryName(name: string): { id: number; slug: string } | null {
  const match = ENTRY_PATTERN.exec(name);
  if (!match) return null;
  return { id: Number.parseInt(match[1], 10), slug: name.slice(match[0].length) };
}

/** Immediate subdirectories of `parentDir` whose names carry a numeric prefix, by id. */
export async function listNumberedEntries(parentDir: string): Promise<NumberedEntry[]> {
  let dirents;
  try {
    dirents = await readdir(parentDir, { withFileTypes: true });
  } catch (err: unknown) {
    if (isErrnoCode(err, "ENOENT")) return [];
    throw err;
  }

  const entries: NumberedEntry[] = [];
  for (const dirent of dirents) {
    if (!dirent.isDirectory()) continue;
    const parsed = parseEntryName(dirent.name);
    if (!parsed) continue;
    entries.push({ ...parsed, name: dirent.name, dir: join(parentDir, dirent.name) });
  }

  return entries.sort((a, b) => a.id - b.id || a.name.localeCompare(b.name));
}

/**
 * Next free number under `parentDir`: highest existing prefix + 1, or 1.
 * Not guarded against concurrent callers.
 */
export async function nextSequentialId(parentDir: string): Promise<number> {
  const entries = await listNumberedEntries(parentDir);
  return entries.reduce((max, e) => Math.max(max, e.id), 0) + 1;
}
