import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { vi, type Mock } from "vitest";
import type { Logger } from "../../src/utils/log.js";

/** Fixed clock for tests: 2025-03-04 05:06:07 local time. */
export const FIXED_NOW = new Date(2025, 2, 4, 5, 6, 7);

export interface TempProject {
  root: string;
  write(rel: string, content: string): Promise<void>;
  read(rel: string): Promise<string>;
  cleanup(): Promise<void>;
}

/** A temp directory, optionally with `.goalkit/vision.md` already in place. */
export async function createTempProject(
  options: { vision?: boolean } = {},
): Promise<TempProject> {
  const root = await mkdtemp(join(tmpdir(), "goalkit-test-"));
  const project: TempProject = {
    root,
    async write(rel, content) {
      const target = join(root, rel);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, content, "utf-8");
    },
    read: (rel) => readFile(join(root, rel), "utf-8"),
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
  if (options.vision ?? true) {
    await project.write(".goalkit/vision.md", "# Vision: Test Project\n\nShip useful things.\n");
  }
  return project;
}

/** Logger whose methods are spies, for asserting on messages. */
export type SpyLogger = { [K in keyof Logger]: Mock<(message: string) => void> };

export function createSpyLogger(): SpyLogger {
  return {
    info: vi.fn<(message: string) => void>(),
    success: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string) => void>(),
    step: vi.fn<(message: string) => void>(),
    detail: vi.fn<(message: string) => void>(),
    debug: vi.fn<(message: string) => void>(),
  };
}
