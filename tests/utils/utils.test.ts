import { describe, it, expect, vi, afterEach } from "vitest";
import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { confirmOverwrite } from "../../src/documents/overwrite.js";
import { resolveEditor } from "../../src/utils/editor.js";
import { GoalKitError } from "../../src/utils/errors.js";
import { createLogger } from "../../src/utils/log.js";
import { atomicWriteFile, toProjectPath } from "../../src/utils/platform.js";
import { plural } from "../../src/utils/text.js";
import { isoTimestamp, localDate } from "../../src/utils/time.js";
import { createTempProject, type TempProject } from "../helpers/project.js";

describe("time", () => {
  it("formats UTC timestamps without milliseconds", () => {
    expect(isoTimestamp(new Date(Date.UTC(2025, 0, 2, 3, 4, 5, 678)))).toBe("2025-01-02T03:04:05Z");
  });

  it("formats local dates", () => {
    expect(localDate(new Date(2025, 11, 9, 23, 59))).toBe("2025-12-09");
  });
});

describe("resolveEditor", () => {
  it("prefers VISUAL, then EDITOR, then vi", () => {
    expect(resolveEditor({ VISUAL: "code -w", EDITOR: "nano" })).toBe("code -w");
    expect(resolveEditor({ EDITOR: "nano" })).toBe("nano");
    expect(resolveEditor({})).toBe("vi");
  });
});

describe("platform", () => {
  let project: TempProject | undefined;

  afterEach(async () => {
    await project?.cleanup();
    project = undefined;
  });

  it("writes atomically and leaves no temp files", async () => {
    project = await createTempProject({ vision: false });
    const target = join(project.root, "nested", "state.txt");

    await atomicWriteFile(target, "one\n");
    await atomicWriteFile(target, "two\n");

    expect(await readFile(target, "utf-8")).toBe("two\n");
    expect(await readdir(join(project.root, "nested"))).toEqual(["state.txt"]);
  });

  it("builds project-relative paths with forward slashes", () => {
    expect(toProjectPath("/repo", join("/repo", ".goalkit", "goals", "001-x"))).toBe(".goalkit/goals/001-x");
  });
});

describe("plural", () => {
  it("adds an s except for one", () => {
    expect(plural(1, "file")).toBe("1 file");
    expect(plural(3, "file")).toBe("3 files");
  });
});

describe("confirmOverwrite", () => {
  it("allows with --force without asking", async () => {
    const confirm = vi.fn(async () => false);
    await expect(confirmOverwrite("a.md", { force: true, confirm })).resolves.toBe(true);
    expect(confirm).not.toHaveBeenCalled();
  });

  it("throws without a way to ask", async () => {
    await expect(confirmOverwrite("a.md", {})).rejects.toThrow(GoalKitError);
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("sends everything to stderr in JSON mode", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const logger = createLogger({ stderrOnly: true });
    logger.info("hello");
    logger.detail("plain");

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(2);
    expect(error).toHaveBeenLastCalledWith("plain");
  });

  it("prints debug lines only when verbose", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    createLogger().debug("hidden");
    expect(log).not.toHaveBeenCalled();

    createLogger({ verbose: true }).debug("shown");
    expect(log).toHaveBeenCalledTimes(1);
  });
});
