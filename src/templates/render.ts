// ── Templates ───────────────────────────────────────────────────────
// Markdown templates with literal [PLACEHOLDER] tokens. A project can
// override any bundled template with .goalkit/templates/<name>-template.md.

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { getPackageRoot, pathExists } from "../utils/platform.js";
import { projectPath } from "../project/paths.js";

export type TemplateValues = Record<string, string>;

export function bundledTemplatePath(name: string): string {
  return join(getPackageRoot(), "templates", `${name}.md`);
}

export function projectTemplatePath(root: string, templatesDir: string, name: string): string {
  return join(projectPath(root, templatesDir), `${name}-template.md`);
}

export async function loadTemplate(
  root: string,
  templatesDir: string,
  name: string,
): Promise<{ content: string; source: "project" | "bundled"; path: string }> {
  const override = projectTemplatePath(root, templatesDir, name);
  if (await pathExists(override)) {
    return { content: await readFile(override, "utf-8"), source: "project", path: override };
  }
  const bundled = bundledTemplatePath(name);
  return { content: await readFile(bundled, "utf-8"), source: "bundled", path: bundled };
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Replace every `[KEY]` for each key in `values` in a single pass, so a
 * value that itself contains a token is inserted verbatim. `$` sequences
 * in values are not interpreted and bracket text without a matching key is
 * left alone.
 */
export function renderTemplate(template: string, values: TemplateValues): string {
  const keys = Object.keys(values);
  if (keys.length === 0) return template;
  const pattern = new RegExp(keys.map((k) => escapeRegExp(`[${k}]`)).join("|"), "g");
  return template.replace(pattern, (token) => values[token.slice(1, -1)] ?? token);
}
