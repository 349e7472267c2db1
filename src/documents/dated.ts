import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { commitPaths } from "../git/repo.js";
import { listGoals, resolveGoalRef } from "../goals/reader.js";
import { slugify } from "../project/ids.js";
import { REPORTS_DIR, REVIEWS_DIR, openProject } from "../project/paths.js";
import { loadTemplate, renderTemplate, type TemplateValues } from "../templates/render.js";
import { openInEditor } from "../utils/editor.js";
import { GoalKitError } from "../utils/errors.js";
import { silentLogger } from "../utils/log.js";
import { pathExists, toProjectPath } from "../utils/platform.js";
import { isoTimestamp, localDate } from "../utils/time.js";
import type { JsonPayload, ProjectContext, ScaffoldOptions, ScaffoldOutcome } from "../types.js";

export interface DatedDocumentOptions extends ScaffoldOptions {
  /** Open an existing document in $EDITOR instead of skipping it. */
  edit?: boolean;
  /** Editor launcher, replaced in tests. */
  openEditor?: (filePath: string) => void;
}

interface DatedDocumentPlan {
  project: ProjectContext;
  dir: string;
  file: string;
  label: string;
  template: string;
  payload: JsonPayload;
  values: TemplateValues;
  commitMessage: string;
}

/**
 * Shared tail of report and review creation: one file per day; an existing
 * one is skipped (or opened with --edit) unless --force is given.
 */
async function writeDatedDocument(
  plan: DatedDocumentPlan,
  options: DatedDocumentOptions,
): Promise<ScaffoldOutcome> {
  const logger = options.logger ?? silentLogger;
  const { project, payload } = plan;
  const relFile = toProjectPath(project.root, plan.file);

  if (options.json) return { status: "planned", payload };

  if (await pathExists(plan.file)) {
    if (options.edit) {
      logger.debug(`Opening ${relFile} for editing`);
      (options.openEditor ?? openInEditor)(plan.file);
      return { status: "opened", payload, file: relFile };
    }
    if (!options.force) {
      return {
        status: "skipped",
        payload,
        reason: `${plan.label} already exists for this date: ${relFile}`,
      };
    }
  }

  if (options.dryRun) {
    return { status: "dry-run", payload, actions: [`Would create ${plan.label.toLowerCase()}: ${relFile}`] };
  }

  const template = await loadTemplate(project.root, project.config.templatesDir, plan.template);
  await mkdir(plan.dir, { recursive: true });
  logger.debug(`Using ${template.source} template: ${template.path}`);
  await writeFile(plan.file, renderTemplate(template.content, plan.values), "utf-8");
  logger.success(`Created ${plan.label.toLowerCase()}: ${relFile}`);

  let committed = false;
  if (project.config.autoCommit) {
    committed = commitPaths([relFile], plan.commitMessage, project.root);
  }

  return { status: "created", payload, files: [relFile], committed };
}

// ---------------------------------------------------------------------------
// Reports
// ---------------------------------------------------------------------------

/**
 * Progress report for the whole project, or for one goal when `goalRef` is
 * given: `.goalkit/reports/progress-report-<date>.md` or
 * `.goalkit/reports/report-<goal>-<date>.md`.
 */
export async function createReport(
  goalRef: string | undefined,
  options: DatedDocumentOptions = {},
): Promise<ScaffoldOutcome> {
  const project = await openProject(options.cwd);
  const goal = goalRef ? await resolveGoalRef(project, goalRef, options.cwd) : undefined;
  const reportDate = localDate(options.now);
  const dir = join(project.root, REPORTS_DIR);
  const fileName = goal
    ? `report-${goal.name}-${reportDate}.md`
    : `progress-report-${reportDate}.md`;
  const file = join(dir, fileName);

  const goals = await listGoals(project);
  const scoped = goal ? goals.filter((g) => g.name === goal.name) : goals;
  const goalList = scoped.length > 0
    ? scoped.map((g) => `- **${g.name}**: ${g.title} (${g.status ?? "Unknown"})`).join("\n")
    : "- No goals yet";

  return writeDatedDocument(
    {
      project,
      dir,
      file,
      label: "Report",
      template: "report",
      payload: {
        REPORT_FILE: toProjectPath(project.root, file),
        REPORT_DIR: REPORTS_DIR,
        REPORT_DATE: reportDate,
      },
      values: {
        DATE: isoTimestamp(options.now),
        REPORT_DATE: reportDate,
        REPORT_SCOPE: goal ? goal.name : "All goals",
        "GOAL COUNT": String(scoped.length),
        "GOAL LIST": goalList,
      },
      commitMessage: goal
        ? `Add progress report for goal ${goal.name} on ${reportDate}`
        : `Add progress report for ${reportDate}`,
    },
    options,
  );
}

// ---------------------------------------------------------------------------
// Reviews
// ---------------------------------------------------------------------------

/**
 * Dated review: `.goalkit/reviews/review-<type>-<date>.md`. The
 * `retrospective` type has its own template.
 */
export async function createReview(
  reviewType: string | undefined,
  options: DatedDocumentOptions = {},
): Promise<ScaffoldOutcome> {
  const type = slugify(reviewType?.trim() || "general");
  if (!type) {
    throw new GoalKitError(`Invalid review type: ${reviewType ?? ""}`);
  }

  const project = await openProject(options.cwd);
  const reviewDate = localDate(options.now);
  const dir = join(project.root, REVIEWS_DIR);
  const file = join(dir, `review-${type}-${reviewDate}.md`);

  return writeDatedDocument(
    {
      project,
      dir,
      file,
      label: "Review",
      template: type === "retrospective" ? "review-retrospective" : "review",
      payload: {
        REVIEW_FILE: toProjectPath(project.root, file),
        REVIEW_DIR: REVIEWS_DIR,
        REVIEW_DATE: reviewDate,
        REVIEW_TYPE: type,
      },
      values: {
        DATE: isoTimestamp(options.now),
        REVIEW_DATE: reviewDate,
        REVIEW_TYPE: type,
      },
      commitMessage: `Add ${type} review for ${reviewDate}`,
    },
    options,
  );
}
