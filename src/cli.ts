#!/usr/bin/env node

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import pc from "picocolors";
import { z } from "zod";
import { createCollaboration } from "./collab/create.js";
import { updateAgentContext } from "./context/updater.js";
import { createReport, createReview } from "./documents/dated.js";
import { GOAL_DOCUMENT_KINDS } from "./documents/registry.js";
import { writeGoalDocument } from "./documents/writer.js";
import { runDoctor } from "./doctor.js";
import { createGoal } from "./goals/create.js";
import { listGoals, readGoalSummary, resolveGoalRef } from "./goals/reader.js";
import { setupGoal } from "./goals/setup.js";
import { updateGoalStatus } from "./goals/status.js";
import { validateGoals } from "./goals/validate.js";
import { loadPersonaCatalog, type PersonaColor } from "./personas/catalog.js";
import { readCurrentPersona, switchPersona } from "./personas/state.js";
import { findGoalKitRoot, openProject } from "./project/paths.js";
import {
  formatDoctorReport,
  formatGoalDetail,
  formatGoalList,
  formatPersonaList,
  formatPersonaStatus,
  formatPersonaSummary,
  formatValidation,
} from "./reporter/human.js";
import { formatJson } from "./reporter/json.js";
import { createLogger, type Logger } from "./utils/log.js";
import { GoalKitError, errorMessage } from "./utils/errors.js";
import { getPackageRoot } from "./utils/platform.js";
import { terminalConfirm } from "./utils/prompt.js";
import { plural } from "./utils/text.js";
import { createVision } from "./vision/writer.js";
import type { ScaffoldOptions, ScaffoldOutcome } from "./types.js";

const cliPkgVersion = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(getPackageRoot(), "package.json"), "utf-8"))).version;

interface CommandFlags {
  force?: boolean;
  json?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  edit?: boolean;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function loggerFor(flags: CommandFlags): Logger {
  return createLogger({ verbose: flags.verbose, stderrOnly: flags.json });
}

function scaffoldOptions(flags: CommandFlags, logger: Logger): ScaffoldOptions {
  return {
    dryRun: flags.dryRun,
    force: flags.force,
    json: flags.json,
    verbose: flags.verbose,
    logger,
    confirm: terminalConfirm(),
  };
}

/** Run a command body, turning thrown errors into `[ERROR]` lines and exit 1. */
async function run(flags: CommandFlags, body: (logger: Logger) => Promise<void>): Promise<void> {
  const logger = loggerFor(flags);
  try {
    await body(logger);
  } catch (err: unknown) {
    logger.error(errorMessage(err));
    if (err instanceof GoalKitError) {
      if (err.hint) logger.info(err.hint);
      process.exit(err.exitCode);
    }
    process.exit(1);
  }
}

function printOutcome(outcome: ScaffoldOutcome, logger: Logger, nextSteps: string[] = []): void {
  switch (outcome.status) {
    case "planned":
      console.log(formatJson(outcome.payload));
      return;
    case "dry-run":
      logger.info("Dry run - no files were written");
      for (const action of outcome.actions) logger.detail(`  - ${action}`);
      return;
    case "skipped":
      logger.warn(outcome.reason);
      return;
    case "cancelled":
      return;
    case "opened":
      logger.info(`Opened ${outcome.file}`);
      return;
    case "created":
      logger.detail("");
      for (const [key, value] of Object.entries(outcome.payload)) {
        logger.detail(`  ${key}: ${value}`);
      }
      if (!outcome.committed) logger.debug("Nothing was committed");
      if (nextSteps.length > 0) {
        logger.detail("");
        logger.info("Next Steps:");
        nextSteps.forEach((step, i) => logger.detail(`  ${i + 1}. ${step}`));
      }
      return;
  }
}

const PERSONA_COLORS: Record<PersonaColor, (text: string) => string> = {
  blue: pc.blue,
  orange: pc.yellow,
  green: pc.green,
  purple: pc.magenta,
  red: pc.red,
  teal: pc.cyan,
};

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name("goalkit")
  .description("Goal Kit: scaffolding for goal-driven development")
  .version(cliPkgVersion);

program
  .command("vision")
  .description("Create the project vision (.goalkit/vision.md)")
  .argument("[name]", "Project name (defaults to the repository directory name)")
  .option("--edit", "Open an existing vision in $EDITOR")
  .option("--force", "Overwrite an existing vision")
  .option("--json", "Print the target paths as JSON and exit")
  .option("--dry-run", "Show what would be done without writing")
  .option("--verbose", "Print debug output")
  .action(async (name: string | undefined, flags: CommandFlags) => {
    await run(flags, async (logger) => {
      const outcome = await createVision(name, { ...scaffoldOptions(flags, logger), edit: flags.edit });
      printOutcome(outcome, logger, [
        "Edit the vision file to add your project details",
        "Define core principles and success criteria",
        "Use `goalkit goal` to define specific goals",
      ]);
    });
  });

program
  .command("goal")
  .description("Create a numbered goal with its own branch")
  .argument("<description...>", "What the goal should achieve")
  .option("--force", "Rewrite goal.md of an existing goal with the same name")
  .option("--json", "Print the target paths as JSON and exit")
  .option("--dry-run", "Show what would be done without writing")
  .option("--verbose", "Print debug output")
  .action(async (words: string[], flags: CommandFlags) => {
    await run(flags, async (logger) => {
      const outcome = await createGoal(words.join(" "), scaffoldOptions(flags, logger));
      printOutcome(outcome, logger, [
        "Edit goal.md to define success criteria and metrics",
        "Use `goalkit strategies` to explore implementation approaches",
        "Use `goalkit milestones` to plan measurable progress steps",
      ]);
    });
  });

program
  .command("collaboration")
  .description("Create a numbered collaboration plan with its own branch")
  .argument("<description...>", "What the collaboration is about")
  .option("--force", "Rewrite an existing collaboration with the same name")
  .option("--json", "Print the target paths as JSON and exit")
  .option("--dry-run", "Show what would be done without writing")
  .option("--verbose", "Print debug output")
  .action(async (words: string[], flags: CommandFlags) => {
    await run(flags, async (logger) => {
      const outcome = await createCollaboration(words.join(" "), scaffoldOptions(flags, logger));
      printOutcome(outcome, logger, [
        "Edit collaboration.md to assign agents and coordination points",
        "Use `goalkit persona switch <id>` to change the active persona",
      ]);
    });
  });

for (const kind of GOAL_DOCUMENT_KINDS) {
  program
    .command(kind.command)
    .description(kind.description)
    .argument(
      kind.requiresGoalFile ? "[goal]" : "<goal>",
      "Goal number, directory name or path",
    )
    .option("--force", "Overwrite an existing document without asking")
    .option("--json", "Print the target paths as JSON and exit")
    .option("--dry-run", "Show what would be done without writing")
    .option("--verbose", "Print debug output")
    .action(async (goal: string | undefined, flags: CommandFlags) => {
      await run(flags, async (logger) => {
        const outcome = await writeGoalDocument(kind, goal, scaffoldOptions(flags, logger));
        printOutcome(outcome, logger);
      });
    });
}

program
  .command("setup")
  .description("Create any missing strategies.md, milestones.md and execution.md for a goal")
  .argument("[goal]", "Goal number, directory name or path (defaults to the current goal directory)")
  .option("--force", "Recreate the planning documents even if they exist")
  .option("--json", "Print the target paths as JSON and exit")
  .option("--dry-run", "Show what would be done without writing")
  .option("--verbose", "Print debug output")
  .action(async (goal: string | undefined, flags: CommandFlags) => {
    await run(flags, async (logger) => {
      const outcome = await setupGoal(goal, scaffoldOptions(flags, logger));
      printOutcome(outcome, logger, [
        "Use `goalkit strategies` to explore implementation approaches",
        "Use `goalkit milestones` to refine milestone definitions",
      ]);
    });
  });

program
  .command("validate")
  .description("Check goal.md files for required sections and unfilled placeholders")
  .argument("[goals...]", "Goals to check (defaults to every goal)")
  .option("--json", "Output JSON")
  .option("--verbose", "Print debug output")
  .action(async (refs: string[], flags: CommandFlags) => {
    await run(flags, async (logger) => {
      const result = await validateGoals(refs, { logger });
      if (flags.json) {
        console.log(formatJson(result));
      } else if (result.results.length === 0) {
        logger.warn("No goals to validate");
      } else {
        logger.detail(formatValidation(result));
      }
      if (!result.ok) process.exit(1);
    });
  });

program
  .command("report")
  .description("Create a dated progress report")
  .argument("[goal]", "Limit the report to one goal")
  .option("--edit", "Open today's report in $EDITOR if it exists")
  .option("--force", "Overwrite today's report")
  .option("--json", "Print the target paths as JSON and exit")
  .option("--dry-run", "Show what would be done without writing")
  .option("--verbose", "Print debug output")
  .action(async (goal: string | undefined, flags: CommandFlags) => {
    await run(flags, async (logger) => {
      const outcome = await createReport(goal, { ...scaffoldOptions(flags, logger), edit: flags.edit });
      printOutcome(outcome, logger);
    });
  });

program
  .command("review")
  .description("Create a dated review (general, retrospective, ...)")
  .argument("[type]", "Review type", "general")
  .option("--force", "Overwrite today's review of this type")
  .option("--json", "Print the target paths as JSON and exit")
  .option("--dry-run", "Show what would be done without writing")
  .option("--verbose", "Print debug output")
  .action(async (type: string, flags: CommandFlags) => {
    await run(flags, async (logger) => {
      const outcome = await createReview(type, scaffoldOptions(flags, logger));
      printOutcome(outcome, logger);
    });
  });

program
  .command("list")
  .description("List goals with their status")
  .option("--json", "Output JSON")
  .action(async (flags: CommandFlags) => {
    await run(flags, async () => {
      const project = await openProject(process.cwd(), { requireGit: false });
      const goals = await listGoals(project);
      console.log(flags.json ? formatJson(goals) : formatGoalList(goals));
    });
  });

program
  .command("show")
  .description("Show one goal and which planning documents it has")
  .argument("<goal>", "Goal number, directory name or path")
  .option("--json", "Output JSON")
  .action(async (ref: string, flags: CommandFlags) => {
    await run(flags, async () => {
      const project = await openProject(process.cwd(), { requireGit: false });
      const goal = await readGoalSummary(project, await resolveGoalRef(project, ref));
      console.log(flags.json ? formatJson(goal) : formatGoalDetail(goal));
    });
  });

program
  .command("status")
  .description("Set the status of a goal (draft, planned, in_progress, completed, blocked)")
  .argument("<goal>", "Goal number, directory name or path")
  .argument("<status>", "New status")
  .option("--json", "Print the target paths as JSON and exit")
  .option("--dry-run", "Show what would be done without writing")
  .option("--verbose", "Print debug output")
  .action(async (ref: string, status: string, flags: CommandFlags) => {
    await run(flags, async (logger) => {
      const outcome = await updateGoalStatus(ref, status, scaffoldOptions(flags, logger));
      printOutcome(outcome, logger);
    });
  });

// ── Personas ────────────────────────────────────────────────────────

const persona = program.command("persona").description("Manage the active agent persona");

persona
  .command("list")
  .description("List available personas")
  .option("--json", "Output JSON")
  .action(async (flags: CommandFlags) => {
    await run(flags, async (logger) => {
      const catalog = await loadPersonaCatalog();
      if (flags.json) {
        console.log(formatJson(catalog));
        return;
      }
      const root = await findGoalKitRoot(process.cwd());
      const current = root ? await readCurrentPersona(root) : undefined;
      logger.info("Available Personas:");
      logger.detail(formatPersonaList(catalog, current?.id));
    });
  });

persona
  .command("current")
  .description("Show the active persona")
  .option("--json", "Output JSON")
  .action(async (flags: CommandFlags) => {
    await run(flags, async (logger) => {
      const project = await openProject(process.cwd(), { requireVision: false, requireGit: false });
      const current = await readCurrentPersona(project.root);
      if (flags.json) {
        console.log(formatJson({ id: current.id, ...current.persona }));
        return;
      }
      if (current.invalid) {
        logger.warn(`Unknown persona "${current.stored ?? ""}" in state file, using ${current.id}`);
      }
      const paint = PERSONA_COLORS[current.persona.color];
      logger.detail(`Current Persona: ${paint(current.id)} (${current.persona.name})`);
      logger.detail(`Description: ${current.persona.description}`);
    });
  });

persona
  .command("status")
  .description("Show details of the active persona")
  .option("--json", "Output JSON")
  .action(async (flags: CommandFlags) => {
    await run(flags, async (logger) => {
      const project = await openProject(process.cwd(), { requireVision: false, requireGit: false });
      const current = await readCurrentPersona(project.root);
      if (flags.json) {
        console.log(formatJson({ id: current.id, ...current.persona }));
        return;
      }
      logger.detail(formatPersonaStatus(current));
    });
  });

persona
  .command("switch")
  .description("Switch the active persona")
  .argument("<id>", "Persona id (see `goalkit persona list`)")
  .option("--verbose", "Print debug output")
  .action(async (id: string, flags: CommandFlags) => {
    await run(flags, async (logger) => {
      const result = await switchPersona(id, { logger });
      const paint = PERSONA_COLORS[result.persona.color];
      logger.success(`Switched to persona: ${result.id} (${result.persona.name})`);
      for (const line of formatPersonaSummary(result)) logger.info(line);
      for (const file of result.contextFiles) logger.debug(`Updated ${file}`);
      logger.detail(paint(result.persona.defaultContext));
    });
  });

// ── Agent context ───────────────────────────────────────────────────

program
  .command("context")
  .description("Refresh agent context files (CLAUDE.md, GEMINI.md, ...)")
  .option("--force", "Create every supported context file")
  .option("--verbose", "Print debug output")
  .action(async (flags: CommandFlags) => {
    await run(flags, async (logger) => {
      const project = await openProject(process.cwd());
      logger.debug(`Updating agent context in ${project.root}`);
      const { updated, state } = await updateAgentContext(project, { force: flags.force });

      if (updated.length > 0) {
        logger.success(`Updated agent context in ${plural(updated.length, "file")}:`);
        for (const file of updated) logger.detail(`  - ${file}`);
      } else {
        logger.warn("No agent context files found to update");
        logger.info("Supported files:");
        for (const file of project.config.contextFiles) logger.detail(`  - ${file}`);
      }

      logger.detail("");
      logger.info(`Project: ${state.name}`);
      logger.info(`Branch: ${state.branch}`);
      logger.info(`Active Goals: ${state.goalCount}`);
      logger.info(`Persona: ${state.persona.id} (${state.persona.persona.name})`);
    });
  });

program
  .command("check")
  .description("Check that the tools Goal Kit relies on are installed")
  .option("--json", "Output JSON")
  .option("--verbose", "List missing optional agent tools too")
  .action(async (flags: CommandFlags) => {
    await run(flags, async () => {
      const result = runDoctor();
      console.log(flags.json ? formatJson(result) : formatDoctorReport(result, flags.verbose));
      if (!result.ok) process.exit(1);
    });
  });

await program.parseAsync();
