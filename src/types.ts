import type { Logger } from "./utils/log.js";
import type { Confirm } from "./utils/prompt.js";

/** Configuration from .goalkit/config.json */
export interface GoalKitConfig {
  goalsDir: string;
  collaborationsDir: string;
  templatesDir: string;
  idWidth: number;
  autoCommit: boolean;
  contextFiles: string[];
  recentGoals: number;
}

/** A resolved, validated Goal Kit project. */
export interface ProjectContext {
  root: string;
  config: GoalKitConfig;
}

/** Flags shared by every scaffolding command. */
export interface ScaffoldOptions {
  cwd?: string;
  dryRun?: boolean;
  force?: boolean;
  json?: boolean;
  verbose?: boolean;
  logger?: Logger;
  /** Asked before overwriting an existing file. Absent = non-interactive. */
  confirm?: Confirm;
  /** Clock override for timestamps. */
  now?: Date;
}

/** Key → project-relative path (or value) printed by --json. */
export type JsonPayload = Record<string, string>;

/**
 * Result of a scaffolding operation. Every branch carries the computed
 * paths so the CLI can print them regardless of what happened.
 */
export type ScaffoldOutcome =
  | { status: "planned"; payload: JsonPayload }
  | { status: "dry-run"; payload: JsonPayload; actions: string[] }
  | { status: "created"; payload: JsonPayload; files: string[]; branch?: string; committed: boolean }
  | { status: "skipped"; payload: JsonPayload; reason: string }
  | { status: "cancelled"; payload: JsonPayload }
  | { status: "opened"; payload: JsonPayload; file: string };

/** A numbered directory such as `.goalkit/goals/001-improve-onboarding`. */
export interface NumberedEntry {
  id: number;
  slug: string;
  /** Directory name: `<id>-<slug>` as found on disk. */
  name: string;
  /** Absolute path. */
  dir: string;
}

export type GoalStatus = "draft" | "planned" | "in_progress" | "completed" | "blocked";

export interface GoalSummary extends NumberedEntry {
  /** Project-relative directory path. */
  path: string;
  title: string;
  /** Raw value of the `**Status**:` line, if any. */
  status?: string;
  created?: string;
  hasGoalFile: boolean;
  /** File names of the goal documents present in the directory. */
  documents: string[];
}
