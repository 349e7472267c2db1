import { z } from "zod";

/** Well-known files read by AI coding agents, in order of preference. */
export const DEFAULT_CONTEXT_FILES = [
  "CLAUDE.md",
  ".claude/context.md",
  "GEMINI.md",
  ".gemini/context.md",
  "CURSOR.md",
  ".cursor/context.md",
  "QWEN.md",
  ".qwen/context.md",
  "WINDSURF.md",
  ".windsurf/context.md",
  "KILOCODE.md",
  ".kilocode/context.md",
  "ROO.md",
  ".roo/context.md",
  "CODEBUDDY.md",
  ".codebuddy/context.md",
  "Q.md",
  ".amazonq/context.md",
  "OPENCODE.md",
  "AUGMENT.md",
  ".augment/context.md",
] as const;

export const goalkitConfigSchema = z.object({
  goalsDir: z.string().min(1).default(".goalkit/goals"),
  collaborationsDir: z.string().min(1).default(".goalkit/collaborations"),
  templatesDir: z.string().min(1).default(".goalkit/templates"),
  idWidth: z.number().int().min(1).max(9).default(3),
  autoCommit: z.boolean().default(true),
  contextFiles: z.array(z.string().min(1)).min(1).default([...DEFAULT_CONTEXT_FILES]),
  /** How many goals the generated context files list. */
  recentGoals: z.number().int().positive().default(5),
});

