import { execFileSync } from "node:child_process";

export type CheckCategory = "required" | "optional" | "agent";

export interface DoctorCheck {
  name: string;
  category: CheckCategory;
  status: "ok" | "warn" | "error";
  message: string;
  /** Where to get the tool, shown when it is missing. */
  url?: string;
}

export interface DoctorResult {
  checks: DoctorCheck[];
  /** False only when a required tool is missing. */
  ok: boolean;
  agentFound: boolean;
}

interface ToolInfo {
  command: string;
  description: string;
  url?: string;
}

const OPTIONAL_TOOLS: ToolInfo[] = [
  { command: "npm", description: "Node package manager" },
  { command: "docker", description: "Docker containerization", url: "https://docker.com/" },
];

const AGENT_TOOLS: ToolInfo[] = [
  { command: "claude", description: "Claude Code CLI", url: "https://docs.anthropic.com/en/docs/claude-code/setup" },
  { command: "code", description: "Visual Studio Code" },
  { command: "cursor", description: "Cursor IDE" },
  { command: "gemini", description: "Gemini CLI", url: "https://github.com/google-gemini/gemini-cli" },
  { command: "qwen", description: "Qwen Code CLI", url: "https://github.com/QwenLM/qwen-code" },
  { command: "opencode", description: "opencode CLI", url: "https://opencode.ai" },
  { command: "codex", description: "Codex CLI", url: "https://github.com/openai/codex" },
  { command: "windsurf", description: "Windsurf IDE", url: "https://windsurf.com/" },
  { command: "kilocode", description: "Kilo Code IDE", url: "https://github.com/Kilo-Org/kilocode" },
  { command: "auggie", description: "Auggie CLI", url: "https://docs.augmentcode.com/cli/setup-auggie/install-auggie-cli" },
  { command: "q", description: "Amazon Q Developer CLI", url: "https://aws.amazon.com/developer/learning/q-developer-cli/" },
];

export const MIN_NODE_MAJOR = 20;

/** Returns the first line of `<command> --version`, or null if it cannot run. */
export type ToolProbe = (command: string) => string | null;

export const probeTool: ToolProbe = (command) => {
  try {
    return execFileSync(command, ["--version"], {
      encoding: "utf-8",
      timeout: 5000,
      stdio: "pipe",
    })
      .trim()
      .split("\n")[0] ?? "";
  } catch {
    return null;
  }
};

export interface DoctorOptions {
  probe?: ToolProbe;
  /** Defaults to `process.version`. */
  nodeVersion?: string;
}

function checkNodeVersion(version: string): DoctorCheck {
  const raw = version.replace(/^v/, "");
  const major = Number.parseInt(raw.split(".")[0] ?? "", 10);
  if (major >= MIN_NODE_MAJOR) {
    return { name: "Node.js", category: "required", status: "ok", message: `v${raw}` };
  }
  return {
    name: "Node.js",
    category: "required",
    status: "error",
    message: `v${raw} (>= ${MIN_NODE_MAJOR} required)`,
    url: "https://nodejs.org/",
  };
}

function checkGit(probe: ToolProbe): DoctorCheck {
  const out = probe("git");
  if (out !== null) {
    return { name: "git", category: "required", status: "ok", message: out || "installed" };
  }
  return {
    name: "git",
    category: "required",
    status: "error",
    message: "not found",
    url: "https://git-scm.com/downloads",
  };
}

function checkTool(tool: ToolInfo, category: CheckCategory, probe: ToolProbe): DoctorCheck {
  const out = probe(tool.command);
  if (out !== null) {
    return { name: tool.command, category, status: "ok", message: out || "installed" };
  }
  return {
    name: tool.command,
    category,
    status: "warn",
    message: `not found (${tool.description})`,
    url: tool.url,
  };
}

export function runDoctor(options: DoctorOptions = {}): DoctorResult {
  const probe = options.probe ?? probeTool;
  const checks: DoctorCheck[] = [];

  checks.push(checkGit(probe));
  checks.push(checkNodeVersion(options.nodeVersion ?? process.version));
  for (const tool of OPTIONAL_TOOLS) checks.push(checkTool(tool, "optional", probe));
  for (const tool of AGENT_TOOLS) checks.push(checkTool(tool, "agent", probe));

  const ok = checks.every((c) => c.status !== "error");
  const agentFound = checks.some((c) => c.category === "agent" && c.status === "ok");
  return { checks, ok, agentFound };
}
