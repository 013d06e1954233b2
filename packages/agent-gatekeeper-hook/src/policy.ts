import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { minimatch } from "minimatch";
import { z } from "zod";
import { ConfigurationError, describeError } from "./errors.js";
import type { HookEventType, JsonObject } from "./types.js";

export type ToolCategory = "always_available" | "read_only" | "task_mutation" | "file_mutation";

// "unknown" tools are matched by no category list.
export type ToolClass = ToolCategory | "unknown";

export type ToolCategories = Record<ToolCategory, string[]>;

export type CommandInterceptConfig = {
  enabled: boolean;
  // Directory names excluded from recursive searches.
  excludeDirs: string[];
};

export type AgentPatterns = {
  hydrator: string[];
  critic: string[];
  custodiet: string[];
  handover: string[];
};

export type GatekeeperPolicy = {
  toolCategories: ToolCategories;
  // Tools no category names are treated as file mutations unless this is false.
  unknownToolsConsequential: boolean;
  agents: AgentPatterns;
  commandIntercept: CommandInterceptConfig;
  // File writes under these directories are session scratch space; `~` is the home directory.
  safeTempDirs: string[];
  // Overrides the built-in gate order for the listed event types.
  gateOrder?: Partial<Record<HookEventType, string[]>>;
};

const toolCategoriesSchema = z.object({
  always_available: z.array(z.string()),
  read_only: z.array(z.string()),
  task_mutation: z.array(z.string()),
  file_mutation: z.array(z.string()),
});

const policyFileSchema = z.object({
  toolCategories: toolCategoriesSchema.partial().optional(),
  unknownToolsConsequential: z.boolean().optional(),
  agents: z
    .object({
      hydrator: z.array(z.string()),
      critic: z.array(z.string()),
      custodiet: z.array(z.string()),
      handover: z.array(z.string()),
    })
    .partial()
    .optional(),
  commandIntercept: z
    .object({
      enabled: z.boolean(),
      excludeDirs: z.array(z.string().min(1)),
    })
    .partial()
    .optional(),
  safeTempDirs: z.array(z.string().min(1)).optional(),
  gateOrder: z
    .object({
      SessionStart: z.array(z.string()),
      UserPromptSubmit: z.array(z.string()),
      PreToolUse: z.array(z.string()),
      PostToolUse: z.array(z.string()),
      Stop: z.array(z.string()),
    })
    .partial()
    .optional(),
});

const TOOL_CATEGORIES_FILE = fileURLToPath(new URL("../data/tool-categories.json", import.meta.url));

let cachedCategories: ToolCategories | null = null;

export function defaultToolCategories(): ToolCategories {
  if (!cachedCategories) {
    const raw: unknown = JSON.parse(readFileSync(TOOL_CATEGORIES_FILE, "utf8"));
    cachedCategories = toolCategoriesSchema.parse(raw);
  }
  return {
    always_available: [...cachedCategories.always_available],
    read_only: [...cachedCategories.read_only],
    task_mutation: [...cachedCategories.task_mutation],
    file_mutation: [...cachedCategories.file_mutation],
  };
}

export function defaultCommandInterceptConfig(): CommandInterceptConfig {
  return {
    enabled: true,
    excludeDirs: [
      "node_modules",
      ".git",
      ".venv",
      "__pycache__",
      ".mypy_cache",
      ".pytest_cache",
      ".ruff_cache",
      "*.egg-info",
    ],
  };
}

export function defaultPolicy(): GatekeeperPolicy {
  return {
    toolCategories: defaultToolCategories(),
    // Conservative: a tool nobody classified may write.
    unknownToolsConsequential: true,
    agents: {
      hydrator: ["*hydrator*"],
      critic: ["critic", "*:critic"],
      custodiet: ["custodiet", "*:custodiet"],
      handover: ["handover", "*:handover", "dump", "*:dump"],
    },
    commandIntercept: defaultCommandInterceptConfig(),
    safeTempDirs: ["~/.claude/tmp", "~/.claude/projects", "~/.gemini/tmp"],
  };
}

export function globAny(patterns: string[], value: string): boolean {
  return patterns.some((pat) => minimatch(value, pat, { dot: true }));
}

export function classifyTool(policy: GatekeeperPolicy, toolName: string): ToolClass {
  const order: ToolCategory[] = ["always_available", "read_only", "task_mutation", "file_mutation"];
  for (const category of order) {
    if (globAny(policy.toolCategories[category], toolName)) return category;
  }
  return "unknown";
}

const SHELL_TOOLS = new Set(["Bash", "run_shell_command"]);

export function shellCommandOf(toolName: string, toolInput: JsonObject): string | null {
  if (!SHELL_TOOLS.has(toolName)) return null;
  const cmd = toolInput.command;
  return typeof cmd === "string" ? cmd : null;
}

// find actions that delete, run commands or write files.
const FIND_WRITE_ACTIONS = /(^|\s)-(delete|exec|execdir|ok|okdir|fprint0?|fprintf|fls)(\s|$)/;

export function isReadOnlyShellCommand(cmd: string): boolean {
  const c = cmd.trim().toLowerCase();
  if (!c) return true;
  // Anything that redirects or chains may write.
  if (/[>;&|`]|\$\(/.test(c)) return false;

  if (/^find\b/.test(c)) return !FIND_WRITE_ACTIONS.test(c);
  if (/^(git)\s+(status|diff|log|show|branch|rev-parse)\b/.test(c)) return true;
  if (/^git\s+remote(\s+-v)?$/.test(c)) return true;
  if (/^(ls|pwd|echo|cat|head|tail|which|type|wc|rg|grep)\b/.test(c)) return true;
  if (/^(env|printenv|uname|whoami|date|uptime)\b/.test(c)) return true;
  if (/^(node|npm|pnpm|yarn|python3?)\s+(-v|--version)\b/.test(c)) return true;

  return false;
}

const PATH_PARAMS = ["file_path", "path", "notebook_path", "absolute_path"];

export function targetPathOf(toolInput: JsonObject): string | null {
  for (const param of PATH_PARAMS) {
    const value = toolInput[param];
    if (typeof value === "string" && value.length > 0) return value;
  }
  return null;
}

function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  return p.startsWith("~/") ? path.join(os.homedir(), p.slice(2)) : p;
}

/** True when `filePath` is absolute (after `~` expansion) and inside one of `dirs`. */
export function isSafeTempPath(filePath: string | null, dirs: string[]): boolean {
  if (!filePath) return false;
  const target = expandHome(filePath);
  if (!path.isAbsolute(target)) return false;
  const resolved = path.resolve(target);
  return dirs.some((dir) => {
    const rel = path.relative(path.resolve(expandHome(dir)), resolved);
    return rel.length > 0 && !rel.startsWith("..") && !path.isAbsolute(rel);
  });
}

/**
 * Mutating tools: file or task mutation, or an unclassified tool when the policy is
 * conservative. Read-only shell commands and writes under the safe temp directories do
 * not count.
 */
export function isConsequentialTool(policy: GatekeeperPolicy, toolName: string, toolInput: JsonObject): boolean {
  const cls = classifyTool(policy, toolName);
  if (cls === "task_mutation") return true;
  if (cls === "file_mutation") {
    const cmd = shellCommandOf(toolName, toolInput);
    if (cmd !== null) return !isReadOnlyShellCommand(cmd);
    return !isSafeTempPath(targetPathOf(toolInput), policy.safeTempDirs);
  }
  if (cls === "unknown") return policy.unknownToolsConsequential;
  return false;
}

/** File mutations only; task bookkeeping tools are how a task gets bound in the first place. */
export function isFileMutation(policy: GatekeeperPolicy, toolName: string, toolInput: JsonObject): boolean {
  const cls = classifyTool(policy, toolName);
  if (cls === "task_mutation") return false;
  return isConsequentialTool(policy, toolName, toolInput);
}

// tool name -> parameters naming the agent or skill being started
const SPAWN_TOOLS: Record<string, string[]> = {
  Agent: ["subagent_type"],
  Task: ["subagent_type"],
  Skill: ["skill"],
  delegate_to_agent: ["agent_name", "name"],
  activate_skill: ["name", "skill"],
};

export function spawnedAgentName(toolName: string | undefined, toolInput: JsonObject): string | null {
  if (!toolName) return null;
  const params = SPAWN_TOOLS[toolName];
  if (!params) return null;
  for (const param of params) {
    const value = toolInput[param];
    if (typeof value === "string" && value.trim().length > 0) return value.trim();
  }
  return null;
}

export function invokesAgent(
  patterns: string[],
  toolName: string | undefined,
  toolInput: JsonObject
): boolean {
  const name = spawnedAgentName(toolName, toolInput);
  if (name && globAny(patterns, name.toLowerCase())) return true;
  // Some runtimes expose agents as tools of the same name.
  return Boolean(toolName && globAny(patterns, toolName.toLowerCase()));
}

export async function loadPolicy(
  workspaceRoot: string,
  env: Record<string, string | undefined> = process.env
): Promise<GatekeeperPolicy> {
  const envPath = env.GATEKEEPER_POLICY_PATH;
  const candidatePaths = [
    envPath,
    path.join(workspaceRoot, ".agent-gatekeeper", "policy.json"),
    path.join(workspaceRoot, "agent-gatekeeper.policy.json"),
  ].filter((p): p is string => typeof p === "string" && p.length > 0);

  let filePath: string | null = null;
  for (const p of candidatePaths) {
    try {
      await fs.access(p);
      filePath = p;
      break;
    } catch {
      // try the next candidate
    }
  }

  const base = defaultPolicy();
  if (!filePath) return base;

  let parsed: z.infer<typeof policyFileSchema>;
  try {
    const raw: unknown = JSON.parse(await fs.readFile(filePath, "utf8"));
    parsed = policyFileSchema.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Invalid policy file ${filePath}: ${describeError(err)}`, { cause: err });
  }

  return {
    toolCategories: {
      always_available: parsed.toolCategories?.always_available ?? base.toolCategories.always_available,
      read_only: parsed.toolCategories?.read_only ?? base.toolCategories.read_only,
      task_mutation: parsed.toolCategories?.task_mutation ?? base.toolCategories.task_mutation,
      file_mutation: parsed.toolCategories?.file_mutation ?? base.toolCategories.file_mutation,
    },
    unknownToolsConsequential: parsed.unknownToolsConsequential ?? base.unknownToolsConsequential,
    agents: {
      ...base.agents,
      ...parsed.agents,
    },
    commandIntercept: {
      ...base.commandIntercept,
      ...parsed.commandIntercept,
    },
    safeTempDirs: parsed.safeTempDirs ?? base.safeTempDirs,
    gateOrder: parsed.gateOrder,
  };
}
