import { ConfigurationError } from "./errors.js";
import type { GateMode, GateName } from "./types.js";

export type TaskRequirement = "task_bound" | "plan_invoked" | "critic_invoked";

export const TASK_REQUIREMENTS: readonly TaskRequirement[] = ["task_bound", "plan_invoked", "critic_invoked"];

export type GatekeeperConfig = {
  modes: Record<GateName, GateMode>;
  taskRequired: TaskRequirement[];
  custodietInterval: number;
  custodietTimeoutMs: number;
  lockTimeoutMs: number;
  stateDir?: string;
  mcpPath?: string;
};

type Env = Record<string, string | undefined>;

function parseMode(env: Env, key: string): GateMode {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return "warn";
  if (raw === "warn" || raw === "block") return raw;
  throw new ConfigurationError(`${key} must be "warn" or "block", got "${env[key]}"`);
}

function parsePositiveInt(env: Env, key: string, fallbackValue: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallbackValue;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigurationError(`${key} must be a positive integer, got "${raw}"`);
  }
  return n;
}

function isTaskRequirement(value: string): value is TaskRequirement {
  return TASK_REQUIREMENTS.some((r) => r === value);
}

function parseTaskRequired(env: Env): TaskRequirement[] {
  const all = env.TASK_GATE_ENFORCE_ALL?.trim().toLowerCase();
  if (all === "1" || all === "true" || all === "yes") return [...TASK_REQUIREMENTS];

  const raw = env.TASK_GATE_REQUIRED?.trim();
  if (!raw) return ["task_bound"];

  const out: TaskRequirement[] = [];
  for (const part of raw.split(",")) {
    const name = part.trim();
    if (!name) continue;
    if (!isTaskRequirement(name)) {
      throw new ConfigurationError(
        `TASK_GATE_REQUIRED entry "${name}" is not one of ${TASK_REQUIREMENTS.join(", ")}`
      );
    }
    if (!out.includes(name)) out.push(name);
  }
  return out;
}

function nonEmpty(value: string | undefined): string | undefined {
  const v = value?.trim();
  return v ? v : undefined;
}

export function loadConfig(env: Env = process.env, overrides: { mcpPath?: string | null } = {}): GatekeeperConfig {
  return {
    modes: {
      hydration: parseMode(env, "HYDRATION_GATE_MODE"),
      task: parseMode(env, "TASK_GATE_MODE"),
      custodiet: parseMode(env, "CUSTODIET_MODE"),
      handover: parseMode(env, "HANDOVER_GATE_MODE"),
      // Rewrites input only, so there is nothing to downgrade.
      command_intercept: "warn",
    },
    taskRequired: parseTaskRequired(env),
    custodietInterval: parsePositiveInt(env, "CUSTODIET_INTERVAL", 15),
    custodietTimeoutMs: parsePositiveInt(env, "CUSTODIET_TIMEOUT_MS", 5000),
    lockTimeoutMs: parsePositiveInt(env, "GATEKEEPER_LOCK_TIMEOUT_MS", 15000),
    stateDir: nonEmpty(env.GATEKEEPER_STATE_DIR),
    mcpPath: nonEmpty(overrides.mcpPath ?? undefined) ?? nonEmpty(env.GATEKEEPER_MCP_PATH),
  };
}
