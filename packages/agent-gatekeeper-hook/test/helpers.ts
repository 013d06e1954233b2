import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { BlockFlagManager } from "../src/blockFlags.js";
import { LocalComplianceChecker, type ComplianceChecker } from "../src/compliance.js";
import { loadConfig, type GatekeeperConfig } from "../src/config.js";
import type { GateContext } from "../src/gates/gate.js";
import { getStatePaths } from "../src/paths.js";
import { defaultPolicy } from "../src/policy.js";
import { SessionStore } from "../src/stateStore.js";
import type { HookEvent } from "../src/types.js";

export async function makeTempWorkspace(prefix = "ag-hook-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function makeEvent(overrides: Partial<HookEvent> = {}): HookEvent {
  return {
    session_id: "s1",
    event_type: "PreToolUse",
    runtime: "claude",
    tool_input: {},
    cwd: "/tmp/ws",
    session_source: "payload",
    session_ending: false,
    raw: {},
    ...overrides,
  };
}

export function makeConfig(env: Record<string, string> = {}): GatekeeperConfig {
  return loadConfig(env);
}

export type Harness = {
  root: string;
  store: SessionStore;
  blocks: BlockFlagManager;
};

export async function makeHarness(): Promise<Harness> {
  const root = await makeTempWorkspace();
  const store = new SessionStore(getStatePaths(root), { lockTimeoutMs: 5000 });
  return { root, store, blocks: new BlockFlagManager(store) };
}

export function makeContext(
  harness: Harness,
  overrides: Partial<GateContext> = {},
  compliance: ComplianceChecker = new LocalComplianceChecker()
): GateContext {
  return {
    mode: "block",
    config: makeConfig(),
    policy: defaultPolicy(),
    blocks: harness.blocks,
    compliance,
    ...overrides,
  };
}
