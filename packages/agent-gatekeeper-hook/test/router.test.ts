import { describe, it, expect } from "vitest";
import fs from "node:fs/promises";
import { listBlockRecords } from "../src/blockRecords.js";
import type { ComplianceChecker, ComplianceResult } from "../src/compliance.js";
import { getStatePaths, sessionStatePath } from "../src/paths.js";
import { route, type RouteOptions } from "../src/router.js";
import { SessionStore } from "../src/stateStore.js";
import { makeTempWorkspace } from "./helpers.js";

function scriptedChecker(results: ComplianceResult[]): ComplianceChecker {
  return {
    async check() {
      return results.shift() ?? { verdict: "OK", message: "No drift detected." };
    },
  };
}

function hook(root: string, options: Partial<RouteOptions> = {}) {
  return async (payload: Record<string, unknown>) => {
    const outcome = await route(JSON.stringify({ cwd: root, ...payload }), { runtime: "claude", env: {}, ...options });
    expect(outcome.exitCode).toBe(0);
    return outcome.response;
  };
}

describe("route", () => {
  it("allows the repeated edit once the hydrator has run and keeps the task advice", async () => {
    const root = await makeTempWorkspace();
    const send = hook(root, { env: { HYDRATION_GATE_MODE: "block" } });
    const edit = { hook_event_name: "PreToolUse", session_id: "s1", tool_name: "Edit", tool_input: { file_path: "src/a.ts" } };

    await send({ hook_event_name: "UserPromptSubmit", session_id: "s1", prompt: "Add input validation" });
    expect((await send(edit)).decision).toBe("block");
    await send({
      hook_event_name: "PostToolUse",
      session_id: "s1",
      tool_name: "Task",
      tool_input: { subagent_type: "prompt-hydrator" },
      tool_response: { content: "plan" },
    });

    const advice =
      "[task] 'Edit' modifies the workspace but no task is bound (claim or create one first). (rule: work-only-on-a-bound-task)";
    expect(await send(edit)).toEqual({
      continue: true,
      decision: "allow",
      systemMessage: advice,
      hookSpecificOutput: {
        hookEventName: "PreToolUse",
        permissionDecision: "allow",
        additionalContext: advice,
      },
    });
  });

  it("still reports warn for a warned event that is not a tool call", async () => {
    const root = await makeTempWorkspace();
    const send = hook(root);

    await send({
      hook_event_name: "PostToolUse",
      session_id: "s2",
      tool_name: "mcp__tasks__claim_next_task",
      tool_output: { id: "T-7" },
    });
    const stop = await send({ hook_event_name: "Stop", session_id: "s2" });
    expect(stop.continue).toBe(true);
    expect(stop.decision).toBe("warn");
    expect(stop.systemMessage).toBe(
      "[handover] Task T-7 is still bound and no handover was made. Invoke the handover skill to record progress before stopping. (rule: hand-over-before-stopping)"
    );
  });

  it("resets the session at SessionEnd", async () => {
    const root = await makeTempWorkspace();
    const paths = getStatePaths(root);
    const send = hook(root);

    await send({ hook_event_name: "UserPromptSubmit", session_id: "s3", prompt: "tidy the docs" });
    const store = new SessionStore(paths, { lockTimeoutMs: 5000 });
    expect((await store.get("s3")).flags.hydration_pending).toBe(true);

    const end = await send({ hook_event_name: "SessionEnd", session_id: "s3" });
    expect(end).toEqual({ continue: true, decision: "allow" });
    await expect(fs.access(sessionStatePath(paths, "s3"))).rejects.toThrow();
    expect((await store.get("s3")).flags.hydration_pending).toBe(false);
  });

  it("keeps block records through SessionEnd so the session stays halted", async () => {
    const root = await makeTempWorkspace();
    const paths = getStatePaths(root);
    const send = hook(root, {
      env: { CUSTODIET_INTERVAL: "1", CUSTODIET_MODE: "block" },
      compliance: scriptedChecker([{ verdict: "BLOCK", message: "Drifted.", citation: "stay-on-task" }]),
    });
    const read = { hook_event_name: "PreToolUse", session_id: "s4", tool_name: "Read", tool_input: {} };

    expect((await send(read)).decision).toBe("block");

    const end = await send({ hook_event_name: "SessionEnd", session_id: "s4" });
    expect(end.continue).toBe(false);
    expect(end.decision).toBe("block");
    await expect(fs.access(sessionStatePath(paths, "s4"))).rejects.toThrow();
    expect((await listBlockRecords(paths, "s4")).map((r) => [r.kind, r.gate])).toEqual([["block", "custodiet"]]);

    const after = await send(read);
    expect(after.decision).toBe("block");
    expect(after.systemMessage).toBe(
      "[command_intercept] Session is halted by custodiet: Drifted. An operator must run `agent-gatekeeper clear-block --session s4` to resume. (rule: stay-on-task)"
    );
  });
});
