import { describe, it, expect } from "vitest";
import path from "node:path";
import fs from "node:fs/promises";
import { spawnSync } from "node:child_process";
import { listBlockRecords } from "../src/blockRecords.js";
import { LockTimeoutError } from "../src/errors.js";
import { isStaleLock, readLockSnapshot, removeStaleLock } from "../src/fileLock.js";
import { getStatePaths, sessionLockPath, sessionStatePath } from "../src/paths.js";
import { AUDIT_LIMIT, SessionStore, applyMutations, defaultSessionState } from "../src/stateStore.js";
import type { StateMutation } from "../src/types.js";
import { makeTempWorkspace } from "./helpers.js";

async function makeStore(lockTimeoutMs = 5000) {
  const root = await makeTempWorkspace("ag-store-");
  const paths = getStatePaths(root);
  return { paths, store: new SessionStore(paths, { lockTimeoutMs }) };
}

describe("applyMutations", () => {
  it("applies flag sets idempotently", () => {
    const base = defaultSessionState("s1", new Date("2026-01-01T00:00:00Z"));
    const muts: StateMutation[] = [
      { op: "set", flag: "hydration_pending", value: true },
      { op: "set", flag: "custodiet_mode", value: "block" },
    ];
    const once = applyMutations(base, muts);
    const twice = applyMutations(once, muts);
    expect(twice).toEqual(once);
    expect(once.flags.hydration_pending).toBe(true);
    expect(once.flags.custodiet_mode).toBe("block");
    expect(base.flags.hydration_pending).toBe(false);
  });

  it("binds and unbinds tasks together with task_bound", () => {
    const bound = applyMutations(defaultSessionState("s1"), [{ op: "bind_task", task: "t-7" }]);
    expect(bound.bound_task).toBe("t-7");
    expect(bound.flags.task_bound).toBe(true);

    const unbound = applyMutations(bound, [{ op: "bind_task", task: null }]);
    expect(unbound.bound_task).toBeNull();
    expect(unbound.flags.task_bound).toBe(false);
  });

  it("keeps only the newest audit entries", () => {
    const entries: StateMutation[] = Array.from({ length: AUDIT_LIMIT + 10 }, (_, i) => ({
      op: "audit",
      entry: { ts: `t${i}`, event_type: "PreToolUse", gate: "task", verdict: "OK" },
    }));
    const next = applyMutations(defaultSessionState("s1"), entries);
    expect(next.audit).toHaveLength(AUDIT_LIMIT);
    expect(next.audit[0].ts).toBe("t10");
    expect(next.audit[AUDIT_LIMIT - 1].ts).toBe(`t${AUDIT_LIMIT + 9}`);
  });
});

describe("SessionStore", () => {
  it("returns defaults for a session it has never seen", async () => {
    const { store } = await makeStore();
    const state = await store.get("fresh");
    expect(state.session_id).toBe("fresh");
    expect(state.flags.hydration_pending).toBe(false);
    expect(state.flags.custodiet_mode).toBeNull();
    expect(state.counters.tool_calls_since_compliance).toBe(0);
  });

  it("persists mutations and reads them back", async () => {
    const { store } = await makeStore();
    await store.apply("s1", [
      { op: "set", flag: "plan_invoked", value: true },
      { op: "increment", counter: "prompt_count", by: 2 },
    ]);
    const state = await store.get("s1");
    expect(state.flags.plan_invoked).toBe(true);
    expect(state.counters.prompt_count).toBe(2);
  });

  it("preserves fields it does not know about", async () => {
    const { store, paths } = await makeStore();
    const filePath = sessionStatePath(paths, "s1");
    const doc = {
      ...defaultSessionState("s1"),
      plugin_data: { owner: "someone-else", n: 3 },
      flags: { ...defaultSessionState("s1").flags, future_flag: true },
      counters: { tool_calls_since_compliance: 4, prompt_count: 1, retries: 9 },
    };
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(doc), "utf8");

    await store.apply("s1", [{ op: "increment", counter: "tool_calls_since_compliance", by: 1 }]);

    const written = JSON.parse(await fs.readFile(filePath, "utf8"));
    expect(written.plugin_data).toEqual({ owner: "someone-else", n: 3 });
    expect(written.flags.future_flag).toBe(true);
    expect(written.counters.retries).toBe(9);
    expect(written.counters.tool_calls_since_compliance).toBe(5);
  });

  it("fills flags missing from an older file with their defaults", async () => {
    const { store, paths } = await makeStore();
    const filePath = sessionStatePath(paths, "old");
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(
      filePath,
      JSON.stringify({
        session_id: "old",
        created_at: "2026-01-01T00:00:00.000Z",
        updated_at: "2026-01-01T00:00:00.000Z",
        flags: { task_bound: true },
        counters: {},
      }),
      "utf8"
    );
    const state = await store.get("old");
    expect(state.flags.task_bound).toBe(true);
    expect(state.flags.custodiet_block_active).toBe(false);
    expect(state.schema_version).toBe(1);
    expect(state.audit).toEqual([]);
  });

  it("serializes concurrent updates to one session", async () => {
    const { store } = await makeStore();
    await Promise.all(
      Array.from({ length: 20 }, () =>
        store.apply("s2", [{ op: "increment", counter: "tool_calls_since_compliance", by: 1 }])
      )
    );
    const state = await store.get("s2");
    expect(state.counters.tool_calls_since_compliance).toBe(20);
  });

  it("recovers from a corrupt state file and keeps the original", async () => {
    const { store, paths } = await makeStore();
    const filePath = sessionStatePath(paths, "s3");
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, "{ not json", "utf8");

    const res = await store.transact("s3", async (state, recovery) => ({
      mutations: [{ op: "set", flag: "task_bound", value: true }],
      value: { sawDefaults: !state.flags.task_bound, recovered: recovery !== null },
    }));

    expect(res.value).toEqual({ sawDefaults: true, recovered: true });
    expect(res.recovery?.name).toBe("StateCorruptionError");
    expect(res.state.flags.task_bound).toBe(true);

    const names = await fs.readdir(path.dirname(filePath));
    const corrupt = names.filter((n) => n.startsWith("s3.json.corrupt-"));
    expect(corrupt).toHaveLength(1);
    expect(await fs.readFile(path.join(path.dirname(filePath), corrupt[0]), "utf8")).toBe("{ not json");

    const records = await listBlockRecords(paths, "s3");
    expect(records.map((r) => r.kind)).toEqual(["state_reset"]);
  });

  it("treats schema-invalid documented fields as corruption", async () => {
    const { store, paths } = await makeStore();
    const filePath = sessionStatePath(paths, "s4");
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify({ ...defaultSessionState("s4"), flags: { task_bound: "yes" } }), "utf8");

    const res = await store.transact("s4", async () => ({ mutations: [], value: null }));
    expect(res.recovery).not.toBeNull();
    expect(res.recovery?.message).toContain("flags.task_bound");
    expect(res.state.flags.task_bound).toBe(false);
  });

  it("gives up on a lock held by a live process", async () => {
    const { store, paths } = await makeStore(100);
    const lockPath = sessionLockPath(paths, "s5");
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
    await fs.writeFile(lockPath, JSON.stringify({ pid: process.pid, acquired_at: new Date().toISOString() }), "utf8");

    await expect(store.apply("s5", [])).rejects.toBeInstanceOf(LockTimeoutError);
  });

  it("takes over a lock left behind by a dead process", async () => {
    const { store, paths } = await makeStore(2000);
    const child = spawnSync(process.execPath, ["-e", ""]);
    const deadPid = child.pid;
    expect(deadPid).toBeGreaterThan(0);

    const lockPath = sessionLockPath(paths, "s6");
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
    await fs.writeFile(lockPath, JSON.stringify({ pid: deadPid, acquired_at: new Date().toISOString() }), "utf8");

    const state = await store.apply("s6", [{ op: "set", flag: "critic_invoked", value: true }]);
    expect(state.flags.critic_invoked).toBe(true);
    await expect(fs.access(lockPath)).rejects.toThrow();
  });

  it("lets exactly one of many racing writers recover a dead owner's lock", async () => {
    const { store, paths } = await makeStore(5000);
    const deadPid = spawnSync(process.execPath, ["-e", ""]).pid;
    const lockPath = sessionLockPath(paths, "s8");
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
    await fs.writeFile(lockPath, JSON.stringify({ pid: deadPid, acquired_at: new Date().toISOString() }), "utf8");

    await Promise.all(
      Array.from({ length: 10 }, () =>
        store.apply("s8", [{ op: "increment", counter: "tool_calls_since_compliance", by: 1 }])
      )
    );

    expect((await store.get("s8")).counters.tool_calls_since_compliance).toBe(10);
    expect((await fs.readdir(path.dirname(lockPath))).filter((f) => f.includes(".stale-"))).toEqual([]);
  });

  it("takes over an empty lock once it is older than the grace period", async () => {
    const { store, paths } = await makeStore(2000);
    const lockPath = sessionLockPath(paths, "s9");
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
    await fs.writeFile(lockPath, "", "utf8");
    const old = new Date(Date.now() - 60_000);
    await fs.utimes(lockPath, old, old);

    const state = await store.apply("s9", [{ op: "set", flag: "plan_invoked", value: true }]);
    expect(state.flags.plan_invoked).toBe(true);
    await expect(fs.access(lockPath)).rejects.toThrow();
  });

  it("waits on an empty lock that was just created", async () => {
    const { store, paths } = await makeStore(100);
    const lockPath = sessionLockPath(paths, "s10");
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
    await fs.writeFile(lockPath, "", "utf8");

    await expect(store.apply("s10", [])).rejects.toBeInstanceOf(LockTimeoutError);
  });

  it("puts back a lock that changed hands after it was judged stale", async () => {
    const { paths } = await makeStore();
    const deadPid = spawnSync(process.execPath, ["-e", ""]).pid;
    const lockPath = sessionLockPath(paths, "s11");
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
    await fs.writeFile(lockPath, JSON.stringify({ pid: deadPid, acquired_at: "2026-01-01T00:00:00.000Z" }), "utf8");

    const observed = await readLockSnapshot(lockPath);
    expect(observed).not.toBeNull();
    if (!observed) return;
    expect(isStaleLock(observed)).toBe(true);

    // Another process recovers the lock and takes it before this one acts.
    const live = JSON.stringify({ pid: process.pid, acquired_at: "2026-01-01T00:00:01.000Z" });
    await fs.rm(lockPath);
    await fs.writeFile(lockPath, live, "utf8");

    expect(await removeStaleLock(lockPath, observed)).toBe(false);
    expect(await fs.readFile(lockPath, "utf8")).toBe(live);
    expect((await fs.readdir(path.dirname(lockPath))).filter((f) => f.includes(".stale-"))).toEqual([]);
  });

  it("reset removes the session file", async () => {
    const { store, paths } = await makeStore();
    await store.apply("s7", [{ op: "set", flag: "hydration_pending", value: true }]);
    await store.reset("s7");
    await expect(fs.access(sessionStatePath(paths, "s7"))).rejects.toThrow();
    expect((await store.get("s7")).flags.hydration_pending).toBe(false);
  });
});
