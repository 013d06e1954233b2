import fs from "node:fs/promises";
import { z } from "zod";
import { appendBlockRecord } from "./blockRecords.js";
import { StateCorruptionError, describeError } from "./errors.js";
import { errnoCode, withFileLock } from "./fileLock.js";
import { fileTimestamp, readJsonFile, writeJsonAtomic } from "./jsonFiles.js";
import { sessionLockPath, sessionStatePath, type StatePaths } from "./paths.js";
import { HOOK_EVENT_TYPES, type SessionState, type StateMutation } from "./types.js";

export const SCHEMA_VERSION = 1;
export const AUDIT_LIMIT = 50;

// Known fields are validated; anything else rides along untouched.
const auditEntrySchema = z
  .object({
    ts: z.string(),
    event_type: z.enum(HOOK_EVENT_TYPES),
    tool_name: z.string().optional(),
    gate: z.string(),
    verdict: z.enum(["OK", "WARN", "BLOCK"]),
    message: z.string().optional(),
    citation: z.string().optional(),
  })
  .passthrough();

const sessionStateSchema = z
  .object({
    schema_version: z.number().int().default(SCHEMA_VERSION),
    session_id: z.string(),
    created_at: z.string(),
    updated_at: z.string(),
    flags: z
      .object({
        hydration_pending: z.boolean().default(false),
        task_bound: z.boolean().default(false),
        plan_invoked: z.boolean().default(false),
        critic_invoked: z.boolean().default(false),
        handover_invoked: z.boolean().default(false),
        custodiet_mode: z.enum(["warn", "block"]).nullable().default(null),
        custodiet_block_active: z.boolean().default(false),
      })
      .passthrough(),
    counters: z
      .object({
        tool_calls_since_compliance: z.number().int().nonnegative().default(0),
        prompt_count: z.number().int().nonnegative().default(0),
      })
      .passthrough(),
    bound_task: z.string().nullable().default(null),
    audit: z.array(auditEntrySchema).default([]),
  })
  .passthrough();

type StoredSession = z.output<typeof sessionStateSchema>;

export type LoadedState = {
  state: SessionState;
  // Set when the persisted file had to be discarded.
  recovery: StateCorruptionError | null;
};

export type TransactionOutcome<T> = {
  mutations: StateMutation[];
  value: T;
};

export type TransactionResult<T> = {
  state: SessionState;
  value: T;
  recovery: StateCorruptionError | null;
};

export type SessionStoreOptions = {
  lockTimeoutMs: number;
};

export function defaultSessionState(sessionId: string, now: Date = new Date()): StoredSession {
  const ts = now.toISOString();
  return {
    schema_version: SCHEMA_VERSION,
    session_id: sessionId,
    created_at: ts,
    updated_at: ts,
    flags: {
      hydration_pending: false,
      task_bound: false,
      plan_invoked: false,
      critic_invoked: false,
      handover_invoked: false,
      custodiet_mode: null,
      custodiet_block_active: false,
    },
    counters: {
      tool_calls_since_compliance: 0,
      prompt_count: 0,
    },
    bound_task: null,
    audit: [],
  };
}

/**
 * Pure merge of mutations into a copy of `state`. Flag writes are absolute, so replaying
 * the same set-mutations is a no-op. Fields this version does not know survive the copy.
 */
export function applyMutations(state: SessionState, mutations: StateMutation[]): SessionState {
  const next = structuredClone(state);
  for (const m of mutations) {
    switch (m.op) {
      case "set":
        if (m.flag === "custodiet_mode") {
          next.flags.custodiet_mode = m.value;
        } else {
          next.flags[m.flag] = m.value;
        }
        break;
      case "bind_task":
        next.bound_task = m.task;
        next.flags.task_bound = m.task !== null;
        break;
      case "increment":
        next.counters[m.counter] += m.by;
        break;
      case "reset_counter":
        next.counters[m.counter] = 0;
        break;
      case "audit":
        next.audit.push(m.entry);
        break;
    }
  }
  if (next.audit.length > AUDIT_LIMIT) {
    next.audit = next.audit.slice(next.audit.length - AUDIT_LIMIT);
  }
  return next;
}

export class SessionStore {
  readonly paths: StatePaths;
  private readonly lockTimeoutMs: number;

  constructor(paths: StatePaths, options: SessionStoreOptions) {
    this.paths = paths;
    this.lockTimeoutMs = options.lockTimeoutMs;
  }

  /** Current state without taking the lock. Missing or unreadable files read as defaults. */
  async get(sessionId: string): Promise<SessionState> {
    const filePath = sessionStatePath(this.paths, sessionId);
    try {
      const parsed = sessionStateSchema.safeParse(await readJsonFile(filePath));
      if (parsed.success) return parsed.data;
    } catch (err) {
      console.error(`agent-gatekeeper: reading ${filePath} failed:`, describeError(err));
    }
    return defaultSessionState(sessionId);
  }

  async apply(sessionId: string, mutations: StateMutation[]): Promise<SessionState> {
    const res = await this.transact(sessionId, async () => ({ mutations, value: undefined }));
    return res.state;
  }

  /**
   * Holds the session lock while `fn` inspects the state and decides on mutations, then
   * writes the merged result once.
   */
  async transact<T>(
    sessionId: string,
    fn: (state: SessionState, recovery: StateCorruptionError | null) => Promise<TransactionOutcome<T>>
  ): Promise<TransactionResult<T>> {
    return withFileLock(sessionLockPath(this.paths, sessionId), this.lockTimeoutMs, async () => {
      const { state, recovery, exists } = await this.load(sessionId);
      const outcome = await fn(state, recovery);

      if (outcome.mutations.length === 0 && exists) {
        return { state, value: outcome.value, recovery };
      }

      const next = applyMutations(state, outcome.mutations);
      next.updated_at = new Date().toISOString();
      await writeJsonAtomic(sessionStatePath(this.paths, sessionId), next);
      return { state: next, value: outcome.value, recovery };
    });
  }

  async reset(sessionId: string): Promise<void> {
    await withFileLock(sessionLockPath(this.paths, sessionId), this.lockTimeoutMs, async () => {
      await fs.rm(sessionStatePath(this.paths, sessionId), { force: true });
    });
  }

  // Caller holds the lock.
  private async load(sessionId: string): Promise<LoadedState & { exists: boolean }> {
    const filePath = sessionStatePath(this.paths, sessionId);

    let detail: string;
    let cause: unknown;
    try {
      const raw = await readJsonFile(filePath);
      if (raw === undefined) return { state: defaultSessionState(sessionId), recovery: null, exists: false };
      const parsed = sessionStateSchema.safeParse(raw);
      if (parsed.success) return { state: parsed.data, recovery: null, exists: true };
      detail = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
      cause = parsed.error;
    } catch (err) {
      if (errnoCode(err) !== undefined) throw err;
      detail = describeError(err);
      cause = err;
    }

    const recovery = new StateCorruptionError(filePath, detail, { cause });
    const preserved = `${filePath}.corrupt-${fileTimestamp()}`;
    await fs.rename(filePath, preserved);
    console.error(`agent-gatekeeper: ${recovery.message}; moved to ${preserved} and starting fresh`);

    await appendBlockRecord(this.paths, {
      kind: "state_reset",
      session_id: sessionId,
      gate: "state",
      reason: recovery.message,
    });

    return { state: defaultSessionState(sessionId), recovery, exists: false };
  }
}
