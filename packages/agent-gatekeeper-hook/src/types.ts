export const HOOK_EVENT_TYPES = [
  "SessionStart",
  "UserPromptSubmit",
  "PreToolUse",
  "PostToolUse",
  "Stop",
] as const;

export type HookEventType = (typeof HOOK_EVENT_TYPES)[number];

export type Runtime = "claude" | "gemini";

export type SessionSource = "payload" | "ancestry" | "transcript" | "cwd";

export type JsonObject = Record<string, unknown>;

export type HookEvent = {
  session_id: string;
  event_type: HookEventType;
  runtime: Runtime;
  tool_name?: string;
  tool_input: JsonObject;
  tool_output?: unknown;
  prompt?: string;
  transcript_path?: string;
  cwd: string;
  session_source: SessionSource;
  // Native session-end notifications arrive as Stop with this set.
  session_ending: boolean;
  raw: JsonObject;
};

export type GateMode = "warn" | "block";

export type Verdict = "OK" | "WARN" | "BLOCK";

export type GateName = "hydration" | "task" | "custodiet" | "command_intercept" | "handover";

export type SessionFlags = {
  hydration_pending: boolean;
  task_bound: boolean;
  plan_invoked: boolean;
  critic_invoked: boolean;
  handover_invoked: boolean;
  custodiet_mode: GateMode | null;
  custodiet_block_active: boolean;
};

export type FlagName = keyof SessionFlags;

export type SessionCounters = {
  tool_calls_since_compliance: number;
  prompt_count: number;
};

export type CounterName = keyof SessionCounters;

export type AuditEntry = {
  ts: string;
  event_type: HookEventType;
  tool_name?: string;
  gate: string;
  verdict: Verdict;
  message?: string;
  citation?: string;
};

export type SessionState = {
  schema_version: number;
  session_id: string;
  created_at: string;
  updated_at: string;
  flags: SessionFlags;
  counters: SessionCounters;
  bound_task: string | null;
  audit: AuditEntry[];
};

type FlagMutation = {
  [K in FlagName]: { op: "set"; flag: K; value: SessionFlags[K] };
}[FlagName];

export type StateMutation =
  | FlagMutation
  | { op: "bind_task"; task: string | null }
  | { op: "increment"; counter: CounterName; by: number }
  | { op: "reset_counter"; counter: CounterName }
  | { op: "audit"; entry: AuditEntry };

export type GateDecision = {
  gate: string;
  verdict: Verdict;
  message: string;
  citation?: string;
  mutations: StateMutation[];
  updated_input?: JsonObject;
};

export type BlockRecordKind = "block" | "clear" | "state_reset";

export type BlockRecord = {
  kind: BlockRecordKind;
  // Position in the session's record history, starting at 1.
  seq: number;
  session_id: string;
  timestamp: string;
  gate: string;
  reason: string;
  citation?: string;
  actor?: string;
};

export type HookDecision = "allow" | "warn" | "block";

export type HookSpecificOutput = {
  hookEventName: string;
  permissionDecision: "allow" | "deny";
  permissionDecisionReason?: string;
  additionalContext?: string;
  updatedInput?: JsonObject;
};

export type HookResponse = {
  continue: boolean;
  decision: HookDecision;
  systemMessage?: string;
  hookSpecificOutput?: HookSpecificOutput;
};

export function isHookEventType(value: string): value is HookEventType {
  return HOOK_EVENT_TYPES.some((t) => t === value);
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
