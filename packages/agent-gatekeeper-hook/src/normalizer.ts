import crypto from "node:crypto";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { readJsonFile, writeJsonAtomic } from "./jsonFiles.js";
import { getStatePaths, processSessionPath } from "./paths.js";
import {
  isHookEventType,
  isJsonObject,
  type HookEvent,
  type HookEventType,
  type JsonObject,
  type Runtime,
  type SessionSource,
} from "./types.js";

// Gemini CLI hook names. AfterAgent ends a turn the way Stop does on Claude Code.
const GEMINI_EVENT_MAP: Record<string, HookEventType> = {
  SessionStart: "SessionStart",
  BeforeTool: "PreToolUse",
  AfterTool: "PostToolUse",
  BeforeAgent: "UserPromptSubmit",
  AfterAgent: "Stop",
  SessionEnd: "Stop",
};

const SESSION_END_EVENTS = new Set(["SessionEnd"]);

export type NormalizeOptions = {
  runtime: Runtime;
  // Event name given on the command line; wins over the payload.
  nativeEvent?: string | null;
  stateDir?: string;
  // Parent of this hook process, i.e. the agent. Tests pass their own.
  ppid?: number;
};

const processSessionSchema = z.object({ session_id: z.string().min(1) }).passthrough();

function stringField(payload: JsonObject, ...keys: string[]): string | undefined {
  for (const k of keys) {
    const v = payload[k];
    if (typeof v === "string" && v.trim().length > 0) return v;
  }
  return undefined;
}

function shortHash(value: string): string {
  return crypto.createHash("sha256").update(value).digest("hex").slice(0, 16);
}

function parseMaybeJson(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  if (!trimmed.startsWith("{") && !trimmed.startsWith("[")) return value;
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return parsed;
  } catch {
    return value;
  }
}

/** `cwd`, then the first of `workspace_roots`, then the directory the host started the hook in. */
export function resolveWorkspaceRoot(payload: JsonObject): string {
  const cwd = stringField(payload, "cwd");
  if (cwd) return cwd;
  const roots = payload.workspace_roots;
  if (Array.isArray(roots) && typeof roots[0] === "string" && roots[0].length > 0) return roots[0];
  return process.cwd();
}

export function resolveEventType(nativeEvent: string): { eventType: HookEventType; sessionEnding: boolean } {
  const sessionEnding = SESSION_END_EVENTS.has(nativeEvent);
  if (sessionEnding) return { eventType: "Stop", sessionEnding };
  const mapped = GEMINI_EVENT_MAP[nativeEvent];
  if (mapped) return { eventType: mapped, sessionEnding };
  if (isHookEventType(nativeEvent)) return { eventType: nativeEvent, sessionEnding };
  throw new ConfigurationError(`Unknown hook event "${nativeEvent}"`);
}

async function readProcessSession(filePath: string): Promise<string | null> {
  try {
    const parsed = processSessionSchema.safeParse(await readJsonFile(filePath));
    return parsed.success ? parsed.data.session_id : null;
  } catch (err) {
    console.error(`agent-gatekeeper: ignoring unreadable ${filePath}:`, err);
    return null;
  }
}

async function resolveSessionId(
  payload: JsonObject,
  workspaceRoot: string,
  eventType: HookEventType,
  options: NormalizeOptions
): Promise<{ sessionId: string; source: SessionSource }> {
  const paths = getStatePaths(workspaceRoot, options.stateDir);
  const ppid = options.ppid ?? process.ppid;
  const processFile = processSessionPath(paths, ppid);

  const fromPayload = stringField(payload, "session_id", "sessionId", "conversation_id");
  if (fromPayload) {
    // Later events from the same agent process may omit the id.
    if (eventType === "SessionStart") {
      await writeJsonAtomic(processFile, { session_id: fromPayload, pid: ppid, created_at: new Date().toISOString() });
    }
    return { sessionId: fromPayload, source: "payload" };
  }

  const fromAncestry = await readProcessSession(processFile);
  if (fromAncestry) return { sessionId: fromAncestry, source: "ancestry" };

  // The workspace root always resolves, so the last fallback always yields an id.
  const transcriptPath = stringField(payload, "transcript_path");
  const derived: { sessionId: string; source: SessionSource } = transcriptPath
    ? { sessionId: `tx-${shortHash(transcriptPath)}`, source: "transcript" }
    : { sessionId: `cwd-${shortHash(workspaceRoot)}`, source: "cwd" };

  await writeJsonAtomic(processFile, { session_id: derived.sessionId, pid: ppid, created_at: new Date().toISOString() });
  return derived;
}

/** Maps a Claude Code or Gemini CLI hook payload to one HookEvent. */
export async function normalizeEvent(payload: unknown, options: NormalizeOptions): Promise<HookEvent> {
  const raw: JsonObject = isJsonObject(payload) ? payload : {};

  const nativeEvent = options.nativeEvent ?? stringField(raw, "hook_event_name", "hookEventName");
  if (!nativeEvent) throw new ConfigurationError("Hook payload has no hook_event_name");
  const { eventType, sessionEnding } = resolveEventType(nativeEvent);

  const cwd = resolveWorkspaceRoot(raw);
  const { sessionId, source } = await resolveSessionId(raw, cwd, eventType, options);

  const toolInput = parseMaybeJson(raw.tool_input);
  const toolOutputRaw = raw.tool_response ?? raw.tool_result ?? raw.tool_output;

  return {
    session_id: sessionId,
    event_type: eventType,
    runtime: options.runtime,
    tool_name: stringField(raw, "tool_name"),
    tool_input: isJsonObject(toolInput) ? toolInput : {},
    tool_output: toolOutputRaw === undefined ? undefined : parseMaybeJson(toolOutputRaw),
    prompt: typeof raw.prompt === "string" ? raw.prompt : undefined,
    transcript_path: stringField(raw, "transcript_path"),
    cwd,
    session_source: source,
    session_ending: sessionEnding,
    raw,
  };
}
