import { BlockFlagManager } from "./blockFlags.js";
import {
  LocalComplianceChecker,
  McpComplianceChecker,
  stdioTransportFactory,
  type ComplianceChecker,
} from "./compliance.js";
import { loadConfig } from "./config.js";
import { describeError } from "./errors.js";
import { appendJsonLine } from "./jsonFiles.js";
import { normalizeEvent, resolveWorkspaceRoot } from "./normalizer.js";
import { getStatePaths, type StatePaths } from "./paths.js";
import { loadPolicy } from "./policy.js";
import { buildRegistry } from "./registry.js";
import { runGates, type RunResult } from "./runner.js";
import { SessionStore } from "./stateStore.js";
import { isJsonObject, type GateDecision, type HookEvent, type HookResponse, type Runtime } from "./types.js";

export type RouteOptions = {
  runtime: Runtime;
  nativeEvent?: string | null;
  env?: Record<string, string | undefined>;
  mcpPath?: string | null;
  ppid?: number;
  // Overrides the checker chosen from configuration.
  compliance?: ComplianceChecker;
};

export type RouteOutcome = {
  response: HookResponse;
  exitCode: 0 | 1;
};

export function formatDecision(d: GateDecision): string {
  const rule = d.citation ? ` (rule: ${d.citation})` : "";
  return `[${d.gate}] ${d.message}${rule}`;
}

function nativeEventName(event: HookEvent): string {
  const name = event.raw.hook_event_name;
  return typeof name === "string" && name.length > 0 ? name : event.event_type;
}

/**
 * A tool call's decision is a permission, so a warned PreToolUse is still "allow" and the
 * warning travels in systemMessage and additionalContext. Other events report "warn".
 */
export function buildResponse(event: HookEvent, result: RunResult): HookResponse {
  const notices = result.decisions.filter((d) => d.verdict !== "OK").map(formatDecision);
  const message = notices.length > 0 ? notices.join("\n") : undefined;
  const blocked = result.verdict === "BLOCK";
  const warned = result.verdict === "WARN" && event.event_type !== "PreToolUse";

  const response: HookResponse = {
    continue: !blocked,
    decision: blocked ? "block" : warned ? "warn" : "allow",
  };
  if (message) response.systemMessage = message;

  if (event.event_type === "PreToolUse" || message) {
    response.hookSpecificOutput = {
      hookEventName: nativeEventName(event),
      permissionDecision: blocked ? "deny" : "allow",
    };
    if (blocked && message) response.hookSpecificOutput.permissionDecisionReason = message;
    if (message) response.hookSpecificOutput.additionalContext = message;
    if (result.updatedInput && !blocked) response.hookSpecificOutput.updatedInput = result.updatedInput;
  }
  return response;
}

/** The router failed; the agent continues, told why. */
export function advisoryResponse(err: unknown): HookResponse {
  return {
    continue: true,
    decision: "warn",
    systemMessage: `[router] agent-gatekeeper could not evaluate this event: ${describeError(err)}. Gates were not applied.`,
  };
}

function chooseChecker(options: RouteOptions, mcpPath: string | undefined, paths: StatePaths): ComplianceChecker {
  if (options.compliance) return options.compliance;
  if (mcpPath) return new McpComplianceChecker(stdioTransportFactory(mcpPath, paths.stateRoot));
  return new LocalComplianceChecker();
}

/**
 * One hook invocation: parse, normalize, gate, answer. Never throws; failures become an
 * advisory response with exit code 1.
 */
export async function route(rawInput: string, options: RouteOptions): Promise<RouteOutcome> {
  const env = options.env ?? process.env;
  let paths: StatePaths | null = null;

  try {
    const payload: unknown = rawInput.trim() ? JSON.parse(rawInput) : {};
    const root = resolveWorkspaceRoot(isJsonObject(payload) ? payload : {});
    const config = loadConfig(env, { mcpPath: options.mcpPath });
    paths = getStatePaths(root, config.stateDir);

    const event = await normalizeEvent(payload, {
      runtime: options.runtime,
      nativeEvent: options.nativeEvent,
      stateDir: config.stateDir,
      ppid: options.ppid,
    });
    const policy = await loadPolicy(event.cwd, env);

    const store = new SessionStore(paths, { lockTimeoutMs: config.lockTimeoutMs });
    const blocks = new BlockFlagManager(store);
    const result = await runGates(event, {
      store,
      registry: buildRegistry(config, policy),
      config,
      policy,
      blocks,
      compliance: chooseChecker(options, config.mcpPath, paths),
    });

    const response = buildResponse(event, result);

    await appendJsonLine(paths.auditLogPath, {
      event: event.event_type,
      session_id: event.session_id,
      tool_name: event.tool_name,
      decision: response.decision,
      gates: result.decisions.map((d) => ({ gate: d.gate, verdict: d.verdict })),
    });

    if (event.session_ending) {
      await store.reset(event.session_id);
    }

    return { response, exitCode: 0 };
  } catch (err) {
    console.error("agent-gatekeeper: router failed:", err);
    if (paths) {
      try {
        await appendJsonLine(paths.auditLogPath, { event: "router_error", error: describeError(err) });
      } catch (auditErr) {
        console.error("agent-gatekeeper: writing audit.log failed:", auditErr);
      }
    }
    return { response: advisoryResponse(err), exitCode: 1 };
  }
}
