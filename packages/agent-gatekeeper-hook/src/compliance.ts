import { z } from "zod";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport, getDefaultEnvironment } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { ExternalCheckTimeout } from "./errors.js";
import { HOOK_EVENT_TYPES, type AuditEntry, type HookEventType, type SessionFlags, type Verdict } from "./types.js";

export const COMPLIANCE_TOOL_NAME = "gatekeeper_compliance_check";
export const RECENT_AUDIT_LIMIT = 10;

export type SessionSummary = {
  session_id: string;
  event_type: HookEventType;
  tool_name?: string;
  tool_calls_since_compliance: number;
  bound_task: string | null;
  flags: SessionFlags;
  recent_audit: AuditEntry[];
};

export type ComplianceResult = {
  verdict: Verdict;
  message: string;
  citation?: string;
};

export interface ComplianceChecker {
  check(summary: SessionSummary, signal: AbortSignal): Promise<ComplianceResult>;
}

export const complianceResultSchema = z.object({
  verdict: z.enum(["OK", "WARN", "BLOCK"]),
  message: z.string(),
  citation: z.string().optional(),
});

export const sessionSummarySchema = z.object({
  session_id: z.string(),
  event_type: z.enum(HOOK_EVENT_TYPES),
  tool_name: z.string().optional(),
  tool_calls_since_compliance: z.number().int().nonnegative(),
  bound_task: z.string().nullable(),
  flags: z.object({
    hydration_pending: z.boolean(),
    task_bound: z.boolean(),
    plan_invoked: z.boolean(),
    critic_invoked: z.boolean(),
    handover_invoked: z.boolean(),
    custodiet_mode: z.enum(["warn", "block"]).nullable(),
    custodiet_block_active: z.boolean(),
  }),
  recent_audit: z.array(
    z.object({
      ts: z.string(),
      event_type: z.enum(HOOK_EVENT_TYPES),
      tool_name: z.string().optional(),
      gate: z.string(),
      verdict: z.enum(["OK", "WARN", "BLOCK"]),
      message: z.string().optional(),
      citation: z.string().optional(),
    })
  ),
});

const REPEATED_WARNINGS = 3;

/**
 * Deterministic rubric used when no compliance server is configured, and by the server
 * itself. Looks only at the bounded summary.
 */
export function evaluateCompliance(summary: SessionSummary): ComplianceResult {
  const warnings = summary.recent_audit.filter((e) => e.gate !== "custodiet" && e.verdict !== "OK");
  const unanchored = summary.flags.hydration_pending && !summary.flags.task_bound;

  if (unanchored && warnings.length >= REPEATED_WARNINGS) {
    return {
      verdict: "BLOCK",
      message: `${warnings.length} gate warnings in the last ${summary.recent_audit.length} decisions while the prompt is unhydrated and no task is bound. Stop, hydrate the prompt and bind a task.`,
      citation: "act-only-on-a-hydrated-bound-task",
    };
  }
  if (warnings.length >= REPEATED_WARNINGS) {
    const gates = [...new Set(warnings.map((w) => w.gate))].join(", ");
    return {
      verdict: "WARN",
      message: `Repeated gate warnings (${gates}) are being ignored. Address them before continuing.`,
      citation: "heed-gate-warnings",
    };
  }
  return { verdict: "OK", message: "No drift detected." };
}

export class LocalComplianceChecker implements ComplianceChecker {
  async check(summary: SessionSummary): Promise<ComplianceResult> {
    return evaluateCompliance(summary);
  }
}

const toolResultSchema = z
  .object({
    content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()),
    isError: z.boolean().optional(),
  })
  .passthrough();

export type TransportFactory = () => Transport | Promise<Transport>;

/** Spawns the server with node; a TypeScript entry is loaded through tsx. */
export function stdioTransportFactory(mcpPath: string, stateRoot: string): TransportFactory {
  const args = mcpPath.endsWith(".ts") ? ["--import", "tsx", mcpPath] : [mcpPath];
  return () =>
    new StdioClientTransport({
      command: process.execPath,
      args,
      env: { ...getDefaultEnvironment(), GATEKEEPER_STATE_DIR: stateRoot },
    });
}

/** Asks the gatekeeper MCP server to judge the session summary. */
export class McpComplianceChecker implements ComplianceChecker {
  private readonly connect: TransportFactory;

  constructor(connect: TransportFactory) {
    this.connect = connect;
  }

  async check(summary: SessionSummary, signal: AbortSignal): Promise<ComplianceResult> {
    signal.throwIfAborted();
    const client = new Client({ name: "agent-gatekeeper-hook", version: "0.1.0" });
    // Closing the client stops the server process, so an abort ends a stalled handshake too.
    const closeOnAbort = () => {
      client.close().catch((err: unknown) => {
        console.error("agent-gatekeeper: closing compliance client failed:", err);
      });
    };
    signal.addEventListener("abort", closeOnAbort, { once: true });
    try {
      await client.connect(await this.connect(), { signal });
      const res = await client.callTool(
        { name: COMPLIANCE_TOOL_NAME, arguments: { summary } },
        undefined,
        { signal }
      );
      const parsed = toolResultSchema.parse(res);
      const text = parsed.content.find((c) => c.type === "text")?.text ?? "";
      if (parsed.isError) throw new Error(`Compliance server reported an error: ${text}`);
      return complianceResultSchema.parse(JSON.parse(text));
    } finally {
      signal.removeEventListener("abort", closeOnAbort);
      try {
        await client.close();
      } catch (err) {
        console.error("agent-gatekeeper: closing compliance client failed:", err);
      }
    }
  }
}

/** Rejects with ExternalCheckTimeout once `timeoutMs` passes, aborting the check. */
export async function runComplianceCheck(
  checker: ComplianceChecker,
  summary: SessionSummary,
  timeoutMs: number
): Promise<ComplianceResult> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Settle first so a checker rejecting on abort cannot win the race.
      reject(new ExternalCheckTimeout(timeoutMs));
      controller.abort();
    }, timeoutMs);
  });
  try {
    return await Promise.race([checker.check(summary, controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
