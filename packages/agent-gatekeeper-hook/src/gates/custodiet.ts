import { RECENT_AUDIT_LIMIT, runComplianceCheck, type ComplianceResult, type SessionSummary } from "../compliance.js";
import { ExternalCheckTimeout, describeError } from "../errors.js";
import { invokesAgent } from "../policy.js";
import type { GateDecision, HookEvent, HookEventType, SessionState, StateMutation } from "../types.js";
import { block, ok, warn, type Gate, type GateContext } from "./gate.js";

const GATE = "custodiet";

function summarize(event: HookEvent, state: SessionState, calls: number): SessionSummary {
  return {
    session_id: state.session_id,
    event_type: event.event_type,
    tool_name: event.tool_name,
    tool_calls_since_compliance: calls,
    bound_task: state.bound_task,
    flags: { ...state.flags },
    recent_audit: state.audit.slice(-RECENT_AUDIT_LIMIT),
  };
}

/**
 * Periodic drift check. Once `CUSTODIET_INTERVAL` tool calls have been counted a bounded
 * session summary is sent to the compliance checker; a BLOCK in block mode latches the session.
 */
export class CustodietGate implements Gate {
  readonly name = GATE;

  appliesTo(eventType: HookEventType): boolean {
    return eventType === "PreToolUse" || eventType === "PostToolUse";
  }

  async evaluate(event: HookEvent, state: SessionState, ctx: GateContext): Promise<GateDecision> {
    if (event.event_type === "PostToolUse") {
      if (!invokesAgent(ctx.policy.agents.custodiet, event.tool_name, event.tool_input)) return ok(GATE);
      return ok(GATE, "Compliance reviewed by custodiet.", {
        mutations: [{ op: "reset_counter", counter: "tool_calls_since_compliance" }],
      });
    }
    if (event.event_type !== "PreToolUse") return ok(GATE);

    // The runner has already counted this call.
    const calls = state.counters.tool_calls_since_compliance;
    if (calls < ctx.config.custodietInterval) return ok(GATE);

    const reset: StateMutation = { op: "reset_counter", counter: "tool_calls_since_compliance" };
    let result: ComplianceResult;
    try {
      result = await runComplianceCheck(ctx.compliance, summarize(event, state, calls), ctx.config.custodietTimeoutMs);
    } catch (err) {
      const why =
        err instanceof ExternalCheckTimeout
          ? `did not answer within ${err.timeoutMs}ms`
          : `failed (${describeError(err)})`;
      console.error(`agent-gatekeeper: compliance check ${why}`);
      return warn(GATE, `Compliance check could not complete: it ${why}. Continuing without it.`, {
        mutations: [reset],
      });
    }

    if (result.verdict === "OK") return ok(GATE, result.message, { mutations: [reset] });
    if (result.verdict === "WARN" || ctx.mode === "warn") {
      return warn(GATE, result.message, { citation: result.citation, mutations: [reset] });
    }

    const latched = await ctx.blocks.latch(state.session_id, GATE, result.message, result.citation);
    return block(GATE, `${result.message} Session halted until an operator clears the block.`, {
      citation: result.citation,
      mutations: [reset, ...latched.mutations],
    });
  }
}
