import { invokesAgent, isFileMutation } from "../policy.js";
import type { GateDecision, HookEvent, HookEventType, SessionState } from "../types.js";
import { enforce, ok, type Gate, type GateContext } from "./gate.js";

const GATE = "handover";

/**
 * Stop checks, in order: a plan must have been reviewed by the critic, and a bound task
 * needs a handover. Work done after the handover makes it stale.
 */
export class HandoverGate implements Gate {
  readonly name = GATE;

  appliesTo(eventType: HookEventType): boolean {
    return eventType === "PostToolUse" || eventType === "Stop";
  }

  evaluate(event: HookEvent, state: SessionState, ctx: GateContext): GateDecision {
    if (event.event_type === "PostToolUse") {
      if (invokesAgent(ctx.policy.agents.handover, event.tool_name, event.tool_input)) {
        return ok(GATE, "Handover recorded.", {
          mutations: [{ op: "set", flag: "handover_invoked", value: true }],
        });
      }
      if (state.flags.handover_invoked && event.tool_name && isFileMutation(ctx.policy, event.tool_name, event.tool_input)) {
        return ok(GATE, "Workspace changed after handover.", {
          mutations: [{ op: "set", flag: "handover_invoked", value: false }],
        });
      }
      return ok(GATE);
    }

    // A plan that was made must be reviewed before the turn ends.
    if (state.flags.plan_invoked && !state.flags.critic_invoked) {
      return enforce(
        GATE,
        ctx.mode,
        "A plan was made but never reviewed. Invoke the critic agent on it before stopping.",
        { citation: "review-the-plan-before-stopping" }
      );
    }

    if (state.bound_task === null || state.flags.handover_invoked) return ok(GATE);
    return enforce(
      GATE,
      ctx.mode,
      `Task ${state.bound_task} is still bound and no handover was made. Invoke the handover skill to record progress before stopping.`,
      { citation: "hand-over-before-stopping" }
    );
  }
}
