import { classifyTool, invokesAgent, isConsequentialTool } from "../policy.js";
import type { GateDecision, HookEvent, HookEventType, SessionState, StateMutation } from "../types.js";
import { enforce, ok, type Gate, type GateContext } from "./gate.js";

const GATE = "hydration";

const SKIP_PREFIXES = ["/", ".", "# /", "<agent-notification>", "<task-notification>"];

/** Slash commands, the "." opt-out, and notifications from background agents skip hydration. */
export function shouldSkipHydration(prompt: string): boolean {
  const trimmed = prompt.trim();
  if (SKIP_PREFIXES.some((p) => trimmed.startsWith(p))) return true;
  // Expanded slash commands carry their own instructions.
  return prompt.includes("<command-name>/");
}

function isHydratorCall(event: HookEvent, ctx: GateContext): boolean {
  return invokesAgent(ctx.policy.agents.hydrator, event.tool_name, event.tool_input);
}

/**
 * Every real prompt must pass through the prompt hydrator before the agent changes anything.
 */
export class HydrationGate implements Gate {
  readonly name = GATE;

  appliesTo(eventType: HookEventType): boolean {
    return eventType === "UserPromptSubmit" || eventType === "PreToolUse" || eventType === "PostToolUse";
  }

  evaluate(event: HookEvent, state: SessionState, ctx: GateContext): GateDecision {
    switch (event.event_type) {
      case "UserPromptSubmit":
        return this.onPrompt(event);
      case "PreToolUse":
        return this.beforeTool(event, state, ctx);
      case "PostToolUse":
        return this.afterTool(event, ctx);
      default:
        return ok(GATE);
    }
  }

  private onPrompt(event: HookEvent): GateDecision {
    const prompt = event.prompt ?? "";
    if (shouldSkipHydration(prompt) || event.raw.is_sidechain === true) {
      return ok(GATE, "Prompt exempt from hydration.");
    }
    const mutations: StateMutation[] = [
      { op: "set", flag: "hydration_pending", value: true },
      { op: "increment", counter: "prompt_count", by: 1 },
    ];
    return ok(GATE, "Hydration required before consequential tools.", { mutations });
  }

  private beforeTool(event: HookEvent, state: SessionState, ctx: GateContext): GateDecision {
    if (!state.flags.hydration_pending) return ok(GATE);
    const toolName = event.tool_name ?? "";
    if (!toolName || isHydratorCall(event, ctx)) return ok(GATE);
    if (!isConsequentialTool(ctx.policy, toolName, event.tool_input)) return ok(GATE);

    const kind = classifyTool(ctx.policy, toolName).replace("_", " ");
    return enforce(
      GATE,
      ctx.mode,
      `'${toolName}' (${kind}) was called before the prompt was hydrated. Invoke the prompt-hydrator agent first.`,
      { citation: "hydrate-before-acting" }
    );
  }

  private afterTool(event: HookEvent, ctx: GateContext): GateDecision {
    if (!isHydratorCall(event, ctx)) return ok(GATE);
    const mutations: StateMutation[] = [
      { op: "set", flag: "hydration_pending", value: false },
      { op: "set", flag: "plan_invoked", value: true },
    ];
    return ok(GATE, "Prompt hydrated.", { mutations });
  }
}
