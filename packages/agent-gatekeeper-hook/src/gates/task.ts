import { isFileMutation, invokesAgent } from "../policy.js";
import type { TaskRequirement } from "../config.js";
import {
  isJsonObject,
  type GateDecision,
  type HookEvent,
  type HookEventType,
  type JsonObject,
  type SessionState,
  type StateMutation,
} from "../types.js";
import { enforce, ok, type Gate, type GateContext } from "./gate.js";

const GATE = "task";

const REMEDIATION: Record<TaskRequirement, string> = {
  task_bound: "no task is bound (claim or create one first)",
  plan_invoked: "no plan was made (hydrate the prompt or enter plan mode)",
  critic_invoked: "the plan was not reviewed (invoke the critic agent)",
};

const PLAN_TOOLS = new Set(["EnterPlanMode", "ExitPlanMode"]);
const BIND_TOOLS = new Set(["create_task", "claim_next_task"]);
const UNBIND_TOOLS = new Set(["complete_task", "complete_tasks"]);

/** `mcp__server__update_task` -> `update_task` */
export function baseToolName(toolName: string): string {
  if (!toolName.startsWith("mcp__")) return toolName;
  const idx = toolName.lastIndexOf("__");
  return idx > 3 ? toolName.slice(idx + 2) : toolName;
}

function idOf(value: unknown): string | null {
  if (typeof value === "string" && value.length > 0) return value;
  if (typeof value === "number") return String(value);
  return null;
}

/**
 * Task id from a task tool's result. Claude returns the object, Gemini a JSON string under
 * `returnDisplay`.
 */
export function taskIdFromResult(output: unknown): string | null {
  if (!isJsonObject(output)) return null;
  const display = output.returnDisplay;
  if (typeof display === "string") {
    try {
      const parsed: unknown = JSON.parse(display);
      const fromDisplay = taskIdFromResult(parsed);
      if (fromDisplay) return fromDisplay;
    } catch {
      // not JSON; fall through to the object itself
    }
  }
  if (isJsonObject(output.task)) return idOf(output.task.id);
  return idOf(output.id) ?? idOf(output.task_id);
}

function taskIdFromInput(input: JsonObject): string | null {
  return idOf(input.id) ?? idOf(input.task_id);
}

export class TaskGate implements Gate {
  readonly name = GATE;

  appliesTo(eventType: HookEventType): boolean {
    return eventType === "PreToolUse" || eventType === "PostToolUse";
  }

  evaluate(event: HookEvent, state: SessionState, ctx: GateContext): GateDecision {
    if (event.event_type === "PostToolUse") return this.bookkeeping(event, state, ctx);
    if (event.event_type !== "PreToolUse" || !event.tool_name) return ok(GATE);
    if (!isFileMutation(ctx.policy, event.tool_name, event.tool_input)) return ok(GATE);

    const unmet = ctx.config.taskRequired.filter((req) => !state.flags[req]);
    if (unmet.length === 0) return ok(GATE);

    return enforce(
      GATE,
      ctx.mode,
      `'${event.tool_name}' modifies the workspace but ${unmet.map((r) => REMEDIATION[r]).join("; ")}.`,
      { citation: "work-only-on-a-bound-task" }
    );
  }

  private bookkeeping(event: HookEvent, state: SessionState, ctx: GateContext): GateDecision {
    const toolName = event.tool_name ?? "";
    const base = baseToolName(toolName);
    const mutations: StateMutation[] = [];
    const notes: string[] = [];

    const claimsTask =
      BIND_TOOLS.has(base) || (base === "update_task" && event.tool_input.status === "in_progress");
    if (claimsTask) {
      const taskId = taskIdFromResult(event.tool_output) ?? taskIdFromInput(event.tool_input) ?? "unidentified";
      mutations.push({ op: "bind_task", task: taskId });
      notes.push(`Bound task ${taskId}.`);
    } else if (UNBIND_TOOLS.has(base) && state.bound_task !== null) {
      const completed = taskIdFromInput(event.tool_input);
      const ids = Array.isArray(event.tool_input.ids) ? event.tool_input.ids.map(idOf) : [];
      if (completed === null && ids.length === 0) {
        mutations.push({ op: "bind_task", task: null });
      } else if (completed === state.bound_task || ids.includes(state.bound_task)) {
        mutations.push({ op: "bind_task", task: null });
      }
      if (mutations.length > 0) notes.push(`Task ${state.bound_task} completed.`);
    }

    if (PLAN_TOOLS.has(toolName)) {
      mutations.push({ op: "set", flag: "plan_invoked", value: true });
    }
    if (invokesAgent(ctx.policy.agents.critic, event.tool_name, event.tool_input)) {
      mutations.push({ op: "set", flag: "critic_invoked", value: true });
      notes.push("Plan reviewed.");
    }

    return ok(GATE, notes.join(" "), { mutations });
  }
}
