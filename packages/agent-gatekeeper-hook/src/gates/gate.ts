import type { BlockFlagManager } from "../blockFlags.js";
import type { ComplianceChecker } from "../compliance.js";
import type { GatekeeperConfig } from "../config.js";
import type { GatekeeperPolicy } from "../policy.js";
import type {
  GateDecision,
  GateMode,
  GateName,
  HookEvent,
  HookEventType,
  JsonObject,
  SessionState,
  StateMutation,
} from "../types.js";

export type GateContext = {
  // Mode configured for the gate being evaluated.
  mode: GateMode;
  config: GatekeeperConfig;
  policy: GatekeeperPolicy;
  blocks: BlockFlagManager;
  compliance: ComplianceChecker;
};

export interface Gate {
  readonly name: GateName;
  appliesTo(eventType: HookEventType): boolean;
  evaluate(event: HookEvent, state: SessionState, ctx: GateContext): GateDecision | Promise<GateDecision>;
}

type DecisionExtras = {
  citation?: string;
  mutations?: StateMutation[];
  updated_input?: JsonObject;
};

export function ok(gate: string, message = "", extras: DecisionExtras = {}): GateDecision {
  return { gate, verdict: "OK", message, mutations: extras.mutations ?? [], ...pick(extras) };
}

export function warn(gate: string, message: string, extras: DecisionExtras = {}): GateDecision {
  return { gate, verdict: "WARN", message, mutations: extras.mutations ?? [], ...pick(extras) };
}

export function block(gate: string, message: string, extras: DecisionExtras = {}): GateDecision {
  return { gate, verdict: "BLOCK", message, mutations: extras.mutations ?? [], ...pick(extras) };
}

/** BLOCK when the gate enforces, WARN otherwise. */
export function enforce(gate: string, mode: GateMode, message: string, extras: DecisionExtras = {}): GateDecision {
  return mode === "block" ? block(gate, message, extras) : warn(gate, message, extras);
}

function pick(extras: DecisionExtras): Pick<GateDecision, "citation" | "updated_input"> {
  const out: Pick<GateDecision, "citation" | "updated_input"> = {};
  if (extras.citation !== undefined) out.citation = extras.citation;
  if (extras.updated_input !== undefined) out.updated_input = extras.updated_input;
  return out;
}
