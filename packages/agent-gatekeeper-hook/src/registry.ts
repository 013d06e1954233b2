import { ConfigurationError } from "./errors.js";
import { createGates, type Gate } from "./gates/index.js";
import type { GatekeeperConfig } from "./config.js";
import type { GatekeeperPolicy } from "./policy.js";
import type { GateMode, GateName, HookEventType } from "./types.js";

export type RegistryEntry = {
  gate: Gate;
  mode: GateMode;
};

export type GateRegistry = Record<HookEventType, RegistryEntry[]>;

export const DEFAULT_GATE_ORDER: Record<HookEventType, GateName[]> = {
  SessionStart: [],
  UserPromptSubmit: ["hydration"],
  PreToolUse: ["command_intercept", "hydration", "task", "custodiet"],
  PostToolUse: ["hydration", "task", "custodiet", "handover"],
  Stop: ["handover"],
};

/** Resolves the gate order for every event type. Unknown gate names fail the whole run. */
export function buildRegistry(
  config: GatekeeperConfig,
  policy: GatekeeperPolicy,
  gates: Record<GateName, Gate> = createGates()
): GateRegistry {
  const lookup = new Map<string, Gate>(Object.values(gates).map((g) => [g.name, g]));

  const entriesFor = (eventType: HookEventType): RegistryEntry[] => {
    const names = policy.gateOrder?.[eventType] ?? DEFAULT_GATE_ORDER[eventType];
    return names.map((name) => {
      const gate = lookup.get(name);
      if (!gate) {
        throw new ConfigurationError(
          `Gate order for ${eventType} names unknown gate "${name}" (known: ${[...lookup.keys()].join(", ")})`
        );
      }
      return { gate, mode: config.modes[gate.name] };
    });
  };

  return {
    SessionStart: entriesFor("SessionStart"),
    UserPromptSubmit: entriesFor("UserPromptSubmit"),
    PreToolUse: entriesFor("PreToolUse"),
    PostToolUse: entriesFor("PostToolUse"),
    Stop: entriesFor("Stop"),
  };
}
