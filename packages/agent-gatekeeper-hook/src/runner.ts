import type { BlockFlagManager } from "./blockFlags.js";
import type { ComplianceChecker } from "./compliance.js";
import type { GatekeeperConfig } from "./config.js";
import { GateInternalError } from "./errors.js";
import { block, warn, type GateContext } from "./gates/gate.js";
import type { GatekeeperPolicy } from "./policy.js";
import type { GateRegistry, RegistryEntry } from "./registry.js";
import { applyMutations, type SessionStore } from "./stateStore.js";
import type {
  BlockRecord,
  GateDecision,
  GateMode,
  HookEvent,
  JsonObject,
  SessionState,
  StateMutation,
  Verdict,
} from "./types.js";

export type RunnerDeps = {
  store: SessionStore;
  registry: GateRegistry;
  config: GatekeeperConfig;
  policy: GatekeeperPolicy;
  blocks: BlockFlagManager;
  compliance: ComplianceChecker;
};

export type RunResult = {
  verdict: Verdict;
  decisions: GateDecision[];
  // The event as the last gate saw it.
  event: HookEvent;
  updatedInput?: JsonObject;
  state: SessionState;
};

const VERDICT_RANK: Record<Verdict, number> = { OK: 0, WARN: 1, BLOCK: 2 };

export function aggregateVerdict(decisions: GateDecision[]): Verdict {
  return decisions.reduce<Verdict>(
    (acc, d) => (VERDICT_RANK[d.verdict] > VERDICT_RANK[acc] ? d.verdict : acc),
    "OK"
  );
}

function effectiveMode(entry: RegistryEntry, state: SessionState): GateMode {
  if (entry.gate.name === "custodiet" && state.flags.custodiet_mode !== null) return state.flags.custodiet_mode;
  return entry.mode;
}

function stickyBlock(gate: string, sessionId: string, active: BlockRecord | null): GateDecision {
  const origin = active ? `${active.gate}: ${active.reason.replace(/\.$/, "")}` : "an earlier compliance check";
  return block(
    gate,
    `Session is halted by ${origin}. An operator must run \`agent-gatekeeper clear-block --session ${sessionId}\` to resume.`,
    { citation: active?.citation }
  );
}

async function evaluateGate(
  entry: RegistryEntry,
  event: HookEvent,
  state: SessionState,
  ctx: GateContext
): Promise<GateDecision> {
  const name = entry.gate.name;
  let decision: GateDecision;
  try {
    decision = await entry.gate.evaluate(event, state, ctx);
  } catch (err) {
    const failure = new GateInternalError(name, err);
    console.error(`agent-gatekeeper: ${failure.message}`);
    return warn(name, `${failure.message}. The gate was skipped for this event.`);
  }
  if (decision.verdict === "BLOCK" && ctx.mode === "warn") {
    return { ...decision, verdict: "WARN" };
  }
  return decision;
}

/**
 * Runs the registered gates for one event inside a single state transaction.
 *
 * Gates run in registry order and see each other's mutations and input rewrites. The first
 * BLOCK ends the run. Every decision is audited and all mutations land in one write.
 */
export async function runGates(event: HookEvent, deps: RunnerDeps): Promise<RunResult> {
  const entries = deps.registry[event.event_type].filter((e) => e.gate.appliesTo(event.event_type));

  const res = await deps.store.transact(event.session_id, async (initial, recovery) => {
    const decisions: GateDecision[] = [];
    const mutations: StateMutation[] = [];
    let working = initial;
    let current = event;
    let updatedInput: JsonObject | undefined;

    if (recovery) {
      decisions.push(warn("state", `${recovery.message}. Session state was reset to defaults.`));
    }

    // Block records outlive a state reset, so they decide along with the flag.
    const active = await deps.blocks.activeBlock(event.session_id);
    const halted = initial.flags.custodiet_block_active || active !== null;
    if (active && !initial.flags.custodiet_block_active) {
      mutations.push({ op: "set", flag: "custodiet_block_active", value: true });
    }

    // Every attempted tool call counts toward the compliance interval, blocked ones included.
    if (event.event_type === "PreToolUse") {
      const counted: StateMutation[] = [{ op: "increment", counter: "tool_calls_since_compliance", by: 1 }];
      mutations.push(...counted);
      working = applyMutations(working, counted);
    }

    for (const entry of entries) {
      let decision: GateDecision;
      if (halted) {
        decision = stickyBlock(entry.gate.name, event.session_id, active);
      } else {
        const ctx: GateContext = {
          mode: effectiveMode(entry, working),
          config: deps.config,
          policy: deps.policy,
          blocks: deps.blocks,
          compliance: deps.compliance,
        };
        decision = await evaluateGate(entry, current, working, ctx);
      }

      decisions.push(decision);
      mutations.push(...decision.mutations);
      working = applyMutations(working, decision.mutations);

      if (decision.updated_input) {
        updatedInput = decision.updated_input;
        current = { ...current, tool_input: decision.updated_input };
      }
      if (decision.verdict === "BLOCK") break;
    }

    const ts = new Date().toISOString();
    for (const d of decisions) {
      mutations.push({
        op: "audit",
        entry: {
          ts,
          event_type: event.event_type,
          tool_name: event.tool_name,
          gate: d.gate,
          verdict: d.verdict,
          message: d.message || undefined,
          citation: d.citation,
        },
      });
    }

    return { mutations, value: { decisions, event: current, updatedInput } };
  });

  return {
    verdict: aggregateVerdict(res.value.decisions),
    decisions: res.value.decisions,
    event: res.value.event,
    updatedInput: res.value.updatedInput,
    state: res.state,
  };
}
