import { appendBlockRecord, listBlockRecords } from "./blockRecords.js";
import type { SessionStore } from "./stateStore.js";
import type { BlockRecord, StateMutation } from "./types.js";

/**
 * Sticky blocks.
 *
 * A latched block stays in force for every later event of the session until an operator
 * clears it. Clearing appends a record; block files are never removed.
 */

export type LatchResult = {
  record: BlockRecord;
  mutations: StateMutation[];
};

export function activeBlockOf(records: BlockRecord[]): BlockRecord | null {
  let active: BlockRecord | null = null;
  for (const record of records) {
    if (record.kind === "block") active = record;
    else if (record.kind === "clear") active = null;
  }
  return active;
}

export class BlockFlagManager {
  private readonly store: SessionStore;

  constructor(store: SessionStore) {
    this.store = store;
  }

  /** Writes the block record. The returned mutations must be applied in the same transaction. */
  async latch(sessionId: string, gate: string, reason: string, citation?: string): Promise<LatchResult> {
    const record = await appendBlockRecord(this.store.paths, {
      kind: "block",
      session_id: sessionId,
      gate,
      reason,
      citation,
    });
    console.error(`agent-gatekeeper: session ${sessionId} blocked by ${gate}: ${reason}`);
    return {
      record,
      mutations: [{ op: "set", flag: "custodiet_block_active", value: true }],
    };
  }

  async activeBlock(sessionId: string): Promise<BlockRecord | null> {
    return activeBlockOf(await this.history(sessionId));
  }

  /** Returns the clear record, or null when nothing was active. */
  async clear(sessionId: string, actor: string, reason: string): Promise<BlockRecord | null> {
    const res = await this.store.transact<BlockRecord | null>(sessionId, async (state) => {
      const active = await this.activeBlock(sessionId);
      if (!active && !state.flags.custodiet_block_active) {
        return { mutations: [], value: null };
      }
      const record = await appendBlockRecord(this.store.paths, {
        kind: "clear",
        session_id: sessionId,
        gate: active?.gate ?? "custodiet",
        reason,
        actor,
      });
      return {
        mutations: [{ op: "set", flag: "custodiet_block_active", value: false }],
        value: record,
      };
    });
    return res.value;
  }

  async history(sessionId: string): Promise<BlockRecord[]> {
    return listBlockRecords(this.store.paths, sessionId);
  }
}
