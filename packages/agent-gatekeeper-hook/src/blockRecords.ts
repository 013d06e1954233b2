import path from "node:path";
import fs from "node:fs/promises";
import { z } from "zod";
import { errnoCode } from "./fileLock.js";
import { fileTimestamp } from "./jsonFiles.js";
import { sessionBlocksDir, sessionFileStem, type StatePaths } from "./paths.js";
import type { BlockRecord, BlockRecordKind } from "./types.js";

const blockRecordSchema = z
  .object({
    kind: z.enum(["block", "clear", "state_reset"]),
    seq: z.number().int().positive(),
    session_id: z.string(),
    timestamp: z.string(),
    gate: z.string(),
    reason: z.string(),
    citation: z.string().optional(),
    actor: z.string().optional(),
  })
  .passthrough();

export type NewBlockRecord = {
  kind: BlockRecordKind;
  session_id: string;
  gate: string;
  reason: string;
  citation?: string;
  actor?: string;
};

/**
 * Every record of a session, oldest first. Unreadable files are reported and skipped.
 */
export async function listBlockRecords(paths: StatePaths, sessionId: string): Promise<BlockRecord[]> {
  const dir = sessionBlocksDir(paths, sessionId);
  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return [];
    throw err;
  }

  const records: BlockRecord[] = [];
  for (const name of names) {
    if (!name.endsWith(".json")) continue;
    const filePath = path.join(dir, name);
    try {
      const parsed = blockRecordSchema.safeParse(JSON.parse(await fs.readFile(filePath, "utf8")));
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        console.error(`agent-gatekeeper: ignoring malformed block record ${filePath}`);
      }
    } catch (err) {
      console.error(`agent-gatekeeper: cannot read block record ${filePath}:`, err);
    }
  }

  return records.sort((a, b) => a.seq - b.seq);
}

/**
 * Appends one record file. Callers hold the session lock, which keeps `seq` unique.
 */
export async function appendBlockRecord(paths: StatePaths, record: NewBlockRecord): Promise<BlockRecord> {
  const existing = await listBlockRecords(paths, record.session_id);
  const last = existing[existing.length - 1];
  const now = new Date();
  const full: BlockRecord = {
    ...record,
    seq: (last?.seq ?? 0) + 1,
    timestamp: now.toISOString(),
  };

  const dir = sessionBlocksDir(paths, record.session_id);
  await fs.mkdir(dir, { recursive: true });

  const gatePart = sessionFileStem(record.gate);
  const base = `${fileTimestamp(now)}-${record.kind}-${gatePart}`;
  const body = JSON.stringify(full, null, 2);
  try {
    await fs.writeFile(path.join(dir, `${base}.json`), body, { encoding: "utf8", flag: "wx" });
  } catch (err) {
    if (errnoCode(err) !== "EEXIST") throw err;
    await fs.writeFile(path.join(dir, `${base}-${full.seq}.json`), body, { encoding: "utf8", flag: "wx" });
  }
  return full;
}
