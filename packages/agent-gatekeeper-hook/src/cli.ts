#!/usr/bin/env node
import { BlockFlagManager } from "./blockFlags.js";
import { loadConfig } from "./config.js";
import { describeError } from "./errors.js";
import { getStatePaths } from "./paths.js";
import { route } from "./router.js";
import { SessionStore } from "./stateStore.js";
import type { Runtime } from "./types.js";

/**
 * agent-gatekeeper hook entry point.
 *
 * Hook mode reads one JSON payload on stdin and writes one JSON response on stdout:
 *   agent-gatekeeper [--runtime claude|gemini] [--mcp <server.js>] [NativeEventName]
 *
 * Operator commands:
 *   agent-gatekeeper clear-block --session <id> [--reason <text>] [--by <name>]
 *   agent-gatekeeper reset --session <id>
 *   agent-gatekeeper status --session <id>
 *
 * IMPORTANT: in hook mode nothing but the response may go to stdout. Logs go to stderr.
 */

const VALUE_FLAGS = new Set(["--runtime", "--mcp", "--session", "--reason", "--by", "--cwd"]);
const COMMANDS = new Set(["clear-block", "reset", "status"]);

function getArgValue(argv: string[], flag: string): string | null {
  const idx = argv.indexOf(flag);
  if (idx === -1) return null;
  const next = argv[idx + 1];
  if (!next || next.startsWith("--")) return null;
  return next;
}

function positionals(argv: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (VALUE_FLAGS.has(arg)) {
      i++;
      continue;
    }
    if (!arg.startsWith("--")) out.push(arg);
  }
  return out;
}

function parseRuntime(value: string | null): Runtime {
  if (value === null || value === "claude") return "claude";
  if (value === "gemini") return "gemini";
  throw new Error(`--runtime must be "claude" or "gemini", got "${value}"`);
}

async function readAllStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  return Buffer.concat(chunks).toString("utf8");
}

async function runHook(argv: string[]): Promise<number> {
  let runtime: Runtime;
  try {
    runtime = parseRuntime(getArgValue(argv, "--runtime"));
  } catch (err) {
    console.error(`agent-gatekeeper: ${describeError(err)}`);
    process.stdout.write(JSON.stringify({ continue: true, decision: "warn", systemMessage: describeError(err) }));
    return 1;
  }

  const raw = await readAllStdin();
  const { response, exitCode } = await route(raw, {
    runtime,
    nativeEvent: positionals(argv)[0] ?? null,
    mcpPath: getArgValue(argv, "--mcp"),
  });
  process.stdout.write(JSON.stringify(response));
  return exitCode;
}

async function runOperator(command: string, argv: string[]): Promise<number> {
  const sessionId = getArgValue(argv, "--session");
  if (!sessionId) {
    console.error(`usage: agent-gatekeeper ${command} --session <id>`);
    return 1;
  }

  const config = loadConfig();
  const paths = getStatePaths(getArgValue(argv, "--cwd") ?? process.cwd(), config.stateDir);
  const store = new SessionStore(paths, { lockTimeoutMs: config.lockTimeoutMs });
  const blocks = new BlockFlagManager(store);

  if (command === "clear-block") {
    const actor = getArgValue(argv, "--by") ?? process.env.USER ?? "operator";
    const reason = getArgValue(argv, "--reason") ?? "cleared by operator";
    const record = await blocks.clear(sessionId, actor, reason);
    if (!record) {
      console.error(`agent-gatekeeper: session ${sessionId} has no active block`);
      process.stdout.write(JSON.stringify({ cleared: false, session_id: sessionId }) + "\n");
      return 0;
    }
    process.stdout.write(JSON.stringify({ cleared: true, record }, null, 2) + "\n");
    return 0;
  }

  if (command === "reset") {
    await store.reset(sessionId);
    process.stdout.write(JSON.stringify({ reset: true, session_id: sessionId }) + "\n");
    return 0;
  }

  const [state, history] = await Promise.all([store.get(sessionId), blocks.history(sessionId)]);
  const activeBlock = await blocks.activeBlock(sessionId);
  process.stdout.write(JSON.stringify({ state, active_block: activeBlock, history }, null, 2) + "\n");
  return 0;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const command = positionals(argv)[0];
  if (command !== undefined && COMMANDS.has(command)) return runOperator(command, argv);
  return runHook(argv);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("agent-gatekeeper fatal:", err);
    process.stdout.write(JSON.stringify({ continue: true, decision: "warn", systemMessage: describeError(err) }));
    process.exitCode = 1;
  });
