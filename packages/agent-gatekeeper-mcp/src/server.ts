import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import {
  BlockFlagManager,
  COMPLIANCE_TOOL_NAME,
  SessionStore,
  evaluateCompliance,
  getStatePaths,
  loadConfig,
  sessionSummarySchema,
} from "agent-gatekeeper-hook";

/**
 * Agent Gatekeeper MCP Server
 *
 * Purpose:
 *  - Judge session summaries for the custodiet gate (gatekeeper_compliance_check)
 *  - Let an operator inspect a session, clear a sticky block, or pick the session's
 *    custodiet mode without touching the state files by hand
 *
 * State lives under GATEKEEPER_STATE_DIR, or <workspace>/.ai/agent-gatekeeper where the
 * workspace is GATEKEEPER_WORKSPACE_ROOT or the working directory.
 *
 * IMPORTANT: This is an STDIO MCP server.
 * Never write to stdout except MCP JSON-RPC. Use console.error for logs.
 */

export const SERVER_NAME = "agent-gatekeeper";
export const SERVER_VERSION = "0.1.0";

type Env = Record<string, string | undefined>;

function computeWorkspaceRoot(env: Env): string {
  const v = env.GATEKEEPER_WORKSPACE_ROOT;
  return v && v.trim().length > 0 ? v : process.cwd();
}

function openStore(env: Env): { store: SessionStore; blocks: BlockFlagManager } {
  const config = loadConfig(env);
  const paths = getStatePaths(computeWorkspaceRoot(env), config.stateDir);
  const store = new SessionStore(paths, { lockTimeoutMs: config.lockTimeoutMs });
  return { store, blocks: new BlockFlagManager(store) };
}

function text(value: unknown) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }],
  };
}

export function createGatekeeperServer(env: Env = process.env): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    COMPLIANCE_TOOL_NAME,
    {
      description:
        "Judge a bounded session summary for drift. Returns {verdict: OK|WARN|BLOCK, message, citation?}.",
      inputSchema: {
        summary: sessionSummarySchema.describe("Session summary sent by the custodiet gate."),
      },
    },
    async ({ summary }) => text(evaluateCompliance(summary))
  );

  server.registerTool(
    "gatekeeper_session_status",
    {
      description: "Show a session's flags, counters, recent gate decisions and block history.",
      inputSchema: {
        session_id: z.string().min(1),
      },
    },
    async ({ session_id }) => {
      const { store, blocks } = openStore(env);
      const history = await blocks.history(session_id);
      return text({
        state: await store.get(session_id),
        active_block: await blocks.activeBlock(session_id),
        history,
      });
    }
  );

  server.registerTool(
    "gatekeeper_clear_block",
    {
      description: "Clear the sticky block on a session. Appends a clear record; block records are kept.",
      inputSchema: {
        session_id: z.string().min(1),
        reason: z.string().min(1).default("cleared via MCP"),
        actor: z.string().min(1).default("mcp"),
      },
    },
    async ({ session_id, reason, actor }) => {
      const { blocks } = openStore(env);
      const record = await blocks.clear(session_id, actor, reason);
      if (!record) {
        return {
          content: [{ type: "text" as const, text: `Session ${session_id} has no active block.` }],
        };
      }
      return text({ cleared: true, record });
    }
  );

  server.registerTool(
    "gatekeeper_set_custodiet_mode",
    {
      description:
        "Override CUSTODIET_MODE for one session. 'config' removes the override.",
      inputSchema: {
        session_id: z.string().min(1),
        mode: z.enum(["warn", "block", "config"]),
      },
    },
    async ({ session_id, mode }) => {
      const { store } = openStore(env);
      const state = await store.apply(session_id, [
        { op: "set", flag: "custodiet_mode", value: mode === "config" ? null : mode },
      ]);
      return text({ session_id, custodiet_mode: state.flags.custodiet_mode });
    }
  );

  return server;
}
