import { describe, it, expect } from "vitest";
import crypto from "node:crypto";
import fs from "node:fs/promises";
import { ConfigurationError } from "../src/errors.js";
import { normalizeEvent, resolveEventType, resolveWorkspaceRoot } from "../src/normalizer.js";
import { getStatePaths, processSessionPath } from "../src/paths.js";
import { makeTempWorkspace } from "./helpers.js";

function hash16(value: string): string {
  return crypto.createHash("sha256").update(value).digest("hex").slice(0, 16);
}

describe("resolveEventType", () => {
  it("maps Gemini CLI names onto the shared event types", () => {
    expect(resolveEventType("BeforeTool")).toEqual({ eventType: "PreToolUse", sessionEnding: false });
    expect(resolveEventType("AfterTool")).toEqual({ eventType: "PostToolUse", sessionEnding: false });
    expect(resolveEventType("BeforeAgent")).toEqual({ eventType: "UserPromptSubmit", sessionEnding: false });
    expect(resolveEventType("AfterAgent")).toEqual({ eventType: "Stop", sessionEnding: false });
  });

  it("treats SessionEnd as a final Stop", () => {
    expect(resolveEventType("SessionEnd")).toEqual({ eventType: "Stop", sessionEnding: true });
  });

  it("rejects names it does not know", () => {
    expect(() => resolveEventType("Notification")).toThrow(ConfigurationError);
  });
});

describe("resolveWorkspaceRoot", () => {
  it("prefers cwd, then the first workspace root", () => {
    expect(resolveWorkspaceRoot({ cwd: "/a", workspace_roots: ["/b"] })).toBe("/a");
    expect(resolveWorkspaceRoot({ workspace_roots: ["/b", "/c"] })).toBe("/b");
    expect(resolveWorkspaceRoot({})).toBe(process.cwd());
  });
});

describe("normalizeEvent", () => {
  it("normalizes a Claude Code tool event", async () => {
    const cwd = await makeTempWorkspace();
    const event = await normalizeEvent(
      {
        hook_event_name: "PostToolUse",
        session_id: "abc",
        cwd,
        tool_name: "Edit",
        tool_input: { file_path: "x.ts" },
        tool_response: { success: true },
      },
      { runtime: "claude", ppid: 1 }
    );
    expect(event).toMatchObject({
      session_id: "abc",
      session_source: "payload",
      event_type: "PostToolUse",
      tool_name: "Edit",
      tool_input: { file_path: "x.ts" },
      tool_output: { success: true },
      cwd,
      session_ending: false,
    });
  });

  it("lets the command-line event name win and parses stringified input", async () => {
    const cwd = await makeTempWorkspace();
    const event = await normalizeEvent(
      {
        hook_event_name: "ignored",
        session_id: "g1",
        cwd,
        tool_name: "run_shell_command",
        tool_input: '{"command":"ls"}',
        tool_result: '{"returnDisplay":"ok"}',
      },
      { runtime: "gemini", nativeEvent: "BeforeTool", ppid: 1 }
    );
    expect(event.event_type).toBe("PreToolUse");
    expect(event.runtime).toBe("gemini");
    expect(event.tool_input).toEqual({ command: "ls" });
    expect(event.tool_output).toEqual({ returnDisplay: "ok" });
  });

  it("replaces non-object tool input with an empty object", async () => {
    const cwd = await makeTempWorkspace();
    const event = await normalizeEvent(
      { hook_event_name: "PreToolUse", session_id: "s", cwd, tool_name: "Read", tool_input: "not json" },
      { runtime: "claude", ppid: 1 }
    );
    expect(event.tool_input).toEqual({});
  });

  it("requires an event name", async () => {
    await expect(normalizeEvent({ session_id: "s" }, { runtime: "claude", ppid: 1 })).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });

  it("remembers the session id announced at SessionStart for later events of the same agent", async () => {
    const cwd = await makeTempWorkspace();
    const ppid = 424242;
    await normalizeEvent({ hook_event_name: "SessionStart", session_id: "sess-9", cwd }, { runtime: "claude", ppid });

    const later = await normalizeEvent(
      { hook_event_name: "PreToolUse", cwd, tool_name: "Read" },
      { runtime: "claude", ppid }
    );
    expect(later.session_id).toBe("sess-9");
    expect(later.session_source).toBe("ancestry");
  });

  it("derives a stable id from the transcript path and persists it", async () => {
    const cwd = await makeTempWorkspace();
    const ppid = 515151;
    const transcript = "/home/dev/.claude/projects/p/t1.jsonl";

    const event = await normalizeEvent(
      { hook_event_name: "UserPromptSubmit", cwd, transcript_path: transcript, prompt: "hi" },
      { runtime: "claude", ppid }
    );
    expect(event.session_id).toBe(`tx-${hash16(transcript)}`);
    expect(event.session_source).toBe("transcript");

    const stored = JSON.parse(await fs.readFile(processSessionPath(getStatePaths(cwd), ppid), "utf8"));
    expect(stored.session_id).toBe(event.session_id);
  });

  it("falls back to the workspace path", async () => {
    const cwd = await makeTempWorkspace();
    const event = await normalizeEvent({ hook_event_name: "Stop", cwd }, { runtime: "claude", ppid: 616161 });
    expect(event.session_id).toBe(`cwd-${hash16(cwd)}`);
    expect(event.session_source).toBe("cwd");
  });

  it("keys a payload with no id, transcript or cwd to the hook's working directory", async () => {
    const stateDir = await makeTempWorkspace();
    const event = await normalizeEvent({ hook_event_name: "Stop" }, { runtime: "claude", ppid: 717171, stateDir });
    expect(event.cwd).toBe(process.cwd());
    expect(event.session_id).toBe(`cwd-${hash16(process.cwd())}`);
    expect(event.session_source).toBe("cwd");
  });

  it("marks native session end", async () => {
    const cwd = await makeTempWorkspace();
    const event = await normalizeEvent(
      { hook_event_name: "SessionEnd", session_id: "s", cwd },
      { runtime: "claude", ppid: 1 }
    );
    expect(event.event_type).toBe("Stop");
    expect(event.session_ending).toBe(true);
  });
});
