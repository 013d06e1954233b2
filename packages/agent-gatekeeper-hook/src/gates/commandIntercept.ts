import { minimatch } from "minimatch";
import { shellCommandOf } from "../policy.js";
import type { GateDecision, HookEvent, HookEventType, JsonObject, SessionState } from "../types.js";
import { ok, type Gate, type GateContext } from "./gate.js";

const GATE = "command_intercept";

const SEARCH_TOOLS = new Set(["Grep", "grep_search", "search_file_content"]);

function isExcludedSegment(segment: string, excludeDirs: string[]): boolean {
  return excludeDirs.some((dir) => minimatch(segment, dir, { dot: true }));
}

/** True when the path runs through one of the excluded directories. */
export function targetsExcludedDir(target: string, excludeDirs: string[]): boolean {
  return target.split(/[\\/]+/).some((seg) => seg.length > 0 && isExcludedSegment(seg, excludeDirs));
}

export function exclusionGlob(excludeDirs: string[]): string {
  return excludeDirs.length === 1 ? `!${excludeDirs[0]}` : `!{${excludeDirs.join(",")}}`;
}

function shellQuote(value: string): string {
  return /^[A-Za-z0-9._\-/=]+$/.test(value) ? value : `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Adds directory exclusions to a recursive `grep` or an `rg` invocation. Returns null when
 * the command is something else, already filters, or searches inside an excluded directory.
 */
export function rewriteSearchCommand(command: string, excludeDirs: string[]): string | null {
  const trimmed = command.trimStart();
  const match = /^(grep|rg)(\s+|$)/.exec(trimmed);
  if (!match) return null;
  const program = match[1];
  const rest = trimmed.slice(program.length);
  // Only the first pipeline stage is the search.
  const tokens = rest.split(/[|;&]/)[0].trim().split(/\s+/).filter(Boolean);

  if (program === "grep") {
    const recursive = tokens.some((t) => t === "--recursive" || /^-[A-Za-z]*[rR]/.test(t));
    if (!recursive) return null;
    if (tokens.some((t) => t.startsWith("--exclude-dir"))) return null;
  } else if (tokens.some((t) => t === "-g" || t.startsWith("--glob") || t.startsWith("--iglob"))) {
    return null;
  }

  // First operand is the pattern; the rest are paths.
  const paths = tokens
    .filter((t) => !t.startsWith("-"))
    .slice(1)
    .map((t) => t.replace(/^['"]|['"]$/g, ""));
  if (paths.some((t) => targetsExcludedDir(t, excludeDirs))) return null;

  const flags =
    program === "grep"
      ? excludeDirs.map((d) => `--exclude-dir=${shellQuote(d)}`)
      : excludeDirs.map((d) => `--glob ${shellQuote(`!${d}`)}`);
  return `${program} ${flags.join(" ")}${rest}`;
}

/**
 * Keeps searches out of dependency and cache directories by rewriting the tool input.
 * Never blocks.
 */
export class CommandInterceptGate implements Gate {
  readonly name = GATE;

  appliesTo(eventType: HookEventType): boolean {
    return eventType === "PreToolUse";
  }

  evaluate(event: HookEvent, _state: SessionState, ctx: GateContext): GateDecision {
    const { enabled, excludeDirs } = ctx.policy.commandIntercept;
    const toolName = event.tool_name;
    if (!enabled || !toolName || excludeDirs.length === 0) return ok(GATE);

    if (SEARCH_TOOLS.has(toolName)) {
      const input = event.tool_input;
      if (input.glob !== undefined || input.include !== undefined) return ok(GATE);
      if (typeof input.path === "string" && targetsExcludedDir(input.path, excludeDirs)) return ok(GATE);
      const updated: JsonObject = { ...input, glob: exclusionGlob(excludeDirs) };
      return ok(GATE, `Search excludes ${excludeDirs.join(", ")}.`, { updated_input: updated });
    }

    const command = shellCommandOf(toolName, event.tool_input);
    if (command === null) return ok(GATE);
    const rewritten = rewriteSearchCommand(command, excludeDirs);
    if (rewritten === null) return ok(GATE);
    return ok(GATE, `Search excludes ${excludeDirs.join(", ")}.`, {
      updated_input: { ...event.tool_input, command: rewritten },
    });
  }
}
